import type { JsonObject } from "./json.js";
import type { RunId } from "./ids.js";
import type { ReferenceVersion } from "./genome.js";
import type { Sha256 } from "./hashing.js";

export type RunStatus = "running" | "succeeded" | "failed";

export type StageRunStatus = "running" | "succeeded" | "failed" | "skipped";

export interface RunRecord {
  runId: RunId;
  referenceVersion: ReferenceVersion;
  status: RunStatus;
  paramsHash: Sha256;
  configHash: Sha256;
  params: JsonObject;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  error: string | null;
  resultJson: JsonObject | null;
}

export interface StageRunRecord {
  runId: RunId;
  stageName: string;
  status: StageRunStatus;
  cached: boolean;
  fallback: JsonObject | null;
  error: string | null;
  startedAt: string | null;
  finishedAt: string | null;
}
