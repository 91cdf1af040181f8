import type { Sha256 } from "./hashing.js";
import type { RunId } from "./ids.js";

export type ArtifactType =
  | "VCF"
  | "VCF_GZ"
  | "FASTA"
  | "FAI"
  | "DICT"
  | "HPO"
  | "TSV"
  | "TSV_GZ"
  | "JSON"
  | "TEXT"
  | "LOG"
  | "UNKNOWN";

/** Artifacts belong to one run; reference builds live in the reference cache. */
export interface ArtifactScope {
  kind: "run";
  runId: RunId;
}

export interface ArtifactRef {
  scope: ArtifactScope;
  stage: string;
  output: string;
  shardKey: string | null;
}

export interface ArtifactRecord {
  ref: ArtifactRef;
  path: string;
  fileName: string;
  type: ArtifactType;
  sizeBytes: bigint;
  checksumSha256: Sha256;
  fingerprint: Sha256 | null;
  createdAt: string;
}

export function runArtifactRef(runId: RunId, stage: string, output: string, shardKey: string | null = null): ArtifactRef {
  return { scope: { kind: "run", runId }, stage, output, shardKey };
}

export function scopeKey(scope: ArtifactScope): string {
  return `${scope.kind}:${scope.runId}`;
}

export function artifactKey(ref: ArtifactRef): string {
  const base = `${scopeKey(ref.scope)}/${ref.stage}.${ref.output}`;
  return ref.shardKey === null ? base : `${base}[${ref.shardKey}]`;
}
