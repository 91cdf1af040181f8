import type { RunId } from "../core/ids.js";

/**
 * `<stage>.<output>` for stage products, `params.<name>` for external inputs.
 */
export type ArtifactName = string;

export const EXTERNAL_PREFIX = "params";

export function artifactName(stage: string, output: string): ArtifactName {
  return `${stage}.${output}`;
}

export function externalName(name: string): ArtifactName {
  return `${EXTERNAL_PREFIX}.${name}`;
}

/** A recognized degenerate input that a stage handled with a documented substitute. */
export interface ContentFallback {
  kind: "passthrough" | "unfiltered";
  reason: string;
}

export interface StageContext<T> {
  runId: RunId;
  stage: string;
  /** Resolved inputs keyed by artifact name. */
  inputs: ReadonlyMap<ArtifactName, T>;
  input(name: ArtifactName): T;
}

export interface StageResult<T> {
  /** Keyed by output name, without the stage prefix. */
  outputs: Record<string, T>;
  fallback?: ContentFallback | null;
  cached?: boolean;
}

export interface StageDefinition<T> {
  name: string;
  inputs: readonly ArtifactName[];
  outputs: readonly string[];
  /** Defaults to true. A run fails when a required stage fails or is skipped. */
  required?: boolean;
  execute(ctx: StageContext<T>): Promise<StageResult<T>>;
}

export type StageOutcome =
  | {
      stage: string;
      status: "succeeded";
      cached: boolean;
      fallback: ContentFallback | null;
      startedAt: string;
      finishedAt: string;
    }
  | {
      stage: string;
      status: "failed";
      error: unknown;
      message: string;
      startedAt: string;
      finishedAt: string;
    }
  | {
      stage: string;
      status: "skipped";
      /** The failed stage that blocked this one. */
      blockedBy: string;
    };

export interface GraphListener {
  stageStarted?(stage: string): Promise<void>;
  stageFinished?(outcome: StageOutcome): Promise<void>;
}

export interface GraphRunReport<T> {
  runId: RunId;
  status: "succeeded" | "failed";
  /** In topological order. */
  outcomes: StageOutcome[];
  artifacts: ReadonlyMap<ArtifactName, T>;
  /** First failed required stage in topological order. */
  failure: { stage: string; error: unknown; message: string } | null;
}
