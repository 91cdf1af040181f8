import type { ReferenceVersion } from "./genome.js";

export type PipelineErrorCode =
  | "validation_error"
  | "reference_build_error"
  | "tool_failure"
  | "tool_configuration_error"
  | "shard_failure"
  | "merge_error"
  | "graph_validation_error"
  | "graph_cycle_error"
  | "artifact_not_found"
  | "artifact_conflict"
  | "vcf_format_error";

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface ValidationIssue {
  parameter: string;
  reason: string;
}

export class ValidationError extends PipelineError {
  readonly code = "validation_error" as const;
  readonly parameter: string;
  readonly reason: string;

  constructor(readonly issues: ValidationIssue[]) {
    const first = issues[0] ?? { parameter: "(unknown)", reason: "invalid parameters" };
    super(issues.map((i) => `${i.parameter}: ${i.reason}`).join("; "));
    this.parameter = first.parameter;
    this.reason = first.reason;
  }
}

export class ReferenceBuildError extends PipelineError {
  readonly code = "reference_build_error" as const;

  constructor(
    readonly referenceVersion: ReferenceVersion,
    readonly step: string,
    cause: unknown
  ) {
    super(`reference build ${referenceVersion} failed at ${step}: ${describeError(cause)}`, { cause });
  }
}

export class ToolFailure extends PipelineError {
  readonly code = "tool_failure" as const;

  constructor(
    readonly tool: string,
    readonly exitCode: number | null,
    readonly reason: string,
    readonly diagnostics: string[]
  ) {
    super(`${tool} ${reason}${diagnostics.length ? `\n${diagnostics.join("\n")}` : ""}`);
  }
}

export class ToolConfigurationError extends PipelineError {
  readonly code = "tool_configuration_error" as const;

  constructor(
    readonly tool: string,
    message: string
  ) {
    super(`tool ${tool}: ${message}`);
  }
}

export interface MissingShard {
  key: string;
  reason: string;
}

export class ShardFailure extends PipelineError {
  readonly code = "shard_failure" as const;

  constructor(readonly missing: MissingShard[]) {
    super(`shards did not complete: ${missing.map((m) => `${m.key} (${m.reason})`).join(", ")}`);
  }

  get missingKeys(): string[] {
    return this.missing.map((m) => m.key);
  }
}

export class MergeError extends PipelineError {
  readonly code = "merge_error" as const;
}

export class GraphValidationError extends PipelineError {
  readonly code: "graph_validation_error" | "graph_cycle_error" = "graph_validation_error";

  constructor(readonly problems: string[]) {
    super(`invalid stage graph: ${problems.join("; ")}`);
  }
}

export class GraphCycleError extends GraphValidationError {
  override readonly code = "graph_cycle_error" as const;

  constructor(readonly cycle: string[]) {
    super([`dependency cycle: ${cycle.join(" -> ")}`]);
  }
}

export class ArtifactNotFoundError extends PipelineError {
  readonly code = "artifact_not_found" as const;

  constructor(readonly key: string) {
    super(`artifact not found: ${key}`);
  }
}

export class ArtifactConflictError extends PipelineError {
  readonly code = "artifact_conflict" as const;

  constructor(readonly key: string) {
    super(`artifact ${key} is already complete with different inputs (artifacts are immutable; use a new run id)`);
  }
}

export class VcfFormatError extends PipelineError {
  readonly code = "vcf_format_error" as const;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
