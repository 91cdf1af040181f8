import * as z from "zod/v4";
import { REFERENCE_VERSIONS } from "../core/genome.js";

export const zRunId = z.string().regex(/^[A-Za-z0-9][A-Za-z0-9_.-]{0,127}$/, "invalid run_id");
export const zSha256 = z.string().regex(/^sha256:[a-f0-9]{64}$/);
export const zReferenceVersion = z.enum(REFERENCE_VERSIONS);

export const zArtifactType = z.enum([
  "VCF",
  "VCF_GZ",
  "FASTA",
  "FAI",
  "DICT",
  "HPO",
  "TSV",
  "TSV_GZ",
  "JSON",
  "TEXT",
  "LOG",
  "UNKNOWN"
]);

export const zArtifactSummary = z.object({
  artifact_key: z.string(),
  stage: z.string(),
  output: z.string(),
  shard_key: z.string().nullable(),
  type: zArtifactType,
  path: z.string(),
  size_bytes: z.string(),
  checksum_sha256: zSha256,
  created_at: z.string()
});

// Parameters arrive loosely typed; the validator reports per-parameter reasons.
export const zPipelineParamsInput = z.object({
  input_vcf: z.string().optional(),
  input_hpo: z.string().optional(),
  reference_directory: z.string().optional(),
  reference_version: z.string().optional(),
  run_id: z.string().optional(),
  output_directory: z.string().optional(),
  chromosome_map: z.string().optional()
});

export const zValidationIssue = z.object({
  parameter: z.string(),
  reason: z.string()
});

export const zParamsValidateInput = zPipelineParamsInput;

export const zParamsValidateOutput = z.object({
  valid: z.boolean(),
  issues: z.array(zValidationIssue),
  resolved: z.record(z.string(), z.unknown()).nullable()
});

export const zReferenceGetOrBuildInput = z.object({
  reference_version: zReferenceVersion
});

const zReferenceFile = z.object({
  path: z.string(),
  checksum_sha256: zSha256,
  size_bytes: z.string()
});

export const zReferenceGetOrBuildOutput = z.object({
  reference_version: zReferenceVersion,
  directory: z.string(),
  reused: z.boolean(),
  built_at: z.string(),
  files: z.object({ fasta: zReferenceFile, fai: zReferenceFile, dict: zReferenceFile })
});

export const zStageSummary = z.object({
  stage: z.string(),
  status: z.enum(["succeeded", "failed", "skipped"]),
  cached: z.boolean().optional(),
  fallback: z.object({ kind: z.string(), reason: z.string() }).nullable().optional(),
  error: z.string().optional(),
  blocked_by: z.string().optional()
});

export const zPipelineRunInput = zPipelineParamsInput;

export const zPipelineRunOutput = z.object({
  run_id: zRunId,
  status: z.enum(["succeeded", "failed"]),
  output_directory: z.string().nullable(),
  manifest_path: z.string().nullable(),
  failed_stage: z.string().nullable(),
  error: z.string().nullable(),
  stages: z.array(zStageSummary)
});

export const zRunGetInput = z.object({
  run_id: zRunId
});

export const zStageRunSummary = z.object({
  stage: z.string(),
  status: z.enum(["running", "succeeded", "failed", "skipped"]),
  cached: z.boolean(),
  fallback: z.record(z.string(), z.unknown()).nullable(),
  error: z.string().nullable(),
  started_at: z.string().nullable(),
  finished_at: z.string().nullable()
});

export const zRunEvent = z.object({
  ts: z.string(),
  kind: z.string(),
  message: z.string().nullable(),
  data: z.record(z.string(), z.unknown()).nullable()
});

export const zRunGetOutput = z.object({
  run: z.object({
    run_id: zRunId,
    reference_version: zReferenceVersion,
    status: z.enum(["running", "succeeded", "failed"]),
    params_hash: zSha256,
    config_hash: zSha256,
    params: z.record(z.string(), z.unknown()),
    created_at: z.string(),
    started_at: z.string().nullable(),
    finished_at: z.string().nullable(),
    error: z.string().nullable(),
    result: z.record(z.string(), z.unknown()).nullable()
  }),
  stages: z.array(zStageRunSummary),
  artifacts: z.array(zArtifactSummary),
  events: z.array(zRunEvent)
});
