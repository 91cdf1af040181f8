import { promises as fs, type Stats } from "fs";
import path from "path";
import * as z from "zod/v4";
import { REFERENCE_VERSIONS, type ReferenceVersion } from "../core/genome.js";
import { ValidationError, type ValidationIssue } from "../core/errors.js";
import { isValidRunId, newRunId, type RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { PipelineConfig } from "./pipelineConfig.js";

export const REQUIRED_PARAMETERS = ["input_vcf", "input_hpo", "reference_directory", "reference_version"] as const;

export interface RawPipelineParams {
  input_vcf?: unknown;
  input_hpo?: unknown;
  reference_directory?: unknown;
  reference_version?: unknown;
  run_id?: unknown;
  output_directory?: unknown;
  chromosome_map?: unknown;
}

/** The validated, explicit run configuration handed to every stage. */
export interface PipelineParams {
  runId: RunId;
  inputVcf: string;
  inputHpo: string;
  referenceDirectory: string;
  referenceVersion: ReferenceVersion;
  outputDirectory: string;
  chromosomeMap: string;
}

const zNonEmpty = (name: string) =>
  z.string({ error: (iss) => (iss.input === undefined ? `${name} is required` : `${name} must be a string`) }).trim().min(1, `${name} must not be empty`);

const zRawParams = z.object({
  input_vcf: zNonEmpty("input_vcf").refine((p) => p.endsWith(".vcf") || p.endsWith(".vcf.gz"), "must end in .vcf or .vcf.gz"),
  input_hpo: zNonEmpty("input_hpo").refine((p) => p.endsWith(".hpo") || p.endsWith(".txt"), "must end in .hpo or .txt"),
  reference_directory: zNonEmpty("reference_directory"),
  reference_version: z.enum(REFERENCE_VERSIONS, {
    error: (iss) => (iss.input === undefined ? "reference_version is required" : `must be one of ${REFERENCE_VERSIONS.join(", ")}`)
  }),
  run_id: zNonEmpty("run_id").refine(isValidRunId, "must match [A-Za-z0-9][A-Za-z0-9_.-]* (max 128 chars)").optional(),
  output_directory: zNonEmpty("output_directory").optional(),
  chromosome_map: zNonEmpty("chromosome_map").optional()
});

const HPO_TERM_RE = /\bHP:\d{7}\b/;

type PathKind = "file" | "directory";

async function checkPath(parameter: string, value: string, kind: PathKind): Promise<ValidationIssue | null> {
  let st: Stats;
  try {
    st = await fs.stat(value);
  } catch {
    return { parameter, reason: `path does not exist: ${value}` };
  }
  if (kind === "directory" && !st.isDirectory()) return { parameter, reason: `must be a directory, not a file: ${value}` };
  if (kind === "file" && !st.isFile()) return { parameter, reason: `must be a regular file: ${value}` };
  return null;
}

async function checkHpoFile(value: string): Promise<ValidationIssue | null> {
  const pathIssue = await checkPath("input_hpo", value, "file");
  if (pathIssue) return pathIssue;
  const text = await fs.readFile(value, "utf8");
  if (!HPO_TERM_RE.test(text)) return { parameter: "input_hpo", reason: "no HPO terms (HP:nnnnnnn) found" };
  return null;
}

async function checkOutputDirectory(value: string): Promise<ValidationIssue | null> {
  try {
    const st = await fs.stat(value);
    return st.isDirectory() ? null : { parameter: "output_directory", reason: `exists and is not a directory: ${value}` };
  } catch {
    // created at publish time
    return null;
  }
}

function parameterOf(issuePath: PropertyKey[]): string {
  const head = issuePath[0];
  return typeof head === "string" ? head : "(root)";
}

/**
 * Checks every parameter and returns all issues found. Path checks only run
 * for parameters whose shape is already valid.
 */
export async function checkParams(raw: RawPipelineParams, config: PipelineConfig): Promise<{
  issues: ValidationIssue[];
  params: PipelineParams | null;
}> {
  const issues: ValidationIssue[] = [];
  const shape = zRawParams.safeParse(raw);
  const badShape = new Set<string>();
  if (!shape.success) {
    for (const iss of shape.error.issues) {
      const parameter = parameterOf(iss.path);
      if (badShape.has(parameter)) continue;
      badShape.add(parameter);
      issues.push({ parameter, reason: iss.message });
    }
  }

  const str = (key: keyof RawPipelineParams): string | null => {
    const v = raw[key];
    return typeof v === "string" && !badShape.has(key) ? v.trim() : null;
  };

  const inputVcf = str("input_vcf");
  const inputHpo = str("input_hpo");
  const referenceDirectory = str("reference_directory");
  const outputDirectory = str("output_directory");
  const chromosomeMap = str("chromosome_map") ?? config.chromosome_map;

  const pathChecks: Array<Promise<ValidationIssue | null>> = [];
  if (inputVcf) pathChecks.push(checkPath("input_vcf", inputVcf, "file"));
  if (inputHpo) pathChecks.push(checkHpoFile(inputHpo));
  if (referenceDirectory) pathChecks.push(checkPath("reference_directory", referenceDirectory, "directory"));
  if (!badShape.has("chromosome_map")) pathChecks.push(checkPath("chromosome_map", chromosomeMap, "file"));
  if (outputDirectory) pathChecks.push(checkOutputDirectory(outputDirectory));

  for (const issue of await Promise.all(pathChecks)) {
    if (issue) issues.push(issue);
  }

  const order = new Map<string, number>(
    [...REQUIRED_PARAMETERS, "run_id", "output_directory", "chromosome_map"].map((p, i) => [p, i])
  );
  issues.sort((a, b) => (order.get(a.parameter) ?? 99) - (order.get(b.parameter) ?? 99));

  if (issues.length || !shape.success) return { issues, params: null };

  const data = shape.data;
  const runId = data.run_id ?? newRunId();
  return {
    issues,
    params: {
      runId,
      inputVcf: path.resolve(data.input_vcf),
      inputHpo: path.resolve(data.input_hpo),
      referenceDirectory: path.resolve(data.reference_directory),
      referenceVersion: data.reference_version,
      outputDirectory: path.resolve(data.output_directory ?? path.join(config.paths.results_dir, runId)),
      chromosomeMap: path.resolve(chromosomeMap)
    }
  };
}

export async function validateParams(raw: RawPipelineParams, config: PipelineConfig): Promise<PipelineParams> {
  const { issues, params } = await checkParams(raw, config);
  if (!params) throw new ValidationError(issues);
  return params;
}

export function paramsSnapshot(params: PipelineParams): JsonObject {
  return {
    run_id: params.runId,
    input_vcf: params.inputVcf,
    input_hpo: params.inputHpo,
    reference_directory: params.referenceDirectory,
    reference_version: params.referenceVersion,
    output_directory: params.outputDirectory,
    chromosome_map: params.chromosomeMap
  };
}
