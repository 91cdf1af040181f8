import { loadPipelineConfig } from "../src/config/pipelineConfig.js";
import type { RawPipelineParams } from "../src/config/params.js";
import { ValidationError, describeError } from "../src/core/errors.js";
import { DEFAULT_CONFIG_PATH, autoSchemaFromEnv, createRuntime } from "../src/runtime.js";

const PARAM_FLAGS: Record<string, keyof RawPipelineParams> = {
  "input-vcf": "input_vcf",
  "input-hpo": "input_hpo",
  "reference-directory": "reference_directory",
  "reference-version": "reference_version",
  "run-id": "run_id",
  "output-directory": "output_directory",
  "chromosome-map": "chromosome_map"
};

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/pipeline_run.ts --input-vcf <file> --input-hpo <file> --reference-directory <dir> --reference-version hg19|hg38",
    "                              [--run-id <id>] [--output-directory <dir>] [--chromosome-map <file>] [--config <pipeline.yaml>]",
    "",
    "env:",
    "  PIPELINE_CONFIG_PATH (default config/pipeline.yaml)",
    "  DATABASE_URL (optional, pg-mem when unset)",
    "  AUTO_SCHEMA (default true)",
    ""
  ].join("\n");
}

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (key === "help") {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return 0;
  }

  const raw: RawPipelineParams = {};
  for (const [key, value] of Object.entries(args)) {
    if (key === "config") continue;
    const param = PARAM_FLAGS[key];
    if (!param) throw new Error(`unknown flag: --${key}\n\n${usage()}`);
    raw[param] = value;
  }

  const configPath = typeof args.config === "string" ? args.config : (process.env.PIPELINE_CONFIG_PATH ?? DEFAULT_CONFIG_PATH);
  const loaded = await loadPipelineConfig(configPath);
  const databaseUrl = process.env.DATABASE_URL;
  const runtime = await createRuntime({
    loaded,
    ...(databaseUrl ? { databaseUrl } : {}),
    autoSchema: autoSchemaFromEnv()
  });

  try {
    const result = await runtime.pipeline.run(raw);
    if (result.status === "failed") {
      process.stderr.write(`error: ${result.message}\n`);
      return 1;
    }
    process.stdout.write(`${JSON.stringify({ run_id: result.runId, manifest_path: result.manifestPath }, null, 2)}\n`);
    return 0;
  } catch (err) {
    if (err instanceof ValidationError) {
      for (const issue of err.issues) process.stderr.write(`error: invalid parameter ${issue.parameter}: ${issue.reason}\n`);
      return 2;
    }
    process.stderr.write(`error: ${describeError(err)}\n`);
    return 1;
  } finally {
    await runtime.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
