import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { fingerprintOf, type Sha256 } from "../core/hashing.js";

const zToolName = z.string().regex(/^[a-z][a-z0-9_]*$/, "tool names are snake_case");

export const zToolCommand = z
  .object({
    argv: z.array(z.string().min(1)).min(1),
    backend: z.enum(["local_process", "docker"]).optional(),
    image: z.string().min(1).optional(),
    env: z.record(z.string(), z.string()).optional(),
    stdout: z.string().min(1).optional(),
    mounts: z
      .array(z.object({ host_path: z.string().min(1), container_path: z.string().min(1), read_only: z.boolean().default(true) }))
      .optional()
  })
  .refine((t) => t.backend !== "docker" || typeof t.image === "string", {
    message: "docker tools must declare an image",
    path: ["image"]
  });

export const zPipelineConfig = z.object({
  version: z.literal(1),
  runtime: z
    .object({
      max_concurrency: z.number().int().min(1).max(256).default(4),
      tool_timeout_seconds: z.number().int().min(0).default(0),
      diagnostic_tail_lines: z.number().int().min(1).max(10_000).default(40),
      default_backend: z.enum(["local_process", "docker"]).default("local_process")
    })
    .prefault({}),
  paths: z.object({
    work_dir: z.string().min(1),
    results_dir: z.string().min(1),
    scripts_dir: z.string().min(1).optional()
  }),
  reference: z.object({
    sources: z.object({ hg19: z.string().min(1), hg38: z.string().min(1) }),
    lock_poll_ms: z.number().int().min(10).default(2000),
    lock_stale_seconds: z.number().int().min(1).default(6 * 60 * 60)
  }),
  chromosome_map: z.string().min(1),
  tools: z.record(zToolName, zToolCommand)
});

export type PipelineConfig = z.output<typeof zPipelineConfig>;
export type ToolCommandConfig = z.output<typeof zToolCommand>;

export interface LoadedPipelineConfig {
  config: PipelineConfig;
  configHash: Sha256;
  sourcePath: string | null;
}

function expandEnvToken(value: string): string {
  return value.replace(/\$\{([A-Z0-9_]+)(?::-([^}]*))?\}/g, (_match, name: string, fallback: string | undefined) => {
    const v = process.env[name]?.trim();
    if (v) return v;
    if (fallback !== undefined) return fallback;
    throw new Error(`environment variable ${name} is referenced by the pipeline config but not set`);
  });
}

function resolveAgainst(baseDir: string, p: string): string {
  return path.isAbsolute(p) ? p : path.resolve(baseDir, p);
}

/**
 * Validates a parsed config object. Relative paths in `paths` and
 * `chromosome_map` resolve against `baseDir` (the config file's directory's
 * parent when loaded from disk).
 */
export function parsePipelineConfig(raw: unknown, baseDir: string, sourcePath: string | null = null): LoadedPipelineConfig {
  const parsed = zPipelineConfig.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.map(String).join(".") || "(root)"}: ${i.message}`);
    throw new Error(`invalid pipeline config${sourcePath ? ` at ${sourcePath}` : ""}: ${details.join("; ")}`);
  }

  const cfg = parsed.data;
  const config: PipelineConfig = {
    ...cfg,
    paths: {
      work_dir: resolveAgainst(baseDir, expandEnvToken(cfg.paths.work_dir)),
      results_dir: resolveAgainst(baseDir, expandEnvToken(cfg.paths.results_dir)),
      ...(cfg.paths.scripts_dir ? { scripts_dir: resolveAgainst(baseDir, expandEnvToken(cfg.paths.scripts_dir)) } : {})
    },
    chromosome_map: resolveAgainst(baseDir, expandEnvToken(cfg.chromosome_map))
  };

  return { config, configHash: fingerprintOf(config), sourcePath };
}

export async function loadPipelineConfig(filePath: string): Promise<LoadedPipelineConfig> {
  const absolute = path.resolve(filePath);
  const raw = await fs.readFile(absolute, "utf8");
  const parsed: unknown = YAML.parse(raw);
  return parsePipelineConfig(parsed, path.dirname(path.dirname(absolute)), absolute);
}
