import type { PipelineConfig } from "../config/pipelineConfig.js";
import type { JsonObject } from "../core/json.js";

export function envSnapshot(config: PipelineConfig): JsonObject {
  return {
    node: process.version,
    mode: process.env.DATABASE_URL ? "postgres" : "pg-mem",
    work_dir: config.paths.work_dir,
    max_concurrency: config.runtime.max_concurrency,
    default_backend: config.runtime.default_backend
  };
}
