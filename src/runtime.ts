import type { Kysely } from "kysely";
import { ArtifactService } from "./artifacts/artifactService.js";
import { ArtifactStore } from "./artifacts/artifactStore.js";
import type { LoadedPipelineConfig } from "./config/pipelineConfig.js";
import { applySqlFile } from "./db/bootstrap.js";
import { createDb, createPool } from "./db/connection.js";
import type { DB } from "./db/types.js";
import { DockerRunner } from "./execution/backends/dockerRunner.js";
import { LocalProcessRunner } from "./execution/backends/localProcess.js";
import type { RunnerBackends } from "./execution/backends/types.js";
import { ConcurrencyLimiter } from "./execution/limiter.js";
import { ToolAdapter } from "./execution/toolAdapter.js";
import { VariantPipeline } from "./pipeline/variantPipeline.js";
import { ReferenceCache, type ReferenceBuilder } from "./reference/referenceCache.js";
import { ToolReferenceBuilder } from "./reference/toolReferenceBuilder.js";
import { ScatterGatherController } from "./scatter/scatterGather.js";
import { PostgresStore } from "./store/postgresStore.js";

export const DEFAULT_CONFIG_PATH = "config/pipeline.yaml";

export interface PipelineRuntime {
  loaded: LoadedPipelineConfig;
  db: Kysely<DB>;
  store: PostgresStore;
  artifactStore: ArtifactStore;
  artifacts: ArtifactService;
  tools: ToolAdapter;
  references: ReferenceCache;
  scatter: ScatterGatherController;
  pipeline: VariantPipeline;
  close(): Promise<void>;
}

export interface RuntimeOptions {
  loaded: LoadedPipelineConfig;
  /** Postgres when set, in-memory pg-mem otherwise. */
  databaseUrl?: string;
  /** Applies db/schema.sql at startup. Always on for pg-mem. */
  autoSchema?: boolean;
  backends?: Partial<RunnerBackends>;
  referenceBuilder?: ReferenceBuilder;
}

export function autoSchemaFromEnv(): boolean {
  return (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";
}

export async function createRuntime(opts: RuntimeOptions): Promise<PipelineRuntime> {
  const { config } = opts.loaded;
  const pool = createPool(opts.databaseUrl);
  if (!opts.databaseUrl || (opts.autoSchema ?? true)) {
    await applySqlFile(pool);
  }

  const db = createDb(pool);
  const store = new PostgresStore(db);
  const artifactStore = new ArtifactStore(config.paths.work_dir);
  const artifacts = new ArtifactService(store, artifactStore);
  const backends: RunnerBackends = {
    local_process: opts.backends?.local_process ?? new LocalProcessRunner(),
    docker: opts.backends?.docker ?? new DockerRunner()
  };
  const tools = new ToolAdapter({ config, backends, limiter: new ConcurrencyLimiter(config.runtime.max_concurrency) });
  const references = new ReferenceCache({
    rootDir: artifactStore.referencesRoot(),
    builder: opts.referenceBuilder ?? new ToolReferenceBuilder({ tools, sources: config.reference.sources }),
    ledger: store,
    lockPollMs: config.reference.lock_poll_ms,
    lockStaleSeconds: config.reference.lock_stale_seconds
  });
  const scatter = new ScatterGatherController(artifacts);
  const pipeline = new VariantPipeline({ config: opts.loaded, store, artifacts, tools, references, scatter });

  return {
    loaded: opts.loaded,
    db,
    store,
    artifactStore,
    artifacts,
    tools,
    references,
    scatter,
    pipeline,
    close: () => db.destroy()
  };
}
