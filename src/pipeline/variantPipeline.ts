import path from "path";
import type { ArtifactService } from "../artifacts/artifactService.js";
import { paramsSnapshot, validateParams, type PipelineParams, type RawPipelineParams } from "../config/params.js";
import type { LoadedPipelineConfig } from "../config/pipelineConfig.js";
import { describeError } from "../core/errors.js";
import type { RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { ToolAdapter } from "../execution/toolAdapter.js";
import type { StageOutcome } from "../graph/types.js";
import type { ReferenceCache } from "../reference/referenceCache.js";
import { envSnapshot } from "../runs/envSnapshot.js";
import { PipelineRun } from "../runs/pipelineRun.js";
import { deriveParamsHash } from "../runs/runIdentity.js";
import type { ScatterGatherController } from "../scatter/scatterGather.js";
import type { PostgresStore } from "../store/postgresStore.js";
import { MANIFEST_FILE } from "./publish.js";
import { EXTERNAL, PIPELINE_TOOLS, buildPipelineGraph } from "./stages.js";
import type { PipelineArtifact } from "./values.js";

export type PipelineResult =
  | {
      status: "succeeded";
      runId: RunId;
      outputDirectory: string;
      manifestPath: string;
      outcomes: StageOutcome[];
      result: JsonObject;
    }
  | {
      status: "failed";
      runId: RunId;
      failedStage: string;
      error: unknown;
      /** `stage <name> failed: <cause>` */
      message: string;
      outcomes: StageOutcome[];
      result: JsonObject;
    };

function firstLine(text: string): string {
  return text.split("\n", 1)[0] ?? text;
}

export function summarizeOutcome(outcome: StageOutcome): JsonObject {
  if (outcome.status === "succeeded") {
    return {
      stage: outcome.stage,
      status: outcome.status,
      cached: outcome.cached,
      fallback: outcome.fallback ? { kind: outcome.fallback.kind, reason: outcome.fallback.reason } : null
    };
  }
  if (outcome.status === "failed") return { stage: outcome.stage, status: outcome.status, error: outcome.message };
  return { stage: outcome.stage, status: outcome.status, blocked_by: outcome.blockedBy };
}

/**
 * Validates parameters, then runs the variant pipeline graph for one run id
 * and records the run in the ledger. Parameter errors surface as
 * `ValidationError` before anything is recorded or executed.
 */
export class VariantPipeline {
  constructor(
    private readonly deps: {
      config: LoadedPipelineConfig;
      store: PostgresStore;
      artifacts: ArtifactService;
      tools: ToolAdapter;
      references: ReferenceCache;
      scatter: ScatterGatherController;
    }
  ) {}

  async validate(raw: RawPipelineParams): Promise<PipelineParams> {
    return validateParams(raw, this.deps.config.config);
  }

  async run(raw: RawPipelineParams): Promise<PipelineResult> {
    const params = await this.validate(raw);
    this.deps.tools.assertConfigured(PIPELINE_TOOLS);
    return this.execute(params);
  }

  async execute(params: PipelineParams): Promise<PipelineResult> {
    const snapshot = paramsSnapshot(params);
    const run = new PipelineRun(
      { store: this.deps.store, artifacts: this.deps.artifacts },
      {
        runId: params.runId,
        referenceVersion: params.referenceVersion,
        paramsHash: deriveParamsHash(snapshot),
        configHash: this.deps.config.configHash,
        params: snapshot,
        environment: envSnapshot(this.deps.config.config)
      }
    );
    await run.start();

    try {
      const graph = buildPipelineGraph({
        params,
        artifacts: this.deps.artifacts,
        tools: this.deps.tools,
        references: this.deps.references,
        scatter: this.deps.scatter,
        events: run
      });
      const externals = new Map<string, PipelineArtifact>([
        [EXTERNAL.inputVcf, { kind: "path", path: params.inputVcf }],
        [EXTERNAL.inputHpo, { kind: "path", path: params.inputHpo }],
        [EXTERNAL.chromosomeMap, { kind: "path", path: params.chromosomeMap }]
      ]);

      const report = await graph.run(params.runId, externals, run);
      const stages = report.outcomes.map(summarizeOutcome);

      if (report.status === "succeeded") {
        const manifestPath = path.join(params.outputDirectory, MANIFEST_FILE);
        const result = await run.finishSuccess(
          { output_directory: params.outputDirectory, manifest_path: manifestPath, stages },
          `published to ${params.outputDirectory}`
        );
        return { status: "succeeded", runId: params.runId, outputDirectory: params.outputDirectory, manifestPath, outcomes: report.outcomes, result };
      }

      const failure = report.failure ?? { stage: "(unknown)", error: null, message: "run failed" };
      const message = `stage ${failure.stage} failed: ${firstLine(failure.message)}`;
      const result = await run.finishFailure(message);
      return {
        status: "failed",
        runId: params.runId,
        failedStage: failure.stage,
        error: failure.error,
        message,
        outcomes: report.outcomes,
        result: { ...result, stages }
      };
    } catch (err) {
      await run.finishFailure(describeError(err));
      throw err;
    }
  }
}
