import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { checkParams, paramsSnapshot } from "../config/params.js";
import { PipelineError, ValidationError } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";
import type { PipelineRuntime } from "../runtime.js";
import type { ArtifactRow } from "../store/postgresStore.js";
import {
  zParamsValidateInput,
  zParamsValidateOutput,
  zPipelineRunInput,
  zPipelineRunOutput,
  zReferenceGetOrBuildInput,
  zReferenceGetOrBuildOutput,
  zRunGetInput,
  zRunGetOutput
} from "./toolSchemas.js";

export type GatewayDeps = Pick<PipelineRuntime, "loaded" | "store" | "artifacts" | "references" | "pipeline">;

function toArtifactSummary(a: ArtifactRow): JsonObject {
  return {
    artifact_key: a.artifactKey,
    stage: a.stageName,
    output: a.outputName,
    shard_key: a.shardKey,
    type: a.type,
    path: a.path,
    size_bytes: a.sizeBytes.toString(),
    checksum_sha256: a.checksumSha256,
    created_at: a.createdAt
  };
}

function toMcpError(e: unknown): unknown {
  if (e instanceof McpError) return e;
  if (e instanceof ValidationError) {
    return new McpError(ErrorCode.InvalidParams, `invalid parameter ${e.parameter}: ${e.reason}`, { issues: e.issues });
  }
  if (e instanceof PipelineError) return new McpError(ErrorCode.InternalError, e.message, { code: e.code });
  return e;
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "variantflow-gateway",
    version: "0.1.0"
  });

  mcp.registerTool(
    "params_validate",
    {
      description: "Check pipeline parameters without running anything. Reports every invalid parameter.",
      inputSchema: zParamsValidateInput,
      outputSchema: zParamsValidateOutput
    },
    async (args) => {
      const { issues, params } = await checkParams(args, deps.loaded.config);
      const structured: JsonObject = {
        valid: params !== null,
        issues: issues.map((i) => ({ parameter: i.parameter, reason: i.reason })),
        resolved: params ? paramsSnapshot(params) : null
      };
      const text = params
        ? `parameters valid (run ${params.runId})`
        : issues.map((i) => `invalid parameter ${i.parameter}: ${i.reason}`).join("\n");
      return {
        content: [{ type: "text", text }],
        structuredContent: structured
      };
    }
  );

  mcp.registerTool(
    "reference_get_or_build",
    {
      description: "Return the cached reference build for a version, building it once if it is missing.",
      inputSchema: zReferenceGetOrBuildInput,
      outputSchema: zReferenceGetOrBuildOutput
    },
    async (args) => {
      try {
        const build = await deps.references.getOrBuild(args.reference_version);
        const file = (f: (typeof build.files)["fasta"]): JsonObject => ({
          path: f.path,
          checksum_sha256: f.checksumSha256,
          size_bytes: f.sizeBytes.toString()
        });
        const structured: JsonObject = {
          reference_version: build.referenceVersion,
          directory: build.directory,
          reused: build.reused,
          built_at: build.builtAt,
          files: { fasta: file(build.files.fasta), fai: file(build.files.fai), dict: file(build.files.dict) }
        };
        return {
          content: [{ type: "text", text: `${build.reused ? "Reused" : "Built"} reference ${build.referenceVersion} at ${build.directory}` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "pipeline_run",
    {
      description: "Run the variant pipeline end to end and publish results to the output directory.",
      inputSchema: zPipelineRunInput,
      outputSchema: zPipelineRunOutput
    },
    async (args) => {
      try {
        const result = await deps.pipeline.run(args);
        const stages = Array.isArray(result.result.stages) ? result.result.stages : [];
        if (result.status === "succeeded") {
          const structured: JsonObject = {
            run_id: result.runId,
            status: result.status,
            output_directory: result.outputDirectory,
            manifest_path: result.manifestPath,
            failed_stage: null,
            error: null,
            stages
          };
          return {
            content: [{ type: "text", text: `Run ${result.runId} published to ${result.outputDirectory}` }],
            structuredContent: structured
          };
        }
        const structured: JsonObject = {
          run_id: result.runId,
          status: result.status,
          output_directory: null,
          manifest_path: null,
          failed_stage: result.failedStage,
          error: result.message,
          stages
        };
        return {
          isError: true,
          content: [{ type: "text", text: `error: ${result.message}` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "run_get",
    {
      description: "Fetch a pipeline run with its stage states, artifacts and events.",
      inputSchema: zRunGetInput,
      outputSchema: zRunGetOutput
    },
    async (args) => {
      const run = await deps.store.getRun(args.run_id);
      if (!run) throw new McpError(ErrorCode.InvalidParams, `unknown run_id: ${args.run_id}`);

      const [stages, artifacts, events] = await Promise.all([
        deps.store.listStageRuns(run.runId),
        deps.artifacts.listRunArtifacts(run.runId),
        deps.store.listRunEvents(run.runId)
      ]);

      const structured: JsonObject = {
        run: {
          run_id: run.runId,
          reference_version: run.referenceVersion,
          status: run.status,
          params_hash: run.paramsHash,
          config_hash: run.configHash,
          params: run.params,
          created_at: run.createdAt,
          started_at: run.startedAt,
          finished_at: run.finishedAt,
          error: run.error,
          result: run.resultJson
        },
        stages: stages.map((s) => ({
          stage: s.stageName,
          status: s.status,
          cached: s.cached,
          fallback: s.fallback,
          error: s.error,
          started_at: s.startedAt,
          finished_at: s.finishedAt
        })),
        artifacts: artifacts.map(toArtifactSummary),
        events: events.map((e) => ({ ts: e.ts, kind: e.kind, message: e.message, data: e.data }))
      };
      return {
        content: [{ type: "text", text: `Run ${run.runId}: ${run.status}` }],
        structuredContent: structured
      };
    }
  );

  return mcp;
}
