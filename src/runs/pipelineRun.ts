import type { ArtifactService } from "../artifacts/artifactService.js";
import { runArtifactRef, type ArtifactRecord } from "../core/artifact.js";
import type { ReferenceVersion } from "../core/genome.js";
import type { Sha256 } from "../core/hashing.js";
import { newAttemptId, type RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { StageRunRecord } from "../core/run.js";
import type { GraphListener, StageOutcome } from "../graph/types.js";
import type { PostgresStore } from "../store/postgresStore.js";

export const RUN_LOG_STAGE = "run";

/**
 * Lifecycle of one pipeline run in the ledger. Every event is kept as a JSON
 * line and written out as the run's log artifact when the run finishes.
 */
export class PipelineRun implements GraphListener {
  readonly runId: RunId;
  private readonly logLines: string[] = [];
  private readonly startedAt = new Map<string, string>();

  constructor(
    private readonly deps: {
      store: PostgresStore;
      artifacts: ArtifactService;
    },
    private readonly info: {
      runId: RunId;
      referenceVersion: ReferenceVersion;
      paramsHash: Sha256;
      configHash: Sha256;
      params: JsonObject;
      environment?: JsonObject;
    }
  ) {
    this.runId = info.runId;
  }

  async start(): Promise<void> {
    await this.deps.store.createRun({
      runId: this.runId,
      referenceVersion: this.info.referenceVersion,
      paramsHash: this.info.paramsHash,
      configHash: this.info.configHash,
      params: this.info.params
    });
    await this.event("run.started", `reference=${this.info.referenceVersion}`, {
      params_hash: this.info.paramsHash,
      config_hash: this.info.configHash,
      environment: this.info.environment ?? null
    });
  }

  async event(kind: string, message: string, data: JsonObject | null): Promise<void> {
    const line = JSON.stringify({ ts: new Date().toISOString(), kind, message, data });
    this.logLines.push(line);
    await this.deps.store.addRunEvent(this.runId, kind, message, data);
  }

  async stageStarted(stage: string): Promise<void> {
    const now = new Date().toISOString();
    this.startedAt.set(stage, now);
    await this.deps.store.upsertStageRun({
      runId: this.runId,
      stageName: stage,
      status: "running",
      cached: false,
      fallback: null,
      error: null,
      startedAt: now,
      finishedAt: null
    });
    await this.event("stage.started", stage, null);
  }

  async stageFinished(outcome: StageOutcome): Promise<void> {
    const record: StageRunRecord = {
      runId: this.runId,
      stageName: outcome.stage,
      status: outcome.status,
      cached: outcome.status === "succeeded" && outcome.cached,
      fallback: outcome.status === "succeeded" && outcome.fallback ? { kind: outcome.fallback.kind, reason: outcome.fallback.reason } : null,
      error: null,
      startedAt: this.startedAt.get(outcome.stage) ?? null,
      finishedAt: new Date().toISOString()
    };

    if (outcome.status === "succeeded") {
      await this.deps.store.upsertStageRun(record);
      const data: JsonObject = { cached: outcome.cached };
      if (outcome.fallback) data.fallback = { kind: outcome.fallback.kind, reason: outcome.fallback.reason };
      await this.event("stage.succeeded", outcome.stage, data);
      return;
    }

    if (outcome.status === "failed") {
      await this.deps.store.upsertStageRun({ ...record, error: outcome.message });
      await this.event("stage.failed", `${outcome.stage}: ${outcome.message}`, { error: outcome.message });
      return;
    }

    const reason = `skipped: upstream stage ${outcome.blockedBy} failed`;
    await this.deps.store.upsertStageRun({ ...record, error: reason });
    await this.event("stage.skipped", outcome.stage, { blocked_by: outcome.blockedBy });
  }

  async finishSuccess(result: JsonObject, summary: string): Promise<JsonObject> {
    return this.finish("succeeded", null, summary, result);
  }

  async finishFailure(errorMessage: string): Promise<JsonObject> {
    return this.finish("failed", errorMessage, `failed: ${errorMessage}`, null);
  }

  private async finish(status: "succeeded" | "failed", error: string | null, finalMessage: string, result: JsonObject | null): Promise<JsonObject> {
    await this.event(`run.${status}`, finalMessage, error ? { error } : null);

    const log = await this.writeLog();
    const resultWithProvenance: JsonObject = {
      ...(result ?? {}),
      run_id: this.runId,
      status,
      log_path: log.path
    };

    await this.deps.store.updateRun(this.runId, {
      status,
      finishedAt: new Date().toISOString(),
      error,
      resultJson: resultWithProvenance
    });
    return resultWithProvenance;
  }

  private async writeLog(): Promise<ArtifactRecord> {
    // resumed runs keep one log per attempt
    const output = `log-${newAttemptId()}`;
    return this.deps.artifacts.put(
      runArtifactRef(this.runId, RUN_LOG_STAGE, output),
      { kind: "text", text: this.logLines.join("\n") + "\n" },
      { fileName: "run.log", type: "LOG" }
    );
  }
}
