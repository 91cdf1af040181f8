import type { Kysely, Selectable } from "kysely";
import type { ArtifactRecord, ArtifactType } from "../core/artifact.js";
import { artifactKey, scopeKey } from "../core/artifact.js";
import { isReferenceVersion, type ReferenceVersion } from "../core/genome.js";
import type { Sha256 } from "../core/hashing.js";
import type { RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { RunRecord, RunStatus, StageRunRecord, StageRunStatus } from "../core/run.js";
import type { DB } from "../db/types.js";

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date(String(value)).toISOString();
}

function toIsoOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toIso(value);
}

function toSha256(value: string): Sha256 {
  if (!value.startsWith("sha256:")) throw new Error(`not a sha256 digest: ${value}`);
  return `sha256:${value.slice("sha256:".length)}`;
}

export interface ArtifactRow {
  artifactKey: string;
  scope: string;
  stageName: string;
  outputName: string;
  shardKey: string | null;
  type: ArtifactType;
  path: string;
  sizeBytes: bigint;
  checksumSha256: Sha256;
  fingerprint: Sha256 | null;
  createdAt: string;
}

export interface RunEventRow {
  ts: string;
  kind: string;
  message: string | null;
  data: JsonObject | null;
}

export interface ReferenceBuildRow {
  referenceVersion: ReferenceVersion;
  status: "building" | "ready" | "failed";
  directory: string | null;
  manifest: JsonObject | null;
  error: string | null;
  updatedAt: string;
}

/** Run ledger: runs, stage transitions, artifacts, events and reference builds. */
export class PostgresStore {
  constructor(private readonly db: Kysely<DB>) {}

  async createRun(input: {
    runId: RunId;
    referenceVersion: ReferenceVersion;
    paramsHash: Sha256;
    configHash: Sha256;
    params: JsonObject;
  }): Promise<RunRecord> {
    const now = new Date().toISOString();
    // Re-using a run id resumes it.
    await this.db
      .insertInto("runs")
      .values({
        run_id: input.runId,
        reference_version: input.referenceVersion,
        status: "running",
        params_hash: input.paramsHash,
        config_hash: input.configHash,
        params: input.params,
        started_at: now
      })
      .onConflict((oc) =>
        oc.column("run_id").doUpdateSet({
          status: "running",
          params_hash: input.paramsHash,
          config_hash: input.configHash,
          params: input.params,
          started_at: now,
          finished_at: null,
          error: null,
          result_json: null
        })
      )
      .execute();

    const row = await this.db.selectFrom("runs").selectAll().where("run_id", "=", input.runId).executeTakeFirstOrThrow();
    return this.mapRun(row);
  }

  async getRun(runId: RunId): Promise<RunRecord | null> {
    const row = await this.db.selectFrom("runs").selectAll().where("run_id", "=", runId).executeTakeFirst();
    return row ? this.mapRun(row) : null;
  }

  async updateRun(
    runId: RunId,
    patch: Partial<Pick<RunRecord, "status" | "finishedAt" | "error" | "resultJson">>
  ): Promise<void> {
    const updates: { status?: string; finished_at?: string | null; error?: string | null; result_json?: JsonObject | null } = {};
    if (patch.status) updates.status = patch.status;
    if (patch.finishedAt !== undefined) updates.finished_at = patch.finishedAt;
    if (patch.error !== undefined) updates.error = patch.error;
    if (patch.resultJson !== undefined) updates.result_json = patch.resultJson;

    if (Object.keys(updates).length === 0) return;

    await this.db.updateTable("runs").set(updates).where("run_id", "=", runId).execute();
  }

  async upsertStageRun(record: StageRunRecord): Promise<void> {
    const values = {
      status: record.status,
      cached: record.cached,
      fallback: record.fallback,
      error: record.error,
      started_at: record.startedAt,
      finished_at: record.finishedAt
    };
    await this.db
      .insertInto("stage_runs")
      .values({ run_id: record.runId, stage_name: record.stageName, ...values })
      .onConflict((oc) => oc.columns(["run_id", "stage_name"]).doUpdateSet(values))
      .execute();
  }

  async listStageRuns(runId: RunId): Promise<StageRunRecord[]> {
    const rows = await this.db
      .selectFrom("stage_runs")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("stage_name")
      .execute();
    return rows.map((r) => ({
      runId: r.run_id,
      stageName: r.stage_name,
      status: r.status as StageRunStatus,
      cached: r.cached,
      fallback: r.fallback,
      error: r.error,
      startedAt: toIsoOrNull(r.started_at),
      finishedAt: toIsoOrNull(r.finished_at)
    }));
  }

  async recordArtifact(record: ArtifactRecord): Promise<void> {
    const key = artifactKey(record.ref);
    await this.db
      .insertInto("artifacts")
      .values({
        artifact_key: key,
        scope: scopeKey(record.ref.scope),
        stage_name: record.ref.stage,
        output_name: record.ref.output,
        shard_key: record.ref.shardKey,
        type: record.type,
        path: record.path,
        size_bytes: record.sizeBytes.toString(),
        checksum_sha256: record.checksumSha256,
        fingerprint: record.fingerprint
      })
      .onConflict((oc) => oc.column("artifact_key").doNothing())
      .execute();
  }

  async listArtifacts(scope: string): Promise<ArtifactRow[]> {
    const rows = await this.db
      .selectFrom("artifacts")
      .selectAll()
      .where("scope", "=", scope)
      .orderBy("artifact_key")
      .execute();
    return rows.map((r) => this.mapArtifact(r));
  }

  async addRunEvent(runId: RunId, kind: string, message: string | null, data: JsonObject | null): Promise<void> {
    await this.db.insertInto("run_events").values({ run_id: runId, kind, message, data }).execute();
  }

  async listRunEvents(runId: RunId): Promise<RunEventRow[]> {
    const rows = await this.db
      .selectFrom("run_events")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("event_id")
      .execute();
    return rows.map((r) => ({ ts: toIso(r.ts), kind: r.kind, message: r.message, data: r.data }));
  }

  async upsertReferenceBuild(input: {
    referenceVersion: ReferenceVersion;
    status: ReferenceBuildRow["status"];
    directory: string | null;
    manifest: JsonObject | null;
    error: string | null;
  }): Promise<void> {
    const values = {
      status: input.status,
      directory: input.directory,
      manifest: input.manifest,
      error: input.error,
      updated_at: new Date().toISOString()
    };
    await this.db
      .insertInto("reference_builds")
      .values({ reference_version: input.referenceVersion, ...values })
      .onConflict((oc) => oc.column("reference_version").doUpdateSet(values))
      .execute();
  }

  async getReferenceBuild(version: ReferenceVersion): Promise<ReferenceBuildRow | null> {
    const row = await this.db
      .selectFrom("reference_builds")
      .selectAll()
      .where("reference_version", "=", version)
      .executeTakeFirst();
    if (!row) return null;
    if (!isReferenceVersion(row.reference_version)) throw new Error(`unknown reference version in ledger: ${row.reference_version}`);
    return {
      referenceVersion: row.reference_version,
      status: row.status as ReferenceBuildRow["status"],
      directory: row.directory,
      manifest: row.manifest,
      error: row.error,
      updatedAt: toIso(row.updated_at)
    };
  }

  private mapArtifact(row: Selectable<DB["artifacts"]>): ArtifactRow {
    return {
      artifactKey: row.artifact_key,
      scope: row.scope,
      stageName: row.stage_name,
      outputName: row.output_name,
      shardKey: row.shard_key,
      type: row.type as ArtifactType,
      path: row.path,
      sizeBytes: BigInt(row.size_bytes),
      checksumSha256: toSha256(row.checksum_sha256),
      fingerprint: row.fingerprint ? toSha256(row.fingerprint) : null,
      createdAt: toIso(row.created_at)
    };
  }

  private mapRun(row: Selectable<DB["runs"]>): RunRecord {
    if (!isReferenceVersion(row.reference_version)) throw new Error(`unknown reference version in ledger: ${row.reference_version}`);
    return {
      runId: row.run_id,
      referenceVersion: row.reference_version,
      status: row.status as RunStatus,
      paramsHash: toSha256(row.params_hash),
      configHash: toSha256(row.config_hash),
      params: row.params,
      createdAt: toIso(row.created_at),
      startedAt: toIsoOrNull(row.started_at),
      finishedAt: toIsoOrNull(row.finished_at),
      error: row.error,
      resultJson: row.result_json
    };
  }
}
