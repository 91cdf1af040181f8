import type { ColumnType, Generated, JSONColumnType } from "kysely";
import type { JsonObject } from "../core/json.js";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type Timestamp = ColumnType<Date | string, string | undefined, string>;
type NullableTimestamp = ColumnType<Date | string | null, string | null | undefined, string | null>;
type Json = JSONColumnType<JsonObject, JsonObject, JsonObject>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;

export interface RunsTable {
  run_id: string;
  reference_version: string;
  status: string;
  params_hash: string;
  config_hash: string;
  params: Json;
  created_at: Generated<Timestamp>;
  started_at: NullableTimestamp;
  finished_at: NullableTimestamp;
  error: OptionalNullable<string>;
  result_json: JsonNullable;
}

export interface StageRunsTable {
  run_id: string;
  stage_name: string;
  status: string;
  cached: ColumnType<boolean, boolean | undefined, boolean>;
  fallback: JsonNullable;
  error: OptionalNullable<string>;
  started_at: NullableTimestamp;
  finished_at: NullableTimestamp;
}

export interface ArtifactsTable {
  artifact_key: string;
  scope: string;
  stage_name: string;
  output_name: string;
  shard_key: OptionalNullable<string>;
  type: string;
  path: string;
  size_bytes: ColumnType<string, string, string>; // pg returns bigint as string
  checksum_sha256: string;
  fingerprint: OptionalNullable<string>;
  created_at: Generated<Timestamp>;
}

export interface RunEventsTable {
  event_id: Generated<number>;
  run_id: string;
  ts: Generated<Timestamp>;
  kind: string;
  message: OptionalNullable<string>;
  data: JsonNullable;
}

export interface ReferenceBuildsTable {
  reference_version: string;
  status: string;
  directory: OptionalNullable<string>;
  manifest: JsonNullable;
  error: OptionalNullable<string>;
  updated_at: Timestamp;
}

export interface DB {
  runs: RunsTable;
  stage_runs: StageRunsTable;
  artifacts: ArtifactsTable;
  run_events: RunEventsTable;
  reference_builds: ReferenceBuildsTable;
}
