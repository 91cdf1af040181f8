import { ulid } from "ulid";

export type RunId = string;

const RUN_ID_RE = /^[A-Za-z0-9][A-Za-z0-9_.-]{0,127}$/;

export function newRunId(): RunId {
  return `run_${ulid()}`;
}

export function isValidRunId(value: string): boolean {
  return RUN_ID_RE.test(value);
}

export function newAttemptId(): string {
  return ulid().toLowerCase();
}
