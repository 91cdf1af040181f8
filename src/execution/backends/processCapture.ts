import type { ChildProcessByStdio } from "child_process";
import { createWriteStream, type WriteStream } from "fs";
import { finished } from "stream/promises";
import type { Readable } from "stream";
import type { ExecutionLimits, ExecutionResult } from "./types.js";

const MAX_CAPTURE_BYTES = 1024 * 1024;

interface CaptureState {
  chunks: Buffer[];
  bytes: number;
  truncated: boolean;
}

function appendLimited(state: CaptureState, chunk: Buffer): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > MAX_CAPTURE_BYTES) {
    const keep = Math.max(0, MAX_CAPTURE_BYTES - state.bytes);
    if (keep > 0) state.chunks.push(chunk.subarray(0, keep));
    state.bytes = MAX_CAPTURE_BYTES;
    state.truncated = true;
    return;
  }
  state.chunks.push(chunk);
  state.bytes = next;
}

function captured(state: CaptureState, label: string): string {
  return Buffer.concat(state.chunks).toString("utf8") + (state.truncated ? `\n[${label} truncated]\n` : "");
}

/** Keeps the last `limit` complete lines of a byte stream, plus the pending partial line. */
export class TailBuffer {
  private readonly lines: string[] = [];
  private partial = "";

  constructor(private readonly limit: number) {}

  push(text: string): void {
    const parts = (this.partial + text).split("\n");
    this.partial = parts.pop() ?? "";
    for (const line of parts) {
      this.lines.push(line.replace(/\r$/, ""));
      if (this.lines.length > this.limit) this.lines.shift();
    }
  }

  snapshot(): string[] {
    const out = this.partial ? [...this.lines, this.partial] : [...this.lines];
    return out.slice(-this.limit);
  }
}

export type CapturedChild = ChildProcessByStdio<null, Readable, Readable>;

/**
 * Collects output from a spawned child until it closes. `onTimeout` runs once
 * when the limit elapses; the child is then killed.
 */
export async function collectChild(
  child: CapturedChild,
  limits: ExecutionLimits,
  opts: { stdoutPath?: string; onTimeout?: () => void }
): Promise<ExecutionResult> {
  const startedAt = new Date().toISOString();
  const stdout: CaptureState = { chunks: [], bytes: 0, truncated: false };
  const stderr: CaptureState = { chunks: [], bytes: 0, truncated: false };
  const tail = new TailBuffer(limits.tailLines);

  let sink: WriteStream | null = null;
  if (opts.stdoutPath) {
    sink = createWriteStream(opts.stdoutPath);
    child.stdout.pipe(sink);
  } else {
    child.stdout.on("data", (chunk: Buffer) => {
      appendLimited(stdout, chunk);
      tail.push(chunk.toString("utf8"));
    });
  }
  child.stderr.on("data", (chunk: Buffer) => {
    appendLimited(stderr, chunk);
    tail.push(chunk.toString("utf8"));
  });

  let timedOut = false;
  const timeoutMs = Math.max(0, Math.floor(limits.timeoutSeconds * 1000));
  const timeout =
    timeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          opts.onTimeout?.();
          child.kill("SIGKILL");
        }, timeoutMs)
      : null;

  const { code, signal } = await new Promise<{ code: number | null; signal: string | null }>((resolve, reject) => {
    child.on("error", reject);
    child.on("close", (c: number | null, s: NodeJS.Signals | null) => resolve({ code: c, signal: s }));
  }).finally(() => {
    if (timeout) clearTimeout(timeout);
  });

  if (sink) await finished(sink);

  return {
    exitCode: code,
    signal,
    timedOut,
    stdout: captured(stdout, "stdout"),
    stderr: captured(stderr, "stderr"),
    outputTail: tail.snapshot(),
    startedAt,
    finishedAt: new Date().toISOString()
  };
}
