import { spawn } from "child_process";
import { collectChild } from "./processCapture.js";
import type { ExecutionLimits, ExecutionResult, LocalProcessSpec, RunnerBackend } from "./types.js";

export class LocalProcessRunner implements RunnerBackend<"local_process"> {
  readonly kind = "local_process" as const;

  async execute(spec: LocalProcessSpec, limits: ExecutionLimits): Promise<ExecutionResult> {
    const [command, ...args] = spec.argv;
    if (!command) throw new Error("local_process argv must be non-empty");

    const child = spawn(command, args, {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      stdio: ["ignore", "pipe", "pipe"] as const
    });

    return collectChild(child, limits, { ...(spec.stdoutPath ? { stdoutPath: spec.stdoutPath } : {}) });
  }
}
