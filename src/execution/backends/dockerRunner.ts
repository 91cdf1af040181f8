import { spawn } from "child_process";
import { collectChild } from "./processCapture.js";
import type { DockerSpec, ExecutionLimits, ExecutionResult, RunnerBackend } from "./types.js";

export function dockerArgs(spec: DockerSpec): string[] {
  const args: string[] = ["run", "--rm"];

  if (spec.containerName) {
    args.push("--name", spec.containerName);
  }

  args.push("--network", spec.network ?? "none");

  for (const [k, v] of Object.entries(spec.env ?? {})) {
    args.push("--env", `${k}=${v}`);
  }

  for (const m of spec.mounts) {
    const mode = m.readOnly ? "ro" : "rw";
    args.push("--volume", `${m.hostPath}:${m.containerPath}:${mode}`);
  }

  if (spec.user) {
    args.push("--user", spec.user);
  }

  args.push("--workdir", spec.workdir);
  args.push(spec.image, ...spec.argv);
  return args;
}

export class DockerRunner implements RunnerBackend<"docker"> {
  readonly kind = "docker" as const;

  async execute(spec: DockerSpec, limits: ExecutionLimits): Promise<ExecutionResult> {
    if (!spec.image) throw new Error("docker image must be non-empty");
    if (!spec.argv.length) throw new Error("docker argv must be non-empty");

    const child = spawn("docker", dockerArgs(spec), {
      stdio: ["ignore", "pipe", "pipe"] as const
    });

    const containerName = spec.containerName;
    return collectChild(child, limits, {
      ...(spec.stdoutPath ? { stdoutPath: spec.stdoutPath } : {}),
      onTimeout: () => {
        // killing the client does not stop the container
        if (!containerName) return;
        const rm = spawn("docker", ["rm", "-f", containerName], { stdio: "ignore" });
        rm.unref();
      }
    });
  }
}
