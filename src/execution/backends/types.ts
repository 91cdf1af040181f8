export interface ExecutionLimits {
  /** 0 disables the timeout. */
  timeoutSeconds: number;
  /** Lines of combined output kept for diagnostics. */
  tailLines: number;
}

export interface ExecutionResult {
  exitCode: number | null;
  signal: string | null;
  timedOut: boolean;
  /** Captured stdout, empty when stdout was redirected to a file. */
  stdout: string;
  stderr: string;
  /** Last lines of stdout and stderr interleaved in arrival order. */
  outputTail: string[];
  startedAt: string;
  finishedAt: string;
}

export interface LocalProcessSpec {
  kind: "local_process";
  argv: string[];
  cwd: string;
  env?: Record<string, string>;
  /** When set, stdout is streamed to this file instead of being captured. */
  stdoutPath?: string;
}

export interface DockerMount {
  hostPath: string;
  containerPath: string;
  readOnly: boolean;
}

export interface DockerSpec {
  kind: "docker";
  image: string;
  argv: string[];
  workdir: string;
  mounts: DockerMount[];
  env?: Record<string, string>;
  user?: string;
  network?: "none" | "bridge";
  containerName?: string;
  stdoutPath?: string;
}

export type ExecutionSpec = LocalProcessSpec | DockerSpec;

export interface RunnerBackend<K extends ExecutionSpec["kind"] = ExecutionSpec["kind"]> {
  kind: K;
  execute(spec: Extract<ExecutionSpec, { kind: K }>, limits: ExecutionLimits): Promise<ExecutionResult>;
}

export type RunnerBackends = { [K in ExecutionSpec["kind"]]: RunnerBackend<K> };
