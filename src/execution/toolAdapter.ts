import { constants as fsConstants, promises as fs, type Stats } from "fs";
import path from "path";
import type { PipelineConfig, ToolCommandConfig } from "../config/pipelineConfig.js";
import { ToolConfigurationError, ToolFailure, describeError } from "../core/errors.js";
import type { ExecutionResult, ExecutionSpec, RunnerBackends } from "./backends/types.js";
import type { ConcurrencyLimiter } from "./limiter.js";
import type { StageWorkspace } from "./workspace.js";

export type ToolParamValue = string | number | readonly string[];

export interface RenderContext {
  inputs: Record<string, string>;
  outputs: Record<string, string>;
  params: Record<string, ToolParamValue>;
}

const PLACEHOLDER_RE = /\{(in|out|param)\.([A-Za-z0-9_]+)\}/g;
const WHOLE_PLACEHOLDER_RE = /^\{(in|out|param)\.([A-Za-z0-9_]+)\}$/;

function lookup(tool: string, ctx: RenderContext, ns: string, name: string): ToolParamValue {
  const table = ns === "in" ? ctx.inputs : ns === "out" ? ctx.outputs : ctx.params;
  const value = table[name];
  if (value === undefined) throw new ToolConfigurationError(tool, `template references unknown placeholder {${ns}.${name}}`);
  return value;
}

/**
 * Substitutes `{in.x}`, `{out.x}` and `{param.x}` in an argv template. A
 * token that is exactly one list-valued placeholder expands to one argument
 * per element; a list inside a larger token is a configuration error.
 */
export function renderCommand(tool: string, argv: readonly string[], ctx: RenderContext): string[] {
  const rendered: string[] = [];
  for (const token of argv) {
    const whole = WHOLE_PLACEHOLDER_RE.exec(token);
    if (whole) {
      const value = lookup(tool, ctx, whole[1] ?? "", whole[2] ?? "");
      if (typeof value === "string" || typeof value === "number") rendered.push(String(value));
      else rendered.push(...value);
      continue;
    }
    rendered.push(
      token.replace(PLACEHOLDER_RE, (_m, ns: string, name: string) => {
        const value = lookup(tool, ctx, ns, name);
        if (typeof value === "string" || typeof value === "number") return String(value);
        throw new ToolConfigurationError(tool, `list placeholder {${ns}.${name}} must be a whole argument`);
      })
    );
  }
  return rendered;
}

export interface ToolInvocation {
  tool: string;
  /** Input name to host file path. */
  inputs: Record<string, string>;
  /** Output name to file name expected in the workspace `out/` directory. */
  outputs: Record<string, string>;
  params?: Record<string, ToolParamValue>;
  workspace: StageWorkspace;
}

export interface ToolOutcome {
  tool: string;
  backend: ExecutionSpec["kind"];
  argv: string[];
  /** Output name to host file path. */
  outputs: Record<string, string>;
  exitCode: number;
  outputTail: string[];
  startedAt: string;
  finishedAt: string;
}

const CONTAINER_WORKDIR = "/work";

function isErrnoCode(err: unknown, ...codes: string[]): boolean {
  return err instanceof Error && "code" in err && typeof err.code === "string" && codes.includes(err.code);
}

/**
 * Each attempt works on private copies of its inputs; a tool that writes to
 * an input path changes only its own copy.
 */
async function stageInput(src: string, dest: string): Promise<void> {
  await fs.copyFile(src, dest, fsConstants.COPYFILE_FICLONE);
}

type OutputState = "file" | "missing" | "symlink" | "irregular";

async function outputState(p: string): Promise<OutputState> {
  let st: Stats;
  try {
    st = await fs.lstat(p);
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) return "missing";
    throw err;
  }
  if (st.isSymbolicLink()) return "symlink";
  return st.isFile() ? "file" : "irregular";
}

function failureReason(result: ExecutionResult, timeoutSeconds: number): string | null {
  if (result.timedOut) return `timed out after ${timeoutSeconds}s`;
  if (result.signal) return `was killed by signal ${result.signal}`;
  if (result.exitCode !== 0) return `exited with code ${String(result.exitCode)}`;
  return null;
}

/**
 * Runs configured external tools. The adapter renders the command, stages
 * inputs into an isolated workspace, runs the command through the tool's
 * backend under the shared limiter, and checks the declared outputs. It
 * knows nothing about what a tool computes.
 */
export class ToolAdapter {
  constructor(
    private readonly deps: {
      config: PipelineConfig;
      backends: RunnerBackends;
      limiter: ConcurrencyLimiter;
    }
  ) {}

  has(tool: string): boolean {
    return Object.hasOwn(this.deps.config.tools, tool);
  }

  commandOf(tool: string): ToolCommandConfig {
    const command = this.deps.config.tools[tool];
    if (!command) throw new ToolConfigurationError(tool, "no command configured");
    return command;
  }

  assertConfigured(tools: readonly string[]): void {
    const missing = tools.filter((t) => !this.has(t));
    if (missing.length) {
      throw new ToolConfigurationError(missing.join(", "), "no command configured in pipeline config");
    }
  }

  async invoke(inv: ToolInvocation): Promise<ToolOutcome> {
    const command = this.commandOf(inv.tool);
    const backend = command.backend ?? this.deps.config.runtime.default_backend;
    const ws = inv.workspace;

    if (command.stdout !== undefined && !Object.hasOwn(inv.outputs, command.stdout)) {
      throw new ToolConfigurationError(inv.tool, `stdout is bound to undeclared output ${command.stdout}`);
    }

    const stagedInputs: Record<string, string> = {};
    const usedNames = new Set<string>();
    for (const [name, hostPath] of Object.entries(inv.inputs)) {
      // companion files (index, dictionary) are found by basename, so keep it
      let fileName = path.basename(hostPath);
      if (usedNames.has(fileName)) fileName = `${name}__${fileName}`;
      usedNames.add(fileName);
      const staged = ws.inPath(fileName);
      await stageInput(hostPath, staged);
      stagedInputs[name] = staged;
    }

    const hostOutputs: Record<string, string> = {};
    for (const [name, fileName] of Object.entries(inv.outputs)) {
      hostOutputs[name] = ws.outPath(fileName);
    }

    const params: Record<string, ToolParamValue> = { ...(inv.params ?? {}) };
    if (this.deps.config.paths.scripts_dir && params.scripts_dir === undefined) {
      params.scripts_dir = this.deps.config.paths.scripts_dir;
    }

    const inContainer = backend === "docker";
    const visible = (hostPath: string) =>
      inContainer ? path.posix.join(CONTAINER_WORKDIR, path.relative(ws.rootDir, hostPath).split(path.sep).join("/")) : hostPath;

    const argv = renderCommand(inv.tool, command.argv, {
      inputs: Object.fromEntries(Object.entries(stagedInputs).map(([k, v]) => [k, visible(v)])),
      outputs: Object.fromEntries(Object.entries(hostOutputs).map(([k, v]) => [k, visible(v)])),
      params
    });

    if (backend === "docker" && command.image === undefined) {
      throw new ToolConfigurationError(inv.tool, "docker backend needs an image");
    }
    const image = command.image ?? "";

    const stdoutPath = command.stdout !== undefined ? hostOutputs[command.stdout] : undefined;
    const spec: ExecutionSpec =
      backend === "docker"
        ? {
            kind: "docker",
            image,
            argv,
            workdir: CONTAINER_WORKDIR,
            mounts: [
              { hostPath: ws.rootDir, containerPath: CONTAINER_WORKDIR, readOnly: false },
              ...(command.mounts ?? []).map((m) => ({ hostPath: m.host_path, containerPath: m.container_path, readOnly: m.read_only }))
            ],
            ...(command.env ? { env: command.env } : {}),
            ...(typeof process.getuid === "function" && typeof process.getgid === "function"
              ? { user: `${process.getuid()}:${process.getgid()}` }
              : {}),
            containerName: `vf-${path.basename(ws.rootDir)}`,
            ...(stdoutPath ? { stdoutPath } : {})
          }
        : {
            kind: "local_process",
            argv,
            cwd: ws.rootDir,
            ...(command.env ? { env: command.env } : {}),
            ...(stdoutPath ? { stdoutPath } : {})
          };

    const limits = {
      timeoutSeconds: this.deps.config.runtime.tool_timeout_seconds,
      tailLines: this.deps.config.runtime.diagnostic_tail_lines
    };

    await fs.writeFile(ws.metaPath("command.json"), JSON.stringify({ tool: inv.tool, backend, argv }, null, 2) + "\n", "utf8");

    let result: ExecutionResult;
    try {
      result = await this.deps.limiter.run(() => this.execute(spec, limits));
    } catch (err) {
      throw new ToolFailure(inv.tool, null, `could not be started: ${describeError(err)}`, []);
    }

    await fs.writeFile(ws.metaPath("stderr.log"), result.stderr, "utf8");

    const reason = failureReason(result, limits.timeoutSeconds);
    if (reason !== null) throw new ToolFailure(inv.tool, result.exitCode, reason, result.outputTail);

    const bad: Record<Exclude<OutputState, "file">, string[]> = { missing: [], symlink: [], irregular: [] };
    for (const [name, hostPath] of Object.entries(hostOutputs)) {
      const state = await outputState(hostPath);
      if (state !== "file") bad[state].push(name);
    }
    if (bad.missing.length) {
      throw new ToolFailure(inv.tool, result.exitCode, `exited 0 without declared output(s): ${bad.missing.join(", ")}`, result.outputTail);
    }
    // a link into the workspace would dangle once the workspace is removed
    if (bad.symlink.length) {
      throw new ToolFailure(inv.tool, result.exitCode, `wrote output(s) as symlinks: ${bad.symlink.join(", ")}`, result.outputTail);
    }
    if (bad.irregular.length) {
      throw new ToolFailure(inv.tool, result.exitCode, `wrote output(s) that are not regular files: ${bad.irregular.join(", ")}`, result.outputTail);
    }

    return {
      tool: inv.tool,
      backend,
      argv,
      outputs: hostOutputs,
      exitCode: 0,
      outputTail: result.outputTail,
      startedAt: result.startedAt,
      finishedAt: result.finishedAt
    };
  }

  private execute(spec: ExecutionSpec, limits: { timeoutSeconds: number; tailLines: number }): Promise<ExecutionResult> {
    if (spec.kind === "docker") return this.deps.backends.docker.execute(spec, limits);
    return this.deps.backends.local_process.execute(spec, limits);
  }
}
