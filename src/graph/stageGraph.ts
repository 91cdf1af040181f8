import { GraphCycleError, GraphValidationError, describeError } from "../core/errors.js";
import type { RunId } from "../core/ids.js";
import {
  artifactName,
  type ArtifactName,
  type GraphListener,
  type GraphRunReport,
  type StageContext,
  type StageDefinition,
  type StageOutcome
} from "./types.js";

/**
 * DAG of named stages. Edges are never declared: a stage depends on whichever
 * stage produces one of its input artifact names.
 */
export class StageGraph<T> {
  private readonly stages = new Map<string, StageDefinition<T>>();
  private readonly producers = new Map<ArtifactName, string>();
  private readonly externals = new Set<ArtifactName>();

  registerStage(def: StageDefinition<T>): this {
    if (this.stages.has(def.name)) throw new GraphValidationError([`duplicate stage name: ${def.name}`]);

    const produced = def.outputs.map((o) => artifactName(def.name, o));
    const problems: string[] = [];
    for (const name of produced) {
      const other = this.producers.get(name);
      if (other !== undefined) problems.push(`artifact ${name} is already produced by ${other}`);
      if (this.externals.has(name)) problems.push(`artifact ${name} is declared external`);
    }
    if (new Set(produced).size !== produced.length) problems.push(`stage ${def.name} declares an output twice`);
    if (problems.length) throw new GraphValidationError(problems);

    this.stages.set(def.name, def);
    for (const name of produced) this.producers.set(name, def.name);

    const cycle = this.findCycle();
    if (cycle) {
      this.stages.delete(def.name);
      for (const name of produced) this.producers.delete(name);
      throw new GraphCycleError(cycle);
    }
    return this;
  }

  declareExternal(name: ArtifactName): this {
    const producer = this.producers.get(name);
    if (producer !== undefined) throw new GraphValidationError([`artifact ${name} is produced by ${producer} and cannot be external`]);
    this.externals.add(name);
    return this;
  }

  stageNames(): string[] {
    return [...this.stages.keys()];
  }

  producerOf(name: ArtifactName): string | null {
    return this.producers.get(name) ?? null;
  }

  /**
   * Checks that every input has a producer or is external and returns the
   * stages in topological order (ties keep registration order).
   */
  validate(): string[] {
    const problems: string[] = [];
    for (const def of this.stages.values()) {
      for (const input of def.inputs) {
        if (!this.producers.has(input) && !this.externals.has(input)) {
          problems.push(`stage ${def.name} input ${input} has no producer`);
        }
      }
    }
    if (problems.length) throw new GraphValidationError(problems);

    const indegree = new Map<string, number>();
    const dependents = new Map<string, string[]>();
    for (const name of this.stages.keys()) {
      indegree.set(name, 0);
      dependents.set(name, []);
    }
    for (const def of this.stages.values()) {
      for (const dep of this.dependenciesOf(def)) {
        indegree.set(def.name, (indegree.get(def.name) ?? 0) + 1);
        dependents.get(dep)?.push(def.name);
      }
    }

    const order: string[] = [];
    const ready = [...this.stages.keys()].filter((n) => indegree.get(n) === 0);
    while (ready.length) {
      const next = ready.shift();
      if (next === undefined) break;
      order.push(next);
      for (const child of dependents.get(next) ?? []) {
        const left = (indegree.get(child) ?? 0) - 1;
        indegree.set(child, left);
        if (left === 0) ready.push(child);
      }
    }
    // registerStage rejects cycles, so this only trips on a bug
    if (order.length !== this.stages.size) throw new GraphValidationError(["stage graph is not acyclic"]);
    return order;
  }

  async run(runId: RunId, externals: ReadonlyMap<ArtifactName, T>, listener: GraphListener = {}): Promise<GraphRunReport<T>> {
    const order = this.validate();
    const missing = [...this.externals].filter((name) => !externals.has(name)).sort();
    if (missing.length) throw new GraphValidationError(missing.map((name) => `external input ${name} was not supplied`));

    const artifacts = new Map<ArtifactName, T>(externals);
    const outcomes = new Map<string, Promise<StageOutcome>>();

    for (const name of order) {
      const def = this.stages.get(name);
      if (!def) continue;
      const upstream = this.dependenciesOf(def).map((dep) => outcomes.get(dep) ?? Promise.reject(new Error(`no outcome for ${dep}`)));
      outcomes.set(name, this.runStage(runId, def, upstream, artifacts, listener));
    }

    const settled = await Promise.allSettled(order.map((name) => outcomes.get(name) ?? Promise.reject(new Error(`no outcome for ${name}`))));
    const results: StageOutcome[] = [];
    for (const s of settled) {
      // only a listener can reject a stage promise
      if (s.status === "rejected") throw s.reason;
      results.push(s.value);
    }

    let failure: GraphRunReport<T>["failure"] = null;
    let failed = false;
    for (const outcome of results) {
      const required = this.stages.get(outcome.stage)?.required ?? true;
      if (!required || outcome.status === "succeeded") continue;
      failed = true;
      if (outcome.status === "failed" && failure === null) {
        failure = { stage: outcome.stage, error: outcome.error, message: outcome.message };
      }
    }
    if (failed && failure === null) {
      // a required stage was skipped because an optional one failed
      const first = results.find((o) => o.status === "failed");
      if (first && first.status === "failed") failure = { stage: first.stage, error: first.error, message: first.message };
    }

    return { runId, status: failed ? "failed" : "succeeded", outcomes: results, artifacts, failure };
  }

  private async runStage(
    runId: RunId,
    def: StageDefinition<T>,
    upstream: Array<Promise<StageOutcome>>,
    artifacts: Map<ArtifactName, T>,
    listener: GraphListener
  ): Promise<StageOutcome> {
    const deps = await Promise.all(upstream);
    const blocked = deps.find((o) => o.status !== "succeeded");
    if (blocked) {
      const outcome: StageOutcome = {
        stage: def.name,
        status: "skipped",
        blockedBy: blocked.status === "skipped" ? blocked.blockedBy : blocked.stage
      };
      await listener.stageFinished?.(outcome);
      return outcome;
    }

    await listener.stageStarted?.(def.name);
    const startedAt = new Date().toISOString();
    let outcome: StageOutcome;
    try {
      const inputs = new Map<ArtifactName, T>();
      for (const input of def.inputs) {
        const value = artifacts.get(input);
        if (value === undefined) throw new GraphValidationError([`input ${input} of ${def.name} is not available`]);
        inputs.set(input, value);
      }
      const ctx: StageContext<T> = {
        runId,
        stage: def.name,
        inputs,
        input: (name) => {
          const value = inputs.get(name);
          if (value === undefined) throw new GraphValidationError([`stage ${def.name} did not declare input ${name}`]);
          return value;
        }
      };

      const result = await def.execute(ctx);
      const absent = def.outputs.filter((o) => result.outputs[o] === undefined);
      if (absent.length) throw new GraphValidationError(absent.map((o) => `stage ${def.name} did not return output ${o}`));

      for (const output of def.outputs) {
        const value = result.outputs[output];
        if (value !== undefined) artifacts.set(artifactName(def.name, output), value);
      }
      outcome = {
        stage: def.name,
        status: "succeeded",
        cached: result.cached ?? false,
        fallback: result.fallback ?? null,
        startedAt,
        finishedAt: new Date().toISOString()
      };
    } catch (err) {
      outcome = {
        stage: def.name,
        status: "failed",
        error: err,
        message: describeError(err),
        startedAt,
        finishedAt: new Date().toISOString()
      };
    }

    await listener.stageFinished?.(outcome);
    return outcome;
  }

  private dependenciesOf(def: StageDefinition<T>): string[] {
    const deps = new Set<string>();
    for (const input of def.inputs) {
      const producer = this.producers.get(input);
      if (producer !== undefined) deps.add(producer);
    }
    return [...deps];
  }

  /** Returns one cycle as a closed path of stage names, or null. */
  private findCycle(): string[] | null {
    const state = new Map<string, "visiting" | "done">();
    const stack: string[] = [];

    const visit = (name: string): string[] | null => {
      state.set(name, "visiting");
      stack.push(name);
      const def = this.stages.get(name);
      for (const dep of def ? this.dependenciesOf(def) : []) {
        const s = state.get(dep);
        if (s === "visiting") return [...stack.slice(stack.indexOf(dep)), dep];
        if (s === undefined) {
          const found = visit(dep);
          if (found) return found;
        }
      }
      stack.pop();
      state.set(name, "done");
      return null;
    };

    for (const name of this.stages.keys()) {
      if (state.has(name)) continue;
      const found = visit(name);
      if (found) return found;
    }
    return null;
  }
}
