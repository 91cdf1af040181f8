import { compareChromosomes } from "../core/genome.js";
import { describeError, type MissingShard } from "../core/errors.js";

export type ShardState<T> =
  | { status: "pending" }
  | { status: "completed"; value: T }
  | { status: "failed"; reason: string; error: unknown };

/**
 * The work items of one scatter and their completion state. Keys are held in
 * canonical chromosome order, so iteration order is merge order.
 */
export class ShardSet<T> {
  private readonly states = new Map<string, ShardState<T>>();

  constructor(keys: Iterable<string>) {
    const sorted = [...keys].sort(compareChromosomes);
    for (const key of sorted) {
      if (this.states.has(key)) throw new Error(`duplicate shard key: ${key}`);
      this.states.set(key, { status: "pending" });
    }
  }

  static completedFrom<T>(entries: Iterable<readonly [string, T]>): ShardSet<T> {
    const list = [...entries];
    const set = new ShardSet<T>(list.map(([k]) => k));
    for (const [key, value] of list) set.complete(key, value);
    return set;
  }

  get size(): number {
    return this.states.size;
  }

  keys(): string[] {
    return [...this.states.keys()];
  }

  state(key: string): ShardState<T> {
    const s = this.states.get(key);
    if (!s) throw new Error(`unknown shard key: ${key}`);
    return s;
  }

  complete(key: string, value: T): void {
    this.transition(key, { status: "completed", value });
  }

  fail(key: string, error: unknown): void {
    this.transition(key, { status: "failed", reason: describeError(error), error });
  }

  /** Completed shards in key order. */
  completed(): Array<[string, T]> {
    const out: Array<[string, T]> = [];
    for (const [key, s] of this.states) {
      if (s.status === "completed") out.push([key, s.value]);
    }
    return out;
  }

  missing(): MissingShard[] {
    const out: MissingShard[] = [];
    for (const [key, s] of this.states) {
      if (s.status === "pending") out.push({ key, reason: "not completed" });
      else if (s.status === "failed") out.push({ key, reason: s.reason });
    }
    return out;
  }

  isComplete(): boolean {
    return this.missing().length === 0;
  }

  /** Same keys and states, with completed values projected through `fn`. */
  mapValues<R>(fn: (value: T, key: string) => R): ShardSet<R> {
    const next = new ShardSet<R>(this.keys());
    for (const [key, s] of this.states) {
      if (s.status === "completed") next.complete(key, fn(s.value, key));
      else if (s.status === "failed") next.transition(key, s);
    }
    return next;
  }

  private transition(key: string, next: ShardState<T>): void {
    const current = this.state(key);
    if (current.status !== "pending") throw new Error(`shard ${key} is already ${current.status}`);
    this.states.set(key, next);
  }
}
