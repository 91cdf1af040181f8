import type { ArtifactService } from "../artifacts/artifactService.js";
import type { ArtifactRecord, ArtifactRef } from "../core/artifact.js";
import { ShardFailure } from "../core/errors.js";
import { fingerprintOf } from "../core/hashing.js";
import { mergeCompressed, mergeHeaderOnce, type MergeStrategy } from "./merge.js";
import { chromosomeKey, partitionVcfFile, type PartitionKeyExtractor } from "./partition.js";
import { ShardSet } from "./shardSet.js";

export interface ShardTarget {
  /** Ref of the shard artifacts; its `shardKey` is replaced per shard. */
  ref: ArtifactRef;
  fileName: string;
}

export class ScatterGatherController {
  constructor(private readonly artifacts: ArtifactService) {}

  /** Splits a VCF artifact into one shard artifact per key found in its records. */
  async scatter(
    source: ArtifactRecord,
    target: ShardTarget,
    keyOf: PartitionKeyExtractor = chromosomeKey
  ): Promise<ShardSet<ArtifactRecord>> {
    const runId = target.ref.scope.runId;
    return this.artifacts.withScratch(runId, `scatter-${target.ref.stage}`, async (dir) => {
      const parts = await partitionVcfFile(source.path, dir, keyOf);
      const shards = new ShardSet<ArtifactRecord>(parts.keys());

      for (const key of shards.keys()) {
        const partPath = parts.get(key);
        if (!partPath) continue;
        const record = await this.artifacts.put(
          { ...target.ref, shardKey: key },
          { kind: "path", path: partPath, move: true },
          { fileName: target.fileName, type: "VCF", fingerprint: fingerprintOf({ op: "scatter", source: source.checksumSha256, key }) }
        );
        shards.complete(key, record);
      }
      return shards;
    });
  }

  /**
   * Runs `fn` for every completed shard concurrently and waits for all of them
   * to settle. Shards that were not completed on entry stay unprocessed.
   */
  async apply<T, R>(shards: ShardSet<T>, fn: (key: string, value: T) => Promise<R>): Promise<ShardSet<R>> {
    const out = new ShardSet<R>(shards.keys());
    const work = shards.keys().map(async (key) => {
      const state = shards.state(key);
      if (state.status === "failed") {
        out.fail(key, state.error);
        return;
      }
      if (state.status === "pending") return;
      try {
        out.complete(key, await fn(key, state.value));
      } catch (err) {
        out.fail(key, err);
      }
    });
    await Promise.all(work);
    return out;
  }

  /**
   * Merges every shard in key order into one artifact. Fails with
   * `ShardFailure` unless every shard completed.
   */
  async gather(shards: ShardSet<ArtifactRecord>, strategy: MergeStrategy, target: { ref: ArtifactRef; fileName: string }): Promise<ArtifactRecord> {
    const missing = shards.missing();
    if (missing.length) throw new ShardFailure(missing);

    const completed = shards.completed();
    const fingerprint = fingerprintOf({
      op: "gather",
      strategy,
      parts: completed.map(([key, record]) => [key, record.checksumSha256])
    });

    if (strategy.kind === "header_once") {
      const parts = await Promise.all(completed.map(async ([key, record]) => ({ key, data: await this.artifacts.readText(record) })));
      return this.artifacts.put(
        target.ref,
        { kind: "text", text: mergeHeaderOnce(parts, strategy.headerRows) },
        { fileName: target.fileName, fingerprint }
      );
    }

    const parts = await Promise.all(completed.map(async ([key, record]) => ({ key, data: await this.artifacts.read(record) })));
    return this.artifacts.put(
      target.ref,
      { kind: "buffer", data: mergeCompressed(parts, strategy.headerRows) },
      { fileName: target.fileName, fingerprint }
    );
  }
}
