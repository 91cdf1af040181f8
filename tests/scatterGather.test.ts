import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { gunzipSync, gzipSync } from "zlib";
import * as pg from "pg";

import { ArtifactService } from "../src/artifacts/artifactService.js";
import { ArtifactStore } from "../src/artifacts/artifactStore.js";
import { runArtifactRef, type ArtifactRecord } from "../src/core/artifact.js";
import { MergeError, ShardFailure } from "../src/core/errors.js";
import { mergeCompressed, mergeHeaderOnce } from "../src/scatter/merge.js";
import { partitionVcfFile } from "../src/scatter/partition.js";
import { ScatterGatherController } from "../src/scatter/scatterGather.js";
import { ShardSet } from "../src/scatter/shardSet.js";
import { createTestLedger, makeTempDir } from "./helpers.js";

const HEADER = ["##fileformat=VCFv4.2", "#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO"];

function vcf(records: string[]): string {
  return [...HEADER, ...records].map((l) => `${l}\n`).join("");
}

describe("ShardSet", () => {
  it("orders keys canonically regardless of discovery order", () => {
    const shards = new ShardSet<string>(["X", "10", "2", "1"]);
    expect(shards.keys()).toEqual(["1", "2", "10", "X"]);
  });

  it("rejects duplicate keys", () => {
    expect(() => new ShardSet<string>(["1", "1"])).toThrow("duplicate shard key: 1");
  });

  it("reports failed and pending shards as missing", () => {
    const shards = new ShardSet<string>(["1", "2", "X"]);
    shards.complete("1", "a");
    shards.fail("2", new Error("annotate exited with code 1"));
    expect(shards.isComplete()).toBe(false);
    expect(shards.missing()).toEqual([
      { key: "2", reason: "annotate exited with code 1" },
      { key: "X", reason: "not completed" }
    ]);
    expect(shards.completed()).toEqual([["1", "a"]]);
  });

  it("allows one transition per shard", () => {
    const shards = new ShardSet<string>(["1"]);
    shards.complete("1", "a");
    expect(() => shards.fail("1", "late")).toThrow("shard 1 is already completed");
  });

  it("carries failures through mapValues", () => {
    const shards = new ShardSet<number>(["1", "2"]);
    shards.complete("1", 5);
    shards.fail("2", "boom");
    const mapped = shards.mapValues((v) => v * 2);
    expect(mapped.state("1")).toEqual({ status: "completed", value: 10 });
    expect(mapped.state("2")).toEqual({ status: "failed", reason: "boom", error: "boom" });
  });
});

describe("partitionVcfFile", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("splits records by chromosome with the full header in every part", async () => {
    const src = path.join(tmpDir, "in.vcf");
    await fs.writeFile(src, vcf(["2\t5\t.\tA\tG\t.\tPASS\t.", "1\t7\t.\tC\tT\t.\tPASS\t.", "2\t9\t.\tG\tA\t.\tPASS\t."]));
    const dir = path.join(tmpDir, "parts");
    await fs.mkdir(dir);

    const parts = await partitionVcfFile(src, dir);
    expect([...parts.entries()]).toEqual([
      ["2", path.join(dir, "part-0.vcf")],
      ["1", path.join(dir, "part-1.vcf")]
    ]);
    expect(await fs.readFile(path.join(dir, "part-0.vcf"), "utf8")).toBe(vcf(["2\t5\t.\tA\tG\t.\tPASS\t.", "2\t9\t.\tG\tA\t.\tPASS\t."]));
    expect(await fs.readFile(path.join(dir, "part-1.vcf"), "utf8")).toBe(vcf(["1\t7\t.\tC\tT\t.\tPASS\t."]));
  });

  it("reads gzip input", async () => {
    const src = path.join(tmpDir, "in.vcf.gz");
    await fs.writeFile(src, gzipSync(vcf(["X\t1\t.\tA\tG\t.\tPASS\t."])));
    const dir = path.join(tmpDir, "parts");
    await fs.mkdir(dir);

    const parts = await partitionVcfFile(src, dir);
    expect([...parts.keys()]).toEqual(["X"]);
    expect(await fs.readFile(path.join(dir, "part-0.vcf"), "utf8")).toBe(vcf(["X\t1\t.\tA\tG\t.\tPASS\t."]));
  });
});

describe("merge strategies", () => {
  it("writes the header once and rows in shard order", () => {
    const merged = mergeHeaderOnce(
      [
        { key: "1", data: "id\tscore\n1_5\t0.1\n" },
        { key: "2", data: "" },
        { key: "X", data: "id\tscore\nX_3\t0.7\nX_9\t0.2\n" }
      ],
      1
    );
    expect(merged).toBe("id\tscore\n1_5\t0.1\nX_3\t0.7\nX_9\t0.2\n");
  });

  it("treats leading comment lines as the header", () => {
    const merged = mergeHeaderOnce([{ key: "1", data: vcf(["1\t1\t.\tA\tC\t.\t.\t."]) }, { key: "2", data: vcf(["2\t1\t.\tA\tC\t.\t.\t."]) }], "comment");
    expect(merged).toBe(vcf(["1\t1\t.\tA\tC\t.\t.\t.", "2\t1\t.\tA\tC\t.\t.\t."]));
  });

  it("rejects shards whose headers differ", () => {
    expect(() => mergeHeaderOnce([{ key: "1", data: "a\tb\n" }, { key: "2", data: "a\tc\n" }], 1)).toThrow(
      new MergeError("header of shard 2 differs from header of shard 1")
    );
  });

  it("appends later shards to the first compressed stream as one more member", () => {
    const first = gzipSync("id\tf\n1_5\t1\n");
    const merged = mergeCompressed(
      [
        { key: "1", data: first },
        { key: "2", data: gzipSync("id\tf\n2_8\t0\n") },
        { key: "X", data: gzipSync("id\tf\nX_1\t1\n") }
      ],
      1
    );
    expect(merged.subarray(0, first.length).equals(first)).toBe(true);
    expect(gunzipSync(merged).toString("utf8")).toBe("id\tf\n1_5\t1\n2_8\t0\nX_1\t1\n");
  });

  it("seeds from the first non-empty shard", () => {
    const second = gzipSync("id\tf\n2_8\t0\n");
    const merged = mergeCompressed([{ key: "1", data: gzipSync("") }, { key: "2", data: second }], 1);
    expect(merged.equals(second)).toBe(true);
  });

  it("rejects uncompressed input", () => {
    expect(() => mergeCompressed([{ key: "1", data: Buffer.from("id\n") }], 1)).toThrow("shard 1 is not gzip-compressed");
  });
});

describe("ScatterGatherController", () => {
  let tmpDir: string;
  let pool: pg.Pool;
  let artifacts: ArtifactService;
  let controller: ScatterGatherController;

  beforeEach(async () => {
    tmpDir = await makeTempDir();
    const ledger = await createTestLedger();
    pool = ledger.pool;
    artifacts = new ArtifactService(ledger.store, new ArtifactStore(path.join(tmpDir, "work")));
    controller = new ScatterGatherController(artifacts);
  });

  afterEach(async () => {
    await pool.end();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function source(records: string[]): Promise<ArtifactRecord> {
    return artifacts.put(runArtifactRef("case-1", "frequency_exclusion", "vcf"), { kind: "text", text: vcf(records) }, { fileName: "filtered.vcf" });
  }

  it("scatters by chromosome and gathers back in canonical order", async () => {
    const records = [
      "X\t30\tX_30\tA\tG\t.\tPASS\t.",
      "2\t20\t2_20\tC\tT\t.\tPASS\t.",
      "1\t10\t1_10\tG\tA\t.\tPASS\t.",
      "2\t25\t2_25\tT\tC\t.\tPASS\t."
    ];
    const shards = await controller.scatter(await source(records), {
      ref: runArtifactRef("case-1", "split_chromosomes", "vcf"),
      fileName: "shard.vcf"
    });
    expect(shards.keys()).toEqual(["1", "2", "X"]);
    expect(await fs.readdir(path.join(tmpDir, "work", "runs", "case-1", "work", "scratch"))).toEqual([]);

    const shard2 = shards.state("2");
    expect(shard2.status).toBe("completed");
    if (shard2.status !== "completed") return;
    expect(shard2.value.ref.shardKey).toBe("2");
    expect(await artifacts.readText(shard2.value)).toBe(vcf(["2\t20\t2_20\tC\tT\t.\tPASS\t.", "2\t25\t2_25\tT\tC\t.\tPASS\t."]));

    const gathered = await controller.gather(
      shards,
      { kind: "header_once", headerRows: "comment" },
      { ref: runArtifactRef("case-1", "gather", "vcf"), fileName: "gathered.vcf" }
    );
    expect(await artifacts.readText(gathered)).toBe(
      vcf(["1\t10\t1_10\tG\tA\t.\tPASS\t.", "2\t20\t2_20\tC\tT\t.\tPASS\t.", "2\t25\t2_25\tT\tC\t.\tPASS\t.", "X\t30\tX_30\tA\tG\t.\tPASS\t."])
    );
  });

  it("applies work per shard and keeps a failing shard's error", async () => {
    const shards = ShardSet.completedFrom<string>([
      ["1", "a"],
      ["2", "b"],
      ["X", "c"]
    ]);
    const out = await controller.apply(shards, async (key, value) => {
      if (key === "2") throw new Error("tool failed on 2");
      return value.toUpperCase();
    });
    expect(out.completed()).toEqual([
      ["1", "A"],
      ["X", "C"]
    ]);
    expect(out.missing()).toEqual([{ key: "2", reason: "tool failed on 2" }]);
  });

  it("refuses to gather while any shard is missing", async () => {
    const shards = await controller.scatter(await source(["1\t10\t.\tG\tA\t.\tPASS\t.", "2\t20\t.\tC\tT\t.\tPASS\t."]), {
      ref: runArtifactRef("case-1", "split_chromosomes", "vcf"),
      fileName: "shard.vcf"
    });
    const processed = await controller.apply(shards, async (key, record) => {
      if (key === "2") throw new Error("annotate_variants exited with code 2");
      return record;
    });

    let caught: unknown;
    try {
      await controller.gather(
        processed,
        { kind: "header_once", headerRows: "comment" },
        { ref: runArtifactRef("case-1", "gather", "vcf"), fileName: "gathered.vcf" }
      );
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ShardFailure);
    if (!(caught instanceof ShardFailure)) return;
    expect(caught.missingKeys).toEqual(["2"]);
    expect(await artifacts.find(runArtifactRef("case-1", "gather", "vcf"))).toBeNull();
  });
});
