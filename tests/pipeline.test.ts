import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import path from "path";

import { runArtifactRef } from "../src/core/artifact.js";
import { ValidationError } from "../src/core/errors.js";
import { sha256Hex } from "../src/core/hashing.js";
import type { PipelineRuntime } from "../src/runtime.js";
import { FakeToolRunner, SAMPLE_VCF, createTestRuntime, defaultFakeTools, makeTempDir, writeInputs } from "./helpers.js";

const EXPECTED_ORDER = ["1_100", "1_300", "1_600", "2_100", "2_200", "2_700", "X_500"];

function tsv(header: string, rows: string[]): string {
  return [header, ...rows].join("\n") + "\n";
}

describe("variant pipeline", () => {
  let tmpDir: string;
  let runner: FakeToolRunner;
  let runtime: PipelineRuntime;

  beforeEach(async () => {
    tmpDir = await makeTempDir();
    runner = new FakeToolRunner();
    runtime = await createTestRuntime(tmpDir, runner);
  });

  afterEach(async () => {
    await runtime.close();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function params(runId: string, vcf = SAMPLE_VCF) {
    const inputs = await writeInputs(tmpDir, vcf);
    return { ...inputs, reference_version: "hg38", run_id: runId, output_directory: path.join(tmpDir, "out", runId) };
  }

  it("runs end to end and publishes results in chromosome order", async () => {
    const result = await runtime.pipeline.run(await params("case-1"));
    expect(result.status).toBe("succeeded");
    if (result.status !== "succeeded") return;

    const out = path.join(tmpDir, "out", "case-1");
    expect(result.manifestPath).toBe(path.join(out, "manifest.json"));

    const matrix = await fs.readFile(path.join(out, "prediction", "prediction_matrix.tsv"), "utf8");
    expect(matrix).toBe(tsv("variant_id\tprediction", EXPECTED_ORDER.map((id) => `${id}\t0.9`)));

    const annotations = await fs.readFile(path.join(out, "scoring", "annotations.tsv"), "utf8");
    expect(annotations).toBe(
      tsv(
        "variant_id\tchrom\tpos",
        EXPECTED_ORDER.map((id) => {
          const [chrom, pos] = id.split("_");
          return `${id}\t${chrom ?? ""}\t${pos ?? ""}`;
        })
      )
    );

    const filtered = await fs.readFile(path.join(out, "vcf", "filtered.vcf"), "utf8");
    const lines = filtered.split("\n").filter(Boolean);
    expect(lines.filter((l) => l.startsWith("##contig"))).toEqual(["##contig=<ID=1>", "##contig=<ID=2>", "##contig=<ID=X>"]);
    expect(lines.filter((l) => !l.startsWith("#"))).toHaveLength(7);

    const layout: Array<[string, string]> = [
      ["vcf/filtered.vcf", "frequency_exclusion.vcf"],
      ["scoring/phenotype_similarity.tsv", "phenotype_similarity.scores"],
      ["scoring/phrank.tsv", "phrank.scores"],
      ["scoring/annotations.tsv", "gather_shards.annotations"],
      ["scoring/features.tsv.gz", "gather_shards.features"],
      ["prediction/prediction_matrix.tsv", "predict.matrix"],
      ["prediction/confidence.tsv", "predict.confidence"]
    ];
    const files = await Promise.all(
      layout.map(async ([file, artifact]) => {
        const data = await fs.readFile(path.join(out, file));
        return { path: file, artifact, sha256: sha256Hex(data), size_bytes: data.length };
      })
    );
    const manifest: unknown = JSON.parse(await fs.readFile(result.manifestPath, "utf8"));
    expect(manifest).toEqual({ run_id: "case-1", reference_version: "hg38", files });
  });

  it("records the run, its stages and the chromosome restriction in the ledger", async () => {
    await runtime.pipeline.run(await params("case-2"));

    const run = await runtime.store.getRun("case-2");
    expect(run?.status).toBe("succeeded");
    expect(run?.referenceVersion).toBe("hg38");

    const stages = await runtime.store.listStageRuns("case-2");
    const byName = new Map(stages.map((s) => [s.stageName, s]));
    expect(stages).toHaveLength(16);
    expect(stages.every((s) => s.status === "succeeded")).toBe(true);
    expect(byName.get("genotype_call")?.fallback).toEqual({
      kind: "passthrough",
      reason: "no genotype-likelihood marker; input is already called"
    });
    expect(byName.get("quality_filter")?.fallback).toBeNull();

    const genome = await fs.readFile(path.join(tmpDir, "work", "references", "hg38", "genome.fa"), "utf8");
    expect(genome).toBe(">1\nACGT\n>2\nACGT\n>X\nACGT\n>M\nACGT\n");

    const events = await runtime.store.listRunEvents("case-2");
    const restrict = events.find((e) => e.kind === "restrict.summary");
    expect(restrict?.data).toEqual({ kept: 9, dropped: 1, dropped_chromosomes: ["chrUn_gl000220"] });
    const scatter = events.find((e) => e.kind === "scatter.split");
    expect(scatter?.data).toEqual({ keys: ["1", "2", "X"] });
    expect(events.at(-1)?.kind).toBe("run.succeeded");
  });

  it("passes a called VCF through genotype calling unchanged", async () => {
    await runtime.pipeline.run(await params("case-3"));
    expect(runner.callsOf("genotype_call")).toBe(0);
    const keys = (await runtime.artifacts.listRunArtifacts("case-3")).map((a) => a.artifactKey);
    expect(keys).toContain("run:case-3/normalize.vcf");
    expect(keys).not.toContain("run:case-3/genotype_call.vcf");
  });

  it("calls genotypes for gVCF-style input", async () => {
    const gvcf = SAMPLE_VCF.replace("##fileformat=VCFv4.2\n", "##fileformat=VCFv4.2\n##GVCFBlock0-20=minGQ=0(inclusive),maxGQ=20(exclusive)\n").replace(
      "chr1\t300\t.\tA\tC\t50\tPASS\tDP=10",
      "chr1\t300\t.\tA\t<NON_REF>\t50\tPASS\tDP=10"
    );
    const result = await runtime.pipeline.run(await params("case-4", gvcf));
    expect(result.status).toBe("succeeded");
    expect(runner.callsOf("genotype_call")).toBe(1);

    const matrix = await fs.readFile(path.join(tmpDir, "out", "case-4", "prediction", "prediction_matrix.tsv"), "utf8");
    expect(matrix).toBe(tsv("variant_id\tprediction", EXPECTED_ORDER.filter((id) => id !== "1_300").map((id) => `${id}\t0.9`)));
  });

  it("keeps every variant when none passes the quality filter", async () => {
    const nonePass = SAMPLE_VCF.replace(/\tPASS\t/g, "\tLowQual\t");
    const result = await runtime.pipeline.run(await params("case-5", nonePass));
    expect(result.status).toBe("succeeded");

    const stages = await runtime.store.listStageRuns("case-5");
    expect(stages.find((s) => s.stageName === "quality_filter")?.fallback).toEqual({
      kind: "unfiltered",
      reason: "no record passed the quality filter; keeping all 9"
    });

    const matrix = await fs.readFile(path.join(tmpDir, "out", "case-5", "prediction", "prediction_matrix.tsv"), "utf8");
    const ids = matrix.split("\n").filter(Boolean).slice(1).map((row) => row.split("\t")[0]);
    expect(ids).toEqual(["1_100", "1_150", "1_300", "1_600", "2_100", "2_200", "2_400", "2_700", "X_500"]);
  });

  it("reuses completed tool stages when a run id is resumed", async () => {
    const p = await params("case-6");
    await runtime.pipeline.run(p);
    const callsAfterFirst = runner.calls.length;

    const again = await runtime.pipeline.run(p);
    expect(again.status).toBe("succeeded");
    expect(runner.calls.length).toBe(callsAfterFirst);

    const stages = await runtime.store.listStageRuns("case-6");
    expect(stages.find((s) => s.stageName === "normalize")?.cached).toBe(true);
    expect(stages.find((s) => s.stageName === "annotate_shards")?.cached).toBe(true);
    expect(stages.find((s) => s.stageName === "reference_build")?.cached).toBe(true);
  });

  it("fails the run when one shard fails and skips everything after the gather", async () => {
    const tools = defaultFakeTools();
    const annotate = tools.annotate_variants;
    tools.annotate_variants = async (args, spec) => {
      const shard = await fs.readFile(args.get("vcf") ?? "", "utf8");
      if (shard.includes("\n2\t")) return { exitCode: 1 };
      return annotate ? annotate(args, spec) : undefined;
    };
    const failing = new FakeToolRunner(tools);
    await runtime.close();
    runtime = await createTestRuntime(tmpDir, failing);

    const result = await runtime.pipeline.run(await params("case-7"));
    expect(result.status).toBe("failed");
    if (result.status !== "failed") return;
    expect(result.failedStage).toBe("gather_shards");
    expect(result.message).toBe("stage gather_shards failed: shards did not complete: 2 (annotate_variants exited with code 1)");

    const status = new Map(result.outcomes.map((o) => [o.stage, o.status]));
    expect(status.get("annotate_shards")).toBe("succeeded");
    expect(status.get("phrank")).toBe("succeeded");
    expect(status.get("predict")).toBe("skipped");
    expect(status.get("publish")).toBe("skipped");

    await expect(fs.access(path.join(tmpDir, "out", "case-7", "manifest.json"))).rejects.toThrow();
    expect((await runtime.store.getRun("case-7"))?.error).toBe(result.message);

    const events = await runtime.store.listRunEvents("case-7");
    expect(events.filter((e) => e.kind === "shard.failed").map((e) => e.message)).toEqual(["2: annotate_variants exited with code 1"]);
  });

  it("writes the run log as an artifact", async () => {
    await runtime.pipeline.run(await params("case-8"));
    const logs = (await runtime.artifacts.listRunArtifacts("case-8")).filter((a) => a.stageName === "run");
    expect(logs).toHaveLength(1);
    const log = await fs.readFile(logs[0]?.path ?? "", "utf8");
    const first: unknown = JSON.parse(log.split("\n")[0] ?? "");
    expect(first).toMatchObject({ kind: "run.started", message: "reference=hg38" });
  });

  it("keeps completed artifacts intact when a tool writes to its input", async () => {
    const tools = defaultFakeTools();
    const annotateIds = tools.annotate_ids;
    tools.annotate_ids = async (args, spec) => {
      const result = annotateIds ? await annotateIds(args, spec) : undefined;
      await fs.appendFile(args.get("vcf") ?? "", "TAMPERED\n");
      return result;
    };
    await runtime.close();
    runtime = await createTestRuntime(tmpDir, new FakeToolRunner(tools));

    const result = await runtime.pipeline.run(await params("case-10"));
    expect(result.status).toBe("succeeded");

    const restricted = await runtime.artifacts.get(runArtifactRef("case-10", "restrict_chromosomes", "vcf"));
    const data = await fs.readFile(restricted.path);
    expect(`sha256:${sha256Hex(data)}`).toBe(restricted.checksumSha256);
    expect(data.toString("utf8")).not.toContain("TAMPERED");
  });

  it("rejects invalid parameters before recording anything", async () => {
    const p = await params("case-9");
    await expect(runtime.pipeline.run({ ...p, reference_version: "hg18" })).rejects.toBeInstanceOf(ValidationError);
    expect(await runtime.store.getRun("case-9")).toBeNull();
    expect(runner.calls).toHaveLength(0);
    expect(await runtime.artifacts.find(runArtifactRef("case-9", "ingest_vcf", "vcf"))).toBeNull();
  });
});
