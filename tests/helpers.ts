import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { gunzipSync, gzipSync } from "zlib";
import { newDb } from "pg-mem";
import * as pg from "pg";

import { applySqlFile } from "../src/db/bootstrap.js";
import { createDb } from "../src/db/connection.js";
import { PostgresStore } from "../src/store/postgresStore.js";
import { parsePipelineConfig, type LoadedPipelineConfig } from "../src/config/pipelineConfig.js";
import type {
  DockerSpec,
  ExecutionLimits,
  ExecutionResult,
  LocalProcessSpec,
  RunnerBackend
} from "../src/execution/backends/types.js";
import { createRuntime, type PipelineRuntime } from "../src/runtime.js";

export async function makeTempDir(prefix = "variantflow-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function createTestLedger(): Promise<{ pool: pg.Pool; store: PostgresStore }> {
  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  const pool = new adapter.Pool() as unknown as pg.Pool;
  await applySqlFile(pool, path.resolve("db/schema.sql"));
  return { pool, store: new PostgresStore(createDb(pool)) };
}

/** Reads `key=value` argv tokens into a map. */
export function argsOf(argv: readonly string[]): Map<string, string> {
  const out = new Map<string, string>();
  for (const token of argv.slice(1)) {
    const eq = token.indexOf("=");
    if (eq > 0) out.set(token.slice(0, eq), token.slice(eq + 1));
  }
  return out;
}

export interface FakeToolResult {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
}

export type FakeTool = (args: Map<string, string>, spec: LocalProcessSpec) => Promise<FakeToolResult | void>;

function required(args: Map<string, string>, key: string): string {
  const value = args.get(key);
  if (value === undefined) throw new Error(`fake tool missing ${key}=`);
  return value;
}

function vcfLines(text: string): { header: string[]; records: string[] } {
  const lines = text.split("\n").filter((l) => l !== "");
  return { header: lines.filter((l) => l.startsWith("#")), records: lines.filter((l) => !l.startsWith("#")) };
}

async function rewriteVcf(
  args: Map<string, string>,
  fn: (doc: { header: string[]; records: string[] }) => { header: string[]; records: string[] }
): Promise<void> {
  const doc = fn(vcfLines(await fs.readFile(required(args, "vcf"), "utf8")));
  await fs.writeFile(required(args, "out"), [...doc.header, ...doc.records].map((l) => `${l}\n`).join(""));
}

function cols(record: string): string[] {
  return record.split("\t");
}

async function tsvRows(file: string): Promise<string[]> {
  const data = await fs.readFile(file);
  const text = data[0] === 0x1f && data[1] === 0x8b ? gunzipSync(data).toString("utf8") : data.toString("utf8");
  return text.split("\n").filter((l) => l !== "").slice(1);
}

export const FAKE_FASTA = ">chr1\nACGT\n>chr2\nACGT\n>chrX\nACGT\n>chrM\nACGT\n";

/** In-process stand-ins for every pipeline and reference tool. */
export function defaultFakeTools(): Record<string, FakeTool> {
  return {
    reference_fetch: async (args) => {
      await fs.writeFile(required(args, "out"), `${FAKE_FASTA}>chrUn_gl000220\nACGT\n`);
    },
    reference_restrict: async (args) => {
      const text = await fs.readFile(required(args, "fasta"), "utf8");
      return { stdout: text.split(">chrUn")[0] ?? text };
    },
    reference_index: async (args) => {
      await fs.writeFile(required(args, "out"), "chr1\t4\t6\t4\t5\n");
    },
    reference_dict: async (args) => {
      await fs.writeFile(required(args, "out"), "@HD\tVN:1.6\n");
    },
    normalize: async (args) => {
      await fs.access(required(args, "fasta"));
      await rewriteVcf(args, (doc) => doc);
    },
    genotype_call: async (args) => {
      await rewriteVcf(args, (doc) => ({
        header: doc.header.filter((h) => !h.startsWith("##GVCFBlock")),
        records: doc.records.filter((r) => cols(r)[4] !== "<NON_REF>").map((r) => {
          const c = cols(r);
          c[4] = (c[4] ?? "").replace(",<NON_REF>", "");
          return c.join("\t");
        })
      }));
    },
    annotate_ids: async (args) => {
      await rewriteVcf(args, (doc) => ({
        header: doc.header,
        records: doc.records.map((r) => {
          const c = cols(r);
          c[2] = `${c[0] ?? ""}_${c[1] ?? ""}`;
          return c.join("\t");
        })
      }));
    },
    quality_filter: async (args) => {
      await rewriteVcf(args, (doc) => ({ header: doc.header, records: doc.records.filter((r) => cols(r)[6] === "PASS") }));
    },
    frequency_exclusion: async (args) => {
      await rewriteVcf(args, (doc) => ({ header: doc.header, records: doc.records.filter((r) => !(cols(r)[7] ?? "").includes("COMMON")) }));
    },
    phenotype_similarity: async (args) => {
      const terms = (await fs.readFile(required(args, "hpo"), "utf8")).split("\n").filter(Boolean);
      await fs.writeFile(required(args, "out"), ["term\tscore", ...terms.map((t) => `${t}\t1`)].join("\n") + "\n");
    },
    phrank: async (args) => {
      const { records } = vcfLines(await fs.readFile(required(args, "vcf"), "utf8"));
      await fs.writeFile(required(args, "out"), ["variant_id\tphrank", ...records.map((r) => `${cols(r)[2] ?? ""}\t0.5`)].join("\n") + "\n");
    },
    annotate_variants: async (args) => {
      const { records } = vcfLines(await fs.readFile(required(args, "vcf"), "utf8"));
      const rows = records.map((r) => {
        const c = cols(r);
        return `${c[2] ?? ""}\t${c[0] ?? ""}\t${c[1] ?? ""}`;
      });
      await fs.writeFile(required(args, "out"), ["variant_id\tchrom\tpos", ...rows].join("\n") + "\n");
    },
    score_features: async (args) => {
      const rows = await tsvRows(required(args, "annotations"));
      const text = ["variant_id\tfeature", ...rows.map((r) => `${r.split("\t")[0] ?? ""}\t1`)].join("\n") + "\n";
      await fs.writeFile(required(args, "out"), gzipSync(text));
    },
    predict: async (args) => {
      const ids = (await tsvRows(required(args, "features"))).map((r) => r.split("\t")[0] ?? "");
      await fs.writeFile(required(args, "matrix"), ["variant_id\tprediction", ...ids.map((id) => `${id}\t0.9`)].join("\n") + "\n");
      await fs.writeFile(required(args, "confidence"), ["variant_id\tconfidence", ...ids.map((id) => `${id}\thigh`)].join("\n") + "\n");
    }
  };
}

/**
 * Local-process backend that runs tools in process, dispatching on argv[0].
 * Honors stdout redirection the way the real runner does.
 */
export class FakeToolRunner implements RunnerBackend<"local_process"> {
  readonly kind = "local_process" as const;
  readonly calls: string[][] = [];

  constructor(readonly tools: Record<string, FakeTool> = defaultFakeTools()) {}

  async execute(spec: LocalProcessSpec, _limits: ExecutionLimits): Promise<ExecutionResult> {
    const startedAt = new Date().toISOString();
    this.calls.push(spec.argv);
    const name = spec.argv[0] ?? "";
    const tool = this.tools[name];
    if (!tool) throw new Error(`spawn ${name} ENOENT`);

    let result: FakeToolResult;
    try {
      result = (await tool(argsOf(spec.argv), spec)) ?? {};
    } catch (err) {
      result = { exitCode: 1, stderr: `${err instanceof Error ? err.message : String(err)}\n` };
    }

    const stdout = result.stdout ?? "";
    if (spec.stdoutPath) await fs.writeFile(spec.stdoutPath, stdout);
    const stderr = result.stderr ?? "";
    return {
      exitCode: result.exitCode ?? 0,
      signal: null,
      timedOut: false,
      stdout: spec.stdoutPath ? "" : stdout,
      stderr,
      outputTail: stderr.split("\n").filter(Boolean),
      startedAt,
      finishedAt: new Date().toISOString()
    };
  }

  callsOf(tool: string): number {
    return this.calls.filter((argv) => argv[0] === tool).length;
  }
}

export class NoDockerRunner implements RunnerBackend<"docker"> {
  readonly kind = "docker" as const;

  async execute(spec: DockerSpec): Promise<ExecutionResult> {
    throw new Error(`docker is not available in tests (${spec.image})`);
  }
}

const TEST_TOOL_ARGV: Record<string, string[]> = {
  reference_fetch: ["reference_fetch", "url={param.reference_url}", "out={out.fasta}"],
  reference_restrict: ["reference_restrict", "fasta={in.fasta}"],
  reference_index: ["reference_index", "fasta={in.fasta}", "out={out.fai}"],
  reference_dict: ["reference_dict", "fasta={in.fasta}", "out={out.dict}"],
  normalize: ["normalize", "vcf={in.vcf}", "fasta={in.fasta}", "out={out.vcf}"],
  genotype_call: ["genotype_call", "vcf={in.vcf}", "out={out.vcf}"],
  annotate_ids: ["annotate_ids", "vcf={in.vcf}", "out={out.vcf}"],
  quality_filter: ["quality_filter", "vcf={in.vcf}", "out={out.vcf}"],
  frequency_exclusion: ["frequency_exclusion", "vcf={in.vcf}", "out={out.vcf}"],
  phenotype_similarity: ["phenotype_similarity", "hpo={in.hpo}", "out={out.scores}"],
  phrank: ["phrank", "vcf={in.vcf}", "hpo={in.hpo}", "out={out.scores}"],
  annotate_variants: ["annotate_variants", "vcf={in.vcf}", "out={out.annotations}"],
  score_features: ["score_features", "annotations={in.annotations}", "out={out.features}"],
  predict: ["predict", "features={in.features}", "matrix={out.matrix}", "confidence={out.confidence}"]
};

export const CHROMOSOME_MAP = ["chr1\t1", "chr2\t2", "chrX\tX", "chrY\tY", "chrM\tM"].join("\n") + "\n";

export async function writeTestConfig(rootDir: string, overrides: { max_concurrency?: number } = {}): Promise<LoadedPipelineConfig> {
  const chromosomeMap = path.join(rootDir, "chromosome_map.tsv");
  await fs.writeFile(chromosomeMap, CHROMOSOME_MAP);
  const tools: Record<string, { argv: string[]; stdout?: string }> = {};
  for (const [name, argv] of Object.entries(TEST_TOOL_ARGV)) {
    tools[name] = name === "reference_restrict" ? { argv, stdout: "fasta" } : { argv };
  }
  return parsePipelineConfig(
    {
      version: 1,
      runtime: { max_concurrency: overrides.max_concurrency ?? 4 },
      paths: { work_dir: "work", results_dir: "results" },
      reference: {
        sources: { hg19: "https://example.invalid/hg19.fa.gz", hg38: "https://example.invalid/hg38.fa.gz" },
        lock_poll_ms: 20
      },
      chromosome_map: chromosomeMap,
      tools
    },
    rootDir
  );
}

export async function createTestRuntime(
  rootDir: string,
  runner: FakeToolRunner = new FakeToolRunner()
): Promise<PipelineRuntime> {
  const loaded = await writeTestConfig(rootDir);
  return createRuntime({ loaded, backends: { local_process: runner, docker: new NoDockerRunner() } });
}

export const SAMPLE_VCF = [
  "##fileformat=VCFv4.2",
  "##contig=<ID=chr1>",
  "##contig=<ID=chr2>",
  "##contig=<ID=chrX>",
  "##contig=<ID=chrUn_gl000220>",
  "#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO",
  "chr2\t100\t.\tA\tG\t50\tPASS\tDP=10",
  "chr2\t200\t.\tC\tT\t50\tPASS\tDP=10",
  "chr1\t100\t.\tG\tA\t50\tPASS\tDP=10",
  "chr1\t150\t.\tT\tC\t50\tLowQual\tDP=3",
  "chr1\t300\t.\tA\tC\t50\tPASS\tDP=10",
  "chrUn_gl000220\t10\t.\tA\tT\t50\tPASS\tDP=10",
  "chr2\t400\t.\tG\tT\t50\tLowQual\tDP=2",
  "chrX\t500\t.\tC\tG\t50\tPASS\tDP=10",
  "chr1\t600\t.\tT\tA\t50\tPASS\tDP=10",
  "chr2\t700\t.\tA\tG\t50\tPASS\tDP=10"
].join("\n") + "\n";

export const SAMPLE_HPO = "HP:0001250\nHP:0001263\nHP:0001250\n";

export async function writeInputs(
  rootDir: string,
  vcf = SAMPLE_VCF
): Promise<{ input_vcf: string; input_hpo: string; reference_directory: string }> {
  const input_vcf = path.join(rootDir, "sample.vcf");
  const input_hpo = path.join(rootDir, "sample.hpo");
  const reference_directory = path.join(rootDir, "data");
  await fs.writeFile(input_vcf, vcf);
  await fs.writeFile(input_hpo, SAMPLE_HPO);
  await fs.mkdir(reference_directory, { recursive: true });
  return { input_vcf, input_hpo, reference_directory };
}
