import { promises as fs } from "fs";
import path from "path";
import type { ArtifactService } from "../artifacts/artifactService.js";
import type { PipelineParams } from "../config/params.js";
import { runArtifactRef, type ArtifactRecord } from "../core/artifact.js";
import { ANALYSIS_CHROMOSOMES } from "../core/genome.js";
import { fingerprintOf, sha256File, sha256Prefixed } from "../core/hashing.js";
import type { JsonObject } from "../core/json.js";
import type { ToolAdapter, ToolParamValue } from "../execution/toolAdapter.js";
import { StageGraph } from "../graph/stageGraph.js";
import { artifactName, externalName, type StageDefinition, type StageResult } from "../graph/types.js";
import type { ReferenceBuild, ReferenceCache } from "../reference/referenceCache.js";
import type { ScatterGatherController } from "../scatter/scatterGather.js";
import {
  countVcfRecords,
  hasFilterAnnotations,
  hasGenotypeLikelihoodMarker,
  parseChromosomeMap,
  restrictChromosomes,
  writePlainVcf
} from "../vcf/vcfText.js";
import { PUBLISHED_LAYOUT, publishResults } from "./publish.js";
import { runToolStage, type ToolInput } from "./toolStage.js";
import { asFile, asPath, asReference, asShards, fileValue, type PipelineArtifact } from "./values.js";

export const PIPELINE_TOOLS = [
  "normalize",
  "genotype_call",
  "annotate_ids",
  "quality_filter",
  "phenotype_similarity",
  "phrank",
  "frequency_exclusion",
  "annotate_variants",
  "score_features",
  "predict"
] as const;

export const EXTERNAL = {
  inputVcf: externalName("input_vcf"),
  inputHpo: externalName("input_hpo"),
  chromosomeMap: externalName("chromosome_map")
} as const;

export const ARTIFACT = {
  inputVcf: artifactName("ingest_vcf", "vcf"),
  phenotypes: artifactName("ingest_hpo", "hpo"),
  genome: artifactName("reference_build", "genome"),
  normalizedVcf: artifactName("normalize", "vcf"),
  calledVcf: artifactName("genotype_call", "vcf"),
  restrictedVcf: artifactName("restrict_chromosomes", "vcf"),
  idVcf: artifactName("annotate_ids", "vcf"),
  qualityVcf: artifactName("quality_filter", "vcf"),
  phenotypeSimilarity: artifactName("phenotype_similarity", "scores"),
  phrank: artifactName("phrank", "scores"),
  filteredVcf: artifactName("frequency_exclusion", "vcf"),
  shardVcfs: artifactName("split_chromosomes", "vcf"),
  shardAnnotations: artifactName("annotate_shards", "annotations"),
  shardFeatures: artifactName("annotate_shards", "features"),
  annotations: artifactName("gather_shards", "annotations"),
  features: artifactName("gather_shards", "features"),
  predictionMatrix: artifactName("predict", "matrix"),
  confidence: artifactName("predict", "confidence"),
  manifest: artifactName("publish", "manifest")
} as const;

/** Everything a stage may use. Stages read no ambient state. */
export interface StageEnv {
  params: PipelineParams;
  artifacts: ArtifactService;
  tools: ToolAdapter;
  references: ReferenceCache;
  scatter: ScatterGatherController;
  events: { event(kind: string, message: string, data: JsonObject | null): Promise<void> };
}

type Stage = StageDefinition<PipelineArtifact>;

const HPO_TERM_G = /\bHP:\d{7}\b/g;

function toolParams(params: PipelineParams): Record<string, ToolParamValue> {
  return {
    reference_version: params.referenceVersion,
    reference_directory: params.referenceDirectory
  };
}

function genomeInputs(build: ReferenceBuild): Record<"fasta" | "fai" | "dict", ToolInput> {
  return { fasta: build.files.fasta, fai: build.files.fai, dict: build.files.dict };
}

function single(result: { records: Record<string, ArtifactRecord>; cached: boolean }, output: string): ArtifactRecord {
  const record = result.records[output];
  if (!record) throw new Error(`missing tool output ${output}`);
  return record;
}

/** One stage that runs one tool over file inputs and returns its outputs unchanged. */
function toolStage(
  env: StageEnv,
  def: {
    name: string;
    tool: (typeof PIPELINE_TOOLS)[number];
    inputs: Record<string, string>;
    withGenome?: boolean;
    outputs: Record<string, { fileName: string; type: "VCF" | "TSV" }>;
  }
): Stage {
  const artifactInputs = Object.values(def.inputs);
  return {
    name: def.name,
    inputs: def.withGenome ? [...artifactInputs, ARTIFACT.genome] : artifactInputs,
    outputs: Object.keys(def.outputs),
    async execute(ctx) {
      const inputs: Record<string, ToolInput> = {};
      for (const [name, artifact] of Object.entries(def.inputs)) inputs[name] = asFile(artifact, ctx.input(artifact));
      if (def.withGenome) Object.assign(inputs, genomeInputs(asReference(ARTIFACT.genome, ctx.input(ARTIFACT.genome))));

      const result = await runToolStage(env, {
        runId: ctx.runId,
        stage: def.name,
        tool: def.tool,
        inputs,
        outputs: def.outputs,
        params: toolParams(env.params)
      });
      const outputs: Record<string, PipelineArtifact> = {};
      for (const name of Object.keys(def.outputs)) outputs[name] = fileValue(single(result, name));
      return { outputs, cached: result.cached };
    }
  };
}

function ingestVcf(env: StageEnv): Stage {
  return {
    name: "ingest_vcf",
    inputs: [EXTERNAL.inputVcf],
    outputs: ["vcf"],
    async execute(ctx) {
      const source = asPath(EXTERNAL.inputVcf, ctx.input(EXTERNAL.inputVcf));
      const { checksum } = await sha256File(source);
      const { record, records } = await env.artifacts.withScratch(ctx.runId, "ingest_vcf", async (dir) => {
        const plain = path.join(dir, "input.vcf");
        const { records } = await writePlainVcf(source, plain);
        const record = await env.artifacts.put(
          runArtifactRef(ctx.runId, "ingest_vcf", "vcf"),
          { kind: "path", path: plain, move: true },
          { fileName: "input.vcf", type: "VCF", fingerprint: checksum }
        );
        return { record, records };
      });
      await env.events.event("ingest.vcf", `${records} records`, { records });
      return { outputs: { vcf: fileValue(record) } };
    }
  };
}

function ingestHpo(env: StageEnv): Stage {
  return {
    name: "ingest_hpo",
    inputs: [EXTERNAL.inputHpo],
    outputs: ["hpo"],
    async execute(ctx) {
      const source = asPath(EXTERNAL.inputHpo, ctx.input(EXTERNAL.inputHpo));
      const text = await fs.readFile(source, "utf8");
      const terms = [...new Set(text.match(HPO_TERM_G) ?? [])];
      if (!terms.length) throw new Error(`no HPO terms in ${source}`);
      const record = await env.artifacts.put(
        runArtifactRef(ctx.runId, "ingest_hpo", "hpo"),
        { kind: "text", text: terms.join("\n") + "\n" },
        { fileName: "phenotypes.hpo", type: "HPO", fingerprint: sha256Prefixed(text) }
      );
      return { outputs: { hpo: fileValue(record) } };
    }
  };
}

function referenceBuild(env: StageEnv): Stage {
  return {
    name: "reference_build",
    inputs: [],
    outputs: ["genome"],
    async execute() {
      const build = await env.references.getOrBuild(env.params.referenceVersion);
      await env.events.event("reference.ready", `${build.referenceVersion} ${build.reused ? "reused" : "built"}`, {
        directory: build.directory,
        reused: build.reused,
        fasta_sha256: build.files.fasta.checksumSha256
      });
      return { outputs: { genome: { kind: "reference", build } }, cached: build.reused };
    }
  };
}

/** Runs genotype calling only for gVCF-style input; called VCFs pass through unchanged. */
function genotypeCall(env: StageEnv): Stage {
  return {
    name: "genotype_call",
    inputs: [ARTIFACT.normalizedVcf, ARTIFACT.genome],
    outputs: ["vcf"],
    async execute(ctx): Promise<StageResult<PipelineArtifact>> {
      const vcf = asFile(ARTIFACT.normalizedVcf, ctx.input(ARTIFACT.normalizedVcf));
      if (!(await hasGenotypeLikelihoodMarker(vcf.path))) {
        return {
          outputs: { vcf: fileValue(vcf) },
          fallback: { kind: "passthrough", reason: "no genotype-likelihood marker; input is already called" }
        };
      }

      const genome = asReference(ARTIFACT.genome, ctx.input(ARTIFACT.genome));
      const result = await runToolStage(env, {
        runId: ctx.runId,
        stage: "genotype_call",
        tool: "genotype_call",
        inputs: { vcf, ...genomeInputs(genome) },
        outputs: { vcf: { fileName: "genotyped.vcf", type: "VCF" } },
        params: toolParams(env.params)
      });
      return { outputs: { vcf: fileValue(single(result, "vcf")) }, cached: result.cached };
    }
  };
}

/** The one place the analysis chromosome set is enforced. */
function restrictToAnalysisChromosomes(env: StageEnv): Stage {
  return {
    name: "restrict_chromosomes",
    inputs: [ARTIFACT.calledVcf, EXTERNAL.chromosomeMap],
    outputs: ["vcf"],
    async execute(ctx) {
      const vcf = asFile(ARTIFACT.calledVcf, ctx.input(ARTIFACT.calledVcf));
      const mapText = await fs.readFile(asPath(EXTERNAL.chromosomeMap, ctx.input(EXTERNAL.chromosomeMap)), "utf8");
      const renames = parseChromosomeMap(mapText);
      const { record, restricted } = await env.artifacts.withScratch(ctx.runId, "restrict_chromosomes", async (dir) => {
        const out = path.join(dir, "restricted.vcf");
        const restricted = await restrictChromosomes(vcf.path, out, renames, new Set(ANALYSIS_CHROMOSOMES));
        const record = await env.artifacts.put(
          runArtifactRef(ctx.runId, "restrict_chromosomes", "vcf"),
          { kind: "path", path: out, move: true },
          {
            fileName: "restricted.vcf",
            type: "VCF",
            fingerprint: fingerprintOf({ input: vcf.checksumSha256, map: sha256Prefixed(mapText), allowed: ANALYSIS_CHROMOSOMES })
          }
        );
        return { record, restricted };
      });
      await env.events.event("restrict.summary", `kept ${restricted.kept}, dropped ${restricted.dropped}`, {
        kept: restricted.kept,
        dropped: restricted.dropped,
        dropped_chromosomes: restricted.droppedChromosomes
      });
      return { outputs: { vcf: fileValue(record) } };
    }
  };
}

/**
 * Keeps FILTER=PASS records. Input without FILTER annotations passes through;
 * when nothing passes, the unfiltered input is used instead of an empty set.
 */
function qualityFilter(env: StageEnv): Stage {
  return {
    name: "quality_filter",
    inputs: [ARTIFACT.idVcf],
    outputs: ["vcf"],
    async execute(ctx): Promise<StageResult<PipelineArtifact>> {
      const vcf = asFile(ARTIFACT.idVcf, ctx.input(ARTIFACT.idVcf));
      if (!(await hasFilterAnnotations(vcf.path))) {
        return { outputs: { vcf: fileValue(vcf) }, fallback: { kind: "passthrough", reason: "no FILTER annotations to filter on" } };
      }

      const result = await runToolStage(env, {
        runId: ctx.runId,
        stage: "quality_filter",
        tool: "quality_filter",
        inputs: { vcf },
        outputs: { vcf: { fileName: "quality_filtered.vcf", type: "VCF" } },
        params: toolParams(env.params)
      });
      const passing = single(result, "vcf");
      if ((await countVcfRecords(passing.path)) === 0) {
        // hasFilterAnnotations found a record, so the input is never empty here
        const total = await countVcfRecords(vcf.path);
        return {
          outputs: { vcf: fileValue(vcf) },
          cached: result.cached,
          fallback: { kind: "unfiltered", reason: `no record passed the quality filter; keeping all ${total}` }
        };
      }
      return { outputs: { vcf: fileValue(passing) }, cached: result.cached };
    }
  };
}

function splitChromosomes(env: StageEnv): Stage {
  return {
    name: "split_chromosomes",
    inputs: [ARTIFACT.filteredVcf],
    outputs: ["vcf"],
    async execute(ctx) {
      const vcf = asFile(ARTIFACT.filteredVcf, ctx.input(ARTIFACT.filteredVcf));
      const shards = await env.scatter.scatter(vcf, { ref: runArtifactRef(ctx.runId, "split_chromosomes", "vcf"), fileName: "shard.vcf" });
      await env.events.event("scatter.split", `${shards.size} shards`, { keys: shards.keys() });
      return { outputs: { vcf: { kind: "shards", shards } } };
    }
  };
}

/**
 * Annotates and scores every chromosome shard concurrently. Shard failures are
 * recorded in the shard sets; gather decides what they mean.
 */
function annotateShards(env: StageEnv): Stage {
  return {
    name: "annotate_shards",
    inputs: [ARTIFACT.shardVcfs, ARTIFACT.genome, ARTIFACT.phenotypeSimilarity, ARTIFACT.phrank],
    outputs: ["annotations", "features"],
    async execute(ctx) {
      const shards = asShards(ARTIFACT.shardVcfs, ctx.input(ARTIFACT.shardVcfs));
      const genome = asReference(ARTIFACT.genome, ctx.input(ARTIFACT.genome));
      const similarity = asFile(ARTIFACT.phenotypeSimilarity, ctx.input(ARTIFACT.phenotypeSimilarity));
      const phrank = asFile(ARTIFACT.phrank, ctx.input(ARTIFACT.phrank));
      const params = toolParams(env.params);

      const results = await env.scatter.apply(shards, async (key, vcf) => {
        const annotated = await runToolStage(env, {
          runId: ctx.runId,
          stage: "annotate_shards",
          shardKey: key,
          tool: "annotate_variants",
          inputs: { vcf, ...genomeInputs(genome) },
          outputs: { annotations: { fileName: "annotations.tsv", type: "TSV" } },
          params
        });
        const annotations = single(annotated, "annotations");
        const scored = await runToolStage(env, {
          runId: ctx.runId,
          stage: "annotate_shards",
          shardKey: key,
          tool: "score_features",
          inputs: { annotations, phenotype_similarity: similarity, phrank },
          outputs: { features: { fileName: "features.tsv.gz", type: "TSV_GZ" } },
          params
        });
        return { annotations, features: single(scored, "features"), cached: annotated.cached && scored.cached };
      });

      for (const missing of results.missing()) {
        await env.events.event("shard.failed", `${missing.key}: ${missing.reason}`, { shard: missing.key });
      }
      const completed = results.completed();
      return {
        outputs: {
          annotations: { kind: "shards", shards: results.mapValues((r) => r.annotations) },
          features: { kind: "shards", shards: results.mapValues((r) => r.features) }
        },
        cached: completed.length > 0 && completed.length === results.size && completed.every(([, r]) => r.cached)
      };
    }
  };
}

function gatherShards(env: StageEnv): Stage {
  return {
    name: "gather_shards",
    inputs: [ARTIFACT.shardAnnotations, ARTIFACT.shardFeatures],
    outputs: ["annotations", "features"],
    async execute(ctx) {
      const annotationShards = asShards(ARTIFACT.shardAnnotations, ctx.input(ARTIFACT.shardAnnotations));
      const featureShards = asShards(ARTIFACT.shardFeatures, ctx.input(ARTIFACT.shardFeatures));
      const annotations = await env.scatter.gather(
        annotationShards,
        { kind: "header_once", headerRows: 1 },
        { ref: runArtifactRef(ctx.runId, "gather_shards", "annotations"), fileName: "annotations.tsv" }
      );
      const features = await env.scatter.gather(
        featureShards,
        { kind: "compressed_concat", headerRows: 1 },
        { ref: runArtifactRef(ctx.runId, "gather_shards", "features"), fileName: "features.tsv.gz" }
      );
      return { outputs: { annotations: fileValue(annotations), features: fileValue(features) } };
    }
  };
}

function publish(env: StageEnv): Stage {
  const published = PUBLISHED_LAYOUT.map((entry) => entry.artifact);
  return {
    name: "publish",
    inputs: published,
    outputs: ["manifest"],
    async execute(ctx) {
      const records = new Map<string, ArtifactRecord>();
      for (const name of published) records.set(name, asFile(name, ctx.input(name)));
      const manifest = await publishResults(env.artifacts, env.params, records);
      await env.events.event("publish.done", env.params.outputDirectory, { files: manifest.files.length });
      return { outputs: { manifest: fileValue(manifest.record) } };
    }
  };
}

export function pipelineStages(env: StageEnv): Stage[] {
  return [
    ingestVcf(env),
    ingestHpo(env),
    referenceBuild(env),
    toolStage(env, {
      name: "normalize",
      tool: "normalize",
      inputs: { vcf: ARTIFACT.inputVcf },
      withGenome: true,
      outputs: { vcf: { fileName: "normalized.vcf", type: "VCF" } }
    }),
    genotypeCall(env),
    restrictToAnalysisChromosomes(env),
    toolStage(env, {
      name: "annotate_ids",
      tool: "annotate_ids",
      inputs: { vcf: ARTIFACT.restrictedVcf },
      outputs: { vcf: { fileName: "annotated_ids.vcf", type: "VCF" } }
    }),
    qualityFilter(env),
    toolStage(env, {
      name: "phenotype_similarity",
      tool: "phenotype_similarity",
      inputs: { hpo: ARTIFACT.phenotypes },
      outputs: { scores: { fileName: "phenotype_similarity.tsv", type: "TSV" } }
    }),
    toolStage(env, {
      name: "phrank",
      tool: "phrank",
      inputs: { vcf: ARTIFACT.qualityVcf, hpo: ARTIFACT.phenotypes },
      outputs: { scores: { fileName: "phrank.tsv", type: "TSV" } }
    }),
    toolStage(env, {
      name: "frequency_exclusion",
      tool: "frequency_exclusion",
      inputs: { vcf: ARTIFACT.qualityVcf },
      outputs: { vcf: { fileName: "frequency_filtered.vcf", type: "VCF" } }
    }),
    splitChromosomes(env),
    annotateShards(env),
    gatherShards(env),
    toolStage(env, {
      name: "predict",
      tool: "predict",
      inputs: { features: ARTIFACT.features, phenotype_similarity: ARTIFACT.phenotypeSimilarity, phrank: ARTIFACT.phrank },
      outputs: {
        matrix: { fileName: "prediction_matrix.tsv", type: "TSV" },
        confidence: { fileName: "confidence.tsv", type: "TSV" }
      }
    }),
    publish(env)
  ];
}

export function buildPipelineGraph(env: StageEnv): StageGraph<PipelineArtifact> {
  const graph = new StageGraph<PipelineArtifact>();
  for (const name of Object.values(EXTERNAL)) graph.declareExternal(name);
  for (const stage of pipelineStages(env)) graph.registerStage(stage);
  graph.validate();
  return graph;
}
