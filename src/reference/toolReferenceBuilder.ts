import { promises as fs } from "fs";
import path from "path";
import { ReferenceBuildError } from "../core/errors.js";
import { REFERENCE_CHROMOSOMES, type ReferenceVersion } from "../core/genome.js";
import type { ToolAdapter } from "../execution/toolAdapter.js";
import { createStageWorkspace } from "../execution/workspace.js";
import { canonicalContigNames, renameFastaContigs } from "./fasta.js";
import { REFERENCE_FILES, type ReferenceBuilder } from "./referenceCache.js";

export const REFERENCE_TOOLS = ["reference_fetch", "reference_restrict", "reference_index", "reference_dict"] as const;

/**
 * Builds a reference with four external tools: fetch the sequence, restrict
 * it to the canonical chromosomes, then index and write the dictionary.
 * Contigs are renamed from `chr1` to `1` between restrict and index so the
 * genome and the restricted VCFs share one naming.
 */
export class ToolReferenceBuilder implements ReferenceBuilder {
  constructor(
    private readonly deps: {
      tools: ToolAdapter;
      sources: Record<ReferenceVersion, string>;
    }
  ) {}

  async build(version: ReferenceVersion, stagingDir: string): Promise<void> {
    const workRoot = path.join(stagingDir, ".work");
    const params = {
      reference_version: version,
      reference_url: this.deps.sources[version],
      canonical_chromosomes: REFERENCE_CHROMOSOMES,
      ucsc_chromosomes: REFERENCE_CHROMOSOMES.map((c) => `chr${c}`)
    };

    const step = async (tool: (typeof REFERENCE_TOOLS)[number], inputs: Record<string, string>, outputs: Record<string, string>) => {
      try {
        const workspace = await createStageWorkspace(workRoot, `reference-${version}`, tool);
        return await this.deps.tools.invoke({ tool, inputs, outputs, params, workspace });
      } catch (err) {
        throw new ReferenceBuildError(version, tool, err);
      }
    };

    const fetched = await step("reference_fetch", {}, { fasta: "raw.fa" });
    const rawFasta = fetched.outputs.fasta;
    if (!rawFasta) throw new ReferenceBuildError(version, "reference_fetch", new Error("no fasta output"));

    const restricted = await step("reference_restrict", { fasta: rawFasta }, { fasta: REFERENCE_FILES.fasta });
    const fasta = restricted.outputs.fasta;
    if (!fasta) throw new ReferenceBuildError(version, "reference_restrict", new Error("no fasta output"));
    const finalFasta = path.join(stagingDir, REFERENCE_FILES.fasta);
    await renameFastaContigs(fasta, finalFasta, canonicalContigNames(REFERENCE_CHROMOSOMES));

    // both read the final fasta; wait for both before touching the staging dir
    const [indexed, dictionary] = await Promise.allSettled([
      step("reference_index", { fasta: finalFasta }, { fai: REFERENCE_FILES.fai }),
      step("reference_dict", { fasta: finalFasta }, { dict: REFERENCE_FILES.dict })
    ]);
    if (indexed.status === "rejected") throw indexed.reason;
    if (dictionary.status === "rejected") throw dictionary.reason;
    const fai = indexed.value.outputs.fai;
    const dict = dictionary.value.outputs.dict;
    if (!fai || !dict) throw new ReferenceBuildError(version, "reference_index", new Error("index or dictionary missing"));
    await fs.rename(fai, path.join(stagingDir, REFERENCE_FILES.fai));
    await fs.rename(dict, path.join(stagingDir, REFERENCE_FILES.dict));

    await fs.rm(workRoot, { recursive: true, force: true });
  }
}
