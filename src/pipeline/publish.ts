import path from "path";
import type { ArtifactService } from "../artifacts/artifactService.js";
import type { PipelineParams } from "../config/params.js";
import { runArtifactRef, type ArtifactRecord } from "../core/artifact.js";
import { fingerprintOf } from "../core/hashing.js";
import type { JsonObject } from "../core/json.js";
import { artifactName } from "../graph/types.js";

/** Artifact name to path under the output directory. */
export const PUBLISHED_LAYOUT: ReadonlyArray<{ artifact: string; path: string }> = [
  { artifact: artifactName("frequency_exclusion", "vcf"), path: "vcf/filtered.vcf" },
  { artifact: artifactName("phenotype_similarity", "scores"), path: "scoring/phenotype_similarity.tsv" },
  { artifact: artifactName("phrank", "scores"), path: "scoring/phrank.tsv" },
  { artifact: artifactName("gather_shards", "annotations"), path: "scoring/annotations.tsv" },
  { artifact: artifactName("gather_shards", "features"), path: "scoring/features.tsv.gz" },
  { artifact: artifactName("predict", "matrix"), path: "prediction/prediction_matrix.tsv" },
  { artifact: artifactName("predict", "confidence"), path: "prediction/confidence.tsv" }
];

export const MANIFEST_FILE = "manifest.json";

export interface PublishedEntry {
  path: string;
  artifact: string;
  sha256: string;
  size_bytes: number;
}

export interface PublishResult {
  manifestPath: string;
  files: PublishedEntry[];
  record: ArtifactRecord;
}

/**
 * Copies the final artifacts into the output directory and writes
 * `manifest.json` last, so a manifest only exists for a complete result.
 */
export async function publishResults(
  artifacts: ArtifactService,
  params: PipelineParams,
  records: ReadonlyMap<string, ArtifactRecord>
): Promise<PublishResult> {
  const files: PublishedEntry[] = [];
  for (const entry of PUBLISHED_LAYOUT) {
    const record = records.get(entry.artifact);
    if (!record) throw new Error(`nothing to publish for ${entry.artifact}`);
    const published = await artifacts.publish(record, path.join(params.outputDirectory, entry.path));
    files.push({
      path: entry.path,
      artifact: entry.artifact,
      sha256: published.checksumSha256.slice("sha256:".length),
      size_bytes: Number(published.sizeBytes)
    });
  }

  const manifest: JsonObject = {
    run_id: params.runId,
    reference_version: params.referenceVersion,
    files: files.map((f) => ({ path: f.path, artifact: f.artifact, sha256: f.sha256, size_bytes: f.size_bytes }))
  };
  const record = await artifacts.put(
    runArtifactRef(params.runId, "publish", "manifest"),
    { kind: "text", text: JSON.stringify(manifest, null, 2) + "\n" },
    { fileName: MANIFEST_FILE, type: "JSON", fingerprint: fingerprintOf(manifest) }
  );
  const manifestPath = path.join(params.outputDirectory, MANIFEST_FILE);
  await artifacts.publish(record, manifestPath);
  return { manifestPath, files, record };
}
