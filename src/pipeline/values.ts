import type { ArtifactRecord } from "../core/artifact.js";
import type { ReferenceBuild } from "../reference/referenceCache.js";
import type { ShardSet } from "../scatter/shardSet.js";

/** What flows along the edges of the variant pipeline graph. */
export type PipelineArtifact =
  | { kind: "path"; path: string }
  | { kind: "file"; record: ArtifactRecord }
  | { kind: "reference"; build: ReferenceBuild }
  | { kind: "shards"; shards: ShardSet<ArtifactRecord> };

export const fileValue = (record: ArtifactRecord): PipelineArtifact => ({ kind: "file", record });

function mismatch(name: string, expected: string, got: PipelineArtifact): Error {
  return new Error(`artifact ${name} is a ${got.kind}, expected ${expected}`);
}

export function asPath(name: string, value: PipelineArtifact): string {
  if (value.kind !== "path") throw mismatch(name, "path", value);
  return value.path;
}

export function asFile(name: string, value: PipelineArtifact): ArtifactRecord {
  if (value.kind !== "file") throw mismatch(name, "file", value);
  return value.record;
}

export function asReference(name: string, value: PipelineArtifact): ReferenceBuild {
  if (value.kind !== "reference") throw mismatch(name, "reference", value);
  return value.build;
}

export function asShards(name: string, value: PipelineArtifact): ShardSet<ArtifactRecord> {
  if (value.kind !== "shards") throw mismatch(name, "shards", value);
  return value.shards;
}
