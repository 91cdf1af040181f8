import { promises as fs } from "fs";
import path from "path";
import type { RunId } from "../core/ids.js";
import { newAttemptId } from "../core/ids.js";

export interface StageWorkspace {
  rootDir: string;
  inDir: string;
  outDir: string;
  metaDir: string;
  inPath(name: string): string;
  outPath(name: string): string;
  metaPath(name: string): string;
}

export function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe workspace path: ${name}`);
  }
  return joined;
}

/**
 * Creates a fresh workspace for one attempt of one stage (or shard):
 * `<root>/<stage>[/<shard>]/<attempt>/{in,out,meta}`. Nothing is shared
 * between attempts, so a retry never sees a previous attempt's outputs.
 */
export async function createStageWorkspace(
  rootDir: string,
  runId: RunId,
  stage: string,
  shardKey: string | null = null
): Promise<StageWorkspace> {
  const runRoot = path.resolve(rootDir);
  const parts = shardKey === null ? [stage] : [stage, shardKey];
  const root = safeJoin(runRoot, path.join(...parts, newAttemptId()));
  const inDir = path.join(root, "in");
  const outDir = path.join(root, "out");
  const metaDir = path.join(root, "meta");

  await fs.mkdir(inDir, { recursive: true });
  await fs.mkdir(outDir, { recursive: true });
  await fs.mkdir(metaDir, { recursive: true });
  await fs.writeFile(path.join(metaDir, "attempt.json"), JSON.stringify({ run_id: runId, stage, shard_key: shardKey }) + "\n", "utf8");

  return {
    rootDir: root,
    inDir,
    outDir,
    metaDir,
    inPath: (name: string) => safeJoin(inDir, name),
    outPath: (name: string) => safeJoin(outDir, name),
    metaPath: (name: string) => safeJoin(metaDir, name)
  };
}
