import { promises as fs } from "fs";
import type { ArtifactService } from "../artifacts/artifactService.js";
import { runArtifactRef, type ArtifactRecord, type ArtifactType } from "../core/artifact.js";
import type { Sha256 } from "../core/hashing.js";
import type { RunId } from "../core/ids.js";
import type { ToolAdapter, ToolParamValue } from "../execution/toolAdapter.js";
import { createStageWorkspace } from "../execution/workspace.js";
import { deriveStageFingerprint } from "../runs/runIdentity.js";

export interface ToolInput {
  path: string;
  checksumSha256: Sha256;
}

export interface ToolStageRequest {
  runId: RunId;
  stage: string;
  shardKey?: string | null;
  tool: string;
  inputs: Record<string, ToolInput>;
  outputs: Record<string, { fileName: string; type?: ArtifactType }>;
  params?: Record<string, ToolParamValue>;
}

export interface ToolStageResult {
  records: Record<string, ArtifactRecord>;
  cached: boolean;
}

/**
 * Runs one tool for a stage (or shard) and stores its outputs as artifacts of
 * that stage. When every output already exists with the same fingerprint the
 * tool is not run again.
 */
export async function runToolStage(
  deps: { artifacts: ArtifactService; tools: ToolAdapter },
  req: ToolStageRequest
): Promise<ToolStageResult> {
  const shardKey = req.shardKey ?? null;
  const fingerprint = deriveStageFingerprint({
    stage: req.stage,
    shardKey,
    tools: { [req.tool]: deps.tools.commandOf(req.tool) },
    inputs: req.inputs,
    ...(req.params ? { params: req.params } : {})
  });

  const names = Object.keys(req.outputs);
  const refs = Object.fromEntries(names.map((name) => [name, runArtifactRef(req.runId, req.stage, name, shardKey)]));

  const existing = await Promise.all(names.map(async (name) => {
    const ref = refs[name];
    return ref ? deps.artifacts.find(ref) : null;
  }));
  if (existing.every((r) => r !== null && r.fingerprint === fingerprint)) {
    const records: Record<string, ArtifactRecord> = {};
    existing.forEach((r, i) => {
      const name = names[i];
      if (r && name !== undefined) records[name] = r;
    });
    return { records, cached: true };
  }

  const workspace = await createStageWorkspace(deps.artifacts.store.workDir(req.runId), req.runId, req.stage, shardKey);
  const outcome = await deps.tools.invoke({
    tool: req.tool,
    inputs: Object.fromEntries(Object.entries(req.inputs).map(([name, input]) => [name, input.path])),
    outputs: Object.fromEntries(Object.entries(req.outputs).map(([name, out]) => [name, out.fileName])),
    ...(req.params ? { params: req.params } : {}),
    workspace
  });

  const records: Record<string, ArtifactRecord> = {};
  for (const [name, out] of Object.entries(req.outputs)) {
    const produced = outcome.outputs[name];
    const ref = refs[name];
    if (produced === undefined || ref === undefined) throw new Error(`tool ${req.tool} returned no path for output ${name}`);
    records[name] = await deps.artifacts.put(
      ref,
      { kind: "path", path: produced, move: true },
      { fileName: out.fileName, ...(out.type ? { type: out.type } : {}), fingerprint }
    );
  }

  // failed attempts keep their workspace for inspection
  await fs.rm(workspace.rootDir, { recursive: true, force: true });
  return { records, cached: false };
}
