import { fingerprintOf, type Sha256 } from "../core/hashing.js";
import type { JsonObject } from "../core/json.js";
import type { ToolCommandConfig } from "../config/pipelineConfig.js";
import type { ToolParamValue } from "../execution/toolAdapter.js";

export interface StageIdentityInput {
  stage: string;
  shardKey?: string | null;
  tools: Record<string, ToolCommandConfig>;
  inputs: Record<string, { checksumSha256: Sha256 }>;
  params?: Record<string, ToolParamValue>;
}

/**
 * Memoization key of a tool stage: changes whenever the stage, its command
 * templates, any input's content or its parameters change.
 */
export function deriveStageFingerprint(input: StageIdentityInput): Sha256 {
  return fingerprintOf({
    stage: input.stage,
    shard: input.shardKey ?? null,
    tools: input.tools,
    inputs: Object.fromEntries(Object.entries(input.inputs).map(([name, record]) => [name, record.checksumSha256])),
    params: input.params ?? {}
  });
}

export function deriveParamsHash(params: JsonObject): Sha256 {
  return fingerprintOf(params);
}
