import { createHash } from "crypto";
import { createReadStream } from "fs";

export type Sha256 = `sha256:${string}`;

export function sha256Hex(data: string | Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

export function sha256Prefixed(data: string | Buffer): Sha256 {
  return `sha256:${sha256Hex(data)}`;
}

export async function sha256File(filePath: string): Promise<{ checksum: Sha256; sizeBytes: bigint }> {
  const hash = createHash("sha256");
  let size = 0n;
  for await (const chunk of createReadStream(filePath)) {
    const buf: Buffer = chunk;
    size += BigInt(buf.byteLength);
    hash.update(buf);
  }
  return { checksum: `sha256:${hash.digest("hex")}`, sizeBytes: size };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function canonicalize(value: unknown): unknown {
  if (value === undefined) return undefined;
  if (value === null) return null;
  if (typeof value === "number") return Number.isFinite(value) ? (Object.is(value, -0) ? 0 : value) : null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) {
    return value.map((v) => {
      const c = canonicalize(v);
      return c === undefined ? null : c;
    });
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const c = canonicalize(value[key]);
      if (c !== undefined) out[key] = c;
    }
    return out;
  }
  throw new Error(`value is not JSON-serializable: ${Object.prototype.toString.call(value)}`);
}

/** JSON with sorted keys, used wherever a hash must not depend on property order. */
export function stableJsonStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function fingerprintOf(value: unknown): Sha256 {
  return sha256Prefixed(stableJsonStringify(value));
}
