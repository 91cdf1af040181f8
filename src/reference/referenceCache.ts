import { promises as fs } from "fs";
import path from "path";
import { ReferenceBuildError, describeError } from "../core/errors.js";
import type { ReferenceVersion } from "../core/genome.js";
import { sha256File, type Sha256 } from "../core/hashing.js";
import { newAttemptId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { PostgresStore } from "../store/postgresStore.js";

export const REFERENCE_FILES = {
  fasta: "genome.fa",
  fai: "genome.fa.fai",
  dict: "genome.dict"
} as const;

export type ReferenceFile = keyof typeof REFERENCE_FILES;

const REFERENCE_FILE_KEYS: readonly ReferenceFile[] = ["fasta", "fai", "dict"];

const MANIFEST = "build.json";

export interface ReferenceBuild {
  referenceVersion: ReferenceVersion;
  directory: string;
  files: Record<ReferenceFile, { path: string; checksumSha256: Sha256; sizeBytes: bigint }>;
  builtAt: string;
  /** True when an existing build was returned without running the builder. */
  reused: boolean;
}

/** Writes the three reference files into `stagingDir`. */
export interface ReferenceBuilder {
  build(version: ReferenceVersion, stagingDir: string): Promise<void>;
}

interface BuildManifest {
  reference_version: string;
  built_at: string;
  files: Record<ReferenceFile, { file_name: string; checksum_sha256: Sha256; size_bytes: string }>;
}

function isSha256(value: unknown): value is Sha256 {
  return typeof value === "string" && value.startsWith("sha256:");
}

function isManifest(value: unknown): value is BuildManifest {
  if (!value || typeof value !== "object") return false;
  const o = value as Record<string, unknown>;
  if (typeof o.reference_version !== "string" || typeof o.built_at !== "string") return false;
  const files = o.files;
  if (!files || typeof files !== "object") return false;
  const f = files as Record<string, unknown>;
  return REFERENCE_FILE_KEYS.every((k) => {
    const entry = f[k];
    if (!entry || typeof entry !== "object") return false;
    const e = entry as Record<string, unknown>;
    return typeof e.file_name === "string" && isSha256(e.checksum_sha256) && typeof e.size_bytes === "string";
  });
}

function isErrnoCode(err: unknown, ...codes: string[]): boolean {
  return err instanceof Error && "code" in err && typeof err.code === "string" && codes.includes(err.code);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Version-keyed cache of reference builds under `<root>/<version>/`. One
 * builder per version: callers in this process share a promise, other
 * processes wait on a lock directory. A build becomes visible only by
 * renaming its finished staging directory into place.
 */
export class ReferenceCache {
  private readonly inflight = new Map<ReferenceVersion, Promise<ReferenceBuild>>();

  constructor(
    private readonly deps: {
      rootDir: string;
      builder: ReferenceBuilder;
      ledger?: PostgresStore | null;
      lockPollMs?: number;
      lockStaleSeconds?: number;
    }
  ) {}

  directoryOf(version: ReferenceVersion): string {
    return path.join(this.deps.rootDir, version);
  }

  getOrBuild(version: ReferenceVersion): Promise<ReferenceBuild> {
    const pending = this.inflight.get(version);
    if (pending) return pending;
    const promise = this.resolve(version).finally(() => {
      this.inflight.delete(version);
    });
    this.inflight.set(version, promise);
    return promise;
  }

  /** Returns the cached build when its manifest and files are intact. */
  async find(version: ReferenceVersion): Promise<ReferenceBuild | null> {
    const dir = this.directoryOf(version);
    let raw: string;
    try {
      raw = await fs.readFile(path.join(dir, MANIFEST), "utf8");
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return null;
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return null;
    }
    if (!isManifest(parsed) || parsed.reference_version !== version) return null;

    const manifest = parsed;
    const check = async (key: ReferenceFile): Promise<ReferenceBuild["files"][ReferenceFile] | null> => {
      const entry = manifest.files[key];
      const filePath = path.join(dir, entry.file_name);
      try {
        const st = await fs.stat(filePath);
        if (!st.isFile() || BigInt(st.size) !== BigInt(entry.size_bytes)) return null;
      } catch {
        return null;
      }
      return { path: filePath, checksumSha256: entry.checksum_sha256, sizeBytes: BigInt(entry.size_bytes) };
    };
    const fasta = await check("fasta");
    const fai = await check("fai");
    const dict = await check("dict");
    if (!fasta || !fai || !dict) return null;
    const files = { fasta, fai, dict };

    return { referenceVersion: version, directory: dir, files, builtAt: parsed.built_at, reused: true };
  }

  private async resolve(version: ReferenceVersion): Promise<ReferenceBuild> {
    const cached = await this.find(version);
    if (cached) return cached;

    const lockDir = path.join(this.deps.rootDir, ".locks", `${version}.lock`);
    const acquired = await this.acquireLock(version, lockDir);
    if (!acquired.locked) return acquired.build;

    try {
      // another process may have finished between our check and the lock
      const again = await this.find(version);
      if (again) return again;
      return await this.build(version);
    } finally {
      await fs.rm(lockDir, { recursive: true, force: true });
    }
  }

  private async acquireLock(
    version: ReferenceVersion,
    lockDir: string
  ): Promise<{ locked: true } | { locked: false; build: ReferenceBuild }> {
    await fs.mkdir(path.dirname(lockDir), { recursive: true });
    const pollMs = this.deps.lockPollMs ?? 2000;
    const staleMs = (this.deps.lockStaleSeconds ?? 6 * 60 * 60) * 1000;

    for (;;) {
      try {
        await fs.mkdir(lockDir);
        await fs.writeFile(path.join(lockDir, "owner.json"), JSON.stringify({ pid: process.pid, at: new Date().toISOString() }) + "\n", "utf8");
        return { locked: true };
      } catch (err) {
        if (!isErrnoCode(err, "EEXIST")) throw err;
      }

      try {
        const st = await fs.stat(lockDir);
        if (Date.now() - st.mtimeMs > staleMs) {
          await fs.rm(lockDir, { recursive: true, force: true });
          continue;
        }
      } catch (err) {
        // released between mkdir and stat
        if (isErrnoCode(err, "ENOENT")) continue;
        throw err;
      }

      await sleep(pollMs);
      const build = await this.find(version);
      if (build) return { locked: false, build };
    }
  }

  private async build(version: ReferenceVersion): Promise<ReferenceBuild> {
    const stagingDir = path.join(this.deps.rootDir, ".staging", `${version}-${newAttemptId()}`);
    const finalDir = this.directoryOf(version);
    const ledger = this.deps.ledger ?? null;

    await fs.mkdir(stagingDir, { recursive: true });
    await ledger?.upsertReferenceBuild({ referenceVersion: version, status: "building", directory: null, manifest: null, error: null });

    try {
      try {
        await this.deps.builder.build(version, stagingDir);
      } catch (err) {
        if (err instanceof ReferenceBuildError) throw err;
        throw new ReferenceBuildError(version, "build", err);
      }

      const builtAt = new Date().toISOString();
      const manifest: BuildManifest = {
        reference_version: version,
        built_at: builtAt,
        files: {
          fasta: await this.describeFile(version, stagingDir, "fasta"),
          fai: await this.describeFile(version, stagingDir, "fai"),
          dict: await this.describeFile(version, stagingDir, "dict")
        }
      };
      await fs.writeFile(path.join(stagingDir, MANIFEST), JSON.stringify(manifest, null, 2) + "\n", "utf8");

      // an invalid leftover (no manifest, truncated file) is replaced
      await fs.rm(finalDir, { recursive: true, force: true });
      await fs.rename(stagingDir, finalDir);

      const build = await this.find(version);
      if (!build) throw new ReferenceBuildError(version, "publish", new Error("published build failed verification"));
      const result: ReferenceBuild = { ...build, reused: false };

      await ledger?.upsertReferenceBuild({
        referenceVersion: version,
        status: "ready",
        directory: finalDir,
        manifest: manifestJson(manifest),
        error: null
      });
      return result;
    } catch (err) {
      await ledger?.upsertReferenceBuild({ referenceVersion: version, status: "failed", directory: null, manifest: null, error: describeError(err) });
      throw err;
    } finally {
      await fs.rm(stagingDir, { recursive: true, force: true });
    }
  }

  private async describeFile(
    version: ReferenceVersion,
    stagingDir: string,
    key: ReferenceFile
  ): Promise<BuildManifest["files"][ReferenceFile]> {
    const fileName = REFERENCE_FILES[key];
    try {
      const { checksum, sizeBytes } = await sha256File(path.join(stagingDir, fileName));
      return { file_name: fileName, checksum_sha256: checksum, size_bytes: sizeBytes.toString() };
    } catch (err) {
      throw new ReferenceBuildError(version, `verify ${fileName}`, err);
    }
  }
}

function manifestJson(manifest: BuildManifest): JsonObject {
  const files: JsonObject = {};
  for (const [key, entry] of Object.entries(manifest.files)) {
    files[key] = { file_name: entry.file_name, checksum_sha256: entry.checksum_sha256, size_bytes: entry.size_bytes };
  }
  return { reference_version: manifest.reference_version, built_at: manifest.built_at, files };
}
