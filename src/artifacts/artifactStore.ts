import { constants as fsConstants, promises as fs } from "fs";
import path from "path";
import type { ArtifactRecord, ArtifactRef, ArtifactScope, ArtifactType } from "../core/artifact.js";
import { artifactKey } from "../core/artifact.js";
import { detectArtifactType } from "../core/detectArtifactType.js";
import { ArtifactConflictError, ArtifactNotFoundError } from "../core/errors.js";
import { sha256File, type Sha256 } from "../core/hashing.js";
import { newAttemptId } from "../core/ids.js";

export type ArtifactSource =
  | { kind: "path"; path: string; move?: boolean }
  | { kind: "text"; text: string }
  | { kind: "buffer"; data: Buffer };

export interface PutOptions {
  fileName: string;
  type?: ArtifactType;
  fingerprint?: Sha256 | null;
}

export interface PublishedFile {
  path: string;
  checksumSha256: Sha256;
  sizeBytes: bigint;
}

const SIDECAR = "artifact.json";
const SEGMENT_RE = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

interface Sidecar {
  file_name: string;
  type: ArtifactType;
  size_bytes: string;
  checksum_sha256: Sha256;
  fingerprint: Sha256 | null;
  created_at: string;
}

function isSidecar(value: unknown): value is Sidecar {
  if (!value || typeof value !== "object") return false;
  const o = value as Record<string, unknown>;
  return (
    typeof o.file_name === "string" &&
    typeof o.type === "string" &&
    typeof o.size_bytes === "string" &&
    typeof o.checksum_sha256 === "string" &&
    o.checksum_sha256.startsWith("sha256:") &&
    (o.fingerprint === null || typeof o.fingerprint === "string") &&
    typeof o.created_at === "string"
  );
}

function assertSegment(kind: string, value: string): void {
  if (!SEGMENT_RE.test(value) || value.includes("..")) {
    throw new Error(`unsafe artifact ${kind}: ${value}`);
  }
}

function isErrnoCode(err: unknown, ...codes: string[]): boolean {
  return err instanceof Error && "code" in err && typeof err.code === "string" && codes.includes(err.code);
}

/**
 * Filesystem artifact store. Every artifact is a directory holding one data
 * file and an `artifact.json` sidecar; the directory is staged under a temp
 * name and renamed into place, so a visible artifact is always complete.
 */
export class ArtifactStore {
  constructor(readonly rootDir: string) {}

  scopeDir(scope: ArtifactScope): string {
    assertSegment("run id", scope.runId);
    return path.join(this.rootDir, "runs", scope.runId);
  }

  referencesRoot(): string {
    return path.join(this.rootDir, "references");
  }

  workDir(runId: string): string {
    assertSegment("run id", runId);
    return path.join(this.rootDir, "runs", runId, "work");
  }

  /** Creates a fresh private directory under the run's work dir; the caller removes it. */
  async createScratchDir(runId: string, label: string): Promise<string> {
    assertSegment("scratch label", label);
    const dir = path.join(this.workDir(runId), "scratch", `${label}-${newAttemptId()}`);
    await fs.mkdir(dir, { recursive: true });
    return dir;
  }

  artifactDir(ref: ArtifactRef): string {
    assertSegment("stage", ref.stage);
    assertSegment("output", ref.output);
    const base = path.join(this.scopeDir(ref.scope), "artifacts", ref.stage, ref.output);
    if (ref.shardKey === null) return base;
    assertSegment("shard key", ref.shardKey);
    return path.join(base, "shards", ref.shardKey);
  }

  async put(ref: ArtifactRef, source: ArtifactSource, opts: PutOptions): Promise<ArtifactRecord> {
    assertSegment("file name", opts.fileName);
    const finalDir = this.artifactDir(ref);
    const fingerprint = opts.fingerprint ?? null;

    const existing = await this.find(ref);
    if (existing) return this.reuseOrConflict(ref, existing, fingerprint);

    const parent = path.dirname(finalDir);
    await fs.mkdir(parent, { recursive: true });
    const stagingDir = path.join(parent, `.tmp-${path.basename(finalDir)}-${newAttemptId()}`);
    await fs.mkdir(stagingDir);

    try {
      const dataPath = path.join(stagingDir, opts.fileName);
      if (source.kind === "text") await fs.writeFile(dataPath, source.text, "utf8");
      else if (source.kind === "buffer") await fs.writeFile(dataPath, source.data);
      else if (source.move) {
        if ((await fs.lstat(source.path)).isSymbolicLink()) throw new Error(`artifact source is a symlink: ${source.path}`);
        await fs.rename(source.path, dataPath);
      }
      // never a hard link: the source must not be able to change a completed artifact
      else await fs.copyFile(source.path, dataPath, fsConstants.COPYFILE_FICLONE);

      const { checksum, sizeBytes } = await sha256File(dataPath);
      const sidecar: Sidecar = {
        file_name: opts.fileName,
        type: opts.type ?? detectArtifactType(opts.fileName),
        size_bytes: sizeBytes.toString(),
        checksum_sha256: checksum,
        fingerprint,
        created_at: new Date().toISOString()
      };
      await fs.writeFile(path.join(stagingDir, SIDECAR), JSON.stringify(sidecar, null, 2) + "\n", "utf8");

      try {
        await fs.rename(stagingDir, finalDir);
      } catch (err) {
        if (!isErrnoCode(err, "ENOTEMPTY", "EEXIST")) throw err;
        // Another writer completed first.
        const winner = await this.get(ref);
        return this.reuseOrConflict(ref, winner, fingerprint);
      }
      return this.recordFrom(ref, finalDir, sidecar);
    } finally {
      await fs.rm(stagingDir, { recursive: true, force: true });
    }
  }

  async find(ref: ArtifactRef): Promise<ArtifactRecord | null> {
    const dir = this.artifactDir(ref);
    let raw: string;
    try {
      raw = await fs.readFile(path.join(dir, SIDECAR), "utf8");
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return null;
      throw err;
    }
    const parsed: unknown = JSON.parse(raw);
    if (!isSidecar(parsed)) throw new Error(`corrupt artifact sidecar: ${artifactKey(ref)}`);
    return this.recordFrom(ref, dir, parsed);
  }

  async get(ref: ArtifactRef): Promise<ArtifactRecord> {
    const found = await this.find(ref);
    if (!found) throw new ArtifactNotFoundError(artifactKey(ref));
    return found;
  }

  async read(record: ArtifactRecord): Promise<Buffer> {
    return fs.readFile(record.path);
  }

  async readText(record: ArtifactRecord): Promise<string> {
    return fs.readFile(record.path, "utf8");
  }

  /** Copies a completed artifact to `destination` via a temp file and rename. */
  async publish(record: ArtifactRecord, destination: string): Promise<PublishedFile> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    const tmp = `${destination}.tmp-${newAttemptId()}`;
    try {
      await fs.copyFile(record.path, tmp);
      await fs.rename(tmp, destination);
    } finally {
      await fs.rm(tmp, { force: true });
    }
    return { path: destination, checksumSha256: record.checksumSha256, sizeBytes: record.sizeBytes };
  }

  private reuseOrConflict(ref: ArtifactRef, existing: ArtifactRecord, fingerprint: Sha256 | null): ArtifactRecord {
    if (fingerprint !== null && existing.fingerprint === fingerprint) return existing;
    throw new ArtifactConflictError(artifactKey(ref));
  }

  private recordFrom(ref: ArtifactRef, dir: string, sidecar: Sidecar): ArtifactRecord {
    return {
      ref,
      path: path.join(dir, sidecar.file_name),
      fileName: sidecar.file_name,
      type: sidecar.type,
      sizeBytes: BigInt(sidecar.size_bytes),
      checksumSha256: sidecar.checksum_sha256,
      fingerprint: sidecar.fingerprint,
      createdAt: sidecar.created_at
    };
  }
}
