import { promises as fs } from "fs";
import type { ArtifactRecord, ArtifactRef } from "../core/artifact.js";
import { scopeKey } from "../core/artifact.js";
import type { RunId } from "../core/ids.js";
import type { ArtifactRow, PostgresStore } from "../store/postgresStore.js";
import type { ArtifactSource, ArtifactStore, PublishedFile, PutOptions } from "./artifactStore.js";

/** Artifact store plus ledger: every artifact that completes is also recorded in the run ledger. */
export class ArtifactService {
  constructor(
    private readonly ledger: PostgresStore,
    readonly store: ArtifactStore
  ) {}

  async put(ref: ArtifactRef, source: ArtifactSource, opts: PutOptions): Promise<ArtifactRecord> {
    const record = await this.store.put(ref, source, opts);
    await this.ledger.recordArtifact(record);
    return record;
  }

  async find(ref: ArtifactRef): Promise<ArtifactRecord | null> {
    return this.store.find(ref);
  }

  async get(ref: ArtifactRef): Promise<ArtifactRecord> {
    return this.store.get(ref);
  }

  async readText(record: ArtifactRecord): Promise<string> {
    return this.store.readText(record);
  }

  async read(record: ArtifactRecord): Promise<Buffer> {
    return this.store.read(record);
  }

  async publish(record: ArtifactRecord, destination: string): Promise<PublishedFile> {
    return this.store.publish(record, destination);
  }

  /** Runs `fn` with a scratch directory that is removed afterwards, whatever the outcome. */
  async withScratch<T>(runId: RunId, label: string, fn: (dir: string) => Promise<T>): Promise<T> {
    const dir = await this.store.createScratchDir(runId, label);
    try {
      return await fn(dir);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }

  async listRunArtifacts(runId: RunId): Promise<ArtifactRow[]> {
    return this.ledger.listArtifacts(scopeKey({ kind: "run", runId }));
  }
}
