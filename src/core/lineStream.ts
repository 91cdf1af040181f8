import { once } from "events";
import { createReadStream, createWriteStream, promises as fs, type WriteStream } from "fs";
import type { Readable } from "stream";
import { finished } from "stream/promises";
import { createGunzip } from "zlib";

const GZIP_MAGIC = [0x1f, 0x8b] as const;

export function isGzip(data: Buffer): boolean {
  return data.length >= 2 && data[0] === GZIP_MAGIC[0] && data[1] === GZIP_MAGIC[1];
}

async function startsWithGzipMagic(filePath: string): Promise<boolean> {
  const handle = await fs.open(filePath, "r");
  try {
    const head = Buffer.alloc(2);
    const { bytesRead } = await handle.read(head, 0, 2, 0);
    return bytesRead === 2 && isGzip(head);
  } finally {
    await handle.close();
  }
}

/**
 * Yields the lines of a text file without loading it whole. Gzip (including
 * BGZF) input is detected by magic bytes, not by extension; a trailing `\r` is
 * dropped from every line.
 */
export async function* readLines(filePath: string): AsyncGenerator<string> {
  const gzipped = await startsWithGzipMagic(filePath);
  const file = createReadStream(filePath);
  let input: Readable = file;
  if (gzipped) {
    const gunzip = createGunzip();
    file.on("error", (err) => gunzip.destroy(err));
    input = file.pipe(gunzip);
  }
  input.setEncoding("utf8");

  let pending = "";
  try {
    for await (const chunk of input) {
      const text: string = chunk;
      const lines = (pending + text).split("\n");
      pending = lines.pop() ?? "";
      for (const line of lines) yield line.endsWith("\r") ? line.slice(0, -1) : line;
    }
    if (pending) yield pending.endsWith("\r") ? pending.slice(0, -1) : pending;
  } finally {
    input.destroy();
    file.destroy();
  }
}

/** Writes newline-terminated lines to a new file, waiting for the stream to drain. */
export class LineWriter {
  private readonly out: WriteStream;
  private failure: Error | null = null;

  constructor(readonly filePath: string) {
    this.out = createWriteStream(filePath, { flags: "wx" });
    this.out.on("error", (err) => {
      this.failure = err;
    });
  }

  async write(line: string): Promise<void> {
    if (this.failure) throw this.failure;
    if (!this.out.write(`${line}\n`)) await once(this.out, "drain");
  }

  async close(): Promise<void> {
    if (this.failure) throw this.failure;
    this.out.end();
    await finished(this.out);
  }

  /** Abandons the file after a failure; the caller removes it. */
  abort(): void {
    this.out.destroy();
  }
}

/** Streams `lines` into a new file at `filePath`. */
export async function writeLines(filePath: string, lines: AsyncIterable<string>): Promise<void> {
  const writer = new LineWriter(filePath);
  try {
    for await (const line of lines) await writer.write(line);
    await writer.close();
  } catch (err) {
    writer.abort();
    throw err;
  }
}
