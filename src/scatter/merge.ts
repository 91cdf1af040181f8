import { gunzipSync, gzipSync } from "zlib";
import { MergeError } from "../core/errors.js";
import { isGzip } from "../core/lineStream.js";

/** Header rows: a fixed count, or every leading line that starts with `#`. */
export type HeaderRows = number | "comment";

export type MergeStrategy =
  | { kind: "header_once"; headerRows: HeaderRows }
  | { kind: "compressed_concat"; headerRows: HeaderRows };

export interface ShardPart<D> {
  key: string;
  data: D;
}

function toLines(text: string): string[] {
  if (!text) return [];
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

function splitHeader(lines: string[], headerRows: HeaderRows): { header: string[]; rows: string[] } {
  let n: number;
  if (headerRows === "comment") {
    n = 0;
    while (n < lines.length && (lines[n] ?? "").startsWith("#")) n += 1;
  } else {
    n = Math.min(headerRows, lines.length);
  }
  return { header: lines.slice(0, n), rows: lines.slice(n) };
}

function sameHeader(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((line, i) => line === b[i]);
}

/**
 * Concatenates shard texts with the shared header exactly once. Parts must
 * already be in shard order; a completely empty part contributes nothing.
 */
export function mergeHeaderOnce(parts: ReadonlyArray<ShardPart<string>>, headerRows: HeaderRows): string {
  let header: string[] | null = null;
  let headerKey = "";
  const rows: string[] = [];
  for (const part of parts) {
    const lines = toLines(part.data);
    if (!lines.length) continue;
    const split = splitHeader(lines, headerRows);
    if (header === null) {
      header = split.header;
      headerKey = part.key;
    } else if (!sameHeader(header, split.header)) {
      throw new MergeError(`header of shard ${part.key} differs from header of shard ${headerKey}`);
    }
    rows.push(...split.rows);
  }
  const out = [...(header ?? []), ...rows];
  return out.length ? out.join("\n") + "\n" : "";
}

function gunzipPart(part: ShardPart<Buffer>): string {
  if (!isGzip(part.data)) throw new MergeError(`shard ${part.key} is not gzip-compressed`);
  return gunzipSync(part.data).toString("utf8");
}

/**
 * Keeps the first non-empty shard's compressed stream byte for byte and
 * appends the data rows of every later shard as one more gzip member. Readers
 * of multi-member gzip see a single text.
 */
export function mergeCompressed(parts: ReadonlyArray<ShardPart<Buffer>>, headerRows: HeaderRows): Buffer {
  const texts = parts.map((part) => ({ part, text: gunzipPart(part) }));
  const seedIndex = texts.findIndex((t) => t.text !== "");
  const seed = texts[seedIndex];
  if (!seed) return parts[0]?.data ?? gzipSync(Buffer.alloc(0));

  const seedHeader = splitHeader(toLines(seed.text), headerRows).header;
  const rows: string[] = [];
  for (const { part, text } of texts.slice(seedIndex + 1)) {
    const lines = toLines(text);
    if (!lines.length) continue;
    const split = splitHeader(lines, headerRows);
    if (!sameHeader(seedHeader, split.header)) {
      throw new MergeError(`header of shard ${part.key} differs from header of shard ${seed.part.key}`);
    }
    rows.push(...split.rows);
  }
  if (!rows.length) return seed.part.data;

  const tail = rows.join("\n") + "\n";
  if (seed.text.endsWith("\n")) {
    return Buffer.concat([seed.part.data, gzipSync(tail)]);
  }
  // seed stream lacks a final newline; appending would join two rows
  return gzipSync(seed.text + "\n" + tail);
}
