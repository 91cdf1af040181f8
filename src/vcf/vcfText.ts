import { VcfFormatError } from "../core/errors.js";
import { LineWriter, readLines } from "../core/lineStream.js";

export interface VcfLine {
  /** `header` covers the meta lines (`##...`) and the `#CHROM` column line. */
  kind: "header" | "record";
  text: string;
}

/**
 * Streams a VCF one line at a time, checking its structure as it goes: header
 * lines first, exactly one `#CHROM` line, records of at least 8 columns.
 * Blank lines are skipped.
 */
export async function* readVcfLines(filePath: string, source = filePath): AsyncGenerator<VcfLine> {
  let sawColumns = false;
  let sawRecord = false;

  for await (const line of readLines(filePath)) {
    if (!line) continue;
    if (line.startsWith("#")) {
      if (sawRecord) throw new VcfFormatError(`${source}: header line after first record: ${line.slice(0, 60)}`);
      if (sawColumns) throw new VcfFormatError(`${source}: header line after #CHROM line`);
      if (line.startsWith("#CHROM")) sawColumns = true;
      yield { kind: "header", text: line };
      continue;
    }
    if (!sawColumns) throw new VcfFormatError(`${source}: record before #CHROM header line`);
    if (line.split("\t", 8).length < 8) throw new VcfFormatError(`${source}: record has fewer than 8 columns: ${line.slice(0, 60)}`);
    sawRecord = true;
    yield { kind: "record", text: line };
  }

  if (!sawColumns) throw new VcfFormatError(`${source}: missing #CHROM header line`);
}

function column(record: string, index: number): string {
  return record.split("\t", index + 1)[index] ?? "";
}

export function recordChrom(record: string): string {
  return column(record, 0);
}

export function recordFilter(record: string): string {
  return column(record, 6);
}

/**
 * True when the VCF carries genotype likelihoods rather than final calls:
 * a gVCF block header or a `<NON_REF>` symbolic allele. Stops at the first hit.
 */
export async function hasGenotypeLikelihoodMarker(filePath: string): Promise<boolean> {
  for await (const line of readVcfLines(filePath)) {
    if (line.kind === "header" ? line.text.startsWith("##GVCFBlock") : column(line.text, 4).includes("<NON_REF>")) return true;
  }
  return false;
}

/** True when at least one record has a FILTER value other than `.`. Stops at the first hit. */
export async function hasFilterAnnotations(filePath: string): Promise<boolean> {
  for await (const line of readVcfLines(filePath)) {
    if (line.kind !== "record") continue;
    const f = recordFilter(line.text);
    if (f !== "" && f !== ".") return true;
  }
  return false;
}

export async function countVcfRecords(filePath: string): Promise<number> {
  let n = 0;
  for await (const line of readVcfLines(filePath)) if (line.kind === "record") n++;
  return n;
}

/** Rewrites a VCF (plain or gzip) as checked plain text and returns its record count. */
export async function writePlainVcf(src: string, dest: string): Promise<{ records: number }> {
  const writer = new LineWriter(dest);
  let records = 0;
  try {
    for await (const line of readVcfLines(src)) {
      if (line.kind === "record") records++;
      await writer.write(line.text);
    }
    await writer.close();
  } catch (err) {
    writer.abort();
    throw err;
  }
  return { records };
}

export function parseChromosomeMap(text: string): Map<string, string> {
  const map = new Map<string, string>();
  for (const [i, raw] of text.split("\n").entries()) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;
    const parts = line.split(/\s+/);
    const [from, to] = parts;
    if (parts.length !== 2 || !from || !to) throw new VcfFormatError(`chromosome map line ${i + 1}: expected two columns`);
    map.set(from, to);
  }
  return map;
}

const CONTIG_ID_RE = /^##contig=<ID=([^,>]+)/;

export interface RestrictSummary {
  kept: number;
  dropped: number;
  droppedChromosomes: string[];
}

/**
 * Streams `src` to `dest`, renaming chromosomes through `renames` and keeping
 * only records and contig lines whose (renamed) chromosome is in `allowed`.
 */
export async function restrictChromosomes(
  src: string,
  dest: string,
  renames: ReadonlyMap<string, string>,
  allowed: ReadonlySet<string>
): Promise<RestrictSummary> {
  const rename = (c: string) => renames.get(c) ?? c;
  const droppedChromosomes = new Set<string>();
  let kept = 0;
  let dropped = 0;

  const writer = new LineWriter(dest);
  try {
    for await (const line of readVcfLines(src)) {
      if (line.kind === "header") {
        const m = CONTIG_ID_RE.exec(line.text);
        if (!m || m[1] === undefined) {
          await writer.write(line.text);
          continue;
        }
        const renamed = rename(m[1]);
        if (allowed.has(renamed)) await writer.write(line.text.replace(CONTIG_ID_RE, `##contig=<ID=${renamed}`));
        continue;
      }

      const tab = line.text.indexOf("\t");
      const chrom = rename(line.text.slice(0, tab));
      if (!allowed.has(chrom)) {
        droppedChromosomes.add(chrom);
        dropped++;
        continue;
      }
      kept++;
      await writer.write(chrom + line.text.slice(tab));
    }
    await writer.close();
  } catch (err) {
    writer.abort();
    throw err;
  }

  return { kept, dropped, droppedChromosomes: [...droppedChromosomes].sort() };
}
