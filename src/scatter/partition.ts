import path from "path";
import { LineWriter } from "../core/lineStream.js";
import { readVcfLines, recordChrom } from "../vcf/vcfText.js";

export type PartitionKeyExtractor = (record: string) => string;

export const chromosomeKey: PartitionKeyExtractor = (record) => recordChrom(record);

/**
 * Streams the records of `src` into one VCF per key under `dir`; every part
 * carries the full header. Keys come from the content, in first-seen order.
 * Returns each key's file path; the caller owns `dir`.
 */
export async function partitionVcfFile(
  src: string,
  dir: string,
  keyOf: PartitionKeyExtractor = chromosomeKey
): Promise<Map<string, string>> {
  const header: string[] = [];
  const writers = new Map<string, LineWriter>();

  try {
    for await (const line of readVcfLines(src)) {
      if (line.kind === "header") {
        header.push(line.text);
        continue;
      }
      const key = keyOf(line.text);
      if (!key) throw new Error(`empty partition key for record: ${line.text.slice(0, 60)}`);
      let writer = writers.get(key);
      if (!writer) {
        // file names are positional; keys need not be safe path segments
        writer = new LineWriter(path.join(dir, `part-${writers.size}.vcf`));
        writers.set(key, writer);
        for (const h of header) await writer.write(h);
      }
      await writer.write(line.text);
    }
    for (const writer of writers.values()) await writer.close();
  } catch (err) {
    for (const writer of writers.values()) writer.abort();
    throw err;
  }

  return new Map([...writers].map(([key, writer]) => [key, writer.filePath]));
}
