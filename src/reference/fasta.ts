import { readLines, writeLines } from "../core/lineStream.js";

/** `>chr1` to `>1` for every reference chromosome; VCF records are renamed the same way. */
export function canonicalContigNames(chromosomes: readonly string[]): Map<string, string> {
  return new Map(chromosomes.map((c) => [`chr${c}`, c]));
}

async function* renamedLines(src: string, renames: ReadonlyMap<string, string>): AsyncGenerator<string> {
  for await (const line of readLines(src)) {
    if (!line.startsWith(">")) {
      yield line;
      continue;
    }
    const end = line.search(/\s/);
    const name = end === -1 ? line.slice(1) : line.slice(1, end);
    const rest = end === -1 ? "" : line.slice(end);
    yield `>${renames.get(name) ?? name}${rest}`;
  }
}

/** Streams a FASTA to `dest`, renaming sequence names through `renames`. Descriptions are kept. */
export async function renameFastaContigs(src: string, dest: string, renames: ReadonlyMap<string, string>): Promise<void> {
  await writeLines(dest, renamedLines(src, renames));
}
