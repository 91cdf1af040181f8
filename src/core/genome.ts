export const REFERENCE_VERSIONS = ["hg19", "hg38"] as const;
export type ReferenceVersion = (typeof REFERENCE_VERSIONS)[number];

export function isReferenceVersion(value: string): value is ReferenceVersion {
  return (REFERENCE_VERSIONS as readonly string[]).includes(value);
}

const AUTOSOMES = Array.from({ length: 22 }, (_, i) => String(i + 1));

/** Chromosomes kept for scatter and everything downstream of it. */
export const ANALYSIS_CHROMOSOMES: readonly string[] = [...AUTOSOMES, "X", "Y"];

/** Chromosomes kept in the reference build. */
export const REFERENCE_CHROMOSOMES: readonly string[] = [...ANALYSIS_CHROMOSOMES, "M"];

const CANONICAL_ORDER = new Map<string, number>(REFERENCE_CHROMOSOMES.map((c, i) => [c, i]));

export function compareChromosomes(a: string, b: string): number {
  const ia = CANONICAL_ORDER.get(a);
  const ib = CANONICAL_ORDER.get(b);
  if (ia !== undefined && ib !== undefined) return ia - ib;
  if (ia !== undefined) return -1;
  if (ib !== undefined) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}
