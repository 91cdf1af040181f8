import type { ArtifactType } from "./artifact.js";

export function detectArtifactType(fileName: string): ArtifactType {
  const s = fileName.toLowerCase();
  if (s.endsWith(".vcf.gz")) return "VCF_GZ";
  if (s.endsWith(".vcf")) return "VCF";
  if (s.endsWith(".tsv.gz")) return "TSV_GZ";
  if (s.endsWith(".fa") || s.endsWith(".fasta")) return "FASTA";
  if (s.endsWith(".fai")) return "FAI";
  if (s.endsWith(".dict")) return "DICT";
  if (s.endsWith(".hpo")) return "HPO";
  if (s.endsWith(".tsv")) return "TSV";
  if (s.endsWith(".json")) return "JSON";
  if (s.endsWith(".log")) return "LOG";
  if (s.endsWith(".txt")) return "TEXT";
  return "UNKNOWN";
}
