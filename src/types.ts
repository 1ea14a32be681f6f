/**
 * Core type definitions for lncRNA discovery
 *
 * Records flow between pipeline stages in memory; the files each stage
 * writes are exports of these shapes.
 */

/**
 * Strand orientation of an annotation line
 */
export type Strand = "+" | "-" | ".";

/**
 * Base parser options shared by the line-oriented parsers
 */
export interface ParserOptions {
  /** Maximum line length before throwing error */
  maxLineLength?: number;
  /** Whether to keep original line numbers on parsed records */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Cuffcompare's relationship codes, the values the novelty thresholds may name
 *
 * `=` exact intron chain match, `c` contained, `j` shares at least one splice
 * junction (candidate new isoform), `e` single exon overlapping a reference
 * intron, `i` fully inside a reference intron, `o` generic exonic overlap,
 * `p` possible polymerase run-on, `r` repeat, `u` unknown/intergenic,
 * `x` exonic overlap on the opposite strand, `s` intron overlap on the
 * opposite strand, `.` multiple classifications.
 */
export const CLASS_CODES = ["=", "c", "j", "e", "i", "o", "p", "r", "u", "x", "s", "."] as const;

export type ClassCode = (typeof CLASS_CODES)[number];

/**
 * Per-transcript statistics reduced from exon records
 */
export interface TranscriptSummary {
  readonly transcriptId: string;
  /** Sum of exon lengths (1-based inclusive coordinates) */
  readonly length: number;
  readonly exonCount: number;
  /** Maximum declared `cov` over the transcript's exons */
  readonly coverage: number;
}

/**
 * One query transcript's relationship to a reference annotation
 */
export interface ComparisonRecord {
  readonly transcriptId: string;
  /** As reported; other comparators emit codes beyond `CLASS_CODES` */
  readonly classCode: string;
  /** Matched reference transcript, null when the comparator reports none */
  readonly refId: string | null;
  /** Matched reference gene, null when the comparator reports none */
  readonly refGeneId: string | null;
}

/**
 * A transcript summary joined with its comparison against the reference
 *
 * Comparison fields are null when the comparator produced no row.
 */
export interface SummaryRow extends TranscriptSummary {
  readonly classCode: string | null;
  readonly refId: string | null;
  readonly refGeneId: string | null;
}

export const CLASSIFICATIONS = [
  "known_isoform",
  "possible_artifact",
  "novel_isoform",
  "intergenic",
  "antisense",
  "intronic",
  "not_a_lncRNA",
] as const;

export type Classification = (typeof CLASSIFICATIONS)[number];

/**
 * Classifications whose transcripts become new genes in the catalog
 */
export const NOVEL_GENE_CLASSIFICATIONS: ReadonlySet<Classification> = new Set([
  "intergenic",
  "antisense",
  "intronic",
]);

/**
 * A merged novel transcript compared against both references
 *
 * The `All` fields come from the full reference annotation and the `Lnc`
 * fields from the known-lncRNA catalog. `Lnc` fields are null when the
 * catalog comparison has no row for the transcript.
 */
export interface ClassificationRecord {
  readonly transcriptId: string;
  readonly classCodeAll: string;
  readonly refIdAll: string | null;
  readonly refGeneIdAll: string | null;
  readonly classCodeLnc: string | null;
  readonly refIdLnc: string | null;
  readonly refGeneIdLnc: string | null;
  readonly classification: Classification;
}

/**
 * One exon line of the final catalog
 */
export interface CatalogEntry {
  readonly seqname: string;
  readonly start: number;
  /** Columns 1-8 exactly as they appeared in the source annotation */
  readonly leadingColumns: readonly string[];
  readonly geneId: string;
  readonly transcriptId: string;
  readonly geneName: string;
}

/**
 * A sample sheet row
 */
export interface Sample {
  readonly name: string;
  /** Absolute path of the sample's de-novo assembly */
  readonly gtfPath: string;
}
