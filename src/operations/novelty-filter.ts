/**
 * Novelty filter over per-sample transcript summaries
 *
 * A transcript is a lncRNA candidate when it is long, multi-exonic, well
 * covered and the comparator places it outside known exons.
 *
 * @module operations/novelty-filter
 */

import { TSVWriter } from "../formats/dsv";
import type { ClassCode, ComparisonRecord, SummaryRow, TranscriptSummary } from "../types";
import { sortByKey } from "./core/compare";

export interface NoveltyThresholds {
  /** Minimum summed exon length, inclusive */
  readonly minLength: number;
  /** Minimum exon count, inclusive */
  readonly minExonCount: number;
  /** Minimum coverage, inclusive */
  readonly minCoverage: number;
  /** Class codes that mark a transcript as novel */
  readonly classCodes: readonly ClassCode[];
}

export const DEFAULT_NOVELTY_THRESHOLDS: NoveltyThresholds = {
  minLength: 200,
  minExonCount: 2,
  minCoverage: 3.0,
  classCodes: ["u", "j", "i", "x"],
};

export const SUMMARY_COLUMNS = [
  "transcript_id",
  "length",
  "exons",
  "coverage",
  "class_code",
  "ref_id",
  "ref_gene_id",
] as const;

/**
 * Left-join summaries with comparisons, sorted by transcript id
 *
 * Comparison fields are null for transcripts the comparator did not report.
 */
export function joinSummaries(
  summaries: ReadonlyMap<string, TranscriptSummary>,
  comparisons: ReadonlyMap<string, ComparisonRecord>
): SummaryRow[] {
  const rows = Array.from(summaries.values(), (summary): SummaryRow => {
    const comparison = comparisons.get(summary.transcriptId);
    return {
      ...summary,
      classCode: comparison?.classCode ?? null,
      refId: comparison?.refId ?? null,
      refGeneId: comparison?.refGeneId ?? null,
    };
  });
  return sortByKey(rows, (row) => row.transcriptId);
}

/**
 * Threshold filter over joined summary rows
 *
 * @example
 * ```typescript
 * const filter = new NoveltyFilter({ ...DEFAULT_NOVELTY_THRESHOLDS, minCoverage: 5 });
 * const keep = filter.select(rows);
 * ```
 */
export class NoveltyFilter {
  private readonly classCodes: ReadonlySet<string>;

  constructor(readonly thresholds: NoveltyThresholds = DEFAULT_NOVELTY_THRESHOLDS) {
    this.classCodes = new Set(thresholds.classCodes);
  }

  passes(row: SummaryRow): boolean {
    return (
      row.length >= this.thresholds.minLength &&
      row.exonCount >= this.thresholds.minExonCount &&
      row.coverage >= this.thresholds.minCoverage &&
      row.classCode !== null &&
      this.classCodes.has(row.classCode)
    );
  }

  /**
   * Transcript ids of the rows that pass every threshold
   */
  select(rows: Iterable<SummaryRow>): Set<string> {
    const keep = new Set<string>();
    for (const row of rows) {
      if (this.passes(row)) {
        keep.add(row.transcriptId);
      }
    }
    return keep;
  }
}

export function selectNovelTranscripts(
  rows: Iterable<SummaryRow>,
  thresholds: NoveltyThresholds = DEFAULT_NOVELTY_THRESHOLDS
): Set<string> {
  return new NoveltyFilter(thresholds).select(rows);
}

/**
 * Render the per-sample audit table; absent comparison values are written as "-"
 */
export function formatSummaryTable(rows: Iterable<SummaryRow>): string {
  return new TSVWriter().formatTable(
    SUMMARY_COLUMNS,
    Array.from(rows, (row) => [
      row.transcriptId,
      row.length,
      row.exonCount,
      row.coverage,
      row.classCode,
      row.refId,
      row.refGeneId,
    ])
  );
}
