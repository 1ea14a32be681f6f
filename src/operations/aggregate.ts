/**
 * Transcript aggregation from exon records
 *
 * @module operations/aggregate
 */

import { getGtfAttribute, requireGtfAttribute } from "../formats/gtf";
import type { GtfRecord } from "../formats/gtf";
import type { TranscriptSummary } from "../types";

interface MutableSummary {
  transcriptId: string;
  length: number;
  exonCount: number;
  coverage: number;
}

/**
 * Read the `cov` attribute of an exon
 *
 * @returns The coverage, or null when absent or not a number
 */
export function exonCoverage(record: GtfRecord): number | null {
  const raw = getGtfAttribute(record.attributes, "cov");
  if (raw === undefined || raw.trim() === "") {
    return null;
  }
  const coverage = Number(raw);
  return Number.isNaN(coverage) ? null : coverage;
}

/**
 * Reduce exon records to one summary per transcript
 *
 * Non-exon records are ignored. Coverage is the maximum declared `cov`,
 * 0 when no exon of the transcript declares one.
 *
 * @throws {MalformedInputError} When an exon has no transcript_id
 *
 * @example
 * ```typescript
 * const summaries = aggregateTranscripts(parser.parseString(gtf));
 * summaries.get("CUFF.1.1"); // { transcriptId: "CUFF.1.1", length: 250, exonCount: 2, coverage: 4 }
 * ```
 */
export function aggregateTranscripts(records: Iterable<GtfRecord>): Map<string, TranscriptSummary> {
  const summaries = new Map<string, MutableSummary>();

  for (const record of records) {
    if (record.feature !== "exon") {
      continue;
    }

    const transcriptId = requireGtfAttribute(record, "transcript_id");
    let summary = summaries.get(transcriptId);
    if (summary === undefined) {
      summary = { transcriptId, length: 0, exonCount: 0, coverage: 0 };
      summaries.set(transcriptId, summary);
    }

    summary.length += record.length;
    summary.exonCount += 1;
    const coverage = exonCoverage(record);
    if (coverage !== null && coverage > summary.coverage) {
      summary.coverage = coverage;
    }
  }

  return summaries;
}
