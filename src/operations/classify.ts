/**
 * Classification of merged novel transcripts
 *
 * Each transcript is compared against the full reference annotation and
 * against the known-lncRNA catalog; the pair of class codes decides its
 * label through an ordered rule table where the first match wins.
 *
 * @module operations/classify
 */

import type { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import type { LincerError } from "../errors";
import { TSVWriter } from "../formats/dsv";
import type { ComparatorOptions } from "../tools/cuffcompare";
import { compareTranscripts } from "../tools/cuffcompare";
import type { ToolRunner } from "../tools/service";
import type { Classification, ClassificationRecord, ComparisonRecord } from "../types";
import { sortByKey } from "./core/compare";

/**
 * The fields of a joined comparison the rules look at
 */
export type ClassificationInput = Pick<
  ClassificationRecord,
  "classCodeAll" | "classCodeLnc" | "refGeneIdAll" | "refGeneIdLnc"
>;

export interface ClassificationRule {
  readonly label: Classification;
  readonly matches: (row: ClassificationInput) => boolean;
}

/**
 * Rules in priority order; transcripts matching none are `not_a_lncRNA`
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  { label: "known_isoform", matches: (row) => row.classCodeLnc === "=" },
  {
    label: "possible_artifact",
    matches: (row) =>
      row.classCodeLnc === "j" && row.classCodeAll === "j" && row.refGeneIdLnc !== row.refGeneIdAll,
  },
  { label: "novel_isoform", matches: (row) => row.classCodeLnc === "j" },
  { label: "intergenic", matches: (row) => row.classCodeAll === "u" },
  { label: "antisense", matches: (row) => row.classCodeAll === "x" && row.classCodeLnc === "u" },
  { label: "intronic", matches: (row) => row.classCodeAll === "i" },
];

export function classifyTranscript(row: ClassificationInput): Classification {
  return CLASSIFICATION_RULES.find((rule) => rule.matches(row))?.label ?? "not_a_lncRNA";
}

/**
 * Left-join the catalog comparison onto the reference comparison and label each row
 *
 * Rows are sorted by transcript id.
 */
export function joinComparisons(
  againstReference: ReadonlyMap<string, ComparisonRecord>,
  againstLncRnas: ReadonlyMap<string, ComparisonRecord>
): ClassificationRecord[] {
  const records = Array.from(againstReference.values(), (all): ClassificationRecord => {
    const lnc = againstLncRnas.get(all.transcriptId);
    const joined = {
      transcriptId: all.transcriptId,
      classCodeAll: all.classCode,
      refIdAll: all.refId,
      refGeneIdAll: all.refGeneId,
      classCodeLnc: lnc?.classCode ?? null,
      refIdLnc: lnc?.refId ?? null,
      refGeneIdLnc: lnc?.refGeneId ?? null,
    };
    return { ...joined, classification: classifyTranscript(joined) };
  });
  return sortByKey(records, (record) => record.transcriptId);
}

/**
 * Compare the merged assembly against both annotations and classify it
 */
export function classifyNovelTranscripts(
  referencePath: string,
  lncRnaPath: string,
  mergedPath: string,
  comparator: ComparatorOptions
): Effect.Effect<
  ClassificationRecord[],
  LincerError,
  ToolRunner | FileSystem.FileSystem | Path.Path
> {
  return Effect.gen(function* () {
    const againstReference = yield* compareTranscripts(referencePath, mergedPath, comparator);
    const againstLncRnas = yield* compareTranscripts(lncRnaPath, mergedPath, comparator);
    return joinComparisons(againstReference, againstLncRnas);
  });
}

export const CLASSIFICATION_COLUMNS = [
  "transcript_id",
  "class_code__all",
  "ref_id__all",
  "ref_gene_id__all",
  "class_code__lnc",
  "ref_id__lnc",
  "ref_gene_id__lnc",
  "classification",
] as const;

/**
 * Render the classification table; absent values are written as "-"
 */
export function formatClassificationTable(records: Iterable<ClassificationRecord>): string {
  return new TSVWriter().formatTable(
    CLASSIFICATION_COLUMNS,
    Array.from(records, (record) => [
      record.transcriptId,
      record.classCodeAll,
      record.refIdAll,
      record.refGeneIdAll,
      record.classCodeLnc,
      record.refIdLnc,
      record.refGeneIdLnc,
      record.classification,
    ])
  );
}

/**
 * Count records per label; labels with no records count 0
 */
export function summarizeClassifications(
  records: Iterable<ClassificationRecord>
): Record<Classification, number> {
  const counts: Record<Classification, number> = {
    known_isoform: 0,
    possible_artifact: 0,
    novel_isoform: 0,
    intergenic: 0,
    antisense: 0,
    intronic: 0,
    not_a_lncRNA: 0,
  };
  for (const record of records) {
    counts[record.classification] += 1;
  }
  return counts;
}
