/**
 * Comparison adapter for the cuffcompare transcript comparator
 *
 * Each run happens in its own scoped workspace: the query is symlinked in,
 * the comparator writes `<prefix>.<query>.tmap` and its other fixed-name
 * artifacts next to it, and only the normalized class-code table leaves the
 * scope.
 *
 * @module tools/cuffcompare
 */

import type { FileSystem } from "@effect/platform";
import { Path } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { attempt, type LincerError, MalformedInputError } from "../errors";
import { TSVParser } from "../formats/dsv";
import type { DSVRecord } from "../formats/dsv";
import { exists } from "../io/file-reader";
import { linkIntoWorkspace, makeWorkspace } from "../io/workspace";
import type { ComparisonRecord } from "../types";
import { runTool, type ToolRunner } from "./service";

export interface ComparatorOptions {
  /** Executable name or path */
  readonly command: string;
  /** Prefix of the artifacts the comparator writes (its `-o` default) */
  readonly outputPrefix: string;
  /** Directory under which the per-run workspace is created */
  readonly workspaceParent: string;
}

export const DEFAULT_COMPARATOR = {
  command: "cuffcompare",
  outputPrefix: "cuffcmp",
} as const;

/**
 * Columns of the `.tmap` table the adapter depends on
 */
const TmapRowSchema = type({
  ref_gene_id: "string",
  ref_id: "string",
  class_code: "string > 0",
  cuff_id: "string > 0",
});

/** The comparator writes `-` for an absent id */
function normalizeId(value: string): string | null {
  return value === "-" || value === "" ? null : value;
}

/**
 * Convert parsed `.tmap` rows into comparison records keyed by query transcript
 *
 * The first row for a transcript wins.
 *
 * Class codes are taken as written; codes outside the usual set simply match no rule.
 *
 * @throws {MalformedInputError} When a row lacks a required column
 */
export function toComparisonRecords(rows: Iterable<DSVRecord>): Map<string, ComparisonRecord> {
  const records = new Map<string, ComparisonRecord>();

  for (const row of rows) {
    const parsed = TmapRowSchema(row.columns);
    if (parsed instanceof type.errors) {
      throw new MalformedInputError(
        `Invalid comparator row: ${parsed.summary}`,
        "TMAP",
        undefined,
        row.lineNumber
      );
    }
    if (records.has(parsed.cuff_id)) {
      continue;
    }
    records.set(parsed.cuff_id, {
      transcriptId: parsed.cuff_id,
      classCode: parsed.class_code,
      refId: normalizeId(parsed.ref_id),
      refGeneId: normalizeId(parsed.ref_gene_id),
    });
  }

  return records;
}

/**
 * Parse `.tmap` content held in memory
 */
export function parseTmap(content: string): Map<string, ComparisonRecord> {
  return toComparisonRecords(new TSVParser({ raggedRows: "pad" }).parseString(content));
}

/**
 * Compare a query assembly against a reference annotation
 *
 * @example
 * ```typescript
 * const comparisons = yield* compareTranscripts("ref.gtf", "sample.gtf", {
 *   ...DEFAULT_COMPARATOR,
 *   workspaceParent: "out",
 * });
 * comparisons.get("CUFF.1.1")?.classCode; // "u"
 * ```
 */
export function compareTranscripts(
  referencePath: string,
  queryPath: string,
  options: ComparatorOptions
): Effect.Effect<
  Map<string, ComparisonRecord>,
  LincerError,
  ToolRunner | FileSystem.FileSystem | Path.Path
> {
  return Effect.scoped(
    Effect.gen(function* () {
      const path = yield* Path.Path;
      const queryName = path.basename(queryPath);

      const workspace = yield* makeWorkspace(options.workspaceParent, `${options.outputPrefix}-`);
      yield* linkIntoWorkspace(queryPath, workspace, queryName);

      yield* runTool({
        command: options.command,
        args: ["-r", path.resolve(referencePath), queryName],
        cwd: workspace,
      });

      const tmapPath = path.join(workspace, `${options.outputPrefix}.${queryName}.tmap`);
      if (!(yield* exists(tmapPath))) {
        return yield* Effect.fail(
          new MalformedInputError(
            `${options.command} produced no class-code table for '${queryName}'`,
            "TMAP",
            tmapPath
          )
        );
      }

      const rows = yield* new TSVParser({ raggedRows: "pad" }).parseFile(tmapPath);
      return yield* attempt(() => toComparisonRecords(rows), tmapPath);
    })
  );
}
