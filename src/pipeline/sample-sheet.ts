/**
 * Sample sheet loading
 *
 * The sheet is a header-less, tab-delimited table of `sample_name` and
 * `gtf_path`. Blank lines and `#` comments are ignored.
 *
 * @module pipeline/sample-sheet
 */

import type { FileSystem } from "@effect/platform";
import { Path } from "@effect/platform";
import { Effect } from "effect";
import { attempt, type LincerError, MalformedInputError } from "../errors";
import type { DSVRecord } from "../formats/dsv";
import { TSVParser } from "../formats/dsv";
import type { Sample } from "../types";

/**
 * Convert sheet rows into samples in sheet order
 *
 * @throws {MalformedInputError} On a row without two non-empty columns or a repeated sample name
 */
export function toSamples(
  rows: Iterable<DSVRecord>,
  resolvePath: (gtfPath: string) => string
): Sample[] {
  const samples: Sample[] = [];
  const seen = new Set<string>();

  for (const row of rows) {
    const name = row.fields[0]?.trim() ?? "";
    const gtfPath = row.fields[1]?.trim() ?? "";
    if (name === "" || gtfPath === "") {
      throw new MalformedInputError(
        "Sample sheet rows need a sample_name and a gtf_path",
        "sample sheet",
        undefined,
        row.lineNumber
      );
    }
    if (seen.has(name)) {
      throw new MalformedInputError(
        `Duplicate sample name '${name}'`,
        "sample sheet",
        undefined,
        row.lineNumber
      );
    }
    seen.add(name);
    samples.push({ name, gtfPath: resolvePath(gtfPath) });
  }

  return samples;
}

/**
 * Load the samples of a sheet in file order
 */
export function loadSampleSheet(
  sheetPath: string
): Effect.Effect<Sample[], LincerError, FileSystem.FileSystem | Path.Path> {
  return Effect.gen(function* () {
    const path = yield* Path.Path;
    const baseDirectory = path.dirname(path.resolve(sheetPath));

    const rows = yield* new TSVParser({ header: false }).parseFile(sheetPath);
    const samples = yield* attempt(
      () => toSamples(rows, (gtfPath) => path.resolve(baseDirectory, gtfPath)),
      sheetPath
    );
    if (samples.length === 0) {
      return yield* Effect.fail(
        new MalformedInputError("Sample sheet lists no samples", "sample sheet", sheetPath)
      );
    }
    return samples;
  });
}
