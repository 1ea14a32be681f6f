/**
 * GTF line selection by transcript id
 *
 * Kept lines are copied through as the bytes read, terminator included, so the
 * output is a byte-faithful subset of the input. Lines are decoded only to find
 * their transcript id.
 *
 * @module operations/select
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Stream } from "effect";
import { attempt, type LincerError } from "../errors";
import { parseGtfLine, requireGtfAttribute } from "../formats/gtf";
import { readRawLineBytes, stripLineEnding } from "../io/file-reader";
import { writeBytesAtomic } from "../io/file-writer";

export interface SelectionStats {
  /** Every line of the input, blank and comment lines included */
  readonly linesRead: number;
  readonly linesKept: number;
  /** Blank and `#` comment lines */
  readonly linesSkipped: number;
}

/**
 * Transcript id of a raw GTF line, or null for blank and comment lines
 *
 * @throws {MalformedInputError} When a record line is malformed or has no transcript_id
 */
export function transcriptIdOfLine(rawLine: string, lineNumber?: number): string | null {
  const line = stripLineEnding(rawLine);
  if (line.trim() === "" || line.startsWith("#")) {
    return null;
  }
  return requireGtfAttribute(parseGtfLine(line, lineNumber), "transcript_id");
}

/**
 * Copy the lines of `inputPath` whose transcript is in `keep` to `outputPath`
 *
 * @example
 * ```typescript
 * const stats = yield* selectGtfLines("sample.gtf", "sample.novel.gtf", new Set(["CUFF.1.1"]));
 * ```
 */
export function selectGtfLines(
  inputPath: string,
  outputPath: string,
  keep: ReadonlySet<string>
): Effect.Effect<SelectionStats, LincerError, FileSystem.FileSystem> {
  return Effect.suspend(() => {
    let linesRead = 0;
    let linesKept = 0;
    let linesSkipped = 0;
    const decoder = new TextDecoder();

    const selected = readRawLineBytes(inputPath).pipe(
      Stream.mapEffect((rawLine) =>
        attempt(() => {
          linesRead++;
          const transcriptId = transcriptIdOfLine(decoder.decode(rawLine), linesRead);
          if (transcriptId === null) {
            linesSkipped++;
            return null;
          }
          if (!keep.has(transcriptId)) {
            return null;
          }
          linesKept++;
          return rawLine;
        }, inputPath)
      ),
      Stream.filter((line: Uint8Array | null): line is Uint8Array => line !== null)
    );

    return writeBytesAtomic(outputPath, selected).pipe(
      Effect.map((): SelectionStats => ({ linesRead, linesKept, linesSkipped }))
    );
  });
}
