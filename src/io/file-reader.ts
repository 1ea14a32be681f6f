/**
 * File reading on the Effect platform FileSystem
 *
 * Annotation files are read as streams of raw lines. Parsers take decoded
 * text; copying callers take the undecoded bytes so output matches input.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Stream } from "effect";
import { FileError } from "../errors";

const LINE_BREAK = /(?<=\n)/;
const NEWLINE = 0x0a;
const EMPTY_BYTES: Uint8Array = new Uint8Array(0);

function concatBytes(head: Uint8Array, tail: Uint8Array): Uint8Array {
  const joined = new Uint8Array(head.length + tail.length);
  joined.set(head);
  joined.set(tail, head.length);
  return joined;
}

/**
 * Split decoded text chunks into lines, keeping each line's terminator
 *
 * A final line without a terminator is emitted as-is once the input ends.
 */
export function splitRawLines<E, R>(chunks: Stream.Stream<string, E, R>): Stream.Stream<string, E, R> {
  return Stream.suspend(() => {
    let pending = "";

    const lines = chunks.pipe(
      Stream.mapConcat((chunk) => {
        const parts = (pending + chunk).split(LINE_BREAK);
        const last = parts[parts.length - 1] ?? "";
        if (last.endsWith("\n")) {
          pending = "";
        } else {
          pending = last;
          parts.pop();
        }
        return parts;
      })
    );

    return lines.pipe(
      Stream.concat(Stream.suspend(() => (pending === "" ? Stream.empty : Stream.make(pending))))
    );
  });
}

/**
 * Split byte chunks into lines on LF, keeping each line's terminator
 *
 * No decoding happens, so bytes that are not valid UTF-8 survive untouched.
 */
export function splitRawLineBytes<E, R>(
  chunks: Stream.Stream<Uint8Array, E, R>
): Stream.Stream<Uint8Array, E, R> {
  return Stream.suspend(() => {
    let pending: Uint8Array = EMPTY_BYTES;

    const lines = chunks.pipe(
      Stream.mapConcat((chunk) => {
        const complete: Uint8Array[] = [];
        let start = 0;
        let newline = chunk.indexOf(NEWLINE, start);
        while (newline !== -1) {
          complete.push(concatBytes(pending, chunk.subarray(start, newline + 1)));
          pending = EMPTY_BYTES;
          start = newline + 1;
          newline = chunk.indexOf(NEWLINE, start);
        }
        if (start < chunk.length) {
          pending = concatBytes(pending, chunk.subarray(start));
        }
        return complete;
      })
    );

    return lines.pipe(
      Stream.concat(Stream.suspend(() => (pending.length === 0 ? Stream.empty : Stream.make(pending))))
    );
  });
}

/**
 * Stream a file as raw byte lines, terminators included
 */
export function readRawLineBytes(
  filePath: string
): Stream.Stream<Uint8Array, FileError, FileSystem.FileSystem> {
  return Stream.unwrap(
    Effect.map(FileSystem.FileSystem, (fs) =>
      splitRawLineBytes(fs.stream(filePath)).pipe(
        Stream.mapError((error) => FileError.fromSystemError("read", filePath, error))
      )
    )
  );
}

/**
 * Stream a text file line by line with line terminators preserved
 *
 * @example
 * ```typescript
 * const lines = readRawLines("sample.gtf").pipe(Stream.runCollect);
 * ```
 */
export function readRawLines(filePath: string): Stream.Stream<string, FileError, FileSystem.FileSystem> {
  return Stream.unwrap(
    Effect.map(FileSystem.FileSystem, (fs) =>
      splitRawLines(fs.stream(filePath).pipe(Stream.decodeText())).pipe(
        Stream.mapError((error) => FileError.fromSystemError("read", filePath, error))
      )
    )
  );
}

/**
 * Strip the line terminator from a raw line
 */
export function stripLineEnding(line: string): string {
  if (line.endsWith("\r\n")) {
    return line.slice(0, -2);
  }
  if (line.endsWith("\n") || line.endsWith("\r")) {
    return line.slice(0, -1);
  }
  return line;
}

/**
 * Check whether a path exists
 */
export function exists(filePath: string): Effect.Effect<boolean, FileError, FileSystem.FileSystem> {
  return Effect.flatMap(FileSystem.FileSystem, (fs) =>
    fs.exists(filePath).pipe(
      Effect.mapError((error) => FileError.fromSystemError("stat", filePath, error))
    )
  );
}
