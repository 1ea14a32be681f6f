/**
 * File writing on the Effect platform FileSystem
 *
 * Every pipeline output is written to a temporary sibling and renamed into
 * place, so later stages and users never observe a partial file.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Effect, Sink, Stream } from "effect";
import { FileError } from "../errors";

let partialCounter = 0;

/**
 * Temporary sibling path used while a file is being written
 *
 * Unique within the process so concurrent writers never share one.
 */
function partialPathFor(filePath: string): string {
  partialCounter += 1;
  return `${filePath}.partial-${process.pid}-${partialCounter}`;
}

/**
 * Rename the finished partial file over the destination, or remove it on failure
 */
function commit<E, R>(
  filePath: string,
  write: (partial: string) => Effect.Effect<void, E, R>
): Effect.Effect<void, E | FileError, R | FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const partial = partialPathFor(filePath);

    yield* Effect.gen(function* () {
      yield* write(partial);
      yield* fs
        .rename(partial, filePath)
        .pipe(Effect.mapError((error) => FileError.fromSystemError("rename", filePath, error)));
    }).pipe(Effect.onError(() => fs.remove(partial).pipe(Effect.ignore)));
  });
}

/**
 * Write string to file atomically (overwrites if exists, creates if not)
 *
 * @example
 * ```typescript
 * yield* writeStringAtomic("novel_transcripts.tsv", table);
 * ```
 */
export function writeStringAtomic(
  filePath: string,
  content: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> {
  return Effect.flatMap(FileSystem.FileSystem, (fs) =>
    commit(filePath, (partial) =>
      fs
        .writeFileString(partial, content)
        .pipe(Effect.mapError((error) => FileError.fromSystemError("write", filePath, error)))
    )
  );
}

/**
 * Drain a stream of bytes into a file atomically
 *
 * Chunks are written exactly as they arrive; no separators are added.
 */
export function writeBytesAtomic<E, R>(
  filePath: string,
  content: Stream.Stream<Uint8Array, E, R>
): Effect.Effect<void, E | FileError, R | FileSystem.FileSystem> {
  return Effect.flatMap(FileSystem.FileSystem, (fs) =>
    commit(filePath, (partial) =>
      Stream.run(
        content,
        fs
          .sink(partial)
          .pipe(Sink.mapError((error) => FileError.fromSystemError("write", filePath, error)))
      )
    )
  );
}

/**
 * Drain a stream of text into a file atomically, UTF-8 encoded
 */
export function writeStreamAtomic<E, R>(
  filePath: string,
  content: Stream.Stream<string, E, R>
): Effect.Effect<void, E | FileError, R | FileSystem.FileSystem> {
  return writeBytesAtomic(filePath, content.pipe(Stream.encodeText));
}

/**
 * Move a file into place
 *
 * Source and destination must share a file system for the move to be atomic.
 */
export function moveFile(
  from: string,
  to: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> {
  return Effect.flatMap(FileSystem.FileSystem, (fs) =>
    fs.rename(from, to).pipe(Effect.mapError((error) => FileError.fromSystemError("rename", from, error)))
  );
}

/**
 * Create a directory and its parents if missing
 */
export function ensureDirectory(
  directory: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> {
  return Effect.flatMap(FileSystem.FileSystem, (fs) =>
    fs
      .makeDirectory(directory, { recursive: true })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", directory, error)))
  );
}
