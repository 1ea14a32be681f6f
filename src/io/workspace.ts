/**
 * Scoped working directories for external tool runs
 *
 * The comparator and merger write artifacts under fixed names in their
 * working directory. Each run gets its own directory, removed with
 * everything in it when the enclosing scope closes.
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect, type Scope } from "effect";
import { FileError } from "../errors";

/**
 * Create a fresh directory under `parent`, removed when the scope closes
 *
 * Placing it next to the outputs keeps the final rename on one file system.
 */
export function makeWorkspace(
  parent: string,
  prefix: string
): Effect.Effect<string, FileError, FileSystem.FileSystem | Scope.Scope> {
  return Effect.flatMap(FileSystem.FileSystem, (fs) =>
    fs
      .makeTempDirectoryScoped({ directory: parent, prefix })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", parent, error)))
  );
}

/**
 * Symlink `target` into `workspace` as `name`, removed when the scope closes
 *
 * @returns Path of the link
 */
export function linkIntoWorkspace(
  target: string,
  workspace: string,
  name: string
): Effect.Effect<string, FileError, FileSystem.FileSystem | Path.Path | Scope.Scope> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;
    const link = path.join(workspace, name);

    return yield* Effect.acquireRelease(
      fs.symlink(path.resolve(target), link).pipe(
        Effect.as(link),
        Effect.mapError((error) => FileError.fromSystemError("link", link, error))
      ),
      (created) => fs.remove(created).pipe(Effect.ignore)
    );
  });
}
