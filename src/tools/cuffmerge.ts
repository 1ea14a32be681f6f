/**
 * Sample merge driver for the cuffmerge assembly merger
 *
 * @module tools/cuffmerge
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import { FileError, type LincerError, MalformedInputError } from "../errors";
import { exists } from "../io/file-reader";
import { moveFile } from "../io/file-writer";
import { makeWorkspace } from "../io/workspace";
import { runTool, type ToolRunner } from "./service";

export interface MergerOptions {
  /** Executable name or path */
  readonly command: string;
  /** Directory, relative to the working directory, the merger writes into */
  readonly outputDirectory: string;
  /** Directory under which the per-run workspace is created */
  readonly workspaceParent: string;
}

export const DEFAULT_MERGER = {
  command: "cuffmerge",
  outputDirectory: "merged_asm",
} as const;

export const MANIFEST_FILE = "novel_transcript_gtfs.txt";
export const MERGED_FILE = "merged.gtf";

/**
 * Manifest content: one absolute path per line
 */
export function formatManifest(assemblyPaths: readonly string[]): string {
  return assemblyPaths.map((assemblyPath) => `${assemblyPath}\n`).join("");
}

/**
 * Union several filtered assemblies into one transcript set at `outputPath`
 *
 * The manifest, the merger's output directory and its logs live in a scoped
 * workspace that is removed once the merged file has been moved out.
 *
 * @returns The output path
 */
export function mergeAssemblies(
  assemblyPaths: readonly string[],
  outputPath: string,
  options: MergerOptions
): Effect.Effect<string, LincerError, ToolRunner | FileSystem.FileSystem | Path.Path> {
  return Effect.scoped(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const path = yield* Path.Path;

      const workspace = yield* makeWorkspace(options.workspaceParent, `${options.command}-`);
      const manifestPath = path.join(workspace, MANIFEST_FILE);
      const manifest = formatManifest(assemblyPaths.map((assemblyPath) => path.resolve(assemblyPath)));
      yield* fs
        .writeFileString(manifestPath, manifest)
        .pipe(Effect.mapError((error) => FileError.fromSystemError("write", manifestPath, error)));

      yield* runTool({ command: options.command, args: [MANIFEST_FILE], cwd: workspace });

      const mergedPath = path.join(workspace, options.outputDirectory, MERGED_FILE);
      if (!(yield* exists(mergedPath))) {
        return yield* Effect.fail(
          new MalformedInputError(
            `${options.command} produced no merged assembly`,
            "GTF",
            path.join(options.outputDirectory, MERGED_FILE)
          )
        );
      }

      yield* moveFile(mergedPath, outputPath);
      return outputPath;
    })
  );
}
