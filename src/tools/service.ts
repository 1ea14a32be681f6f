/**
 * Effect-based runner for the external comparator and merger
 *
 * The pipeline never spawns processes directly; it asks the `ToolRunner`
 * service, so tests can swap in a layer that writes the artifacts a real
 * tool would write.
 *
 * @example Running a tool with the live layer
 * ```typescript
 * import { NodeContext } from "@effect/platform-node";
 * import { Effect, Layer } from "effect";
 * import { ToolRunner } from "./tools/service";
 *
 * const program = Effect.gen(function* () {
 *   const runner = yield* ToolRunner;
 *   return yield* runner.run({ command: "cuffcompare", args: ["-r", ref, "sample.gtf"], cwd });
 * });
 *
 * await Effect.runPromise(
 *   program.pipe(Effect.provide(ToolRunner.Live.pipe(Layer.provide(NodeContext.layer))))
 * );
 * ```
 *
 * @module tools/service
 */

import { Command, CommandExecutor } from "@effect/platform";
import { Context, Effect, Layer, Stream } from "effect";
import { ExternalToolError } from "../errors";

/**
 * One external command to run to completion
 */
export interface ToolInvocation {
  readonly command: string;
  readonly args: ReadonlyArray<string>;
  /** Working directory; the tools write their artifacts here */
  readonly cwd: string;
}

/**
 * Exit status and captured output of a finished invocation
 */
export interface ToolOutput {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Shape of the tool runner service
 */
export interface ToolRunnerShape {
  /**
   * Run a command and wait for it to exit
   *
   * Fails only when the process cannot be run at all; a non-zero exit is
   * reported in the output.
   */
  readonly run: (invocation: ToolInvocation) => Effect.Effect<ToolOutput, ExternalToolError>;
}

function collectText<E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> {
  return stream.pipe(
    Stream.decodeText(),
    Stream.runFold("", (text, chunk) => text + chunk)
  );
}

function makeLiveRunner(executor: CommandExecutor.CommandExecutor): ToolRunnerShape {
  return {
    run: (invocation) =>
      Effect.scoped(
        Effect.gen(function* () {
          const command = Command.make(invocation.command, ...invocation.args).pipe(
            Command.workingDirectory(invocation.cwd)
          );
          const process = yield* executor.start(command);
          const [exitCode, stdout, stderr] = yield* Effect.all(
            [process.exitCode, collectText(process.stdout), collectText(process.stderr)],
            { concurrency: 3 }
          );
          return { exitCode, stdout, stderr };
        })
      ).pipe(
        Effect.mapError((cause) =>
          ExternalToolError.fromSpawnFailure(invocation.command, invocation.args, cause)
        )
      ),
  };
}

/**
 * External tool runner for Effect-based dependency injection
 */
export class ToolRunner extends Context.Tag("@lincer/ToolRunner")<ToolRunner, ToolRunnerShape>() {
  /**
   * Subprocess-backed runner; needs a platform `CommandExecutor`
   * (provided by `NodeContext.layer`)
   */
  static readonly Live: Layer.Layer<ToolRunner, never, CommandExecutor.CommandExecutor> =
    Layer.effect(ToolRunner, Effect.map(CommandExecutor.CommandExecutor, makeLiveRunner));
}

/**
 * Run an invocation and fail unless it exits with status 0
 */
export function runTool(
  invocation: ToolInvocation
): Effect.Effect<ToolOutput, ExternalToolError, ToolRunner> {
  return Effect.flatMap(ToolRunner, (runner) =>
    runner.run(invocation).pipe(
      Effect.filterOrFail(
        (output) => output.exitCode === 0,
        (output) =>
          ExternalToolError.fromExitCode(
            invocation.command,
            invocation.args,
            output.exitCode,
            output.stderr
          )
      )
    )
  );
}
