/**
 * Command-line entry point
 *
 *   lincer SAMPLE_SHEET REFERENCE_GTF LNCRNA_GTF [options]
 */

import { readFileSync } from "node:fs";
import type { CommandExecutor } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { type } from "arktype";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { Effect, Either, Layer } from "effect";
import { type PipelineConfig, resolveConfig } from "./config";
import { LincerError, UsageError } from "./errors";
import type { MissingGenePolicy } from "./operations/catalog";
import { type PipelineInputs, runPipeline } from "./pipeline/run";
import { consoleReporter, type Reporter } from "./reporter";
import { ToolRunner } from "./tools/service";

const PROGRAM_NAME = "lincer";

export const USAGE = `Usage:
    ${PROGRAM_NAME} SAMPLE_SHEET REFERENCE_GTF LNCRNA_GTF [options]

    SAMPLE_SHEET is a two-column tab-delimited table with no header that maps
    sample names to GTFs of de novo transcript assemblies (e.g. Cufflinks).

    Column  Column
    Number  Name         Example           Description
    ------  -----------  ----------------  -----------------------------------
    1       sample_name  WT_day0_rep1      the condition label for this sample
    2       gtf_path     WT_day0_rep1.gtf  path to gtf of de novo transcripts

    REFERENCE_GTF contains all annotated transcripts.
    LNCRNA_GTF contains all known lncRNA transcripts.

    Run '${PROGRAM_NAME} --help' for options.
`;

const PackageJsonSchema = type({ version: "string" });

function readVersion(): string {
  const pkg = PackageJsonSchema(
    JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"))
  );
  return pkg instanceof type.errors ? "0.0.0" : pkg.version;
}

/**
 * Where the CLI writes and which tool runner it uses
 */
export interface CliEnvironment {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly reporter: Reporter;
  readonly tools: Layer.Layer<ToolRunner, never, CommandExecutor.CommandExecutor>;
}

const defaultEnvironment: CliEnvironment = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  reporter: consoleReporter,
  tools: ToolRunner.Live,
};

interface CliOptions {
  outdir: string;
  comparator: string;
  merger: string;
  minLength?: number;
  minExons?: number;
  minCoverage?: number;
  concurrency?: number;
  onMissingGene?: string;
}

export interface ParsedArguments {
  readonly inputs: PipelineInputs;
  readonly config: PipelineConfig;
}

function parseInteger(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  return Number(value);
}

function parseDecimal(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || Number.isNaN(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function isMissingGenePolicy(value: string): value is MissingGenePolicy {
  return value === "locus" || value === "error";
}

function createProgram(env: CliEnvironment): Command {
  return new Command()
    .name(PROGRAM_NAME)
    .description("Discover and classify novel lncRNAs from de novo transcript assemblies")
    .version(readVersion())
    .argument("[sample_sheet]", "tab-delimited sample_name/gtf_path table")
    .argument("[reference_gtf]", "annotation of all known transcripts")
    .argument("[lncrna_gtf]", "annotation of known lncRNA transcripts")
    .option("-o, --outdir <dir>", "directory for all outputs", ".")
    .option("--comparator <cmd>", "transcript comparator executable", "cuffcompare")
    .option("--merger <cmd>", "assembly merger executable", "cuffmerge")
    .option("--min-length <n>", "minimum transcript length (default: 200)", parseInteger)
    .option("--min-exons <n>", "minimum exon count (default: 2)", parseInteger)
    .option("--min-coverage <x>", "minimum coverage (default: 3.0)", parseDecimal)
    .option("-j, --concurrency <n>", "samples processed at once (default: 1)", parseInteger)
    .addOption(
      new Option("--on-missing-gene <policy>", "novel isoform of a gene name with no gene_id")
        .choices(["locus", "error"])
        .default("locus")
    )
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({ writeOut: env.stdout, writeErr: env.stderr });
}

/**
 * Parse command-line arguments into pipeline inputs and configuration
 *
 * @throws {UsageError} When a positional argument is missing
 * @throws {ValidationError} When an option value is out of range
 * @throws {CommanderError} For unknown options, bad values, --help and --version
 */
export function parseArguments(
  argv: readonly string[],
  env: CliEnvironment = defaultEnvironment
): ParsedArguments {
  const program = createProgram(env);
  program.parse([...argv], { from: "user" });

  const [sampleSheetPath, referencePath, lncRnaPath] = program.args;
  if (
    typeof sampleSheetPath !== "string" ||
    typeof referencePath !== "string" ||
    typeof lncRnaPath !== "string"
  ) {
    throw new UsageError("Missing required arguments", USAGE);
  }

  const options = program.opts<CliOptions>();
  const policy = options.onMissingGene ?? "locus";

  return {
    inputs: { sampleSheetPath, referencePath, lncRnaPath },
    config: resolveConfig({
      outputDirectory: options.outdir,
      comparator: { command: options.comparator },
      merger: { command: options.merger },
      thresholds: {
        ...(options.minLength !== undefined && { minLength: options.minLength }),
        ...(options.minExons !== undefined && { minExonCount: options.minExons }),
        ...(options.minCoverage !== undefined && { minCoverage: options.minCoverage }),
      },
      ...(options.concurrency !== undefined && { concurrency: options.concurrency }),
      ...(isMissingGenePolicy(policy) && { missingGenePolicy: policy }),
    }),
  };
}

/**
 * Run the CLI and resolve to its exit status
 */
export async function main(
  argv: readonly string[],
  overrides: Partial<CliEnvironment> = {}
): Promise<number> {
  const env: CliEnvironment = { ...defaultEnvironment, ...overrides };

  let parsed: ParsedArguments;
  try {
    parsed = parseArguments(argv, env);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof UsageError) {
      env.stdout(error.usage);
      return 1;
    }
    if (error instanceof LincerError) {
      env.stderr(`${error.toString()}\n`);
      return 1;
    }
    throw error;
  }

  const result = await Effect.runPromise(
    runPipeline(parsed.inputs, parsed.config, env.reporter).pipe(
      Effect.provide(env.tools.pipe(Layer.provideMerge(NodeContext.layer))),
      Effect.either
    )
  );

  if (Either.isLeft(result)) {
    env.stderr(`${result.left.toString()}\n`);
    return 1;
  }

  env.reporter.onProgress(`Catalog: ${result.right.catalogPath} (${result.right.catalogEntries} exons)`);
  return 0;
}
