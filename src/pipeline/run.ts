/**
 * Pipeline orchestration
 *
 * Per sample: aggregate, compare, filter and select. Then merge the
 * selections, classify the merged transcripts and fold them into the known
 * lncRNA annotation. Stages hand records to each other in memory; each file
 * written along the way is an export, replaced atomically.
 *
 * @module pipeline/run
 */

import type { FileSystem } from "@effect/platform";
import { Path } from "@effect/platform";
import { Effect } from "effect";
import { OUTPUT_FILES, type PipelineConfig } from "../config";
import { attempt, type LincerError } from "../errors";
import { GtfParser } from "../formats/gtf";
import { ensureDirectory, writeStringAtomic } from "../io/file-writer";
import { aggregateTranscripts } from "../operations/aggregate";
import { buildCatalog, writeCatalog } from "../operations/catalog";
import {
  classifyNovelTranscripts,
  formatClassificationTable,
  summarizeClassifications,
} from "../operations/classify";
import { formatSummaryTable, joinSummaries, NoveltyFilter } from "../operations/novelty-filter";
import { type SelectionStats, selectGtfLines } from "../operations/select";
import { consoleReporter, type Reporter } from "../reporter";
import { type ComparatorOptions, compareTranscripts } from "../tools/cuffcompare";
import { mergeAssemblies } from "../tools/cuffmerge";
import type { ToolRunner } from "../tools/service";
import type { Classification, ClassificationRecord, Sample } from "../types";
import { loadSampleSheet } from "./sample-sheet";

export interface PipelineInputs {
  readonly sampleSheetPath: string;
  /** Annotation of every known transcript */
  readonly referencePath: string;
  /** Annotation of the known lncRNAs */
  readonly lncRnaPath: string;
}

export interface SampleResult {
  readonly sample: Sample;
  readonly summaryPath: string;
  readonly novelPath: string;
  /** Transcripts with at least one exon */
  readonly transcripts: number;
  /** Transcripts that passed the novelty filter */
  readonly novelTranscripts: number;
  readonly selection: SelectionStats;
}

export interface PipelineResult {
  readonly samples: readonly SampleResult[];
  readonly mergedPath: string;
  readonly classificationsPath: string;
  readonly catalogPath: string;
  readonly classifications: readonly ClassificationRecord[];
  readonly counts: Record<Classification, number>;
  readonly catalogEntries: number;
}

type PipelineServices = ToolRunner | FileSystem.FileSystem | Path.Path;

function progress(reporter: Reporter, message: string): Effect.Effect<void> {
  return Effect.sync(() => reporter.onProgress(message));
}

function exonParser(filePath: string, reporter: Reporter): GtfParser {
  return new GtfParser({
    includeFeatures: ["exon"],
    onWarning: (warning, lineNumber) =>
      reporter.onWarning(`${filePath}:${lineNumber ?? "?"}: ${warning}`),
  });
}

function comparatorOptions(config: PipelineConfig): ComparatorOptions {
  return { ...config.comparator, workspaceParent: config.outputDirectory };
}

/**
 * Find the novel, long, well-covered, multi-exonic transcripts of one sample
 *
 * Writes `<sample>.summary.tsv` (every transcript, before filtering) and
 * `<sample>.novel.gtf` (the selected transcripts' lines, verbatim).
 */
export function processSample(
  sample: Sample,
  referencePath: string,
  config: PipelineConfig,
  reporter: Reporter = consoleReporter
): Effect.Effect<SampleResult, LincerError, PipelineServices> {
  return Effect.gen(function* () {
    const path = yield* Path.Path;
    const summaryPath = path.join(config.outputDirectory, OUTPUT_FILES.sampleSummary(sample.name));
    const novelPath = path.join(config.outputDirectory, OUTPUT_FILES.sampleNovel(sample.name));

    yield* progress(reporter, `Processing: ${sample.name}`);
    yield* progress(reporter, `  Summary: ${summaryPath}`);
    yield* progress(reporter, `  GTF Out: ${novelPath}`);

    const exons = yield* exonParser(sample.gtfPath, reporter).parseFile(sample.gtfPath);
    const summaries = yield* attempt(() => aggregateTranscripts(exons), sample.gtfPath);
    const comparisons = yield* compareTranscripts(
      referencePath,
      sample.gtfPath,
      comparatorOptions(config)
    );

    const rows = joinSummaries(summaries, comparisons);
    yield* writeStringAtomic(summaryPath, formatSummaryTable(rows));

    const keep = new NoveltyFilter(config.thresholds).select(rows);
    const selection = yield* selectGtfLines(sample.gtfPath, novelPath, keep);

    yield* progress(reporter, `  Kept ${keep.size} of ${summaries.size} transcripts`);

    return {
      sample,
      summaryPath,
      novelPath,
      transcripts: summaries.size,
      novelTranscripts: keep.size,
      selection,
    };
  });
}

/**
 * Run the whole discovery pipeline
 *
 * @example
 * ```typescript
 * const result = yield* runPipeline(
 *   { sampleSheetPath: "samples.tsv", referencePath: "ref.gtf", lncRnaPath: "lnc.gtf" },
 *   resolveConfig({ outputDirectory: "out" })
 * );
 * result.counts.intergenic;
 * ```
 */
export function runPipeline(
  inputs: PipelineInputs,
  config: PipelineConfig,
  reporter: Reporter = consoleReporter
): Effect.Effect<PipelineResult, LincerError, PipelineServices> {
  return Effect.gen(function* () {
    const path = yield* Path.Path;
    const output = (name: string): string => path.join(config.outputDirectory, name);

    yield* ensureDirectory(config.outputDirectory);

    yield* progress(reporter, "Loading sample sheet.");
    yield* progress(reporter, `  src: ${inputs.sampleSheetPath}`);
    const samples = yield* loadSampleSheet(inputs.sampleSheetPath);

    const sampleResults = yield* Effect.forEach(
      samples,
      (sample) => processSample(sample, inputs.referencePath, config, reporter),
      { concurrency: config.concurrency }
    );

    yield* progress(reporter, "Merging novel transcripts.");
    const mergedPath = yield* mergeAssemblies(
      sampleResults.map((result) => result.novelPath),
      output(OUTPUT_FILES.mergedTranscripts),
      { ...config.merger, workspaceParent: config.outputDirectory }
    );

    yield* progress(reporter, "Classifying novel transcripts.");
    yield* progress(reporter, `  ref gtf: ${inputs.referencePath}`);
    yield* progress(reporter, `  lnc gtf: ${inputs.lncRnaPath}`);
    const classifications = yield* classifyNovelTranscripts(
      inputs.referencePath,
      inputs.lncRnaPath,
      mergedPath,
      comparatorOptions(config)
    );
    const classificationsPath = output(OUTPUT_FILES.classifications);
    yield* writeStringAtomic(classificationsPath, formatClassificationTable(classifications));

    const counts = summarizeClassifications(classifications);
    for (const [label, count] of Object.entries(counts)) {
      yield* progress(reporter, `  ${label}: ${count}`);
    }

    const catalogPath = output(OUTPUT_FILES.catalog);
    yield* progress(reporter, "Writing lncRNA GTF.");
    yield* progress(reporter, `  final gtf: ${catalogPath}`);
    const known = yield* exonParser(inputs.lncRnaPath, reporter).parseFile(inputs.lncRnaPath);
    const novel = yield* exonParser(mergedPath, reporter).parseFile(mergedPath);
    const entries = yield* attempt(() =>
      buildCatalog(known, novel, classifications, {
        missingGenePolicy: config.missingGenePolicy,
        onWarning: reporter.onWarning,
      })
    );
    yield* writeCatalog(entries, catalogPath);

    return {
      samples: sampleResults,
      mergedPath,
      classificationsPath,
      catalogPath,
      classifications,
      counts,
      catalogEntries: entries.length,
    };
  });
}
