/**
 * Pipeline configuration
 *
 * Defaults reproduce the published filter thresholds and tool names; the
 * command line overrides them and the result is validated before any work
 * starts.
 */

import { type } from "arktype";
import { ValidationError } from "./errors";
import type { MissingGenePolicy } from "./operations/catalog";
import type { NoveltyThresholds } from "./operations/novelty-filter";
import { DEFAULT_NOVELTY_THRESHOLDS } from "./operations/novelty-filter";
import { DEFAULT_COMPARATOR } from "./tools/cuffcompare";
import { DEFAULT_MERGER } from "./tools/cuffmerge";
import { CLASS_CODES } from "./types";

export interface PipelineConfig {
  /** Where every output and tool workspace goes */
  readonly outputDirectory: string;
  readonly comparator: {
    readonly command: string;
    readonly outputPrefix: string;
  };
  readonly merger: {
    readonly command: string;
    readonly outputDirectory: string;
  };
  readonly thresholds: NoveltyThresholds;
  /** Samples processed at once */
  readonly concurrency: number;
  readonly missingGenePolicy: MissingGenePolicy;
}

export const DEFAULT_CONFIG: PipelineConfig = {
  outputDirectory: ".",
  comparator: DEFAULT_COMPARATOR,
  merger: DEFAULT_MERGER,
  thresholds: DEFAULT_NOVELTY_THRESHOLDS,
  concurrency: 1,
  missingGenePolicy: "locus",
};

/**
 * Names of the files the pipeline writes
 */
export const OUTPUT_FILES = {
  sampleSummary: (sample: string): string => `${sample}.summary.tsv`,
  sampleNovel: (sample: string): string => `${sample}.novel.gtf`,
  mergedTranscripts: "novel_transcripts.gtf",
  classifications: "novel_transcripts.tsv",
  catalog: "lncRNA_catalog.gtf",
} as const;

const PipelineConfigSchema = type({
  outputDirectory: "string > 0",
  comparator: {
    command: "string > 0",
    outputPrefix: "string > 0",
  },
  merger: {
    command: "string > 0",
    outputDirectory: "string > 0",
  },
  thresholds: {
    minLength: "number >= 0",
    minExonCount: "number >= 1",
    minCoverage: "number >= 0",
    classCodes: type.enumerated(...CLASS_CODES).array().atLeastLength(1),
  },
  concurrency: "number >= 1",
  missingGenePolicy: "'locus' | 'error'",
}).narrow((config, ctx) => {
  if (!Number.isInteger(config.concurrency)) {
    return ctx.reject("concurrency must be an integer");
  }
  if (!Number.isInteger(config.thresholds.minExonCount)) {
    return ctx.reject("minExonCount must be an integer");
  }
  return true;
});

/**
 * Partial configuration as given by a caller; nested groups merge with defaults
 */
export interface PipelineConfigOverrides {
  readonly outputDirectory?: string;
  readonly comparator?: Partial<PipelineConfig["comparator"]>;
  readonly merger?: Partial<PipelineConfig["merger"]>;
  readonly thresholds?: Partial<NoveltyThresholds>;
  readonly concurrency?: number;
  readonly missingGenePolicy?: MissingGenePolicy;
}

/**
 * Merge overrides onto the defaults and validate the result
 *
 * @throws {ValidationError} When a value is out of range
 */
export function resolveConfig(overrides: PipelineConfigOverrides = {}): PipelineConfig {
  const config: PipelineConfig = {
    outputDirectory: overrides.outputDirectory ?? DEFAULT_CONFIG.outputDirectory,
    comparator: { ...DEFAULT_CONFIG.comparator, ...overrides.comparator },
    merger: { ...DEFAULT_CONFIG.merger, ...overrides.merger },
    thresholds: { ...DEFAULT_CONFIG.thresholds, ...overrides.thresholds },
    concurrency: overrides.concurrency ?? DEFAULT_CONFIG.concurrency,
    missingGenePolicy: overrides.missingGenePolicy ?? DEFAULT_CONFIG.missingGenePolicy,
  };

  const validation = PipelineConfigSchema(config);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid pipeline configuration: ${validation.summary}`);
  }
  return config;
}
