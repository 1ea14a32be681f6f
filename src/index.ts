/**
 * lincer - discovery and classification of novel lncRNAs
 *
 * Filters de novo transcript assemblies down to novel, long, well-covered,
 * multi-exonic transcripts, merges them across samples, classifies them
 * against the reference and known-lncRNA annotations, and folds them into a
 * single lncRNA catalog.
 */

// Configuration
export {
  DEFAULT_CONFIG,
  OUTPUT_FILES,
  type PipelineConfig,
  type PipelineConfigOverrides,
  resolveConfig,
} from "./config";
// Error types
export {
  attempt,
  ExternalToolError,
  FileError,
  LincerError,
  LookupGapError,
  MalformedInputError,
  toLincerError,
  UsageError,
  ValidationError,
} from "./errors";
// Delimited tables
export { DSVParser, DSVWriter, TSVParser, TSVWriter } from "./formats/dsv";
// GTF format
export {
  formatCatalogAttributes,
  getGtfAttribute,
  GtfParser,
  GtfWriter,
  parseGtfAttributes,
  parseGtfLine,
  requireGtfAttribute,
} from "./formats/gtf";
export type { GtfAttributes, GtfParserOptions, GtfRecord } from "./formats/gtf";
// File I/O infrastructure
export { readRawLineBytes, readRawLines, splitRawLineBytes, splitRawLines } from "./io/file-reader";
export { writeBytesAtomic, writeStreamAtomic, writeStringAtomic } from "./io/file-writer";
// Operations
export * from "./operations";
// Pipeline
export {
  type PipelineInputs,
  type PipelineResult,
  processSample,
  runPipeline,
  type SampleResult,
} from "./pipeline/run";
export { loadSampleSheet } from "./pipeline/sample-sheet";
export { consoleReporter, type Reporter, silentReporter } from "./reporter";
// External tools
export {
  type ComparatorOptions,
  compareTranscripts,
  DEFAULT_COMPARATOR,
  parseTmap,
} from "./tools/cuffcompare";
export { DEFAULT_MERGER, mergeAssemblies, type MergerOptions } from "./tools/cuffmerge";
export {
  runTool,
  type ToolInvocation,
  type ToolOutput,
  ToolRunner,
  type ToolRunnerShape,
} from "./tools/service";
// Core types
export type {
  CatalogEntry,
  Classification,
  ClassificationRecord,
  ClassCode,
  ComparisonRecord,
  Sample,
  Strand,
  SummaryRow,
  TranscriptSummary,
} from "./types";
export { CLASS_CODES, CLASSIFICATIONS, NOVEL_GENE_CLASSIFICATIONS } from "./types";
