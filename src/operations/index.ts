/**
 * lncRNA discovery operations
 *
 * Pure record transformations plus the two steps that stream files
 * (line selection and catalog output).
 *
 * @module operations
 */

export { aggregateTranscripts, exonCoverage } from "./aggregate";

export type { CatalogOptions, MissingGenePolicy } from "./catalog";
export { buildCatalog, sortCatalog, writeCatalog } from "./catalog";

export type { ClassificationInput, ClassificationRule } from "./classify";
export {
  CLASSIFICATION_COLUMNS,
  CLASSIFICATION_RULES,
  classifyNovelTranscripts,
  classifyTranscript,
  formatClassificationTable,
  joinComparisons,
  summarizeClassifications,
} from "./classify";

export { compareCodeUnits, sortByKey } from "./core/compare";

export type { NoveltyThresholds } from "./novelty-filter";
export {
  DEFAULT_NOVELTY_THRESHOLDS,
  formatSummaryTable,
  joinSummaries,
  NoveltyFilter,
  SUMMARY_COLUMNS,
  selectNovelTranscripts,
} from "./novelty-filter";

export type { SelectionStats } from "./select";
export { selectGtfLines, transcriptIdOfLine } from "./select";
