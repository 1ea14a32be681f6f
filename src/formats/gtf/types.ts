/**
 * Core GTF format type definitions
 *
 * @module gtf/types
 */

import type { ParserOptions, Strand } from "../../types";

/**
 * Parsed attribute column: repeated keys collect their values in order
 */
export type GtfAttributes = Partial<Record<string, string | string[]>>;

/**
 * GTF annotation line
 *
 * @public
 */
export interface GtfRecord {
  /** Chromosome or sequence name (e.g., "chr1", "chrX") */
  readonly seqname: string;
  /** Annotation source (e.g., "Cufflinks", "HAVANA") */
  readonly source: string;
  /** Feature type (e.g., "transcript", "exon") */
  readonly feature: string;
  /** Start coordinate (1-based inclusive) */
  readonly start: number;
  /** End coordinate (1-based inclusive) */
  readonly end: number;
  readonly score: number | null;
  readonly strand: Strand;
  readonly frame: number | null;
  readonly attributes: GtfAttributes;
  /** Attribute column exactly as written */
  readonly rawAttributes: string;
  /** Columns 1-8 exactly as written, for byte-faithful re-emission */
  readonly leadingColumns: readonly string[];
  /** end - start + 1 */
  readonly length: number;
  readonly lineNumber?: number;
}

/**
 * GTF parser configuration options
 *
 * @public
 */
export interface GtfParserOptions extends ParserOptions {
  /** Feature types to include (default: all) */
  includeFeatures?: string[];
  /** Attributes every included record must carry */
  requiredAttributes?: string[];
}

/** Columns in a GTF line */
export const GTF_FIELD_COUNT = 9;
