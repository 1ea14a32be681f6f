/**
 * DSV Format Type Definitions
 *
 * Types for the tab-delimited tables the pipeline reads (comparator maps,
 * sample sheets) and writes (audit and classification tables).
 */

import type { ParserOptions } from "../../types";

/**
 * Supported delimiter types for DSV formats
 */
export type DelimiterType = "\t" | "," | "|" | ";";

/**
 * How a data row whose width differs from the header is handled
 *
 * `error` rejects it, `pad` fills missing columns with "" and drops extras.
 */
export type RaggedRowPolicy = "error" | "pad";

/**
 * One data row of a delimited table
 */
export interface DSVRecord {
  /** Column values in file order */
  readonly fields: readonly string[];
  /** Values by header name; empty when the table has no header */
  readonly columns: Readonly<Partial<Record<string, string>>>;
  readonly lineNumber?: number;
}

/**
 * DSV parser options extending base parser options
 */
export interface DSVParserOptions extends ParserOptions {
  delimiter?: DelimiterType;
  /** Whether the first record line names the columns (default: true) */
  header?: boolean;
  raggedRows?: RaggedRowPolicy;
}

/**
 * DSV writer options for output formatting
 */
export interface DSVWriterOptions {
  delimiter?: DelimiterType;
  lineEnding?: "\n" | "\r\n";
  /** Text written for null or undefined values (default: "-") */
  nullValue?: string;
}

export const DEFAULT_DELIMITERS = {
  tsv: "\t",
  csv: ",",
} as const satisfies Record<string, DelimiterType>;
