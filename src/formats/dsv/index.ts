/**
 * @module formats/dsv
 * @description Delimiter-separated table support
 *
 * @example Reading a header-less sheet
 * ```typescript
 * import { TSVParser } from "./formats/dsv";
 *
 * const parser = new TSVParser({ header: false });
 * for (const row of parser.parseString(sheet)) {
 *   console.log(row.fields);
 * }
 * ```
 */

export type {
  DelimiterType,
  DSVParserOptions,
  DSVRecord,
  DSVWriterOptions,
  RaggedRowPolicy,
} from "./types";

export { DEFAULT_DELIMITERS } from "./types";

export { CSVParser, DSVParser, TSVParser } from "./parser";

export type { DSVValue } from "./writer";

export { DSVWriter, TSVWriter } from "./writer";
