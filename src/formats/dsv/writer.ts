/**
 * @module formats/dsv/writer
 * @description Delimiter-separated table writer
 *
 * Values are written unquoted; absent values become the configured null
 * marker so every row keeps the header's width.
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import type { DSVWriterOptions } from "./types";
import { DEFAULT_DELIMITERS } from "./types";

const DSVWriterOptionsSchema = type({
  "delimiter?": type.enumerated("\t", ",", "|", ";"),
  "lineEnding?": type.enumerated("\n", "\r\n"),
  "nullValue?": "string",
});

export type DSVValue = string | number | null | undefined;

/**
 * DSVWriter - header plus rows, one terminated line each
 *
 * @example
 * ```typescript
 * new TSVWriter().formatTable(["transcript_id", "length"], [["T1", 250]]);
 * // "transcript_id\tlength\nT1\t250\n"
 * ```
 */
export class DSVWriter {
  private readonly delimiter: string;
  private readonly lineEnding: string;
  private readonly nullValue: string;

  constructor(options: DSVWriterOptions = {}) {
    const validation = DSVWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV writer options: ${validation.summary}`);
    }

    this.delimiter = options.delimiter ?? DEFAULT_DELIMITERS.tsv;
    this.lineEnding = options.lineEnding ?? "\n";
    this.nullValue = options.nullValue ?? "-";
  }

  private formatField(value: DSVValue): string {
    if (value === null || value === undefined) {
      return this.nullValue;
    }
    const field = String(value);
    if (field.includes(this.delimiter) || field.includes("\n") || field.includes("\r")) {
      throw new ValidationError(`Value '${field}' cannot be written unquoted`);
    }
    return field;
  }

  /**
   * Format a row of fields (no terminator)
   */
  formatRow(fields: readonly DSVValue[]): string {
    return fields.map((field) => this.formatField(field)).join(this.delimiter);
  }

  /**
   * Format a header row followed by data rows
   *
   * @throws {ValidationError} When a row is not as wide as the header
   */
  formatTable(header: readonly string[], rows: Iterable<readonly DSVValue[]>): string {
    let content = this.formatRow(header) + this.lineEnding;
    for (const row of rows) {
      if (row.length !== header.length) {
        throw new ValidationError(`Row has ${row.length} fields, header has ${header.length}`);
      }
      content += this.formatRow(row) + this.lineEnding;
    }
    return content;
  }
}

/**
 * TSVWriter - convenience writer with tab delimiter
 */
export class TSVWriter extends DSVWriter {
  constructor(options: Omit<DSVWriterOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: DEFAULT_DELIMITERS.tsv });
  }
}
