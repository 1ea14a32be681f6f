/**
 * @module formats/dsv/parser
 * @description Delimiter-separated table parser
 *
 * The tables the pipeline consumes are tool output and hand-written sheets:
 * one record per line, no quoting. Values are split on the delimiter and
 * kept as written.
 */

import { type } from "arktype";
import { MalformedInputError, ValidationError } from "../../errors";
import { AbstractParser } from "../abstract-parser";
import type { DSVParserOptions, DSVRecord } from "./types";
import { DEFAULT_DELIMITERS } from "./types";

const DSVParserOptionsSchema = type({
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "delimiter?": type.enumerated("\t", ",", "|", ";"),
  "header?": "boolean",
  "raggedRows?": "'error' | 'pad'",
});

/**
 * DSVParser - line-oriented delimited table parser
 *
 * @example Tool output with a header row
 * ```typescript
 * const parser = new TSVParser();
 * const rows = yield* parser.parseFile("cuffcmp.sample.gtf.tmap");
 * rows[0]?.columns.class_code; // "u"
 * ```
 */
export class DSVParser extends AbstractParser<DSVRecord, DSVParserOptions> {
  private readonly delimiter: string;
  private readonly hasHeader: boolean;
  private headers: string[] | null = null;

  constructor(options: DSVParserOptions = {}) {
    const validation = DSVParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV parser options: ${validation.summary}`);
    }

    super(options);
    this.delimiter = options.delimiter ?? DEFAULT_DELIMITERS.tsv;
    this.hasHeader = options.header ?? true;
  }

  protected getFormatName(): string {
    switch (this.delimiter) {
      case ",":
        return "CSV";
      case "\t":
        return "TSV";
      default:
        return "DSV";
    }
  }

  protected override reset(): void {
    this.headers = null;
  }

  /**
   * Column names read from the header row of the last parsed input
   */
  getHeaders(): readonly string[] | null {
    return this.headers;
  }

  protected parseRecord(line: string, lineNumber: number): DSVRecord | null {
    let fields = line.split(this.delimiter);

    if (this.hasHeader && this.headers === null) {
      this.headers = fields.map((field) => field.trim());
      return null;
    }

    const columns: Partial<Record<string, string>> = {};
    if (this.headers !== null) {
      fields = this.fitToHeader(fields, this.headers.length, lineNumber);
      this.headers.forEach((name, index) => {
        columns[name] = fields[index];
      });
    }

    return {
      fields,
      columns,
      ...(this.settings.trackLineNumbers && { lineNumber }),
    };
  }

  private fitToHeader(fields: string[], width: number, lineNumber: number): string[] {
    if (fields.length === width) {
      return fields;
    }
    if ((this.options.raggedRows ?? "error") === "error") {
      throw new MalformedInputError(
        `Expected ${width} columns, found ${fields.length}`,
        this.getFormatName(),
        undefined,
        lineNumber
      );
    }
    this.settings.onWarning(`Expected ${width} columns, found ${fields.length}`, lineNumber);
    if (fields.length > width) {
      return fields.slice(0, width);
    }
    return [...fields, ...Array.from({ length: width - fields.length }, () => "")];
  }
}

/**
 * CSV Parser - convenience wrapper with comma delimiter
 */
export class CSVParser extends DSVParser {
  constructor(options: Omit<DSVParserOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: DEFAULT_DELIMITERS.csv });
  }
}

/**
 * TSV Parser - convenience wrapper with tab delimiter
 */
export class TSVParser extends DSVParser {
  constructor(options: Omit<DSVParserOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: DEFAULT_DELIMITERS.tsv });
  }
}
