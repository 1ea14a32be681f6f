/**
 * Abstract base parser for line-oriented annotation and table formats
 *
 * Provides the shared line loop (terminator stripping, comment skipping,
 * length limits, AbortSignal support, line-number bookkeeping) so each
 * format only implements how a single record line is read.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Stream } from "effect";
import { attempt, LincerError, MalformedInputError } from "../errors";
import { readRawLines, stripLineEnding } from "../io/file-reader";
import type { ParserOptions } from "../types";

/**
 * Base options after defaults have been applied
 */
interface ResolvedParserOptions {
  readonly maxLineLength: number;
  readonly trackLineNumbers: boolean;
  readonly signal: AbortSignal | undefined;
  readonly onWarning: (warning: string, lineNumber?: number) => void;
}

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions;
  protected readonly settings: ResolvedParserOptions;

  constructor(options: TOptions) {
    this.options = options;
    this.settings = {
      maxLineLength: options.maxLineLength ?? 1_000_000,
      trackLineNumbers: options.trackLineNumbers ?? true,
      signal: options.signal,
      onWarning:
        options.onWarning ??
        ((warning: string, lineNumber?: number): void => {
          console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
        }),
    };
  }

  /**
   * Get format name for error messages and logging
   */
  protected abstract getFormatName(): string;

  /**
   * Parse one record line (terminator stripped, never empty or a comment)
   *
   * @returns The record, or null when the line is valid but filtered out
   */
  protected abstract parseRecord(line: string, lineNumber: number): T | null;

  /**
   * Clear per-input state before a new input is parsed
   */
  protected reset(): void {}

  /**
   * Check if parsing operation should be aborted
   */
  protected checkAborted(): void {
    if (this.settings.signal?.aborted === true) {
      throw new LincerError(`${this.getFormatName()} parsing was aborted`, "ABORTED");
    }
  }

  /**
   * Parse a raw line, skipping blank lines and `#` comments
   */
  protected parseLine(rawLine: string, lineNumber: number): T | null {
    this.checkAborted();

    const line = stripLineEnding(rawLine);
    if (line.trim() === "" || line.startsWith("#")) {
      return null;
    }

    if (line.length > this.settings.maxLineLength) {
      throw new MalformedInputError(
        `Line too long (${line.length} > ${this.settings.maxLineLength})`,
        this.getFormatName(),
        undefined,
        lineNumber
      );
    }

    return this.parseRecord(line, lineNumber);
  }

  /**
   * Parse records from already-split lines
   *
   * @param lines - Lines with or without their terminators
   */
  *parseLines(lines: Iterable<string>): Generator<T> {
    this.reset();
    let lineNumber = 0;

    for (const line of lines) {
      lineNumber++;
      const record = this.parseLine(line, lineNumber);
      if (record !== null) {
        yield record;
      }
    }
  }

  /**
   * Parse records from string data
   */
  parseString(data: string): T[] {
    return Array.from(this.parseLines(data.split(/\r?\n/)));
  }

  /**
   * Parse every record of a file, streaming it line by line
   *
   * Line-level errors are reported with the file path attached.
   */
  parseFile(filePath: string): Effect.Effect<T[], LincerError, FileSystem.FileSystem> {
    return Effect.suspend(() => {
      this.reset();

      return readRawLines(filePath).pipe(
        Stream.zipWithIndex,
        Stream.mapEffect(([line, index]) => attempt(() => this.parseLine(line, index + 1), filePath)),
        Stream.filter((record: T | null): record is T => record !== null),
        Stream.runCollect,
        Effect.map((records) => Array.from(records))
      );
    });
  }
}
