/**
 * Core GTF format parser
 *
 * Reads the nine tab-delimited GTF columns into typed records while keeping
 * the original column text, so records can be filtered, joined and re-emitted
 * without disturbing anything they did not change.
 *
 * @module gtf/parser
 */

import { type } from "arktype";
import { MalformedInputError, ValidationError } from "../../errors";
import type { Strand } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { getGtfAttribute, parseGtfAttributes } from "./attributes";
import type { GtfParserOptions, GtfRecord } from "./types";
import { GTF_FIELD_COUNT } from "./types";

/**
 * ArkType validation for GTF parser options
 */
const GtfParserOptionsSchema = type({
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "includeFeatures?": "string[]",
  "requiredAttributes?": "string[]",
}).narrow((options, ctx) => {
  if (options.maxLineLength !== undefined && options.maxLineLength > 10_000_000) {
    return ctx.reject("maxLineLength cannot exceed 10MB");
  }
  return true;
});

const COORDINATE = /^\d+$/;

/**
 * Validate strand annotation for GTF format
 *
 * @public
 */
export function validateGtfStrand(strand: string): strand is Strand {
  return strand === "+" || strand === "-" || strand === ".";
}

/**
 * Parse score field (may be "." for missing)
 *
 * @public
 */
export function parseGtfScore(scoreStr: string): number | null {
  if (scoreStr === "." || scoreStr === "") {
    return null;
  }
  const score = Number.parseFloat(scoreStr);
  return Number.isNaN(score) ? null : score;
}

/**
 * Parse frame field ("." for non-coding features)
 *
 * @public
 */
export function parseGtfFrame(frameStr: string): number | null {
  if (frameStr === "0" || frameStr === "1" || frameStr === "2") {
    return Number(frameStr);
  }
  return null;
}

function parseCoordinate(value: string, name: string, lineNumber?: number): number {
  if (!COORDINATE.test(value)) {
    throw new MalformedInputError(
      `Invalid ${name} coordinate '${value}'`,
      "GTF",
      undefined,
      lineNumber
    );
  }
  return Number(value);
}

/**
 * Parse a single GTF line (terminator already stripped)
 *
 * @throws {MalformedInputError} On missing columns or invalid coordinates/strand
 *
 * @public
 */
export function parseGtfLine(line: string, lineNumber?: number): GtfRecord {
  const fields = line.split("\t");

  if (fields.length < GTF_FIELD_COUNT) {
    throw new MalformedInputError(
      `Expected ${GTF_FIELD_COUNT} tab-delimited columns, found ${fields.length}`,
      "GTF",
      undefined,
      lineNumber
    );
  }

  const [seqname = "", source = "", feature = "", startStr = "", endStr = "", scoreStr = "", strandStr = "", frameStr = ""] =
    fields;
  const rawAttributes = fields.slice(GTF_FIELD_COUNT - 1).join("\t");

  const start = parseCoordinate(startStr, "start", lineNumber);
  const end = parseCoordinate(endStr, "end", lineNumber);
  if (start < 1 || end < start) {
    throw new MalformedInputError(
      `Invalid interval ${start}-${end}: GTF coordinates are 1-based with start <= end`,
      "GTF",
      undefined,
      lineNumber
    );
  }

  if (!validateGtfStrand(strandStr)) {
    throw new MalformedInputError(`Invalid strand '${strandStr}'`, "GTF", undefined, lineNumber);
  }

  return {
    seqname,
    source,
    feature,
    start,
    end,
    score: parseGtfScore(scoreStr),
    strand: strandStr,
    frame: parseGtfFrame(frameStr),
    attributes: parseGtfAttributes(rawAttributes),
    rawAttributes,
    leadingColumns: fields.slice(0, GTF_FIELD_COUNT - 1),
    length: end - start + 1,
    ...(lineNumber !== undefined && { lineNumber }),
  };
}

/**
 * Streaming GTF parser
 *
 * @example Exons of an assembly
 * ```typescript
 * const parser = new GtfParser({ includeFeatures: ["exon"] });
 * const exons = yield* parser.parseFile("sample.gtf");
 * ```
 *
 * @public
 */
export class GtfParser extends AbstractParser<GtfRecord, GtfParserOptions> {
  private readonly includeFeatures: ReadonlySet<string> | null;
  private readonly requiredAttributes: readonly string[];

  constructor(options: GtfParserOptions = {}) {
    super(GtfParser.validateOptions(options));
    this.includeFeatures =
      options.includeFeatures !== undefined ? new Set(options.includeFeatures) : null;
    this.requiredAttributes = options.requiredAttributes ?? [];
  }

  private static validateOptions(options: GtfParserOptions): GtfParserOptions {
    const validationResult = GtfParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid GTF parser options: ${validationResult.summary}`);
    }
    return options;
  }

  protected getFormatName(): string {
    return "GTF";
  }

  protected parseRecord(line: string, lineNumber: number): GtfRecord | null {
    const record = parseGtfLine(line, this.settings.trackLineNumbers ? lineNumber : undefined);

    if (record.rawAttributes.includes("\t")) {
      this.settings.onWarning("Attribute column contains tabs; extra columns read as attributes", lineNumber);
    }

    if (this.includeFeatures !== null && !this.includeFeatures.has(record.feature)) {
      return null;
    }

    for (const key of this.requiredAttributes) {
      if (getGtfAttribute(record.attributes, key) === undefined) {
        throw new MalformedInputError(
          `Missing required attribute '${key}' on ${record.feature} record`,
          "GTF",
          undefined,
          lineNumber
        );
      }
    }

    return record;
  }
}
