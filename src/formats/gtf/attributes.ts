/**
 * GTF attribute column tokenizer
 *
 * Reads `key "value"; key value; ...` into a key -> value map. Quoted values
 * may contain semicolons, spaces and backslash-escaped quotes; key order and
 * extra keys are irrelevant to lookups.
 *
 * @module gtf/attributes
 */

import { MalformedInputError } from "../../errors";
import type { GtfAttributes, GtfRecord } from "./types";

type TokenState = "betweenPairs" | "key" | "beforeValue" | "quotedValue" | "bareValue" | "afterValue";

function isSpace(char: string): boolean {
  return char === " " || char === "\t";
}

function addAttribute(attributes: GtfAttributes, key: string, value: string): void {
  const existing = attributes[key];
  if (existing === undefined) {
    attributes[key] = value;
  } else if (Array.isArray(existing)) {
    existing.push(value);
  } else {
    attributes[key] = [existing, value];
  }
}

/**
 * Parse a GTF attribute column
 *
 * @example
 * ```typescript
 * const attrs = parseGtfAttributes('gene_id "XLOC_1"; tag "a;b"; tag "c";');
 * attrs.gene_id; // "XLOC_1"
 * attrs.tag; // ["a;b", "c"]
 * ```
 *
 * @public
 */
export function parseGtfAttributes(text: string): GtfAttributes {
  // no prototype: keys such as `constructor` are ordinary attributes
  const attributes: GtfAttributes = Object.create(null);
  let state: TokenState = "betweenPairs";
  let key = "";
  let value = "";

  const flush = (quoted: boolean): void => {
    const finalValue = quoted ? value : value.trim();
    if (key !== "" && (quoted || finalValue !== "")) {
      addAttribute(attributes, key, finalValue);
    }
    key = "";
    value = "";
  };

  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);

    switch (state) {
      case "betweenPairs":
        if (!isSpace(char) && char !== ";") {
          key = char;
          state = "key";
        }
        break;

      case "key":
        if (isSpace(char)) {
          state = "beforeValue";
        } else if (char === ";") {
          key = "";
          state = "betweenPairs";
        } else {
          key += char;
        }
        break;

      case "beforeValue":
        if (char === '"') {
          state = "quotedValue";
        } else if (char === ";") {
          flush(false);
          state = "betweenPairs";
        } else if (!isSpace(char)) {
          value = char;
          state = "bareValue";
        }
        break;

      case "quotedValue":
        if (char === "\\" && text.charAt(i + 1) === '"') {
          value += '"';
          i++;
        } else if (char === '"') {
          flush(true);
          state = "afterValue";
        } else {
          value += char;
        }
        break;

      case "bareValue":
        if (char === ";") {
          flush(false);
          state = "betweenPairs";
        } else {
          value += char;
        }
        break;

      case "afterValue":
        if (char === ";") {
          state = "betweenPairs";
        }
        break;
    }
  }

  if (state === "bareValue" || state === "beforeValue") {
    flush(false);
  } else if (state === "quotedValue") {
    // unterminated quote: keep what was read
    flush(true);
  }

  return attributes;
}

/**
 * First value of an attribute, or undefined when the key is absent
 */
export function getGtfAttribute(attributes: GtfAttributes, key: string): string | undefined {
  const value = attributes[key];
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

/**
 * First value of an attribute that downstream joins cannot do without
 *
 * @throws {MalformedInputError} When the record does not carry the key
 */
export function requireGtfAttribute(
  record: Pick<GtfRecord, "attributes" | "lineNumber">,
  key: string
): string {
  const value = getGtfAttribute(record.attributes, key);
  if (value === undefined) {
    throw new MalformedInputError(`Missing required attribute '${key}'`, "GTF", undefined, record.lineNumber);
  }
  return value;
}
