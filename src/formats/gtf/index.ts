/**
 * GTF (Gene Transfer Format) module exports
 *
 * @example Exon records of an assembly
 * ```typescript
 * import { GtfParser, requireGtfAttribute } from "./formats/gtf";
 *
 * const parser = new GtfParser({ includeFeatures: ["exon"] });
 * for (const exon of parser.parseString(gtfData)) {
 *   console.log(requireGtfAttribute(exon, "transcript_id"), exon.length);
 * }
 * ```
 *
 * @module gtf
 */

export { getGtfAttribute, parseGtfAttributes, requireGtfAttribute } from "./attributes";

export {
  GtfParser,
  parseGtfFrame,
  parseGtfLine,
  parseGtfScore,
  validateGtfStrand,
} from "./parser";

export type { GtfAttributes, GtfParserOptions, GtfRecord } from "./types";

export { GTF_FIELD_COUNT } from "./types";

export { formatCatalogAttributes, GtfWriter } from "./writer";
