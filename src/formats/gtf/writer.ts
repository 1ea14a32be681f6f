/**
 * GTF format writer for catalog output
 *
 * @module gtf/writer
 */

import type { CatalogEntry } from "../../types";

/**
 * Render the catalog attribute column
 *
 * Values are written as-is inside the quotes; nothing is escaped.
 */
export function formatCatalogAttributes(
  entry: Pick<CatalogEntry, "geneId" | "transcriptId" | "geneName">
): string {
  return `gene_id "${entry.geneId}"; transcript_id "${entry.transcriptId}"; gene_name "${entry.geneName}";`;
}

/**
 * GTF writer for catalog entries
 *
 * @example
 * ```typescript
 * const writer = new GtfWriter();
 * writer.formatEntry(entry);
 * // chr1\tCufflinks\texon\t100\t200\t.\t+\t.\tgene_id "G1"; transcript_id "T1"; gene_name "LINC1";
 * ```
 *
 * @public
 */
export class GtfWriter {
  /**
   * Format one catalog entry as a 9-column GTF line (no terminator)
   */
  formatEntry(entry: CatalogEntry): string {
    return [...entry.leadingColumns, formatCatalogAttributes(entry)].join("\t");
  }

  /**
   * Format entries as GTF content, one terminated line per entry, no header
   */
  formatEntries(entries: Iterable<CatalogEntry>): string {
    let content = "";
    for (const entry of entries) {
      content += `${this.formatEntry(entry)}\n`;
    }
    return content;
  }
}
