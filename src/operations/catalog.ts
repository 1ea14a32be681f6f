/**
 * Final lncRNA catalog assembly
 *
 * Known lncRNA exons are kept under their own gene identity, novel isoforms
 * are folded into the known gene they extend, and wholly novel transcripts
 * become new genes named after their merged locus.
 *
 * @module operations/catalog
 */

import type { FileSystem } from "@effect/platform";
import type { Effect } from "effect";
import { LookupGapError } from "../errors";
import type { FileError } from "../errors";
import { getGtfAttribute, GtfWriter, requireGtfAttribute } from "../formats/gtf";
import type { GtfRecord } from "../formats/gtf";
import { writeStringAtomic } from "../io/file-writer";
import type { CatalogEntry, ClassificationRecord } from "../types";
import { NOVEL_GENE_CLASSIFICATIONS } from "../types";
import { compareCodeUnits } from "./core/compare";

/**
 * What to do when a novel isoform's known gene name has no gene id
 *
 * `locus` keeps the isoform's merged locus id and warns; `error` fails.
 */
export type MissingGenePolicy = "locus" | "error";

export interface CatalogOptions {
  readonly missingGenePolicy?: MissingGenePolicy;
  readonly onWarning?: (warning: string) => void;
}

function toEntry(
  record: GtfRecord,
  geneId: string,
  transcriptId: string,
  geneName: string
): CatalogEntry {
  return {
    seqname: record.seqname,
    start: record.start,
    leadingColumns: record.leadingColumns,
    geneId,
    transcriptId,
    geneName,
  };
}

/**
 * Order entries so each gene is contiguous
 *
 * Stable sort by sequence name, the gene's minimum exon start, gene id and
 * transcript id.
 */
export function sortCatalog(entries: readonly CatalogEntry[]): CatalogEntry[] {
  const geneStarts = new Map<string, number>();
  for (const entry of entries) {
    const start = geneStarts.get(entry.geneId);
    if (start === undefined || entry.start < start) {
      geneStarts.set(entry.geneId, entry.start);
    }
  }
  const geneStart = (entry: CatalogEntry): number => geneStarts.get(entry.geneId) ?? entry.start;

  return [...entries].sort(
    (a, b) =>
      compareCodeUnits(a.seqname, b.seqname) ||
      geneStart(a) - geneStart(b) ||
      compareCodeUnits(a.geneId, b.geneId) ||
      compareCodeUnits(a.transcriptId, b.transcriptId)
  );
}

/**
 * Build the sorted catalog from the known lncRNAs and the classified merged assembly
 *
 * @throws {MalformedInputError} When an exon lacks gene_id or transcript_id
 * @throws {LookupGapError} Under the `error` policy, for an isoform of an unknown gene name
 */
export function buildCatalog(
  knownRecords: Iterable<GtfRecord>,
  novelRecords: Iterable<GtfRecord>,
  classifications: Iterable<ClassificationRecord>,
  options: CatalogOptions = {}
): CatalogEntry[] {
  const policy = options.missingGenePolicy ?? "locus";
  const warn = options.onWarning ?? ((warning: string): void => console.warn(warning));

  const knownEntries: CatalogEntry[] = [];
  const geneIdsByName = new Map<string, string>();
  const unnamedGenes = new Set<string>();

  for (const record of knownRecords) {
    if (record.feature !== "exon") {
      continue;
    }
    const geneId = requireGtfAttribute(record, "gene_id");
    const transcriptId = requireGtfAttribute(record, "transcript_id");
    const geneName = getGtfAttribute(record.attributes, "gene_name");

    if (geneName === undefined) {
      if (!unnamedGenes.has(geneId)) {
        unnamedGenes.add(geneId);
        warn(`Known lncRNA gene '${geneId}' has no gene_name; using its gene_id`);
      }
      // the gene_id stands in as the name, so isoforms matched by it resolve here
      if (!geneIdsByName.has(geneId)) {
        geneIdsByName.set(geneId, geneId);
      }
      knownEntries.push(toEntry(record, geneId, transcriptId, geneId));
      continue;
    }

    if (!geneIdsByName.has(geneName)) {
      geneIdsByName.set(geneName, geneId);
    }
    knownEntries.push(toEntry(record, geneId, transcriptId, geneName));
  }

  const byTranscript = new Map<string, ClassificationRecord>();
  for (const record of classifications) {
    byTranscript.set(record.transcriptId, record);
  }

  const isoformEntries: CatalogEntry[] = [];
  const novelGeneEntries: CatalogEntry[] = [];
  const reportedGaps = new Set<string>();

  for (const record of novelRecords) {
    if (record.feature !== "exon") {
      continue;
    }
    const transcriptId = requireGtfAttribute(record, "transcript_id");
    const classified = byTranscript.get(transcriptId);
    if (classified === undefined) {
      continue;
    }
    const locusId = requireGtfAttribute(record, "gene_id");

    if (classified.classification === "novel_isoform") {
      const geneName = classified.refGeneIdLnc ?? locusId;
      let geneId = geneIdsByName.get(geneName);
      if (geneId === undefined) {
        if (policy === "error") {
          throw new LookupGapError(transcriptId, geneName);
        }
        if (!reportedGaps.has(transcriptId)) {
          reportedGaps.add(transcriptId);
          warn(
            `No known lncRNA gene_id for gene_name '${geneName}'; novel isoform '${transcriptId}' keeps locus '${locusId}'`
          );
        }
        geneId = locusId;
      }
      isoformEntries.push(toEntry(record, geneId, transcriptId, geneName));
    } else if (NOVEL_GENE_CLASSIFICATIONS.has(classified.classification)) {
      novelGeneEntries.push(toEntry(record, locusId, transcriptId, locusId));
    }
  }

  return sortCatalog([...knownEntries, ...isoformEntries, ...novelGeneEntries]);
}

/**
 * Write the catalog as header-less GTF, atomically
 */
export function writeCatalog(
  entries: Iterable<CatalogEntry>,
  outputPath: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> {
  return writeStringAtomic(outputPath, new GtfWriter().formatEntries(entries));
}
