/**
 * Catalog assembly tests
 */

import { describe, expect, test } from "vitest";
import { LookupGapError } from "../../src/errors";
import { GtfParser, GtfWriter } from "../../src/formats/gtf";
import { buildCatalog, sortCatalog } from "../../src/operations/catalog";
import type { CatalogEntry, Classification, ClassificationRecord } from "../../src/types";

const parse = (lines: string[]) => new GtfParser().parseString(lines.join("\n"));

const known = parse([
  'chr1\tHAVANA\texon\t5000\t5100\t.\t+\t.\tgene_id "ENSG2"; transcript_id "ENST2"; gene_name "LINC2";',
  'chr1\tHAVANA\ttranscript\t1000\t1700\t.\t+\t.\tgene_id "ENSG1"; transcript_id "ENST1"; gene_name "LINC1";',
  'chr1\tHAVANA\texon\t1000\t1200\t.\t+\t.\tgene_id "ENSG1"; transcript_id "ENST1"; gene_name "LINC1";',
  'chr1\tHAVANA\texon\t1500\t1700\t.\t+\t.\tgene_id "ENSG1"; transcript_id "ENST1"; gene_name "LINC1";',
]);

const novel = parse([
  'chr1\tCufflinks\texon\t900\t1200\t.\t+\t.\tgene_id "XLOC_1"; transcript_id "TCONS_1"; exon_number "1";',
  'chr1\tCufflinks\texon\t1500\t1600\t.\t+\t.\tgene_id "XLOC_1"; transcript_id "TCONS_1"; exon_number "2";',
  'chr1\tCufflinks\texon\t3000\t3300\t.\t-\t.\tgene_id "XLOC_2"; transcript_id "TCONS_2";',
  'chr1\tCufflinks\texon\t3500\t3600\t.\t-\t.\tgene_id "XLOC_2"; transcript_id "TCONS_2";',
  'chr1\tCufflinks\texon\t7000\t7300\t.\t+\t.\tgene_id "XLOC_3"; transcript_id "TCONS_3";',
  'chr1\tCufflinks\texon\t7400\t7500\t.\t+\t.\tgene_id "XLOC_3"; transcript_id "TCONS_3";',
]);

function classified(
  transcriptId: string,
  classification: Classification,
  refGeneIdLnc: string | null = null
): ClassificationRecord {
  return {
    transcriptId,
    classCodeAll: "u",
    refIdAll: null,
    refGeneIdAll: null,
    classCodeLnc: refGeneIdLnc === null ? "u" : "j",
    refIdLnc: null,
    refGeneIdLnc,
    classification,
  };
}

const render = (entries: CatalogEntry[]) => new GtfWriter().formatEntries(entries);

describe("buildCatalog", () => {
  test("folds novel isoforms into known genes and names novel genes by locus", () => {
    const entries = buildCatalog(known, novel, [
      classified("TCONS_1", "novel_isoform", "LINC1"),
      classified("TCONS_2", "antisense"),
      classified("TCONS_3", "not_a_lncRNA"),
    ]);

    expect(render(entries)).toBe(
      [
        'chr1\tHAVANA\texon\t1000\t1200\t.\t+\t.\tgene_id "ENSG1"; transcript_id "ENST1"; gene_name "LINC1";',
        'chr1\tHAVANA\texon\t1500\t1700\t.\t+\t.\tgene_id "ENSG1"; transcript_id "ENST1"; gene_name "LINC1";',
        'chr1\tCufflinks\texon\t900\t1200\t.\t+\t.\tgene_id "ENSG1"; transcript_id "TCONS_1"; gene_name "LINC1";',
        'chr1\tCufflinks\texon\t1500\t1600\t.\t+\t.\tgene_id "ENSG1"; transcript_id "TCONS_1"; gene_name "LINC1";',
        'chr1\tCufflinks\texon\t3000\t3300\t.\t-\t.\tgene_id "XLOC_2"; transcript_id "TCONS_2"; gene_name "XLOC_2";',
        'chr1\tCufflinks\texon\t3500\t3600\t.\t-\t.\tgene_id "XLOC_2"; transcript_id "TCONS_2"; gene_name "XLOC_2";',
        'chr1\tHAVANA\texon\t5000\t5100\t.\t+\t.\tgene_id "ENSG2"; transcript_id "ENST2"; gene_name "LINC2";',
        "",
      ].join("\n")
    );
  });

  test("keeps every gene contiguous", () => {
    const entries = buildCatalog(known, novel, [
      classified("TCONS_1", "novel_isoform", "LINC1"),
      classified("TCONS_2", "intronic"),
      classified("TCONS_3", "intergenic"),
    ]);

    const order = entries.map((entry) => entry.geneId).filter((id, i, ids) => ids[i - 1] !== id);
    expect(order).toEqual(["ENSG1", "XLOC_2", "ENSG2", "XLOC_3"]);
  });

  test("drops known isoforms and artifacts", () => {
    const entries = buildCatalog(known, novel, [
      classified("TCONS_1", "known_isoform", "LINC1"),
      classified("TCONS_2", "possible_artifact", "LINC2"),
    ]);

    expect(entries.map((entry) => entry.transcriptId)).toEqual(["ENST1", "ENST1", "ENST2"]);
  });

  test("keeps the locus id for an isoform of an unknown gene name and warns once", () => {
    const warnings: string[] = [];
    const entries = buildCatalog(known, novel, [classified("TCONS_1", "novel_isoform", "LINC404")], {
      onWarning: (warning) => warnings.push(warning),
    });

    expect(entries.filter((entry) => entry.transcriptId === "TCONS_1")).toMatchObject([
      { geneId: "XLOC_1", geneName: "LINC404" },
      { geneId: "XLOC_1", geneName: "LINC404" },
    ]);
    expect(warnings).toEqual([
      "No known lncRNA gene_id for gene_name 'LINC404'; novel isoform 'TCONS_1' keeps locus 'XLOC_1'",
    ]);
  });

  test("raises a lookup gap under the error policy", () => {
    expect(() =>
      buildCatalog(known, novel, [classified("TCONS_1", "novel_isoform", "LINC404")], {
        missingGenePolicy: "error",
      })
    ).toThrow(LookupGapError);
  });

  test("names unnamed known genes by gene_id", () => {
    const warnings: string[] = [];
    const entries = buildCatalog(
      parse([
        'chr2\tsrc\texon\t1\t10\t.\t+\t.\tgene_id "ENSG9"; transcript_id "ENST9";',
        'chr2\tsrc\texon\t20\t30\t.\t+\t.\tgene_id "ENSG9"; transcript_id "ENST9";',
      ]),
      [],
      [],
      { onWarning: (warning) => warnings.push(warning) }
    );

    expect(entries.map((entry) => entry.geneName)).toEqual(["ENSG9", "ENSG9"]);
    expect(warnings).toEqual(["Known lncRNA gene 'ENSG9' has no gene_name; using its gene_id"]);
  });

  test("folds an isoform of an unnamed known gene into that gene", () => {
    const warnings: string[] = [];
    const entries = buildCatalog(
      parse(['chr2\tsrc\texon\t1\t10\t.\t+\t.\tgene_id "ENSG9"; transcript_id "ENST9";']),
      parse(['chr2\tCufflinks\texon\t5\t25\t.\t+\t.\tgene_id "XLOC_9"; transcript_id "TCONS_9";']),
      [classified("TCONS_9", "novel_isoform", "ENSG9")],
      { missingGenePolicy: "error", onWarning: (warning) => warnings.push(warning) }
    );

    expect(entries.map((entry) => [entry.transcriptId, entry.geneId, entry.geneName])).toEqual([
      ["ENST9", "ENSG9", "ENSG9"],
      ["TCONS_9", "ENSG9", "ENSG9"],
    ]);
    expect(warnings).toEqual(["Known lncRNA gene 'ENSG9' has no gene_name; using its gene_id"]);
  });

  test("maps a gene name to its first gene id in file order", () => {
    const entries = buildCatalog(
      parse([
        'chr1\tsrc\texon\t100\t200\t.\t+\t.\tgene_id "ENSG_A"; transcript_id "ENST_A"; gene_name "DUP";',
        'chr1\tsrc\texon\t300\t400\t.\t+\t.\tgene_id "ENSG_B"; transcript_id "ENST_B"; gene_name "DUP";',
      ]),
      novel,
      [classified("TCONS_1", "novel_isoform", "DUP")]
    );

    expect(entries.find((entry) => entry.transcriptId === "TCONS_1")?.geneId).toBe("ENSG_A");
  });
});

describe("sortCatalog", () => {
  const entry = (seqname: string, start: number, geneId: string, transcriptId: string): CatalogEntry => ({
    seqname,
    start,
    leadingColumns: [seqname, "src", "exon", String(start), String(start + 10), ".", "+", "."],
    geneId,
    transcriptId,
    geneName: geneId,
  });

  test("orders by sequence name by code unit, then gene start, gene id and transcript id", () => {
    const sorted = sortCatalog([
      entry("chr2", 5, "G3", "T3"),
      entry("chr10", 50, "G2", "T2"),
      entry("chr1", 100, "G1", "T1b"),
      entry("chr1", 100, "G1", "T1a"),
      entry("chr1", 100, "G0", "T0"),
    ]);

    expect(sorted.map((e) => `${e.seqname}:${e.geneId}:${e.transcriptId}`)).toEqual([
      "chr1:G0:T0",
      "chr1:G1:T1a",
      "chr1:G1:T1b",
      "chr10:G2:T2",
      "chr2:G3:T3",
    ]);
  });

  test("keeps exon order within a transcript", () => {
    const sorted = sortCatalog([entry("chr1", 300, "G1", "T1"), entry("chr1", 100, "G1", "T1")]);

    expect(sorted.map((e) => e.start)).toEqual([300, 100]);
  });
});
