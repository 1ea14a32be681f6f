/**
 * Comparison adapter tests
 */

import { mkdtempSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { NodeContext } from "@effect/platform-node";
import { Effect, Either, Layer } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ExternalToolError, MalformedInputError } from "../../src/errors";
import { compareTranscripts, DEFAULT_COMPARATOR, parseTmap } from "../../src/tools/cuffcompare";
import {
  createFailingTools,
  createFakeTools,
  createPipelineTools,
  type FakeTools,
  fakeComparator,
  tmap,
} from "../utils/tool-layers";

let dir: string;
let query: string;
let reference: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "lincer-cmp-"));
  query = join(dir, "sample.gtf");
  reference = join(dir, "reference.gtf");
  writeFileSync(query, 'chr1\tCufflinks\texon\t1\t10\t.\t+\t.\tgene_id "CUFF.1"; transcript_id "CUFF.1.1";\n');
  writeFileSync(reference, "");
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function compare(tools: FakeTools) {
  return Effect.runPromise(
    compareTranscripts(reference, query, { ...DEFAULT_COMPARATOR, workspaceParent: dir }).pipe(
      Effect.either,
      Effect.provide(Layer.merge(tools.layer, NodeContext.layer))
    )
  );
}

describe("parseTmap", () => {
  test("normalizes '-' ids to null and keys by cuff_id", () => {
    const records = parseTmap(
      tmap([
        { cuffId: "CUFF.1.1", classCode: "j", refId: "ENST1", refGeneId: "LINC1" },
        { cuffId: "CUFF.2.1", classCode: "u" },
      ])
    );

    expect(records.get("CUFF.1.1")).toEqual({
      transcriptId: "CUFF.1.1",
      classCode: "j",
      refId: "ENST1",
      refGeneId: "LINC1",
    });
    expect(records.get("CUFF.2.1")).toEqual({
      transcriptId: "CUFF.2.1",
      classCode: "u",
      refId: null,
      refGeneId: null,
    });
  });

  test("keeps the first row of a repeated transcript", () => {
    const records = parseTmap(
      tmap([
        { cuffId: "CUFF.1.1", classCode: "c", refId: "A" },
        { cuffId: "CUFF.1.1", classCode: "o", refId: "B" },
      ])
    );

    expect(records.get("CUFF.1.1")?.classCode).toBe("c");
    expect(records.size).toBe(1);
  });

  test("rejects a table without the class_code column", () => {
    expect(() => parseTmap("ref_gene_id\tref_id\tcuff_id\n-\t-\tCUFF.1.1\n")).toThrow(
      MalformedInputError
    );
  });

  test("keeps class codes outside the usual set", () => {
    const records = parseTmap(tmap([{ cuffId: "CUFF.1.1", classCode: "k", refId: "ENST3", refGeneId: "GENE3" }]));

    expect(records.get("CUFF.1.1")).toEqual({
      transcriptId: "CUFF.1.1",
      classCode: "k",
      refId: "ENST3",
      refGeneId: "GENE3",
    });
  });

  test("rejects an empty class code", () => {
    expect(() => parseTmap(tmap([{ cuffId: "CUFF.1.1", classCode: "" }]))).toThrow(MalformedInputError);
  });
});

describe("compareTranscripts", () => {
  test("runs the comparator in a workspace and reads its table", async () => {
    const tools = createPipelineTools(
      () => tmap([{ cuffId: "CUFF.1.1", classCode: "x", refId: "ENST7", refGeneId: "GENE7" }]),
      () => ""
    );

    const result = await compare(tools);

    expect(Either.isRight(result)).toBe(true);
    if (Either.isRight(result)) {
      expect(result.right.get("CUFF.1.1")?.classCode).toBe("x");
    }

    const [call] = tools.calls;
    expect(call?.command).toBe("cuffcompare");
    expect(call?.args).toEqual(["-r", reference, "sample.gtf"]);
    expect(call?.cwd.startsWith(join(dir, "cuffcmp-"))).toBe(true);
  });

  test("removes the workspace, link and artifacts afterwards", async () => {
    const tools = createPipelineTools(() => tmap([{ cuffId: "CUFF.1.1", classCode: "u" }]), () => "");

    await compare(tools);

    expect(readdirSync(dir).sort()).toEqual(["reference.gtf", "sample.gtf"]);
  });

  test("gives concurrent runs separate workspaces", async () => {
    const tools = createPipelineTools(() => tmap([{ cuffId: "CUFF.1.1", classCode: "u" }]), () => "");

    await Effect.runPromise(
      Effect.all(
        [1, 2, 3].map(() =>
          compareTranscripts(reference, query, { ...DEFAULT_COMPARATOR, workspaceParent: dir })
        ),
        { concurrency: 3 }
      ).pipe(Effect.provide(Layer.merge(tools.layer, NodeContext.layer)))
    );

    expect(new Set(tools.calls.map((call) => call.cwd)).size).toBe(3);
    expect(readdirSync(dir).sort()).toEqual(["reference.gtf", "sample.gtf"]);
  });

  test("fails with the exit code and stderr when the comparator fails", async () => {
    const result = await compare(createFailingTools(1, "Error: could not open reference\n"));

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      const error = result.left;
      expect(error).toBeInstanceOf(ExternalToolError);
      if (error instanceof ExternalToolError) {
        expect(error.exitCode).toBe(1);
        expect(error.stderr).toBe("Error: could not open reference\n");
        expect(error.toString()).toContain("Stderr (last lines):\nError: could not open reference");
      }
    }
    expect(readdirSync(dir).sort()).toEqual(["reference.gtf", "sample.gtf"]);
  });

  test("fails when the comparator writes no table", async () => {
    const result = await compare(createFakeTools(() => ({ exitCode: 0, stdout: "", stderr: "" })));

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(MalformedInputError);
      expect(result.left.message).toContain("cuffcompare produced no class-code table for 'sample.gtf'");
    }
  });

  test("honors a custom command and artifact prefix", async () => {
    const tools = createFakeTools((invocation) => {
      const output = fakeComparator(invocation, () => tmap([{ cuffId: "CUFF.1.1", classCode: "i" }]));
      writeFileSync(
        join(invocation.cwd, "cmp.sample.gtf.tmap"),
        tmap([{ cuffId: "CUFF.1.1", classCode: "i" }])
      );
      return output;
    });

    const result = await Effect.runPromise(
      compareTranscripts(reference, query, {
        command: "/opt/bin/cuffcompare",
        outputPrefix: "cmp",
        workspaceParent: dir,
      }).pipe(Effect.provide(Layer.merge(tools.layer, NodeContext.layer)))
    );

    expect(result.get("CUFF.1.1")?.classCode).toBe("i");
    expect(tools.calls[0]?.command).toBe("/opt/bin/cuffcompare");
    expect(tools.calls[0]?.cwd.startsWith(join(dir, "cmp-"))).toBe(true);
  });
});
