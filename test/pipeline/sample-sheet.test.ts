/**
 * Sample sheet tests
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { NodeContext } from "@effect/platform-node";
import { Effect, Either } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { MalformedInputError } from "../../src/errors";
import { loadSampleSheet } from "../../src/pipeline/sample-sheet";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "lincer-sheet-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function load(content: string) {
  const sheet = join(dir, "samples.tsv");
  writeFileSync(sheet, content);
  return Effect.runPromise(loadSampleSheet(sheet).pipe(Effect.either, Effect.provide(NodeContext.layer)));
}

describe("loadSampleSheet", () => {
  test("reads samples in order and resolves paths against the sheet", async () => {
    const result = await load("# name\tpath\nWT_day0_rep1\tassemblies/wt.gtf\n\nKO_day0_rep1\t/data/ko.gtf\n");

    expect(Either.isRight(result) ? result.right : undefined).toEqual([
      { name: "WT_day0_rep1", gtfPath: join(dir, "assemblies", "wt.gtf") },
      { name: "KO_day0_rep1", gtfPath: "/data/ko.gtf" },
    ]);
  });

  test("rejects a row without a path", async () => {
    const result = await load("WT\twt.gtf\nKO\n");

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(MalformedInputError);
      expect(result.left.lineNumber).toBe(2);
    }
  });

  test("rejects duplicate sample names", async () => {
    const result = await load("WT\ta.gtf\nWT\tb.gtf\n");

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left.message).toBe(`Duplicate sample name 'WT' in ${join(dir, "samples.tsv")}`);
    }
  });

  test("rejects a sheet without samples", async () => {
    const result = await load("# nothing here\n");

    expect(Either.isLeft(result) && result.left instanceof MalformedInputError).toBe(true);
  });
});
