/**
 * Atomic write tests
 */

import { existsSync, mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { NodeContext } from "@effect/platform-node";
import { Effect, Either, Stream } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  ensureDirectory,
  moveFile,
  writeBytesAtomic,
  writeStreamAtomic,
  writeStringAtomic,
} from "../../src/io/file-writer";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "lincer-write-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("writeStringAtomic", () => {
  test("replaces the destination and leaves no partial file", async () => {
    const file = join(dir, "table.tsv");
    writeFileSync(file, "old\n");

    await Effect.runPromise(writeStringAtomic(file, "new\n").pipe(Effect.provide(NodeContext.layer)));

    expect(readFileSync(file, "utf-8")).toBe("new\n");
    expect(readdirSync(dir)).toEqual(["table.tsv"]);
  });

  test("fails with a FileError when the directory is missing", async () => {
    const file = join(dir, "absent", "table.tsv");

    const result = await Effect.runPromise(
      writeStringAtomic(file, "x").pipe(Effect.either, Effect.provide(NodeContext.layer))
    );

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left.operation).toBe("write");
      expect(result.left.filePath).toBe(file);
    }
    expect(existsSync(file)).toBe(false);
  });
});

describe("writeStreamAtomic", () => {
  test("writes chunks verbatim", async () => {
    const file = join(dir, "out.gtf");

    await Effect.runPromise(
      writeStreamAtomic(file, Stream.make("a\r\n", "b\n", "c")).pipe(Effect.provide(NodeContext.layer))
    );

    expect(readFileSync(file, "utf-8")).toBe("a\r\nb\nc");
  });

  test("removes the partial file and keeps the old content when the stream fails", async () => {
    const file = join(dir, "out.gtf");
    writeFileSync(file, "previous\n");

    const failing = Stream.make("a\n").pipe(Stream.concat(Stream.fail("boom")));
    const result = await Effect.runPromise(
      writeStreamAtomic(file, failing).pipe(Effect.either, Effect.provide(NodeContext.layer))
    );

    expect(Either.isLeft(result) ? result.left : undefined).toBe("boom");
    expect(readFileSync(file, "utf-8")).toBe("previous\n");
    expect(readdirSync(dir)).toEqual(["out.gtf"]);
  });
});

describe("writeBytesAtomic", () => {
  test("writes bytes without re-encoding", async () => {
    const file = join(dir, "out.gtf");

    await Effect.runPromise(
      writeBytesAtomic(file, Stream.make(Uint8Array.from([0x63, 0xe9]), Uint8Array.from([0x0a]))).pipe(
        Effect.provide(NodeContext.layer)
      )
    );

    expect(Array.from(readFileSync(file))).toEqual([0x63, 0xe9, 0x0a]);
  });
});

describe("moveFile and ensureDirectory", () => {
  test("creates nested directories and moves files into them", async () => {
    const source = join(dir, "merged.gtf");
    const target = join(dir, "a", "b", "final.gtf");
    writeFileSync(source, "x\n");

    await Effect.runPromise(
      Effect.gen(function* () {
        yield* ensureDirectory(join(dir, "a", "b"));
        yield* ensureDirectory(join(dir, "a", "b"));
        yield* moveFile(source, target);
      }).pipe(Effect.provide(NodeContext.layer))
    );

    expect(existsSync(source)).toBe(false);
    expect(readFileSync(target, "utf-8")).toBe("x\n");
  });

  test("moveFile reports the source path", async () => {
    mkdirSync(join(dir, "dest"));
    const result = await Effect.runPromise(
      moveFile(join(dir, "nope"), join(dir, "dest", "x")).pipe(Effect.either, Effect.provide(NodeContext.layer))
    );

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left.operation).toBe("rename");
      expect(result.left.filePath).toBe(join(dir, "nope"));
    }
  });
});
