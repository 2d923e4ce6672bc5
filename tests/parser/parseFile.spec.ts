import { describe, expect, it } from "vitest";
import { closeSync, fstatSync, openSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";

import { parseFile, parseString } from "../../src/index.js";
import type { ParseFileSystem } from "../../src/index.js";

const FIXTURE_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), "../fixtures");
const PROGRAM_PATH = resolve(FIXTURE_ROOT, "program.cq");
const MISSING_PATH = resolve(FIXTURE_ROOT, "does-not-exist.cq");

interface CountingFileSystem extends ParseFileSystem {
  readonly opened: number[];
  readonly closed: number[];
}

function countingFileSystem(): CountingFileSystem {
  const opened: number[] = [];
  const closed: number[] = [];
  return {
    opened,
    closed,
    openSync: (path, flags) => {
      const fd = openSync(path, flags);
      opened.push(fd);
      return fd;
    },
    readFileSync: (fd, encoding) => readFileSync(fd, encoding),
    closeSync: (fd) => {
      closed.push(fd);
      closeSync(fd);
    },
  };
}

describe("parseFile", () => {
  it("parses a file by path and names it in every location", () => {
    const result = parseFile(PROGRAM_PATH);

    expect(result.errors).toEqual([]);
    expect(result.root?.location.filename).toBe(PROGRAM_PATH);
    expect(result.root?.program.location.filename).toBe(PROGRAM_PATH);
  });

  it("matches parseString on the same text", () => {
    const fromFile = parseFile(PROGRAM_PATH);
    const fromString = parseString(readFileSync(PROGRAM_PATH, "utf8"), PROGRAM_PATH);

    expect(fromFile).toEqual(fromString);
  });

  it("reports a missing file as a single error without a root", () => {
    const result = parseFile(MISSING_PATH);

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].startsWith(`Failed to open input file ${MISSING_PATH}: `)).toBe(true);
    expect(result.root).toBeUndefined();
  });

  it("closes every descriptor it opens exactly once", () => {
    const fileSystem = countingFileSystem();

    for (let i = 0; i < 5; i += 1) {
      expect(parseFile(PROGRAM_PATH, { fileSystem }).errors).toEqual([]);
    }
    parseFile(MISSING_PATH, { fileSystem });

    expect(fileSystem.opened).toHaveLength(5);
    expect(fileSystem.closed).toEqual(fileSystem.opened);
  });

  it("closes the descriptor when reading fails", () => {
    const closed: number[] = [];
    const fileSystem: ParseFileSystem = {
      openSync: () => 42,
      readFileSync: () => {
        throw new Error("EISDIR: illegal operation on a directory, read");
      },
      closeSync: (fd) => {
        closed.push(fd);
      },
    };

    const result = parseFile("folder.cq", { fileSystem });

    expect(result.errors).toEqual([
      "Failed to read input file folder.cq: EISDIR: illegal operation on a directory, read",
    ]);
    expect(result.root).toBeUndefined();
    expect(closed).toEqual([42]);
  });

  it("parses from a caller-owned descriptor and leaves it open", () => {
    const fd = openSync(PROGRAM_PATH, "r");
    try {
      const result = parseFile(fd, "program.cq");

      expect(result.errors).toEqual([]);
      expect(result.root?.program.location.filename).toBe("program.cq");
      expect(() => fstatSync(fd)).not.toThrow();
    } finally {
      closeSync(fd);
    }
  });

  it("never closes a caller-owned descriptor", () => {
    const closed: number[] = [];
    const fileSystem: ParseFileSystem = {
      openSync: () => {
        throw new Error("descriptor mode must not open files");
      },
      readFileSync: () => "version 1.0\nqubits 1\n",
      closeSync: (fd) => {
        closed.push(fd);
      },
    };

    const result = parseFile(7, undefined, { fileSystem });

    expect(result.errors).toEqual([]);
    expect(result.root?.program.location.filename).toBe("<unknown>");
    expect(closed).toEqual([]);
  });
});
