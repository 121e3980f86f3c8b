/**
 * Legacy metadata-graph layout tests
 */
import { mkdirSync, mkdtempSync, rmSync, unlinkSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MalformedMetadataError, RedirectionError, StructuralViolationError } from "../src/errors.ts";
import {
  collectResourcePaths,
  createLegacyRedirection,
  listLegacyObjects,
  validateLegacyDirectory,
} from "../src/legacy.ts";

function writeText(root: string, rel: string, text: string): void {
  const file = join(root, rel);
  mkdirSync(dirname(file), { recursive: true });
  writeFileSync(file, text);
}

function writeDoc(root: string, rel: string, doc: Record<string, unknown>): void {
  writeText(root, rel, JSON.stringify(doc));
}

function frameDoc(columns: string[]): Record<string, unknown> {
  return {
    $schema: "csv_data_frame/v1.json",
    path: "df/simple.csv.gz",
    data_frame: {
      columns: columns.map((path, i) => ({ name: `col${i}`, type: "other", resource: { type: "local", path } })),
    },
  };
}

function childDoc(path: string, isChild = true): Record<string, unknown> {
  return { $schema: "hdf5_dense_array/v1.json", path, is_child: isChild };
}

/**
 * df/simple.csv.gz          frame, references one child column
 * df/column_1/simple.h5     child
 * notes.json                stand-alone document describing itself
 */
function writeValidTree(root: string): void {
  writeText(root, "df/simple.csv.gz", "placeholder-bytes");
  writeDoc(root, "df/simple.csv.gz.json", frameDoc(["df/column_1/simple.h5"]));
  writeText(root, "df/column_1/simple.h5", "placeholder-bytes");
  writeDoc(root, "df/column_1/simple.h5.json", childDoc("df/column_1/simple.h5"));
  writeDoc(root, "notes.json", { $schema: "json_simple_list/v1.json", path: "notes.json" });
}

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

function expectViolation(root: string, violation: string, message: string): void {
  const error = caught(() => validateLegacyDirectory(root));
  expect(error).toBeInstanceOf(StructuralViolationError);
  if (error instanceof StructuralViolationError) {
    expect(error.violation).toBe(violation);
    expect(error.message).toBe(message);
  }
}

function expectRedirectionError(root: string, reason: string, message: string): void {
  const error = caught(() => validateLegacyDirectory(root));
  expect(error).toBeInstanceOf(RedirectionError);
  if (error instanceof RedirectionError) {
    expect(error.reason).toBe(reason);
    expect(error.message).toBe(message);
  }
}

describe("Legacy layout", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "objdir-legacy-"));
    writeValidTree(root);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe("validateLegacyDirectory", () => {
    it("should accept a consistent directory and return the non-child objects", () => {
      expect(validateLegacyDirectory(root)).toEqual(["df/simple.csv.gz", "notes.json"]);
      expect(validateLegacyDirectory(root)).toEqual(["df/simple.csv.gz", "notes.json"]);
    });

    it("should report a referenced child flagged as non-child", () => {
      writeDoc(root, "df/column_1/simple.h5.json", childDoc("df/column_1/simple.h5", false));
      expectViolation(
        root,
        "referenced-non-child",
        "non-child object in 'df/column_1/simple.h5' is referenced by another object"
      );
    });

    it("should report a child referenced twice", () => {
      writeDoc(root, "df/simple.csv.gz.json", frameDoc(["df/column_1/simple.h5", "df/column_1/simple.h5"]));
      expectViolation(root, "duplicate-reference", "multiple references to child at 'df/column_1/simple.h5'");
    });

    it("should report a referenced child without a document", () => {
      unlinkSync(join(root, "df/column_1/simple.h5.json"));
      expectViolation(root, "missing-child", "missing child object 'df/column_1/simple.h5'");
    });

    it("should report a child nobody references", () => {
      writeText(root, "df/column_2/simple.h5", "placeholder-bytes");
      writeDoc(root, "df/column_2/simple.h5.json", childDoc("df/column_2/simple.h5"));
      expectViolation(root, "non-referenced-child", "non-referenced child object in 'df/column_2/simple.h5'");
    });

    it("should report a file no document accounts for", () => {
      writeText(root, "df/stray.txt", "placeholder-bytes");
      expectViolation(root, "unknown-file", "unknown file at 'df/stray.txt'");
    });

    it("should report a document whose path does not exist", () => {
      writeDoc(root, "ghost.json", { $schema: "csv_data_frame/v1.json", path: "ghost" });
      expectViolation(root, "non-existent-path", "metadata in 'ghost.json' references a non-existent path 'ghost'");
    });

    it("should report a document stored under the wrong name", () => {
      writeText(root, "other.txt", "placeholder-bytes");
      writeDoc(root, "other.json", { $schema: "csv_data_frame/v1.json", path: "other.txt" });
      expectViolation(root, "unexpected-path", "metadata in 'other.json' references an unexpected path 'other.txt'");
    });

    it("should report a child outside the document's directory", () => {
      writeDoc(root, "df/simple.csv.gz.json", frameDoc(["elsewhere/simple.h5"]));
      expectViolation(
        root,
        "non-nested-child",
        "metadata in 'df/simple.csv.gz.json' references non-nested child 'elsewhere/simple.h5'"
      );
    });

    it("should report a child stored beside its parent rather than below it", () => {
      writeDoc(root, "df/simple.csv.gz.json", frameDoc(["df/sibling.h5"]));
      expectViolation(
        root,
        "non-nested-child",
        "metadata in 'df/simple.csv.gz.json' references non-nested child 'df/sibling.h5'"
      );
    });

    it("should report a non-child object inside another's directory", () => {
      writeText(root, "df/inner/simple.csv", "placeholder-bytes");
      writeDoc(root, "df/inner/simple.csv.json", { $schema: "csv_data_frame/v1.json", path: "df/inner/simple.csv" });
      expectViolation(
        root,
        "nested-non-child",
        "non-child object at 'df/inner' is nested inside the directory of 'df'"
      );
    });

    it("should report a nested non-child even when a sibling sorts between them", () => {
      for (const path of ["a/x.csv", "a/c/z.csv", "a-b/y.csv"]) {
        writeText(root, path, "placeholder-bytes");
        writeDoc(root, `${path}.json`, { $schema: "csv_data_frame/v1.json", path });
      }
      expectViolation(root, "nested-non-child", "non-child object at 'a/c' is nested inside the directory of 'a'");
    });

    it("should accept non-child objects in sibling directories with a shared prefix", () => {
      for (const path of ["a/x.csv", "a-b/y.csv"]) {
        writeText(root, path, "placeholder-bytes");
        writeDoc(root, `${path}.json`, { $schema: "csv_data_frame/v1.json", path });
      }
      expect(() => validateLegacyDirectory(root)).not.toThrow();
    });

    it("should report unparseable documents", () => {
      writeText(root, "broken.json", "{ nope");
      expect(() => validateLegacyDirectory(root)).toThrow(MalformedMetadataError);
    });

    it("should report documents without a path", () => {
      writeDoc(root, "nameless.json", { $schema: "csv_data_frame/v1.json" });

      const error = caught(() => validateLegacyDirectory(root));
      expect(error).toBeInstanceOf(MalformedMetadataError);
      if (error instanceof MalformedMetadataError) {
        expect(error.field).toBe("path");
      }
    });
  });

  describe("redirections", () => {
    it("should accept a redirection to an existing object", () => {
      createLegacyRedirection(root, "alias", "df/simple.csv.gz");
      expect(validateLegacyDirectory(root)).toEqual(["df/simple.csv.gz", "notes.json"]);
    });

    it("should accept a redirection to a child object", () => {
      createLegacyRedirection(root, "short/column", "df/column_1/simple.h5");
      expect(() => validateLegacyDirectory(root)).not.toThrow();
    });

    it("should write the redirection document", () => {
      const doc = createLegacyRedirection(root, "alias", "df/simple.csv.gz");
      expect(doc).toEqual({
        $schema: "redirection/v1.json",
        path: "alias",
        redirection: { targets: [{ type: "local", location: "df/simple.csv.gz" }] },
      });
      expect(listLegacyObjects(root).alias).toEqual(doc);
    });

    it("should report a redirection to a path with no object", () => {
      createLegacyRedirection(root, "broken", "missing/thing");
      expectRedirectionError(root, "dangling-target", "invalid redirection to 'missing/thing'");
    });

    it("should report a redirection that points at itself", () => {
      createLegacyRedirection(root, "loop", "loop");
      expectRedirectionError(root, "self-reference", "invalid redirection to 'loop'");
    });

    it("should report a redirection stored under the wrong name", () => {
      writeDoc(root, "alias.json", {
        $schema: "redirection/v1.json",
        path: "other",
        redirection: { targets: [{ type: "local", location: "df/simple.csv.gz" }] },
      });
      expectRedirectionError(root, "path-mismatch", "metadata in 'alias.json' references an unexpected path 'other'");
    });

    it("should report a redirection from a path that exists", () => {
      writeText(root, "data.bin", "placeholder-bytes");
      writeDoc(root, "data.bin.json", {
        $schema: "redirection/v1.json",
        path: "data.bin",
        redirection: { targets: [{ type: "local", location: "df/simple.csv.gz" }] },
      });
      expectRedirectionError(
        root,
        "existing-source",
        "metadata in 'data.bin.json' contains a redirection from existing path 'data.bin'"
      );
    });

    it("should ignore non-local targets", () => {
      writeDoc(root, "remote.json", {
        $schema: "redirection/v1.json",
        path: "remote",
        redirection: { targets: [{ type: "url", location: "https://example.invalid/thing" }] },
      });
      expect(() => validateLegacyDirectory(root)).not.toThrow();
    });

    it("should refuse to create a redirection over an existing document", () => {
      const error = caught(() => createLegacyRedirection(root, "df/simple.csv.gz", "notes.json"));
      expect(error).toBeInstanceOf(RedirectionError);
      if (error instanceof RedirectionError) {
        expect(error.reason).toBe("existing-source");
        expect(error.message).toBe("cannot create a short-hand link over existing file 'df/simple.csv.gz.json'");
      }
    });
  });

  describe("listLegacyObjects", () => {
    it("should skip child documents by default", () => {
      expect(Object.keys(listLegacyObjects(root))).toEqual(["df/simple.csv.gz", "notes.json"]);
    });

    it("should include children on request", () => {
      const all = listLegacyObjects(root, { ignoreChildren: false });
      expect(Object.keys(all)).toEqual(["df/column_1/simple.h5", "df/simple.csv.gz", "notes.json"]);
      expect(all["df/column_1/simple.h5"]?.$schema).toBe("hdf5_dense_array/v1.json");
    });
  });

  describe("collectResourcePaths", () => {
    it("should find resources at any depth, arrays included", () => {
      const doc = {
        path: "x",
        a: { resource: { path: "x/one" } },
        b: [{ nested: { resource: { path: "x/two" } } }, { resource: { path: "x/three" } }],
      };
      expect(collectResourcePaths(doc)).toEqual(["x/one", "x/two", "x/three"]);
    });

    it("should stop at the first resource entry of an object", () => {
      const doc = { resource: { path: "x/outer", inner: { resource: { path: "x/inner" } } } };
      expect(collectResourcePaths(doc)).toEqual(["x/outer"]);
    });

    it("should ignore resources without a string path", () => {
      expect(collectResourcePaths({ resource: { path: 3 } })).toEqual([]);
      expect(collectResourcePaths("resource")).toEqual([]);
    });
  });
});
