/**
 * simple_list handler tests
 */
import { readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { createObjectValidator, StructuralViolationError } from "@objdir/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { saveAtomicVector } from "../src/atomic-vector.ts";
import { createDefaultRegistry } from "../src/registry.ts";
import { readSimpleList, saveSimpleList, type SavableObject } from "../src/simple-list.ts";
import { caught, createTempDir } from "./helpers.ts";

function booleanVector(values: Array<boolean | null>): SavableObject {
  return { kind: "object", save: (path) => saveAtomicVector(path, { kind: "boolean", values }) };
}

describe("simple_list", () => {
  let root: string;
  let dir: string;
  const registry = createDefaultRegistry();
  const validator = createObjectValidator({ registry });

  const writeContents = (doc: unknown): void => {
    writeFileSync(join(dir, "list_contents.json"), JSON.stringify(doc));
  };

  beforeEach(() => {
    root = createTempDir("list");
    dir = join(root, "list");
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe("saveSimpleList", () => {
    beforeEach(() => {
      saveSimpleList(dir, {
        items: [
          { kind: "integer", values: [1, 2] },
          { kind: "number", values: [NaN, 1.5, null] },
          { kind: "nothing" },
          { kind: "list", items: [{ kind: "string", values: ["x", null] }], names: ["inner"] },
          booleanVector([true, false]),
        ],
        names: ["a", "b", "c", "d", "e"],
      });
    });

    it("should write atomic items inline and other objects as externals", () => {
      expect(JSON.parse(readFileSync(join(dir, "list_contents.json"), "utf-8"))).toEqual({
        type: "list",
        values: [
          { type: "integer", values: [1, 2] },
          { type: "number", values: ["NaN", 1.5, null] },
          { type: "nothing" },
          { type: "list", values: [{ type: "string", values: ["x", null] }], names: ["inner"] },
          { type: "external", index: 0 },
        ],
        names: ["a", "b", "c", "d", "e"],
      });
      expect(validator.readMetadata(join(dir, "other_contents", "0")).type).toBe("atomic_vector");
    });

    it("should read the list back", () => {
      const list = readSimpleList(dir);

      expect(list.names).toEqual(["a", "b", "c", "d", "e"]);
      expect(list.items[0]).toEqual({ kind: "integer", values: [1, 2] });
      expect(list.items[2]).toEqual({ kind: "nothing" });
      expect(list.items[3]).toEqual({
        kind: "list",
        items: [{ kind: "string", values: ["x", null] }],
        names: ["inner"],
      });
      expect(list.items[4]).toEqual({ kind: "external", index: 0, path: join(dir, "other_contents", "0") });

      const numbers = list.items[1];
      expect(numbers?.kind).toBe("number");
      if (numbers?.kind === "number") {
        expect(Number.isNaN(numbers.values[0])).toBe(true);
        expect(numbers.values.slice(1)).toEqual([1.5, null]);
      }
    });

    it("should validate along with its external children", () => {
      expect(validator.validate(dir).type).toBe("simple_list");
      expect(validator.height(dir)).toBe(5);
      expect(validator.dimensions(dir)).toEqual([5]);
    });

    it("should reject stored children that the list never references", () => {
      saveAtomicVector(join(dir, "other_contents", "1"), { kind: "integer", values: [1] });

      expect(() => validator.validate(dir)).toThrow("fewer instances of type 'external' than expected");
    });

    it("should reject external indices without a stored child", () => {
      rmSync(join(dir, "other_contents", "0"), { recursive: true });

      expect(() => validator.validate(dir)).toThrow("external index 0 is out of range (0 stored children)");
    });

    it("should reject an external child that fails its own validation", () => {
      rmSync(join(dir, "other_contents", "0", "contents.json"));

      expect(() => validator.validate(dir)).toThrow(
        `missing 'contents.json' in '${join(dir, "other_contents", "0")}'`
      );
    });
  });

  describe("list_contents.json checks", () => {
    beforeEach(() => {
      saveSimpleList(dir, { items: [booleanVector([true])] });
    });

    it("should accept externals nested inside inner lists", () => {
      writeContents({ type: "list", values: [{ type: "list", values: [{ type: "external", index: 0 }] }] });

      expect(validator.validate(dir).type).toBe("simple_list");
      expect(validator.height(dir)).toBe(1);
    });

    it("should reject an external referenced twice", () => {
      writeContents({
        type: "list",
        values: [
          { type: "external", index: 0 },
          { type: "external", index: 0 },
        ],
      });

      expect(() => validator.validate(dir)).toThrow("external index 0 is referenced more than once");
    });

    it("should reject names of the wrong length", () => {
      writeContents({ type: "list", values: [{ type: "external", index: 0 }], names: ["a", "b"] });

      const error = caught(() => validator.validate(dir));
      expect(error).toBeInstanceOf(StructuralViolationError);
      expect(error).toHaveProperty("message", "'names' should have the same length as the list values");
      expect(error).toHaveProperty("field", "names");
    });

    it("should reject unknown non-finite spellings", () => {
      writeContents({ type: "list", values: [{ type: "number", values: ["Infinity"] }, { type: "external", index: 0 }] });

      const error = caught(() => validator.validate(dir));
      expect(error).toBeInstanceOf(StructuralViolationError);
      expect(error).toHaveProperty("violation", "invalid-contents");
    });

    it("should reject integers outside the 32-bit range", () => {
      writeContents({ type: "list", values: [{ type: "integer", values: [2147483648] }, { type: "external", index: 0 }] });

      expect(caught(() => validator.validate(dir))).toHaveProperty("violation", "invalid-contents");
    });

    it("should report a missing contents file", () => {
      rmSync(join(dir, "list_contents.json"));

      expect(() => validator.validate(dir)).toThrow(`missing 'list_contents.json' in '${dir}'`);
    });
  });

  it("should reject an other_contents entry that is not a directory", () => {
    saveSimpleList(dir, { items: [{ kind: "nothing" }] });
    writeFileSync(join(dir, "other_contents"), "");

    expect(caught(() => validator.validate(dir))).toHaveProperty("violation", "not-a-directory");
  });

  it("should declare the SIMPLE_LIST interface", () => {
    expect(registry.satisfiesInterface("simple_list", "SIMPLE_LIST")).toBe(true);
    expect(registry.satisfiesInterface("atomic_vector", "SIMPLE_LIST")).toBe(false);
  });
});
