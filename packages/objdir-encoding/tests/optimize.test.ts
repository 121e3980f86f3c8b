/**
 * Storage optimizer tests
 */
import { describe, expect, it } from "vitest";
import { INTEGER_LADDER, INT32_MISSING } from "../src/constants.ts";
import { EncodingError } from "../src/errors.ts";
import {
  optimizeBooleanStorage,
  optimizeIntegerStorage,
  optimizeNumberStorage,
  optimizeStringStorage,
} from "../src/optimize.ts";
import { storageTypeName } from "../src/placeholder.ts";

function range(from: number, to: number): number[] {
  const out: number[] = [];
  for (let i = from; i <= to; i++) out.push(i);
  return out;
}

describe("optimizeIntegerStorage", () => {
  describe("without missing values", () => {
    it("should pick the narrowest container on the ladder", () => {
      const cases: Array<[number[], string]> = [
        [[1, 2, 3], "uint8"],
        [[0, 255], "uint8"],
        [[-1, 5], "int8"],
        [[0, 256], "uint16"],
        [[-200, 5], "int16"],
        [[0, 70000], "uint32"],
        [[-70000, 5], "int32"],
      ];

      for (const [values, expected] of cases) {
        const result = optimizeIntegerStorage(values);
        expect(storageTypeName(result.type)).toBe(expected);
        expect(result.placeholder).toBeUndefined();
      }
    });

    it("should never leave a narrower rung that would have sufficed", () => {
      const inputs = [[7], [-3, 100], [0, 40000], [-40000, 2], [1, 65535], [-32768, 32767]];

      for (const values of inputs) {
        const { type } = optimizeIntegerStorage(values);
        if (type.class !== "integer") {
          throw new Error("expected an integer container");
        }
        const min = Math.min(...values);
        const max = Math.max(...values);
        const index = INTEGER_LADDER.findIndex((r) => r.type.signed === type.signed && r.type.bits === type.bits);
        const chosen = INTEGER_LADDER[index]!;
        expect(min).toBeGreaterThanOrEqual(chosen.min);
        expect(max).toBeLessThanOrEqual(chosen.max);
        for (const narrower of INTEGER_LADDER.slice(0, index)) {
          expect(min >= narrower.min && max <= narrower.max).toBe(false);
        }
      }
    });

    it("should use uint8 for an empty collection", () => {
      const result = optimizeIntegerStorage([]);
      expect(storageTypeName(result.type)).toBe("uint8");
      expect(result.placeholder).toBeUndefined();
    });
  });

  describe("with missing values", () => {
    it("should use the type maximum when it is unused", () => {
      const values: Array<number | null> = [...range(0, 254), null];
      const result = optimizeIntegerStorage(values);

      expect(storageTypeName(result.type)).toBe("uint8");
      expect(result.placeholder).toBe(255);
    });

    it("should escalate to uint16 when every uint8 candidate is taken", () => {
      const values: Array<number | null> = [...range(0, 255), null];
      const result = optimizeIntegerStorage(values);

      expect(storageTypeName(result.type)).toBe("uint16");
      expect(result.placeholder).toBe(65535);
    });

    it("should fall back to the minimum when the maximum is taken", () => {
      const result = optimizeIntegerStorage([127, 5, null]);
      expect(storageTypeName(result.type)).toBe("uint8");
      expect(result.placeholder).toBe(255);

      const signed = optimizeIntegerStorage([127, -5, null]);
      expect(storageTypeName(signed.type)).toBe("int8");
      expect(signed.placeholder).toBe(-128);
    });

    it("should fall back to zero when both extremes are taken", () => {
      const result = optimizeIntegerStorage([127, -128, 5, null]);
      expect(storageTypeName(result.type)).toBe("int8");
      expect(result.placeholder).toBe(0);
    });

    it("should skip rungs that do not fit when escalating", () => {
      const result = optimizeIntegerStorage([...range(-128, 127), null]);
      expect(storageTypeName(result.type)).toBe("int16");
      expect(result.placeholder).toBe(32767);
    });

    it("should use the native marker at int32 without searching", () => {
      const result = optimizeIntegerStorage([-70000, 2147483647, null]);
      expect(storageTypeName(result.type)).toBe("int32");
      expect(result.placeholder).toBe(INT32_MISSING);
    });

    it("should use uint8 with its maximum when everything is missing", () => {
      const result = optimizeIntegerStorage([null, null]);
      expect(storageTypeName(result.type)).toBe("uint8");
      expect(result.placeholder).toBe(255);
    });
  });

  it("should reject values that are not 32-bit integers", () => {
    expect(() => optimizeIntegerStorage([1.5])).toThrow(EncodingError);
    expect(() => optimizeIntegerStorage([INT32_MISSING])).toThrow(EncodingError);
    expect(() => optimizeIntegerStorage([2 ** 31])).toThrow("outside the 32-bit signed range");
  });

  it("should return frozen results", () => {
    const result = optimizeIntegerStorage([1, null]);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.type)).toBe(true);
  });
});

describe("optimizeNumberStorage", () => {
  it("should reuse the integer ladder for integral values", () => {
    expect(storageTypeName(optimizeNumberStorage([1, 2, 3.0]).type)).toBe("uint8");
    expect(storageTypeName(optimizeNumberStorage([0, 4294967295]).type)).toBe("uint32");
    expect(storageTypeName(optimizeNumberStorage([-2147483648, 5]).type)).toBe("int32");
  });

  it("should use float64 for fractional, non-finite or out-of-range values", () => {
    expect(storageTypeName(optimizeNumberStorage([0.5]).type)).toBe("float64");
    expect(storageTypeName(optimizeNumberStorage([1, Infinity]).type)).toBe("float64");
    expect(storageTypeName(optimizeNumberStorage([5e9]).type)).toBe("float64");
    expect(optimizeNumberStorage([0.5]).placeholder).toBeUndefined();
  });

  it("should keep negative zero in a float64 container", () => {
    expect(storageTypeName(optimizeNumberStorage([-0, 2]).type)).toBe("float64");
    expect(storageTypeName(optimizeNumberStorage([0, 2]).type)).toBe("uint8");
  });

  it("should search integer placeholders for integral values with missing entries", () => {
    const result = optimizeNumberStorage([1, null]);
    expect(storageTypeName(result.type)).toBe("uint8");
    expect(result.placeholder).toBe(255);
  });

  it("should not use a native marker at int32", () => {
    const result = optimizeNumberStorage([-2147483648, 5, null]);
    expect(storageTypeName(result.type)).toBe("int32");
    expect(result.placeholder).toBe(2147483647);
  });

  it("should only switch to float64 once the 32-bit search is exhausted", () => {
    const unsigned = optimizeNumberStorage([0, 4294967295, null]);
    expect(storageTypeName(unsigned.type)).toBe("float64");
    expect(Number.isNaN(unsigned.placeholder)).toBe(true);

    const signed = optimizeNumberStorage([-2147483648, 2147483647, 0, null]);
    expect(storageTypeName(signed.type)).toBe("float64");
  });

  describe("float64 placeholders", () => {
    it("should prefer NaN when no NaN is observed", () => {
      const result = optimizeNumberStorage([1.5, null]);
      expect(Number.isNaN(result.placeholder)).toBe(true);
    });

    it("should walk through the special values in order", () => {
      expect(optimizeNumberStorage([NaN, 1.5, null]).placeholder).toBe(Infinity);
      expect(optimizeNumberStorage([NaN, Infinity, 1.5, null]).placeholder).toBe(-Infinity);
      expect(optimizeNumberStorage([NaN, Infinity, -Infinity, null]).placeholder).toBe(-Number.MAX_VALUE);
      expect(optimizeNumberStorage([NaN, Infinity, -Infinity, -Number.MAX_VALUE, null]).placeholder).toBe(
        Number.MAX_VALUE
      );
    });

    it("should bisect between observed values when every special value is taken", () => {
      const taken = [NaN, Infinity, -Infinity, -Number.MAX_VALUE, Number.MAX_VALUE];

      expect(optimizeNumberStorage([...taken, null]).placeholder).toBe(0);
      expect(optimizeNumberStorage([...taken, 0, null]).placeholder).toBe(-Number.MAX_VALUE / 2);
    });
  });
});

describe("optimizeStringStorage", () => {
  it("should size the buffer to the longest value", () => {
    const result = optimizeStringStorage(["a", "bcd"]);
    expect(result.type).toEqual({ class: "string", size: 3, charset: "UTF-8" });
    expect(result.placeholder).toBeUndefined();
  });

  it("should use at least one byte", () => {
    expect(optimizeStringStorage([]).type.size).toBe(1);
    expect(optimizeStringStorage(["", ""]).type.size).toBe(1);
  });

  it("should count UTF-8 bytes", () => {
    expect(optimizeStringStorage(["é"]).type.size).toBe(2);
  });

  it("should choose NA and widen the buffer for it", () => {
    const result = optimizeStringStorage(["a", null]);
    expect(result.placeholder).toBe("NA");
    expect(result.type.size).toBe(2);
  });

  it("should prepend underscores until the placeholder is unused", () => {
    const first = optimizeStringStorage(["NA", null]);
    expect(first.placeholder).toBe("_NA");
    expect(first.type.size).toBe(3);

    const second = optimizeStringStorage(["NA", "_NA", null]);
    expect(second.placeholder).toBe("__NA");
    expect(second.type.size).toBe(4);
  });

  it("should keep the longest value as the width when it exceeds the placeholder", () => {
    const result = optimizeStringStorage(["abcdef", null]);
    expect(result.placeholder).toBe("NA");
    expect(result.type.size).toBe(6);
  });

  it("should accept ASCII declarations", () => {
    expect(optimizeStringStorage(["abc"], { encoding: "ascii" }).type.charset).toBe("ASCII");
  });

  it("should reject other declared encodings", () => {
    expect(() => optimizeStringStorage(["abc"], { encoding: "latin1" })).toThrow(EncodingError);
    expect(() => optimizeStringStorage(["é"], { encoding: "ASCII" })).toThrow(
      "Values declared as ASCII contain non-ASCII characters"
    );
  });
});

describe("optimizeBooleanStorage", () => {
  it("should always use int8", () => {
    const result = optimizeBooleanStorage([true, false]);
    expect(storageTypeName(result.type)).toBe("int8");
    expect(result.placeholder).toBeUndefined();
  });

  it("should use -1 for missing values", () => {
    expect(optimizeBooleanStorage([true, null]).placeholder).toBe(-1);
  });
});
