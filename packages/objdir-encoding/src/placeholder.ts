/**
 * Placeholder substitution and container checks
 */

import { INTEGER_LADDER } from "./constants.ts";
import { utf8Length } from "./attributes.ts";
import type { StorageType } from "./types.ts";

/**
 * Short name of a container, e.g. "uint8", "float64", "string[12]"
 */
export function storageTypeName(type: StorageType): string {
  switch (type.class) {
    case "integer":
      return `${type.signed ? "int" : "uint"}${type.bits}`;
    case "float":
      return `float${type.bits}`;
    case "string":
      return `string[${type.size}]`;
  }
}

/**
 * Check that a stored value is representable by the container
 */
export function fitsStorageType(value: number | string, type: StorageType): boolean {
  switch (type.class) {
    case "integer": {
      if (typeof value !== "number" || !Number.isInteger(value)) return false;
      const rung = INTEGER_LADDER.find(
        (r) => r.type.signed === type.signed && r.type.bits === type.bits
      );
      return rung !== undefined && value >= rung.min && value <= rung.max;
    }
    case "float":
      return typeof value === "number";
    case "string":
      if (typeof value !== "string") return false;
      if (type.charset === "ASCII" && utf8Length(value) !== value.length) return false;
      return utf8Length(value) <= type.size;
  }
}

/**
 * Whether two stored values are the same, treating NaN as equal to NaN
 */
export function isSamePlaceholder<T extends number | string>(value: T, placeholder: T): boolean {
  if (typeof value === "number" && typeof placeholder === "number") {
    return Object.is(value, placeholder) || value === placeholder;
  }
  return value === placeholder;
}

/**
 * Replace missing slots with the placeholder before writing
 * @throws Error if a slot is missing but no placeholder was chosen
 */
export function substitutePlaceholder<T extends number | string>(
  values: ReadonlyArray<T | null>,
  placeholder: T | undefined
): T[] {
  return values.map((value, i) => {
    if (value !== null) {
      return value;
    }
    if (placeholder === undefined) {
      throw new Error(`Missing value at index ${i} but no placeholder was chosen`);
    }
    return placeholder;
  });
}

/**
 * Turn placeholder slots back into missing values after reading
 */
export function restoreMissing<T extends number | string>(
  data: ReadonlyArray<T>,
  placeholder: T | undefined
): Array<T | null> {
  if (placeholder === undefined) {
    return data.slice();
  }
  return data.map((value) => (isSamePlaceholder(value, placeholder) ? null : value));
}

/**
 * Map booleans to their int8 representation
 */
export function booleansToIntegers(values: ReadonlyArray<boolean | null>): Array<number | null> {
  return values.map((value) => (value === null ? null : value ? 1 : 0));
}
