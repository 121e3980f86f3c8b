/**
 * Single-pass attribute collection for the optimizer
 *
 * Missing values are `null`; everything else counts as observed.
 */

import { INTEGER_INPUT_MAX, INTEGER_INPUT_MIN, INT32, UINT32 } from "./constants.ts";
import { EncodingError } from "./errors.ts";
import type { IntegerAttributes, NumberAttributes, StringAttributes } from "./types.ts";

const textEncoder = new TextEncoder();

/**
 * Collect min/max/missing for an integer collection
 * @throws EncodingError for non-integers or values outside the 32-bit input range
 */
export function collectIntegerAttributes(values: ReadonlyArray<number | null>): IntegerAttributes {
  let min = Infinity;
  let max = -Infinity;
  let missing = false;
  const observed = new Set<number>();

  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    if (value === null || value === undefined) {
      missing = true;
      continue;
    }
    if (!Number.isInteger(value)) {
      throw new EncodingError(`Value at index ${i} is not an integer: ${value}`);
    }
    if (value < INTEGER_INPUT_MIN || value > INTEGER_INPUT_MAX) {
      throw new EncodingError(`Value at index ${i} is outside the 32-bit signed range: ${value}`);
    }
    if (value < min) min = value;
    if (value > max) max = value;
    observed.add(value);
  }

  return { min, max, missing, observed };
}

/**
 * Collect attributes for a real-number collection
 *
 * `min`/`max` only cover finite values; `integral` is false as soon as one
 * observed value is non-finite, fractional, negative zero or outside
 * [-2^31, 2^32 - 1].
 */
export function collectNumberAttributes(values: ReadonlyArray<number | null>): NumberAttributes {
  let min = Infinity;
  let max = -Infinity;
  let missing = false;
  let integral = true;
  let hasNaN = false;
  const observed = new Set<number>();

  for (const value of values) {
    if (value === null || value === undefined) {
      missing = true;
      continue;
    }
    if (Number.isNaN(value)) {
      hasNaN = true;
      integral = false;
      continue;
    }
    observed.add(value);
    if (!Number.isFinite(value)) {
      integral = false;
      continue;
    }
    if (!Number.isInteger(value) || Object.is(value, -0) || value < INT32.min || value > UINT32.max) {
      integral = false;
    }
    if (value < min) min = value;
    if (value > max) max = value;
  }

  return { min, max, missing, observed, integral, hasNaN };
}

/**
 * Collect attributes for a text collection
 */
export function collectStringAttributes(values: ReadonlyArray<string | null>): StringAttributes {
  let missing = false;
  let maxBytes = 0;
  let ascii = true;
  const observed = new Set<string>();

  for (const value of values) {
    if (value === null || value === undefined) {
      missing = true;
      continue;
    }
    observed.add(value);
    const bytes = utf8Length(value);
    if (bytes > maxBytes) maxBytes = bytes;
    if (ascii && bytes !== value.length) {
      ascii = false;
    }
  }

  return { missing, maxBytes, ascii, observed };
}

/**
 * Whether any value is missing
 */
export function anyMissing<T>(values: ReadonlyArray<T | null>): boolean {
  for (const value of values) {
    if (value === null || value === undefined) return true;
  }
  return false;
}

/**
 * Byte length of a string once encoded as UTF-8
 */
export function utf8Length(value: string): number {
  return textEncoder.encode(value).length;
}
