/**
 * Storage Encoding Optimizer
 *
 * Picks the narrowest exact container for a homogeneous collection and,
 * when values are missing, a placeholder of that container that no observed
 * value equals.
 *
 * Placeholder search:
 * - integers: type max, type min, zero; escalate when all are taken
 * - int32 integers: native missing marker (-2^31), no search
 * - doubles: NaN, +Inf, -Inf, lowest, highest, then bisection
 * - text: "NA", "_NA", "__NA", ...
 * - booleans: -1
 */

import {
  collectIntegerAttributes,
  collectNumberAttributes,
  collectStringAttributes,
  anyMissing,
  utf8Length,
} from "./attributes.ts";
import {
  BOOLEAN_PLACEHOLDER,
  INT8,
  INT32,
  INT32_MISSING,
  INTEGER_LADDER,
  type IntegerRung,
  STRING_PLACEHOLDER,
  SUPPORTED_ENCODINGS,
} from "./constants.ts";
import { EncodingError } from "./errors.ts";
import type {
  Charset,
  FloatStorageType,
  IntegerAttributes,
  NumericStorageEncoding,
  StringStorageEncoding,
  StringStorageOptions,
} from "./types.ts";

const FLOAT64: FloatStorageType = { class: "float", bits: 64 };

// ============================================================================
// Helpers
// ============================================================================

function freezeEncoding<T extends { type: object }>(encoding: T): T {
  Object.freeze(encoding.type);
  return Object.freeze(encoding);
}

function fits(rung: IntegerRung, attr: IntegerAttributes): boolean {
  // Nothing observed: every width fits
  if (attr.min > attr.max) return true;
  return attr.min >= rung.min && attr.max <= rung.max;
}

/**
 * Try the type's maximum, its minimum, then zero
 */
function pickRungPlaceholder(rung: IntegerRung, observed: Set<number>): number | undefined {
  for (const candidate of [rung.max, rung.min, 0]) {
    if (!observed.has(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Walk the integer ladder
 * @param nativeMissingAtInt32 - Use the native marker at int32 instead of searching
 */
function walkLadder(attr: IntegerAttributes, nativeMissingAtInt32: boolean): NumericStorageEncoding | undefined {
  for (const rung of INTEGER_LADDER) {
    if (!fits(rung, attr)) {
      continue;
    }
    if (!attr.missing) {
      return freezeEncoding({ type: { ...rung.type } });
    }
    if (rung === INT32 && nativeMissingAtInt32) {
      return freezeEncoding({ type: { ...rung.type }, placeholder: INT32_MISSING });
    }
    const placeholder = pickRungPlaceholder(rung, attr.observed);
    if (placeholder !== undefined) {
      return freezeEncoding({ type: { ...rung.type }, placeholder });
    }
  }
  return undefined;
}

/**
 * Find a double strictly between two adjacent observed values
 */
function bisectFloatPlaceholder(observed: Set<number>): number | undefined {
  const sorted = Array.from(observed)
    .filter((x) => Number.isFinite(x))
    .sort((a, b) => a - b);

  let last = -Number.MAX_VALUE;
  for (const x of sorted) {
    // Halve first so the sum cannot overflow
    const candidate = last / 2 + x / 2;
    if (candidate !== last && candidate !== x) {
      return candidate;
    }
    last = x;
  }
  return undefined;
}

function pickFloatPlaceholder(observed: Set<number>, hasNaN: boolean): number {
  if (!hasNaN) {
    return Number.NaN;
  }
  for (const candidate of [Infinity, -Infinity, -Number.MAX_VALUE, Number.MAX_VALUE]) {
    if (!observed.has(candidate)) {
      return candidate;
    }
  }
  const bisected = bisectFloatPlaceholder(observed);
  if (bisected === undefined) {
    throw new EncodingError("Failed to find a suitable placeholder for double-precision values");
  }
  return bisected;
}

// ============================================================================
// Optimizers
// ============================================================================

/**
 * Choose storage for an integer collection
 *
 * @param values - Whole numbers in [-2^31 + 1, 2^31 - 1]; `null` marks a missing value
 * @throws EncodingError for values that are not 32-bit integers
 */
export function optimizeIntegerStorage(values: ReadonlyArray<number | null>): NumericStorageEncoding {
  const attr = collectIntegerAttributes(values);
  const encoding = walkLadder(attr, true);
  if (encoding === undefined) {
    // collectIntegerAttributes already bounds the range to int32
    throw new EncodingError(`Integer range [${attr.min}, ${attr.max}] does not fit a 32-bit container`);
  }
  return encoding;
}

/**
 * Choose storage for a real-number collection
 *
 * Integral collections inside the 32-bit range reuse the integer ladder; a
 * double container is only returned when that fails.
 */
export function optimizeNumberStorage(values: ReadonlyArray<number | null>): NumericStorageEncoding {
  const attr = collectNumberAttributes(values);

  if (attr.integral) {
    const encoding = walkLadder(attr, false);
    if (encoding !== undefined) {
      return encoding;
    }
  }

  if (!attr.missing) {
    return freezeEncoding({ type: { ...FLOAT64 } });
  }
  return freezeEncoding({ type: { ...FLOAT64 }, placeholder: pickFloatPlaceholder(attr.observed, attr.hasNaN) });
}

/**
 * Choose storage for a text collection
 *
 * @throws EncodingError when the declared encoding is not ASCII/UTF-8, or
 * when ASCII is declared but a value is not ASCII
 */
export function optimizeStringStorage(
  values: ReadonlyArray<string | null>,
  options: StringStorageOptions = {}
): StringStorageEncoding {
  const charset = normalizeCharset(options.encoding ?? "UTF-8");
  const attr = collectStringAttributes(values);

  if (charset === "ASCII" && !attr.ascii) {
    throw new EncodingError("Values declared as ASCII contain non-ASCII characters");
  }

  let size = attr.maxBytes;
  let placeholder: string | undefined;
  if (attr.missing) {
    placeholder = STRING_PLACEHOLDER;
    while (attr.observed.has(placeholder)) {
      placeholder = `_${placeholder}`;
    }
    size = Math.max(size, utf8Length(placeholder));
  }

  const type = { class: "string" as const, size: Math.max(1, size), charset };
  return freezeEncoding(placeholder === undefined ? { type } : { type, placeholder });
}

/**
 * Choose storage for a boolean collection (always int8)
 */
export function optimizeBooleanStorage(values: ReadonlyArray<boolean | null>): NumericStorageEncoding {
  const type = { ...INT8.type };
  if (anyMissing(values)) {
    return freezeEncoding({ type, placeholder: BOOLEAN_PLACEHOLDER });
  }
  return freezeEncoding({ type });
}

function normalizeCharset(encoding: string): Charset {
  const upper = encoding.toUpperCase();
  if (upper === "UTF8") return "UTF-8";
  for (const supported of SUPPORTED_ENCODINGS) {
    if (upper === supported) return supported;
  }
  throw new EncodingError(
    `Unsupported text encoding "${encoding}": expected one of ${SUPPORTED_ENCODINGS.join(", ")}`
  );
}
