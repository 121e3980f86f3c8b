/**
 * Storage Encoding Constants
 *
 * Integer ladder (narrowest first):
 * - uint8, int8, uint16, int16, uint32, int32
 */

import type { IntegerStorageType } from "./types.ts";

/**
 * One rung of the integer width ladder
 */
export interface IntegerRung {
  type: IntegerStorageType;
  min: number;
  max: number;
}

export const UINT8: IntegerRung = { type: { class: "integer", signed: false, bits: 8 }, min: 0, max: 255 };
export const INT8: IntegerRung = { type: { class: "integer", signed: true, bits: 8 }, min: -128, max: 127 };
export const UINT16: IntegerRung = { type: { class: "integer", signed: false, bits: 16 }, min: 0, max: 65535 };
export const INT16: IntegerRung = { type: { class: "integer", signed: true, bits: 16 }, min: -32768, max: 32767 };
export const UINT32: IntegerRung = {
  type: { class: "integer", signed: false, bits: 32 },
  min: 0,
  max: 4294967295,
};
export const INT32: IntegerRung = {
  type: { class: "integer", signed: true, bits: 32 },
  min: -2147483648,
  max: 2147483647,
};

/**
 * Width ladder, tried in order
 */
export const INTEGER_LADDER: readonly IntegerRung[] = [UINT8, INT8, UINT16, INT16, UINT32, INT32];

/**
 * Native missing-integer marker, used at the widest rung without a search
 */
export const INT32_MISSING = -2147483648;

/**
 * Range accepted by optimizeIntegerStorage (the marker itself is excluded)
 */
export const INTEGER_INPUT_MIN = INT32_MISSING + 1;
export const INTEGER_INPUT_MAX = INT32.max;

/**
 * Boolean container and its placeholder
 */
export const BOOLEAN_PLACEHOLDER = -1;

/**
 * First text placeholder; collisions are resolved by prepending "_"
 */
export const STRING_PLACEHOLDER = "NA";

/**
 * Declared encodings that fit a single fixed-width byte buffer
 */
export const SUPPORTED_ENCODINGS = ["ASCII", "UTF-8"] as const;
