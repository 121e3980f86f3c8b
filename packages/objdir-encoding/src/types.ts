/**
 * Storage Encoding Types
 */

/**
 * Value kinds understood by the optimizer
 */
export type ValueKind = "integer" | "number" | "string" | "boolean";

/**
 * Bit widths available for integer containers
 */
export type IntegerBits = 8 | 16 | 32;

/**
 * Character sets a fixed-width text container can declare
 */
export type Charset = "ASCII" | "UTF-8";

/**
 * Fixed-width integer container
 */
export interface IntegerStorageType {
  class: "integer";
  signed: boolean;
  bits: IntegerBits;
}

/**
 * IEEE-754 double container
 */
export interface FloatStorageType {
  class: "float";
  bits: 64;
}

/**
 * Fixed-width, null-padded text container
 */
export interface StringStorageType {
  class: "string";
  /** Width of each slot in bytes (always >= 1) */
  size: number;
  charset: Charset;
}

export type NumericStorageType = IntegerStorageType | FloatStorageType;

export type StorageType = IntegerStorageType | FloatStorageType | StringStorageType;

/**
 * Result of an optimization pass
 *
 * `placeholder` is only present when the input had missing values; it is a
 * value of the container type that no observed value equals.
 */
export interface StorageEncoding<T> {
  readonly type: Readonly<StorageType>;
  readonly placeholder?: T;
}

export type NumericStorageEncoding = StorageEncoding<number> & {
  readonly type: Readonly<NumericStorageType>;
};

export type StringStorageEncoding = StorageEncoding<string> & {
  readonly type: Readonly<StringStorageType>;
};

/**
 * Options for text optimization
 */
export interface StringStorageOptions {
  /**
   * Declared encoding of the input values.
   * Only "ASCII" and "UTF-8" can be stored in a single fixed-width buffer.
   * @default "UTF-8"
   */
  encoding?: string;
}

/**
 * Summary of an integer collection (one linear scan)
 */
export interface IntegerAttributes {
  /** Smallest observed value; Infinity when nothing was observed */
  min: number;
  /** Largest observed value; -Infinity when nothing was observed */
  max: number;
  missing: boolean;
  observed: Set<number>;
}

/**
 * Summary of a real-number collection
 */
export interface NumberAttributes extends IntegerAttributes {
  /** Every observed value is a finite integer inside the 32-bit ladder */
  integral: boolean;
  hasNaN: boolean;
}

/**
 * Summary of a text collection
 */
export interface StringAttributes {
  missing: boolean;
  /** Longest observed value in UTF-8 bytes */
  maxBytes: number;
  /** Every observed value is 7-bit ASCII */
  ascii: boolean;
  observed: Set<string>;
}
