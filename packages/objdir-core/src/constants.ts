/**
 * Object directory layout constants
 */

/**
 * Metadata document inside every object directory (current layout)
 */
export const OBJECT_FILE = "OBJECT";

/**
 * Columnar dataset file written next to OBJECT by the built-in handlers
 */
export const DATASET_FILE = "contents.json";

/**
 * Suffix of legacy metadata documents
 */
export const LEGACY_METADATA_SUFFIX = ".json";

/**
 * Schema prefix marking a legacy redirection document
 */
export const REDIRECTION_SCHEMA_PREFIX = "redirection/";

export const REDIRECTION_SCHEMA = "redirection/v1.json";

/**
 * Well-known structural interfaces
 */
export const INTERFACES = {
  SIMPLE_LIST: "SIMPLE_LIST",
  DATA_FRAME: "DATA_FRAME",
} as const;

/**
 * Encoding of non-finite doubles inside JSON datasets
 */
export const NON_FINITE = {
  NaN: "NaN",
  Inf: "Inf",
  NegInf: "-Inf",
} as const;

/** Negative zero, which JSON numbers cannot carry */
export const NEGATIVE_ZERO = "-0";
