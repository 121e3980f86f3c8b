/**
 * @objdir/encoding
 *
 * Storage encoding optimizer: smallest exact container + missing-value placeholder
 *
 * Value kinds:
 * - integer: 8/16/32-bit ladder, native int32 marker
 * - number: integer ladder when integral, otherwise float64
 * - string: fixed-width ASCII/UTF-8 buffer
 * - boolean: int8
 */

// Constants
export {
  BOOLEAN_PLACEHOLDER,
  INT8,
  INT16,
  INT32,
  INT32_MISSING,
  INTEGER_INPUT_MAX,
  INTEGER_INPUT_MIN,
  INTEGER_LADDER,
  STRING_PLACEHOLDER,
  SUPPORTED_ENCODINGS,
  UINT8,
  UINT16,
  UINT32,
  type IntegerRung,
} from "./constants.ts";

// Types
export type {
  Charset,
  FloatStorageType,
  IntegerAttributes,
  IntegerBits,
  IntegerStorageType,
  NumberAttributes,
  NumericStorageEncoding,
  NumericStorageType,
  StorageEncoding,
  StorageType,
  StringAttributes,
  StringStorageEncoding,
  StringStorageOptions,
  StringStorageType,
  ValueKind,
} from "./types.ts";

// Errors
export { EncodingError } from "./errors.ts";

// Attribute collection
export {
  anyMissing,
  collectIntegerAttributes,
  collectNumberAttributes,
  collectStringAttributes,
  utf8Length,
} from "./attributes.ts";

// Optimizers
export {
  optimizeBooleanStorage,
  optimizeIntegerStorage,
  optimizeNumberStorage,
  optimizeStringStorage,
} from "./optimize.ts";

// Placeholders
export {
  booleansToIntegers,
  fitsStorageType,
  isSamePlaceholder,
  restoreMissing,
  storageTypeName,
  substitutePlaceholder,
} from "./placeholder.ts";
