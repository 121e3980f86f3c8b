/**
 * @objdir/handlers
 *
 * Built-in object types with their validate/height/dimensions handlers,
 * writers and readers:
 * - atomic_vector
 * - string_factor
 * - simple_list (SIMPLE_LIST interface)
 * - data_frame (DATA_FRAME interface)
 */

// Shared helpers
export { checkVersion, CURRENT_VERSION, SUPPORTED_MAJOR_VERSION } from "./common.ts";

// Atomic vectors
export {
  ATOMIC_VECTOR,
  atomicVectorDimensions,
  atomicVectorHeight,
  readAtomicVector,
  registerAtomicVector,
  saveAtomicVector,
  validateAtomicVector,
  type AtomicVector,
  type LoadedAtomicVector,
} from "./atomic-vector.ts";

// Factors
export {
  readStringFactor,
  registerStringFactor,
  saveStringFactor,
  STRING_FACTOR,
  stringFactorDimensions,
  stringFactorHeight,
  validateStringFactor,
  type LoadedStringFactor,
  type StringFactor,
} from "./string-factor.ts";

// Lists
export {
  LIST_CONTENTS_FILE,
  OTHER_CONTENTS_DIR,
  readSimpleList,
  registerSimpleList,
  saveSimpleList,
  SIMPLE_LIST,
  simpleListHeight,
  validateSimpleList,
  type ListElementJson,
  type ListItem,
  type LoadedListItem,
  type LoadedSimpleList,
  type SavableObject,
  type SimpleList,
} from "./simple-list.ts";

// Data frames
export {
  COLUMN_ANNOTATIONS_DIR,
  DATA_FRAME,
  dataFrameDimensions,
  dataFrameHeight,
  OTHER_ANNOTATIONS_DIR,
  OTHER_COLUMNS_DIR,
  readDataFrame,
  registerDataFrame,
  saveDataFrame,
  validateDataFrame,
  type DataFrame,
  type DataFrameColumn,
  type DataFrameColumnType,
  type FactorColumn,
  type LoadedDataFrame,
  type LoadedDataFrameColumn,
} from "./data-frame.ts";

// Registry
export { createDefaultRegistry, registerBuiltinHandlers } from "./registry.ts";
