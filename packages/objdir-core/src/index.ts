/**
 * @objdir/core
 *
 * Object-directory validation engine
 *
 * Layouts:
 * - current: one OBJECT metadata file per object directory, children nested inside
 * - legacy: `<path>.json` metadata documents linked by `resource.path`, plus redirections
 */

// Constants
export {
  DATASET_FILE,
  INTERFACES,
  LEGACY_METADATA_SUFFIX,
  NEGATIVE_ZERO,
  NON_FINITE,
  OBJECT_FILE,
  REDIRECTION_SCHEMA,
  REDIRECTION_SCHEMA_PREFIX,
} from "./constants.ts";

// Types
export type {
  ConflictPolicy,
  DimensionsFunction,
  HeightFunction,
  ObjectListing,
  ValidateFunction,
  ValidationContext,
} from "./types.ts";

// Errors
export {
  EncodingError,
  errorKind,
  isObjectDirError,
  MalformedMetadataError,
  ObjectDirError,
  RedirectionError,
  RegistryConflictError,
  StructuralViolationError,
  UnknownTypeError,
  UnregisteredCapabilityError,
  type Capability,
  type ErrorContext,
  type ErrorKind,
  type RedirectionFailure,
  type StructuralViolation,
} from "./errors.ts";

// Configuration
export { createConsoleLogger, DEFAULT_MAX_DEPTH, loadConfig, type Logger, type ObjDirConfig } from "./config.ts";

// Schemas
export {
  DatasetFileSchema,
  DatasetSchema,
  describeIssue,
  LegacyMetadataSchema,
  ObjectMetadataSchema,
  RedirectionMetadataSchema,
  RedirectionTargetSchema,
  StorageTypeSchema,
  VersionedSectionSchema,
  type Dataset,
  type DatasetFile,
  type LegacyMetadata,
  type ObjectMetadata,
  type RedirectionMetadata,
  type RedirectionTarget,
} from "./schemas.ts";

// Metadata
export { getTypeSection, hasObjectMetadata, readObjectMetadata, writeObjectMetadata } from "./metadata.ts";

// Registry
export { TypeRegistry } from "./registry.ts";

// Validation
export {
  createObjectValidator,
  ValidationPass,
  type ObjectValidator,
  type ObjectValidatorOptions,
} from "./validator.ts";
export {
  detectLayout,
  validateDirectory,
  type DirectoryLayout,
  type DirectoryValidationResult,
  type ValidateDirectoryOptions,
} from "./directory.ts";
export { listObjects, type ListObjectsOptions } from "./listing.ts";

// Legacy layout
export {
  collectResourcePaths,
  createLegacyRedirection,
  listLegacyObjects,
  readLegacyDocument,
  validateLegacyDirectory,
  type LegacyDocument,
  type ListLegacyObjectsOptions,
} from "./legacy.ts";

// Datasets
export {
  datasetFilePath,
  decodeBooleanDataset,
  decodeNumericDataset,
  decodeStringDataset,
  encodeColumn,
  fromStoredNumber,
  hasDatasetFile,
  readDatasetFile,
  requireDataset,
  toStoredNumber,
  writeDatasetFile,
  type Column,
  type StoredValue,
} from "./dataset.ts";

// Paths
export {
  isDirectory,
  isStrictSubPath,
  listFilesRecursive,
  listSubdirectories,
  parentOf,
  relativeObjectPath,
} from "./paths.ts";
