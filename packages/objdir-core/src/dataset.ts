/**
 * Columnar dataset file (contents.json)
 *
 * Each dataset records its container type, length, stored values and the
 * placeholder standing in for missing entries. Non-finite doubles are kept
 * as the strings "NaN", "Inf" and "-Inf", and negative zero as "-0".
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import {
  booleansToIntegers,
  fitsStorageType,
  type NumericStorageEncoding,
  optimizeBooleanStorage,
  optimizeIntegerStorage,
  optimizeNumberStorage,
  optimizeStringStorage,
  restoreMissing,
  type StorageType,
  storageTypeName,
  substitutePlaceholder,
} from "@objdir/encoding";
import { DATASET_FILE, NEGATIVE_ZERO, NON_FINITE } from "./constants.ts";
import { MalformedMetadataError, StructuralViolationError } from "./errors.ts";
import { type Dataset, type DatasetFile, DatasetFileSchema, describeIssue } from "./schemas.ts";

// ============================================================================
// Columns
// ============================================================================

export type Column =
  | { kind: "integer"; values: ReadonlyArray<number | null> }
  | { kind: "number"; values: ReadonlyArray<number | null> }
  | { kind: "string"; values: ReadonlyArray<string | null>; encoding?: string }
  | { kind: "boolean"; values: ReadonlyArray<boolean | null> };

export type StoredValue = number | string;

/**
 * JSON form of a double
 */
export function toStoredNumber(value: number): StoredValue {
  if (Number.isNaN(value)) return NON_FINITE.NaN;
  if (value === Infinity) return NON_FINITE.Inf;
  if (value === -Infinity) return NON_FINITE.NegInf;
  if (Object.is(value, -0)) return NEGATIVE_ZERO;
  return value;
}

/**
 * Inverse of {@link toStoredNumber}; undefined for any other string
 */
export function fromStoredNumber(value: StoredValue): number | undefined {
  if (typeof value === "number") return value;
  switch (value) {
    case NON_FINITE.NaN:
      return NaN;
    case NON_FINITE.Inf:
      return Infinity;
    case NON_FINITE.NegInf:
      return -Infinity;
    case NEGATIVE_ZERO:
      return -0;
    default:
      return undefined;
  }
}

function numericDataset(values: ReadonlyArray<number | null>, encoding: NumericStorageEncoding): Dataset {
  const substituted = substitutePlaceholder(values, encoding.placeholder);
  const data = encoding.type.class === "float" ? substituted.map(toStoredNumber) : substituted;
  const dataset: Dataset = { type: { ...encoding.type }, length: values.length, data };
  if (encoding.placeholder !== undefined) {
    dataset.placeholder = toStoredNumber(encoding.placeholder);
  }
  return dataset;
}

/**
 * Choose the narrowest container for a column and substitute its placeholder
 */
export function encodeColumn(column: Column): Dataset {
  switch (column.kind) {
    case "integer":
      return numericDataset(column.values, optimizeIntegerStorage(column.values));
    case "number":
      return numericDataset(column.values, optimizeNumberStorage(column.values));
    case "boolean": {
      const ints = booleansToIntegers(column.values);
      return numericDataset(ints, optimizeBooleanStorage(column.values));
    }
    case "string": {
      const encoding = optimizeStringStorage(column.values, { encoding: column.encoding });
      const dataset: Dataset = {
        type: { ...encoding.type },
        length: column.values.length,
        data: substitutePlaceholder(column.values, encoding.placeholder),
      };
      if (encoding.placeholder !== undefined) {
        dataset.placeholder = encoding.placeholder;
      }
      return dataset;
    }
  }
}

function invalid(message: string, path: string, field: string): StructuralViolationError {
  return new StructuralViolationError("invalid-contents", message, { path, field });
}

function checkShape(dataset: Dataset, path: string, field: string): void {
  if (dataset.data.length !== dataset.length) {
    throw invalid(
      `dataset '${field}' declares length ${dataset.length} but holds ${dataset.data.length} values`,
      path,
      field
    );
  }
}

function decodeNumber(value: StoredValue, type: StorageType, path: string, field: string): number {
  const decoded = type.class === "float" ? fromStoredNumber(value) : typeof value === "number" ? value : undefined;
  if (decoded === undefined || !fitsStorageType(decoded, type)) {
    throw invalid(`value ${JSON.stringify(value)} in '${field}' does not fit ${storageTypeName(type)}`, path, field);
  }
  return decoded;
}

/**
 * Decode an integer or float dataset, restoring missing values
 * @param path - File the dataset came from, for error reporting
 */
export function decodeNumericDataset(dataset: Dataset, path: string, field: string): Array<number | null> {
  const { type } = dataset;
  if (type.class === "string") {
    throw invalid(`dataset '${field}' should be numeric but is stored as ${storageTypeName(type)}`, path, field);
  }
  checkShape(dataset, path, field);

  const data = dataset.data.map((value) => decodeNumber(value, type, path, field));
  const placeholder =
    dataset.placeholder === undefined ? undefined : decodeNumber(dataset.placeholder, type, path, `${field}.placeholder`);
  return restoreMissing(data, placeholder);
}

export function decodeStringDataset(dataset: Dataset, path: string, field: string): Array<string | null> {
  const { type } = dataset;
  if (type.class !== "string") {
    throw invalid(`dataset '${field}' should be a string but is stored as ${storageTypeName(type)}`, path, field);
  }
  checkShape(dataset, path, field);

  const data = dataset.data.map((value) => {
    if (typeof value !== "string" || !fitsStorageType(value, type)) {
      throw invalid(`value ${JSON.stringify(value)} in '${field}' does not fit ${storageTypeName(type)}`, path, field);
    }
    return value;
  });
  if (dataset.placeholder !== undefined && typeof dataset.placeholder !== "string") {
    throw invalid(`placeholder of '${field}' should be a string`, path, `${field}.placeholder`);
  }
  return restoreMissing(data, dataset.placeholder);
}

/**
 * Decode a boolean dataset stored as int8 0/1
 */
export function decodeBooleanDataset(dataset: Dataset, path: string, field: string): Array<boolean | null> {
  const { type } = dataset;
  if (type.class !== "integer" || !type.signed || type.bits !== 8) {
    throw invalid(`dataset '${field}' should be int8 but is stored as ${storageTypeName(type)}`, path, field);
  }
  return decodeNumericDataset(dataset, path, field).map((value) => {
    if (value === null) return null;
    if (value !== 0 && value !== 1) {
      throw invalid(`boolean dataset '${field}' holds ${value}`, path, field);
    }
    return value === 1;
  });
}

// ============================================================================
// File I/O
// ============================================================================

export function datasetFilePath(dir: string): string {
  return join(dir, DATASET_FILE);
}

export function hasDatasetFile(dir: string): boolean {
  return existsSync(datasetFilePath(dir));
}

/**
 * Read and check the dataset file of an object directory
 */
export function readDatasetFile(dir: string): DatasetFile {
  const file = datasetFilePath(dir);
  if (!existsSync(file)) {
    throw new StructuralViolationError("invalid-contents", `missing '${DATASET_FILE}' in '${dir}'`, { path: file });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedMetadataError(`'${file}' is not valid JSON: ${reason}`, { path: file });
  }

  const result = DatasetFileSchema.safeParse(raw);
  if (!result.success) {
    const { field, message } = describeIssue(result.error);
    throw new MalformedMetadataError(`invalid dataset file '${file}': ${message}`, { path: file, field });
  }
  return result.data;
}

export function writeDatasetFile(dir: string, contents: DatasetFile): void {
  writeFileSync(datasetFilePath(dir), `${JSON.stringify(contents)}\n`, "utf-8");
}

/**
 * Look up a dataset by name
 * @throws StructuralViolationError when it is absent
 */
export function requireDataset(contents: DatasetFile, name: string, dir: string): Dataset {
  const dataset = contents.datasets[name];
  if (!dataset) {
    throw invalid(`expected a '${name}' dataset in '${DATASET_FILE}'`, datasetFilePath(dir), name);
  }
  return dataset;
}
