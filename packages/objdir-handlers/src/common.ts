/**
 * Helpers shared by the built-in handlers
 */

import { mkdirSync } from "node:fs";
import { join } from "node:path";
import {
  type Column,
  type Dataset,
  datasetFilePath,
  type DatasetFile,
  decodeBooleanDataset,
  decodeNumericDataset,
  decodeStringDataset,
  describeIssue,
  getTypeSection,
  MalformedMetadataError,
  OBJECT_FILE,
  type ObjectMetadata,
  readDatasetFile,
  StructuralViolationError,
  VersionedSectionSchema,
  writeObjectMetadata,
} from "@objdir/core";
import type { z } from "zod";

export const SUPPORTED_MAJOR_VERSION = 1;
export const CURRENT_VERSION = "1.0";

/**
 * Check the `<type>.version` section of an OBJECT document
 * @throws MalformedMetadataError for a missing or unsupported version
 */
export function checkVersion(path: string, metadata: ObjectMetadata): string {
  const file = join(path, OBJECT_FILE);
  const field = `${metadata.type}.version`;
  const result = VersionedSectionSchema.safeParse(getTypeSection(metadata, path));
  if (!result.success) {
    throw new MalformedMetadataError(`invalid '${field}' in '${file}': ${describeIssue(result.error).message}`, {
      path: file,
      field,
    });
  }

  const version = result.data.version;
  const major = Number.parseInt(version.split(".")[0] ?? "", 10);
  if (major !== SUPPORTED_MAJOR_VERSION) {
    throw new MalformedMetadataError(`unsupported version string '${version}' in '${file}'`, { path: file, field });
  }
  return version;
}

/**
 * Parse the `attributes` block of a dataset file
 */
export function parseAttributes<T>(path: string, contents: DatasetFile, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const result = schema.safeParse(contents.attributes ?? {});
  if (!result.success) {
    const { field, message } = describeIssue(result.error);
    throw new StructuralViolationError("invalid-contents", `invalid attributes in '${datasetFilePath(path)}': ${message}`, {
      path: datasetFilePath(path),
      field: field === undefined ? "attributes" : `attributes.${field}`,
    });
  }
  return result.data;
}

/**
 * Read the dataset file of an object, with its attributes parsed by `schema`
 */
export function readContents<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): { contents: DatasetFile; attributes: T } {
  const contents = readDatasetFile(path);
  return { contents, attributes: parseAttributes(path, contents, schema) };
}

/**
 * Create an object directory and its OBJECT file
 */
export function createObjectDirectory(path: string, type: string): void {
  mkdirSync(path, { recursive: true });
  writeObjectMetadata(path, type, { [type]: { version: CURRENT_VERSION } });
}

export function invalidContents(path: string, message: string, field?: string): StructuralViolationError {
  return new StructuralViolationError("invalid-contents", message, { path: datasetFilePath(path), field });
}

export type ColumnKind = Column["kind"];

/**
 * Decode a dataset into a column of the given kind
 * @param field - Dataset name, for error reporting
 */
export function decodeColumn(path: string, kind: ColumnKind, dataset: Dataset, field: string): Column {
  const file = datasetFilePath(path);
  switch (kind) {
    case "integer":
      if (dataset.type.class !== "integer") {
        throw invalidContents(path, `integer dataset '${field}' should use an integer container`, field);
      }
      return { kind, values: decodeNumericDataset(dataset, file, field) };
    case "number":
      return { kind, values: decodeNumericDataset(dataset, file, field) };
    case "string":
      return { kind, values: decodeStringDataset(dataset, file, field) };
    case "boolean":
      return { kind, values: decodeBooleanDataset(dataset, file, field) };
  }
}

/**
 * Decode a string dataset that may not contain missing values
 */
export function decodeStrings(path: string, dataset: Dataset, field: string): string[] {
  const values = decodeStringDataset(dataset, datasetFilePath(path), field);
  return values.map((value, i) => {
    if (value === null) {
      throw invalidContents(path, `'${field}' should not contain missing values (index ${i})`, field);
    }
    return value;
  });
}
