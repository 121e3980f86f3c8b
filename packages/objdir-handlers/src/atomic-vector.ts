/**
 * atomic_vector: a 1-dimensional vector of integers, numbers, strings or booleans
 *
 * contents.json:
 * - `values` dataset
 * - optional `names` dataset, same length as `values`
 * - `attributes.type`: one of integer, number, string, boolean
 */

import {
  type Column,
  type ConflictPolicy,
  type Dataset,
  type DimensionsFunction,
  encodeColumn,
  type HeightFunction,
  readDatasetFile,
  requireDataset,
  type TypeRegistry,
  type ValidateFunction,
  writeDatasetFile,
} from "@objdir/core";
import { z } from "zod";
import { checkVersion, createObjectDirectory, decodeColumn, decodeStrings, invalidContents, readContents } from "./common.ts";

export const ATOMIC_VECTOR = "atomic_vector";

const AttributesSchema = z.object({
  type: z.enum(["integer", "number", "string", "boolean"]),
});

export type AtomicVector = Column & {
  names?: ReadonlyArray<string>;
};

export type LoadedAtomicVector = Column & {
  names?: string[];
};

/**
 * Decode an atomic vector from disk
 */
export function readAtomicVector(path: string): LoadedAtomicVector {
  const { contents, attributes } = readContents(path, AttributesSchema);
  const column = decodeColumn(path, attributes.type, requireDataset(contents, "values", path), "values");

  const namesDataset = contents.datasets.names;
  if (namesDataset === undefined) {
    return column;
  }
  const names = decodeStrings(path, namesDataset, "names");
  if (names.length !== column.values.length) {
    throw invalidContents(path, "'names' and 'values' should have the same length", "names");
  }
  return { ...column, names };
}

/**
 * Write an atomic vector as a new object directory
 */
export function saveAtomicVector(path: string, vector: AtomicVector): void {
  const datasets: Record<string, Dataset> = { values: encodeColumn(vector) };
  if (vector.names !== undefined) {
    if (vector.names.length !== vector.values.length) {
      throw new Error("'names' and 'values' should have the same length");
    }
    datasets.names = encodeColumn({ kind: "string", values: vector.names });
  }

  createObjectDirectory(path, ATOMIC_VECTOR);
  writeDatasetFile(path, { datasets, attributes: { type: vector.kind } });
}

// ============================================================================
// Handlers
// ============================================================================

export const validateAtomicVector: ValidateFunction = (path, metadata) => {
  checkVersion(path, metadata);
  readAtomicVector(path);
};

export const atomicVectorHeight: HeightFunction = (path) => {
  return requireDataset(readDatasetFile(path), "values", path).length;
};

export const atomicVectorDimensions: DimensionsFunction = (path, metadata, context) => {
  return [atomicVectorHeight(path, metadata, context)];
};

export function registerAtomicVector(registry: TypeRegistry, policy?: ConflictPolicy): void {
  registry.registerValidate(ATOMIC_VECTOR, validateAtomicVector, policy);
  registry.registerHeight(ATOMIC_VECTOR, atomicVectorHeight, policy);
  registry.registerDimensions(ATOMIC_VECTOR, atomicVectorDimensions, policy);
}
