/**
 * string_factor: categorical values stored as integer codes into unique levels
 */

import {
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

export const STRING_FACTOR = "string_factor";

const AttributesSchema = z.object({
  ordered: z.boolean().optional(),
});

export interface StringFactor {
  values: ReadonlyArray<string | null>;
  /** Defaults to the sorted unique non-missing values */
  levels?: ReadonlyArray<string>;
  ordered?: boolean;
  names?: ReadonlyArray<string>;
}

export interface LoadedStringFactor {
  values: Array<string | null>;
  codes: Array<number | null>;
  levels: string[];
  ordered: boolean;
  names?: string[];
}

/**
 * Check that factor levels are unique
 */
export function checkFactorLevels(path: string, levels: ReadonlyArray<string>, field: string): void {
  const seen = new Set<string>();
  for (const level of levels) {
    if (seen.has(level)) {
      throw invalidContents(path, `'${field}' contains duplicated factor level '${level}'`, field);
    }
    seen.add(level);
  }
}

/**
 * Check that every non-missing code indexes a level
 */
export function checkFactorCodes(path: string, codes: ReadonlyArray<number | null>, numLevels: number, field: string): void {
  for (const code of codes) {
    if (code !== null && (code < 0 || code >= numLevels)) {
      throw invalidContents(path, "expected factor codes to be less than the number of levels", field);
    }
  }
}

/**
 * Turn values into codes against a level set
 */
export function encodeFactor(values: ReadonlyArray<string | null>, levels: ReadonlyArray<string>): Array<number | null> {
  const index = new Map(levels.map((level, i) => [level, i] as const));
  return values.map((value) => {
    if (value === null) return null;
    const code = index.get(value);
    if (code === undefined) {
      throw new Error(`value '${value}' is not one of the factor levels`);
    }
    return code;
  });
}

export function defaultLevels(values: ReadonlyArray<string | null>): string[] {
  const unique = new Set<string>();
  for (const value of values) {
    if (value !== null) unique.add(value);
  }
  return Array.from(unique).sort();
}

/**
 * Decode codes and levels stored under the given dataset names
 */
export function decodeFactor(
  path: string,
  codesDataset: Dataset,
  levelsDataset: Dataset,
  codesField: string,
  levelsField: string
): { codes: Array<number | null>; levels: string[]; values: Array<string | null> } {
  const levels = decodeStrings(path, levelsDataset, levelsField);
  checkFactorLevels(path, levels, levelsField);

  const column = decodeColumn(path, "integer", codesDataset, codesField);
  if (column.kind !== "integer") {
    throw invalidContents(path, `'${codesField}' should hold integer codes`, codesField);
  }
  const codes = column.values;
  checkFactorCodes(path, codes, levels.length, codesField);

  const values = codes.map((code) => (code === null ? null : (levels[code] ?? null)));
  return { codes, levels, values };
}

export function readStringFactor(path: string): LoadedStringFactor {
  const { contents, attributes } = readContents(path, AttributesSchema);
  const { codes, levels, values } = decodeFactor(
    path,
    requireDataset(contents, "codes", path),
    requireDataset(contents, "levels", path),
    "codes",
    "levels"
  );

  const factor: LoadedStringFactor = { values, codes, levels, ordered: attributes.ordered ?? false };
  const namesDataset = contents.datasets.names;
  if (namesDataset !== undefined) {
    const names = decodeStrings(path, namesDataset, "names");
    if (names.length !== codes.length) {
      throw invalidContents(path, "'names' and 'codes' should have the same length", "names");
    }
    factor.names = names;
  }
  return factor;
}

export function saveStringFactor(path: string, factor: StringFactor): void {
  const levels = factor.levels ?? defaultLevels(factor.values);
  if (new Set(levels).size !== levels.length) {
    throw new Error("factor levels should be unique");
  }

  const datasets: Record<string, Dataset> = {
    codes: encodeColumn({ kind: "integer", values: encodeFactor(factor.values, levels) }),
    levels: encodeColumn({ kind: "string", values: levels }),
  };
  if (factor.names !== undefined) {
    if (factor.names.length !== factor.values.length) {
      throw new Error("'names' and 'values' should have the same length");
    }
    datasets.names = encodeColumn({ kind: "string", values: factor.names });
  }

  createObjectDirectory(path, STRING_FACTOR);
  writeDatasetFile(path, { datasets, attributes: factor.ordered ? { ordered: true } : {} });
}

// ============================================================================
// Handlers
// ============================================================================

export const validateStringFactor: ValidateFunction = (path, metadata) => {
  checkVersion(path, metadata);
  readStringFactor(path);
};

export const stringFactorHeight: HeightFunction = (path) => {
  return requireDataset(readDatasetFile(path), "codes", path).length;
};

export const stringFactorDimensions: DimensionsFunction = (path, metadata, context) => {
  return [stringFactorHeight(path, metadata, context)];
};

export function registerStringFactor(registry: TypeRegistry, policy?: ConflictPolicy): void {
  registry.registerValidate(STRING_FACTOR, validateStringFactor, policy);
  registry.registerHeight(STRING_FACTOR, stringFactorHeight, policy);
  registry.registerDimensions(STRING_FACTOR, stringFactorDimensions, policy);
}
