/**
 * data_frame: a table of named columns sharing one row count
 *
 * contents.json:
 * - `column_names`, optional `row_names`
 * - one dataset per atomic column, named by column index (`"0"`, `"1"`, ...)
 * - factor columns also store `"<i>:levels"`
 * - `attributes`: `{ row_count, columns: [{ type, ordered? }] }`
 *
 * Columns of type `other` are child objects under other_columns/<i>.
 * Optional children: column_annotations (a DATA_FRAME with one row per
 * column) and other_annotations (a SIMPLE_LIST).
 */

import { existsSync } from "node:fs";
import { join } from "node:path";
import {
  type Column,
  type ConflictPolicy,
  type Dataset,
  datasetFilePath,
  type DatasetFile,
  type DimensionsFunction,
  encodeColumn,
  type HeightFunction,
  INTERFACES,
  isDirectory,
  listSubdirectories,
  readDatasetFile,
  requireDataset,
  StructuralViolationError,
  type TypeRegistry,
  type ValidateFunction,
  type ValidationContext,
  writeDatasetFile,
} from "@objdir/core";
import { z } from "zod";
import { checkVersion, createObjectDirectory, decodeColumn, decodeStrings, invalidContents, parseAttributes } from "./common.ts";
import type { SavableObject } from "./simple-list.ts";
import { decodeFactor, defaultLevels, encodeFactor } from "./string-factor.ts";

export const DATA_FRAME = "data_frame";
export const OTHER_COLUMNS_DIR = "other_columns";
export const COLUMN_ANNOTATIONS_DIR = "column_annotations";
export const OTHER_ANNOTATIONS_DIR = "other_annotations";

const ColumnSpecSchema = z.object({
  type: z.enum(["integer", "number", "string", "boolean", "factor", "other"]),
  ordered: z.boolean().optional(),
});

const AttributesSchema = z.object({
  row_count: z.number().int().nonnegative(),
  columns: z.array(ColumnSpecSchema),
});
type Attributes = z.infer<typeof AttributesSchema>;

export type DataFrameColumnType = z.infer<typeof ColumnSpecSchema>["type"];

// ============================================================================
// Reading
// ============================================================================

export type LoadedDataFrameColumn =
  | Column
  | { kind: "factor"; values: Array<string | null>; codes: Array<number | null>; levels: string[]; ordered: boolean }
  | { kind: "other"; path: string };

export interface LoadedDataFrame {
  rowCount: number;
  columnNames: string[];
  rowNames?: string[];
  columns: LoadedDataFrameColumn[];
}

function extentMismatch(path: string, message: string, field?: string): StructuralViolationError {
  return new StructuralViolationError("extent-mismatch", message, { path, field });
}

function readColumnNames(path: string, contents: DatasetFile, attributes: Attributes): string[] {
  const names = decodeStrings(path, requireDataset(contents, "column_names", path), "column_names");
  if (names.length !== attributes.columns.length) {
    throw invalidContents(
      path,
      `'column_names' holds ${names.length} names but ${attributes.columns.length} columns are declared`,
      "column_names"
    );
  }

  const seen = new Set<string>();
  for (const name of names) {
    if (name === "") {
      throw invalidContents(path, "column names should not be empty", "column_names");
    }
    if (seen.has(name)) {
      throw invalidContents(path, `duplicated column name '${name}'`, "column_names");
    }
    seen.add(name);
  }
  return names;
}

function readColumn(
  path: string,
  contents: DatasetFile,
  index: number,
  spec: Attributes["columns"][number]
): LoadedDataFrameColumn {
  const field = String(index);
  switch (spec.type) {
    case "other":
      return { kind: "other", path: join(path, OTHER_COLUMNS_DIR, field) };
    case "factor": {
      const levelsField = `${field}:levels`;
      const factor = decodeFactor(
        path,
        requireDataset(contents, field, path),
        requireDataset(contents, levelsField, path),
        field,
        levelsField
      );
      return { kind: "factor", ...factor, ordered: spec.ordered ?? false };
    }
    default:
      return decodeColumn(path, spec.type, requireDataset(contents, field, path), field);
  }
}

function columnLength(column: LoadedDataFrameColumn): number | undefined {
  return column.kind === "other" ? undefined : column.values.length;
}

/**
 * Decode the inline parts of a data frame; `other` columns are returned as paths
 */
export function readDataFrame(path: string): LoadedDataFrame {
  const contents = readDatasetFile(path);
  const attributes = parseAttributes(path, contents, AttributesSchema);
  const rowCount = attributes.row_count;
  const file = datasetFilePath(path);

  const frame: LoadedDataFrame = {
    rowCount,
    columnNames: readColumnNames(path, contents, attributes),
    columns: attributes.columns.map((spec, i) => readColumn(path, contents, i, spec)),
  };

  frame.columns.forEach((column, i) => {
    const length = columnLength(column);
    if (length !== undefined && length !== rowCount) {
      throw extentMismatch(file, `column ${i} has length ${length} but the data frame has ${rowCount} rows`, String(i));
    }
  });

  const rowNamesDataset = contents.datasets.row_names;
  if (rowNamesDataset !== undefined) {
    const rowNames = decodeStrings(path, rowNamesDataset, "row_names");
    if (rowNames.length !== rowCount) {
      throw extentMismatch(file, `'row_names' holds ${rowNames.length} names but the data frame has ${rowCount} rows`, "row_names");
    }
    frame.rowNames = rowNames;
  }
  return frame;
}

// ============================================================================
// Children
// ============================================================================

function validateOtherColumns(path: string, frame: LoadedDataFrame, context: ValidationContext): void {
  const dir = join(path, OTHER_COLUMNS_DIR);
  const others: Array<{ index: number; path: string }> = [];
  frame.columns.forEach((column, index) => {
    if (column.kind === "other") others.push({ index, path: column.path });
  });

  let stored = 0;
  if (existsSync(dir)) {
    if (!isDirectory(dir)) {
      throw new StructuralViolationError("not-a-directory", `expected '${OTHER_COLUMNS_DIR}' to be a directory`, { path: dir });
    }
    stored = listSubdirectories(dir).length;
  }
  if (stored !== others.length) {
    throw invalidContents(path, `expected ${others.length} objects in '${OTHER_COLUMNS_DIR}' but found ${stored}`);
  }

  for (const child of others) {
    context.validateChild(child.path);
    const height = context.childHeight(child.path);
    if (height !== frame.rowCount) {
      throw extentMismatch(
        child.path,
        `column ${child.index} has height ${height} but the data frame has ${frame.rowCount} rows`
      );
    }
  }
}

function validateAnnotations(path: string, frame: LoadedDataFrame, context: ValidationContext): void {
  const columnAnnotations = join(path, COLUMN_ANNOTATIONS_DIR);
  if (existsSync(columnAnnotations)) {
    context.validateChildWithInterface(columnAnnotations, INTERFACES.DATA_FRAME);
    const height = context.childHeight(columnAnnotations);
    if (height !== frame.columns.length) {
      throw extentMismatch(
        columnAnnotations,
        `'${COLUMN_ANNOTATIONS_DIR}' has ${height} rows but the data frame has ${frame.columns.length} columns`
      );
    }
  }

  const otherAnnotations = join(path, OTHER_ANNOTATIONS_DIR);
  if (existsSync(otherAnnotations)) {
    context.validateChildWithInterface(otherAnnotations, INTERFACES.SIMPLE_LIST);
  }
}

// ============================================================================
// Writing
// ============================================================================

export interface FactorColumn {
  kind: "factor";
  values: ReadonlyArray<string | null>;
  levels?: ReadonlyArray<string>;
  ordered?: boolean;
}

export type DataFrameColumn = Column | FactorColumn | SavableObject;

export interface DataFrame {
  rowCount: number;
  columns: ReadonlyArray<{ name: string; column: DataFrameColumn }>;
  rowNames?: ReadonlyArray<string>;
  columnAnnotations?: SavableObject;
  otherAnnotations?: SavableObject;
}

/**
 * Write a data frame as a new object directory
 */
export function saveDataFrame(path: string, frame: DataFrame): void {
  const datasets: Record<string, Dataset> = {
    column_names: encodeColumn({ kind: "string", values: frame.columns.map((entry) => entry.name) }),
  };
  const specs: Attributes["columns"] = [];
  const others: Array<{ index: number; object: SavableObject }> = [];

  frame.columns.forEach(({ name, column }, i) => {
    const field = String(i);
    if (column.kind === "object") {
      specs.push({ type: "other" });
      others.push({ index: i, object: column });
      return;
    }
    if (column.values.length !== frame.rowCount) {
      throw new Error(`column '${name}' should have ${frame.rowCount} values`);
    }
    if (column.kind === "factor") {
      const levels = column.levels ?? defaultLevels(column.values);
      datasets[field] = encodeColumn({ kind: "integer", values: encodeFactor(column.values, levels) });
      datasets[`${field}:levels`] = encodeColumn({ kind: "string", values: levels });
      specs.push(column.ordered ? { type: "factor", ordered: true } : { type: "factor" });
      return;
    }
    datasets[field] = encodeColumn(column);
    specs.push({ type: column.kind });
  });

  if (frame.rowNames !== undefined) {
    if (frame.rowNames.length !== frame.rowCount) {
      throw new Error(`'rowNames' should have ${frame.rowCount} entries`);
    }
    datasets.row_names = encodeColumn({ kind: "string", values: frame.rowNames });
  }

  createObjectDirectory(path, DATA_FRAME);
  writeDatasetFile(path, { datasets, attributes: { row_count: frame.rowCount, columns: specs } });
  for (const { index, object } of others) {
    object.save(join(path, OTHER_COLUMNS_DIR, String(index)));
  }
  frame.columnAnnotations?.save(join(path, COLUMN_ANNOTATIONS_DIR));
  frame.otherAnnotations?.save(join(path, OTHER_ANNOTATIONS_DIR));
}

// ============================================================================
// Handlers
// ============================================================================

export const validateDataFrame: ValidateFunction = (path, metadata, context) => {
  checkVersion(path, metadata);
  const frame = readDataFrame(path);
  validateOtherColumns(path, frame, context);
  validateAnnotations(path, frame, context);
};

function readShape(path: string): Attributes {
  return parseAttributes(path, readDatasetFile(path), AttributesSchema);
}

export const dataFrameHeight: HeightFunction = (path) => readShape(path).row_count;

export const dataFrameDimensions: DimensionsFunction = (path) => {
  const { row_count, columns } = readShape(path);
  return [row_count, columns.length];
};

export function registerDataFrame(registry: TypeRegistry, policy?: ConflictPolicy): void {
  registry.registerValidate(DATA_FRAME, validateDataFrame, policy);
  registry.registerHeight(DATA_FRAME, dataFrameHeight, policy);
  registry.registerDimensions(DATA_FRAME, dataFrameDimensions, policy);
  registry.declareInterface(DATA_FRAME, INTERFACES.DATA_FRAME);
}
