/**
 * simple_list: a possibly-nested, possibly-named list
 *
 * Atomic elements live inline in list_contents.json. Any other object is
 * saved as a child under other_contents/<index> and referenced from the list
 * as `{ "type": "external", "index": <index> }`.
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import {
  type Column,
  type ConflictPolicy,
  describeIssue,
  fromStoredNumber,
  type HeightFunction,
  INTERFACES,
  isDirectory,
  listSubdirectories,
  StructuralViolationError,
  toStoredNumber,
  type TypeRegistry,
  type ValidateFunction,
} from "@objdir/core";
import { INTEGER_INPUT_MAX, INTEGER_INPUT_MIN } from "@objdir/encoding";
import { z } from "zod";
import { checkVersion, createObjectDirectory } from "./common.ts";

export const SIMPLE_LIST = "simple_list";
export const LIST_CONTENTS_FILE = "list_contents.json";
export const OTHER_CONTENTS_DIR = "other_contents";

// ============================================================================
// list_contents.json
// ============================================================================

export type ListElementJson =
  | { type: "integer"; values: Array<number | null> }
  | { type: "number"; values: Array<number | string | null> }
  | { type: "string"; values: Array<string | null> }
  | { type: "boolean"; values: Array<boolean | null> }
  | { type: "nothing" }
  | { type: "external"; index: number }
  | { type: "list"; values: ListElementJson[]; names?: string[] };

const ListElementSchema: z.ZodType<ListElementJson> = z.lazy(() =>
  z.discriminatedUnion("type", [
    z.object({
      type: z.literal("integer"),
      values: z.array(z.number().int().gte(INTEGER_INPUT_MIN).lte(INTEGER_INPUT_MAX).nullable()),
    }),
    z.object({
      type: z.literal("number"),
      values: z.array(z.union([z.number(), z.enum(["NaN", "Inf", "-Inf", "-0"]), z.null()])),
    }),
    z.object({ type: z.literal("string"), values: z.array(z.string().nullable()) }),
    z.object({ type: z.literal("boolean"), values: z.array(z.boolean().nullable()) }),
    z.object({ type: z.literal("nothing") }),
    z.object({ type: z.literal("external"), index: z.number().int().nonnegative() }),
    z.object({
      type: z.literal("list"),
      values: z.array(ListElementSchema),
      names: z.array(z.string()).optional(),
    }),
  ])
);

const ListContentsSchema = z.object({
  type: z.literal("list"),
  values: z.array(ListElementSchema),
  names: z.array(z.string()).optional(),
});
type ListContents = z.infer<typeof ListContentsSchema>;

function invalidList(path: string, message: string, field?: string): StructuralViolationError {
  return new StructuralViolationError("invalid-contents", message, { path: join(path, LIST_CONTENTS_FILE), field });
}

function readListContents(path: string): ListContents {
  const file = join(path, LIST_CONTENTS_FILE);
  if (!existsSync(file)) {
    throw invalidList(path, `missing '${LIST_CONTENTS_FILE}' in '${path}'`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw invalidList(path, `'${file}' is not valid JSON: ${reason}`);
  }

  const result = ListContentsSchema.safeParse(raw);
  if (!result.success) {
    const { field, message } = describeIssue(result.error);
    throw invalidList(path, `invalid list contents in '${file}': ${message}`, field);
  }
  return result.data;
}

// ============================================================================
// Reading
// ============================================================================

export type LoadedListItem =
  | Column
  | { kind: "nothing" }
  | { kind: "list"; items: LoadedListItem[]; names?: string[] }
  | { kind: "external"; index: number; path: string };

export interface LoadedSimpleList {
  items: LoadedListItem[];
  names?: string[];
}

function checkNames(path: string, names: string[] | undefined, length: number, field: string): void {
  if (names !== undefined && names.length !== length) {
    throw invalidList(path, `'${field}' should have the same length as the list values`, field);
  }
}

function toNumber(path: string, value: number | string | null, field: string): number | null {
  if (value === null) return null;
  const decoded = fromStoredNumber(value);
  if (decoded === undefined) {
    throw invalidList(path, `unknown number value '${value}'`, field);
  }
  return decoded;
}

function loadElement(path: string, element: ListElementJson, field: string): LoadedListItem {
  switch (element.type) {
    case "integer":
      return { kind: "integer", values: element.values };
    case "string":
      return { kind: "string", values: element.values };
    case "boolean":
      return { kind: "boolean", values: element.values };
    case "number":
      return { kind: "number", values: element.values.map((value) => toNumber(path, value, field)) };
    case "nothing":
      return { kind: "nothing" };
    case "external":
      return { kind: "external", index: element.index, path: join(path, OTHER_CONTENTS_DIR, String(element.index)) };
    case "list": {
      checkNames(path, element.names, element.values.length, `${field}.names`);
      const items = element.values.map((child, i) => loadElement(path, child, `${field}.values.${i}`));
      return element.names === undefined ? { kind: "list", items } : { kind: "list", items, names: element.names };
    }
  }
}

/**
 * Parse list_contents.json without visiting the external children
 */
export function readSimpleList(path: string): LoadedSimpleList {
  const contents = readListContents(path);
  checkNames(path, contents.names, contents.values.length, "names");
  const items = contents.values.map((element, i) => loadElement(path, element, `values.${i}`));
  return contents.names === undefined ? { items } : { items, names: contents.names };
}

function collectExternalIndices(items: ReadonlyArray<LoadedListItem>, into: number[]): number[] {
  for (const item of items) {
    if (item.kind === "external") {
      into.push(item.index);
    } else if (item.kind === "list") {
      collectExternalIndices(item.items, into);
    }
  }
  return into;
}

/**
 * Number of external children stored under other_contents/
 */
function countExternals(path: string): number {
  const dir = join(path, OTHER_CONTENTS_DIR);
  if (!existsSync(dir)) {
    return 0;
  }
  if (!isDirectory(dir)) {
    throw new StructuralViolationError("not-a-directory", `expected '${OTHER_CONTENTS_DIR}' to be a directory`, {
      path: dir,
    });
  }
  return listSubdirectories(dir).length;
}

// ============================================================================
// Writing
// ============================================================================

/**
 * Something that can write itself as an object directory
 */
export interface SavableObject {
  kind: "object";
  save(path: string): void;
}

export type ListItem =
  | Column
  | { kind: "nothing" }
  | { kind: "list"; items: ReadonlyArray<ListItem>; names?: ReadonlyArray<string> }
  | SavableObject;

export interface SimpleList {
  items: ReadonlyArray<ListItem>;
  names?: ReadonlyArray<string>;
}

function toElement(item: ListItem, externals: SavableObject[]): ListElementJson {
  switch (item.kind) {
    case "integer":
      return { type: "integer", values: [...item.values] };
    case "number":
      return { type: "number", values: item.values.map((value) => (value === null ? null : toStoredNumber(value))) };
    case "string":
      return { type: "string", values: [...item.values] };
    case "boolean":
      return { type: "boolean", values: [...item.values] };
    case "nothing":
      return { type: "nothing" };
    case "object":
      externals.push(item);
      return { type: "external", index: externals.length - 1 };
    case "list": {
      if (item.names !== undefined && item.names.length !== item.items.length) {
        throw new Error("'names' and 'items' should have the same length");
      }
      const values = item.items.map((child) => toElement(child, externals));
      return item.names === undefined ? { type: "list", values } : { type: "list", values, names: [...item.names] };
    }
  }
}

/**
 * Write a list as a new object directory, saving non-atomic items as children
 */
export function saveSimpleList(path: string, list: SimpleList): void {
  const externals: SavableObject[] = [];
  const root = toElement({ kind: "list", items: list.items, names: list.names }, externals);

  createObjectDirectory(path, SIMPLE_LIST);
  writeFileSync(join(path, LIST_CONTENTS_FILE), `${JSON.stringify(root)}\n`);
  externals.forEach((external, i) => {
    external.save(join(path, OTHER_CONTENTS_DIR, String(i)));
  });
}

// ============================================================================
// Handlers
// ============================================================================

export const validateSimpleList: ValidateFunction = (path, metadata, context) => {
  checkVersion(path, metadata);
  const list = readSimpleList(path);

  const count = countExternals(path);
  const seen = new Set<number>();
  for (const index of collectExternalIndices(list.items, [])) {
    if (index >= count) {
      throw invalidList(path, `external index ${index} is out of range (${count} stored children)`);
    }
    if (seen.has(index)) {
      throw invalidList(path, `external index ${index} is referenced more than once`);
    }
    seen.add(index);
  }
  if (seen.size < count) {
    throw invalidList(path, "fewer instances of type 'external' than expected");
  }

  for (let i = 0; i < count; i++) {
    context.validateChild(join(path, OTHER_CONTENTS_DIR, String(i)));
  }
};

export const simpleListHeight: HeightFunction = (path) => {
  return readListContents(path).values.length;
};

export function registerSimpleList(registry: TypeRegistry, policy?: ConflictPolicy): void {
  registry.registerValidate(SIMPLE_LIST, validateSimpleList, policy);
  registry.registerHeight(SIMPLE_LIST, simpleListHeight, policy);
  registry.registerDimensions(SIMPLE_LIST, (path, metadata, context) => [simpleListHeight(path, metadata, context)], policy);
  registry.declareInterface(SIMPLE_LIST, INTERFACES.SIMPLE_LIST);
}
