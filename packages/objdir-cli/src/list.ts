/**
 * list command implementation
 */

import { resolve } from "node:path";
import {
  detectLayout,
  type DirectoryLayout,
  type LegacyMetadata,
  listLegacyObjects,
  listObjects,
  type ObjectListing,
  type RedirectionMetadata,
} from "@objdir/core";
import chalk from "chalk";

export interface ListOptions {
  dir: string;
  /** Include objects nested inside other objects */
  children?: boolean;
  layout?: DirectoryLayout;
}

export interface ListResult {
  success: boolean;
  dir: string;
  layout?: DirectoryLayout;
  entries: ObjectListing[];
  errors: string[];
}

function legacyEntry(path: string, doc: LegacyMetadata | RedirectionMetadata): ObjectListing {
  if ("redirection" in doc) {
    return { path, type: doc.$schema, child: false };
  }
  return { path, type: doc.$schema, child: doc.is_child === true };
}

export function runList(options: ListOptions): ListResult {
  const dir = resolve(options.dir);
  try {
    const layout = options.layout ?? detectLayout(dir);
    const children = options.children ?? false;

    const entries =
      layout === "current"
        ? listObjects(dir, { includeChildren: children })
        : Object.entries(listLegacyObjects(dir, { ignoreChildren: !children }))
            .map(([path, doc]) => legacyEntry(path, doc))
            .sort((a, b) => a.path.localeCompare(b.path));

    return { success: true, dir, layout, entries, errors: [] };
  } catch (error) {
    return { success: false, dir, entries: [], errors: [error instanceof Error ? error.message : String(error)] };
  }
}

export function printListResult(result: ListResult): void {
  if (!result.success) {
    console.error(chalk.red("✗ Failed to list objects in"), chalk.cyan(result.dir));
    for (const e of result.errors) {
      console.error(chalk.red("  " + e));
    }
    return;
  }

  console.log(chalk.bold(`${result.entries.length} object(s)`), chalk.dim(`(${result.layout} layout)`));
  for (const entry of result.entries) {
    const marker = entry.child ? chalk.dim(" (child)") : "";
    console.log(`  ${entry.path === "" ? "." : entry.path}  ${chalk.yellow(entry.type)}${marker}`);
  }
}
