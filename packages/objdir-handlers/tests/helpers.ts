/**
 * Shared test helpers
 */
import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type DatasetFile, readDatasetFile, writeDatasetFile } from "@objdir/core";

export function createTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `objdir-${prefix}-`));
}

export function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

/**
 * Rewrite an object's contents.json in place
 */
export function updateDatasetFile(dir: string, edit: (contents: DatasetFile) => void): void {
  const contents = readDatasetFile(dir);
  edit(contents);
  writeDatasetFile(dir, contents);
}
