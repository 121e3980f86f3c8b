/**
 * Whole-directory validation
 */

import { join, resolve } from "node:path";
import { createConsoleLogger, DEFAULT_MAX_DEPTH, type Logger } from "./config.ts";
import { OBJECT_FILE } from "./constants.ts";
import { StructuralViolationError } from "./errors.ts";
import { validateLegacyDirectory } from "./legacy.ts";
import { listObjects } from "./listing.ts";
import { isDirectory, listFilesRecursive } from "./paths.ts";
import type { TypeRegistry } from "./registry.ts";
import { ValidationPass } from "./validator.ts";

export type DirectoryLayout = "current" | "legacy";

export interface ValidateDirectoryOptions {
  registry: TypeRegistry;
  /** Force a layout; detected from the presence of OBJECT files when omitted */
  legacy?: boolean;
  maxDepth?: number;
  logger?: Logger;
}

export interface DirectoryValidationResult {
  layout: DirectoryLayout;
  /** Relative paths of the top-level (non-child) objects that were checked */
  objects: string[];
}

/**
 * Whether a directory uses the legacy metadata-graph layout,
 * i.e. contains no OBJECT file anywhere
 */
export function detectLayout(dir: string): DirectoryLayout {
  const hasObjectFile = listFilesRecursive(dir).some(
    (file) => file === OBJECT_FILE || file.endsWith(`/${OBJECT_FILE}`)
  );
  return hasObjectFile ? "current" : "legacy";
}

/**
 * Validate every object in a directory
 *
 * Current layout: each top-level object is validated, then every nested
 * object no handler referenced is reported as non-referenced.
 * Legacy layout: see {@link validateLegacyDirectory}.
 */
export function validateDirectory(dir: string, options: ValidateDirectoryOptions): DirectoryValidationResult {
  const root = resolve(dir);
  if (!isDirectory(root)) {
    throw new StructuralViolationError("not-a-directory", `'${root}' is not a directory`, { path: root });
  }

  const logger = options.logger ?? createConsoleLogger(false);
  const layout: DirectoryLayout =
    options.legacy === undefined ? detectLayout(root) : options.legacy ? "legacy" : "current";
  logger.debug(`[Directory] validating '${root}' as ${layout} layout`);

  if (layout === "legacy") {
    return { layout, objects: validateLegacyDirectory(root) };
  }

  const pass = new ValidationPass(root, options.registry, options.maxDepth ?? DEFAULT_MAX_DEPTH, logger);
  const all = listObjects(root, { includeChildren: true });
  const topLevel = all.filter((entry) => !entry.child);

  for (const entry of topLevel) {
    pass.validateObject(entry.path === "" ? root : join(root, entry.path));
  }

  for (const entry of all) {
    if (!entry.child) continue;
    const absolute = join(root, entry.path);
    if (!pass.visited.has(absolute)) {
      throw new StructuralViolationError("non-referenced-child", `non-referenced child object in '${entry.path}'`, {
        path: absolute,
      });
    }
  }

  return { layout, objects: topLevel.map((entry) => entry.path) };
}
