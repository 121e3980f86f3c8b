/**
 * validate command implementation
 */

import { resolve } from "node:path";
import {
  createConsoleLogger,
  type DirectoryLayout,
  isObjectDirError,
  ObjectDirError,
  type TypeRegistry,
  validateDirectory,
} from "@objdir/core";
import { createDefaultRegistry } from "@objdir/handlers";
import chalk from "chalk";

export interface ValidateOptions {
  dir: string;
  /** Force a layout instead of detecting it */
  layout?: DirectoryLayout;
  maxDepth?: number;
  debug?: boolean;
  /** Defaults to the built-in handlers */
  registry?: TypeRegistry;
}

export interface ValidateFailure {
  kind: string;
  message: string;
  path?: string;
  field?: string;
}

export interface ValidateResult {
  success: boolean;
  dir: string;
  layout?: DirectoryLayout;
  objects: string[];
  error?: ValidateFailure;
}

function describeFailure(error: unknown): ValidateFailure {
  if (error instanceof ObjectDirError) {
    return { kind: error.kind, message: error.message, path: error.path, field: error.field };
  }
  if (isObjectDirError(error)) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: "Error", message: error instanceof Error ? error.message : String(error) };
}

/**
 * Validate every object under a directory
 */
export function runValidate(options: ValidateOptions): ValidateResult {
  const dir = resolve(options.dir);
  try {
    const result = validateDirectory(dir, {
      registry: options.registry ?? createDefaultRegistry(),
      legacy: options.layout === undefined ? undefined : options.layout === "legacy",
      maxDepth: options.maxDepth,
      logger: createConsoleLogger(options.debug ?? false),
    });
    return { success: true, dir, layout: result.layout, objects: result.objects };
  } catch (error) {
    return { success: false, dir, objects: [], error: describeFailure(error) };
  }
}

export function printValidateResult(result: ValidateResult): void {
  if (result.success) {
    console.log(chalk.green("✓ Valid"), chalk.cyan(result.dir), chalk.dim(`(${result.layout} layout)`));
    for (const object of result.objects) {
      console.log(chalk.dim("  " + (object === "" ? "." : object)));
    }
    return;
  }

  console.error(chalk.red("✗ Validation failed"), chalk.cyan(result.dir));
  if (result.error) {
    console.error(chalk.red(`  [${result.error.kind}] ${result.error.message}`));
    if (result.error.field) {
      console.error(chalk.dim(`  field: ${result.error.field}`));
    }
  }
}
