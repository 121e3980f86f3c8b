/**
 * redirect command implementation: legacy short-hand links
 */

import { join, resolve } from "node:path";
import { createLegacyRedirection, type RedirectionMetadata } from "@objdir/core";
import chalk from "chalk";

export interface RedirectOptions {
  dir: string;
  /** Alias path, relative to `dir`, without the .json suffix */
  src: string;
  /** Existing object path the alias points at */
  dest: string;
}

export interface RedirectResult {
  success: boolean;
  file: string;
  document?: RedirectionMetadata;
  errors: string[];
}

export function runRedirect(options: RedirectOptions): RedirectResult {
  const dir = resolve(options.dir);
  const file = join(dir, `${options.src}.json`);
  try {
    const document = createLegacyRedirection(dir, options.src, options.dest);
    return { success: true, file, document, errors: [] };
  } catch (error) {
    return { success: false, file, errors: [error instanceof Error ? error.message : String(error)] };
  }
}

export function printRedirectResult(result: RedirectResult): void {
  if (result.success && result.document) {
    const target = result.document.redirection.targets[0]?.location ?? "";
    console.log(chalk.green("✓ Redirection written"), chalk.cyan(result.file), chalk.dim(`-> ${target}`));
    return;
  }
  console.error(chalk.red("✗ Failed to write redirection"), chalk.cyan(result.file));
  for (const e of result.errors) {
    console.error(chalk.red("  " + e));
  }
}
