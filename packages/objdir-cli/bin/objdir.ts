#!/usr/bin/env tsx
/**
 * objdir - object directory validation CLI
 *
 * Usage:
 *   objdir validate <dir>               Validate every object in a directory
 *   objdir list <dir>                   List the objects in a directory
 *   objdir redirect <dir> <src> <dest>  Write a legacy redirection
 */

import { Command, InvalidArgumentError } from "commander";
import { type LayoutFlags, layoutFromFlags, loadCliConfig, resolveSettings, type ValidateFlags } from "../src/config.ts";
import { printListResult, runList } from "../src/list.ts";
import { printRedirectResult, runRedirect } from "../src/redirect.ts";
import { printValidateResult, runValidate } from "../src/validate.ts";

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("expected a positive integer");
  }
  return parsed;
}

/**
 * Run a setup step, exiting with status 1 when it throws
 */
function orExit<T>(step: () => T): T {
  try {
    return step();
  } catch (error) {
    console.error("Error:", error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

const program = new Command();

program.name("objdir").description("Validate and inspect object directories").version("0.1.0");

// validate command
program
  .command("validate")
  .description("Validate every object stored under a directory")
  .argument("<dir>", "directory to validate")
  .option("--legacy", "treat the directory as a legacy metadata-graph layout")
  .option("--current", "treat the directory as a current (OBJECT file) layout")
  .option("--max-depth <n>", "deepest object nesting to follow", parsePositiveInt)
  .option("--debug", "log every visited object")
  .action((dir: string, flags: ValidateFlags) => {
    const settings = orExit(() => resolveSettings(flags, loadCliConfig()));
    const result = runValidate({ dir, ...settings });
    printValidateResult(result);
    process.exit(result.success ? 0 : 1);
  });

// list command
program
  .command("list")
  .description("List the objects stored under a directory")
  .argument("<dir>", "directory to list")
  .option("-c, --children", "include objects nested inside other objects")
  .option("--legacy", "treat the directory as a legacy metadata-graph layout")
  .option("--current", "treat the directory as a current (OBJECT file) layout")
  .action((dir: string, flags: LayoutFlags & { children?: boolean }) => {
    const layout = orExit(() => layoutFromFlags(flags) ?? loadCliConfig().layout);
    const result = runList({ dir, children: flags.children, layout });
    printListResult(result);
    process.exit(result.success ? 0 : 1);
  });

// redirect command
program
  .command("redirect")
  .description("Create a legacy short-hand link from <src> to <dest>")
  .argument("<dir>", "legacy directory")
  .argument("<src>", "alias path, without the .json suffix")
  .argument("<dest>", "existing object path")
  .action((dir: string, src: string, dest: string) => {
    const result = runRedirect({ dir, src, dest });
    printRedirectResult(result);
    process.exit(result.success ? 0 : 1);
  });

program.parse();
