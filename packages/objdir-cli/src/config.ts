/**
 * CLI configuration
 *
 * Precedence, highest first: command-line flags, objdir.json in the working
 * directory, OBJDIR_* environment variables.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { type DirectoryLayout, describeIssue, loadConfig } from "@objdir/core";
import { z } from "zod";

export const CONFIG_FILE = "objdir.json";

const CliConfigSchema = z.object({
  layout: z.enum(["current", "legacy"]).optional(),
  maxDepth: z.number().int().positive().optional(),
  debug: z.boolean().optional(),
});
export type CliConfig = z.infer<typeof CliConfigSchema>;

export interface LayoutFlags {
  legacy?: boolean;
  current?: boolean;
}

export interface ValidateFlags extends LayoutFlags {
  maxDepth?: number;
  debug?: boolean;
}

export interface ResolvedSettings {
  /** Undefined means "detect from the directory" */
  layout?: DirectoryLayout;
  maxDepth: number;
  debug: boolean;
}

/**
 * Load objdir.json from `cwd`; an absent file is an empty config
 * @throws Error when the file is not valid JSON or has unknown value types
 */
export function loadCliConfig(cwd: string = process.cwd()): CliConfig {
  const configPath = join(cwd, CONFIG_FILE);
  if (!existsSync(configPath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`${CONFIG_FILE} is not valid JSON: ${reason}`);
  }

  const result = CliConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`invalid ${CONFIG_FILE}: ${describeIssue(result.error).message}`);
  }
  return result.data;
}

export function layoutFromFlags(flags: LayoutFlags): DirectoryLayout | undefined {
  if (flags.legacy && flags.current) {
    throw new Error("--legacy and --current cannot be used together");
  }
  if (flags.legacy) return "legacy";
  if (flags.current) return "current";
  return undefined;
}

export function resolveSettings(
  flags: ValidateFlags,
  config: CliConfig,
  env: Record<string, string | undefined> = process.env
): ResolvedSettings {
  const base = loadConfig(env);
  return {
    layout: layoutFromFlags(flags) ?? config.layout,
    maxDepth: flags.maxDepth ?? config.maxDepth ?? base.maxDepth,
    debug: flags.debug ?? config.debug ?? base.debug,
  };
}
