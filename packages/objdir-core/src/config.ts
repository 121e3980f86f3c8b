/**
 * Runtime configuration
 */

/**
 * Logger used by the validators; `console` satisfies it
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
}

export interface ObjDirConfig {
  /** Deepest nesting the validator follows before giving up (default 64) */
  maxDepth: number;
  /** Emit per-node debug lines (default false) */
  debug: boolean;
}

export const DEFAULT_MAX_DEPTH = 64;

export function loadConfig(env: Record<string, string | undefined> = process.env): ObjDirConfig {
  const maxDepth = parseInt(env.OBJDIR_MAX_DEPTH ?? String(DEFAULT_MAX_DEPTH), 10);
  return {
    maxDepth: Number.isFinite(maxDepth) && maxDepth > 0 ? maxDepth : DEFAULT_MAX_DEPTH,
    debug: env.OBJDIR_DEBUG === "1" || env.OBJDIR_DEBUG === "true",
  };
}

const noop = (): void => {};

/**
 * Console logger with debug output switched on or off
 */
export function createConsoleLogger(debug: boolean): Logger {
  return {
    debug: debug ? (message, ...args) => console.debug(message, ...args) : noop,
    warn: (message, ...args) => console.warn(message, ...args),
  };
}
