/**
 * @objdir/cli
 *
 * Command implementations behind the `objdir` binary. Each `run*` function
 * returns a result object; the matching `print*` function renders it.
 */

export {
  CONFIG_FILE,
  layoutFromFlags,
  loadCliConfig,
  resolveSettings,
  type CliConfig,
  type LayoutFlags,
  type ResolvedSettings,
  type ValidateFlags,
} from "./config.ts";
export { printListResult, runList, type ListOptions, type ListResult } from "./list.ts";
export { printRedirectResult, runRedirect, type RedirectOptions, type RedirectResult } from "./redirect.ts";
export {
  printValidateResult,
  runValidate,
  type ValidateFailure,
  type ValidateOptions,
  type ValidateResult,
} from "./validate.ts";
