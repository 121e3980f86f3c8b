/**
 * Registration of the built-in object types
 */

import { type ConflictPolicy, TypeRegistry } from "@objdir/core";
import { registerAtomicVector } from "./atomic-vector.ts";
import { registerDataFrame } from "./data-frame.ts";
import { registerSimpleList } from "./simple-list.ts";
import { registerStringFactor } from "./string-factor.ts";

/**
 * Install every built-in handler into `registry`
 *
 * With the default "keep-existing" policy, handlers the caller registered
 * earlier win over the built-ins.
 */
export function registerBuiltinHandlers(registry: TypeRegistry, policy: ConflictPolicy = "keep-existing"): TypeRegistry {
  registerAtomicVector(registry, policy);
  registerStringFactor(registry, policy);
  registerSimpleList(registry, policy);
  registerDataFrame(registry, policy);
  return registry;
}

/**
 * A fresh registry holding only the built-in handlers
 */
export function createDefaultRegistry(): TypeRegistry {
  return registerBuiltinHandlers(new TypeRegistry());
}
