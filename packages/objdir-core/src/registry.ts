import {
  type Capability,
  type ErrorContext,
  RegistryConflictError,
  UnknownTypeError,
  UnregisteredCapabilityError,
} from "./errors.ts";
import type { ConflictPolicy, DimensionsFunction, HeightFunction, ValidateFunction } from "./types.ts";

type HandlerFor<C extends Capability> = C extends "validate"
  ? ValidateFunction
  : C extends "height"
    ? HeightFunction
    : DimensionsFunction;

/**
 * Registry of per-type handlers
 *
 * Holds three independent handler maps (validate, height, dimensions) plus
 * interface membership and derivation edges, all keyed by type tag.
 * Every mutation runs to completion synchronously, so a lookup always sees
 * either the old or the new handler.
 */
export class TypeRegistry {
  private validators: Map<string, ValidateFunction> = new Map();
  private heights: Map<string, HeightFunction> = new Map();
  private dimensionHandlers: Map<string, DimensionsFunction> = new Map();
  private interfaces: Map<string, Set<string>> = new Map();
  private bases: Map<string, Set<string>> = new Map();

  // ============================================================================
  // Handler registration
  // ============================================================================

  /**
   * Register the validate handler for a type
   * @param fn - Handler, or null to remove the current one
   * @returns Whether the registry now holds `fn` (or no longer holds a handler when `fn` is null)
   */
  registerValidate(type: string, fn: ValidateFunction | null, policy: ConflictPolicy = "keep-existing"): boolean {
    return this.register(this.validators, "validate", type, fn, policy);
  }

  registerHeight(type: string, fn: HeightFunction | null, policy: ConflictPolicy = "keep-existing"): boolean {
    return this.register(this.heights, "height", type, fn, policy);
  }

  registerDimensions(type: string, fn: DimensionsFunction | null, policy: ConflictPolicy = "keep-existing"): boolean {
    return this.register(this.dimensionHandlers, "dimensions", type, fn, policy);
  }

  private register<F>(
    map: Map<string, F>,
    capability: Capability,
    type: string,
    fn: F | null,
    policy: ConflictPolicy
  ): boolean {
    if (fn === null) {
      map.delete(type);
      return true;
    }

    if (map.has(type)) {
      switch (policy) {
        case "keep-existing":
          return false;
        case "error-on-conflict":
          throw new RegistryConflictError(type, `a '${capability}' function is already registered for object type '${type}'`);
        case "replace":
          break;
      }
    }

    map.set(type, fn);
    return true;
  }

  // ============================================================================
  // Handler lookup
  // ============================================================================

  getValidate(type: string, context?: ErrorContext): ValidateFunction {
    return this.lookup(this.validators, "validate", type, context);
  }

  getHeight(type: string, context?: ErrorContext): HeightFunction {
    return this.lookup(this.heights, "height", type, context);
  }

  getDimensions(type: string, context?: ErrorContext): DimensionsFunction {
    return this.lookup(this.dimensionHandlers, "dimensions", type, context);
  }

  hasCapability(type: string, capability: Capability): boolean {
    switch (capability) {
      case "validate":
        return this.validators.has(type);
      case "height":
        return this.heights.has(type);
      case "dimensions":
        return this.dimensionHandlers.has(type);
    }
  }

  private lookup<C extends Capability>(
    map: Map<string, HandlerFor<C>>,
    capability: C,
    type: string,
    context: ErrorContext = {}
  ): HandlerFor<C> {
    const fn = map.get(type);
    if (fn) {
      return fn;
    }
    if (!this.knows(type)) {
      throw new UnknownTypeError(type, capability, context);
    }
    throw new UnregisteredCapabilityError(type, capability, context);
  }

  // ============================================================================
  // Interfaces and derivation
  // ============================================================================

  /**
   * Declare that a type satisfies a structural interface
   */
  declareInterface(type: string, interfaceName: string): void {
    let set = this.interfaces.get(type);
    if (!set) {
      set = new Set();
      this.interfaces.set(type, set);
    }
    set.add(interfaceName);
  }

  revokeInterface(type: string, interfaceName: string): void {
    const set = this.interfaces.get(type);
    if (!set) {
      return;
    }
    set.delete(interfaceName);
    if (set.size === 0) {
      this.interfaces.delete(type);
    }
  }

  /**
   * Declare that `type` derives from `base`
   * @throws RegistryConflictError when the edge would create a cycle
   */
  declareDerivation(type: string, base: string): void {
    if (type === base) {
      throw new RegistryConflictError(type, `object type '${type}' cannot derive from itself`);
    }
    if (this.derivesFrom(base, type)) {
      throw new RegistryConflictError(
        type,
        `declaring '${type}' as derived from '${base}' would create a derivation cycle`
      );
    }

    let set = this.bases.get(type);
    if (!set) {
      set = new Set();
      this.bases.set(type, set);
    }
    set.add(base);
  }

  revokeDerivation(type: string, base: string): void {
    const set = this.bases.get(type);
    if (!set) {
      return;
    }
    set.delete(base);
    if (set.size === 0) {
      this.bases.delete(type);
    }
  }

  /**
   * Whether `type` is `base` or derives from it, directly or transitively
   */
  derivesFrom(type: string, base: string): boolean {
    if (type === base) {
      return true;
    }
    return this.ancestors(type).has(base);
  }

  /**
   * Whether `type`, or any type it derives from, declares `interfaceName`
   */
  satisfiesInterface(type: string, interfaceName: string): boolean {
    if (this.interfaces.get(type)?.has(interfaceName)) {
      return true;
    }
    for (const ancestor of this.ancestors(type)) {
      if (this.interfaces.get(ancestor)?.has(interfaceName)) {
        return true;
      }
    }
    return false;
  }

  private ancestors(type: string): Set<string> {
    const seen = new Set<string>();
    const queue = [type];
    while (queue.length > 0) {
      const current = queue.pop();
      if (current === undefined) break;
      for (const base of this.bases.get(current) ?? []) {
        if (!seen.has(base)) {
          seen.add(base);
          queue.push(base);
        }
      }
    }
    return seen;
  }

  // ============================================================================
  // Introspection
  // ============================================================================

  /**
   * Whether the type appears anywhere in the registry
   */
  knows(type: string): boolean {
    return (
      this.validators.has(type) ||
      this.heights.has(type) ||
      this.dimensionHandlers.has(type) ||
      this.interfaces.has(type) ||
      this.bases.has(type)
    );
  }

  /**
   * All type tags with at least one registration, sorted
   */
  types(): string[] {
    const all = new Set<string>([
      ...this.validators.keys(),
      ...this.heights.keys(),
      ...this.dimensionHandlers.keys(),
      ...this.interfaces.keys(),
      ...this.bases.keys(),
    ]);
    return Array.from(all).sort();
  }

  /**
   * Independent copy, e.g. to customize a default registry in tests
   */
  clone(): TypeRegistry {
    const copy = new TypeRegistry();
    copy.validators = new Map(this.validators);
    copy.heights = new Map(this.heights);
    copy.dimensionHandlers = new Map(this.dimensionHandlers);
    copy.interfaces = new Map(Array.from(this.interfaces, ([k, v]) => [k, new Set(v)]));
    copy.bases = new Map(Array.from(this.bases, ([k, v]) => [k, new Set(v)]));
    return copy;
  }

  /**
   * Remove every registration
   */
  clear(): void {
    this.validators.clear();
    this.heights.clear();
    this.dimensionHandlers.clear();
    this.interfaces.clear();
    this.bases.clear();
  }
}
