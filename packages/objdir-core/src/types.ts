/**
 * Object directory core types
 */

import type { Logger } from "./config.ts";
import type { TypeRegistry } from "./registry.ts";
import type { ObjectMetadata } from "./schemas.ts";

// ============================================================================
// Handlers
// ============================================================================

/**
 * Checks one object directory; throws on the first problem
 * @param path - Absolute path of the object directory
 */
export type ValidateFunction = (path: string, metadata: ObjectMetadata, context: ValidationContext) => void;

/**
 * Length of the object's first dimension
 */
export type HeightFunction = (path: string, metadata: ObjectMetadata, context: ValidationContext) => number;

/**
 * Extents of every dimension
 */
export type DimensionsFunction = (path: string, metadata: ObjectMetadata, context: ValidationContext) => number[];

/**
 * What happens when a handler is already registered for a type
 * - keep-existing: leave the old handler in place
 * - replace: install the new handler
 * - error-on-conflict: throw without touching the registry
 */
export type ConflictPolicy = "keep-existing" | "replace" | "error-on-conflict";

// ============================================================================
// Validation context
// ============================================================================

/**
 * Entry point handed to handlers so they can recurse into children
 *
 * Every method takes absolute paths. Child paths must lie strictly inside
 * the object currently being validated and may be referenced once per pass.
 */
export interface ValidationContext {
  /** Absolute directory the pass started from */
  readonly root: string;
  readonly registry: TypeRegistry;
  /** Nesting depth of the object being validated (root object = 0) */
  readonly depth: number;
  readonly logger: Logger;

  /** Whether nested `path` holds an object (i.e. has an OBJECT file) */
  hasObject(path: string): boolean;
  /** Read a nested node's metadata without validating it or marking it referenced */
  readMetadata(path: string): ObjectMetadata;
  /** Validate a nested object and return its metadata */
  validateChild(path: string): ObjectMetadata;
  /** Validate a nested object that must satisfy `interfaceName` */
  validateChildWithInterface(path: string, interfaceName: string): ObjectMetadata;
  /** Height of a nested object */
  childHeight(path: string): number;
  /** Dimensions of a nested object */
  childDimensions(path: string): number[];
}

/**
 * One entry of an object listing
 */
export interface ObjectListing {
  /** Relative path, "" for an object stored at the root itself */
  path: string;
  type: string;
  /** Nested inside another object */
  child: boolean;
}
