/**
 * Object directory error taxonomy
 *
 * Every error raised by the validators carries a `kind` plus, where known,
 * the offending `path` (file or directory) and `field`.
 */

import { EncodingError } from "@objdir/encoding";

export type ErrorKind =
  | "MalformedMetadata"
  | "UnregisteredCapability"
  | "StructuralViolation"
  | "RedirectionError"
  | "EncodingError"
  | "RegistryConflict";

export interface ErrorContext {
  /** File or directory the error refers to */
  path?: string;
  /** Field inside a metadata document */
  field?: string;
}

/**
 * Base class for validation failures
 */
export class ObjectDirError extends Error {
  readonly kind: ErrorKind;
  readonly path?: string;
  readonly field?: string;

  constructor(kind: ErrorKind, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = "ObjectDirError";
    this.kind = kind;
    this.path = context.path;
    this.field = context.field;
  }
}

/**
 * A metadata document is missing, unparseable or lacks a required field
 */
export class MalformedMetadataError extends ObjectDirError {
  constructor(message: string, context: ErrorContext = {}) {
    super("MalformedMetadata", message, context);
    this.name = "MalformedMetadataError";
  }
}

export type Capability = "validate" | "height" | "dimensions";

/**
 * The type is known but has no handler for the requested capability
 */
export class UnregisteredCapabilityError extends ObjectDirError {
  readonly capability: Capability;
  readonly type: string;

  constructor(type: string, capability: Capability, context: ErrorContext = {}) {
    const where = context.path ? ` at '${context.path}'` : "";
    super("UnregisteredCapability", `no registered '${capability}' function for object type '${type}'${where}`, context);
    this.name = "UnregisteredCapabilityError";
    this.capability = capability;
    this.type = type;
  }
}

/**
 * The type has no registry presence at all
 */
export class UnknownTypeError extends UnregisteredCapabilityError {
  constructor(type: string, capability: Capability, context: ErrorContext = {}) {
    super(type, capability, context);
    this.name = "UnknownTypeError";
    this.message = `unknown object type '${type}'; ${this.message}`;
  }
}

export type StructuralViolation =
  | "non-nested-child"
  | "duplicate-reference"
  | "missing-child"
  | "non-referenced-child"
  | "referenced-non-child"
  | "nested-non-child"
  | "unknown-file"
  | "unexpected-path"
  | "non-existent-path"
  | "not-a-directory"
  | "depth-exceeded"
  | "interface-mismatch"
  | "extent-mismatch"
  | "invalid-contents";

/**
 * The shape of the tree (or of a node's contents) is wrong
 */
export class StructuralViolationError extends ObjectDirError {
  readonly violation: StructuralViolation;

  constructor(violation: StructuralViolation, message: string, context: ErrorContext = {}) {
    super("StructuralViolation", message, context);
    this.name = "StructuralViolationError";
    this.violation = violation;
  }
}

export type RedirectionFailure = "self-reference" | "dangling-target" | "path-mismatch" | "existing-source";

/**
 * A redirection document is inconsistent with the directory
 */
export class RedirectionError extends ObjectDirError {
  readonly reason: RedirectionFailure;

  constructor(reason: RedirectionFailure, message: string, context: ErrorContext = {}) {
    super("RedirectionError", message, context);
    this.name = "RedirectionError";
    this.reason = reason;
  }
}

/**
 * A registration could not be applied
 */
export class RegistryConflictError extends ObjectDirError {
  readonly type: string;

  constructor(type: string, message: string) {
    super("RegistryConflict", message);
    this.name = "RegistryConflictError";
    this.type = type;
  }
}

export { EncodingError };

/**
 * Narrow an unknown thrown value to one of this package's errors
 */
export function isObjectDirError(error: unknown): error is ObjectDirError | EncodingError {
  return error instanceof ObjectDirError || error instanceof EncodingError;
}

/**
 * Kind of a thrown value, or undefined for foreign errors
 */
export function errorKind(error: unknown): ErrorKind | undefined {
  return isObjectDirError(error) ? error.kind : undefined;
}
