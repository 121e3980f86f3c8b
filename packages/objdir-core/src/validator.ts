/**
 * Object-directory validator (current layout)
 *
 * Walks an object tree depth-first. Each node's handler is looked up by the
 * type tag in its OBJECT file; handlers recurse into children through the
 * ValidationContext they receive. The first failure propagates unchanged.
 */

import { resolve } from "node:path";
import { createConsoleLogger, DEFAULT_MAX_DEPTH, type Logger } from "./config.ts";
import { StructuralViolationError } from "./errors.ts";
import { hasObjectMetadata, readObjectMetadata } from "./metadata.ts";
import { isDirectory, isStrictSubPath, relativeObjectPath } from "./paths.ts";
import type { TypeRegistry } from "./registry.ts";
import type { ObjectMetadata } from "./schemas.ts";
import type { ValidationContext } from "./types.ts";

// ============================================================================
// Types
// ============================================================================

export interface ObjectValidatorOptions {
  registry: TypeRegistry;
  /** Deepest child nesting followed before failing with depth-exceeded */
  maxDepth?: number;
  logger?: Logger;
}

export interface ObjectValidator {
  /**
   * Validate the object stored at `path`, children included
   * @param metadata - Already-parsed OBJECT document, read from disk when omitted
   */
  validate(path: string, metadata?: ObjectMetadata): ObjectMetadata;
  height(path: string, metadata?: ObjectMetadata): number;
  dimensions(path: string, metadata?: ObjectMetadata): number[];
  satisfiesInterface(path: string, interfaceName: string): boolean;
  derivesFrom(path: string, base: string): boolean;
  readMetadata(path: string): ObjectMetadata;
}

// ============================================================================
// Validation pass
// ============================================================================

/**
 * State of one validation pass: the set of children referenced so far.
 * Several top-level objects can share a pass so that unreferenced nested
 * objects can be detected afterwards.
 */
export class ValidationPass {
  private readonly referenced = new Set<string>();

  constructor(
    readonly root: string,
    private readonly registry: TypeRegistry,
    private readonly maxDepth: number,
    private readonly logger: Logger
  ) {}

  /**
   * Absolute paths of every object validated during this pass
   */
  get visited(): ReadonlySet<string> {
    return this.referenced;
  }

  /**
   * Validate a top-level object (depth 0)
   */
  validateObject(path: string, metadata?: ObjectMetadata): ObjectMetadata {
    const absolute = resolve(path);
    if (!isDirectory(absolute)) {
      throw new StructuralViolationError("not-a-directory", `'${absolute}' is not a directory`, { path: absolute });
    }
    this.markReferenced(absolute);
    const meta = metadata ?? readObjectMetadata(absolute);
    this.dispatchValidate(absolute, meta, 0);
    return meta;
  }

  height(path: string, metadata?: ObjectMetadata): number {
    const absolute = resolve(path);
    const meta = metadata ?? readObjectMetadata(absolute);
    const fn = this.registry.getHeight(meta.type, { path: absolute });
    return fn(absolute, meta, this.contextFor(absolute, 0));
  }

  dimensions(path: string, metadata?: ObjectMetadata): number[] {
    const absolute = resolve(path);
    const meta = metadata ?? readObjectMetadata(absolute);
    const fn = this.registry.getDimensions(meta.type, { path: absolute });
    return fn(absolute, meta, this.contextFor(absolute, 0));
  }

  private dispatchValidate(path: string, metadata: ObjectMetadata, depth: number): void {
    this.logger.debug(`[Validator] ${this.describe(path)} (${metadata.type}) at depth ${depth}`);
    const fn = this.registry.getValidate(metadata.type, { path });
    fn(path, metadata, this.contextFor(path, depth));
  }

  private markReferenced(path: string): void {
    if (this.referenced.has(path)) {
      throw new StructuralViolationError(
        "duplicate-reference",
        `multiple references to child at '${this.describe(path)}'`,
        { path }
      );
    }
    this.referenced.add(path);
  }

  private describe(path: string): string {
    const rel = relativeObjectPath(this.root, path);
    return rel === "" ? "." : rel;
  }

  private resolveNested(parent: string, child: string): string {
    const absolute = resolve(parent, child);
    const rel = relativeObjectPath(parent, absolute);
    if (!isStrictSubPath("", rel)) {
      throw new StructuralViolationError(
        "non-nested-child",
        `'${this.describe(parent)}' references non-nested child '${rel}'`,
        { path: absolute }
      );
    }
    return absolute;
  }

  /**
   * Resolve a child path against its parent and check nesting and existence
   */
  private resolveChild(parent: string, child: string, depth: number): string {
    const absolute = this.resolveNested(parent, child);
    if (depth > this.maxDepth) {
      throw new StructuralViolationError(
        "depth-exceeded",
        `object nesting at '${this.describe(absolute)}' exceeds the maximum depth of ${this.maxDepth}`,
        { path: absolute }
      );
    }
    if (!isDirectory(absolute) || !hasObjectMetadata(absolute)) {
      throw new StructuralViolationError("missing-child", `missing child object '${this.describe(absolute)}'`, {
        path: absolute,
      });
    }
    return absolute;
  }

  private visitChild(parent: string, child: string, depth: number, interfaceName?: string): ObjectMetadata {
    const absolute = this.resolveChild(parent, child, depth);
    this.markReferenced(absolute);
    const metadata = readObjectMetadata(absolute);

    if (interfaceName !== undefined && !this.registry.satisfiesInterface(metadata.type, interfaceName)) {
      throw new StructuralViolationError(
        "interface-mismatch",
        `object type '${metadata.type}' at '${this.describe(absolute)}' does not satisfy the '${interfaceName}' interface`,
        { path: absolute, field: "type" }
      );
    }

    this.dispatchValidate(absolute, metadata, depth);
    return metadata;
  }

  private contextFor(path: string, depth: number): ValidationContext {
    const childDepth = depth + 1;
    return {
      root: this.root,
      registry: this.registry,
      depth,
      logger: this.logger,
      hasObject: (target) => {
        const absolute = this.resolveNested(path, target);
        return isDirectory(absolute) && hasObjectMetadata(absolute);
      },
      readMetadata: (target) => readObjectMetadata(this.resolveNested(path, target)),
      validateChild: (child) => this.visitChild(path, child, childDepth),
      validateChildWithInterface: (child, interfaceName) => this.visitChild(path, child, childDepth, interfaceName),
      childHeight: (child) => {
        const absolute = this.resolveChild(path, child, childDepth);
        const metadata = readObjectMetadata(absolute);
        const fn = this.registry.getHeight(metadata.type, { path: absolute });
        return fn(absolute, metadata, this.contextFor(absolute, childDepth));
      },
      childDimensions: (child) => {
        const absolute = this.resolveChild(path, child, childDepth);
        const metadata = readObjectMetadata(absolute);
        const fn = this.registry.getDimensions(metadata.type, { path: absolute });
        return fn(absolute, metadata, this.contextFor(absolute, childDepth));
      },
    };
  }
}

// ============================================================================
// Validator factory
// ============================================================================

/**
 * Create a validator bound to a registry
 *
 * Each call starts a fresh pass; nothing is cached between calls.
 *
 * @example
 * ```typescript
 * const validator = createObjectValidator({ registry: createDefaultRegistry() });
 * validator.validate("/data/my-frame");
 * const [rows, cols] = validator.dimensions("/data/my-frame");
 * ```
 */
export function createObjectValidator(options: ObjectValidatorOptions): ObjectValidator {
  const { registry } = options;
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const logger = options.logger ?? createConsoleLogger(false);

  const newPass = (path: string) => new ValidationPass(resolve(path), registry, maxDepth, logger);

  return {
    validate: (path, metadata) => newPass(path).validateObject(path, metadata),
    height: (path, metadata) => newPass(path).height(path, metadata),
    dimensions: (path, metadata) => newPass(path).dimensions(path, metadata),
    satisfiesInterface: (path, interfaceName) =>
      registry.satisfiesInterface(readObjectMetadata(resolve(path)).type, interfaceName),
    derivesFrom: (path, base) => registry.derivesFrom(readObjectMetadata(resolve(path)).type, base),
    readMetadata: (path) => readObjectMetadata(resolve(path)),
  };
}
