/**
 * Legacy metadata-graph layout
 *
 * Every resource has a `<path>.json` metadata document next to it (or is
 * itself the JSON document). Documents name their children through nested
 * `resource.path` entries, and redirection documents alias a path that does
 * not exist on disk to one that does.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { LEGACY_METADATA_SUFFIX, REDIRECTION_SCHEMA, REDIRECTION_SCHEMA_PREFIX } from "./constants.ts";
import { MalformedMetadataError, RedirectionError, StructuralViolationError } from "./errors.ts";
import { listFilesRecursive, parentOf } from "./paths.ts";
import {
  describeIssue,
  type LegacyMetadata,
  LegacyMetadataSchema,
  type RedirectionMetadata,
  RedirectionMetadataSchema,
} from "./schemas.ts";

// ============================================================================
// Reading documents
// ============================================================================

export type LegacyDocument =
  | { kind: "object"; metadata: LegacyMetadata }
  | { kind: "redirection"; metadata: RedirectionMetadata };

function readJson(file: string): unknown {
  let text: string;
  try {
    text = readFileSync(file, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedMetadataError(`failed to read '${file}': ${reason}`, { path: file });
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedMetadataError(`'${file}' is not valid JSON: ${reason}`, { path: file });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read one legacy metadata document, telling redirections apart by `$schema`
 */
export function readLegacyDocument(file: string): LegacyDocument {
  const raw = readJson(file);
  const schema = isRecord(raw) ? raw.$schema : undefined;

  if (typeof schema === "string" && schema.startsWith(REDIRECTION_SCHEMA_PREFIX)) {
    const result = RedirectionMetadataSchema.safeParse(raw);
    if (!result.success) {
      const { field, message } = describeIssue(result.error);
      throw new MalformedMetadataError(`invalid redirection in '${file}': ${message}`, { path: file, field });
    }
    return { kind: "redirection", metadata: result.data };
  }

  const result = LegacyMetadataSchema.safeParse(raw);
  if (!result.success) {
    const { field, message } = describeIssue(result.error);
    throw new MalformedMetadataError(`invalid metadata in '${file}': ${message}`, { path: file, field });
  }
  return { kind: "object", metadata: result.data };
}

/**
 * Paths of the children a document references
 *
 * The first `resource` entry of an object ends the search on that branch;
 * otherwise every value is searched, arrays included.
 */
export function collectResourcePaths(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.flatMap((item) => collectResourcePaths(item));
  }
  if (!isRecord(value)) {
    return [];
  }
  if ("resource" in value) {
    const resource = value.resource;
    return isRecord(resource) && typeof resource.path === "string" ? [resource.path] : [];
  }
  return Object.values(value).flatMap((item) => collectResourcePaths(item));
}

// ============================================================================
// Validation
// ============================================================================

function isNestedUnder(child: string, docDir: string): boolean {
  const childDir = parentOf(child);
  if (docDir === "") {
    return childDir !== "";
  }
  return childDir.startsWith(`${docDir}/`);
}

/**
 * Check the structure of a legacy directory
 *
 * Reports the first failure found, in a fixed order: per-document path and
 * nesting checks, then child bookkeeping (non-child references, duplicates,
 * missing and unreferenced children), stray files, nested non-child objects,
 * and finally redirection targets.
 *
 * @returns Paths of the non-child objects, in file order
 */
export function validateLegacyDirectory(dir: string): string[] {
  const allFiles = listFilesRecursive(dir);
  const fileSet = new Set(allFiles);
  const metaFiles = allFiles.filter((file) => file.endsWith(LEGACY_METADATA_SUFFIX));
  const otherFiles = allFiles.filter((file) => !file.endsWith(LEGACY_METADATA_SUFFIX));

  const amChild: string[] = [];
  const notChild: string[] = [];
  const expectedChild: string[] = [];
  const redirects: Array<{ from: string; to: string; file: string }> = [];

  for (const metapath of metaFiles) {
    const file = join(dir, metapath);
    const doc = readLegacyDocument(file);

    if (doc.kind === "redirection") {
      const { path } = doc.metadata;
      if (`${path}${LEGACY_METADATA_SUFFIX}` !== metapath) {
        throw new RedirectionError(
          "path-mismatch",
          `metadata in '${metapath}' references an unexpected path '${path}'`,
          { path: file, field: "path" }
        );
      }
      if (fileSet.has(path)) {
        throw new RedirectionError(
          "existing-source",
          `metadata in '${metapath}' contains a redirection from existing path '${path}'`,
          { path: file, field: "path" }
        );
      }
      for (const target of doc.metadata.redirection.targets) {
        if (target.type === "local") {
          redirects.push({ from: path, to: target.location, file });
        }
      }
      continue;
    }

    const { path } = doc.metadata;
    if (!fileSet.has(path)) {
      throw new StructuralViolationError(
        "non-existent-path",
        `metadata in '${metapath}' references a non-existent path '${path}'`,
        { path: file, field: "path" }
      );
    }
    if (path !== metapath && `${path}${LEGACY_METADATA_SUFFIX}` !== metapath) {
      throw new StructuralViolationError(
        "unexpected-path",
        `metadata in '${metapath}' references an unexpected path '${path}'`,
        { path: file, field: "path" }
      );
    }

    if (doc.metadata.is_child === true) {
      amChild.push(path);
    } else {
      notChild.push(path);
    }

    const children = collectResourcePaths(doc.metadata);
    const docDir = parentOf(metapath);
    const nonNested = children.find((child) => !isNestedUnder(child, docDir));
    if (nonNested !== undefined) {
      throw new StructuralViolationError(
        "non-nested-child",
        `metadata in '${metapath}' references non-nested child '${nonNested}'`,
        { path: file }
      );
    }
    expectedChild.push(...children);
  }

  const amChildSet = new Set(amChild);
  const notChildSet = new Set(notChild);
  const expectedSet = new Set(expectedChild);

  const conflict = expectedChild.find((child) => notChildSet.has(child));
  if (conflict !== undefined) {
    throw new StructuralViolationError(
      "referenced-non-child",
      `non-child object in '${conflict}' is referenced by another object`,
      { path: join(dir, conflict), field: "is_child" }
    );
  }

  const seen = new Set<string>();
  for (const child of expectedChild) {
    if (seen.has(child)) {
      throw new StructuralViolationError("duplicate-reference", `multiple references to child at '${child}'`, {
        path: join(dir, child),
      });
    }
    seen.add(child);
  }

  const missing = expectedChild.find((child) => !amChildSet.has(child));
  if (missing !== undefined) {
    throw new StructuralViolationError("missing-child", `missing child object '${missing}'`, {
      path: join(dir, missing),
    });
  }

  const unreferenced = amChild.find((child) => !expectedSet.has(child));
  if (unreferenced !== undefined) {
    throw new StructuralViolationError(
      "non-referenced-child",
      `non-referenced child object in '${unreferenced}'`,
      { path: join(dir, unreferenced) }
    );
  }

  const unknown = otherFiles.find((file) => !amChildSet.has(file) && !notChildSet.has(file));
  if (unknown !== undefined) {
    throw new StructuralViolationError("unknown-file", `unknown file at '${unknown}'`, { path: join(dir, unknown) });
  }

  // Root-level documents own no directory of their own
  const owners = new Set(notChild.map((path) => parentOf(path)).filter((owner) => owner !== ""));
  for (const current of Array.from(owners).sort()) {
    for (let cut = current.lastIndexOf("/"); cut > 0; cut = current.lastIndexOf("/", cut - 1)) {
      const ancestor = current.slice(0, cut);
      if (owners.has(ancestor)) {
        throw new StructuralViolationError(
          "nested-non-child",
          `non-child object at '${current}' is nested inside the directory of '${ancestor}'`,
          { path: join(dir, current) }
        );
      }
    }
  }

  for (const redirect of redirects) {
    if (redirect.to === redirect.from) {
      throw new RedirectionError("self-reference", `invalid redirection to '${redirect.to}'`, {
        path: redirect.file,
        field: "redirection.targets",
      });
    }
    if (!amChildSet.has(redirect.to) && !notChildSet.has(redirect.to)) {
      throw new RedirectionError("dangling-target", `invalid redirection to '${redirect.to}'`, {
        path: redirect.file,
        field: "redirection.targets",
      });
    }
  }

  return notChild;
}

// ============================================================================
// Listing and redirections
// ============================================================================

export interface ListLegacyObjectsOptions {
  /** Skip documents flagged `is_child` (default true) */
  ignoreChildren?: boolean;
}

/**
 * Every legacy metadata document under `dir`, keyed by its declared path
 */
export function listLegacyObjects(
  dir: string,
  options: ListLegacyObjectsOptions = {}
): Record<string, LegacyMetadata | RedirectionMetadata> {
  const ignoreChildren = options.ignoreChildren ?? true;
  const out: Record<string, LegacyMetadata | RedirectionMetadata> = {};

  for (const metapath of listFilesRecursive(dir)) {
    if (!metapath.endsWith(LEGACY_METADATA_SUFFIX)) continue;
    const doc = readLegacyDocument(join(dir, metapath));
    if (ignoreChildren && doc.kind === "object" && doc.metadata.is_child === true) {
      continue;
    }
    out[doc.metadata.path] = doc.metadata;
  }
  return out;
}

/**
 * Write a redirection document aliasing `src` to `dest` (both relative to `dir`)
 * @throws RedirectionError when `<src>.json` already exists
 */
export function createLegacyRedirection(dir: string, src: string, dest: string): RedirectionMetadata {
  const file = join(dir, `${src}${LEGACY_METADATA_SUFFIX}`);
  if (existsSync(file)) {
    throw new RedirectionError(
      "existing-source",
      `cannot create a short-hand link over existing file '${src}${LEGACY_METADATA_SUFFIX}'`,
      { path: file }
    );
  }

  const metadata: RedirectionMetadata = {
    $schema: REDIRECTION_SCHEMA,
    path: src,
    redirection: {
      targets: [{ type: "local", location: dest }],
    },
  };

  mkdirSync(dirname(file), { recursive: true });
  writeFileSync(file, `${JSON.stringify(metadata, null, 4)}\n`, "utf-8");
  return metadata;
}
