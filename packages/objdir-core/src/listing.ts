import { join } from "node:path";
import { hasObjectMetadata, readObjectMetadata } from "./metadata.ts";
import { listSubdirectories } from "./paths.ts";
import type { ObjectListing } from "./types.ts";

export interface ListObjectsOptions {
  /** Also list objects nested inside other objects (default false) */
  includeChildren?: boolean;
}

/**
 * List the objects stored under a directory
 *
 * Directories are walked in sorted order. Without `includeChildren` the walk
 * stops at the first object directory on each branch.
 */
export function listObjects(dir: string, options: ListObjectsOptions = {}): ObjectListing[] {
  const includeChildren = options.includeChildren ?? false;
  const found: ObjectListing[] = [];

  const walk = (rel: string, insideObject: boolean): void => {
    const full = rel === "" ? dir : join(dir, rel);
    const isObject = hasObjectMetadata(full);
    if (isObject) {
      found.push({ path: rel, type: readObjectMetadata(full).type, child: insideObject });
      if (!includeChildren) {
        return;
      }
    }
    for (const name of listSubdirectories(full)) {
      walk(rel === "" ? name : `${rel}/${name}`, insideObject || isObject);
    }
  };

  walk("", false);
  return found;
}
