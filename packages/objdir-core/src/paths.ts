/**
 * Path helpers
 *
 * Object paths are relative, "/"-separated, and the root object is "".
 */

import { readdirSync, statSync } from "node:fs";
import { join, relative, sep } from "node:path";

export function toPosix(path: string): string {
  return sep === "/" ? path : path.split(sep).join("/");
}

/**
 * Relative object path of `target` under `root`; "" for the root itself
 */
export function relativeObjectPath(root: string, target: string): string {
  const rel = toPosix(relative(root, target));
  return rel === "." ? "" : rel;
}

/**
 * Whether `child` lies strictly inside `parent`
 */
export function isStrictSubPath(parent: string, child: string): boolean {
  if (child === "" || child.startsWith("../") || child === "..") {
    return false;
  }
  if (parent === "") {
    return true;
  }
  return child.startsWith(`${parent}/`);
}

/**
 * POSIX dirname that returns "" instead of "." at the top level
 */
export function parentOf(path: string): string {
  const slash = path.lastIndexOf("/");
  return slash < 0 ? "" : path.slice(0, slash);
}

export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Every file under `root`, as sorted relative POSIX paths
 */
export function listFilesRecursive(root: string): string[] {
  const files: string[] = [];
  const walk = (dir: string, prefix: string): void => {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        walk(join(dir, entry.name), rel);
      } else {
        files.push(rel);
      }
    }
  };
  walk(root, "");
  return files.sort();
}

/**
 * Immediate subdirectory names, sorted
 */
export function listSubdirectories(dir: string): string[] {
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}
