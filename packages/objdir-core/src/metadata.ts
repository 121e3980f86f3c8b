/**
 * OBJECT metadata documents
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { OBJECT_FILE } from "./constants.ts";
import { MalformedMetadataError } from "./errors.ts";
import { describeIssue, type ObjectMetadata, ObjectMetadataSchema } from "./schemas.ts";

export function hasObjectMetadata(dir: string): boolean {
  return existsSync(join(dir, OBJECT_FILE));
}

/**
 * Read and check the OBJECT document of an object directory
 * @throws MalformedMetadataError when the file is missing, not JSON or has no `type`
 */
export function readObjectMetadata(dir: string): ObjectMetadata {
  const file = join(dir, OBJECT_FILE);

  let text: string;
  try {
    text = readFileSync(file, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedMetadataError(`failed to read '${file}': ${reason}`, { path: file });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedMetadataError(`'${file}' is not valid JSON: ${reason}`, { path: file });
  }

  const result = ObjectMetadataSchema.safeParse(raw);
  if (!result.success) {
    const { field, message } = describeIssue(result.error);
    throw new MalformedMetadataError(`invalid metadata in '${file}': ${message}`, { path: file, field: field ?? "type" });
  }
  return result.data;
}

/**
 * Write an OBJECT document; `type` always comes first
 */
export function writeObjectMetadata(dir: string, type: string, extra: Record<string, unknown> = {}): void {
  const metadata: Record<string, unknown> = { type };
  for (const [key, value] of Object.entries(extra)) {
    if (key !== "type") {
      metadata[key] = value;
    }
  }
  writeFileSync(join(dir, OBJECT_FILE), `${JSON.stringify(metadata, null, 4)}\n`, "utf-8");
}

/**
 * Read a versioned per-type section, e.g. `metadata.atomic_vector`
 */
export function getTypeSection(metadata: ObjectMetadata, dir: string): Record<string, unknown> {
  const section = metadata[metadata.type];
  if (typeof section !== "object" || section === null || Array.isArray(section)) {
    throw new MalformedMetadataError(`expected an object in '${metadata.type}'`, {
      path: join(dir, OBJECT_FILE),
      field: metadata.type,
    });
  }
  return Object.fromEntries(Object.entries(section));
}
