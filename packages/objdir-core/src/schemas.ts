/**
 * Document schemas
 *
 * - OBJECT metadata (current layout)
 * - legacy metadata and redirection documents
 * - columnar dataset files
 */

import { z } from "zod";
import { REDIRECTION_SCHEMA_PREFIX } from "./constants.ts";

// ============================================================================
// Current layout
// ============================================================================

export const ObjectMetadataSchema = z
  .object({
    type: z.string().min(1, "'type' must be a non-empty string"),
    is_child: z.boolean().optional(),
  })
  .passthrough();
export type ObjectMetadata = z.infer<typeof ObjectMetadataSchema>;

/**
 * Per-type section carrying a version string, e.g. `{ "atomic_vector": { "version": "1.0" } }`
 */
export const VersionedSectionSchema = z
  .object({
    version: z.string().regex(/^\d+(\.\d+)*$/, "Invalid version string"),
  })
  .passthrough();

// ============================================================================
// Legacy layout
// ============================================================================

export const LegacyMetadataSchema = z
  .object({
    $schema: z.string().min(1),
    path: z.string().min(1),
    is_child: z.boolean().optional(),
  })
  .passthrough();
export type LegacyMetadata = z.infer<typeof LegacyMetadataSchema>;

export const RedirectionTargetSchema = z.object({
  type: z.string(),
  location: z.string(),
});
export type RedirectionTarget = z.infer<typeof RedirectionTargetSchema>;

export const RedirectionMetadataSchema = z.object({
  $schema: z.string().startsWith(REDIRECTION_SCHEMA_PREFIX),
  path: z.string().min(1),
  redirection: z.object({
    targets: z.array(RedirectionTargetSchema),
  }),
});
export type RedirectionMetadata = z.infer<typeof RedirectionMetadataSchema>;

// ============================================================================
// Columnar datasets
// ============================================================================

export const StorageTypeSchema = z.discriminatedUnion("class", [
  z.object({
    class: z.literal("integer"),
    signed: z.boolean(),
    bits: z.union([z.literal(8), z.literal(16), z.literal(32)]),
  }),
  z.object({
    class: z.literal("float"),
    bits: z.literal(64),
  }),
  z.object({
    class: z.literal("string"),
    size: z.number().int().positive(),
    charset: z.enum(["ASCII", "UTF-8"]),
  }),
]);

export const StoredValueSchema = z.union([z.number(), z.string()]);

export const DatasetSchema = z.object({
  type: StorageTypeSchema,
  length: z.number().int().nonnegative(),
  data: z.array(StoredValueSchema),
  placeholder: StoredValueSchema.optional(),
});
export type Dataset = z.infer<typeof DatasetSchema>;

export const DatasetFileSchema = z.object({
  datasets: z.record(DatasetSchema),
  attributes: z.record(z.unknown()).optional(),
});
export type DatasetFile = z.infer<typeof DatasetFileSchema>;

/**
 * Render the first zod issue as "field: message"
 */
export function describeIssue(error: z.ZodError): { field?: string; message: string } {
  const issue = error.issues[0];
  if (!issue) {
    return { message: error.message };
  }
  const field = issue.path.length > 0 ? issue.path.join(".") : undefined;
  return { field, message: field ? `${field}: ${issue.message}` : issue.message };
}
