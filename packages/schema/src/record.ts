/**
 * Provenance Record Wire Schemas
 *
 * JSON layout of a persisted provenance record. Field names follow the
 * record's data model; byte fields are lowercase hex; an absent parent is
 * `null`.
 *
 * Only the shape is checked here. Record invariants (non-empty name,
 * 32-byte digests, 8-bit algorithm tags) are enforced by the record package
 * when a wire record is restored, in the same order as minting.
 */
import { z } from 'zod';

/**
 * Lowercase hex, any even length (including empty).
 */
export const HexBytesSchema = z.string().regex(/^(?:[0-9a-f]{2})*$/, 'Expected lowercase hex bytes');

/**
 * Algorithm tag on the wire. Range is checked by the record package.
 */
export const AlgorithmTagSchema = z.number().int();

/**
 * Record identifier on the wire (opaque, non-empty).
 */
export const RecordIdSchema = z.string().min(1);

/**
 * Embedded manifest
 */
export const ManifestWireSchema = z
  .object({
    manifest_version: z.string(),
    manifest_integrity_algo: AlgorithmTagSchema,
    manifest_hash: HexBytesSchema,
    manifest_storage_blob_ref: HexBytesSchema,
    parent_manifest_id: z.string().nullable(),
  })
  .strict();
export type ManifestWire = z.infer<typeof ManifestWireSchema>;

/**
 * Persisted provenance record
 *
 * @example
 * ```typescript
 * const wire: ProvenanceRecordWire = {
 *   id: '0x5f0c...',
 *   content_package_name: 'Test Package',
 *   merkle_integrity_algo: 61,
 *   merkle_root: '00112233...',
 *   created_at: 1000,
 *   package_storage_blob_ref: '7061636b...',
 *   manifest: {
 *     manifest_version: '1.4',
 *     manifest_integrity_algo: 61,
 *     manifest_hash: 'aabbccdd...',
 *     manifest_storage_blob_ref: '6d616e69...',
 *     parent_manifest_id: null,
 *   },
 * };
 * ```
 */
export const ProvenanceRecordWireSchema = z
  .object({
    id: RecordIdSchema,
    content_package_name: z.string(),
    merkle_integrity_algo: AlgorithmTagSchema,
    merkle_root: HexBytesSchema,
    // Clock value as read at mint, unchecked
    created_at: z.number().finite(),
    package_storage_blob_ref: HexBytesSchema,
    manifest: ManifestWireSchema,
  })
  .strict();
export type ProvenanceRecordWire = z.infer<typeof ProvenanceRecordWireSchema>;

/**
 * Validate a persisted record's wire shape.
 *
 * @param data - Unknown data to validate
 * @returns Result with validated wire record or error message
 */
export function validateRecordWire(
  data: unknown
): { ok: true; value: ProvenanceRecordWire } | { ok: false; error: string } {
  const result = ProvenanceRecordWireSchema.safeParse(data);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, error: formatIssues(result.error) };
}

/**
 * Flatten zod issues into one line: `path: message; path: message`.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
