/**
 * Record Minted Event
 *
 * The audit fact published once per successful mint. This is the one wire
 * shape the record component commits to: record identity, minter, package
 * name, merkle root and mint time.
 */
import { z } from 'zod';
import { HASH_LENGTH, type PrincipalId, type RecordId } from '@provrec/kernel';
import { bytesToHex, hexToBytes } from './hex.js';
import { RecordIdSchema, formatIssues } from './record.js';

/**
 * In-process event, as handed to an event sink.
 */
export interface RecordMintedEvent {
  readonly record_id: RecordId;
  readonly minter: PrincipalId;
  readonly package_name: string;
  /** 32-byte merkle root of the minted record */
  readonly merkle_root: Uint8Array;
  /** Creation time of the record, ms since epoch */
  readonly minted_at: number;
}

export const RecordMintedEventWireSchema = z
  .object({
    record_id: RecordIdSchema,
    minter: z.string().min(1),
    package_name: z.string().min(1),
    merkle_root: z
      .string()
      .length(HASH_LENGTH * 2)
      .regex(/^[0-9a-f]+$/, 'Expected lowercase hex bytes'),
    minted_at: z.number().int().nonnegative(),
  })
  .strict();
export type RecordMintedEventWire = z.infer<typeof RecordMintedEventWireSchema>;

/**
 * Convert an in-process event to its JSON wire form.
 */
export function toMintedEventWire(event: RecordMintedEvent): RecordMintedEventWire {
  return {
    record_id: event.record_id,
    minter: event.minter,
    package_name: event.package_name,
    merkle_root: bytesToHex(event.merkle_root),
    minted_at: event.minted_at,
  };
}

/**
 * Convert a validated wire event back to its in-process form.
 */
export function fromMintedEventWire(wire: RecordMintedEventWire): RecordMintedEvent {
  return {
    record_id: wire.record_id,
    minter: wire.minter,
    package_name: wire.package_name,
    merkle_root: hexToBytes(wire.merkle_root),
    minted_at: wire.minted_at,
  };
}

/**
 * Validate a minted event's wire shape.
 *
 * @param data - Unknown data to validate
 * @returns Result with validated wire event or error message
 */
export function validateMintedEventWire(
  data: unknown
): { ok: true; value: RecordMintedEventWire } | { ok: false; error: string } {
  const result = RecordMintedEventWireSchema.safeParse(data);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, error: formatIssues(result.error) };
}
