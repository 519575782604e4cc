/**
 * Provenance Record Constants
 *
 * Normative sizes and ranges shared by every package that reads or writes
 * provenance records.
 */

/**
 * Exact byte length of every integrity digest carried by a record
 * (the content Merkle root and the manifest hash).
 */
export const HASH_LENGTH = 32 as const;

/**
 * Algorithm tags are opaque 8-bit unsigned integers. Any value in this
 * range is accepted; none is interpreted.
 */
export const ALGORITHM_TAG = {
  min: 0,
  max: 255,
} as const;

/**
 * Record identifier format issued by the reference ledger.
 */
export const RECORD_ID = {
  /** Random bytes behind each identifier */
  byteLength: 32,
  prefix: '0x' as const,
  pattern: /^0x[0-9a-f]{64}$/,
} as const;

/**
 * Audit event type emitted once per successful mint.
 */
export const EVENT_TYPES = {
  recordMinted: 'record_minted' as const,
} as const;

/**
 * Lineage traversal limits.
 */
export const LIMITS = {
  /** Maximum parent hops followed by the lineage walker */
  maxLineageDepth: 64,
} as const;

/**
 * All constants exported as a single object
 */
export const CONSTANTS = {
  HASH_LENGTH,
  ALGORITHM_TAG,
  RECORD_ID,
  EVENT_TYPES,
  LIMITS,
} as const;
