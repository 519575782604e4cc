/**
 * Provenance Record
 *
 * Immutable, uniquely identified records binding a content package name to
 * a Merkle integrity commitment and an integrity-committed manifest
 * reference.
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * import { ProvenanceRecordManager } from '@provrec/record';
 *
 * const manager = new ProvenanceRecordManager({ ledger, events });
 * const record = manager.mint(
 *   {
 *     contentPackageName: 'Test Package',
 *     merkleIntegrityAlgo: 61,
 *     merkleRoot,
 *     packageStorageBlobRef,
 *     manifestVersion: '1.4',
 *     manifestIntegrityAlgo: 61,
 *     manifestHash,
 *     manifestStorageBlobRef,
 *   },
 *   clock,
 *   { sender: '0xa11ce' }
 * );
 * ```
 */

export { ProvenanceRecord, isLiveRecord, type EmbeddedManifest } from './record.js';
export { ProvenanceRecordManager } from './manager.js';
export { isPromiseLike } from './promise.js';
export { encodeRecord, restoreRecord, serializeRecord, parseRecord } from './codec.js';
export { assertRecordInvariants, isAlgorithmTag, type InvariantInput } from './invariants.js';

export {
  ProvenanceError,
  isProvenanceError,
  createEmptyPackageNameError,
  createInvalidMerkleRootLengthError,
  createInvalidManifestHashLengthError,
  createInvalidAlgorithmTagError,
  createRecordDestroyedError,
  createInvalidWireFormatError,
} from './errors.js';

export type {
  MintParams,
  Clock,
  TxContext,
  IdentityAllocator,
  OwnershipLedger,
  RecordLedger,
  EventSink,
  EventErrorHandler,
  ProvenanceRecordManagerOptions,
} from './types.js';

export type { RecordId, PrincipalId } from '@provrec/kernel';
export type { RecordMintedEvent } from '@provrec/schema';
