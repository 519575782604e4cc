/**
 * Collaborator interfaces and operation inputs for the record manager.
 */
import type { PrincipalId, RecordId } from '@provrec/kernel';
import type { RecordMintedEvent } from '@provrec/schema';
import type { ProvenanceRecord } from './record.js';

/**
 * Raw field values supplied to mint.
 */
export interface MintParams {
  contentPackageName: string;
  merkleIntegrityAlgo: number;
  merkleRoot: Uint8Array;
  packageStorageBlobRef: Uint8Array;
  manifestVersion: string;
  manifestIntegrityAlgo: number;
  manifestHash: Uint8Array;
  manifestStorageBlobRef: Uint8Array;
  /** Any identifier; never dereferenced */
  parentManifestId?: RecordId;
}

/**
 * Time source. Read exactly once per mint; the value is trusted as-is.
 */
export interface Clock {
  nowMs(): number;
}

/**
 * Execution context of the calling principal.
 */
export interface TxContext {
  readonly sender: PrincipalId;
}

/**
 * Issues and retires record identities.
 *
 * `allocate` must never return a value it has returned before, including
 * identities that were later released.
 */
export interface IdentityAllocator {
  allocate(): RecordId;
  release(id: RecordId): void;
}

/**
 * Takes ownership of minted records.
 */
export interface OwnershipLedger {
  transfer(record: ProvenanceRecord, owner: PrincipalId): void;
}

export interface RecordLedger extends IdentityAllocator, OwnershipLedger {}

/**
 * Receives the audit fact for every successful mint. Best-effort: a sink
 * may return a promise, which is never awaited.
 */
export interface EventSink {
  publish(event: RecordMintedEvent): void | PromiseLike<void>;
}

/**
 * Called when an event sink throws or rejects. Errors thrown by the handler
 * itself are dropped.
 */
export type EventErrorHandler = (error: unknown, event: RecordMintedEvent) => void;

export interface ProvenanceRecordManagerOptions {
  ledger: RecordLedger;
  /** Audit event sink (default: none) */
  events?: EventSink;
  /** Sink failure hook (default: failures are dropped) */
  onEventError?: EventErrorHandler;
}
