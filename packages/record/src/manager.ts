/**
 * Provenance Record Manager
 *
 * The single authority for minting and destroying provenance records.
 */
import type { RecordId } from '@provrec/kernel';
import type { RecordMintedEvent } from '@provrec/schema';
import { assertRecordInvariants } from './invariants.js';
import { isPromiseLike } from './promise.js';
import { assembleRecord, unsealRecord, type ProvenanceRecord } from './record.js';
import type {
  Clock,
  EventErrorHandler,
  EventSink,
  MintParams,
  ProvenanceRecordManagerOptions,
  RecordLedger,
  TxContext,
} from './types.js';

const dropEventError: EventErrorHandler = () => {};

/**
 * @example
 * ```typescript
 * const manager = new ProvenanceRecordManager({ ledger, events });
 * const record = manager.mint(params, systemClock, { sender: '0xa11ce' });
 * ledger.transfer(record, '0xa11ce');
 * ```
 */
export class ProvenanceRecordManager {
  private readonly ledger: RecordLedger;
  private readonly events: EventSink | undefined;
  private readonly onEventError: EventErrorHandler;

  constructor(options: ProvenanceRecordManagerOptions) {
    this.ledger = options.ledger;
    this.events = options.events;
    this.onEventError = options.onEventError ?? dropEventError;
  }

  /**
   * Validate inputs and construct a new record.
   *
   * Fails with `E_EMPTY_PACKAGE_NAME`, `E_INVALID_MERKLE_ROOT_LENGTH`,
   * `E_INVALID_MANIFEST_HASH_LENGTH` or `E_INVALID_ALGORITHM_TAG`, in that
   * order of precedence, before the clock or ledger is touched. On success
   * publishes one `RecordMintedEvent` and returns the record; nothing is
   * stored or transferred.
   */
  mint(params: MintParams, clock: Clock, ctx: TxContext): ProvenanceRecord {
    assertRecordInvariants(params);

    const createdAt = clock.nowMs();
    const id = this.ledger.allocate();

    const record = assembleRecord({
      id,
      contentPackageName: params.contentPackageName,
      merkleIntegrityAlgo: params.merkleIntegrityAlgo,
      merkleRoot: params.merkleRoot,
      createdAt,
      packageStorageBlobRef: params.packageStorageBlobRef,
      manifest: {
        version: params.manifestVersion,
        integrityAlgo: params.manifestIntegrityAlgo,
        hash: params.manifestHash,
        storageBlobRef: params.manifestStorageBlobRef,
        parentManifestId: params.parentManifestId,
      },
    });

    this.publish({
      record_id: id,
      minter: ctx.sender,
      package_name: params.contentPackageName,
      merkle_root: record.merkleRoot,
      minted_at: createdAt,
    });

    return record;
  }

  /**
   * Mint, then hand the record to the calling principal through the ledger.
   *
   * @returns Identity of the transferred record
   */
  mintToSender(params: MintParams, clock: Clock, ctx: TxContext): RecordId {
    const record = this.mint(params, clock, ctx);
    this.ledger.transfer(record, ctx.sender);
    return record.id;
  }

  /**
   * Destroy a record held outright by its owner.
   */
  burn(record: ProvenanceRecord): void {
    this.consume(record);
  }

  /**
   * Destroy a record held by value in a composing system. Same effect as
   * `burn`.
   */
  destroy(record: ProvenanceRecord): void {
    this.consume(record);
  }

  private consume(record: ProvenanceRecord): void {
    // Release before unsealing so a failing ledger leaves the record live.
    this.ledger.release(record.id);
    unsealRecord(record);
  }

  private publish(event: RecordMintedEvent): void {
    const sink = this.events;
    if (!sink) {
      return;
    }
    try {
      const pending = sink.publish(event);
      if (isPromiseLike(pending)) {
        void pending.then(undefined, (err: unknown) => this.reportEventError(err, event));
      }
    } catch (err) {
      this.reportEventError(err, event);
    }
  }

  private reportEventError(err: unknown, event: RecordMintedEvent): void {
    try {
      this.onEventError(err, event);
    } catch {
      // A throwing hook is dropped too; the mint has already succeeded.
      return;
    }
  }
}
