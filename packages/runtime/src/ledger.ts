/**
 * In-memory ownership ledger
 *
 * Reference `RecordLedger`: issues identities, tracks which principal owns
 * each stored record, and forgets identities on release. Identities are
 * never reissued, even after release.
 */
import { randomBytes } from 'node:crypto';
import type { Logger } from 'pino';
import { RECORD_ID, type PrincipalId, type RecordId } from '@provrec/kernel';
import type { ProvenanceRecord, RecordLedger } from '@provrec/record';
import { LedgerError } from './errors.js';
import { silentLogger } from './logger.js';

export interface InMemoryLedgerOptions {
  logger?: Logger;
  /** Identity source (default: `randomRecordId`) */
  generateId?: () => RecordId;
  /** Attempts before giving up on a colliding generator (default: 8) */
  maxAllocationAttempts?: number;
}

interface LedgerEntry {
  record?: ProvenanceRecord;
  owner?: PrincipalId;
}

/**
 * `0x` followed by 64 lowercase hex characters from 32 random bytes.
 */
export function randomRecordId(): RecordId {
  return RECORD_ID.prefix + randomBytes(RECORD_ID.byteLength).toString('hex');
}

export class InMemoryLedger implements RecordLedger {
  private readonly issued = new Set<RecordId>();
  private readonly entries = new Map<RecordId, LedgerEntry>();
  private readonly logger: Logger;
  private readonly generateId: () => RecordId;
  private readonly maxAllocationAttempts: number;

  constructor(options: InMemoryLedgerOptions = {}) {
    this.logger = options.logger ?? silentLogger();
    this.generateId = options.generateId ?? randomRecordId;
    this.maxAllocationAttempts = options.maxAllocationAttempts ?? 8;
  }

  allocate(): RecordId {
    for (let attempt = 1; attempt <= this.maxAllocationAttempts; attempt++) {
      const id = this.generateId();
      if (this.issued.has(id)) {
        this.logger.warn({ recordId: id, attempt }, 'Identity collision, retrying');
        continue;
      }
      this.issued.add(id);
      this.entries.set(id, {});
      this.logger.debug({ recordId: id }, 'Identity allocated');
      return id;
    }
    throw new LedgerError(
      'LEDGER_ALLOCATION_EXHAUSTED',
      `No fresh identity after ${this.maxAllocationAttempts} attempts`
    );
  }

  release(id: RecordId): void {
    const existed = this.entries.delete(id);
    this.logger.debug({ recordId: id, existed }, 'Identity released');
  }

  transfer(record: ProvenanceRecord, owner: PrincipalId): void {
    const id = record.id;
    if (!this.entries.has(id)) {
      throw new LedgerError('LEDGER_UNKNOWN_RECORD', `Record ${id} is not live in this ledger`);
    }
    this.entries.set(id, { record, owner });
    this.logger.debug({ recordId: id, owner }, 'Record transferred');
  }

  has(id: RecordId): boolean {
    return this.entries.has(id);
  }

  get(id: RecordId): ProvenanceRecord | undefined {
    return this.entries.get(id)?.record;
  }

  ownerOf(id: RecordId): PrincipalId | undefined {
    return this.entries.get(id)?.owner;
  }

  ownedBy(owner: PrincipalId): ProvenanceRecord[] {
    const out: ProvenanceRecord[] = [];
    for (const entry of this.entries.values()) {
      if (entry.owner === owner && entry.record) {
        out.push(entry.record);
      }
    }
    return out;
  }

  /** Number of live identities */
  get size(): number {
    return this.entries.size;
  }
}
