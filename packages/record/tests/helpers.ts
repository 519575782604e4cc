/**
 * Test doubles for record manager collaborators
 */
import type { MintParams, RecordLedger, Clock, ProvenanceRecord } from '../src/index.js';

export class FakeLedger implements RecordLedger {
  private next = 1;
  readonly allocated: string[] = [];
  readonly released: string[] = [];
  readonly owners = new Map<string, string>();
  readonly live = new Set<string>();

  allocate(): string {
    const id = `0x${(this.next++).toString(16).padStart(64, '0')}`;
    this.allocated.push(id);
    this.live.add(id);
    return id;
  }

  release(id: string): void {
    this.released.push(id);
    this.live.delete(id);
    this.owners.delete(id);
  }

  transfer(record: ProvenanceRecord, owner: string): void {
    this.owners.set(record.id, owner);
  }
}

export function fixedClock(ms: number): Clock & { reads: number } {
  const clock = {
    reads: 0,
    nowMs(): number {
      clock.reads++;
      return ms;
    },
  };
  return clock;
}

export function bytes(length: number, fill: number): Uint8Array {
  return new Uint8Array(length).fill(fill);
}

export function text(value: string): Uint8Array {
  return new TextEncoder().encode(value);
}

export const MERKLE_ROOT = Uint8Array.from({ length: 32 }, (_, i) => i);
export const MANIFEST_HASH = Uint8Array.from({ length: 32 }, (_, i) => 255 - i);

export function validParams(overrides: Partial<MintParams> = {}): MintParams {
  return {
    contentPackageName: 'Test Package',
    merkleIntegrityAlgo: 61,
    merkleRoot: MERKLE_ROOT,
    packageStorageBlobRef: text('package_blob_id'),
    manifestVersion: '1.4',
    manifestIntegrityAlgo: 61,
    manifestHash: MANIFEST_HASH,
    manifestStorageBlobRef: text('manifest_blob_id'),
    ...overrides,
  };
}
