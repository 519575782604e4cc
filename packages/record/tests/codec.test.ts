/**
 * Record wire codec tests
 */

import { describe, it, expect } from 'vitest';
import {
  ProvenanceRecordManager,
  encodeRecord,
  restoreRecord,
  serializeRecord,
  parseRecord,
  isProvenanceError,
  ProvenanceError,
} from '../src/index.js';
import { FakeLedger, fixedClock, validParams } from './helpers.js';

const ctx = { sender: '0xa11ce' };

function mintOne(parentManifestId?: string) {
  const ledger = new FakeLedger();
  const manager = new ProvenanceRecordManager({ ledger });
  return manager.mint(validParams({ parentManifestId }), fixedClock(1000), ctx);
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof ProvenanceError) {
      return err.code;
    }
    throw err;
  }
  return undefined;
}

describe('encodeRecord', () => {
  it('writes every field with hex bytes and a null parent', () => {
    const record = mintOne();
    const wire = encodeRecord(record);

    expect(wire).toEqual({
      id: '0x' + '0'.repeat(63) + '1',
      content_package_name: 'Test Package',
      merkle_integrity_algo: 61,
      merkle_root: '000102030405060708090a0b0c0d0e0f101112131415161718191a1b1c1d1e1f',
      created_at: 1000,
      package_storage_blob_ref: '7061636b6167655f626c6f625f6964',
      manifest: {
        manifest_version: '1.4',
        manifest_integrity_algo: 61,
        manifest_hash: 'fffefdfcfbfaf9f8f7f6f5f4f3f2f1f0efeeedecebeae9e8e7e6e5e4e3e2e1e0',
        manifest_storage_blob_ref: '6d616e69666573745f626c6f625f6964',
        parent_manifest_id: null,
      },
    });
  });

  it('refuses a destroyed record', () => {
    const ledger = new FakeLedger();
    const manager = new ProvenanceRecordManager({ ledger });
    const record = manager.mint(validParams(), fixedClock(1), ctx);
    manager.destroy(record);

    expect(codeOf(() => encodeRecord(record))).toBe('E_RECORD_DESTROYED');
  });
});

describe('restoreRecord', () => {
  it('round-trips every field including the parent', () => {
    const original = mintOne('0xparent');
    const restored = restoreRecord(encodeRecord(original));

    expect(restored.id).toBe(original.id);
    expect(restored.createdAt).toBe(1000);
    expect(restored.merkleRoot).toEqual(original.merkleRoot);
    expect(restored.manifest).toEqual(original.manifest);
    expect(restored.parentManifestId).toBe('0xparent');
    expect(encodeRecord(restored)).toEqual(encodeRecord(original));
  });

  it('round-trips an empty parent identifier', () => {
    const restored = restoreRecord(encodeRecord(mintOne('')));
    expect(restored.parentManifestId).toBe('');
  });

  it('applies record invariants in mint order', () => {
    const wire = encodeRecord(mintOne());
    wire.merkle_root = 'aabbcc';
    wire.manifest.manifest_hash = 'aabbcc';
    expect(codeOf(() => restoreRecord(wire))).toBe('E_INVALID_MERKLE_ROOT_LENGTH');

    wire.content_package_name = '';
    expect(codeOf(() => restoreRecord(wire))).toBe('E_EMPTY_PACKAGE_NAME');
  });

  it('rejects a short manifest hash', () => {
    const wire = encodeRecord(mintOne());
    wire.manifest.manifest_hash = '00';
    expect(codeOf(() => restoreRecord(wire))).toBe('E_INVALID_MANIFEST_HASH_LENGTH');
  });

  it('rejects an out-of-range algorithm tag', () => {
    const wire = encodeRecord(mintOne());
    wire.manifest.manifest_integrity_algo = 256;
    expect(codeOf(() => restoreRecord(wire))).toBe('E_INVALID_ALGORITHM_TAG');
  });

  it('reports schema failures as E_INVALID_WIRE_FORMAT', () => {
    const wire = encodeRecord(mintOne());
    let caught: unknown;
    try {
      restoreRecord({ ...wire, created_at: 'yesterday' });
    } catch (err) {
      caught = err;
    }
    expect(isProvenanceError(caught, 'E_INVALID_WIRE_FORMAT')).toBe(true);
    if (caught instanceof ProvenanceError) {
      expect(caught.category).toBe('wire');
      expect(caught.message).toBe(
        'Invalid provenance record: created_at: Expected number, received string'
      );
    }
  });
});

describe('serializeRecord / parseRecord', () => {
  it('round-trips through JSON text', () => {
    const original = mintOne('0xparent');
    const json = serializeRecord(original);
    const back = parseRecord(json);

    expect(JSON.parse(json)).toEqual(encodeRecord(original));
    expect(serializeRecord(back)).toBe(json);
  });

  it('round-trips whatever timestamp the clock returned', () => {
    const manager = new ProvenanceRecordManager({ ledger: new FakeLedger() });

    for (const ms of [1000.5, -250, 0]) {
      const record = manager.mint(validParams(), fixedClock(ms), ctx);
      expect(parseRecord(serializeRecord(record)).createdAt).toBe(ms);
    }
  });

  it('wraps malformed JSON', () => {
    expect(codeOf(() => parseRecord('{not json'))).toBe('E_INVALID_WIRE_FORMAT');
  });
});
