/**
 * Record wire codec
 *
 * Converts records to and from the persisted JSON layout. Restoring runs
 * the same invariant checks as minting but allocates no identity, reads no
 * clock and publishes no event: the record already exists in storage.
 */
import {
  bytesToHex,
  hexToBytes,
  validateRecordWire,
  type ProvenanceRecordWire,
} from '@provrec/schema';
import { createInvalidWireFormatError } from './errors.js';
import { assertRecordInvariants } from './invariants.js';
import { assembleRecord, type ProvenanceRecord } from './record.js';

export function encodeRecord(record: ProvenanceRecord): ProvenanceRecordWire {
  const manifest = record.manifest;
  return {
    id: record.id,
    content_package_name: record.contentPackageName,
    merkle_integrity_algo: record.merkleIntegrityAlgo,
    merkle_root: bytesToHex(record.merkleRoot),
    created_at: record.createdAt,
    package_storage_blob_ref: bytesToHex(record.packageStorageBlobRef),
    manifest: {
      manifest_version: manifest.version,
      manifest_integrity_algo: manifest.integrityAlgo,
      manifest_hash: bytesToHex(manifest.hash),
      manifest_storage_blob_ref: bytesToHex(manifest.storageBlobRef),
      parent_manifest_id: manifest.parentManifestId ?? null,
    },
  };
}

/**
 * Rehydrate a persisted record.
 *
 * @throws ProvenanceError `E_INVALID_WIRE_FORMAT` when the shape is wrong,
 *   otherwise the first violated record invariant
 */
export function restoreRecord(input: unknown): ProvenanceRecord {
  const result = validateRecordWire(input);
  if (!result.ok) {
    throw createInvalidWireFormatError(result.error);
  }
  const wire = result.value;

  const merkleRoot = hexToBytes(wire.merkle_root);
  const manifestHash = hexToBytes(wire.manifest.manifest_hash);

  assertRecordInvariants({
    contentPackageName: wire.content_package_name,
    merkleRoot,
    manifestHash,
    merkleIntegrityAlgo: wire.merkle_integrity_algo,
    manifestIntegrityAlgo: wire.manifest.manifest_integrity_algo,
  });

  return assembleRecord({
    id: wire.id,
    contentPackageName: wire.content_package_name,
    merkleIntegrityAlgo: wire.merkle_integrity_algo,
    merkleRoot,
    createdAt: wire.created_at,
    packageStorageBlobRef: hexToBytes(wire.package_storage_blob_ref),
    manifest: {
      version: wire.manifest.manifest_version,
      integrityAlgo: wire.manifest.manifest_integrity_algo,
      hash: manifestHash,
      storageBlobRef: hexToBytes(wire.manifest.manifest_storage_blob_ref),
      parentManifestId: wire.manifest.parent_manifest_id ?? undefined,
    },
  });
}

export function serializeRecord(record: ProvenanceRecord): string {
  return JSON.stringify(encodeRecord(record));
}

export function parseRecord(json: string): ProvenanceRecord {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw createInvalidWireFormatError(err instanceof Error ? err.message : 'JSON parse error');
  }
  return restoreRecord(data);
}
