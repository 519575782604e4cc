/**
 * Provenance Record
 *
 * The record type and the only code that can assemble or take one apart.
 * Fields live in a module-private table keyed by the record object, so a
 * record can be held, passed around and read by anyone, but only this
 * package can build it (mint, restore) or unseal it (burn, destroy).
 * `assembleRecord` and `unsealRecord` are not part of the package's public
 * exports.
 */
import type { RecordId } from '@provrec/kernel';
import { createRecordDestroyedError } from './errors.js';

/**
 * Manifest reference embedded in every record. A value type: it has no
 * identity or lifecycle of its own.
 */
export interface EmbeddedManifest {
  readonly version: string;
  readonly integrityAlgo: number;
  /** 32-byte digest of the manifest document */
  readonly hash: Uint8Array;
  readonly storageBlobRef: Uint8Array;
  /**
   * Identity of the record this manifest supersedes. Opaque: the target is
   * never looked up and may not exist.
   */
  readonly parentManifestId: RecordId | undefined;
}

/**
 * @internal
 */
export interface RecordFields {
  readonly id: RecordId;
  readonly contentPackageName: string;
  readonly merkleIntegrityAlgo: number;
  readonly merkleRoot: Uint8Array;
  readonly createdAt: number;
  readonly packageStorageBlobRef: Uint8Array;
  readonly manifest: EmbeddedManifest;
}

const SEAL = Symbol('ProvenanceRecord.seal');

const sealed = new WeakMap<ProvenanceRecord, RecordFields>();

function copyManifest(manifest: EmbeddedManifest): EmbeddedManifest {
  return Object.freeze({
    version: manifest.version,
    integrityAlgo: manifest.integrityAlgo,
    hash: new Uint8Array(manifest.hash),
    storageBlobRef: new Uint8Array(manifest.storageBlobRef),
    parentManifestId: manifest.parentManifestId,
  });
}

function fieldsOf(record: ProvenanceRecord): RecordFields {
  const fields = sealed.get(record);
  if (!fields) {
    throw createRecordDestroyedError();
  }
  return fields;
}

/**
 * An immutable provenance record. Obtain one from
 * `ProvenanceRecordManager.mint` or `restoreRecord`.
 *
 * Byte getters return a fresh copy on every call.
 */
export class ProvenanceRecord {
  /** @internal */
  constructor(seal: symbol) {
    if (seal !== SEAL) {
      throw new TypeError('ProvenanceRecord instances are created by minting');
    }
    Object.freeze(this);
  }

  get id(): RecordId {
    return fieldsOf(this).id;
  }

  get contentPackageName(): string {
    return fieldsOf(this).contentPackageName;
  }

  get merkleIntegrityAlgo(): number {
    return fieldsOf(this).merkleIntegrityAlgo;
  }

  get merkleRoot(): Uint8Array {
    return new Uint8Array(fieldsOf(this).merkleRoot);
  }

  /** Creation time in ms since epoch, as read from the mint clock */
  get createdAt(): number {
    return fieldsOf(this).createdAt;
  }

  get packageStorageBlobRef(): Uint8Array {
    return new Uint8Array(fieldsOf(this).packageStorageBlobRef);
  }

  /** Snapshot of the whole embedded manifest */
  get manifest(): EmbeddedManifest {
    return copyManifest(fieldsOf(this).manifest);
  }

  get manifestVersion(): string {
    return fieldsOf(this).manifest.version;
  }

  get manifestIntegrityAlgo(): number {
    return fieldsOf(this).manifest.integrityAlgo;
  }

  get manifestHash(): Uint8Array {
    return new Uint8Array(fieldsOf(this).manifest.hash);
  }

  get manifestStorageBlobRef(): Uint8Array {
    return new Uint8Array(fieldsOf(this).manifest.storageBlobRef);
  }

  get parentManifestId(): RecordId | undefined {
    return fieldsOf(this).manifest.parentManifestId;
  }
}

/**
 * Whether a record is still live (not yet burned or destroyed).
 */
export function isLiveRecord(record: ProvenanceRecord): boolean {
  return sealed.has(record);
}

/**
 * Seal validated fields into a new record. Callers must have run
 * `assertRecordInvariants` first.
 *
 * @internal
 */
export function assembleRecord(fields: RecordFields): ProvenanceRecord {
  const record = new ProvenanceRecord(SEAL);
  sealed.set(
    record,
    Object.freeze({
      id: fields.id,
      contentPackageName: fields.contentPackageName,
      merkleIntegrityAlgo: fields.merkleIntegrityAlgo,
      merkleRoot: new Uint8Array(fields.merkleRoot),
      createdAt: fields.createdAt,
      packageStorageBlobRef: new Uint8Array(fields.packageStorageBlobRef),
      manifest: copyManifest(fields.manifest),
    })
  );
  return record;
}

/**
 * Take a record apart. The record is terminal afterwards: every getter and
 * a second unseal throw `E_RECORD_DESTROYED`.
 *
 * @internal
 */
export function unsealRecord(record: ProvenanceRecord): RecordFields {
  const fields = fieldsOf(record);
  sealed.delete(record);
  return fields;
}
