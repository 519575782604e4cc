/**
 * Record invariants, checked in a fixed order so that the first violated
 * rule always determines the error reported.
 */
import { HASH_LENGTH, ALGORITHM_TAG } from '@provrec/kernel';
import {
  createEmptyPackageNameError,
  createInvalidMerkleRootLengthError,
  createInvalidManifestHashLengthError,
  createInvalidAlgorithmTagError,
} from './errors.js';

export interface InvariantInput {
  contentPackageName: string;
  merkleRoot: Uint8Array;
  manifestHash: Uint8Array;
  merkleIntegrityAlgo: number;
  manifestIntegrityAlgo: number;
}

/**
 * Whether a value fits the 8-bit unsigned algorithm tag domain.
 */
export function isAlgorithmTag(value: number): boolean {
  return Number.isInteger(value) && value >= ALGORITHM_TAG.min && value <= ALGORITHM_TAG.max;
}

/**
 * Throw the first violated invariant:
 * name, merkle root length, manifest hash length, then the two algorithm tags.
 */
export function assertRecordInvariants(input: InvariantInput): void {
  if (input.contentPackageName.length === 0) {
    throw createEmptyPackageNameError();
  }
  if (input.merkleRoot.length !== HASH_LENGTH) {
    throw createInvalidMerkleRootLengthError(input.merkleRoot.length);
  }
  if (input.manifestHash.length !== HASH_LENGTH) {
    throw createInvalidManifestHashLengthError(input.manifestHash.length);
  }
  if (!isAlgorithmTag(input.merkleIntegrityAlgo)) {
    throw createInvalidAlgorithmTagError('merkleIntegrityAlgo', input.merkleIntegrityAlgo);
  }
  if (!isAlgorithmTag(input.manifestIntegrityAlgo)) {
    throw createInvalidAlgorithmTagError('manifestIntegrityAlgo', input.manifestIntegrityAlgo);
  }
}
