/**
 * Typed errors for @provrec/record
 *
 * Every failure raised by minting, destruction or restoring carries a stable
 * code from the kernel registry. Use `err.code` to branch without parsing
 * messages.
 */
import { ERRORS, HASH_LENGTH, ALGORITHM_TAG, type ErrorCode, type ErrorCategory } from '@provrec/kernel';

export class ProvenanceError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ProvenanceError';
    this.code = code;
    this.category = ERRORS[code].category;
    this.retryable = ERRORS[code].retriable;
    this.details = details;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, ProvenanceError.prototype);
  }
}

/**
 * Check whether an unknown value is a ProvenanceError, optionally with a
 * specific code.
 */
export function isProvenanceError(err: unknown, code?: ErrorCode): err is ProvenanceError {
  return err instanceof ProvenanceError && (code === undefined || err.code === code);
}

export function createEmptyPackageNameError(): ProvenanceError {
  return new ProvenanceError('E_EMPTY_PACKAGE_NAME', 'Content package name must not be empty');
}

export function createInvalidMerkleRootLengthError(length: number): ProvenanceError {
  return new ProvenanceError(
    'E_INVALID_MERKLE_ROOT_LENGTH',
    `Merkle root must be exactly ${HASH_LENGTH} bytes, got ${length}`,
    { length, expected: HASH_LENGTH }
  );
}

export function createInvalidManifestHashLengthError(length: number): ProvenanceError {
  return new ProvenanceError(
    'E_INVALID_MANIFEST_HASH_LENGTH',
    `Manifest hash must be exactly ${HASH_LENGTH} bytes, got ${length}`,
    { length, expected: HASH_LENGTH }
  );
}

export function createInvalidAlgorithmTagError(field: string, value: number): ProvenanceError {
  return new ProvenanceError(
    'E_INVALID_ALGORITHM_TAG',
    `${field} must be an integer between ${ALGORITHM_TAG.min} and ${ALGORITHM_TAG.max}, got ${value}`,
    { field, value }
  );
}

export function createRecordDestroyedError(): ProvenanceError {
  return new ProvenanceError('E_RECORD_DESTROYED', 'Provenance record has already been destroyed');
}

export function createInvalidWireFormatError(reason: string): ProvenanceError {
  return new ProvenanceError('E_INVALID_WIRE_FORMAT', `Invalid provenance record: ${reason}`, {
    reason,
  });
}
