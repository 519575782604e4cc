/**
 * Provenance Record Error Codes
 *
 * Stable codes for every failure the record component can raise. Packages
 * build their typed errors on top of this registry so that category and
 * retry hints stay in one place.
 */

import type { ErrorDefinition } from './types.js';

/**
 * Error code constants
 */
export const ERROR_CODES = {
  E_EMPTY_PACKAGE_NAME: 'E_EMPTY_PACKAGE_NAME',
  E_INVALID_MERKLE_ROOT_LENGTH: 'E_INVALID_MERKLE_ROOT_LENGTH',
  E_INVALID_MANIFEST_HASH_LENGTH: 'E_INVALID_MANIFEST_HASH_LENGTH',
  E_INVALID_ALGORITHM_TAG: 'E_INVALID_ALGORITHM_TAG',
  E_RECORD_DESTROYED: 'E_RECORD_DESTROYED',
  E_INVALID_WIRE_FORMAT: 'E_INVALID_WIRE_FORMAT',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Error definitions map
 */
export const ERRORS: Record<ErrorCode, ErrorDefinition> = {
  E_EMPTY_PACKAGE_NAME: {
    code: 'E_EMPTY_PACKAGE_NAME',
    title: 'Empty Package Name',
    description: 'Content package name must contain at least one character',
    retriable: false,
    category: 'validation',
  },
  E_INVALID_MERKLE_ROOT_LENGTH: {
    code: 'E_INVALID_MERKLE_ROOT_LENGTH',
    title: 'Invalid Merkle Root Length',
    description: 'Merkle root must be exactly 32 bytes',
    retriable: false,
    category: 'validation',
  },
  E_INVALID_MANIFEST_HASH_LENGTH: {
    code: 'E_INVALID_MANIFEST_HASH_LENGTH',
    title: 'Invalid Manifest Hash Length',
    description: 'Manifest hash must be exactly 32 bytes',
    retriable: false,
    category: 'validation',
  },
  E_INVALID_ALGORITHM_TAG: {
    code: 'E_INVALID_ALGORITHM_TAG',
    title: 'Invalid Algorithm Tag',
    description: 'Algorithm tag must be an integer between 0 and 255',
    retriable: false,
    category: 'validation',
  },
  E_RECORD_DESTROYED: {
    code: 'E_RECORD_DESTROYED',
    title: 'Record Destroyed',
    description: 'The provenance record has been destroyed and can no longer be used',
    retriable: false,
    category: 'lifecycle',
  },
  E_INVALID_WIRE_FORMAT: {
    code: 'E_INVALID_WIRE_FORMAT',
    title: 'Invalid Wire Format',
    description: 'Serialized provenance record does not match the wire schema',
    retriable: false,
    category: 'wire',
  },
};

/**
 * Get error definition by code
 */
export function getError(code: string): ErrorDefinition | undefined {
  return isErrorCode(code) ? ERRORS[code] : undefined;
}

/**
 * Check if error is retriable
 */
export function isRetriable(code: string): boolean {
  return getError(code)?.retriable ?? false;
}

/**
 * Narrow an arbitrary string to a registered error code.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERRORS, code);
}
