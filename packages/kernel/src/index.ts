/**
 * Provenance Kernel
 * Normative constants, errors, and shared types for provenance records
 *
 * @packageDocumentation
 */

// Export types
export type { RecordId, PrincipalId, ErrorCategory, ErrorDefinition } from './types.js';

// Export constants
export { HASH_LENGTH, ALGORITHM_TAG, RECORD_ID, EVENT_TYPES, LIMITS, CONSTANTS } from './constants.js';

// Export errors
export {
  ERROR_CODES,
  ERRORS,
  getError,
  isRetriable,
  isErrorCode,
  type ErrorCode,
} from './errors.js';
