/**
 * Provenance Kernel Types
 * Shared type definitions for kernel exports
 */

/**
 * Globally unique record identifier, as issued by an identity allocator.
 *
 * The kernel treats identifiers as opaque strings; the in-memory ledger
 * issues `0x` followed by 64 lowercase hex characters.
 */
export type RecordId = string;

/**
 * Identity of a calling principal (account address, DID, or opaque ID).
 */
export type PrincipalId = string;

/**
 * Error category - broad classification of an error code
 */
export type ErrorCategory = 'validation' | 'lifecycle' | 'wire' | 'infrastructure';

/**
 * Error code definition
 */
export interface ErrorDefinition {
  code: string;
  title: string;
  description: string;
  retriable: boolean;
  category: ErrorCategory;
}
