/**
 * Provenance Record Schema Package
 *
 * Wire schemas for persisted records and mint audit events.
 *
 * @packageDocumentation
 */

export { bytesToHex, hexToBytes, isHex, utf8Bytes } from './hex.js';

export {
  HexBytesSchema,
  AlgorithmTagSchema,
  RecordIdSchema,
  ManifestWireSchema,
  ProvenanceRecordWireSchema,
  validateRecordWire,
  formatIssues,
} from './record.js';
export type { ManifestWire, ProvenanceRecordWire } from './record.js';

export {
  RecordMintedEventWireSchema,
  toMintedEventWire,
  fromMintedEventWire,
  validateMintedEventWire,
} from './event.js';
export type { RecordMintedEvent, RecordMintedEventWire } from './event.js';
