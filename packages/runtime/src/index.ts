/**
 * Provenance Record Runtime
 *
 * Reference collaborators for `@provrec/record`: an in-memory ownership
 * ledger, clocks, event sinks, a JSONL event log format, a manifest lineage
 * walker, environment configuration and pino logging.
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * import { createRuntime, loadConfig } from '@provrec/runtime';
 *
 * const runtime = createRuntime(loadConfig());
 * const id = runtime.manager.mintToSender(params, runtime.clock, { sender: '0xa11ce' });
 * runtime.ledger.ownerOf(id); // '0xa11ce'
 * await runtime.close();
 * ```
 */

export { InMemoryLedger, randomRecordId, type InMemoryLedgerOptions } from './ledger.js';
export { systemClock, ManualClock } from './clock.js';
export {
  noopEventSink,
  MemoryEventSink,
  LoggingEventSink,
  JsonlEventSink,
  fanoutEventSink,
  type LineWriter,
} from './sinks.js';
export {
  formatEventLine,
  formatEventLog,
  parseEventLine,
  parseEventLog,
  type EventLogOptions,
  type EventLineResult,
  type EventLineError,
  type EventLogParseOptions,
  type EventLogParseResult,
} from './jsonl.js';
export {
  walkManifestLineage,
  type RecordResolver,
  type LineageOptions,
  type LineageEnd,
  type LineageResult,
} from './lineage.js';
export {
  loadConfig,
  EventSinkModeSchema,
  LogLevelSchema,
  type EventSinkMode,
  type RuntimeConfig,
} from './config.js';
export { createLogger, silentLogger, type LoggerConfig } from './logger.js';
export { createRuntime, type CreateRuntimeOptions, type ProvenanceRuntime } from './runtime.js';
export { LedgerError, ConfigError, type LedgerErrorCode } from './errors.js';
