/**
 * Runtime wiring
 *
 * Builds a ready-to-use manager with the reference collaborators selected
 * by `RuntimeConfig`.
 */
import { createWriteStream } from 'node:fs';
import { finished } from 'node:stream/promises';
import type { DestinationStream, Logger } from 'pino';
import { ProvenanceRecordManager, type Clock, type EventSink } from '@provrec/record';
import { systemClock } from './clock.js';
import { loadConfig, type RuntimeConfig } from './config.js';
import { InMemoryLedger } from './ledger.js';
import { createLogger } from './logger.js';
import {
  JsonlEventSink,
  LoggingEventSink,
  MemoryEventSink,
  noopEventSink,
  type LineWriter,
} from './sinks.js';

export interface CreateRuntimeOptions {
  /** pino destination (default: stdout) */
  logDestination?: DestinationStream;
  /** Time source (default: systemClock) */
  clock?: Clock;
  /** Writer for the `jsonl` sink instead of opening `events.logPath` */
  eventLog?: LineWriter;
}

export interface ProvenanceRuntime {
  config: RuntimeConfig;
  logger: Logger;
  ledger: InMemoryLedger;
  clock: Clock;
  events: EventSink;
  manager: ProvenanceRecordManager;
  /** Flush and close anything the runtime opened */
  close(): Promise<void>;
}

interface OpenedSink {
  sink: EventSink;
  close(): Promise<void>;
}

function openEventSink(config: RuntimeConfig, logger: Logger, options: CreateRuntimeOptions): OpenedSink {
  const nothingToClose = async (): Promise<void> => {};

  switch (config.events.sink) {
    case 'none':
      return { sink: noopEventSink, close: nothingToClose };
    case 'memory':
      return { sink: new MemoryEventSink(), close: nothingToClose };
    case 'log':
      return {
        sink: new LoggingEventSink(logger.child({ component: 'events' })),
        close: nothingToClose,
      };
    case 'jsonl': {
      if (options.eventLog) {
        return { sink: new JsonlEventSink(options.eventLog), close: nothingToClose };
      }
      const stream = createWriteStream(config.events.logPath, { flags: 'a' });
      let reported: unknown;
      stream.on('error', (err) => {
        reported = err;
        logger.warn({ err, path: config.events.logPath }, 'Event log stream failed');
      });
      return {
        sink: new JsonlEventSink(stream),
        close: async () => {
          stream.end();
          try {
            await finished(stream);
          } catch (err) {
            // Already logged by the error listener
            if (err !== reported) {
              throw err;
            }
          }
        },
      };
    }
  }
}

export function createRuntime(
  config: RuntimeConfig = loadConfig(),
  options: CreateRuntimeOptions = {}
): ProvenanceRuntime {
  const logger = createLogger({ name: config.serviceName, level: config.logLevel }, options.logDestination);
  const ledger = new InMemoryLedger({
    logger: logger.child({ component: 'ledger' }),
    maxAllocationAttempts: config.ledger.maxAllocationAttempts,
  });
  const { sink, close } = openEventSink(config, logger, options);

  const manager = new ProvenanceRecordManager({
    ledger,
    events: sink,
    onEventError: (err, event) => {
      logger.warn({ err, recordId: event.record_id }, 'Mint event publication failed');
    },
  });

  logger.debug({ sink: config.events.sink }, 'Provenance runtime ready');

  return {
    config,
    logger,
    ledger,
    clock: options.clock ?? systemClock,
    events: sink,
    manager,
    close,
  };
}
