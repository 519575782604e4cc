/**
 * Event sinks for mint audit events.
 */
import type { Logger } from 'pino';
import { toMintedEventWire, type RecordMintedEvent } from '@provrec/schema';
import { isPromiseLike, type EventSink } from '@provrec/record';
import { formatEventLine } from './jsonl.js';

/**
 * Sink that discards every event.
 */
export const noopEventSink: EventSink = {
  publish: () => {},
};

/**
 * Keeps every event in order. Useful for tests and in-process consumers.
 */
export class MemoryEventSink implements EventSink {
  readonly events: RecordMintedEvent[] = [];

  publish(event: RecordMintedEvent): void {
    this.events.push(event);
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * Writes each event as a structured log line at `info`.
 */
export class LoggingEventSink implements EventSink {
  constructor(private readonly logger: Logger) {}

  publish(event: RecordMintedEvent): void {
    this.logger.info({ event: toMintedEventWire(event) }, 'Provenance record minted');
  }
}

/**
 * Anything with a string `write`, such as a file or process stream.
 */
export interface LineWriter {
  write(chunk: string): unknown;
}

/**
 * Appends each event as one JSONL line.
 *
 * Delivery is best effort: the result of `write` is not checked, so a
 * stream under backpressure buffers lines in memory until it drains.
 */
export class JsonlEventSink implements EventSink {
  constructor(private readonly out: LineWriter) {}

  publish(event: RecordMintedEvent): void {
    this.out.write(formatEventLine(event) + '\n');
  }
}

/**
 * Publish to every sink. One failing sink does not stop the others; all
 * failures are reported together as an AggregateError, synchronously when
 * every sink is synchronous and as a rejection otherwise.
 */
export function fanoutEventSink(...sinks: EventSink[]): EventSink {
  return {
    publish(event: RecordMintedEvent): void | Promise<void> {
      const errors: unknown[] = [];
      const pending: PromiseLike<unknown>[] = [];

      for (const sink of sinks) {
        try {
          const result = sink.publish(event);
          if (isPromiseLike(result)) {
            pending.push(result);
          }
        } catch (err) {
          errors.push(err);
        }
      }

      if (pending.length === 0) {
        if (errors.length > 0) {
          throw new AggregateError(errors, `${errors.length} event sink(s) failed`);
        }
        return;
      }

      return Promise.allSettled(pending).then((results) => {
        for (const result of results) {
          if (result.status === 'rejected') {
            errors.push(result.reason);
          }
        }
        if (errors.length > 0) {
          throw new AggregateError(errors, `${errors.length} event sink(s) failed`);
        }
      });
    },
  };
}
