/**
 * Event sink tests
 */

import { describe, it, expect, vi } from 'vitest';
import type { RecordMintedEvent } from '@provrec/schema';
import {
  noopEventSink,
  MemoryEventSink,
  LoggingEventSink,
  JsonlEventSink,
  fanoutEventSink,
} from '../src/sinks.js';
import { createLogger } from '../src/logger.js';
import { captureLines } from './helpers.js';

const event: RecordMintedEvent = {
  record_id: '0x01',
  minter: '0xa11ce',
  package_name: 'Test Package',
  merkle_root: new Uint8Array(32).fill(1),
  minted_at: 1000,
};

const wireLine =
  '{"record_id":"0x01","minter":"0xa11ce","package_name":"Test Package","merkle_root":"' +
  '01'.repeat(32) +
  '","minted_at":1000}';

describe('noopEventSink', () => {
  it('accepts events and returns nothing', () => {
    expect(noopEventSink.publish(event)).toBeUndefined();
  });
});

describe('MemoryEventSink', () => {
  it('keeps events in order and clears', () => {
    const sink = new MemoryEventSink();
    sink.publish(event);
    sink.publish({ ...event, record_id: '0x02' });

    expect(sink.events.map((e) => e.record_id)).toEqual(['0x01', '0x02']);
    sink.clear();
    expect(sink.events).toHaveLength(0);
  });
});

describe('LoggingEventSink', () => {
  it('logs the wire form at info', () => {
    const dest = captureLines();
    const sink = new LoggingEventSink(createLogger({ name: 'provrec', level: 'info' }, dest));

    sink.publish(event);

    const [entry] = dest.records();
    expect(entry.level).toBe('info');
    expect(entry.msg).toBe('Provenance record minted');
    expect(entry.service).toBe('provrec');
    expect(entry.event).toEqual({
      record_id: '0x01',
      minter: '0xa11ce',
      package_name: 'Test Package',
      merkle_root: '01'.repeat(32),
      minted_at: 1000,
    });
  });
});

describe('JsonlEventSink', () => {
  it('writes one line per event', () => {
    const chunks: string[] = [];
    const sink = new JsonlEventSink({ write: (chunk) => chunks.push(chunk) });

    sink.publish(event);

    expect(chunks).toEqual([wireLine + '\n']);
  });

  it('keeps writing while the writer reports backpressure', () => {
    const chunks: string[] = [];
    const sink = new JsonlEventSink({
      write: (chunk) => {
        chunks.push(chunk);
        return false;
      },
    });

    sink.publish(event);
    sink.publish(event);

    expect(chunks).toEqual([wireLine + '\n', wireLine + '\n']);
  });
});

describe('fanoutEventSink', () => {
  it('delivers to every sink', () => {
    const a = new MemoryEventSink();
    const b = new MemoryEventSink();
    fanoutEventSink(a, b).publish(event);

    expect(a.events).toHaveLength(1);
    expect(b.events).toHaveLength(1);
  });

  it('keeps delivering past a throwing sink and reports it', () => {
    const after = new MemoryEventSink();
    const sink = fanoutEventSink(
      {
        publish: () => {
          throw new Error('boom');
        },
      },
      after
    );

    expect(() => sink.publish(event)).toThrow(AggregateError);
    expect(after.events).toHaveLength(1);
  });

  it('rejects when an asynchronous sink rejects', async () => {
    const publish = vi.fn().mockResolvedValue(undefined);
    const sink = fanoutEventSink(
      { publish },
      { publish: () => Promise.reject(new Error('late')) }
    );

    await expect(sink.publish(event)).rejects.toThrow('1 event sink(s) failed');
    expect(publish).toHaveBeenCalledWith(event);
  });

  it('resolves when every asynchronous sink succeeds', async () => {
    const sink = fanoutEventSink({ publish: () => Promise.resolve() });
    await expect(sink.publish(event)).resolves.toBeUndefined();
  });
});
