/**
 * JSONL Formatting and Parsing for mint events
 *
 * Each line is one `RecordMintedEvent` in its wire form.
 *
 * @see https://jsonlines.org/
 */
import {
  fromMintedEventWire,
  toMintedEventWire,
  validateMintedEventWire,
  type RecordMintedEvent,
} from '@provrec/schema';

/**
 * Format one event as a single JSON line (no trailing newline).
 *
 * @example
 * ```typescript
 * formatEventLine(event);
 * // '{"record_id":"0x5f...","minter":"0xa11ce","package_name":"Test Package",...}'
 * ```
 */
export function formatEventLine(event: RecordMintedEvent): string {
  return JSON.stringify(toMintedEventWire(event));
}

export interface EventLogOptions {
  /** Append a trailing newline (default: false) */
  trailingNewline?: boolean;
}

export function formatEventLog(events: RecordMintedEvent[], options?: EventLogOptions): string {
  const result = events.map((event) => formatEventLine(event)).join('\n');

  if (options?.trailingNewline && result.length > 0) {
    return result + '\n';
  }

  return result;
}

export interface EventLineResult {
  ok: true;
  event: RecordMintedEvent;
  lineNumber: number;
}

export interface EventLineError {
  ok: false;
  error: string;
  lineNumber: number;
  raw?: string;
}

function preview(line: string): string {
  return line.length > 100 ? line.substring(0, 100) + '...' : line;
}

/**
 * Parse a single JSONL line.
 *
 * @param line - JSON string to parse
 * @param lineNumber - Line number for error reporting
 */
export function parseEventLine(line: string, lineNumber: number = 1): EventLineResult | EventLineError {
  const trimmed = line.trim();

  if (trimmed.length === 0) {
    return { ok: false, error: 'Empty line', lineNumber };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (e) {
    return {
      ok: false,
      error: e instanceof Error ? e.message : 'JSON parse error',
      lineNumber,
      raw: preview(trimmed),
    };
  }

  const result = validateMintedEventWire(parsed);
  if (!result.ok) {
    return { ok: false, error: result.error, lineNumber, raw: preview(trimmed) };
  }

  return { ok: true, event: fromMintedEventWire(result.value), lineNumber };
}

export interface EventLogParseOptions {
  /** Collect invalid lines instead of stopping at the first one */
  skipInvalid?: boolean;
}

export interface EventLogParseResult {
  events: RecordMintedEvent[];
  errors: EventLineError[];
  /** Non-empty lines processed */
  totalLines: number;
  successCount: number;
  errorCount: number;
}

/**
 * Parse JSONL content to events. Blank lines are skipped.
 */
export function parseEventLog(content: string, options?: EventLogParseOptions): EventLogParseResult {
  const lines = content.split('\n');
  const events: RecordMintedEvent[] = [];
  const errors: EventLineError[] = [];
  let processed = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line.trim().length === 0) {
      continue;
    }

    processed++;
    const result = parseEventLine(line, i + 1);

    if (result.ok) {
      events.push(result.event);
      continue;
    }

    errors.push(result);
    if (!options?.skipInvalid) {
      break;
    }
  }

  return {
    events,
    errors,
    totalLines: processed,
    successCount: events.length,
    errorCount: errors.length,
  };
}
