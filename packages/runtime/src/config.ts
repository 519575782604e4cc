import { z } from 'zod';
import { ConfigError } from './errors.js';

export const EventSinkModeSchema = z.enum(['none', 'log', 'memory', 'jsonl']);
export type EventSinkMode = z.infer<typeof EventSinkModeSchema>;

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export interface RuntimeConfig {
  logLevel: string;
  serviceName: string;
  events: {
    sink: EventSinkMode;
    /** JSONL file appended to by the `jsonl` sink */
    logPath: string;
  };
  ledger: {
    /** Identity generation attempts before allocation gives up */
    maxAllocationAttempts: number;
  };
}

function num(v: string | undefined, d: number): number {
  const n = v ? Number(v) : NaN;
  return Number.isFinite(n) ? n : d;
}

function str(v: string | undefined, d: string): string {
  return v && v.trim().length > 0 ? v.trim() : d;
}

function oneOf<T extends string>(
  schema: z.ZodType<T>,
  variable: string,
  v: string | undefined,
  d: T
): T {
  if (v === undefined || v.trim() === '') {
    return d;
  }
  const parsed = schema.safeParse(v.trim().toLowerCase());
  if (!parsed.success) {
    throw new ConfigError(variable, `${variable} has unsupported value "${v}"`);
  }
  return parsed.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const maxAllocationAttempts = num(env.PROVREC_ID_MAX_ATTEMPTS, 8);
  if (!Number.isInteger(maxAllocationAttempts) || maxAllocationAttempts < 1) {
    throw new ConfigError(
      'PROVREC_ID_MAX_ATTEMPTS',
      `PROVREC_ID_MAX_ATTEMPTS must be a positive integer, got ${maxAllocationAttempts}`
    );
  }

  return {
    logLevel: oneOf(LogLevelSchema, 'LOG_LEVEL', env.LOG_LEVEL, 'info'),
    serviceName: str(env.PROVREC_SERVICE_NAME, 'provenance-record'),
    events: {
      sink: oneOf(EventSinkModeSchema, 'PROVREC_EVENT_SINK', env.PROVREC_EVENT_SINK, 'log'),
      logPath: str(env.PROVREC_EVENT_LOG_PATH, 'provenance-events.jsonl'),
    },
    ledger: {
      maxAllocationAttempts,
    },
  };
}
