import { pino, stdSerializers, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export interface LoggerConfig {
  name: string;
  level: string;
}

/**
 * Build the structured logger shared by the runtime collaborators.
 *
 * @param destination - Optional pino destination (defaults to stdout)
 */
export function createLogger(config: LoggerConfig, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    name: config.name,
    level: config.level,

    formatters: {
      bindings: (bindings) => ({
        pid: bindings.pid,
        hostname: bindings.hostname,
        service: config.name,
      }),

      level: (label) => ({ level: label }),
    },

    serializers: {
      err: stdSerializers.err,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
  };

  return destination ? pino(options, destination) : pino(options);
}

/**
 * Logger that drops everything. Default for collaborators constructed
 * without one.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
