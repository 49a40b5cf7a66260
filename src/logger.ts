import pino, { type Logger, type LoggerOptions } from 'pino';

export type AppLogger = Logger;

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

/** File descriptor for stderr; stdout belongs to command output and the MCP stream */
const STDERR = 2;

export function createLogger(config: LoggerConfig = {}): AppLogger {
  const baseOptions: LoggerOptions = {
    level: config.level ?? 'info',
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'roomsense',
    },
  };

  if (config.pretty) {
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname,service',
          destination: STDERR,
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(STDERR));
}
