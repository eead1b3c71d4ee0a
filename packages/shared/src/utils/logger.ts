import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface CreateLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
  /** File path or file descriptor. Defaults to stderr; stdout carries the check result. */
  destination?: string | number;
}

const STDERR = 2;

export function createLogger(options: CreateLoggerOptions = {}): pino.Logger {
  const { name = 'srx-probe', level = 'warn', pretty = false, destination = STDERR } = options;

  if (pretty) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination,
        },
      },
    });
  }

  return pino(
    {
      name,
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    pino.destination(destination),
  );
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function levelFromEnv(): LogLevel {
  const value = process.env.SRX_PROBE_LOG_LEVEL;
  return LOG_LEVELS.find((level) => level === value) ?? 'warn';
}

let defaultLogger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger({ level: levelFromEnv() });
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: pino.Logger): void {
  defaultLogger = logger;
}
