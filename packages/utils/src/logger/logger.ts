import pino from 'pino';
import {
  type LogLevel,
  type LogConfig,
  DEFAULT_LOG_CONFIG,
  getLogLevel,
  getServiceFromName,
} from './log-config';

/**
 * Logger options for creating a new logger
 */
export interface LoggerOptions {
  /** Logger name (e.g., 'candles:sync') */
  name: string;
  /** Minimum log level (auto-detected from config if not provided) */
  level?: LogLevel;
  /** Custom log config (default: DEFAULT_LOG_CONFIG) */
  config?: LogConfig;
  /** Pretty console output (default: NODE_ENV === 'development') */
  pretty?: boolean;
  /** Alternate destination, mainly for tests */
  destination?: pino.DestinationStream;
}

type LogMethod = (obj: Record<string, unknown> | string, msg?: string) => void;

/**
 * Structured logger interface used across packages
 */
export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  child: (bindings: Record<string, unknown>) => Logger;
  isLevelEnabled: (level: LogLevel) => boolean;
  flush: () => void;
}

/**
 * Wrap a pino instance in the Logger interface
 */
function wrap(pinoLogger: pino.Logger): Logger {
  function createLogMethod(level: pino.Level): LogMethod {
    return (obj: Record<string, unknown> | string, msg?: string) => {
      if (typeof obj === 'string') {
        pinoLogger[level](obj);
      } else {
        pinoLogger[level](obj, msg);
      }
    };
  }

  return {
    trace: createLogMethod('trace'),
    debug: createLogMethod('debug'),
    info: createLogMethod('info'),
    warn: createLogMethod('warn'),
    error: createLogMethod('error'),
    fatal: createLogMethod('fatal'),
    child: (bindings: Record<string, unknown>) => wrap(pinoLogger.child(bindings)),
    isLevelEnabled: (level: LogLevel) =>
      level !== 'silent' && pinoLogger.isLevelEnabled(level),
    flush: () => pinoLogger.flush(),
  };
}

/**
 * Create a structured logger instance
 *
 * - Console output with pino-pretty in development
 * - JSON lines otherwise (uppercased level, ISO timestamps)
 * - Per-service level from log config / LOG_LEVEL_* env vars
 * - Child loggers with context propagation
 *
 * @param options - Logger configuration options (or just a name string)
 * @returns Configured Logger instance
 */
export function createLogger(options: LoggerOptions | string): Logger {
  const opts: LoggerOptions =
    typeof options === 'string' ? { name: options } : options;

  const config = opts.config ?? DEFAULT_LOG_CONFIG;
  const level = opts.level ?? getLogLevel(opts.name, config);
  const pretty = opts.pretty ?? process.env.NODE_ENV === 'development';

  const pinoOptions: pino.LoggerOptions = {
    name: opts.name,
    level,
    base: { service: getServiceFromName(opts.name) },
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (opts.destination) {
    return wrap(pino(pinoOptions, opts.destination));
  }

  if (pretty) {
    return wrap(
      pino({
        ...pinoOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      })
    );
  }

  return wrap(pino(pinoOptions));
}
