import { pino, type DestinationStream, type LevelWithSilent, type Logger, type LoggerOptions } from 'pino';

const REDACT_PATHS = ['headers.authorization', 'password', 'token', '*.password', '*.token'];

export interface LoggerConfig {
  level: LevelWithSilent;
  /** Receives each serialized log line. Defaults to stdout. */
  destination?: DestinationStream;
}

/**
 * Create a pino logger that censors credentials and bearer tokens.
 *
 * @example
 * const logger = createLogger({ level: 'debug' });
 * const client = new MintsoftClient({ token, logger });
 */
export function createLogger(config: LoggerConfig): Logger {
  const options: LoggerOptions = {
    name: 'mintsoft-client',
    level: config.level,
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  };
  return config.destination ? pino(options, config.destination) : pino(options);
}

/**
 * Resolve the logger for a client: the caller's, or a fresh one that is silent unless
 * `debug` is set.
 */
export function resolveLogger(logger: Logger | undefined, debug: boolean | undefined): Logger {
  return logger ?? createLogger({ level: debug ? 'debug' : 'silent' });
}
