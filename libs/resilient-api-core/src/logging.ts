import pino from 'pino';
import type { Logger, LoggerMeta } from './types';

export const noopLogger: Logger = {
  debug: () => {
    /* no-op */
  },
  info: () => {
    /* no-op */
  },
  warn: () => {
    /* no-op */
  },
  error: () => {
    /* no-op */
  },
};

const REDACTED_PATHS = [
  'authorization',
  '*.authorization',
  'headers.Authorization',
  'access_token',
  '*.access_token',
  'refresh_token',
  '*.refresh_token',
  'client_secret',
  '*.client_secret',
  'password',
  '*.password',
];

export interface PinoLoggerOptions {
  level?: pino.LevelWithSilent;
  name?: string;
  /** Destination stream; defaults to stdout. */
  destination?: pino.DestinationStream;
}

/**
 * Adapts a pino instance to the pipeline's {@link Logger} interface. Credential
 * fields in the meta object are censored before they reach the destination.
 *
 * @example
 * ```typescript
 * const logger = createPinoLogger({ level: 'debug', name: 'api-client' });
 * logger.debug('http.request.attempt', { method: 'GET', path: '/v3/apps' });
 * ```
 */
export function createPinoLogger(options: PinoLoggerOptions = {}): Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: options.level ?? 'info',
    name: options.name,
    redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
    serializers: { err: pino.stdSerializers.err },
  };
  const instance = options.destination
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);
  return fromPino(instance);
}

export function fromPino(instance: pino.Logger): Logger {
  const write =
    (level: 'debug' | 'info' | 'warn' | 'error') =>
    (message: string, meta?: LoggerMeta) => {
      if (meta) {
        instance[level](meta, message);
      } else {
        instance[level](message);
      }
    };
  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}
