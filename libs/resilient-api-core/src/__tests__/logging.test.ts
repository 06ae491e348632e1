import { describe, expect, it } from 'vitest';
import { createPinoLogger } from '../logging';

const captureLines = () => {
  const lines: Array<Record<string, unknown>> = [];
  return {
    lines,
    destination: {
      write: (chunk: string) => {
        lines.push(JSON.parse(chunk) as Record<string, unknown>);
      },
    },
  };
};

describe('createPinoLogger', () => {
  it('writes structured lines with the event name as message', () => {
    const { lines, destination } = captureLines();
    const logger = createPinoLogger({
      level: 'debug',
      name: 'api-test',
      destination,
    });

    logger.debug('http.request.attempt', {
      method: 'GET',
      path: '/v3/apps',
      attempt: 1,
    });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 20,
      name: 'api-test',
      msg: 'http.request.attempt',
      method: 'GET',
      path: '/v3/apps',
      attempt: 1,
    });
  });

  it('censors credentials', () => {
    const { lines, destination } = captureLines();
    const logger = createPinoLogger({ destination });

    logger.warn('auth.token.request', {
      grant: 'password',
      password: 'test-password',
      client_secret: 'test-secret',
      headers: { Authorization: 'Bearer test-token' },
    });

    expect(lines[0]).toMatchObject({
      level: 40,
      grant: 'password',
      password: '[REDACTED]',
      client_secret: '[REDACTED]',
      headers: { Authorization: '[REDACTED]' },
    });
  });

  it('drops messages below the configured level', () => {
    const { lines, destination } = captureLines();
    const logger = createPinoLogger({ level: 'info', destination });

    logger.debug('cache.hit', { key: 'GET:/v3/apps' });
    logger.info('cache.cleanup', { removed: 2 });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ msg: 'cache.cleanup', removed: 2 });
  });
});
