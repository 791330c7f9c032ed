import { ConfigService } from '@nestjs/config';
import {
  DEFAULT_SESSION_FILE,
  resolveSessionFile,
  resolveSessionOptions,
} from './session.config';

describe('session config', () => {
  it('uses the configured secret and TTL', () => {
    const options = resolveSessionOptions(
      new ConfigService({ SESSION_SECRET: 'test-secret', SESSION_TTL_HOURS: '2' }),
    );

    expect(options).toEqual({ secret: 'test-secret', ttlSeconds: 7200 });
  });

  it('generates a random secret and defaults the TTL to 72 hours', () => {
    const options = resolveSessionOptions(new ConfigService({}));

    expect(options.secret).toMatch(/^[0-9a-f]{64}$/);
    expect(options.ttlSeconds).toBe(72 * 3600);
  });

  it('falls back to the default TTL for unusable values', () => {
    for (const ttl of ['soon', '-1', '0']) {
      const options = resolveSessionOptions(
        new ConfigService({ SESSION_SECRET: 'test-secret', SESSION_TTL_HOURS: ttl }),
      );
      expect(options.ttlSeconds).toBe(72 * 3600);
    }
  });

  it('refuses to start in production without a secret', () => {
    const previous = process.env.NODE_ENV;
    process.env.NODE_ENV = 'production';
    try {
      expect(() => resolveSessionOptions(new ConfigService({}))).toThrow(
        'SESSION_SECRET must be set in production environment',
      );
    } finally {
      process.env.NODE_ENV = previous;
    }
  });

  it('defaults the session file name', () => {
    expect(resolveSessionFile(new ConfigService({}))).toBe(DEFAULT_SESSION_FILE);
    expect(resolveSessionFile(new ConfigService({ SESSION_FILE: '/tmp/s.json' }))).toBe('/tmp/s.json');
  });
});
