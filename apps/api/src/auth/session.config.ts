import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomBytes } from 'crypto';
import { SessionOptions } from './session.service';

export const DEFAULT_SESSION_TTL_HOURS = 72;
export const DEFAULT_SESSION_FILE = 'auto_sessions.json';

const logger = new Logger('SessionConfig');

export function resolveSessionOptions(configService: ConfigService): SessionOptions {
  const secret = configService.get<string>('SESSION_SECRET');
  const isProduction = configService.get<string>('NODE_ENV') === 'production';

  if (!secret && isProduction) {
    throw new Error('SESSION_SECRET must be set in production environment');
  }
  if (!secret) {
    logger.warn('SESSION_SECRET not set - using a random secret, sessions will not survive a restart');
  }

  const rawTtl = configService.get<string>('SESSION_TTL_HOURS');
  let ttlHours = rawTtl === undefined || rawTtl === '' ? DEFAULT_SESSION_TTL_HOURS : Number(rawTtl);
  if (!Number.isFinite(ttlHours) || ttlHours <= 0) {
    logger.warn(`Invalid SESSION_TTL_HOURS "${rawTtl}", using ${DEFAULT_SESSION_TTL_HOURS}`);
    ttlHours = DEFAULT_SESSION_TTL_HOURS;
  }

  return {
    secret: secret || randomBytes(32).toString('hex'),
    ttlSeconds: Math.max(1, Math.round(ttlHours * 3600)),
  };
}

export function resolveSessionFile(configService: ConfigService): string {
  return configService.get<string>('SESSION_FILE') || DEFAULT_SESSION_FILE;
}
