import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../common/error-message';
import { AuthVerifier, AUTH_VERIFIER } from './auth-verifier';
import { CredentialsMissingError, InvalidTokenError, SessionError } from './session.errors';
import { SessionRecord, SessionStore } from './session-store';
import { createToken, TOKEN_SEPARATOR, verifyToken } from './session-token';

export const SESSION_OPTIONS = 'SESSION_OPTIONS';

export interface SessionOptions {
  secret: string;
  ttlSeconds: number;
  /** Clock in milliseconds. */
  now?: () => number;
}

export interface IssuedSession {
  token: string;
  userId: string;
  /** Unix seconds. */
  expiresAt: number;
}

/**
 * Issues and checks HMAC-signed session tokens backed by the session store.
 * Lookups never throw for bad tokens; only store write failures propagate.
 */
@Injectable()
export class SessionService {
  private readonly logger = new Logger(SessionService.name);
  private readonly secret: string;
  private readonly ttlSeconds: number;
  private readonly now: () => number;

  constructor(
    @Inject(SESSION_OPTIONS) options: SessionOptions,
    private readonly store: SessionStore,
    @Inject(AUTH_VERIFIER) private readonly verifier: AuthVerifier,
  ) {
    if (!options.secret) {
      throw new SessionError('Session secret must not be empty');
    }
    if (!Number.isInteger(options.ttlSeconds) || options.ttlSeconds < 1) {
      throw new SessionError(`Session TTL must be a positive number of seconds, got ${options.ttlSeconds}`);
    }
    this.secret = options.secret;
    this.ttlSeconds = options.ttlSeconds;
    this.now = options.now ?? Date.now;
  }

  async login(userId: string, password: string): Promise<IssuedSession> {
    if (!userId || !password) {
      throw new CredentialsMissingError('User id and password are required');
    }
    if (userId.includes(TOKEN_SEPARATOR)) {
      throw new SessionError(`User id may not contain "${TOKEN_SEPARATOR}"`);
    }

    let verified: boolean;
    try {
      verified = await this.verifier.verify(userId, password);
    } catch (error) {
      this.logger.error(`Credential check for ${userId} failed: ${errorMessage(error)}`);
      throw new SessionError('Credential check failed');
    }
    if (!verified) {
      this.logger.warn(`Rejected login for ${userId}`);
      throw new SessionError('Invalid user id or password');
    }

    const session = await this.store.update((sessions) => {
      const issued = this.issue(userId);
      sessions.set(issued.token, this.record(issued));
      return { value: issued, changed: true };
    });
    this.logger.log(`Session issued for ${userId}`);
    return session;
  }

  /** Returns the user id, or null for a missing, forged, revoked or expired token. */
  async getUserFromToken(token: string | null | undefined): Promise<string | null> {
    if (!token || !this.hasValidSignature(token)) {
      return null;
    }

    const sessions = await this.store.load();
    const record = sessions.get(token);
    if (!record) {
      return null;
    }

    if (record.expires_at < this.nowSeconds()) {
      await this.store.update((current) => ({ value: undefined, changed: current.delete(token) }));
      this.logger.log(`Expired session for ${record.user_id} purged`);
      return null;
    }

    return record.user_id;
  }

  async revokeToken(token: string | null | undefined): Promise<void> {
    if (!token) {
      return;
    }
    const removed = await this.store.update((sessions) => {
      const deleted = sessions.delete(token);
      return { value: deleted, changed: deleted };
    });
    if (removed) {
      this.logger.log('Session revoked');
    }
  }

  /**
   * Swaps a live token for a new one in a single store write. Returns null and
   * leaves the store untouched (apart from purging an expired entry) otherwise.
   */
  async refreshToken(oldToken: string | null | undefined): Promise<IssuedSession | null> {
    if (!oldToken || !this.hasValidSignature(oldToken)) {
      return null;
    }

    const refreshed = await this.store.update<IssuedSession | null>((sessions) => {
      const record = sessions.get(oldToken);
      if (!record) {
        return { value: null, changed: false };
      }
      if (record.expires_at < this.nowSeconds()) {
        sessions.delete(oldToken);
        return { value: null, changed: true };
      }

      const issued = this.issue(record.user_id);
      sessions.delete(oldToken);
      sessions.set(issued.token, this.record(issued));
      return { value: issued, changed: true };
    });

    if (refreshed) {
      this.logger.log(`Session refreshed for ${refreshed.userId}`);
    }
    return refreshed;
  }

  /** Removes every entry with expires_at <= now and returns how many went. */
  async purgeExpiredSessions(): Promise<number> {
    const cutoff = this.nowSeconds();
    return this.store.update((sessions) => {
      let removed = 0;
      for (const [token, record] of sessions) {
        if (record.expires_at <= cutoff) {
          sessions.delete(token);
          removed++;
        }
      }
      return { value: removed, changed: removed > 0 };
    });
  }

  private hasValidSignature(token: string): boolean {
    try {
      verifyToken(this.secret, token);
      return true;
    } catch (error) {
      if (error instanceof InvalidTokenError) {
        return false;
      }
      throw error;
    }
  }

  private issue(userId: string): IssuedSession {
    const expiresAt = this.nowSeconds() + this.ttlSeconds;
    return { token: createToken(this.secret, userId, expiresAt), userId, expiresAt };
  }

  private record(session: IssuedSession): SessionRecord {
    return {
      user_id: session.userId,
      created_at: new Date(this.now()).toISOString(),
      expires_at: session.expiresAt,
    };
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }
}
