import { createHmac, randomBytes, timingSafeEqual } from 'crypto';
import { InvalidTokenError } from './session.errors';

export const TOKEN_SEPARATOR = ':';
const NONCE_BYTES = 8;
// Canonical unsigned integer, so re-encoding a decoded token gives back the same text
const EXPIRY_PATTERN = /^(0|[1-9]\d*)$/;

/**
 * Wire form: `userId:expiresAt:nonce:signature`, where the signature is the
 * hex HMAC-SHA256 of the first three fields.
 */
export interface SessionToken {
  userId: string;
  /** Unix seconds. */
  expiresAt: number;
  nonce: string;
  signature: string;
}

export function newNonce(): string {
  return randomBytes(NONCE_BYTES).toString('hex');
}

export function tokenPayload(userId: string, expiresAt: number, nonce: string): string {
  return [userId, String(expiresAt), nonce].join(TOKEN_SEPARATOR);
}

export function signPayload(secret: string, payload: string): string {
  return createHmac('sha256', secret).update(payload).digest('hex');
}

export function encodeToken(token: SessionToken): string {
  return [tokenPayload(token.userId, token.expiresAt, token.nonce), token.signature].join(
    TOKEN_SEPARATOR,
  );
}

/** Parses the wire form without checking the signature. */
export function decodeToken(raw: string): SessionToken {
  const parts = raw.split(TOKEN_SEPARATOR);
  if (parts.length !== 4) {
    throw new InvalidTokenError('Token must have exactly four fields');
  }

  const [userId, expiry, nonce, signature] = parts;
  if (!userId || !nonce || !signature || !EXPIRY_PATTERN.test(expiry)) {
    throw new InvalidTokenError('Token fields are malformed');
  }

  const expiresAt = Number(expiry);
  if (!Number.isSafeInteger(expiresAt)) {
    throw new InvalidTokenError('Token expiry is out of range');
  }

  return { userId, expiresAt, nonce, signature };
}

export function createToken(
  secret: string,
  userId: string,
  expiresAt: number,
  nonce: string = newNonce(),
): string {
  const payload = tokenPayload(userId, expiresAt, nonce);
  return encodeToken({ userId, expiresAt, nonce, signature: signPayload(secret, payload) });
}

function constantTimeEquals(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * Checks the signature and returns the decoded token. Expiry is not checked
 * here; the session store owns it.
 */
export function verifyToken(secret: string, raw: string): SessionToken {
  const token = decodeToken(raw);
  const expected = signPayload(secret, tokenPayload(token.userId, token.expiresAt, token.nonce));
  if (!constantTimeEquals(token.signature, expected)) {
    throw new InvalidTokenError('Token signature mismatch');
  }
  return token;
}
