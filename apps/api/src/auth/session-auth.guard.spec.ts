import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AuthVerifier } from './auth-verifier';
import { Public } from './public.decorator';
import { SessionAuthGuard } from './session-auth.guard';
import { CredentialsMissingError, InvalidTokenError, SessionError } from './session.errors';
import { SessionExceptionFilter, sessionErrorStatus } from './session-exception.filter';
import { SessionRequest } from './session-request';
import { SessionService } from './session.service';
import { SessionStore } from './session-store';

interface FakeResponse {
  status(code: number): FakeResponse;
  json(payload: unknown): FakeResponse;
}

const acceptAll: AuthVerifier = { verify: async () => true };

class ProtectedController {
  list(): void {}
}

function httpContext(
  request: Partial<SessionRequest>,
  handler: () => void = ProtectedController.prototype.list,
): ExecutionContextHost {
  return new ExecutionContextHost([request], ProtectedController, handler);
}

describe('SessionAuthGuard', () => {
  let dir: string;
  let sessions: SessionService;
  let guard: SessionAuthGuard;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'session-guard-'));
    sessions = new SessionService(
      { secret: 'test-secret', ttlSeconds: 3600 },
      new SessionStore(path.join(dir, 'sessions.json')),
      acceptAll,
    );
    guard = new SessionAuthGuard(new Reflector(), sessions);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('lets public handlers through without a token', async () => {
    const open = (): void => {};
    Public()(open);

    await expect(guard.canActivate(httpContext({ headers: {} }, open))).resolves.toBe(true);
  });

  it('requires a bearer token', async () => {
    await expect(guard.canActivate(httpContext({ headers: {} }))).rejects.toThrow('Missing bearer token');
    await expect(
      guard.canActivate(httpContext({ headers: { authorization: 'Basic abc' } })),
    ).rejects.toThrow(InvalidTokenError);
  });

  it('attaches the session user to the request', async () => {
    const { token } = await sessions.login('alice', 'test-password');
    const request: Partial<SessionRequest> = { headers: { authorization: `Bearer ${token}` } };

    await expect(guard.canActivate(httpContext(request))).resolves.toBe(true);
    expect(request.userId).toBe('alice');
    expect(request.sessionToken).toBe(token);
  });

  it('rejects revoked sessions', async () => {
    const { token } = await sessions.login('alice', 'test-password');
    await sessions.revokeToken(token);

    await expect(
      guard.canActivate(httpContext({ headers: { authorization: `Bearer ${token}` } })),
    ).rejects.toThrow('Session is invalid or expired');
  });
});

describe('SessionExceptionFilter', () => {
  it('maps missing credentials to 400 and other session errors to 401', () => {
    expect(sessionErrorStatus(new CredentialsMissingError('empty'))).toBe(400);
    expect(sessionErrorStatus(new InvalidTokenError('forged'))).toBe(401);
    expect(sessionErrorStatus(new SessionError('bad password'))).toBe(401);
  });

  it('writes a JSON error body', () => {
    let status = 0;
    let body: unknown;
    const response: FakeResponse = {
      status(code: number) {
        status = code;
        return response;
      },
      json(payload: unknown) {
        body = payload;
        return response;
      },
    };

    new SessionExceptionFilter().catch(
      new InvalidTokenError('Missing bearer token'),
      new ExecutionContextHost([{}, response]),
    );

    expect(status).toBe(401);
    expect(body).toEqual({
      statusCode: 401,
      error: 'InvalidTokenError',
      message: 'Missing bearer token',
    });
  });
});
