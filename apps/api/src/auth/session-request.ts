import { Request } from 'express';

/** Request after SessionAuthGuard has accepted its bearer token. */
export interface SessionRequest extends Request {
  userId?: string;
  sessionToken?: string;
}

export function extractBearerToken(request: Request): string | null {
  const header = request.headers.authorization;
  if (!header) {
    return null;
  }
  const [scheme, token] = header.split(' ');
  return scheme.toLowerCase() === 'bearer' && token ? token : null;
}
