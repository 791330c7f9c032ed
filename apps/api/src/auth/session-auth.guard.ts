import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { IS_PUBLIC_KEY } from './public.decorator';
import { SessionService } from './session.service';
import { InvalidTokenError } from './session.errors';
import { extractBearerToken, SessionRequest } from './session-request';

@Injectable()
export class SessionAuthGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly sessionService: SessionService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<SessionRequest>();
    const token = extractBearerToken(request);
    if (!token) {
      throw new InvalidTokenError('Missing bearer token');
    }

    const userId = await this.sessionService.getUserFromToken(token);
    if (!userId) {
      throw new InvalidTokenError('Session is invalid or expired');
    }

    request.userId = userId;
    request.sessionToken = token;
    return true;
  }
}
