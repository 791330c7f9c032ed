import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus } from '@nestjs/common';
import { Response } from 'express';
import { CredentialsMissingError, SessionError } from './session.errors';

export function sessionErrorStatus(error: SessionError): HttpStatus {
  return error instanceof CredentialsMissingError ? HttpStatus.BAD_REQUEST : HttpStatus.UNAUTHORIZED;
}

@Catch(SessionError)
export class SessionExceptionFilter implements ExceptionFilter<SessionError> {
  catch(exception: SessionError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const statusCode = sessionErrorStatus(exception);
    response.status(statusCode).json({
      statusCode,
      error: exception.name,
      message: exception.message,
    });
  }
}
