import { ArgumentsHost, BadRequestException, Catch, ExceptionFilter, ForbiddenException, HttpException, HttpStatus, Logger, UnauthorizedException } from '@nestjs/common';
import type { Response } from 'express';
import { FetchError, StorageError } from '../import/import.errors';

export type ErrorBody = { code: string; message: string; details?: unknown };

function messageOf(response: string | object, fallback: string): string {
  if (typeof response === 'string') return response;
  const message = 'message' in response ? response.message : undefined;
  if (Array.isArray(message)) return message.join('; ');
  if (typeof message === 'string') return message;
  if ('error' in response && typeof response.error === 'string') return response.error;
  return fallback;
}

@Catch()
export class GlobalHttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalHttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const res = host.switchToHttp().getResponse<Response>();
    const [status, body] = this.toBody(exception);
    res.status(status).json(body);
  }

  toBody(exception: unknown): [number, ErrorBody] {
    if (exception instanceof BadRequestException) {
      const response = exception.getResponse();
      return [HttpStatus.BAD_REQUEST, { code: 'BAD_REQUEST', message: messageOf(response, 'Bad request'), details: response }];
    }
    if (exception instanceof UnauthorizedException) {
      return [HttpStatus.UNAUTHORIZED, { code: 'UNAUTHORIZED', message: exception.message || 'Unauthorized' }];
    }
    if (exception instanceof ForbiddenException) {
      return [HttpStatus.FORBIDDEN, { code: 'FORBIDDEN', message: exception.message || 'Forbidden' }];
    }
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const response = exception.getResponse();
      return [status, { code: 'HTTP_' + status, message: messageOf(response, exception.message), details: response }];
    }
    // Fallos del import lanzados desde el endpoint admin
    if (exception instanceof FetchError) {
      return [HttpStatus.BAD_GATEWAY, { code: exception.code, message: exception.message }];
    }
    if (exception instanceof StorageError) {
      return [HttpStatus.SERVICE_UNAVAILABLE, { code: exception.code, message: exception.message }];
    }

    this.logger.error('Unhandled exception', exception instanceof Error ? exception.stack : String(exception));
    return [HttpStatus.INTERNAL_SERVER_ERROR, { code: 'INTERNAL_ERROR', message: 'Unexpected error' }];
  }
}
