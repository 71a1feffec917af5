import { ArgumentsHost, Catch, HttpStatus, Logger } from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';
import type { Response } from 'express';
import { ZodError } from 'zod';
import {
  EmbeddingError,
  GenerationError,
  getErrorMessage,
  IndexConsistencyError,
  ParseError,
  RagError,
  RetrievalError,
} from './errors';

/**
 * Maps pipeline errors to HTTP responses. Anything else goes to Nest's default
 * handling.
 */
@Catch()
export class RagExceptionFilter extends BaseExceptionFilter {
  private readonly logger = new Logger(RagExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    if (!(exception instanceof RagError) && !(exception instanceof ZodError)) {
      return super.catch(exception, host);
    }

    const res = host.switchToHttp().getResponse<Response>();
    if (res.headersSent) return;

    if (exception instanceof ZodError) {
      res.status(HttpStatus.BAD_REQUEST).json({
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        message: exception.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`),
      });
      return;
    }

    const status = statusFor(exception);
    if (exception instanceof GenerationError && exception.cancelled) {
      this.logger.warn('Client closed the request before the answer was ready');
    } else if (status >= 500) {
      this.logger.error(`${exception.code}: ${exception.message}`);
    } else {
      this.logger.warn(`${exception.code}: ${exception.message}`);
    }

    res.status(status).json({
      statusCode: status,
      code: exception.code,
      retryable: exception.retryable,
      message: status === HttpStatus.SERVICE_UNAVAILABLE ? getErrorMessage(exception) : exception.message,
    });
  }
}

export function statusFor(error: RagError): number {
  if (error instanceof ParseError) return HttpStatus.UNPROCESSABLE_ENTITY;
  if (error instanceof IndexConsistencyError) return HttpStatus.CONFLICT;
  if (error instanceof EmbeddingError && !error.retryable) return HttpStatus.UNPROCESSABLE_ENTITY;
  if (
    error instanceof EmbeddingError ||
    error instanceof RetrievalError ||
    error instanceof GenerationError
  ) {
    return HttpStatus.SERVICE_UNAVAILABLE;
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}
