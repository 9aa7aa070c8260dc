import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { type ErrorBody, GameError } from '../errors/game-errors.js';

@Catch()
export class GameExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GameExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();
    const { status, body } = this.toResponse(exception, `${req.method} ${req.url}`);
    res.status(status).json(body);
  }

  toResponse(exception: unknown, route: string): { status: number; body: ErrorBody } {
    if (exception instanceof GameError) {
      if (exception.isServerError) {
        this.logger.error(`${route} ${exception.code}: ${exception.message}`, exception.stack);
      }
      return { status: exception.httpStatus, body: exception.toBody() };
    }

    if (exception instanceof HttpException) {
      const response = exception.getResponse();
      return {
        status: exception.getStatus(),
        body: {
          code: 'HTTP_ERROR',
          message: typeof response === 'string' ? response : messageOf(response),
          details: typeof response === 'object' ? { ...response } : null,
        },
      };
    }

    this.logger.error(
      `${route} unhandled: ${exception instanceof Error ? exception.message : String(exception)}`,
      exception instanceof Error ? exception.stack : undefined,
    );
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: { code: 'INTERNAL_ERROR', message: 'Internal server error', details: null },
    };
  }
}

function messageOf(response: object): string {
  if ('message' in response) {
    const { message } = response;
    if (typeof message === 'string') return message;
    if (Array.isArray(message)) return message.map(String).join('; ');
  }
  return 'Unknown error';
}
