import { createParamDecorator, type ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import { UnauthorizedError } from '../errors/game-errors.js';

// AuthGuard 가 채운 userId
export const UserId = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string => {
    const req = ctx.switchToHttp().getRequest<Request>();
    if (!req.userId) {
      throw new UnauthorizedError('Request is not authenticated');
    }
    return req.userId;
  },
);
