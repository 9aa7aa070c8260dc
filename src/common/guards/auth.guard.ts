import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import type { Request } from 'express';
import { AppConfigService } from '../../config/app-config.service.js';
import { UnauthorizedError } from '../errors/game-errors.js';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      userId?: string;
    }
  }
}

interface TokenPayload {
  sub?: unknown;
}

@Injectable()
export class AuthGuard implements CanActivate {
  constructor(
    private readonly jwtService: JwtService,
    private readonly config: AppConfigService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<Request>();

    // 1. Bearer token 확인
    const authHeader = req.headers.authorization;
    if (authHeader?.startsWith('Bearer ')) {
      const token = authHeader.slice(7);
      let payload: TokenPayload;
      try {
        payload = this.jwtService.verify<TokenPayload>(token);
      } catch {
        throw new UnauthorizedError('Invalid or expired token');
      }
      if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
        throw new UnauthorizedError('Token has no subject');
      }
      req.userId = payload.sub;
      return true;
    }

    // 2. Dev fallback: x-user-id (non-production only)
    if (!this.config.get().production) {
      const userId = req.headers['x-user-id'];
      if (userId && typeof userId === 'string') {
        req.userId = userId;
        return true;
      }
    }

    throw new UnauthorizedError(
      'Authorization header with Bearer token is required',
    );
  }
}
