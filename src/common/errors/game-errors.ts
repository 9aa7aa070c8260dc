// 도메인 에러: GameExceptionFilter가 toBody() 결과를 그대로 응답

import { HttpStatus } from '@nestjs/common';

export const RUN_CONFLICT_CODE = [
  'ROOM_NOT_READY',
  'RUN_TERMINAL',
  'RUN_ALREADY_ACTIVE',
  'ROOM_INDEX_MISMATCH',
] as const;
export type RunConflictCode = (typeof RUN_CONFLICT_CODE)[number];

export type GameErrorCode =
  | 'BAD_REQUEST'
  | 'NOT_FOUND'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'INVALID_INPUT'
  | 'INTERNAL_ERROR'
  | RunConflictCode;

export type ErrorDetails = Record<string, unknown>;

export interface ErrorBody {
  code: string;
  message: string;
  details: ErrorDetails | null;
}

export class GameError extends Error {
  constructor(
    public readonly code: GameErrorCode,
    message: string,
    public readonly httpStatus: number = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly details?: ErrorDetails,
  ) {
    super(message);
    this.name = new.target.name;
  }

  get isServerError(): boolean {
    return this.httpStatus >= 500;
  }

  toBody(): ErrorBody {
    return { code: this.code, message: this.message, details: this.details ?? null };
  }
}

export class BadRequestError extends GameError {
  constructor(message = 'Bad request', details?: ErrorDetails) {
    super('BAD_REQUEST', message, HttpStatus.BAD_REQUEST, details);
  }
}

export class NotFoundError extends GameError {
  constructor(message = 'Not found', details?: ErrorDetails) {
    super('NOT_FOUND', message, HttpStatus.NOT_FOUND, details);
  }
}

export class UnauthorizedError extends GameError {
  constructor(message = 'Unauthorized', details?: ErrorDetails) {
    super('UNAUTHORIZED', message, HttpStatus.UNAUTHORIZED, details);
  }
}

export class ForbiddenError extends GameError {
  constructor(message = 'Forbidden', details?: ErrorDetails) {
    super('FORBIDDEN', message, HttpStatus.FORBIDDEN, details);
  }
}

/** 런 상태 전이 위반: 409 */
export class RunStateConflictError extends GameError {
  constructor(code: RunConflictCode = 'RUN_TERMINAL', message = 'Run state conflict', details?: ErrorDetails) {
    super(code, message, HttpStatus.CONFLICT, details);
  }
}

// 호출 계약 위반 (tier < 1, 음수 luck, 빈 풀 등)
export class InvalidInputError extends GameError {
  constructor(message = 'Invalid input', details?: ErrorDetails) {
    super('INVALID_INPUT', message, HttpStatus.UNPROCESSABLE_ENTITY, details);
  }
}

export class InternalError extends GameError {
  constructor(message = 'Internal error', details?: ErrorDetails) {
    super('INTERNAL_ERROR', message, HttpStatus.INTERNAL_SERVER_ERROR, details);
  }
}
