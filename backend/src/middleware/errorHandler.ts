import { Request, Response, NextFunction } from 'express';
import { describeError, isAssistantError } from '../errors.js';
import type { ErrorKind } from '../types/index.js';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  Validation: 400,
  UnknownCommand: 404,
  ExternalProviderError: 502,
  ConcurrencyConflict: 409,
  RetryExhausted: 503,
};

export function statusForKind(kind: ErrorKind | undefined): number {
  return kind ? STATUS_BY_KIND[kind] : 500;
}

export interface ErrorResponse {
  status: number;
  body: { error: string; message: string };
}

// express.json()이 잘못된 JSON에 대해 던지는 오류
function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

/**
 * 오류를 HTTP 응답으로 변환. 스택이나 내부 메시지는 노출하지 않는다.
 */
export function toErrorResponse(err: unknown): ErrorResponse {
  if (isAssistantError(err)) {
    return { status: statusForKind(err.kind), body: { error: err.kind, message: err.userMessage } };
  }
  if (isBodyParseError(err)) {
    return { status: 400, body: { error: 'Validation', message: 'Request body is not valid JSON.' } };
  }
  return { status: 500, body: { error: 'InternalError', message: 'Internal server error' } };
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const { status, body } = toErrorResponse(err);

  if (status >= 500) {
    console.error(`[API] ${req.method} ${req.path} failed:`, describeError(err));
  } else {
    console.warn(`[API] ${req.method} ${req.path} rejected:`, describeError(err));
  }

  res.status(status).json(body);
}
