import { Request, Response, NextFunction } from 'express';
import { ValidationError } from '../errors.js';

export const OWNER_HEADER = 'x-user-id';

export interface OwnerRequest extends Request {
  ownerId?: string;
}

/**
 * 소유자 식별 미들웨어
 * X-User-Id 헤더를 그대로 신뢰한다 (인증은 이 서비스 범위 밖)
 */
export function identifyOwner(req: OwnerRequest, _res: Response, next: NextFunction): void {
  const header = req.header(OWNER_HEADER)?.trim();
  if (header) {
    req.ownerId = header;
  }
  next();
}

/**
 * 소유자가 필요한 라우트에서 사용
 */
export function requireOwner(req: OwnerRequest): string {
  if (!req.ownerId) {
    throw new ValidationError('Missing X-User-Id header', 'I need to know who you are. Send the X-User-Id header.');
  }
  return req.ownerId;
}
