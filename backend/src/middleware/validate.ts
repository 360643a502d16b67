import type { z } from 'zod';
import { ValidationError } from '../errors.js';

/**
 * zod 스키마로 요청 본문/쿼리 검증. 실패하면 ValidationError
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.') || what}: ${issue.message}`).join('; ');
    throw new ValidationError(`Invalid ${what}: ${details}`, `Invalid ${what}: ${details}`);
  }
  return parsed.data;
}
