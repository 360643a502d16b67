import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { parseRequest } from '../validate.js';
import { ValidationError } from '../../errors.js';

const schema = z.object({
  text: z.string().trim().min(1, 'text is required'),
  days: z.coerce.number().int().positive().default(7),
});

describe('parseRequest', () => {
  it('returns parsed values with defaults', () => {
    expect(parseRequest(schema, { text: '  hi  ' }, 'body')).toEqual({ text: 'hi', days: 7 });
    expect(parseRequest(schema, { text: 'hi', days: '3' }, 'query')).toEqual({ text: 'hi', days: 3 });
  });

  it('throws a ValidationError naming the bad field', () => {
    let caught: unknown;
    try {
      parseRequest(schema, { text: '   ' }, 'body');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.message).toBe('Invalid body: text: text is required');
    expect(caught.userMessage).toBe('Invalid body: text: text is required');
  });
});
