import { describe, it, expect } from 'vitest';
import { statusForKind, toErrorResponse } from '../errorHandler.js';
import {
  ConcurrencyConflictError,
  ExternalProviderError,
  RetryExhaustedError,
  UnknownCommandError,
  ValidationError,
} from '../../errors.js';

describe('statusForKind', () => {
  it('maps every error kind to an HTTP status', () => {
    expect(statusForKind('Validation')).toBe(400);
    expect(statusForKind('UnknownCommand')).toBe(404);
    expect(statusForKind('ConcurrencyConflict')).toBe(409);
    expect(statusForKind('ExternalProviderError')).toBe(502);
    expect(statusForKind('RetryExhausted')).toBe(503);
    expect(statusForKind(undefined)).toBe(500);
  });
});

describe('toErrorResponse', () => {
  it('returns the spoken message, not the log message', () => {
    const error = new ExternalProviderError(
      'GoogleCalendar',
      'invalid_grant',
      "Sorry, I couldn't reach your calendar right now. Please try again later."
    );

    expect(toErrorResponse(error)).toEqual({
      status: 502,
      body: {
        error: 'ExternalProviderError',
        message: "Sorry, I couldn't reach your calendar right now. Please try again later.",
      },
    });
  });

  it('covers each assistant error', () => {
    expect(toErrorResponse(new ValidationError('bad')).status).toBe(400);
    expect(toErrorResponse(new UnknownCommandError('frobnicate')).body).toEqual({
      error: 'UnknownCommand',
      message: "I don't recognize that",
    });
    expect(toErrorResponse(new ConcurrencyConflictError('user-1')).status).toBe(409);
    expect(toErrorResponse(new RetryExhaustedError(3, new Error('down'))).status).toBe(503);
  });

  it('hides unexpected errors', () => {
    expect(toErrorResponse(new Error('connection string leaked'))).toEqual({
      status: 500,
      body: { error: 'InternalError', message: 'Internal server error' },
    });
  });

  it('treats malformed JSON bodies as validation errors', () => {
    const parseError = Object.assign(new SyntaxError('Unexpected token } in JSON'), { body: '{"text": }' });

    expect(toErrorResponse(parseError)).toEqual({
      status: 400,
      body: { error: 'Validation', message: 'Request body is not valid JSON.' },
    });
  });
});
