import type { ErrorKind } from './types/index.js';

/**
 * Base error for everything the assistant reports to a caller.
 * `userMessage` is safe to speak; `message` is for logs.
 */
export class AssistantError extends Error {
  readonly kind: ErrorKind;
  readonly userMessage: string;

  constructor(kind: ErrorKind, message: string, userMessage: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.userMessage = userMessage;
  }
}

export class ValidationError extends AssistantError {
  constructor(message: string, userMessage = "Sorry, I couldn't understand that request.") {
    super('Validation', message, userMessage);
  }
}

export class UnknownCommandError extends AssistantError {
  readonly command: string;

  constructor(command: string) {
    super('UnknownCommand', `Unknown command: ${command}`, "I don't recognize that");
    this.command = command;
  }
}

export class ExternalProviderError extends AssistantError {
  readonly provider: string;

  constructor(provider: string, message: string, userMessage: string, options?: { cause?: unknown }) {
    super('ExternalProviderError', `[${provider}] ${message}`, userMessage, options);
    this.provider = provider;
  }
}

export class ConcurrencyConflictError extends AssistantError {
  readonly ownerId: string;

  constructor(ownerId: string) {
    super(
      'ConcurrencyConflict',
      `A voice session is already running for owner ${ownerId}`,
      'Your voice assistant is already running.'
    );
    this.ownerId = ownerId;
  }
}

export class RetryExhaustedError extends AssistantError {
  readonly attempts: number;

  constructor(attempts: number, lastError: unknown) {
    super(
      'RetryExhausted',
      `Gave up after ${attempts} attempts: ${describeError(lastError)}`,
      "Sorry, I couldn't start the voice assistant. Please try again in a moment.",
      { cause: lastError }
    );
    this.attempts = attempts;
  }
}

export function isAssistantError(error: unknown): error is AssistantError {
  return error instanceof AssistantError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
