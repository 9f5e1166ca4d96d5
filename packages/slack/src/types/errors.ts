// Error taxonomy for the question and configuration engine

export type ErrorKind =
  | 'InvalidConfiguration'
  | 'StorageUnavailable'
  | 'ContextUnavailable'
  | 'NoAssistantConfigured'
  | 'Timeout'
  | 'Unauthorized'
  | 'RateLimited'
  | 'ServiceError'
  | 'MalformedResponse'
  | 'UnknownAnswer'
  | 'Cancelled';

export type ErrorSeverity = 'validation' | 'transient' | 'fatal' | 'cancelled';

export abstract class ThreadSageError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(
    message: string,
    public context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidConfigurationError extends ThreadSageError {
  readonly kind = 'InvalidConfiguration' as const;

  constructor(
    message: string,
    public field?: 'assistants' | 'customPrompt' | 'contextSize',
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }
}

export class StorageUnavailableError extends ThreadSageError {
  readonly kind = 'StorageUnavailable' as const;
}

export class ContextUnavailableError extends ThreadSageError {
  readonly kind = 'ContextUnavailable' as const;
}

export class NoAssistantConfiguredError extends ThreadSageError {
  readonly kind = 'NoAssistantConfigured' as const;
}

export class TimeoutError extends ThreadSageError {
  readonly kind = 'Timeout' as const;
}

export class UnauthorizedError extends ThreadSageError {
  readonly kind = 'Unauthorized' as const;
}

export class RateLimitedError extends ThreadSageError {
  readonly kind = 'RateLimited' as const;

  constructor(
    message: string,
    public retryAfterSeconds?: number,
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }
}

export class ServiceError extends ThreadSageError {
  readonly kind = 'ServiceError' as const;

  constructor(
    message: string,
    public statusCode?: number,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, context, options);
  }
}

export class MalformedResponseError extends ThreadSageError {
  readonly kind = 'MalformedResponse' as const;
}

export class UnknownAnswerError extends ThreadSageError {
  readonly kind = 'UnknownAnswer' as const;
}

export class OperationCancelledError extends ThreadSageError {
  readonly kind = 'Cancelled' as const;
}

export type QAError =
  | TimeoutError
  | UnauthorizedError
  | RateLimitedError
  | ServiceError
  | MalformedResponseError
  | OperationCancelledError;

export type FeedbackError = UnknownAnswerError | StorageUnavailableError;

/**
 * How an error kind is surfaced: validation errors are actionable, transient
 * ones get a generic retry message, fatal ones stop downstream calls.
 */
export function severityOf(kind: ErrorKind): ErrorSeverity {
  switch (kind) {
    case 'InvalidConfiguration':
    case 'NoAssistantConfigured':
      return 'validation';
    case 'Unauthorized':
      return 'fatal';
    case 'Cancelled':
      return 'cancelled';
    default:
      return 'transient';
  }
}

export function isThreadSageError(error: unknown): error is ThreadSageError {
  return error instanceof ThreadSageError;
}
