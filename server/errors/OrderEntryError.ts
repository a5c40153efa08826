export type OrderEntryErrorKind =
  | 'TRANSIENT_IO'
  | 'VALIDATION_FAILURE'
  | 'SAFETY_BLOCKED'
  | 'PROGRAMMING_INVARIANT'
  | 'CANCELLED';

export class OrderEntryError extends Error {
  readonly name: string = 'OrderEntryError';

  constructor(
    readonly kind: OrderEntryErrorKind,
    readonly code: string,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
  }

  get statusCode(): number {
    switch (this.kind) {
      case 'VALIDATION_FAILURE':
        return 400;
      case 'SAFETY_BLOCKED':
        return 409;
      case 'CANCELLED':
        return 410;
      case 'TRANSIENT_IO':
        return 503;
      case 'PROGRAMMING_INVARIANT':
        return 500;
    }
  }
}

/** Network or timeout failure talking to the bus or the trading API. Retryable. */
export class TransientIOError extends OrderEntryError {
  readonly name = 'TransientIOError';

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super('TRANSIENT_IO', code, message, details);
  }
}

export class ValidationError extends OrderEntryError {
  readonly name = 'ValidationError';

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super('VALIDATION_FAILURE', code, message, details);
  }
}

export class SafetyBlockedError extends OrderEntryError {
  readonly name = 'SafetyBlockedError';

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super('SAFETY_BLOCKED', code, message, details);
  }
}

/** A caller bug, e.g. two owners of one channel passing different callbacks. */
export class ProgrammingInvariantError extends OrderEntryError {
  readonly name = 'ProgrammingInvariantError';

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super('PROGRAMMING_INVARIANT', code, message, details);
  }
}

export class SubscriptionCancelledError extends OrderEntryError {
  readonly name = 'SubscriptionCancelledError';

  constructor(channel: string) {
    super('CANCELLED', 'subscription_cancelled', `subscription_cancelled:${channel}`, { channel });
  }
}

export function isOrderEntryError(error: unknown): error is OrderEntryError {
  return error instanceof OrderEntryError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
