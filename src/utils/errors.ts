export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public isOperational: boolean = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ServiceError extends Error {
  constructor(
    public service: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(`${service}.${operation} failed: ${originalError.message}`);
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * A conversation document could not be read from or written to the backing store.
 * Never raised for a missing key; callers get `null` / `false` for that.
 */
export class StoreError extends ServiceError {
  constructor(operation: string, public phoneNumber: string | null, originalError: Error) {
    super('ConversationStore', operation, originalError, true);
    Object.setPrototypeOf(this, StoreError.prototype);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function errorMessage(value: unknown): string {
  return toError(value).message;
}
