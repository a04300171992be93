/**
 * Application-level errors for HTTP layer mapping.
 * Each carries a stable code so callers never see raw internal exceptions.
 */
export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly status: number;
  /** Whether the caller may retry the same request later. */
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DuplicateEmailError extends AppError {
  readonly code = 'DUPLICATE_EMAIL';
  readonly status = 400;

  constructor(message = 'Email is already registered') {
    super(message);
  }
}

/**
 * Raised both for an unknown email and for a wrong password; the two cases
 * must stay indistinguishable to the caller.
 */
export class InvalidCredentialsError extends AppError {
  readonly code = 'INVALID_CREDENTIALS';
  readonly status = 401;

  constructor() {
    super('Invalid email or password');
  }
}

export class InvalidTokenError extends AppError {
  readonly code = 'INVALID_TOKEN';
  readonly status = 401;

  constructor(message = 'Invalid token') {
    super(message);
  }
}

export class UserNotFoundError extends AppError {
  readonly code = 'USER_NOT_FOUND';
  readonly status = 404;

  constructor(message = 'User not found') {
    super(message);
  }
}

export class StoreUnavailableError extends AppError {
  readonly code = 'STORE_UNAVAILABLE';
  readonly status = 503;
  override readonly retryable = true;

  constructor(message = 'User store unavailable', options?: { cause?: unknown }) {
    super(message, options);
  }
}
