export const ErrorCodes = {
  CONFIGURATION: 'CONFIGURATION',
  LOGIN_FAILED: 'LOGIN_FAILED',
  SESSION_EXPIRED: 'SESSION_EXPIRED',
  SESSION_UNAVAILABLE: 'SESSION_UNAVAILABLE',
  NAVIGATION_FAILED: 'NAVIGATION_FAILED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class SlotwatchError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing user configuration or unwritable directories; the worker cannot start. */
export class ConfigurationError extends SlotwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.CONFIGURATION, message, options);
  }
}

export class LoginFailedError extends SlotwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.LOGIN_FAILED, message, options);
  }
}

/** The site silently sent us back to the sign-in form. */
export class SessionExpiredError extends SlotwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.SESSION_EXPIRED, message, options);
  }
}

export class SessionUnavailableError extends SlotwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.SESSION_UNAVAILABLE, message, options);
  }
}

export class NavigationError extends SlotwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.NAVIGATION_FAILED, message, options);
  }
}

export function isSessionExpired(error: unknown): error is SessionExpiredError {
  return error instanceof SessionExpiredError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
