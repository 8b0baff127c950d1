/** Raised when a user exceeds the per-user request budget. */
export class RateLimitExceededError extends Error {
  readonly statusCode = 429;

  constructor(
    public readonly userId: string,
    public readonly retryAfterSeconds?: number,
  ) {
    super(`Rate limit exceeded for user ${userId}`);
    this.name = 'RateLimitExceededError';
  }
}

/** Raised when an operation targets a user without a live session. */
export class SessionNotFoundError extends Error {
  readonly statusCode = 404;

  constructor(public readonly userId: string) {
    super(`No active session for user ${userId}`);
    this.name = 'SessionNotFoundError';
  }
}

/** Wraps memory failures when the gateway is configured to abort session starts. */
export class SessionStartError extends Error {
  readonly statusCode = 503;

  constructor(
    message = 'Could not load memory',
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'SessionStartError';
  }
}

/** Raised when an admin route is called without a valid bearer token. */
export class AdminAuthError extends Error {
  readonly statusCode = 401;

  constructor(message = 'Invalid admin credentials') {
    super(message);
    this.name = 'AdminAuthError';
  }
}

/** Raised when a request body or parameter fails validation. */
export class InvalidRequestError extends Error {
  readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}
