export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Stored credential is missing or past its expiry. Recovered by re-running OAuth. */
export class AuthExpiredError extends AppError {
  constructor(message = 'Stored credential is missing or expired') {
    super('AUTH_EXPIRED', message, 401);
  }
}

/** Upstream rejected the bearer credential (HTTP 401). Recovered by re-running OAuth. */
export class NotAuthorizedError extends AppError {
  constructor(path: string) {
    super('NOT_AUTHORIZED', `Upstream rejected the credential for ${path}`, 401, { path });
  }
}

export class UpstreamError extends AppError {
  constructor(
    readonly upstreamStatus: number,
    path: string,
    body?: unknown,
  ) {
    super('UPSTREAM_ERROR', `Upstream request ${path} failed with status ${upstreamStatus}`, 502, {
      path,
      upstreamStatus,
      body,
    });
  }
}

/** A wire value did not match any accepted format. Never coerced. */
export class ParseError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PARSE_ERROR', message, 502, details);
  }
}

export class StateMismatchError extends AppError {
  constructor(message = 'OAuth state does not match the session') {
    super('STATE_MISMATCH', message, 400);
  }
}
