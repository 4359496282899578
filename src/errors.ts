// ─── Error Types ───

export class ThreadsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed local input, rejected before any remote call */
export class ValidationError extends ThreadsError {}

/** CSRF state mismatch or an auth failure reported by the provider */
export class AuthorizationError extends ThreadsError {}

export class TokenExpiredError extends ThreadsError {
  constructor(message = "Access token has expired. Re-authenticate or refresh the token.") {
    super(message);
  }
}

/** Non-2xx response from the Threads API */
export class HttpError extends ThreadsError {
  readonly status: number;
  readonly body: unknown;

  constructor(status: number, body: unknown, message?: string) {
    super(message ?? `Threads API error ${status}`);
    this.status = status;
    this.body = body;
  }
}

/** 2xx response whose shape is not what the endpoint promises */
export class ResponseError extends ThreadsError {
  readonly response: unknown;

  constructor(message: string, response: unknown) {
    super(`${message}: ${JSON.stringify(response)}`);
    this.response = response;
  }
}

export class PublishingError extends ThreadsError {
  readonly containerId: string | undefined;
  readonly status: string | undefined;

  constructor(message: string, details: { containerId?: string; status?: string } = {}) {
    super(message);
    this.containerId = details.containerId;
    this.status = details.status;
  }
}
