/**
 * Error taxonomy.
 *
 * Every class carries the `statusCode` / `code` pair read by the web API's
 * error handler, so library errors can be rethrown from route handlers as-is.
 *
 *   ValidationFailure  400  bad or out-of-range generation parameters
 *   FormatFailure      502  unreadable archive, empty body, bad image signature
 *   TransportFailure   502  non-2xx answer from the image service
 *     ApiFailure       400/409 request rejected or conflicting
 *     AuthFailure      401/402 bad token or missing subscription
 *     RateLimitFailure 429
 *     TimeoutFailure   504  no answer within the configured timeout
 */

export class GatewayError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class ValidationFailure extends GatewayError {
  /** Parameter that violated its constraint. */
  readonly field: string;

  constructor(field: string, message: string) {
    super(message, 400, "VALIDATION_ERROR");
    this.field = field;
  }
}

export class FormatFailure extends GatewayError {
  constructor(message: string) {
    super(message, 502, "FORMAT_ERROR");
  }
}

export class TransportFailure extends GatewayError {
  /** HTTP status returned by the image service, when there was one. */
  readonly upstreamStatus: number | null;

  constructor(message: string, upstreamStatus: number | null, statusCode = 502, code = "UPSTREAM_ERROR") {
    super(message, statusCode, code);
    this.upstreamStatus = upstreamStatus;
  }
}

export class ApiFailure extends TransportFailure {
  constructor(message: string, upstreamStatus: number) {
    super(message, upstreamStatus, upstreamStatus === 409 ? 409 : 400, "UPSTREAM_REJECTED");
  }
}

export class AuthFailure extends TransportFailure {
  constructor(message: string, upstreamStatus: number) {
    super(message, upstreamStatus, upstreamStatus, "UPSTREAM_AUTH");
  }
}

export class RateLimitFailure extends TransportFailure {
  constructor(message: string) {
    super(message, 429, 429, "UPSTREAM_RATE_LIMITED");
  }
}

export class TimeoutFailure extends TransportFailure {
  constructor(message: string) {
    super(message, null, 504, "UPSTREAM_TIMEOUT");
  }
}
