/**
 * Errors raised by the service collaborators. The resolution core never
 * catches them; they reach the caller unchanged.
 */

/**
 * The service could not be reached or answered with a non-success status.
 */
export class TransportError extends Error {
  /** HTTP status, when a response arrived */
  public readonly status: number | undefined;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "TransportError";
    this.status = options.status;
  }
}

/**
 * The service answered but rejected the request or sent something unusable.
 */
export class ServiceError extends Error {
  /** Response body, trimmed, for diagnostics */
  public readonly body: string;

  constructor(message: string, body: string) {
    super(message);
    this.name = "ServiceError";
    this.body = body.trim();
  }
}
