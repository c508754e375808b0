/**
 * Error types raised by the job service client.
 * Every failure reaches the caller as one of these; the client never retries.
 */

/**
 * Base error class for all client errors
 */
export abstract class JobServiceError extends Error {
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context ?? {};
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    name: string;
    message: string;
    code: string;
    timestamp: Date;
    context: Record<string, unknown>;
    stack?: string;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack
    };
  }
}

/**
 * The request never produced a response (connection refused, timeout, reset socket)
 * or the response body failed while it was being read.
 */
export class TransportError extends JobServiceError {
  constructor(
    message: string,
    public readonly url: string,
    cause?: unknown
  ) {
    super(message, 'TRANSPORT_ERROR', { url }, { cause });
  }
}

/**
 * The server answered with a status outside the 2xx range.
 */
export class HTTPStatusError extends JobServiceError {
  constructor(
    public readonly status: number,
    public readonly url: string,
    public readonly body: string,
    public readonly hint?: string
  ) {
    super(
      `Request to ${url} failed with status ${status}${body ? `: ${body}` : ''}`,
      'HTTP_STATUS_ERROR',
      { status, url, hint }
    );
  }
}

export interface FieldError {
  parameter: string;
  message: string;
  code: string;
}

export function formatFieldError(error: FieldError): string {
  return `Invalid value for '${error.parameter}': ${error.message}`;
}

/**
 * A submission was rejected, locally or by the server.
 * `errors` lists every offending field, not only the first one.
 */
export class SubmissionError extends JobServiceError {
  public readonly errors: readonly FieldError[];

  constructor(errors: readonly FieldError[]) {
    super(errors.map(formatFieldError).join(', '), 'SUBMISSION_ERROR', {
      parameters: errors.map(error => error.parameter)
    });
    this.errors = [...errors];
  }
}

export type ResourceKind = 'service' | 'job' | 'file';

export class NotFoundError extends JobServiceError {
  constructor(
    public readonly resource: ResourceKind,
    public readonly id: string
  ) {
    super(`No ${resource} with id "${id}"`, 'NOT_FOUND', { resource, id });
  }
}

/**
 * The server sent a JSON document that does not have the expected shape.
 */
export class ResponseFormatError extends JobServiceError {
  constructor(
    public readonly url: string,
    public readonly issues: string
  ) {
    super(`Unexpected response from ${url}: ${issues}`, 'RESPONSE_FORMAT', { url });
  }
}
