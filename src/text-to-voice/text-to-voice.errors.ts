export type TextToVoiceErrorKind =
  | 'configuration'
  | 'transport'
  | 'api'
  | 'decode'
  | 'cancelled'
  | 'reuse';

export abstract class TextToVoiceError extends Error {
  abstract readonly kind: TextToVoiceErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid or missing value supplied to the client or a builder. Raised before any I/O. */
export class ConfigurationError extends TextToVoiceError {
  readonly kind = 'configuration' as const;
}

/**
 * The exchange did not complete, or the service answered with an error body
 * that could not be read as an error envelope.
 */
export class TransportError extends TextToVoiceError {
  readonly kind = 'transport' as const;
  readonly status?: number;
  readonly body?: string;
  readonly cause?: unknown;

  constructor(message: string, details: { status?: number; body?: string; cause?: unknown } = {}) {
    super(message);
    this.status = details.status;
    this.body = details.body;
    this.cause = details.cause;
  }
}

export class ApiError extends TextToVoiceError {
  readonly kind = 'api' as const;

  constructor(
    readonly status: number,
    message: string,
    readonly code: string | undefined,
    readonly body: string,
  ) {
    super(message);
  }

  static from(status: number, envelope: ErrorEnvelope, body: string, retryAfter?: number): ApiError {
    if (status === 402 || envelope.code === 'quota_exceeded') {
      return new QuotaExceededError(status, envelope.message, envelope.code, body);
    }
    if (status === 401 || status === 403) {
      return new AuthenticationError(status, envelope.message, envelope.code, body);
    }
    if (status === 429) {
      return new RateLimitError(status, envelope.message, envelope.code, body, retryAfter);
    }
    return new ApiError(status, envelope.message, envelope.code, body);
  }
}

export class AuthenticationError extends ApiError {}

export class QuotaExceededError extends ApiError {}

export class RateLimitError extends ApiError {
  constructor(
    status: number,
    message: string,
    code: string | undefined,
    body: string,
    /** Seconds to wait, from the Retry-After header when the service sent one. */
    readonly retryAfter?: number,
  ) {
    super(status, message, code, body);
  }
}

/** A 2xx response whose body does not match the expected schema. */
export class DecodeError extends TextToVoiceError {
  readonly kind = 'decode' as const;

  constructor(
    message: string,
    readonly body: string,
    readonly issues: string[] = [],
  ) {
    super(message);
  }
}

export class CancelledError extends TextToVoiceError {
  readonly kind = 'cancelled' as const;
  readonly cause?: unknown;

  constructor(message = 'Request was cancelled', cause?: unknown) {
    super(message);
    this.cause = cause;
  }
}

/** A builder was executed again after success, or while a call was still in flight. */
export class ReuseError extends TextToVoiceError {
  readonly kind = 'reuse' as const;
}

export type TextToVoiceFailure =
  | ConfigurationError
  | TransportError
  | ApiError
  | DecodeError
  | CancelledError
  | ReuseError;

export function isTextToVoiceError(value: unknown): value is TextToVoiceFailure {
  return value instanceof TextToVoiceError;
}

export interface ErrorEnvelope {
  message: string;
  code?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Reads the error shapes the service is known to return:
 * `{detail: "..."}`, `{detail: {status, message}}`, `{detail: [{msg}]}`,
 * `{message, code}` and `{error: "..."}`.
 */
export function parseErrorEnvelope(data: unknown): ErrorEnvelope | undefined {
  if (!isRecord(data)) return undefined;

  const detail = data.detail;
  if (typeof detail === 'string' && detail.length > 0) {
    return { message: detail };
  }
  if (isRecord(detail)) {
    const message = stringField(detail, 'message');
    if (message) {
      return { message, code: stringField(detail, 'status') ?? stringField(detail, 'code') };
    }
  }
  if (Array.isArray(detail)) {
    const messages = detail
      .filter(isRecord)
      .map((item) => stringField(item, 'msg'))
      .filter((msg): msg is string => msg !== undefined);
    if (messages.length > 0) {
      return { message: messages.join('; '), code: 'validation_error' };
    }
  }

  const message = stringField(data, 'message');
  if (message) {
    return { message, code: stringField(data, 'code') ?? stringField(data, 'status') };
  }

  const error = stringField(data, 'error');
  if (error) return { message: error };

  return undefined;
}
