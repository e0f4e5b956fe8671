/**
 * Unified error handling utilities for the detector service
 */

export class DetectorError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

/** Undecodable or missing image data. Reported to the caller, never retried. */
export class BadImageError extends DetectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 400, 'BAD_IMAGE', options);
  }
}

export class ClassifierError extends DetectorError {
  readonly httpStatus?: number;

  constructor(message: string, options?: { cause?: unknown; httpStatus?: number }) {
    super(message, 502, 'CLASSIFIER_FAILED', options);
    this.httpStatus = options?.httpStatus;
  }
}

export class EventLogWriteError extends DetectorError {
  readonly partition: string;

  constructor(partition: string, options?: { cause?: unknown }) {
    super(`Failed to append detection record to partition ${partition}`, 500, 'LOG_WRITE_FAILED', options);
    this.partition = partition;
  }
}

export class ConfigError extends DetectorError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`, 500, 'CONFIG_INVALID');
    this.problems = problems;
  }
}

export interface ErrorInfo {
  isRateLimit: boolean;
  isAuthError: boolean;
  isNetworkError: boolean;
  isServerError: boolean;
  retryable: boolean;
}

function isClientHttpError(error: unknown): error is Error & { status: number } {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

export class ErrorHandler {
  /**
   * Analyze an upstream failure (HTTP status and/or message) and decide whether it is retryable
   */
  static analyzeError(error: unknown, status?: number): ErrorInfo {
    const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();

    const isRateLimit = status === 429 ||
                       message.includes('rate limit') ||
                       message.includes('too many requests');

    const isAuthError = status === 401 ||
                       status === 403 ||
                       message.includes('unauthorized') ||
                       message.includes('forbidden');

    const isServerError = status !== undefined && status >= 500 && status < 600;

    const isNetworkError = status === undefined && (
                          message.includes('network') ||
                          message.includes('timeout') ||
                          message.includes('socket hang up') ||
                          message.includes('econnreset') ||
                          message.includes('econnrefused'));

    return {
      isRateLimit,
      isAuthError,
      isNetworkError,
      isServerError,
      retryable: !isAuthError && (isRateLimit || isServerError || isNetworkError)
    };
  }

  /**
   * Exponential backoff with jitter: 250ms, 500ms, 1000ms ... capped at 2s, plus up to 200ms
   */
  static backoffDelay(attempt: number, random: () => number = Math.random): number {
    const baseDelay = Math.min(2000, 250 * Math.pow(2, attempt - 1));
    const jitter = Math.floor(random() * 200);
    return baseDelay + jitter;
  }

  static describe(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
  }

  static toHttpPayload(error: unknown, exposeDetails: boolean): { status: number; body: { success: false; error: string; message: string } } {
    if (error instanceof DetectorError) {
      return {
        status: error.statusCode,
        body: { success: false, error: error.code, message: error.message }
      };
    }
    // body-parser and friends raise http-errors with an exposable 4xx status
    if (isClientHttpError(error)) {
      return {
        status: error.status,
        body: { success: false, error: 'BAD_REQUEST', message: error.message }
      };
    }
    return {
      status: 500,
      body: {
        success: false,
        error: 'INTERNAL_ERROR',
        message: exposeDetails ? this.describe(error) : 'Internal server error'
      }
    };
  }
}
