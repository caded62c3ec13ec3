/**
 * Custom error classes for better error handling
 */

export class GigasheetApiError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public responseText: string
  ) {
    super(message);
    this.name = 'GigasheetApiError';
  }
}

export class ValidationError extends Error {
  constructor(message: string, public field?: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NetworkError extends Error {
  constructor(message: string, public cause?: Error) {
    super(message);
    this.name = 'NetworkError';
  }
}

/**
 * A 2xx response that is missing a field the client relies on
 */
export class ResponseFormatError extends Error {
  constructor(message: string, public field?: string) {
    super(message);
    this.name = 'ResponseFormatError';
  }
}

export class JobFailedError extends Error {
  constructor(
    message: string,
    public handle: string,
    public status: unknown
  ) {
    super(message);
    this.name = 'JobFailedError';
  }
}

export class JobTimeoutError extends Error {
  constructor(
    message: string,
    public handle: string,
    public attempts: number,
    public lastStatus: unknown
  ) {
    super(message);
    this.name = 'JobTimeoutError';
  }
}

/**
 * Determine if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof NetworkError) {
    return true;
  }

  if (error instanceof GigasheetApiError) {
    return error.statusCode === 429 || error.statusCode >= 500;
  }

  return false;
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
