export type ScraperErrorCode =
  | 'scraper_error'
  | 'timeout'
  | 'connection'
  | 'http'
  | 'parsing'
  | 'not_found'
  | 'validation';

/**
 * Root of every error this package raises on purpose. Callers can catch the
 * base class broadly or a subclass narrowly.
 */
export class ScraperError extends Error {
  readonly code: ScraperErrorCode;

  constructor(message: string, options: { code?: ScraperErrorCode; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ScraperError';
    this.code = options.code ?? 'scraper_error';
  }
}

export class TimeoutError extends ScraperError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: 'timeout', cause });
    this.name = 'TimeoutError';
  }
}

export class ConnectionError extends ScraperError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: 'connection', cause });
    this.name = 'ConnectionError';
  }
}

export class HttpError extends ScraperError {
  readonly status: number;

  constructor(status: number, message = `HTTP error ${status}`) {
    super(message, { code: 'http' });
    this.name = 'HttpError';
    this.status = status;
  }
}

export class ParsingError extends ScraperError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: 'parsing', cause });
    this.name = 'ParsingError';
  }
}

export class NotFoundError extends ScraperError {
  constructor(message: string) {
    super(message, { code: 'not_found' });
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends ScraperError {
  constructor(message: string) {
    super(message, { code: 'validation' });
    this.name = 'ValidationError';
  }
}
