export type ErrorCode = "VALIDATION_ERROR" | "PAGE_FETCH_ERROR";

/** Base of the errors the scraper raises on purpose; anything else is unexpected. */
export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** A command-line flag or environment value the scraper refuses to run with. */
export class ValidationError extends AppError {
  readonly code = "VALIDATION_ERROR";

  constructor(
    message: string,
    readonly field: string,
    readonly value?: unknown,
    cause?: unknown
  ) {
    super(message, cause);
  }
}

/** `statusCode` is undefined when the request never got a response. */
export class PageFetchError extends AppError {
  readonly code = "PAGE_FETCH_ERROR";

  constructor(
    message: string,
    readonly url: string,
    readonly statusCode?: number,
    cause?: unknown
  ) {
    super(message, cause);
  }

  get isNetworkError(): boolean {
    return this.statusCode === undefined;
  }
}
