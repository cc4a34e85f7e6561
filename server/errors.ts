export type ReviewErrorCode =
  | "INVALID_INPUT"
  | "INVALID_STATE"
  | "ITEM_NOT_FOUND"
  | "CONCURRENT_UPDATE";

export abstract class ReviewError extends Error {
  abstract readonly code: ReviewErrorCode;
  abstract readonly status: number;
}

/** The caller passed malformed data, such as an item without meanings. */
export class InvalidInputError extends ReviewError {
  readonly code = "INVALID_INPUT";
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class InvalidStateError extends ReviewError {
  readonly code = "INVALID_STATE";
  readonly status = 409;

  constructor(message: string) {
    super(message);
    this.name = "InvalidStateError";
  }
}

export class NotFoundError extends ReviewError {
  readonly code = "ITEM_NOT_FOUND";
  readonly status = 404;

  constructor(readonly itemId: string) {
    super(`Grammar item "${itemId}" does not exist`);
    this.name = "NotFoundError";
  }
}

export class ConcurrentUpdateError extends ReviewError {
  readonly code = "CONCURRENT_UPDATE";
  readonly status = 409;

  constructor(
    readonly itemId: string,
    readonly expectedVersion: number,
  ) {
    super(`Grammar item "${itemId}" changed since version ${expectedVersion} was read`);
    this.name = "ConcurrentUpdateError";
  }
}

export function isReviewError(error: unknown): error is ReviewError {
  return error instanceof ReviewError;
}
