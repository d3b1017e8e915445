const ERROR_NAMESPACE = "labelstore.api.errors";

export interface ErrorDetail {
  code: string;
  params: { message: string };
}

export abstract class EngineError extends Error {
  abstract readonly code: string;
  abstract readonly httpStatus: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  toDetail(): ErrorDetail {
    return { code: this.code, params: { message: this.message } };
  }
}

export class ValidationError extends EngineError {
  readonly code = `${ERROR_NAMESPACE}::ValidationError`;
  readonly httpStatus = 422;
}

export class BadRequestError extends EngineError {
  readonly code = `${ERROR_NAMESPACE}::BadRequestError`;
  readonly httpStatus = 400;
}

export class InvalidTextSearchError extends EngineError {
  readonly code = `${ERROR_NAMESPACE}::InvalidTextSearchError`;
  readonly httpStatus = 400;

  constructor(readonly queryText: string) {
    super(`Failed to parse query [${queryText}]`);
  }
}

export class NotFoundError extends EngineError {
  readonly code = `${ERROR_NAMESPACE}::EntityNotFoundError`;
  readonly httpStatus = 404;
}

export class BackendUnavailableError extends EngineError {
  readonly code = `${ERROR_NAMESPACE}::BackendUnavailableError`;
  readonly httpStatus = 503;
}

export class PayloadTooLargeError extends EngineError {
  readonly code = `${ERROR_NAMESPACE}::PayloadTooLargeError`;
  readonly httpStatus = 413;
}
