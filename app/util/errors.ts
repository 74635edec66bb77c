/* eslint-disable max-classes-per-file */ // This file creates multiple tag classes

export class HttpError extends Error {
  code: number;

  constructor(code: number, message: string) {
    super(message);
    this.code = code;
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'The requested resource could not be found') {
    super(404, message);
  }
}

export class ServerError extends HttpError {
  constructor(message = 'An unexpected error occurred') {
    super(500, message);
  }
}

export class RequestValidationError extends HttpError {
  constructor(message = 'Invalid request') {
    super(400, message);
  }
}

/**
 * The dataset catalog holds no datasets, so there is nothing to summarise or list
 */
export class EmptyDbError extends Error {
  constructor(message = 'The dataset catalog is empty') {
    super(message);
  }
}

/**
 * The summary tables have not been created
 */
export class SchemaNotInitialisedError extends Error {
  constructor(message = 'No cubedash schema exists. Run with --init to create one') {
    super(message);
  }
}

interface HttpErrorResponse {
  code: string;
  description?: string;
}

/**
 * Builds an error response to return based on the provided error
 * @param error - The error that occurred
 * @param errorCode - An optional string indicated the class of error that occurred
 * @param errorMessage - An optional string containing the message to return
 */
export function buildErrorResponse(
  error: Error,
  errorCode?: string,
  errorMessage?: string,
): HttpErrorResponse {
  if (!(error instanceof HttpError) && !errorCode && !errorMessage) {
    return { code: 'explorer.ServerError', description: 'Error: Internal server error.' };
  }

  const code = errorCode || `explorer.${error.constructor ? error.constructor.name : 'UnknownError'}`;
  const message = errorMessage || error.message || error.toString();
  return { code, description: `Error: ${message}` };
}
