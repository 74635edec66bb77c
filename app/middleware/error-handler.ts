import mustache from 'mustache';
import fs from 'fs';
import path from 'path';
import { NextFunction, Request, Response } from 'express';
import { HttpError, RequestValidationError, buildErrorResponse } from '../util/errors';

const errorTemplate = fs.readFileSync(path.join(__dirname, '../views/server-error.mustache.html'), { encoding: 'utf8' });
const jsonErrorRoutesRegex = /^\/(api|stac|health)(\/|$)|\.(txt|json)$/;

/**
 * Returns true if the provided error should be returned as JSON.
 * @param err - The error that occurred
 * @param req - The client request
 */
function shouldReturnJson(err: Error, req: Request): boolean {
  return err instanceof RequestValidationError || jsonErrorRoutesRegex.test(req.path);
}

/**
 * Converts the errors of body parsing, which carry an HTTP status, to validation errors
 * @param err - The error that occurred
 */
function normaliseError(err: Error): Error {
  if (!(err instanceof HttpError) && 'status' in err && err.status === 400) {
    return new RequestValidationError(`Invalid request body: ${err.message}`);
  }
  return err;
}

/**
 * Returns the appropriate http status code for the provided error
 * @param err - The error that occured
 */
function getHttpStatusCode(err: Error): number {
  let code = err instanceof HttpError ? err.code : 500;
  if (code < 400 || code >= 600) {
    // Need to check that the provided code is in a valid range due to some errors
    // providing a non-http code.
    code = 500;
  }
  return code;
}

/**
 * Express.js middleware catching errors that escape the route handlers and sending them
 * to users
 *
 * @param err - The error that occurred
 * @param req - The client request
 * @param res - The client response
 * @param next - The next function in the middleware chain
 */
export default function errorHandler(
  error: Error, req: Request, res: Response, next: NextFunction,
): void {
  const err = normaliseError(error);
  if (res.headersSent) {
    // If the server has started writing the response, delegate to the
    // default error handler, which closes the connection and fails the
    // request
    next(err);
    return;
  }
  const statusCode = getHttpStatusCode(err);
  if (statusCode >= 500) {
    req.context.logger.error(err);
  } else {
    req.context.logger.warn(err.message);
  }

  if (shouldReturnJson(err, req)) {
    res.status(statusCode).json(buildErrorResponse(err));
  } else {
    const message = err.message || err.toString();
    const response = mustache.render(errorTemplate, { message });
    res.status(statusCode).type('html').send(response);
  }
}
