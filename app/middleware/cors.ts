import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Returns middleware allowing browsers on any origin to read the responses
 *
 * @param enabled - whether to send the headers at all
 * @returns the middleware
 */
export default function cors(enabled: boolean): RequestHandler {
  return (_req: Request, res: Response, next: NextFunction): void => {
    if (enabled) {
      res.set('Access-Control-Allow-Origin', '*');
      res.set('Access-Control-Allow-Headers', 'Content-Type');
    }
    next();
  };
}
