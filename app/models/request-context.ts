import { Logger } from 'winston';

/**
 * Contains additional information about a request
 */
export default class RequestContext {
  id: string;

  logger: Logger;

  startTime: Date;

  /**
   * Creates an instance of RequestContext.
   *
   * @param id - request identifier
   * @param logger - logger tagged with the request identifier
   */
  constructor(id: string, logger: Logger) {
    this.id = id;
    this.logger = logger;
    this.startTime = new Date();
  }
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      context: RequestContext;
    }
  }
}
