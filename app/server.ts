import express, { Request, Response, NextFunction, RequestHandler } from 'express';
import mustacheExpress from 'mustache-express';
import { v4 as uuid } from 'uuid';
import expressWinston from 'express-winston';
import * as path from 'path';
import { promisify } from 'util';
import { Server } from 'http';
import { Logger } from 'winston';
import errorHandler from './middleware/error-handler';
import router, { RouterConfig } from './routers/router';
import RequestContext from './models/request-context';
import SummaryGenerator from './summary/generate';
import { summaryStore } from './summary/store';
import SummaryRefresher from './workers/summary-refresher';
import env from './util/env';
import logger from './util/log';

export interface ServerConfig extends RouterConfig {
  port?: number;
  hostBinding?: string;
  // seconds between scheduled refreshes; 0 disables them
  refreshPeriodSec?: number;
}

export interface Servers {
  frontend: Server;
  summaryRefresher?: SummaryRefresher;
}

/**
 * Returns middleware to add a request specific logger
 *
 * @param appLogger - Request specific application logger
 * @param ignorePaths - Don't log the request url and method if the req.path matches these patterns
 */
function addRequestLogger(appLogger: Logger, ignorePaths: RegExp[] = []): RequestHandler {
  return expressWinston.logger({
    winstonInstance: appLogger,
    requestWhitelist: ['url', 'method', 'httpVersion', 'originalUrl', 'query'],
    dynamicMeta(req: Request) { return { requestId: req.context.id }; },
    ignoreRoute(req: Request) { return ignorePaths.some((p) => p.test(req.path)); },
  });
}

/**
 * Returns middleware to set a requestID for a request, reusing the `X-Request-Id` header
 * when the client sends one. Also adds requestUrl to the logger info object.
 *
 * @param appLogger - Request specific application logger
 */
function addRequestId(appLogger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const requestId = req.get('x-request-id') || uuid();
    const requestUrl = req.url;
    req.context = new RequestContext(requestId, appLogger.child({ requestId, requestUrl }));
    res.set('X-Request-Id', requestId);
    next();
  };
}

/**
 * Builds the express application with logging, routing and error handling
 *
 * @param config - Config that controls whether certain middleware will be used
 * @returns The express application
 */
export function buildApp(config: RouterConfig = {}): express.Express {
  const appLogger = logger.child({ application: 'explorer' });
  const app = express();
  app.use(addRequestId(appLogger));
  // health checks are polled too often to be worth a line each
  app.use(addRequestLogger(appLogger, [/^\/health$/]));
  app.use(express.json());

  // Setup mustache as a templating engine for HTML views
  app.engine('mustache.html', mustacheExpress());
  app.set('view engine', 'mustache.html');
  app.set('views', path.join(__dirname, 'views'));

  app.use('/', router(config));
  // Error handlers need to be mounted at the top level, not on a child router, or they
  // get skipped.
  app.use(errorHandler);
  return app;
}

/**
 * Starts the web service and, when a refresh period is set, the scheduled summary refresher
 *
 * @param config - An optional configuration object containing server config.
 *   When running this module using the CLI, the configuration is pulled from the environment.
 * @returns The running http.Server and refresher
 */
export function start(config: ServerConfig = {}): Servers {
  const port = config.port ?? env.port;
  const hostBinding = config.hostBinding ?? env.hostBinding;
  const appLogger = logger.child({ application: 'explorer' });

  const app = buildApp(config);
  const frontend = app.listen(port, hostBinding, () => appLogger.info(`Explorer listening on ${hostBinding} on port ${port}`));

  let summaryRefresher: SummaryRefresher | undefined;
  const refreshPeriodSec = config.refreshPeriodSec ?? env.cubedashRefreshPeriodSec;
  if (refreshPeriodSec > 0) {
    const refresherLogger = logger.child({ application: 'summary-refresher' });
    summaryRefresher = new SummaryRefresher({
      logger: refresherLogger,
      generator: new SummaryGenerator({ logger: refresherLogger }),
      store: summaryStore,
      periodSec: refreshPeriodSec,
    });
    summaryRefresher.start().catch((e) => refresherLogger.error(e));
  }

  return { frontend, summaryRefresher };
}

/**
 * Stops the server and refresher created and returned by the start() method
 *
 * @param servers - the servers as returned by start()
 * @returns A promise that completes when the server closes
 */
export async function stop({ frontend, summaryRefresher }: Servers): Promise<void> {
  await Promise.all([
    promisify(frontend.close.bind(frontend))(),
    summaryRefresher?.stop(),
  ]);
}

if (require.main === module) {
  // Log unhandled promise rejections and do not crash the node process
  process.on('unhandledRejection', (reason, promise) => {
    logger.error('Unhandled Rejection at:', promise, 'reason:', reason);
  });
  start();
}
