import * as winston from 'winston';
import { Writable } from 'stream';
import { createJsonLogger, createTextLogger } from '../../app/util/log';

/**
 * Create a logger for unit testing, writing to a string
 *
 * @param logJson - create the JSON logger rather than the text logger
 * @returns an object containing the logger
 * and getTestLogs function for obtaining the log messages
 */
export function createLoggerForTest(logJson = true): {
  getTestLogs: () => string,
  testLogger: winston.Logger
} {
  let outputString = '';
  const getTestLogs = (): string => outputString;
  const stream = new Writable({
    write(chunk, _encoding, next): void {
      outputString += chunk.toString();
      next();
    },
  });
  const testLogger = logJson
    ? createJsonLogger([new winston.transports.Stream({ stream })])
    : createTextLogger([new winston.transports.Stream({ stream })]);
  // the shared level is set for the whole test run; these loggers record everything
  testLogger.level = 'debug';
  return { getTestLogs, testLogger };
}
