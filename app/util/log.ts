import * as winston from 'winston';
import env from './env';
import redact from './logRedactor';

const applicationFormat = winston.format((info) => ({ ...info, application: info.application || 'explorer' }));

/**
 * Formatter to help remove sensitive values from logs.
 */
const redactor = winston.format((info) => {
  return redact(info);
});

/**
 * Creates a logger that logs messages in JSON format.
 * @param transports - the transports to write to
 *
 * @returns The JSON Winston logger
 */
export function createJsonLogger(transports: winston.transport[]): winston.Logger {
  const jsonLogger = winston.createLogger({
    level: env.logLevel,
    format: winston.format.combine(
      winston.format.errors({ stack: true }),
      winston.format.timestamp(),
      applicationFormat(),
      redactor(),
      winston.format.json(),
    ),
    transports,
  });

  return jsonLogger;
}

/**
 * Helper method that formats a string as a log tag only if it is provided
 *
 * @param tag - The tag string to add
 * @returns The input string in tag format, or the empty string if tag does not exist
 */
function optionalTag(tag: unknown): string {
  return tag ? ` [${tag}]` : '';
}

const textformat = winston.format.printf(
  (info) => {
    let message = `${info.timestamp} [${info.level}]${optionalTag(info.application)}${optionalTag(info.requestId)}${optionalTag(info.component)}: ${info.message}`;
    if (info.stack) message += `\n${info.stack}`;
    return message;
  },
);

/**
 * Creates a logger that log messages as a text string. Useful when testing locally and viewing
 * logs via a terminal.
 * @param transports - the transports to write to
 *
 * @returns The text string Winston logger
 */
export function createTextLogger(transports: winston.transport[]): winston.Logger {
  const textLogger = winston.createLogger({
    level: env.logLevel,
    defaultMeta: {},
    format: winston.format.combine(
      winston.format.errors({ stack: true }),
      winston.format.timestamp(),
      applicationFormat(),
      redactor(),
      winston.format.colorize({ colors: { error: 'red', info: 'blue' } }),
      textformat,
    ),
    transports,
  });

  return textLogger;
}

const transport = new winston.transports.Console();
const logger = env.textLogger ? createTextLogger([transport]) : createJsonLogger([transport]);

export default logger;
