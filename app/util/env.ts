import _ from 'lodash';
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import * as winston from 'winston';
import { IsBoolean, IsIn, IsInt, IsNotEmpty, IsTimeZone, Max, Min, ValidateIf, ValidationError, validateSync } from 'class-validator';
import { isBoolean, isFloat, isInteger, parseBoolean } from './string';

const logger = winston.createLogger({
  transports: [
    new winston.transports.Console(),
  ],
});

//
// env module
// Loads the environment variables used by the web service and the cubedash-gen CLI
//

type ConfigValue = number | string | boolean;

// Save the original process.env so we can re-use it to override
export const originalEnv = _.cloneDeep(process.env);

/**
 * Parse a string env variable to a boolean or number if necessary.
 *
 * @param stringValue - The environment variable value as a string
 * @returns the parsed value
 */
function makeConfigVar(stringValue: string): ConfigValue {
  if (isInteger(stringValue)) {
    return parseInt(stringValue, 10);
  } else if (isFloat(stringValue)) {
    return parseFloat(stringValue);
  } else if (isBoolean(stringValue)) {
    return parseBoolean(stringValue);
  } else {
    return stringValue;
  }
}

/**
  Get any errors from validating the environment - leave out the env object itself
  from the output to avoid showing secrets.
  @param env - the ExplorerEnv instance, including constraints
  @returns An array of `ValidationError`s
*/
export function getValidationErrors(env: ExplorerEnv): ValidationError[] {
  return validateSync(env, { validationError: { target: false } });
}

/**
 * Returns an object containing environment config properties with their original
 * (upper snake-cased) keys. Loads the properties from this module's env-defaults file,
 * an optional .env file and process.env, in increasing order of precedence.
 * @param dotEnvPath - path to the .env file
 * @returns all environment variables
 */
function loadEnvFromFiles(dotEnvPath: string): Record<string, string> {
  let envOverrides: Record<string, string> = {};
  // tests configure themselves through process.env only
  if (process.env.NODE_ENV !== 'test' && fs.existsSync(dotEnvPath)) {
    try {
      envOverrides = dotenv.parse(fs.readFileSync(dotEnvPath));
    } catch (e) {
      logger.warn('Could not parse environment overrides from .env file');
      logger.warn(e instanceof Error ? e.message : String(e));
    }
  }
  // Read the env-defaults for this module (relative to this typescript file)
  const envDefaults = dotenv.parse(fs.readFileSync(path.resolve(__dirname, 'env-defaults')));
  const processEnv = _.pickBy(originalEnv, (value): value is string => value !== undefined);
  return { ...envDefaults, ...envOverrides, ...processEnv };
}

export class ExplorerEnv {

  @IsNotEmpty()
  nodeEnv!: string;

  @IsIn(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
  logLevel!: string;

  @IsBoolean()
  textLogger!: boolean;

  @IsInt()
  @Min(0)
  @Max(65535)
  port!: number;

  @IsNotEmpty()
  hostBinding!: string;

  @IsIn(['postgres', 'sqlite'])
  databaseType!: string;

  @ValidateIf((obj: ExplorerEnv) => obj.databaseType === 'sqlite')
  @IsNotEmpty()
  sqliteFilename!: string;

  postgresHostname!: string;

  postgresUser!: string;

  postgresPassword!: ConfigValue;

  postgresDb!: string;

  @IsInt()
  @Min(0)
  @Max(65535)
  postgresPort!: number;

  @IsNotEmpty()
  odcDefaultIndexDriver!: string;

  @IsNotEmpty()
  odcPostgisIndexDriver!: string;

  odcDefaultDbUrl!: string;

  odcPostgisDbUrl!: string;

  @IsTimeZone()
  cubedashDefaultTimezone!: string;

  @IsInt()
  @Min(1)
  cubedashDefaultApiLimit!: number;

  @IsInt()
  @Min(1)
  cubedashHardApiLimit!: number;

  @IsBoolean()
  cubedashCors!: boolean;

  @IsInt()
  @Min(0)
  cubedashCacheTtlSeconds!: number;

  @IsInt()
  @Min(1)
  cubedashCacheMaxEntries!: number;

  @IsInt()
  @Min(0)
  cubedashRefreshPeriodSec!: number;

  @IsInt()
  @Min(1)
  cubedashDefaultArrivalPeriodDays!: number;

  @IsNotEmpty()
  stacEndpointId!: string;

  @IsNotEmpty()
  stacEndpointTitle!: string;

  stacEndpointDescription!: string;

  @IsNotEmpty()
  stacDefaultLicense!: string;

  /**
   * Returns the database URL of the active index driver, if one is configured. The
   * postgis URL is used when the default driver names the postgis driver.
   */
  get catalogDbUrl(): string | undefined {
    const url = this.odcDefaultIndexDriver === this.odcPostgisIndexDriver
      ? this.odcPostgisDbUrl
      : this.odcDefaultDbUrl;
    return url ? String(url) : undefined;
  }

  /**
  * Validate a set of env vars.
  * @throws Error on constraint violation
  */
  validate(): void {
    if (process.env.SKIP_ENV_VALIDATION !== 'true') {
      const errors = getValidationErrors(this);

      if (errors.length > 0) {
        for (const err of errors) {
          logger.error(err);
        }
        throw (new Error('BAD ENVIRONMENT'));
      }
    }
  }

  /**
   * Constructs the ExplorerEnv instance.
   * @param dotEnvPath - path to the .env file
   */
  constructor(dotEnvPath = '.env') {
    const env = loadEnvFromFiles(dotEnvPath); // { CONFIG_NAME: '0', ... }
    const values: Record<string, ConfigValue> = {};
    for (const k of Object.keys(env)) {
      values[_.camelCase(k)] = makeConfigVar(env[k]); // { configName: 0, ... }
      // this allows us to add new env vars to the process as needed
      process.env[k] = env[k];
    }
    Object.assign(this, values);
  }
}

const env = new ExplorerEnv();
env.validate();

export default env;
