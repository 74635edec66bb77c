import { Request, Response, NextFunction } from 'express';
import logger from '../util/log';
import db from '../util/db';
import { isSchemaInitialised } from '../models/schema';

export enum HealthStatus {
  UP = 'up',
  DOWN = 'down',
}

const HEALTHY_MESSAGE = 'Explorer is operating normally.';
const DOWN_MESSAGE = 'Explorer is currently down.';

interface DependencyStatus {
  name: string;
  status: HealthStatus;
  message?: string;
}

interface HealthInfo {
  status: HealthStatus;
  message?: string;
  dependencies: DependencyStatus[];
}

/**
 * Returns the db health information
 *
 * @returns a promise resolving to the DependencyStatus of database
 */
async function getDbHealth(): Promise<DependencyStatus> {
  try {
    if (!await isSchemaInitialised(db)) {
      return { name: 'db', status: HealthStatus.DOWN, message: 'The summary tables have not been created' };
    }
    return { name: 'db', status: HealthStatus.UP };
  } catch (e) {
    logger.error(e);
    return { name: 'db', status: HealthStatus.DOWN, message: 'Unable to query the database' };
  }
}

/**
 * Returns the health information
 *
 * @returns a promise resolving to the health check response
 */
export async function getGeneralHealth(): Promise<HealthInfo> {
  const dbHealth = await getDbHealth();
  const healthy = dbHealth.status === HealthStatus.UP;
  return {
    status: healthy ? HealthStatus.UP : HealthStatus.DOWN,
    message: healthy ? HEALTHY_MESSAGE : DOWN_MESSAGE,
    dependencies: [dbHealth],
  };
}

/**
 * Express.js handler that returns the health of the explorer
 *
 * @param req - The request sent by the client
 * @param res - The response to send to the client
 * @param next - The next function in the call chain
 * @returns Resolves when the request is complete
 */
export async function getHealth(
  _req: Request, res: Response, next: NextFunction,
): Promise<void> {
  try {
    const health = await getGeneralHealth();
    if (health.status === HealthStatus.DOWN) {
      res.statusCode = 503;
    }
    res.send(health);
  } catch (e) {
    next(e);
  }
}
