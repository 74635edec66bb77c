import { Logger } from 'winston';
import SummaryGenerator, { GenerateResult } from '../summary/generate';
import SummaryStore from '../summary/store';
import env from '../util/env';

export interface SummaryRefresherConfig {
  logger: Logger;
  generator: SummaryGenerator;
  store: SummaryStore;
  periodSec?: number;
}

/**
 * Periodically refreshes every product's summaries from inside the web service. A run
 * never starts while the previous one is still going.
 */
export default class SummaryRefresher {
  isRunning = false;

  logger: Logger;

  generator: SummaryGenerator;

  store: SummaryStore;

  periodSec: number;

  private loop?: Promise<void>;

  // ends the wait between runs early; set while waiting
  private wake?: () => void;

  constructor(config: SummaryRefresherConfig) {
    this.logger = config.logger;
    this.generator = config.generator;
    this.store = config.store;
    this.periodSec = config.periodSec ?? env.cubedashRefreshPeriodSec;
  }

  /**
   * Refreshes every product once, then the statistics, and forgets the cached summaries
   * @returns the number of products that failed to refresh
   */
  async refresh(): Promise<number> {
    const results = await this.generator.refreshAll();
    await this.generator.refreshStats();
    this.store.invalidate();
    const failures = [...results.values()].filter((result) => result === GenerateResult.ERROR).length;
    this.logger.info(`Summary refresh completed for ${results.size} products`, { failures });
    return failures;
  }

  async start(): Promise<void> {
    if (this.loop) return this.loop;
    this.isRunning = true;
    this.logger.info('Starting summary refresher', { periodSec: this.periodSec });
    this.loop = this.run();
    return this.loop;
  }

  async stop(): Promise<void> {
    this.isRunning = false;
    this.wake?.();
    await this.loop;
    this.loop = undefined;
  }

  private async run(): Promise<void> {
    let firstRun = true;
    while (this.isRunning) {
      if (!firstRun) {
        await this.waitForNextRun();
        if (!this.isRunning) break;
      }
      try {
        await this.refresh();
      } catch (e) {
        this.logger.error('Summary refresher failed to refresh the summaries');
        this.logger.error(e);
      } finally {
        firstRun = false;
      }
    }
  }

  /**
   * Waits out the refresh period, or until the refresher is stopped
   */
  private waitForNextRun(): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = undefined;
        resolve();
      }, this.periodSec * 1000);
      this.wake = (): void => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve();
      };
    });
  }
}
