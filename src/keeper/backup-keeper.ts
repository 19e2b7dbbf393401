import type { Hex } from 'viem';
import { Clock, GridExecutionSummary, UpkeepCheck } from '../types';
import { systemClock } from '../core/clock';
import { errorMessage } from '../core/errors';
import { createLogger } from '../utils';

/** The automation surface a keeper drives; GridTradingBot provides it. */
export interface UpkeepTarget {
  checkUpkeep(checkData?: Hex): Promise<UpkeepCheck>;
  performUpkeep(performData: Hex): Promise<GridExecutionSummary>;
}

export interface BackupKeeperOptions {
  intervalSeconds: number;
  clock?: Clock;
}

export interface KeeperStats {
  startTime: number | null;
  checksPerformed: number;
  upkeepsExecuted: number;
  levelsExecuted: number;
  errors: number;
  lastCheckTime: number | null;
  lastUpkeepTime: number | null;
}

function formatDuration(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h`;
  if (hours > 0) return `${hours}h ${minutes % 60}m`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}

/**
 * Polls a target's checkUpkeep on a fixed interval and performs upkeep when it
 * reports work. Runs alongside a primary scheduler; the target re-validates
 * every payload so two keepers racing each other cannot double-execute.
 */
export class BackupKeeper {
  private readonly intervalMs: number;
  private readonly clock: Clock;
  private timer?: NodeJS.Timeout;
  private inFlight = false;
  private stats: KeeperStats = {
    startTime: null,
    checksPerformed: 0,
    upkeepsExecuted: 0,
    levelsExecuted: 0,
    errors: 0,
    lastCheckTime: null,
    lastUpkeepTime: null,
  };
  private logger = createLogger('backup-keeper');

  constructor(
    private readonly target: UpkeepTarget,
    options: BackupKeeperOptions
  ) {
    if (!Number.isFinite(options.intervalSeconds) || options.intervalSeconds <= 0) {
      throw new Error(`Keeper interval must be a positive number of seconds, got ${options.intervalSeconds}`);
    }
    this.intervalMs = options.intervalSeconds * 1000;
    this.clock = options.clock ?? systemClock;
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }

  /** Checks immediately, then on every interval until stopped. */
  async start(): Promise<void> {
    if (this.timer) {
      this.logger.warn('Keeper already running');
      return;
    }

    this.stats.startTime = this.clock.now();
    this.logger.info(`Backup keeper started, checking every ${this.intervalMs / 1000}s`);

    this.timer = setInterval(() => {
      this.runOnce().catch(error => {
        this.logger.error('Keeper check crashed', { error: errorMessage(error) });
      });
    }, this.intervalMs);

    await this.runOnce();
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = undefined;
    this.logStats();
  }

  /**
   * One check, and one upkeep when the target asks for it. Errors are counted
   * and logged, never thrown. Returns the upkeep summary when one ran.
   */
  async runOnce(): Promise<GridExecutionSummary | null> {
    if (this.inFlight) {
      this.logger.debug('Previous check still running, skipping this tick');
      return null;
    }
    this.inFlight = true;

    try {
      this.stats.checksPerformed++;
      this.stats.lastCheckTime = this.clock.now();

      const { upkeepNeeded, performData } = await this.target.checkUpkeep('0x');
      if (!upkeepNeeded) {
        if (this.stats.checksPerformed % 10 === 0) {
          this.logger.info(`Check #${this.stats.checksPerformed}: no upkeep needed`);
        }
        return null;
      }

      this.logger.info('Upkeep needed, performing');
      const summary = await this.target.performUpkeep(performData);
      this.stats.upkeepsExecuted++;
      this.stats.levelsExecuted += summary.executed;
      this.stats.lastUpkeepTime = this.clock.now();
      this.logger.info(
        `Upkeep done: ${summary.executed} executed, ${summary.failed} failed, ${summary.skipped} skipped`
      );
      return summary;
    } catch (error) {
      this.stats.errors++;
      this.logger.error('Upkeep check failed', { error: errorMessage(error) });
      return null;
    } finally {
      this.inFlight = false;
    }
  }

  getStats(): KeeperStats {
    return { ...this.stats };
  }

  private logStats(): void {
    const uptime = this.stats.startTime === null ? 0 : this.clock.now() - this.stats.startTime;
    this.logger.info('Keeper statistics', {
      uptime: formatDuration(uptime),
      checksPerformed: this.stats.checksPerformed,
      upkeepsExecuted: this.stats.upkeepsExecuted,
      levelsExecuted: this.stats.levelsExecuted,
      errors: this.stats.errors,
    });
  }
}
