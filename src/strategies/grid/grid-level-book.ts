import { GridLevel } from '../../types';
import { GridBotError } from '../../core/errors';
import { MAX_LEVEL_COUNT } from './grid-config-manager';

/**
 * Fixed-capacity table of grid levels keyed by index. Prices never change once
 * written; side, active flag and cooldown state are mutated in place.
 */
export class GridLevelBook {
  private levels: GridLevel[] = [];

  constructor(private readonly capacity: number = MAX_LEVEL_COUNT) {}

  get size(): number {
    return this.levels.length;
  }

  isInitialized(): boolean {
    return this.levels.length > 0;
  }

  initialize(levels: readonly GridLevel[]): void {
    if (this.isInitialized()) {
      throw new GridBotError('ALREADY_INITIALIZED', 'Grid levels are already initialized');
    }
    if (levels.length === 0 || levels.length > this.capacity) {
      throw new RangeError(`Level count must be between 1 and ${this.capacity}, got ${levels.length}`);
    }
    levels.forEach((level, i) => {
      if (level.index !== i) {
        throw new RangeError(`Level at position ${i} has index ${level.index}`);
      }
      if (i > 0 && level.price <= levels[i - 1].price) {
        throw new RangeError(`Level prices must be strictly ascending (index ${i})`);
      }
    });
    this.levels = levels.map(level => ({ ...level }));
  }

  get(index: number): GridLevel {
    return { ...this.at(index) };
  }

  all(): GridLevel[] {
    return this.levels.map(level => ({ ...level }));
  }

  indices(): number[] {
    return this.levels.map(level => level.index);
  }

  has(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.levels.length;
  }

  setActive(index: number, active: boolean): GridLevel {
    const level = this.at(index);
    level.active = active;
    return { ...level };
  }

  resetCooldown(index: number): GridLevel {
    const level = this.at(index);
    level.lastExecutedAt = null;
    return { ...level };
  }

  /**
   * Marks a successful execution: stamps the time and flips the side so the
   * level trades back the other way next time price crosses it.
   */
  recordExecution(index: number, timestamp: number): GridLevel {
    const level = this.at(index);
    level.lastExecutedAt =
      level.lastExecutedAt === null ? timestamp : Math.max(level.lastExecutedAt, timestamp);
    level.side = level.side === 'buy' ? 'sell' : 'buy';
    level.executionCount++;
    return { ...level };
  }

  clear(): void {
    this.levels = [];
  }

  private at(index: number): GridLevel {
    if (!this.isInitialized()) {
      throw new GridBotError('NOT_INITIALIZED', 'Grid levels are not initialized');
    }
    if (!this.has(index)) {
      throw new GridBotError(
        'INVALID_LEVEL_INDEX',
        `Level index ${index} is outside [0, ${this.levels.length})`
      );
    }
    return this.levels[index];
  }
}
