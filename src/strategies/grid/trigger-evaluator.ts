import { GridLevel, LevelEvaluation } from '../../types';

// Shared by the execution engine and the automation adapter so the
// predicate and the executor can never disagree on what qualifies.

export function isTriggered(level: Pick<GridLevel, 'side' | 'price'>, price: bigint): boolean {
  return level.side === 'buy' ? price <= level.price : price >= level.price;
}

export function isCoolingDown(
  level: Pick<GridLevel, 'lastExecutedAt'>,
  now: number,
  cooldownSeconds: number
): boolean {
  return level.lastExecutedAt !== null && now < level.lastExecutedAt + cooldownSeconds;
}

export function evaluateLevel(
  level: GridLevel,
  price: bigint,
  now: number,
  cooldownSeconds: number
): LevelEvaluation {
  if (!level.active) {
    return { eligible: false, reason: 'inactive' };
  }
  if (!isTriggered(level, price)) {
    return { eligible: false, reason: 'not-triggered' };
  }
  if (isCoolingDown(level, now, cooldownSeconds)) {
    return { eligible: false, reason: 'cooldown-active' };
  }
  return { eligible: true };
}
