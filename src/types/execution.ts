import type { Hex } from 'viem';
import { LevelSide } from './grid';

export type ExecutionTrigger = 'manual' | 'upkeep';

export type SkipReason = 'inactive' | 'not-triggered' | 'cooldown-active';

export type FailureReason =
  | 'slippage-exceeded'
  | 'insufficient-balance'
  | 'oracle-unavailable'
  | 'swap-failed';

export interface ExecutedLevel {
  status: 'executed';
  index: number;
  /** side the level had when it executed */
  side: LevelSide;
  amountIn: bigint;
  amountOut: bigint;
  minAmountOut: bigint;
}

export interface SkippedLevel {
  status: 'skipped';
  index: number;
  side: LevelSide;
  reason: SkipReason;
}

export interface FailedLevel {
  status: 'failed';
  index: number;
  side: LevelSide;
  reason: FailureReason;
  message: string;
}

export type LevelExecutionResult = ExecutedLevel | SkippedLevel | FailedLevel;

export interface GridExecutionSummary {
  trigger: ExecutionTrigger;
  timestamp: number;
  /** oracle price used for the pass, null when none could be read */
  price: bigint | null;
  results: LevelExecutionResult[];
  executed: number;
  skipped: number;
  failed: number;
}

export type LevelEvaluation = { eligible: true } | { eligible: false; reason: SkipReason };

export interface UpkeepCheck {
  upkeepNeeded: boolean;
  performData: Hex;
}
