import { Balances, GridConfig, LevelSide, TokenSlot } from './grid';
import { FailureReason } from './execution';

export interface GridBotEventMap {
  configured: { config: Readonly<GridConfig> };
  levelsInitialized: { levelCount: number; referencePrice: bigint };
  levelExecuted: {
    index: number;
    side: LevelSide;
    amountIn: bigint;
    amountOut: bigint;
    price: bigint;
    timestamp: number;
  };
  levelFailed: { index: number; side: LevelSide; reason: FailureReason; message: string };
  deposited: { token: TokenSlot; amount: bigint; balance: bigint };
  withdrawn: { token: TokenSlot; amount: bigint; balance: bigint };
  emergencyWithdrawal: { to: string } & Balances;
  ownershipTransferred: { previousOwner: string; newOwner: string };
  paused: { by: string };
  unpaused: { by: string };
  gridReset: { by: string };
}

export type GridBotEventName = keyof GridBotEventMap;
