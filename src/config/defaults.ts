/**
 * Grid parameters used when a config file leaves them out: a WETH/USDC grid
 * from 1800 to 2200 with ten levels, 0.1 WETH / 200 USDC per order, the 0.3 %
 * fee tier and 0.5 % slippage.
 */
export const DEFAULT_GRID_SETTINGS = {
  lowerPrice: '1800',
  upperPrice: '2200',
  levelCount: 10,
  orderSizeA: '0.1',
  orderSizeB: '200',
  feeTier: 3000,
  maxSlippageBps: 50,
} as const;

/** seconds the replay clock moves between two prices */
export const DEFAULT_REPLAY_STEP_SECONDS = 60;

export const PAPER_OWNER = 'paper-owner';
