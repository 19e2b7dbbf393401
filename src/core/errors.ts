/**
 * Error taxonomy for the grid engine.
 *
 * Validation, state and authorization failures are thrown and abort the whole
 * invocation. Failures of a single level inside the execution loop are never
 * thrown; they are reported as result values (see LevelExecutionResult).
 */

export type GridErrorCode =
  // configuration
  | 'INVALID_CONFIG'
  | 'ALREADY_CONFIGURED'
  // state
  | 'NOT_CONFIGURED'
  | 'ALREADY_INITIALIZED'
  | 'NOT_INITIALIZED'
  | 'INVALID_LEVEL_INDEX'
  // authorization
  | 'UNAUTHORIZED'
  | 'PAUSED'
  | 'NOT_PAUSED'
  | 'INVALID_OWNER'
  // custody
  | 'INVALID_AMOUNT'
  | 'INSUFFICIENT_BALANCE'
  // pricing and swaps
  | 'ORACLE_UNAVAILABLE'
  | 'SLIPPAGE_EXCEEDED';

export type GridConfigField =
  | 'tokenA'
  | 'tokenB'
  | 'lowerPrice'
  | 'upperPrice'
  | 'levelCount'
  | 'orderSizeA'
  | 'orderSizeB'
  | 'feeTier'
  | 'maxSlippageBps'
  | 'cooldownSeconds';

export class GridBotError extends Error {
  readonly code: GridErrorCode;

  constructor(code: GridErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GridBotError';
    this.code = code;
  }
}

export class InvalidConfigError extends GridBotError {
  readonly field: GridConfigField;

  constructor(field: GridConfigField, message: string) {
    super('INVALID_CONFIG', `Invalid ${field}: ${message}`);
    this.name = 'InvalidConfigError';
    this.field = field;
  }
}

export class OracleUnavailableError extends GridBotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ORACLE_UNAVAILABLE', message, options);
    this.name = 'OracleUnavailableError';
  }
}

/**
 * Raised by pools when the realized output is below `amountOutMinimum`.
 */
export class SlippageExceededError extends GridBotError {
  readonly amountOut: bigint;
  readonly amountOutMinimum: bigint;

  constructor(amountOut: bigint, amountOutMinimum: bigint) {
    super('SLIPPAGE_EXCEEDED', `Too little received: ${amountOut} < ${amountOutMinimum}`);
    this.name = 'SlippageExceededError';
    this.amountOut = amountOut;
    this.amountOutMinimum = amountOutMinimum;
  }
}

export function isGridBotError(error: unknown): error is GridBotError {
  return error instanceof GridBotError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
