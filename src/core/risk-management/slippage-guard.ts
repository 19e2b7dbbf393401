import { OracleUnavailableError } from '../errors';
import { WAD, applyBpsDiscount } from '../math/fixed-point';

export const FEE_DENOMINATOR = 1_000_000n;

export interface SlippageGuardConfig {
  maxSlippageBps: number;
  /** pool fee in hundredths of a basis point */
  poolFee: number;
  baseDecimals: number;
  quoteDecimals: number;
}

/**
 * Quotes expected swap output at the oracle price and bounds what a swap may
 * return. Expected outputs are net of the pool fee, so the slippage budget
 * only absorbs price movement.
 */
export class SlippageGuard {
  private config: SlippageGuardConfig;

  constructor(config: SlippageGuardConfig) {
    this.config = config;
  }

  /** Quote tokens received for selling `baseAmount` at `price`. */
  quoteSell(baseAmount: bigint, price: bigint): bigint {
    const gross =
      (baseAmount * price * 10n ** BigInt(this.config.quoteDecimals)) /
      (10n ** BigInt(this.config.baseDecimals) * WAD);
    return this.deductFee(gross);
  }

  /** Base tokens received for spending `quoteAmount` at `price`. */
  quoteBuy(quoteAmount: bigint, price: bigint): bigint {
    if (price <= 0n) {
      throw new OracleUnavailableError('Cannot quote a buy at a zero price');
    }
    const gross =
      (quoteAmount * 10n ** BigInt(this.config.baseDecimals) * WAD) /
      (price * 10n ** BigInt(this.config.quoteDecimals));
    return this.deductFee(gross);
  }

  /** expected * (10000 - maxSlippageBps) / 10000 */
  minimumOutput(expected: bigint): bigint {
    return applyBpsDiscount(expected, this.config.maxSlippageBps);
  }

  validateOutput(amountOut: bigint, minimumOutput: bigint): {
    valid: boolean;
    reason?: string;
  } {
    if (amountOut < minimumOutput) {
      return {
        valid: false,
        reason: `Output ${amountOut} below minimum ${minimumOutput} (max slippage ${this.config.maxSlippageBps} bps)`,
      };
    }
    return { valid: true };
  }

  private deductFee(amount: bigint): bigint {
    return (amount * (FEE_DENOMINATOR - BigInt(this.config.poolFee))) / FEE_DENOMINATOR;
  }
}
