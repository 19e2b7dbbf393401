import { Balances, TokenSlot } from '../../types';
import { GridBotError } from '../errors';

/**
 * Balances of the two custodied assets in raw token units. Never negative.
 */
export class CustodyLedger {
  private balances: Record<TokenSlot, bigint> = { A: 0n, B: 0n };

  balanceOf(token: TokenSlot): bigint {
    return this.balances[token];
  }

  snapshot(): Balances {
    return { balanceA: this.balances.A, balanceB: this.balances.B };
  }

  isEmpty(): boolean {
    return this.balances.A === 0n && this.balances.B === 0n;
  }

  canDebit(token: TokenSlot, amount: bigint): boolean {
    return amount >= 0n && this.balances[token] >= amount;
  }

  credit(token: TokenSlot, amount: bigint): bigint {
    this.requireNonNegative(amount);
    this.balances[token] += amount;
    return this.balances[token];
  }

  debit(token: TokenSlot, amount: bigint): bigint {
    this.requireNonNegative(amount);
    if (this.balances[token] < amount) {
      throw new GridBotError(
        'INSUFFICIENT_BALANCE',
        `Insufficient token${token} balance: ${this.balances[token]} < ${amount}`
      );
    }
    this.balances[token] -= amount;
    return this.balances[token];
  }

  /** Zeroes both balances and returns what they held. */
  drain(): Balances {
    const drained = this.snapshot();
    this.balances = { A: 0n, B: 0n };
    return drained;
  }

  private requireNonNegative(amount: bigint): void {
    if (amount < 0n) {
      throw new GridBotError('INVALID_AMOUNT', `Amount must not be negative, got ${amount}`);
    }
  }
}
