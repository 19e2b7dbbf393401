import { decodeAbiParameters, encodeAbiParameters, type Hex } from 'viem';
import { GridExecutionSummary, UpkeepCheck } from '../../types';
import { OracleUnavailableError } from '../../core/errors';
import { createLogger } from '../../utils';
import { GridExecutionEngine, GridRuntime, summarize } from './grid-execution-engine';
import { evaluateLevel } from './trigger-evaluator';

const PERFORM_DATA_ABI = [{ type: 'uint256[]' }] as const;

const NO_UPKEEP: UpkeepCheck = { upkeepNeeded: false, performData: '0x' };

export function encodePerformData(indices: readonly number[]): Hex {
  return encodeAbiParameters(PERFORM_DATA_ABI, [indices.map(index => BigInt(index))]);
}

/**
 * Level indices carried by a payload, or null when it does not decode.
 * Indices beyond `levelCount` are dropped.
 */
export function decodePerformData(performData: Hex, levelCount: number): number[] | null {
  let decoded: readonly bigint[];
  try {
    [decoded] = decodeAbiParameters(PERFORM_DATA_ABI, performData);
  } catch {
    return null;
  }
  return decoded.filter(index => index < BigInt(levelCount)).map(index => Number(index));
}

/**
 * Pull-based automation surface: a read-only predicate and an executor that
 * re-derives everything itself. The executor treats its payload as a hint that
 * can narrow the set of levels, never widen it.
 */
export class GridAutomationAdapter {
  private logger = createLogger('grid-automation');

  constructor(
    private readonly runtime: GridRuntime,
    private readonly engine: GridExecutionEngine
  ) {}

  /**
   * Reports whether any level is active, triggered and out of cooldown right
   * now. `checkData` is accepted for scheduler compatibility and unused.
   */
  async checkUpkeep(_checkData: Hex = '0x'): Promise<UpkeepCheck> {
    const priceSource = this.runtime.getPriceSource();
    if (this.runtime.isPaused() || !priceSource || !this.runtime.levels.isInitialized()) {
      return { ...NO_UPKEEP };
    }

    let price: bigint;
    try {
      price = await priceSource.computeTwapPrice();
    } catch (error) {
      if (error instanceof OracleUnavailableError) {
        this.logger.warn('checkUpkeep: oracle unavailable', { error: error.message });
        return { ...NO_UPKEEP };
      }
      throw error;
    }

    const ready = this.qualifyingLevels(this.runtime.levels.indices(), price);
    if (ready.length === 0) {
      return { ...NO_UPKEEP };
    }
    return { upkeepNeeded: true, performData: encodePerformData(ready) };
  }

  /**
   * Runs the payload's levels against a fresh price. Each one is re-evaluated,
   * so a level that no longer qualifies comes back skipped with its reason.
   * An undecodable payload produces an empty summary.
   */
  async performUpkeep(performData: Hex): Promise<GridExecutionSummary> {
    const now = this.runtime.clock.now();
    const priceSource = this.runtime.getPriceSource();
    if (!priceSource || !this.runtime.levels.isInitialized()) {
      this.logger.info('performUpkeep: grid not ready, nothing to do');
      return summarize('upkeep', now, null, []);
    }

    const requested = decodePerformData(performData, this.runtime.levels.size);
    if (requested === null) {
      this.logger.warn('performUpkeep: payload does not decode, ignoring it');
      return summarize('upkeep', now, null, []);
    }
    if (requested.length === 0) {
      return summarize('upkeep', now, null, []);
    }

    let price: bigint;
    try {
      price = await priceSource.computeTwapPrice();
    } catch (error) {
      if (error instanceof OracleUnavailableError) {
        // the engine reports each requested level as an oracle failure
        return this.engine.execute({ trigger: 'upkeep', candidates: requested });
      }
      throw error;
    }

    const unique = new Set(requested).size;
    const confirmed = this.qualifyingLevels(requested, price);
    if (confirmed.length < unique) {
      this.logger.info(`performUpkeep: ${confirmed.length} of ${unique} requested levels still qualify`);
    }

    return this.engine.execute({ trigger: 'upkeep', candidates: requested, price });
  }

  private qualifyingLevels(indices: readonly number[], price: bigint): number[] {
    const now = this.runtime.clock.now();
    const cooldown = this.runtime.getCooldownSeconds();
    const unique = [...new Set(indices)].sort((a, b) => a - b);
    return unique.filter(
      index => evaluateLevel(this.runtime.levels.get(index), price, now, cooldown).eligible
    );
  }
}
