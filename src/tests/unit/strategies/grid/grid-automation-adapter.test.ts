import { OracleUnavailableError } from '../../../../core/errors';
import {
  GridAutomationAdapter,
  decodePerformData,
  encodePerformData,
} from '../../../../strategies/grid/grid-automation-adapter';
import { GridExecutionEngine } from '../../../../strategies/grid/grid-execution-engine';
import { GridLevelBook } from '../../../../strategies/grid/grid-level-book';
import { createEngineHarness, price, usdc, weth } from '../../../fixtures/test-helpers';

const createAdapterHarness = () => {
  const h = createEngineHarness();
  h.ledger.credit('A', weth('1'));
  h.ledger.credit('B', usdc('3000'));
  return { ...h, adapter: new GridAutomationAdapter(h.runtime, h.engine) };
};

describe('perform data', () => {
  it('should carry level indices through an ABI round trip', () => {
    expect(decodePerformData(encodePerformData([3, 1, 7]), 15)).toEqual([3, 1, 7]);
    expect(decodePerformData(encodePerformData([]), 15)).toEqual([]);
  });

  it('should drop indices beyond the level count', () => {
    expect(decodePerformData(encodePerformData([2, 15, 200]), 15)).toEqual([2]);
  });

  it('should return null for bytes that do not decode', () => {
    expect(decodePerformData('0x1234', 15)).toBeNull();
  });
});

describe('GridAutomationAdapter', () => {
  describe('checkUpkeep', () => {
    it('should report nothing to do at the reference price', async () => {
      const h = createAdapterHarness();
      expect(await h.adapter.checkUpkeep()).toEqual({ upkeepNeeded: false, performData: '0x' });
    });

    it('should name the qualifying levels in the payload', async () => {
      const h = createAdapterHarness();
      h.movePrice(price('3030'));

      const check = await h.adapter.checkUpkeep('0x');

      expect(check.upkeepNeeded).toBe(true);
      expect(check.performData).toBe(encodePerformData([4]));
    });

    it('should not change any state', async () => {
      const h = createAdapterHarness();
      h.movePrice(price('3030'));
      const before = h.levels.all();

      await h.adapter.checkUpkeep();

      expect(h.levels.all()).toEqual(before);
      expect(h.ledger.snapshot()).toEqual({ balanceA: weth('1'), balanceB: usdc('3000') });
      expect(h.pool.swapsExecuted).toBe(0);
    });

    it('should report nothing while paused, uninitialized or without an oracle', async () => {
      const h = createAdapterHarness();
      h.movePrice(price('3030'));

      h.state.paused = true;
      expect((await h.adapter.checkUpkeep()).upkeepNeeded).toBe(false);
      h.state.paused = false;

      const bare = new GridAutomationAdapter({ ...h.runtime, levels: new GridLevelBook() }, h.engine);
      expect((await bare.checkUpkeep()).upkeepNeeded).toBe(false);

      h.priceSource.failWith = new OracleUnavailableError('no history');
      expect(await h.adapter.checkUpkeep()).toEqual({ upkeepNeeded: false, performData: '0x' });
    });

    it('should propagate unexpected price source errors', async () => {
      const h = createAdapterHarness();
      h.priceSource.failWith = new Error('boom');

      await expect(h.adapter.checkUpkeep()).rejects.toThrow('boom');
    });
  });

  describe('performUpkeep', () => {
    it('should execute what checkUpkeep found, exactly once', async () => {
      const h = createAdapterHarness();
      h.movePrice(price('3030'));
      const { performData } = await h.adapter.checkUpkeep();

      const first = await h.adapter.performUpkeep(performData);
      const second = await h.adapter.performUpkeep(performData);

      expect(first.trigger).toBe('upkeep');
      expect(first.executed).toBe(1);
      expect(second.executed).toBe(0);
      expect(second.results).toEqual([{ status: 'skipped', index: 4, side: 'buy', reason: 'not-triggered' }]);
      expect(h.pool.swapsExecuted).toBe(1);
    });

    it('should skip forged indices that do not qualify', async () => {
      const h = createAdapterHarness();
      h.movePrice(price('3030'));

      const summary = await h.adapter.performUpkeep(encodePerformData([14, 0, 1, 2, 3, 4, 4, 5]));

      expect(summary.results.map(r => [r.index, r.status])).toEqual([
        [0, 'skipped'],
        [1, 'skipped'],
        [2, 'skipped'],
        [3, 'skipped'],
        [4, 'executed'],
        [5, 'skipped'],
        [14, 'skipped'],
      ]);
      expect(summary).toMatchObject({ executed: 1, skipped: 6, failed: 0 });
      expect(h.levels.get(0).executionCount).toBe(0);
      expect(h.levels.get(14).executionCount).toBe(0);
    });

    it('should report the levels of a stale payload as skipped', async () => {
      const h = createAdapterHarness();
      h.movePrice(price('3030'));
      const { performData } = await h.adapter.checkUpkeep();

      h.movePrice(price('3000'));
      const summary = await h.adapter.performUpkeep(performData);

      expect(summary).toMatchObject({ executed: 0, skipped: 1, failed: 0 });
      expect(summary.results).toEqual([{ status: 'skipped', index: 4, side: 'sell', reason: 'not-triggered' }]);
      expect(h.pool.swapsExecuted).toBe(0);
    });

    it('should not let a payload bypass the cooldown', async () => {
      const h = createAdapterHarness();
      h.movePrice(price('3030'));
      await h.adapter.performUpkeep(encodePerformData([4]));

      h.clock.advance(10);
      h.movePrice(price('2990'));
      const summary = await h.adapter.performUpkeep(encodePerformData([4]));

      expect(summary.results).toEqual([{ status: 'skipped', index: 4, side: 'buy', reason: 'cooldown-active' }]);
      expect(h.levels.get(4).executionCount).toBe(1);
    });

    it('should treat malformed or out-of-range payloads as empty', async () => {
      const h = createAdapterHarness();
      h.movePrice(price('2700'));

      expect((await h.adapter.performUpkeep('0xdeadbeef')).results).toEqual([]);
      expect((await h.adapter.performUpkeep(encodePerformData([99]))).results).toEqual([]);
      expect(h.priceSource.calls).toBe(0);
    });

    it('should report requested levels as failed when the oracle is unavailable', async () => {
      const h = createAdapterHarness();
      h.priceSource.failWith = new OracleUnavailableError('no history');

      const summary = await h.adapter.performUpkeep(encodePerformData([4]));

      expect(summary.results).toEqual([
        { status: 'failed', index: 4, side: 'sell', reason: 'oracle-unavailable', message: 'no history' },
      ]);
    });

    it('should do nothing when the grid is not ready', async () => {
      const h = createAdapterHarness();
      const bare = new GridAutomationAdapter(
        { ...h.runtime, getPriceSource: () => undefined },
        new GridExecutionEngine(h.runtime)
      );

      const summary = await bare.performUpkeep(encodePerformData([4]));

      expect(summary).toMatchObject({ executed: 0, skipped: 0, failed: 0, price: null });
    });
  });
});
