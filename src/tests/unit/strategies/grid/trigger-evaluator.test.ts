import { GridLevel } from '../../../../types';
import { evaluateLevel, isCoolingDown, isTriggered } from '../../../../strategies/grid/trigger-evaluator';

const buy: GridLevel = { index: 0, price: 100n, side: 'buy', active: true, lastExecutedAt: null, executionCount: 0 };
const sell: GridLevel = { ...buy, index: 1, side: 'sell' };

describe('trigger-evaluator', () => {
  describe('isTriggered', () => {
    it('should trigger buys at or below the level price', () => {
      expect(isTriggered(buy, 99n)).toBe(true);
      expect(isTriggered(buy, 100n)).toBe(true);
      expect(isTriggered(buy, 101n)).toBe(false);
    });

    it('should trigger sells at or above the level price', () => {
      expect(isTriggered(sell, 101n)).toBe(true);
      expect(isTriggered(sell, 100n)).toBe(true);
      expect(isTriggered(sell, 99n)).toBe(false);
    });
  });

  describe('isCoolingDown', () => {
    it('should never cool down a level that has not executed', () => {
      expect(isCoolingDown({ lastExecutedAt: null }, 10, 60)).toBe(false);
    });

    it('should cool down until exactly cooldown seconds have passed', () => {
      expect(isCoolingDown({ lastExecutedAt: 1_000 }, 1_059, 60)).toBe(true);
      expect(isCoolingDown({ lastExecutedAt: 1_000 }, 1_060, 60)).toBe(false);
    });

    it('should cool down a level executed at time zero', () => {
      expect(isCoolingDown({ lastExecutedAt: 0 }, 0, 60)).toBe(true);
      expect(isCoolingDown({ lastExecutedAt: 0 }, 59, 60)).toBe(true);
      expect(isCoolingDown({ lastExecutedAt: 0 }, 60, 60)).toBe(false);
    });

    it('should never cool down with a zero cooldown', () => {
      expect(isCoolingDown({ lastExecutedAt: 1_000 }, 1_000, 0)).toBe(false);
    });
  });

  describe('evaluateLevel', () => {
    it('should check activity first, then the trigger, then the cooldown', () => {
      expect(evaluateLevel({ ...buy, active: false, lastExecutedAt: 990 }, 50n, 1_000, 60)).toEqual({
        eligible: false,
        reason: 'inactive',
      });
      expect(evaluateLevel({ ...buy, lastExecutedAt: 990 }, 150n, 1_000, 60)).toEqual({
        eligible: false,
        reason: 'not-triggered',
      });
      expect(evaluateLevel({ ...buy, lastExecutedAt: 990 }, 50n, 1_000, 60)).toEqual({
        eligible: false,
        reason: 'cooldown-active',
      });
    });

    it('should pass a triggered, active level out of cooldown', () => {
      expect(evaluateLevel({ ...sell, lastExecutedAt: 900 }, 120n, 1_000, 60)).toEqual({ eligible: true });
    });
  });
});
