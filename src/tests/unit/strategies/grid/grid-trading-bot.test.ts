import { InvalidConfigError } from '../../../../core/errors';
import { TwapOracle } from '../../../../core/price-oracle/twap-oracle';
import { GridTradingBot } from '../../../../strategies/grid/grid-trading-bot';
import {
  OWNER,
  STRANGER,
  USDC,
  WETH,
  createBot,
  createPool,
  createReadyBot,
  holdPrice,
  price,
  usdc,
  weth,
} from '../../../fixtures/test-helpers';

describe('GridTradingBot', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('configuration', () => {
    it('should only let the owner configure', async () => {
      const { bot, config } = createBot(price('3000'));

      await expect(bot.configureGrid(STRANGER, config)).rejects.toMatchObject({ code: 'UNAUTHORIZED' });
      expect(bot.getGridConfig()).toBeUndefined();
    });

    it('should store the configuration once and announce it', async () => {
      const { bot, config } = createBot(price('3000'));
      const configured = jest.fn();
      bot.on('configured', configured);

      const stored = await bot.configureGrid(OWNER, config);

      expect(stored).toEqual(config);
      expect(configured).toHaveBeenCalledWith({ config: stored });
      await expect(bot.configureGrid(OWNER, config)).rejects.toMatchObject({ code: 'ALREADY_CONFIGURED' });
    });

    it('should reject an invalid configuration without storing it', async () => {
      const { bot, config } = createBot(price('3000'));

      await expect(bot.configureGrid(OWNER, { ...config, levelCount: 101 })).rejects.toBeInstanceOf(
        InvalidConfigError
      );
      expect(bot.getGridConfig()).toBeUndefined();
    });

    it('should leave nothing behind when the pool cannot describe its tokens', async () => {
      const { bot, config, pool } = createBot(price('3000'));
      jest.spyOn(pool, 'decimals').mockImplementationOnce(() => {
        throw new Error('token metadata unavailable');
      });

      await expect(bot.configureGrid(OWNER, config)).rejects.toThrow('token metadata unavailable');
      expect(bot.getGridConfig()).toBeUndefined();
      await expect(bot.initializeLevels(OWNER)).rejects.toMatchObject({ code: 'NOT_CONFIGURED' });

      await expect(bot.configureGrid(OWNER, config)).resolves.toEqual(config);
      await expect(bot.initializeLevels(OWNER)).resolves.toHaveLength(15);
    });

    it('should reject a cooldown that is not a whole number of seconds', () => {
      const { pool } = createPool(price('3000'));
      expect(() => new GridTradingBot({ owner: OWNER, pool, cooldownSeconds: -5 })).toThrow(InvalidConfigError);
    });
  });

  describe('initializeLevels', () => {
    it('should require a configuration', async () => {
      const { bot } = createBot(price('3000'));
      await expect(bot.initializeLevels(OWNER)).rejects.toMatchObject({ code: 'NOT_CONFIGURED' });
    });

    it('should build the ladder around the oracle price', async () => {
      const { bot } = await createReadyBot(price('3000'));

      const levels = bot.getGridLevels();
      expect(bot.getLevelCount()).toBe(15);
      expect(levels[0].price).toBe(price('2800'));
      expect(levels[14].price).toBe(price('3600'));
      expect(levels.filter(l => l.side === 'buy').map(l => l.index)).toEqual([0, 1, 2, 3]);
      await expect(bot.initializeLevels(OWNER)).rejects.toMatchObject({ code: 'ALREADY_INITIALIZED' });
    });

    it('should make every level a sell when the oracle reads zero', async () => {
      const { bot, config } = createBot(price('3000'));
      await bot.configureGrid(OWNER, config);
      jest.spyOn(TwapOracle.prototype, 'computeTwapPrice').mockResolvedValueOnce(0n);

      const levels = await bot.initializeLevels(OWNER);

      expect(levels).toHaveLength(15);
      expect(levels.every(level => level.side === 'sell')).toBe(true);
    });

    it('should abort when the oracle has no history', async () => {
      const fixture = createBot(price('3000'));
      const bot = new GridTradingBot({
        owner: OWNER,
        pool: fixture.pool,
        clock: fixture.clock,
        twapWindowSeconds: 7200,
      });
      await bot.configureGrid(OWNER, fixture.config);

      await expect(bot.initializeLevels(OWNER)).rejects.toMatchObject({ code: 'ORACLE_UNAVAILABLE' });
      expect(bot.getLevelCount()).toBe(0);
    });
  });

  describe('custody', () => {
    it('should refuse deposits before configuration and of zero', async () => {
      const fixture = createBot(price('3000'));
      await expect(fixture.bot.deposit(OWNER, 'A', weth('1'))).rejects.toMatchObject({ code: 'NOT_CONFIGURED' });

      await fixture.bot.configureGrid(OWNER, fixture.config);
      await expect(fixture.bot.deposit(OWNER, 'A', 0n)).rejects.toMatchObject({ code: 'INVALID_AMOUNT' });
      await expect(fixture.bot.deposit(STRANGER, 'A', weth('1'))).rejects.toMatchObject({ code: 'UNAUTHORIZED' });
    });

    it('should block deposits while paused but always allow an emergency withdrawal', async () => {
      const { bot } = await createReadyBot(price('3000'));
      const emergency = jest.fn();
      bot.on('emergencyWithdrawal', emergency);
      await bot.deposit(OWNER, 'A', weth('1'));
      await bot.deposit(OWNER, 'B', usdc('3000'));

      await bot.pause(OWNER);
      await expect(bot.deposit(OWNER, 'A', weth('1'))).rejects.toMatchObject({ code: 'PAUSED' });

      expect(await bot.emergencyWithdrawAll(OWNER)).toEqual({ balanceA: weth('1'), balanceB: usdc('3000') });
      expect(bot.getBalanceA()).toBe(0n);
      expect(bot.getBalanceB()).toBe(0n);
      expect(emergency).toHaveBeenCalledWith({ to: OWNER, balanceA: weth('1'), balanceB: usdc('3000') });
    });

    it('should withdraw up to the balance, paused or not', async () => {
      const { bot } = await createReadyBot(price('3000'));
      await bot.deposit(OWNER, 'B', usdc('500'));
      await bot.pause(OWNER);

      expect(await bot.withdraw(OWNER, 'B', usdc('200'))).toBe(usdc('300'));
      await expect(bot.withdraw(OWNER, 'B', usdc('301'))).rejects.toMatchObject({ code: 'INSUFFICIENT_BALANCE' });
      await expect(bot.withdraw(STRANGER, 'B', 1n)).rejects.toMatchObject({ code: 'UNAUTHORIZED' });
      expect(bot.getBalanceB()).toBe(usdc('300'));
    });

    it('should keep the emergency withdrawal owner-only', async () => {
      const { bot } = await createReadyBot(price('3000'));
      await expect(bot.emergencyWithdrawAll(STRANGER)).rejects.toMatchObject({ code: 'UNAUTHORIZED' });
    });
  });

  describe('execution', () => {
    it('should trade a level once the TWAP crosses it', async () => {
      const fixture = await createReadyBot(price('3000'));
      const { bot } = fixture;
      await bot.deposit(OWNER, 'A', weth('1'));

      holdPrice(fixture, price('3030'));
      const check = await bot.checkUpkeep();
      expect(check.upkeepNeeded).toBe(true);

      const summary = await bot.performUpkeep(check.performData);

      expect(summary.executed).toBe(1);
      expect(bot.getBalanceA()).toBe(weth('0.9'));
      expect(bot.getGridLevel(4)).toMatchObject({ side: 'buy', executionCount: 1 });
      expect((await bot.checkUpkeep()).upkeepNeeded).toBe(false);
    });

    it('should execute only once when two callers race on the same payload', async () => {
      const fixture = await createReadyBot(price('3000'));
      const { bot } = fixture;
      await bot.deposit(OWNER, 'A', weth('1'));
      holdPrice(fixture, price('3030'));
      const { performData } = await bot.checkUpkeep();

      const [first, second, manual] = await Promise.all([
        bot.performUpkeep(performData),
        bot.performUpkeep(performData),
        bot.executeGrid(OWNER),
      ]);

      expect(first.executed + second.executed + manual.executed).toBe(1);
      expect(fixture.pool.swapsExecuted).toBe(1);
      expect(bot.getGridLevel(4).executionCount).toBe(1);
    });

    it('should let only the owner trigger a manual pass', async () => {
      const { bot } = await createReadyBot(price('3000'));
      await expect(bot.executeGrid(STRANGER)).rejects.toMatchObject({ code: 'UNAUTHORIZED' });
    });

    it('should stop all trading while paused', async () => {
      const fixture = await createReadyBot(price('3000'));
      const { bot } = fixture;
      await bot.deposit(OWNER, 'A', weth('1'));
      holdPrice(fixture, price('3030'));
      const { performData } = await bot.checkUpkeep();

      await bot.pause(OWNER);

      expect(await bot.checkUpkeep()).toEqual({ upkeepNeeded: false, performData: '0x' });
      await expect(bot.performUpkeep(performData)).rejects.toMatchObject({ code: 'PAUSED' });
      await expect(bot.executeGrid(OWNER)).rejects.toMatchObject({ code: 'PAUSED' });

      await bot.unpause(OWNER);
      expect((await bot.performUpkeep(performData)).executed).toBe(1);
    });

    it('should skip deactivated levels until they are reactivated', async () => {
      const fixture = await createReadyBot(price('3000'));
      const { bot } = fixture;
      await bot.deposit(OWNER, 'A', weth('1'));
      await bot.deactivateLevel(OWNER, 4);
      holdPrice(fixture, price('3030'));

      expect((await bot.checkUpkeep()).upkeepNeeded).toBe(false);

      await bot.activateLevel(OWNER, 4);
      expect((await bot.executeGrid(OWNER)).executed).toBe(1);
    });

    it('should honour a shorter cooldown and a cleared one', async () => {
      const fixture = await createReadyBot(price('3000'), { cooldownSeconds: 3600 });
      const { bot } = fixture;
      await bot.deposit(OWNER, 'A', weth('1'));
      await bot.deposit(OWNER, 'B', usdc('3000'));
      holdPrice(fixture, price('3030'));
      await bot.executeGrid(OWNER);

      holdPrice(fixture, price('2990'));
      expect((await bot.executeGrid(OWNER)).executed).toBe(0);

      await bot.resetLevelCooldown(OWNER, 4);
      expect((await bot.executeGrid(OWNER)).executed).toBe(1);
      expect(bot.getGridLevel(4)).toMatchObject({ side: 'sell', executionCount: 2 });

      await bot.setCooldownSeconds(OWNER, 0);
      expect(bot.getCooldownSeconds()).toBe(0);
      await expect(bot.setCooldownSeconds(OWNER, 1.5)).rejects.toBeInstanceOf(InvalidConfigError);
    });

    it('should reject unknown level indices', async () => {
      const { bot } = await createReadyBot(price('3000'));
      expect(() => bot.getGridLevel(15)).toThrow(expect.objectContaining({ code: 'INVALID_LEVEL_INDEX' }));
      await expect(bot.deactivateLevel(OWNER, 15)).rejects.toMatchObject({ code: 'INVALID_LEVEL_INDEX' });
    });
  });

  describe('resetGrid', () => {
    it('should only reset while paused', async () => {
      const { bot } = await createReadyBot(price('3000'));
      await expect(bot.resetGrid(OWNER)).rejects.toMatchObject({ code: 'NOT_PAUSED' });
    });

    it('should clear configuration and levels but keep balances', async () => {
      const { bot, config } = await createReadyBot(price('3000'));
      await bot.deposit(OWNER, 'A', weth('1'));
      await bot.pause(OWNER);

      await bot.resetGrid(OWNER);

      expect(bot.getGridConfig()).toBeUndefined();
      expect(bot.getLevelCount()).toBe(0);
      expect(bot.getBalanceA()).toBe(weth('1'));
      await expect(bot.getCurrentPrice()).rejects.toMatchObject({ code: 'NOT_CONFIGURED' });

      await expect(
        bot.configureGrid(OWNER, { ...config, tokenA: USDC.address, tokenB: WETH.address })
      ).rejects.toMatchObject({ field: 'tokenA' });

      await bot.configureGrid(OWNER, { ...config, levelCount: 5 });
      await bot.initializeLevels(OWNER);
      expect(bot.getLevelCount()).toBe(5);
    });
  });

  describe('ownership', () => {
    it('should move every owner right to the new owner', async () => {
      const { bot } = await createReadyBot(price('3000'));
      const transferred = jest.fn();
      bot.on('ownershipTransferred', transferred);

      await bot.transferOwnership(OWNER, 'new-owner');

      expect(bot.getOwner()).toBe('new-owner');
      expect(transferred).toHaveBeenCalledWith({ previousOwner: OWNER, newOwner: 'new-owner' });
      await expect(bot.pause(OWNER)).rejects.toMatchObject({ code: 'UNAUTHORIZED' });
      await bot.pause('new-owner');
      expect(bot.isPaused()).toBe(true);
    });
  });

  it('should read the current TWAP', async () => {
    const fixture = await createReadyBot(price('3000'));
    const twap = await fixture.bot.getCurrentPrice();

    expect(twap).toBeLessThanOrEqual(price('3000'));
    expect(price('3000') - twap).toBeLessThan(price('3000') / 10_000n);
  });
});
