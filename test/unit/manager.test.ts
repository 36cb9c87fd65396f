import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import { ConfigurationError } from '../../src/backtest/errors.js';
import { CONFIG_DEFAULTS } from '../../src/config/defaults.js';
import { ConfigManager } from '../../src/config/manager.js';

describe('ConfigManager', () => {
  let manager: ConfigManager;

  beforeEach(() => {
    manager = new ConfigManager({});
  });

  it('returns shipped defaults', () => {
    expect(manager.get('backtest.initialCash')).toBe(100000);
    expect(manager.get('backtest.rebalanceFrequency')).toBe('monthly');
    expect(manager.get('backtest.driftThresholdPct')).toBeNull();
    expect(manager.get('costs.model')).toBe('bps');
    expect(manager.get('execution.fractionalShares')).toBe(true);
  });

  it('has a valid default for every key', () => {
    for (const def of CONFIG_DEFAULTS) {
      expect(() => manager.get(def.key)).not.toThrow();
    }
    expect(Object.keys(manager.getAll())).toHaveLength(CONFIG_DEFAULTS.length);
  });

  it('applies runtime overrides and resets them', () => {
    manager.set('costs.commissionBps', 7);
    manager.set('backtest.rebalanceFrequency', 'weekly');
    expect(manager.get('costs.commissionBps')).toBe(7);

    manager.reset('costs.commissionBps');
    expect(manager.get('costs.commissionBps')).toBe(2);
    expect(manager.get('backtest.rebalanceFrequency')).toBe('weekly');

    manager.reset();
    expect(manager.get('backtest.rebalanceFrequency')).toBe('monthly');
  });

  it('rejects an override outside the schema', () => {
    expect(() => manager.set('costs.commissionBps', 5000)).toThrow(ConfigurationError);
    expect(() => manager.set('backtest.initialCash', -1)).toThrow(
      'Invalid value for config key backtest.initialCash',
    );
    expect(manager.get('backtest.initialCash')).toBe(100000);
  });

  describe('environment overrides', () => {
    it('maps keys to upper snake case variables', () => {
      const env = new ConfigManager({
        COSTS_COMMISSION_BPS: '5',
        BACKTEST_DRIFT_THRESHOLD_PCT: '2.5',
        EXECUTION_FRACTIONAL_SHARES: 'false',
      });
      expect(env.get('costs.commissionBps')).toBe(5);
      expect(env.get('backtest.driftThresholdPct')).toBe(2.5);
      expect(env.get('execution.fractionalShares')).toBe(false);
    });

    it('uses the raw string when the value is not JSON', () => {
      const env = new ConfigManager({ BACKTEST_REBALANCE_FREQUENCY: 'weekly' });
      expect(env.get('backtest.rebalanceFrequency')).toBe('weekly');
    });

    it('wins over runtime overrides', () => {
      const env = new ConfigManager({ COSTS_FIXED_FEE: '1' });
      env.set('costs.fixedFee', 3);
      expect(env.get('costs.fixedFee')).toBe(1);
    });

    it('fails loudly on an invalid value', () => {
      const env = new ConfigManager({ COSTS_COMMISSION_BPS: '-1' });
      expect(() => env.get('costs.commissionBps')).toThrow(ConfigurationError);
    });
  });

  it('groups keys by category', () => {
    expect(Object.keys(manager.getByCategory('costs'))).toEqual([
      'costs.model',
      'costs.commissionBps',
      'costs.fixedFee',
      'costs.spreadBps',
      'costs.marketImpactFactor',
    ]);
    expect(manager.getByCategory('nope')).toEqual({});
  });
});
