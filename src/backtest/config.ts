import { type ConfigManager, configManager } from '../config/manager.js';
import { runConfigSchema } from '../config/schema-validator.js';
import { ConfigurationError } from './errors.js';
import type { BacktestConfig, CostConfig } from './types.js';

/** Run input as a caller writes it; anything left out comes from the config manager. */
export interface BacktestConfigInput {
  startDate: string;
  endDate: string;
  initialCash?: number;
  rebalanceFrequency?: string;
  driftThresholdPct?: number | null;
  costs?: Partial<CostConfig>;
  riskFreeRate?: number;
  fractionalShares?: boolean;
  minTradeWeightPct?: number;
  allocationTolerancePct?: number;
  cashTolerance?: number;
  timeoutMs?: number | null;
}

/**
 * Merge run input over configured defaults and validate the result as a whole.
 * Throws {@link ConfigurationError} listing every problem found.
 */
export function resolveRunConfig(
  input: BacktestConfigInput,
  manager: ConfigManager = configManager,
): BacktestConfig {
  const candidate = {
    initialCash: input.initialCash ?? manager.get('backtest.initialCash'),
    startDate: input.startDate,
    endDate: input.endDate,
    rebalanceFrequency: input.rebalanceFrequency ?? manager.get('backtest.rebalanceFrequency'),
    driftThresholdPct:
      input.driftThresholdPct !== undefined
        ? input.driftThresholdPct
        : manager.get('backtest.driftThresholdPct'),
    costs: {
      model: input.costs?.model ?? manager.get('costs.model'),
      commissionBps: input.costs?.commissionBps ?? manager.get('costs.commissionBps'),
      fixedFee: input.costs?.fixedFee ?? manager.get('costs.fixedFee'),
      spreadBps: input.costs?.spreadBps ?? manager.get('costs.spreadBps'),
      marketImpactFactor:
        input.costs?.marketImpactFactor ?? manager.get('costs.marketImpactFactor'),
    },
    riskFreeRate: input.riskFreeRate ?? manager.get('analysis.riskFreeRate'),
    fractionalShares: input.fractionalShares ?? manager.get('execution.fractionalShares'),
    minTradeWeightPct: input.minTradeWeightPct ?? manager.get('execution.minTradeWeightPct'),
    allocationTolerancePct:
      input.allocationTolerancePct ?? manager.get('execution.allocationTolerancePct'),
    cashTolerance: input.cashTolerance ?? manager.get('ledger.cashTolerance'),
    timeoutMs: input.timeoutMs !== undefined ? input.timeoutMs : manager.get('backtest.timeoutMs'),
  };

  const result = runConfigSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`);
    throw new ConfigurationError(`Invalid backtest configuration: ${issues.join('; ')}`, issues);
  }

  return Object.freeze({ ...result.data, costs: Object.freeze({ ...result.data.costs }) });
}
