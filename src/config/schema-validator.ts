import { z } from 'zod';
import { REBALANCE_FREQUENCIES } from '../backtest/types.js';
import { isIsoDate } from '../utils/dates.js';

// ── Backtest ─────────────────────────────────────────────────────────────────
const backtestSchemas = {
  'backtest.initialCash': z.number().positive(),
  'backtest.rebalanceFrequency': z.enum(REBALANCE_FREQUENCIES),
  'backtest.driftThresholdPct': z.number().positive().max(100).nullable(),
  'backtest.timeoutMs': z.number().int().positive().nullable(),
};

// ── Costs ────────────────────────────────────────────────────────────────────
const costModelEnum = z.enum(['bps', 'fixed', 'spread', 'composite']);

const costSchemas = {
  'costs.model': costModelEnum,
  'costs.commissionBps': z.number().min(0).max(1000),
  'costs.fixedFee': z.number().min(0),
  'costs.spreadBps': z.number().min(0).max(1000),
  'costs.marketImpactFactor': z.number().min(0),
};

// ── Analysis ─────────────────────────────────────────────────────────────────
const analysisSchemas = {
  'analysis.riskFreeRate': z.number().min(-1).max(1),
};

// ── Execution ────────────────────────────────────────────────────────────────
const executionSchemas = {
  'execution.fractionalShares': z.boolean(),
  'execution.minTradeWeightPct': z.number().min(0).max(100),
  'execution.allocationTolerancePct': z.number().min(0).max(100),
  'ledger.cashTolerance': z.number().min(0),
};

// ── Merged schema map ────────────────────────────────────────────────────────
export const configSchemas = {
  ...backtestSchemas,
  ...costSchemas,
  ...analysisSchemas,
  ...executionSchemas,
};

export type ConfigKey = keyof typeof configSchemas;
export type ConfigValue<K extends ConfigKey> = z.infer<(typeof configSchemas)[K]>;

export function isConfigKey(key: string): key is ConfigKey {
  return Object.hasOwn(configSchemas, key);
}

/**
 * Validate a value against the schema for the given config key.
 * Unknown keys are rejected.
 */
export function validateConfigValue(
  key: string,
  value: unknown,
): { valid: boolean; error?: string } {
  if (!isConfigKey(key)) {
    return { valid: false, error: `Unknown config key: ${key}` };
  }

  const result = configSchemas[key].safeParse(value);
  if (result.success) {
    return { valid: true };
  }

  const messages = result.error.issues.map((i) => i.message).join('; ');
  return { valid: false, error: messages };
}

export function parseWithSchema<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  return schema.parse(value);
}

// ── Whole-run configuration ──────────────────────────────────────────────────
const isoDate = z.string().refine(isIsoDate, { message: 'must be a YYYY-MM-DD calendar date' });

export const runConfigSchema = z
  .object({
    initialCash: configSchemas['backtest.initialCash'],
    startDate: isoDate,
    endDate: isoDate,
    rebalanceFrequency: configSchemas['backtest.rebalanceFrequency'],
    driftThresholdPct: configSchemas['backtest.driftThresholdPct'],
    costs: z.object({
      model: costModelEnum,
      commissionBps: configSchemas['costs.commissionBps'],
      fixedFee: configSchemas['costs.fixedFee'],
      spreadBps: configSchemas['costs.spreadBps'],
      marketImpactFactor: configSchemas['costs.marketImpactFactor'],
    }),
    riskFreeRate: configSchemas['analysis.riskFreeRate'],
    fractionalShares: configSchemas['execution.fractionalShares'],
    minTradeWeightPct: configSchemas['execution.minTradeWeightPct'],
    allocationTolerancePct: configSchemas['execution.allocationTolerancePct'],
    cashTolerance: configSchemas['ledger.cashTolerance'],
    timeoutMs: configSchemas['backtest.timeoutMs'],
  })
  .refine((c) => c.endDate >= c.startDate, {
    message: 'endDate must not be before startDate',
    path: ['endDate'],
  });
