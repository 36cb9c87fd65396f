import { ConfigurationError } from '../backtest/errors.js';
import { createLogger } from '../utils/logger.js';
import { CONFIG_DEFAULTS } from './defaults.js';
import {
  type ConfigKey,
  type ConfigValue,
  configSchemas,
  parseWithSchema,
  validateConfigValue,
} from './schema-validator.js';

const log = createLogger('config');

/**
 * Keyed engine settings. Lookup order: environment variable, runtime override,
 * shipped default. Every value is checked against its zod schema on the way out.
 */
export class ConfigManager {
  private overrides = new Map<ConfigKey, unknown>();

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  get<K extends ConfigKey>(key: K): ConfigValue<K> {
    const raw = this.getRaw(key);
    try {
      return parseWithSchema(configSchemas[key], raw);
    } catch (err) {
      throw new ConfigurationError(`Invalid value for config key ${key}: ${JSON.stringify(raw)}`, [
        err instanceof Error ? err.message : String(err),
      ]);
    }
  }

  set<K extends ConfigKey>(key: K, value: ConfigValue<K>): void {
    const { valid, error } = validateConfigValue(key, value);
    if (!valid) {
      throw new ConfigurationError(`Invalid value for config key ${key}`, error ? [error] : []);
    }
    this.overrides.set(key, value);
    log.info({ key, value }, 'Config updated');
  }

  reset(key?: ConfigKey): void {
    if (key) {
      this.overrides.delete(key);
    } else {
      this.overrides.clear();
    }
  }

  getAll(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const def of CONFIG_DEFAULTS) {
      result[def.key] = this.get(def.key);
    }
    return result;
  }

  getByCategory(category: string): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const def of CONFIG_DEFAULTS.filter((d) => d.category === category)) {
      result[def.key] = this.get(def.key);
    }
    return result;
  }

  private getRaw(key: ConfigKey): unknown {
    const envOverride = this.getEnvOverride(key);
    if (envOverride !== undefined) return envOverride;

    if (this.overrides.has(key)) return this.overrides.get(key);

    const def = CONFIG_DEFAULTS.find((d) => d.key === key);
    if (def) return JSON.parse(def.value);

    throw new ConfigurationError(`Config key not found: ${key}`);
  }

  /**
   * Converts a config key to an environment variable name.
   * e.g. "costs.commissionBps" → "COSTS_COMMISSION_BPS"
   *      "backtest.driftThresholdPct" → "BACKTEST_DRIFT_THRESHOLD_PCT"
   */
  private configKeyToEnvVar(key: string): string {
    return key
      .replace(/\./g, '_')
      .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
      .toUpperCase();
  }

  /**
   * Values are parsed as JSON when possible, otherwise used as raw strings.
   */
  private getEnvOverride(key: string): unknown {
    const envValue = this.env[this.configKeyToEnvVar(key)];
    if (envValue === undefined) return undefined;

    try {
      return JSON.parse(envValue);
    } catch {
      return envValue;
    }
  }
}

export const configManager = new ConfigManager();
