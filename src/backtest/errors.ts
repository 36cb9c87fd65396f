export type BacktestErrorCode =
  | 'CONFIG_INVALID'
  | 'DATA_INVALID'
  | 'MISSING_PRICE'
  | 'INSUFFICIENT_CASH'
  | 'INVALID_TRADE'
  | 'POLICY_FAILED'
  | 'RUN_TIMEOUT';

export class BacktestError extends Error {
  constructor(
    message: string,
    public readonly code: BacktestErrorCode,
    public readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'BacktestError';
  }
}

/** Rejected run configuration. Raised before the simulation loop starts. */
export class ConfigurationError extends BacktestError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, 'CONFIG_INVALID', { issues });
    this.name = 'ConfigurationError';
  }
}

export class DataError extends BacktestError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'DATA_INVALID', details);
    this.name = 'DataError';
  }
}

export class MissingPriceError extends BacktestError {
  constructor(
    public readonly symbol: string,
    public readonly date?: string,
  ) {
    super(
      date ? `No price for held symbol ${symbol} on ${date}` : `No price for held symbol ${symbol}`,
      'MISSING_PRICE',
      { symbol, date },
    );
    this.name = 'MissingPriceError';
  }
}

export class InsufficientCashError extends BacktestError {
  constructor(
    public readonly symbol: string,
    public readonly required: number,
    public readonly available: number,
  ) {
    super(
      `Trade in ${symbol} needs ${required.toFixed(2)} but only ${available.toFixed(2)} cash is available`,
      'INSUFFICIENT_CASH',
      { symbol, required, available },
    );
    this.name = 'InsufficientCashError';
  }
}

export class InvalidTradeError extends BacktestError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'INVALID_TRADE', details);
    this.name = 'InvalidTradeError';
  }
}

export class PolicyError extends BacktestError {
  constructor(
    message: string,
    public readonly policyName: string,
    public readonly date: string,
    cause?: unknown,
  ) {
    super(`Policy "${policyName}" failed on ${date}: ${message}`, 'POLICY_FAILED', {
      policyName,
      date,
    }, { cause });
    this.name = 'PolicyError';
  }
}

export class RunTimeoutError extends BacktestError {
  constructor(
    public readonly timeoutMs: number,
    public readonly date: string,
  ) {
    super(`Backtest exceeded its ${timeoutMs}ms budget at ${date}`, 'RUN_TIMEOUT', {
      timeoutMs,
      date,
    });
    this.name = 'RunTimeoutError';
  }
}

/**
 * Flatten any thrown value into a plain object for structured logging.
 */
export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof BacktestError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      details: err.details,
      cause: err.cause === undefined ? undefined : serializeError(err.cause),
    };
  }
  if (err instanceof Error) {
    return { name: err.name, message: err.message };
  }
  return { message: String(err) };
}
