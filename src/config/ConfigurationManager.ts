/**
 * Configuration Manager
 * Validates the flat key/value configuration once at startup into typed sections
 */

import { z } from 'zod';
import { Money } from '../models/Money';
import type { Market } from '../models/Market';
import type { NetworkConfig, ExchangeCredentials, RetryConfig, RateLimiterConfig } from '../connectors/ExchangeConnector';
import type { StrategyConfig } from '../services/PositionStateMachine';

export type ConfigSource = Record<string, string | undefined>;

export type ExchangeAdapter = 'gemini' | 'paper';

export interface ExchangeSettings {
  adapter: ExchangeAdapter;
  apiUrl: string;
  credentials: ExchangeCredentials;
  network: NetworkConfig;
  retry: RetryConfig;
  rateLimiter: RateLimiterConfig;
  paperBalance: Money;
}

export interface EngineSettings {
  tradeCycleIntervalMs: number;
  haltOnFatalRead: boolean;
}

export interface BotConfiguration {
  logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
  exchange: ExchangeSettings;
  strategy: StrategyConfig;
  engine: EngineSettings;
  markets: Market[];
}

export interface ConfigValidationError {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: ConfigValidationError[];
}

export const MANDATORY_KEYS = [
  'EXCHANGE_KEY',
  'EXCHANGE_SECRET',
  'CONNECTION_TIMEOUT_SECONDS',
  'NON_FATAL_ERROR_CODES',
  'NON_FATAL_ERROR_MESSAGES',
  'ENTRY_BUDGET',
  'MIN_PROFIT_PCT',
  'MAX_LOSS_PCT',
  'TRAILING_PCT',
  'MARKETS'
] as const;

const MANDATORY_KEY_SET: ReadonlySet<string> = new Set(MANDATORY_KEYS);

/**
 * Raised at startup, before any cycle runs
 */
export class ConfigurationError extends Error {
  public readonly errors: ConfigValidationError[];

  constructor(errors: ConfigValidationError[]) {
    super(`Invalid configuration: ${errors.map(e => `${e.path}: ${e.message}`).join('; ')}`);
    this.name = 'ConfigurationError';
    this.errors = errors;
  }

  get missingKeys(): string[] {
    return this.errors.filter(e => e.message === 'mandatory value missing').map(e => e.path);
  }
}

const required = (key: string) =>
  z.string({ required_error: 'mandatory value missing', invalid_type_error: `${key} must be a string` }).trim();

const decimal = (key: string, check: (value: Money) => boolean, rule: string) =>
  required(key).transform((raw, ctx) => {
    const value = Money.tryParse(raw);
    if (!value || !check(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${rule}, got "${raw}"` });
      return z.NEVER;
    }
    return value;
  });

const fraction = (key: string) =>
  decimal(key, value => value.gte(0) && value.lt(1), 'must be a fraction between 0 (inclusive) and 1 (exclusive)');

const integer = (key: string, min: number) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, `${key} must be a whole number`)
    .transform(Number)
    .refine(value => value >= min, `${key} must be at least ${min}`);

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .refine(value => ['true', 'false', '1', '0', 'yes', 'no'].includes(value), 'must be true or false')
  .transform(value => ['true', '1', 'yes'].includes(value));

const list = (raw: string, separator: string): string[] =>
  raw
    .split(separator)
    .map(item => item.trim())
    .filter(item => item !== '');

const statusCodes = required('NON_FATAL_ERROR_CODES').transform((raw, ctx) => {
  const codes = list(raw, ',').map(Number);
  if (codes.some(code => !Number.isInteger(code) || code < 100 || code > 599)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must be comma-separated HTTP status codes, got "${raw}"` });
    return z.NEVER;
  }
  return codes;
});

const MARKET_PATTERN = /^([A-Za-z0-9_-]+)=([A-Za-z0-9]+)\/([A-Za-z0-9]+)$/;

const markets = required('MARKETS').transform((raw, ctx) => {
  const parsed: Market[] = [];
  for (const entry of list(raw, ',')) {
    const match = MARKET_PATTERN.exec(entry);
    if (!match) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `entry "${entry}" must look like id=BASE/COUNTER` });
      return z.NEVER;
    }
    const [, id, base, counter] = match;
    parsed.push({
      id: id.toLowerCase(),
      name: `${base.toUpperCase()}/${counter.toUpperCase()}`,
      baseCurrency: base.toUpperCase(),
      counterCurrency: counter.toUpperCase()
    });
  }
  if (parsed.length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'at least one market is required' });
    return z.NEVER;
  }
  if (new Set(parsed.map(market => market.id)).size !== parsed.length) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'market ids must be unique' });
    return z.NEVER;
  }
  return parsed;
});

const configSchema = z.object({
  EXCHANGE_KEY: required('EXCHANGE_KEY').pipe(z.string().min(1, 'must not be empty')),
  EXCHANGE_SECRET: required('EXCHANGE_SECRET').pipe(z.string().min(1, 'must not be empty')),
  CONNECTION_TIMEOUT_SECONDS: z.string({ required_error: 'mandatory value missing' }).pipe(integer('CONNECTION_TIMEOUT_SECONDS', 1)),
  NON_FATAL_ERROR_CODES: statusCodes,
  NON_FATAL_ERROR_MESSAGES: required('NON_FATAL_ERROR_MESSAGES').transform(raw => list(raw, '|')),
  ENTRY_BUDGET: decimal('ENTRY_BUDGET', value => value.isPositive(), 'must be a positive decimal'),
  MIN_PROFIT_PCT: fraction('MIN_PROFIT_PCT'),
  MAX_LOSS_PCT: fraction('MAX_LOSS_PCT'),
  TRAILING_PCT: fraction('TRAILING_PCT'),
  MARKETS: markets,
  EXCHANGE_ADAPTER: z.enum(['gemini', 'paper']).default('gemini'),
  EXCHANGE_API_URL: z.string().url().default('https://api.gemini.com'),
  TRADE_CYCLE_INTERVAL_SECONDS: integer('TRADE_CYCLE_INTERVAL_SECONDS', 1).default('60'),
  MAX_RETRIES: integer('MAX_RETRIES', 0).default('3'),
  RETRY_BASE_DELAY_MS: integer('RETRY_BASE_DELAY_MS', 0).default('1000'),
  RETRY_MAX_DELAY_MS: integer('RETRY_MAX_DELAY_MS', 0).default('10000'),
  REQUESTS_PER_SECOND: integer('REQUESTS_PER_SECOND', 1).default('5'),
  HALT_ON_FATAL_READ: flag.default('false'),
  PAPER_BALANCE: decimal('PAPER_BALANCE', value => !value.isNegative(), 'must be a non-negative decimal').default('100'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

type ParsedConfig = z.infer<typeof configSchema>;

function toValidationErrors(error: z.ZodError): ConfigValidationError[] {
  return error.issues.map(issue => ({
    path: issue.path.join('.') || '(root)',
    message: issue.message
  }));
}

// Blank values count as absent so that optional keys fall back to their defaults
function normalizeSource(source: ConfigSource): ConfigSource {
  const normalized: ConfigSource = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && (value.trim() !== '' || MANDATORY_KEY_SET.has(key))) {
      normalized[key] = value;
    }
  }
  return normalized;
}

function toConfiguration(parsed: ParsedConfig): BotConfiguration {
  return {
    logLevel: parsed.LOG_LEVEL,
    exchange: {
      adapter: parsed.EXCHANGE_ADAPTER,
      apiUrl: parsed.EXCHANGE_API_URL,
      credentials: { apiKey: parsed.EXCHANGE_KEY, secret: parsed.EXCHANGE_SECRET },
      network: {
        connectionTimeoutSeconds: parsed.CONNECTION_TIMEOUT_SECONDS,
        nonFatalErrorCodes: parsed.NON_FATAL_ERROR_CODES,
        nonFatalErrorMessages: parsed.NON_FATAL_ERROR_MESSAGES
      },
      retry: {
        maxRetries: parsed.MAX_RETRIES,
        baseDelay: parsed.RETRY_BASE_DELAY_MS,
        maxDelay: parsed.RETRY_MAX_DELAY_MS,
        backoffMultiplier: 2
      },
      rateLimiter: { requestsPerSecond: parsed.REQUESTS_PER_SECOND },
      paperBalance: parsed.PAPER_BALANCE
    },
    strategy: {
      entryBudget: parsed.ENTRY_BUDGET,
      minProfitPct: parsed.MIN_PROFIT_PCT,
      maxLossPct: parsed.MAX_LOSS_PCT,
      trailingPct: parsed.TRAILING_PCT
    },
    engine: {
      tradeCycleIntervalMs: parsed.TRADE_CYCLE_INTERVAL_SECONDS * 1000,
      haltOnFatalRead: parsed.HALT_ON_FATAL_READ
    },
    markets: parsed.MARKETS
  };
}

export class ConfigurationManager {
  private config?: BotConfiguration;
  private readonly source: ConfigSource;

  constructor(source: ConfigSource) {
    this.source = source;
  }

  /**
   * Validates the source and builds the typed configuration. Throws ConfigurationError.
   */
  loadConfiguration(): BotConfiguration {
    const result = configSchema.safeParse(normalizeSource(this.source));
    if (!result.success) {
      throw new ConfigurationError(toValidationErrors(result.error));
    }
    this.config = toConfiguration(result.data);
    return this.config;
  }

  getConfiguration(): BotConfiguration {
    if (!this.config) {
      throw new Error('Configuration not loaded');
    }
    return this.config;
  }

  getConfigSection<T extends keyof BotConfiguration>(section: T): BotConfiguration[T] {
    return this.getConfiguration()[section];
  }

  validateConfiguration(): ConfigValidationResult {
    const result = configSchema.safeParse(normalizeSource(this.source));
    return result.success ? { isValid: true, errors: [] } : { isValid: false, errors: toValidationErrors(result.error) };
  }
}

export function loadConfiguration(source: ConfigSource): BotConfiguration {
  return new ConfigurationManager(source).loadConfiguration();
}
