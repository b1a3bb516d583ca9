/**
 * Exchange Connector interface and base implementation
 * Provides the capability set every exchange integration exposes to the strategy
 */

import type { Money } from '../models/Money';
import type { BalanceInfo, OrderBook, Ticker } from '../models/Market';
import type { OpenOrder, OrderId, OrderRequest } from '../models/Order';
import {
  ExchangeError,
  ErrorCategory,
  type ErrorContext,
  type NonFatalErrorPolicy,
  TransportFailure,
  ambiguousWriteError,
  toExchangeError
} from '../utils/ErrorHandler';
import { createLogger, type Logger } from '../utils/logger';

export interface ExchangeCredentials {
  apiKey: string;
  secret: string;
}

export interface NetworkConfig extends NonFatalErrorPolicy {
  connectionTimeoutSeconds: number;
}

/**
 * Standardized interface for all exchange connectors. Every method rejects
 * with an ExchangeError.
 */
export interface IExchangeConnector {
  readonly name: string;

  /**
   * Last traded price for the market
   */
  getLatestPrice(marketId: string): Promise<Money>;

  getTicker(marketId: string): Promise<Ticker>;

  /**
   * Best-first bids and asks. Rejects with INSUFFICIENT_MARKET_DATA if either side is empty.
   */
  getOrderBook(marketId: string): Promise<OrderBook>;

  /**
   * Orders of ours still resting on the book
   */
  getOpenOrders(marketId: string): Promise<OpenOrder[]>;

  /**
   * Places a limit order and returns the exchange's order id
   */
  placeOrder(request: OrderRequest): Promise<OrderId>;

  cancelOrder(orderId: OrderId, marketId: string): Promise<boolean>;

  getBalances(): Promise<BalanceInfo>;
}

/**
 * Rate limiter configuration
 */
export interface RateLimiterConfig {
  requestsPerSecond: number;
}

/**
 * Retry configuration
 */
export interface RetryConfig {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
}

export interface ConnectorOptions {
  credentials: ExchangeCredentials;
  network: NetworkConfig;
  retry?: Partial<RetryConfig>;
  rateLimiter?: RateLimiterConfig;
  logger?: Logger;
}

/**
 * Result of the read a connector runs after a write failed transiently.
 */
export type WriteConfirmation<T> = { applied: true; result: T } | { applied: false };

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 10000,
  backoffMultiplier: 2
};

export const DEFAULT_RATE_LIMITER_CONFIG: RateLimiterConfig = {
  requestsPerSecond: 5
};

/**
 * Base exchange connector implementation with common functionality
 */
export abstract class BaseExchangeConnector implements IExchangeConnector {
  public readonly name: string;
  protected readonly connectorId: string;
  protected readonly credentials: ExchangeCredentials;
  protected readonly network: NetworkConfig;
  protected readonly logger: Logger;

  private readonly retryConfig: RetryConfig;
  private readonly rateLimiterConfig: RateLimiterConfig;

  // Earliest start time the next request may take
  private nextRequestAt = 0;

  // Tail of the call chain per market
  private marketQueues: Map<string, Promise<unknown>> = new Map();

  constructor(connectorId: string, name: string, options: ConnectorOptions) {
    this.connectorId = connectorId;
    this.name = name;
    this.credentials = options.credentials;
    this.network = options.network;
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retry };
    this.rateLimiterConfig = options.rateLimiter ?? DEFAULT_RATE_LIMITER_CONFIG;
    this.logger = options.logger ?? createLogger('ExchangeConnector', { venue: connectorId });
    this.validateCredentials(options.credentials);
  }

  abstract getLatestPrice(marketId: string): Promise<Money>;
  abstract getTicker(marketId: string): Promise<Ticker>;
  abstract getOrderBook(marketId: string): Promise<OrderBook>;
  abstract getOpenOrders(marketId: string): Promise<OpenOrder[]>;
  abstract placeOrder(request: OrderRequest): Promise<OrderId>;
  abstract cancelOrder(orderId: OrderId, marketId: string): Promise<boolean>;
  abstract getBalances(): Promise<BalanceInfo>;

  /**
   * Runs an idempotent read, retrying transient failures with exponential backoff.
   * Calls scoped to a market are serialized with every other call on that market.
   */
  protected executeRead<T>(
    operationName: string,
    marketId: string | undefined,
    operation: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    return this.serializeForMarket(marketId, () => this.retryRead(operationName, marketId, operation));
  }

  /**
   * Runs a non-idempotent write. A transient failure is only retried once the
   * confirmation read shows the first attempt did not take effect; if it shows it
   * did, its result is returned instead. Anything else is escalated.
   */
  protected executeWrite<T>(
    operationName: string,
    marketId: string,
    operation: (signal: AbortSignal) => Promise<T>,
    confirm?: (signal: AbortSignal) => Promise<WriteConfirmation<T>>
  ): Promise<T> {
    return this.serializeForMarket(marketId, async () => {
      let attempt = 0;
      for (;;) {
        try {
          return await this.attempt(operation);
        } catch (error) {
          const failure = toExchangeError(error, this.errorContext(operationName, marketId), this.network, 'write');
          if (failure.category !== ErrorCategory.TRANSIENT_NETWORK) {
            throw failure;
          }

          if (!confirm) {
            throw ambiguousWriteError(failure, 'connector cannot confirm whether the request was applied');
          }

          let outcome: WriteConfirmation<T>;
          try {
            // Already inside this market's queue, so the confirmation read bypasses it
            outcome = await this.retryRead(`${operationName}:confirm`, marketId, confirm);
          } catch (confirmError) {
            this.logger.error({ err: confirmError, operation: operationName, marketId }, 'Write confirmation read failed');
            throw ambiguousWriteError(failure, 'confirmation read failed');
          }

          if (outcome.applied) {
            this.logger.warn({ operation: operationName, marketId }, 'Write reported a transient failure but was applied');
            return outcome.result;
          }

          if (attempt >= this.retryConfig.maxRetries) {
            throw failure;
          }

          const delay = this.backoffDelay(attempt);
          this.logger.warn(
            { operation: operationName, marketId, attempt: attempt + 1, delay, err: failure },
            'Write not applied, retrying'
          );
          attempt++;
          await this.sleep(delay);
        }
      }
    });
  }

  /**
   * Sends an HTTP request bounded by the configured connection timeout.
   * Non-2xx responses and socket errors surface as TransportFailure.
   */
  protected async sendRequest(url: string, init: RequestInit, signal: AbortSignal): Promise<unknown> {
    let response: Response;
    let body: string;
    try {
      response = await fetch(url, { ...init, signal });
      body = await response.text();
    } catch (error) {
      if (signal.aborted) {
        throw new TransportFailure(
          `Request to ${url} timed out after ${this.network.connectionTimeoutSeconds}s`,
          { timedOut: true, cause: error }
        );
      }
      throw new TransportFailure(this.describeNetworkError(error), { cause: error });
    }

    if (!response.ok) {
      throw new TransportFailure(this.describeErrorBody(response.status, body), { statusCode: response.status });
    }

    try {
      return body === '' ? null : JSON.parse(body);
    } catch (error) {
      throw new Error(`Malformed JSON from ${url}: ${body.slice(0, 200)}`, { cause: error });
    }
  }

  /**
   * Message extracted from a non-2xx body. Subclasses know the exchange's error shape.
   */
  protected describeErrorBody(statusCode: number, body: string): string {
    return `HTTP ${statusCode}: ${body.slice(0, 200)}`;
  }

  protected errorContext(operation: string, marketId?: string): ErrorContext {
    return {
      operation,
      component: this.name,
      marketId,
      venueId: this.connectorId,
      timestamp: new Date()
    };
  }

  /**
   * Validate credentials are present before any request is attempted
   */
  protected validateCredentials(credentials: ExchangeCredentials): void {
    if (!credentials.apiKey || !credentials.secret) {
      throw new ExchangeError(
        'Invalid credentials: API key and secret are required',
        'AUTHENTICATION_ERROR',
        ErrorCategory.FATAL,
        this.errorContext('validateCredentials')
      );
    }
  }

  private async retryRead<T>(
    operationName: string,
    marketId: string | undefined,
    operation: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    let attempt = 0;
    for (;;) {
      try {
        return await this.attempt(operation);
      } catch (error) {
        const failure = toExchangeError(error, this.errorContext(operationName, marketId), this.network);
        if (!failure.isRetryable || attempt >= this.retryConfig.maxRetries) {
          throw failure;
        }

        const delay = this.backoffDelay(attempt);
        this.logger.warn(
          { operation: operationName, marketId, attempt: attempt + 1, delay, err: failure },
          'Transient exchange failure, retrying'
        );
        attempt++;
        await this.sleep(delay);
      }
    }
  }

  private async attempt<T>(operation: (signal: AbortSignal) => Promise<T>): Promise<T> {
    await this.applyRateLimit();

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.network.connectionTimeoutSeconds * 1000);
    try {
      return await operation(controller.signal);
    } finally {
      clearTimeout(timer);
    }
  }

  private serializeForMarket<T>(marketId: string | undefined, task: () => Promise<T>): Promise<T> {
    if (marketId === undefined) {
      return task();
    }

    const previous = this.marketQueues.get(marketId) ?? Promise.resolve();
    const run = previous.then(task, task);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.marketQueues.set(marketId, tail);
    void tail.then(() => {
      if (this.marketQueues.get(marketId) === tail) {
        this.marketQueues.delete(marketId);
      }
    });
    return run;
  }

  /**
   * Spaces request starts evenly. The slot is reserved before waiting, so
   * concurrent callers queue behind each other instead of all waking at once.
   */
  private async applyRateLimit(): Promise<void> {
    const interval = 1000 / this.rateLimiterConfig.requestsPerSecond;
    const now = Date.now();
    const slot = Math.max(now, this.nextRequestAt);
    this.nextRequestAt = slot + interval;

    if (slot > now) {
      await this.sleep(slot - now);
    }
  }

  private backoffDelay(attempt: number): number {
    return Math.min(
      this.retryConfig.baseDelay * Math.pow(this.retryConfig.backoffMultiplier, attempt),
      this.retryConfig.maxDelay
    );
  }

  private describeNetworkError(error: unknown): string {
    if (error instanceof Error) {
      // undici wraps the socket error ("connect ECONNREFUSED ...") in `cause`
      const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
      return `${error.message}${cause}`;
    }
    return String(error);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
