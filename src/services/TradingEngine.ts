/**
 * Trading Engine: supervisor that triggers a cycle for every market on a fixed interval
 * and stops a market for good once its driver reports a fatal abort
 */

import type { IExchangeConnector } from '../connectors/ExchangeConnector';
import type { CycleDriver, CycleOutcome } from './CycleDriver';
import { describeError } from '../utils/ErrorHandler';
import { createLogger, type Logger } from '../utils/logger';

export interface TradingEngineConfig {
  tradeCycleIntervalMs: number;
}

export type OutcomeListener = (outcome: CycleOutcome) => void;

export type EngineState = 'idle' | 'running' | 'stopping' | 'stopped';

export interface PreflightReport {
  balances: Record<string, { available: string; onHold: string }>;
  prices: Record<string, { bid: string; ask: string; last: string }>;
}

export class TradingEngine {
  private readonly connector: IExchangeConnector;
  private readonly config: TradingEngineConfig;
  private readonly logger: Logger;
  private drivers: Map<string, CycleDriver> = new Map();
  private outcomeListeners: OutcomeListener[] = [];
  private stoppedListeners: ((reason: string) => void)[] = [];

  private state: EngineState = 'idle';
  private timer?: NodeJS.Timeout;
  private currentRound?: Promise<CycleOutcome[]>;
  private stopping?: Promise<void>;

  constructor(connector: IExchangeConnector, config: TradingEngineConfig, logger?: Logger) {
    this.connector = connector;
    this.config = config;
    this.logger = logger ?? createLogger('TradingEngine');
  }

  registerMarket(driver: CycleDriver): void {
    if (this.drivers.has(driver.market.id)) {
      throw new Error(`Market already registered: ${driver.market.id}`);
    }
    this.drivers.set(driver.market.id, driver);
  }

  onOutcome(listener: OutcomeListener): void {
    this.outcomeListeners.push(listener);
  }

  onStopped(listener: (reason: string) => void): void {
    this.stoppedListeners.push(listener);
  }

  getState(): EngineState {
    return this.state;
  }

  getActiveMarkets(): string[] {
    return [...this.drivers.values()].filter(driver => !driver.isHalted()).map(driver => driver.market.id);
  }

  getHaltedMarkets(): string[] {
    return [...this.drivers.values()].filter(driver => driver.isHalted()).map(driver => driver.market.id);
  }

  /**
   * Logs balances and current prices before the first cycle. Failures reject.
   */
  async preflight(): Promise<PreflightReport> {
    const report: PreflightReport = { balances: {}, prices: {} };

    const balances = await this.connector.getBalances();
    for (const [currency, balance] of balances) {
      report.balances[currency] = { available: balance.available.toString(), onHold: balance.onHold.toString() };
    }

    for (const marketId of this.drivers.keys()) {
      const ticker = await this.connector.getTicker(marketId);
      report.prices[marketId] = { bid: ticker.bid.toString(), ask: ticker.ask.toString(), last: ticker.last.toString() };
    }

    this.logger.info({ connector: this.connector.name, ...report }, 'Preflight complete');
    return report;
  }

  /**
   * One round: every active market's cycle, concurrently. Markets never share state.
   */
  async runCycle(): Promise<CycleOutcome[]> {
    const active = [...this.drivers.values()].filter(driver => !driver.isHalted());
    const outcomes = await Promise.all(active.map(driver => driver.runOneCycle()));

    for (const outcome of outcomes) {
      if (outcome.type === 'fatalAbort') {
        this.logger.error({ marketId: outcome.marketId, err: outcome.error }, 'Market halted');
      }
      this.notify(outcome);
    }
    return outcomes;
  }

  start(): void {
    if (this.state === 'running') {
      return;
    }
    if (this.drivers.size === 0) {
      throw new Error('No markets registered');
    }

    this.state = 'running';
    this.logger.info(
      { markets: [...this.drivers.keys()], intervalMs: this.config.tradeCycleIntervalMs },
      'Trading engine started'
    );
    this.scheduleRound(0);
  }

  /**
   * Stops before the next round; resolves once the round in flight has finished.
   * Calls made while a stop is in progress share it, so listeners hear one reason.
   */
  stop(reason: string = 'Stop requested'): Promise<void> {
    if (this.stopping) {
      return this.stopping;
    }
    if (this.state === 'stopped' || this.state === 'idle') {
      this.state = 'stopped';
      return Promise.resolve();
    }

    this.stopping = this.shutdown(reason);
    return this.stopping;
  }

  private async shutdown(reason: string): Promise<void> {
    this.state = 'stopping';
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.currentRound) {
      await this.currentRound;
    }
    this.finish(reason);
  }

  private scheduleRound(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      void this.executeRound();
    }, delayMs);
  }

  private async executeRound(): Promise<void> {
    if (this.state !== 'running') {
      return;
    }

    this.currentRound = this.runCycle();
    try {
      await this.currentRound;
    } catch (error) {
      // runOneCycle maps every failure to an outcome, so this is a listener fault
      this.logger.error({ err: error }, `Trade cycle failed: ${describeError(error)}`);
    } finally {
      this.currentRound = undefined;
    }

    if (this.state !== 'running') {
      return;
    }
    if (this.getActiveMarkets().length === 0) {
      this.finish('All markets halted after fatal errors');
      return;
    }
    this.scheduleRound(this.config.tradeCycleIntervalMs);
  }

  private finish(reason: string): void {
    this.state = 'stopped';
    this.stopping = undefined;
    this.logger.info({ reason, halted: this.getHaltedMarkets() }, 'Trading engine stopped');
    for (const listener of this.stoppedListeners) {
      listener(reason);
    }
  }

  private notify(outcome: CycleOutcome): void {
    for (const listener of this.outcomeListeners) {
      try {
        listener(outcome);
      } catch (error) {
        this.logger.error({ err: error }, 'Outcome listener error');
      }
    }
  }
}
