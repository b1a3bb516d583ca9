/**
 * Cycle Driver: one scheduled evaluation of a market
 * Fetches the book, feeds the snapshot to the state machine and reports a single outcome
 */

import { createPriceSnapshot, type Market, type PriceSnapshot } from '../models/Market';
import type { OrderId } from '../models/Order';
import type { PositionStatus } from '../models/Position';
import type { IExchangeConnector } from '../connectors/ExchangeConnector';
import { AuditService } from './AuditService';
import { PositionStateMachine, isAbortingWriteFailure } from './PositionStateMachine';
import { ExchangeError, ErrorCategory, describeError } from '../utils/ErrorHandler';
import { createLogger, type Logger } from '../utils/logger';

export type CycleOutcome =
  | { type: 'cycleCompleted'; marketId: string; status: PositionStatus; orderId?: OrderId }
  | { type: 'cycleSkipped'; marketId: string; reason: string }
  | { type: 'fatalAbort'; marketId: string; error: Error };

export interface CycleDriverOptions {
  /** Treat a fatal read like a fatal write and halt the market */
  haltOnFatalRead?: boolean;
  auditService?: AuditService;
  logger?: Logger;
  clock?: () => Date;
}

export class CycleDriver {
  public readonly market: Market;
  private readonly connector: IExchangeConnector;
  private readonly stateMachine: PositionStateMachine;
  private readonly haltOnFatalRead: boolean;
  private readonly auditService?: AuditService;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  private halted?: Extract<CycleOutcome, { type: 'fatalAbort' }>;
  private inProgress = false;

  constructor(
    market: Market,
    connector: IExchangeConnector,
    stateMachine: PositionStateMachine,
    options: CycleDriverOptions = {}
  ) {
    this.market = market;
    this.connector = connector;
    this.stateMachine = stateMachine;
    this.haltOnFatalRead = options.haltOnFatalRead ?? false;
    this.auditService = options.auditService;
    this.logger = options.logger ?? createLogger('CycleDriver', { market: market.id });
    this.clock = options.clock ?? (() => new Date());
  }

  isHalted(): boolean {
    return this.halted !== undefined;
  }

  getStateMachine(): PositionStateMachine {
    return this.stateMachine;
  }

  /**
   * Runs one cycle to completion. Never rejects: every failure maps to an outcome.
   */
  async runOneCycle(): Promise<CycleOutcome> {
    if (this.halted) {
      return this.halted;
    }
    if (this.inProgress) {
      return this.skip('Previous cycle still in progress');
    }

    this.inProgress = true;
    try {
      const snapshot = await this.fetchSnapshot();
      if (typeof snapshot === 'string') {
        return this.skip(snapshot);
      }

      this.logger.info(
        { bid: snapshot.bid.toString(), ask: snapshot.ask.toString(), position: this.stateMachine.getPosition().status },
        'Evaluating market'
      );

      const result = await this.stateMachine.step(snapshot);
      return {
        type: 'cycleCompleted',
        marketId: this.market.id,
        status: result.position.status,
        orderId: result.type === 'orderPlaced' ? result.orderId : undefined
      };
    } catch (error) {
      return this.handleFailure(error);
    } finally {
      this.inProgress = false;
    }
  }

  /**
   * Best bid/ask for this cycle, or the reason there is not enough data to decide
   */
  private async fetchSnapshot(): Promise<PriceSnapshot | string> {
    const book = await this.connector.getOrderBook(this.market.id);
    const bestBid = book.bids[0];
    const bestAsk = book.asks[0];

    if (!bestBid) {
      return 'Exchange returned empty buy side of the order book';
    }
    if (!bestAsk) {
      return 'Exchange returned empty sell side of the order book';
    }
    return createPriceSnapshot(this.market.id, bestBid.price, bestAsk.price, this.clock());
  }

  private handleFailure(error: unknown): CycleOutcome {
    if (!(error instanceof ExchangeError)) {
      return this.abort(error instanceof Error ? error : new Error(describeError(error)));
    }

    switch (error.category) {
      case ErrorCategory.INSUFFICIENT_MARKET_DATA:
        return this.skip(`Insufficient market data: ${error.message}`);

      case ErrorCategory.TRANSIENT_NETWORK:
        this.logger.error({ err: error }, 'Exchange network failure, waiting until next trade cycle');
        return this.skip(`Transient exchange failure: ${error.message}`);

      case ErrorCategory.AMBIGUOUS_WRITE_OUTCOME:
        return this.abort(error);

      case ErrorCategory.FATAL:
        if (isAbortingWriteFailure(error) || this.haltOnFatalRead) {
          return this.abort(error);
        }
        this.logger.error({ err: error }, 'Fatal exchange failure on read, skipping this cycle');
        return this.skip(`Exchange read failed: ${error.message}`);
    }
  }

  private skip(reason: string): CycleOutcome {
    this.logger.warn({ reason }, 'Cycle skipped');
    return { type: 'cycleSkipped', marketId: this.market.id, reason };
  }

  private abort(error: Error): CycleOutcome {
    const outcome = { type: 'fatalAbort' as const, marketId: this.market.id, error };
    this.halted = outcome;

    this.logger.fatal(
      { err: error, position: this.stateMachine.getPosition().status },
      'Fatal exchange failure, no further orders for this market until an operator restarts the bot'
    );
    this.auditService?.record(
      'FATAL_ABORT',
      {
        error: error.message,
        category: error instanceof ExchangeError ? error.category : 'unexpected',
        position: this.stateMachine.getPosition().status
      },
      this.market.id,
      this.connector.name
    );
    return outcome;
  }
}
