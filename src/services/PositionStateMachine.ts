/**
 * Position lifecycle state machine
 * flat -> pending_entry -> holding -> pending_exit -> flat, one market per instance
 */

import { Money } from '../models/Money';
import type { Market, PriceSnapshot } from '../models/Market';
import { isOrderOpen, type OpenOrder, type OrderId, type OrderRequest } from '../models/Order';
import { createFlatPosition, describePosition, type Position } from '../models/Position';
import type { IExchangeConnector } from '../connectors/ExchangeConnector';
import { AuditService } from './AuditService';
import { ExchangeError, ErrorCategory, toExchangeError } from '../utils/ErrorHandler';
import { createLogger, type Logger } from '../utils/logger';

export interface StrategyConfig {
  /** Counter-currency amount spent on each entry */
  entryBudget: Money;
  /** Fractions, e.g. 0.02 for 2% */
  minProfitPct: Money;
  maxLossPct: Money;
  trailingPct: Money;
}

export type OrderIntent = 'entry' | 'stop_loss' | 'trailing_stop';

export type PositionAction =
  | { type: 'none'; reason: string }
  | { type: 'placeOrder'; intent: OrderIntent; order: OrderRequest };

export interface TransitionResult {
  /** State to keep when no order is submitted, or when the submission is rejected */
  position: Position;
  action: PositionAction;
}

export interface ExitThresholds {
  stopLossPrice: Money;
  profitTargetPrice: Money;
}

export function exitThresholds(entryPrice: Money, config: StrategyConfig): ExitThresholds {
  return {
    stopLossPrice: entryPrice.times(Money.of(1).minus(config.maxLossPct)),
    profitTargetPrice: entryPrice.times(Money.of(1).plus(config.minProfitPct))
  };
}

export function trailingStopPrice(highWaterMark: Money, config: StrategyConfig): Money {
  return highWaterMark.times(Money.of(1).minus(config.trailingPct));
}

/**
 * Amount of base currency the entry budget buys at the given price, rounded down
 */
export function entryQuantity(entryBudget: Money, price: Money): Money {
  return entryBudget.dividedBy(price, 'down');
}

function hold(position: Position, reason: string): TransitionResult {
  return { position, action: { type: 'none', reason } };
}

/**
 * Pure transition function. Emits at most one order; never one while an order is pending.
 */
export function evaluatePosition(
  position: Position,
  snapshot: PriceSnapshot,
  openOrders: readonly OpenOrder[],
  config: StrategyConfig
): TransitionResult {
  switch (position.status) {
    case 'flat': {
      if (!snapshot.bid.isPositive()) {
        return hold(position, `No usable bid price (${snapshot.bid.toString()})`);
      }
      const quantity = entryQuantity(config.entryBudget, snapshot.bid);
      if (quantity.isZero()) {
        return hold(position, `Entry budget ${config.entryBudget.toString()} buys nothing at ${snapshot.bid.toString()}`);
      }
      return {
        position,
        action: {
          type: 'placeOrder',
          intent: 'entry',
          order: { marketId: snapshot.marketId, side: 'buy', quantity, limitPrice: snapshot.bid }
        }
      };
    }

    case 'pending_entry': {
      if (isOrderOpen(position.entryOrderId, openOrders)) {
        return hold(position, `Entry order ${position.entryOrderId} still open`);
      }
      // Filled: the exit rules apply to this same snapshot
      return evaluateHolding({ ...position, status: 'holding', highWaterMark: position.entryPrice }, snapshot, config);
    }

    case 'holding':
      return evaluateHolding(position, snapshot, config);

    case 'pending_exit': {
      if (isOrderOpen(position.exitOrderId, openOrders)) {
        return hold(position, `Exit order ${position.exitOrderId} still open`);
      }
      return hold(
        {
          status: 'flat',
          entryPrice: position.entryPrice,
          quantity: position.quantity,
          highWaterMark: Money.zero()
        },
        `Exit order ${position.exitOrderId} filled`
      );
    }
  }
}

function evaluateHolding(position: Position, snapshot: PriceSnapshot, config: StrategyConfig): TransitionResult {
  const ask = snapshot.ask;
  const { stopLossPrice, profitTargetPrice } = exitThresholds(position.entryPrice, config);
  const sell = (intent: OrderIntent, from: Position): TransitionResult => ({
    position: from,
    action: {
      type: 'placeOrder',
      intent,
      order: { marketId: snapshot.marketId, side: 'sell', quantity: position.quantity, limitPrice: ask }
    }
  });

  // Strictly below: touching the stop-loss price does not trigger it
  if (ask.lt(stopLossPrice)) {
    return sell('stop_loss', position);
  }

  // The trailing stop arms once the high-water mark has cleared the target
  const armed = position.highWaterMark.gt(profitTargetPrice);
  if (!armed && ask.lte(profitTargetPrice)) {
    return hold(position, `Ask ${ask.toString()} has not cleared profit target ${profitTargetPrice.toString()}`);
  }

  const tracked: Position = { ...position, highWaterMark: Money.max(position.highWaterMark, ask) };
  const stopPrice = trailingStopPrice(tracked.highWaterMark, config);
  if (ask.lt(stopPrice)) {
    return sell('trailing_stop', tracked);
  }
  return hold(tracked, `Riding trend, high-water mark ${tracked.highWaterMark.toString()}, trailing stop ${stopPrice.toString()}`);
}

/**
 * Position after the exchange accepted the order emitted by evaluatePosition
 */
export function applyOrderAccepted(
  position: Position,
  action: Extract<PositionAction, { type: 'placeOrder' }>,
  orderId: OrderId
): Position {
  if (action.intent === 'entry') {
    return {
      status: 'pending_entry',
      entryOrderId: orderId,
      entryPrice: action.order.limitPrice,
      quantity: action.order.quantity,
      highWaterMark: Money.zero()
    };
  }
  return { ...position, status: 'pending_exit', exitOrderId: orderId };
}

export type StepResult =
  | { type: 'noAction'; reason: string; position: Position }
  | { type: 'orderPlaced'; intent: OrderIntent; orderId: OrderId; position: Position };

export interface PositionStateMachineOptions {
  auditService?: AuditService;
  logger?: Logger;
}

/**
 * Owns the Position of one market and drives it against the exchange
 */
export class PositionStateMachine {
  private position: Position = createFlatPosition();
  private readonly market: Market;
  private readonly config: StrategyConfig;
  private readonly connector: IExchangeConnector;
  private readonly auditService?: AuditService;
  private readonly logger: Logger;

  constructor(market: Market, config: StrategyConfig, connector: IExchangeConnector, options: PositionStateMachineOptions = {}) {
    this.market = market;
    this.config = config;
    this.connector = connector;
    this.auditService = options.auditService;
    this.logger = options.logger ?? createLogger('PositionStateMachine', { market: market.id });
  }

  getPosition(): Position {
    return this.position;
  }

  /**
   * Evaluates one snapshot. Read failures reject with the connector's error and leave
   * the position untouched; write failures reject with phase "write".
   */
  async step(snapshot: PriceSnapshot): Promise<StepResult> {
    const before = this.position;
    const openOrders = this.needsOpenOrders(before) ? await this.connector.getOpenOrders(this.market.id) : [];
    const { position, action } = evaluatePosition(before, snapshot, openOrders, this.config);

    if (action.type === 'none') {
      this.commit(before, position, action.reason);
      return { type: 'noAction', reason: action.reason, position };
    }

    const orderId = await this.submit(action);
    const next = applyOrderAccepted(position, action, orderId);
    this.commit(before, next, `${action.intent} order ${orderId} placed`);
    return { type: 'orderPlaced', intent: action.intent, orderId, position: next };
  }

  private needsOpenOrders(position: Position): boolean {
    return position.status === 'pending_entry' || position.status === 'pending_exit';
  }

  private async submit(action: Extract<PositionAction, { type: 'placeOrder' }>): Promise<OrderId> {
    const { order, intent } = action;
    const details = {
      intent,
      side: order.side,
      quantity: order.quantity.toString(),
      price: order.limitPrice.toString()
    };

    this.logger.info(details, `Sending ${order.side.toUpperCase()} order to ${this.connector.name}`);
    try {
      const orderId = await this.connector.placeOrder(order);
      this.auditService?.record('ORDER_PLACED', { ...details, orderId }, this.market.id, this.connector.name);
      return orderId;
    } catch (error) {
      const failure = this.asWriteFailure(error);
      this.auditService?.record(
        'ORDER_FAILED',
        { ...details, category: failure.category, error: failure.message },
        this.market.id,
        this.connector.name
      );
      throw failure;
    }
  }

  private asWriteFailure(error: unknown): ExchangeError {
    return toExchangeError(
      error,
      { operation: 'placeOrder', component: 'PositionStateMachine', marketId: this.market.id, timestamp: new Date() },
      { nonFatalErrorCodes: [], nonFatalErrorMessages: [] },
      'write'
    ).withPhase('write');
  }

  private commit(before: Position, after: Position, reason: string): void {
    this.position = after;
    if (before.status !== after.status) {
      this.logger.info({ from: before.status, to: after.status, reason }, 'Position transition');
      this.auditService?.record(
        'POSITION_TRANSITION',
        { from: before.status, to: after.status, reason, position: describePosition(after) },
        this.market.id
      );
    } else {
      this.logger.debug({ status: after.status, reason }, 'Position unchanged');
    }
  }
}

/** Categories of a write failure that leave the order's fate unknown or unrecoverable */
export function isAbortingWriteFailure(error: ExchangeError): boolean {
  return error.phase === 'write' && error.category !== ErrorCategory.TRANSIENT_NETWORK;
}
