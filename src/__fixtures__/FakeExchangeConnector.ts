/**
 * In-process exchange used by the service tests. Each method can be overridden per test.
 */

import type { IExchangeConnector } from '../connectors/ExchangeConnector';
import { Money } from '../models/Money';
import type { BalanceInfo, Market, OrderBook, OrderBookEntry, Ticker } from '../models/Market';
import type { OpenOrder, OrderId, OrderRequest } from '../models/Order';
import { ErrorCategory, ExchangeError, type OperationPhase } from '../utils/ErrorHandler';

export const BTC_USD: Market = { id: 'btcusd', name: 'BTC/USD', baseCurrency: 'BTC', counterCurrency: 'USD' };
export const ETH_USD: Market = { id: 'ethusd', name: 'ETH/USD', baseCurrency: 'ETH', counterCurrency: 'USD' };

export function level(price: string | number, quantity: string | number = 1): OrderBookEntry {
  return { price: Money.of(price), quantity: Money.of(quantity) };
}

export function exchangeError(category: ErrorCategory, message: string, phase: OperationPhase = 'read'): ExchangeError {
  return new ExchangeError(message, 'TEST', category, { operation: 'test', component: 'FakeExchange', timestamp: new Date() }, { phase });
}

export class FakeExchangeConnector implements IExchangeConnector {
  public readonly name = 'Fake';
  public bids: OrderBookEntry[] = [level(100)];
  public asks: OrderBookEntry[] = [level(101)];
  public openOrders: OpenOrder[] = [];
  public placed: OrderRequest[] = [];
  public calls: string[] = [];

  public orderBookHandler?: (marketId: string) => Promise<OrderBook>;
  public placeOrderHandler?: (request: OrderRequest) => Promise<OrderId>;

  async getLatestPrice(marketId: string): Promise<Money> {
    this.calls.push(`getLatestPrice:${marketId}`);
    return this.asks[0]?.price ?? Money.zero();
  }

  async getTicker(marketId: string): Promise<Ticker> {
    this.calls.push(`getTicker:${marketId}`);
    const bid = this.bids[0]?.price ?? Money.zero();
    const ask = this.asks[0]?.price ?? Money.zero();
    return { marketId, bid, ask, last: bid, observedAt: new Date() };
  }

  async getOrderBook(marketId: string): Promise<OrderBook> {
    this.calls.push(`getOrderBook:${marketId}`);
    if (this.orderBookHandler) {
      return this.orderBookHandler(marketId);
    }
    return { marketId, bids: [...this.bids], asks: [...this.asks], observedAt: new Date() };
  }

  async getOpenOrders(marketId: string): Promise<OpenOrder[]> {
    this.calls.push(`getOpenOrders:${marketId}`);
    return this.openOrders.filter(order => order.marketId === marketId);
  }

  async placeOrder(request: OrderRequest): Promise<OrderId> {
    this.calls.push(`placeOrder:${request.marketId}`);
    if (this.placeOrderHandler) {
      return this.placeOrderHandler(request);
    }
    this.placed.push(request);
    return `order-${this.placed.length}`;
  }

  async cancelOrder(orderId: OrderId, marketId: string): Promise<boolean> {
    this.calls.push(`cancelOrder:${marketId}`);
    this.openOrders = this.openOrders.filter(order => order.id !== orderId);
    return true;
  }

  async getBalances(): Promise<BalanceInfo> {
    this.calls.push('getBalances');
    return new Map([
      ['BTC', { available: Money.of('0.5'), onHold: Money.zero() }],
      ['USD', { available: Money.of(1000), onHold: Money.of(20) }]
    ]);
  }

  /** Marks a placed order as resting on the book */
  rest(orderId: OrderId, request: OrderRequest): void {
    this.openOrders.push({
      id: orderId,
      marketId: request.marketId,
      side: request.side,
      price: request.limitPrice,
      quantity: request.quantity
    });
  }
}
