/**
 * Paper trading connector for dry runs.
 * Market data comes from a live connector; authenticated calls are stubbed and never trade.
 */

import { randomUUID } from 'crypto';
import type { IExchangeConnector } from '../ExchangeConnector';
import { Money } from '../../models/Money';
import type { BalanceInfo, Market, OrderBook, Ticker } from '../../models/Market';
import type { OpenOrder, OrderId, OrderRequest } from '../../models/Order';
import { createLogger, type Logger } from '../../utils/logger';

export interface PaperConnectorOptions {
  markets: Market[];
  balance?: Money;
  logger?: Logger;
}

export interface PaperOrder extends OrderRequest {
  id: OrderId;
  placedAt: Date;
}

export class PaperConnector implements IExchangeConnector {
  public readonly name: string;
  private readonly marketData: IExchangeConnector;
  private readonly currencies: Set<string>;
  private readonly balance: Money;
  private readonly logger: Logger;
  private placedOrders: PaperOrder[] = [];

  constructor(marketData: IExchangeConnector, options: PaperConnectorOptions) {
    this.marketData = marketData;
    this.name = `Paper (${marketData.name} market data)`;
    this.balance = options.balance ?? Money.of(100);
    this.currencies = new Set(
      options.markets.flatMap(market => [market.baseCurrency.toUpperCase(), market.counterCurrency.toUpperCase()])
    );
    this.logger = options.logger ?? createLogger('PaperConnector');
  }

  getLatestPrice(marketId: string): Promise<Money> {
    return this.marketData.getLatestPrice(marketId);
  }

  getTicker(marketId: string): Promise<Ticker> {
    return this.marketData.getTicker(marketId);
  }

  getOrderBook(marketId: string): Promise<OrderBook> {
    return this.marketData.getOrderBook(marketId);
  }

  /**
   * Paper orders fill the moment they are placed, so nothing ever rests on the book
   */
  async getOpenOrders(_marketId: string): Promise<OpenOrder[]> {
    return [];
  }

  async placeOrder(request: OrderRequest): Promise<OrderId> {
    const id = `PAPER-${randomUUID()}`;
    this.placedOrders.push({ ...request, id, placedAt: new Date() });
    this.logger.info(
      {
        marketId: request.marketId,
        side: request.side,
        quantity: request.quantity.toString(),
        price: request.limitPrice.toString(),
        orderId: id
      },
      'Paper order accepted'
    );
    return id;
  }

  async cancelOrder(_orderId: OrderId, _marketId: string): Promise<boolean> {
    return true;
  }

  async getBalances(): Promise<BalanceInfo> {
    const info: BalanceInfo = new Map();
    for (const currency of this.currencies) {
      info.set(currency, { available: this.balance, onHold: Money.zero() });
    }
    return info;
  }

  /**
   * Every order accepted so far, oldest first
   */
  getPlacedOrders(): PaperOrder[] {
    return [...this.placedOrders];
  }
}
