/**
 * Gemini Exchange Connector Implementation
 * Implements the Exchange Connector interface for Gemini spot trading (REST API v1)
 */

import { createHmac, randomUUID } from 'crypto';
import { z } from 'zod';
import { BaseExchangeConnector, type ConnectorOptions, type WriteConfirmation } from '../ExchangeConnector';
import { Money } from '../../models/Money';
import type { BalanceInfo, OrderBook, OrderBookEntry, Ticker } from '../../models/Market';
import type { OpenOrder, OrderId, OrderRequest } from '../../models/Order';
import { TransportFailure, insufficientMarketDataError } from '../../utils/ErrorHandler';

export const GEMINI_DEFAULT_BASE_URL = 'https://api.gemini.com';

export interface GeminiConnectorOptions extends ConnectorOptions {
  baseUrl?: string;
  bookDepth?: number;
}

/**
 * Gemini API response structures
 */
const decimalString = z.string().transform((value, ctx) => {
  const parsed = Money.tryParse(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a decimal: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

const tickerSchema = z.object({
  bid: decimalString,
  ask: decimalString,
  last: decimalString
});

const bookLevelSchema = z.object({
  price: decimalString,
  amount: decimalString
});

const bookSchema = z.object({
  bids: z.array(bookLevelSchema),
  asks: z.array(bookLevelSchema)
});

const orderSchema = z.object({
  order_id: z.string(),
  symbol: z.string(),
  side: z.enum(['buy', 'sell']),
  price: decimalString,
  original_amount: decimalString,
  remaining_amount: decimalString,
  is_live: z.boolean(),
  is_cancelled: z.boolean(),
  client_order_id: z.string().optional()
});

type GeminiOrder = z.infer<typeof orderSchema>;

const orderStatusSchema = z.union([orderSchema, z.array(orderSchema)]);

const balanceSchema = z.object({
  type: z.string(),
  currency: z.string(),
  amount: decimalString,
  available: decimalString
});

const errorBodySchema = z.object({
  reason: z.string().optional(),
  message: z.string().optional()
});

const ORDER_NOT_FOUND = 'OrderNotFound';

/**
 * Gemini Exchange Connector
 */
export class GeminiConnector extends BaseExchangeConnector {
  private readonly baseUrl: string;
  private readonly bookDepth: number;
  private lastNonce = 0;

  constructor(options: GeminiConnectorOptions) {
    super('gemini', 'Gemini', options);
    this.baseUrl = (options.baseUrl ?? GEMINI_DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.bookDepth = options.bookDepth ?? 25;
  }

  async getLatestPrice(marketId: string): Promise<Money> {
    const ticker = await this.getTicker(marketId);
    return ticker.last;
  }

  async getTicker(marketId: string): Promise<Ticker> {
    return this.executeRead('getTicker', marketId, async signal => {
      const data = tickerSchema.parse(
        await this.publicGet(`/v1/pubticker/${this.formatSymbol(marketId)}`, signal)
      );
      return { marketId, bid: data.bid, ask: data.ask, last: data.last, observedAt: new Date() };
    });
  }

  async getOrderBook(marketId: string): Promise<OrderBook> {
    const book = await this.executeRead('getOrderBook', marketId, async signal => {
      const data = bookSchema.parse(
        await this.publicGet(
          `/v1/book/${this.formatSymbol(marketId)}?limit_bids=${this.bookDepth}&limit_asks=${this.bookDepth}`,
          signal
        )
      );
      const toEntry = (level: { price: Money; amount: Money }): OrderBookEntry => ({
        price: level.price,
        quantity: level.amount
      });
      return {
        marketId,
        bids: data.bids.map(toEntry),
        asks: data.asks.map(toEntry),
        observedAt: new Date()
      };
    });

    if (book.bids.length === 0 || book.asks.length === 0) {
      const side = book.bids.length === 0 ? 'bid' : 'ask';
      throw insufficientMarketDataError(
        this.errorContext('getOrderBook', marketId),
        `Exchange returned an empty ${side} side for ${marketId}`
      );
    }

    return book;
  }

  async getOpenOrders(marketId: string): Promise<OpenOrder[]> {
    return this.executeRead('getOpenOrders', marketId, async signal => {
      const orders = z.array(orderSchema).parse(await this.privatePost('/v1/orders', {}, signal));
      const symbol = this.formatSymbol(marketId);
      return orders
        .filter(order => order.symbol.toLowerCase() === symbol && order.is_live)
        .map(order => this.toOpenOrder(order, marketId));
    });
  }

  async placeOrder(request: OrderRequest): Promise<OrderId> {
    const clientOrderId = randomUUID();
    const params = {
      client_order_id: clientOrderId,
      symbol: this.formatSymbol(request.marketId),
      amount: request.quantity.toString(),
      price: request.limitPrice.toString(),
      side: request.side,
      type: 'exchange limit'
    };

    const orderId = await this.executeWrite(
      'placeOrder',
      request.marketId,
      async signal => orderSchema.parse(await this.privatePost('/v1/order/new', params, signal)).order_id,
      signal => this.confirmPlacedOrder(clientOrderId, signal)
    );

    this.logger.info(
      {
        marketId: request.marketId,
        side: request.side,
        quantity: request.quantity.toString(),
        price: request.limitPrice.toString(),
        orderId
      },
      'Order placed'
    );
    return orderId;
  }

  async cancelOrder(orderId: OrderId, marketId: string): Promise<boolean> {
    return this.executeWrite(
      'cancelOrder',
      marketId,
      async signal => {
        const order = orderSchema.parse(
          await this.privatePost('/v1/order/cancel', { order_id: Number(orderId) }, signal)
        );
        return order.is_cancelled;
      },
      signal => this.confirmCancelledOrder(orderId, signal)
    );
  }

  async getBalances(): Promise<BalanceInfo> {
    return this.executeRead('getBalances', undefined, async signal => {
      const balances = z.array(balanceSchema).parse(await this.privatePost('/v1/balances', {}, signal));
      const info: BalanceInfo = new Map();
      for (const balance of balances) {
        if (balance.type !== 'exchange') {
          continue;
        }
        info.set(balance.currency.toUpperCase(), {
          available: balance.available,
          onHold: balance.amount.minus(balance.available)
        });
      }
      return info;
    });
  }

  protected describeErrorBody(statusCode: number, body: string): string {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      return super.describeErrorBody(statusCode, body);
    }
    const result = errorBodySchema.safeParse(parsed);
    if (!result.success || (!result.data.reason && !result.data.message)) {
      return super.describeErrorBody(statusCode, body);
    }
    return `HTTP ${statusCode} ${result.data.reason ?? 'Error'}: ${result.data.message ?? ''}`.trim();
  }

  /**
   * Looks the order up by the client id sent with it. Not found means the
   * placement never reached the book.
   */
  private async confirmPlacedOrder(clientOrderId: string, signal: AbortSignal): Promise<WriteConfirmation<OrderId>> {
    const found = await this.lookupOrder({ client_order_id: clientOrderId }, signal);
    return found ? { applied: true, result: found.order_id } : { applied: false };
  }

  /**
   * A cancel is settled once the order is cancelled or no longer live (filled).
   */
  private async confirmCancelledOrder(orderId: OrderId, signal: AbortSignal): Promise<WriteConfirmation<boolean>> {
    const found = await this.lookupOrder({ order_id: Number(orderId) }, signal);
    if (!found) {
      return { applied: true, result: false };
    }
    if (found.is_cancelled) {
      return { applied: true, result: true };
    }
    if (!found.is_live) {
      return { applied: true, result: false };
    }
    return { applied: false };
  }

  private async lookupOrder(
    params: Record<string, string | number>,
    signal: AbortSignal
  ): Promise<GeminiOrder | undefined> {
    try {
      const data = orderStatusSchema.parse(await this.privatePost('/v1/order/status', params, signal));
      return Array.isArray(data) ? data[0] : data;
    } catch (error) {
      if (error instanceof TransportFailure && error.message.includes(ORDER_NOT_FOUND)) {
        return undefined;
      }
      throw error;
    }
  }

  private publicGet(path: string, signal: AbortSignal): Promise<unknown> {
    return this.sendRequest(`${this.baseUrl}${path}`, { method: 'GET' }, signal);
  }

  private privatePost(
    path: string,
    params: Record<string, string | number>,
    signal: AbortSignal
  ): Promise<unknown> {
    const body = {
      request: path,
      nonce: this.nextNonce().toString(),
      ...params
    };

    const payload = Buffer.from(JSON.stringify(body)).toString('base64');
    const signature = this.generateSignature(payload);

    return this.sendRequest(
      `${this.baseUrl}${path}`,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'text/plain',
          'Content-Length': '0',
          'Cache-Control': 'no-cache',
          'X-GEMINI-APIKEY': this.credentials.apiKey,
          'X-GEMINI-PAYLOAD': payload,
          'X-GEMINI-SIGNATURE': signature
        }
      },
      signal
    );
  }

  /**
   * Gemini rejects a nonce that is not greater than the previous one
   */
  private nextNonce(): number {
    this.lastNonce = Math.max(Date.now(), this.lastNonce + 1);
    return this.lastNonce;
  }

  /**
   * Generate HMAC signature for Gemini API
   */
  private generateSignature(payload: string): string {
    return createHmac('sha384', this.credentials.secret).update(payload).digest('hex');
  }

  /**
   * Format symbol for Gemini API, e.g. "BTC/USD" -> "btcusd"
   */
  private formatSymbol(marketId: string): string {
    return marketId.replace('/', '').toLowerCase();
  }

  private toOpenOrder(order: GeminiOrder, marketId: string): OpenOrder {
    return {
      id: order.order_id,
      marketId,
      side: order.side,
      price: order.price,
      quantity: order.remaining_amount
    };
  }
}
