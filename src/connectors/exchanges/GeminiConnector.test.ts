/**
 * Tests for the Gemini connector against a stubbed fetch
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { createHmac } from 'crypto';
import { z } from 'zod';
import { GeminiConnector } from './GeminiConnector';
import { Money } from '../../models/Money';
import { ErrorCategory, ExchangeError } from '../../utils/ErrorHandler';

interface RecordedCall {
  url: string;
  path: string;
  headers: Headers;
  payload?: Record<string, unknown>;
}

type Handler = (call: RecordedCall) => Response;

const json =
  (body: unknown, status = 200): Handler =>
  () =>
    new Response(JSON.stringify(body), { status });

const payloadSchema = z.record(z.unknown());

function stubExchange(routes: Record<string, Handler | Handler[]>): RecordedCall[] {
  const calls: RecordedCall[] = [];
  vi.stubGlobal('fetch', async (url: string, init: RequestInit = {}) => {
    const headers = new Headers(init.headers);
    const encoded = headers.get('X-GEMINI-PAYLOAD');
    const call: RecordedCall = {
      url,
      path: new URL(url).pathname,
      headers,
      payload: encoded ? payloadSchema.parse(JSON.parse(Buffer.from(encoded, 'base64').toString('utf8'))) : undefined
    };
    calls.push(call);

    const route = routes[call.path];
    const handler = Array.isArray(route) ? route.shift() : route;
    return handler ? handler(call) : new Response('{"reason":"NotMocked"}', { status: 404 });
  });
  return calls;
}

function createConnector(): GeminiConnector {
  return new GeminiConnector({
    baseUrl: 'https://api.gemini.test/',
    credentials: { apiKey: 'test-key', secret: 'test-secret' },
    network: { connectionTimeoutSeconds: 5, nonFatalErrorCodes: [503], nonFatalErrorMessages: [] },
    retry: { maxRetries: 2, baseDelay: 0, maxDelay: 0 },
    rateLimiter: { requestsPerSecond: 1000 }
  });
}

function geminiOrder(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    order_id: '12345',
    symbol: 'btcusd',
    side: 'buy',
    type: 'exchange limit',
    price: '100.25',
    original_amount: '0.5',
    remaining_amount: '0.5',
    executed_amount: '0',
    is_live: true,
    is_cancelled: false,
    ...overrides
  };
}

async function rejectionOf(promise: Promise<unknown>): Promise<ExchangeError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ExchangeError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the call to reject');
}

describe('GeminiConnector', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('market data', () => {
    it('parses the ticker', async () => {
      const calls = stubExchange({
        '/v1/pubticker/btcusd': json({ bid: '100.5', ask: '101', last: '100.75', volume: { BTC: '12' } })
      });

      const ticker = await createConnector().getTicker('btcusd');

      expect(calls[0].url).toBe('https://api.gemini.test/v1/pubticker/btcusd');
      expect(ticker.bid.toString()).toBe('100.5');
      expect(ticker.ask.toString()).toBe('101');
      expect(ticker.last.toString()).toBe('100.75');
    });

    it('returns the last price as the latest price', async () => {
      stubExchange({ '/v1/pubticker/btcusd': json({ bid: '1', ask: '2', last: '1.5' }) });
      expect((await createConnector().getLatestPrice('btcusd')).toString()).toBe('1.5');
    });

    it('parses both sides of the order book', async () => {
      const calls = stubExchange({
        '/v1/book/btcusd': json({
          bids: [
            { price: '100', amount: '1.5', timestamp: '1700000000' },
            { price: '99.5', amount: '2', timestamp: '1700000000' }
          ],
          asks: [{ price: '101', amount: '0.25', timestamp: '1700000000' }]
        })
      });

      const book = await createConnector().getOrderBook('btcusd');

      expect(calls[0].url).toBe('https://api.gemini.test/v1/book/btcusd?limit_bids=25&limit_asks=25');
      expect(book.bids.map(level => level.price.toString())).toEqual(['100', '99.5']);
      expect(book.bids[0].quantity.toString()).toBe('1.5');
      expect(book.asks[0].price.toString()).toBe('101');
    });

    it('reports an empty side as insufficient market data', async () => {
      stubExchange({ '/v1/book/btcusd': json({ bids: [{ price: '100', amount: '1' }], asks: [] }) });

      const error = await rejectionOf(createConnector().getOrderBook('btcusd'));

      expect(error.category).toBe(ErrorCategory.INSUFFICIENT_MARKET_DATA);
      expect(error.message).toBe('Exchange returned an empty ask side for btcusd');
    });

    it('treats a malformed response as fatal', async () => {
      stubExchange({ '/v1/pubticker/btcusd': json({ bid: '100.5', last: '100.75' }) });

      const error = await rejectionOf(createConnector().getTicker('btcusd'));

      expect(error.category).toBe(ErrorCategory.FATAL);
      expect(error.code).toBe('UNEXPECTED_ERROR');
    });
  });

  describe('authenticated requests', () => {
    it('signs the base64 payload with HMAC-SHA384', async () => {
      const calls = stubExchange({ '/v1/order/new': json(geminiOrder()) });

      const orderId = await createConnector().placeOrder({
        marketId: 'btcusd',
        side: 'buy',
        quantity: Money.of('0.5'),
        limitPrice: Money.of('100.25')
      });

      expect(orderId).toBe('12345');
      const { headers, payload } = calls[0];
      const encoded = headers.get('X-GEMINI-PAYLOAD') ?? '';
      expect(headers.get('X-GEMINI-APIKEY')).toBe('test-key');
      expect(headers.get('X-GEMINI-SIGNATURE')).toBe(createHmac('sha384', 'test-secret').update(encoded).digest('hex'));
      expect(payload).toMatchObject({
        request: '/v1/order/new',
        symbol: 'btcusd',
        amount: '0.5',
        price: '100.25',
        side: 'buy',
        type: 'exchange limit'
      });
      expect(typeof payload?.client_order_id).toBe('string');
    });

    it('sends a strictly increasing nonce', async () => {
      const calls = stubExchange({ '/v1/balances': [json([]), json([])] });
      const connector = createConnector();

      await connector.getBalances();
      await connector.getBalances();

      const nonces = calls.map(call => Number(call.payload?.nonce));
      expect(nonces[1]).toBeGreaterThan(nonces[0]);
    });

    it('keeps only live orders for the requested market', async () => {
      stubExchange({
        '/v1/orders': json([
          geminiOrder({ order_id: '1', remaining_amount: '0.2' }),
          geminiOrder({ order_id: '2', symbol: 'ethusd' }),
          geminiOrder({ order_id: '3', is_live: false })
        ])
      });

      const orders = await createConnector().getOpenOrders('btcusd');

      expect(orders).toHaveLength(1);
      expect(orders[0].id).toBe('1');
      expect(orders[0].quantity.toString()).toBe('0.2');
      expect(orders[0].price.toString()).toBe('100.25');
    });

    it('reads exchange balances keyed by upper-case currency', async () => {
      stubExchange({
        '/v1/balances': json([
          { type: 'exchange', currency: 'BTC', amount: '2', available: '1.5', availableForWithdrawal: '1.5' },
          { type: 'exchange', currency: 'usd', amount: '100', available: '100' },
          { type: 'custody', currency: 'ETH', amount: '5', available: '5' }
        ])
      });

      const balances = await createConnector().getBalances();

      expect([...balances.keys()]).toEqual(['BTC', 'USD']);
      expect(balances.get('BTC')?.available.toString()).toBe('1.5');
      expect(balances.get('BTC')?.onHold.toString()).toBe('0.5');
    });

    it('reports the exchange reason for rejected requests', async () => {
      stubExchange({
        '/v1/balances': json({ result: 'error', reason: 'InvalidSignature', message: 'InvalidSignature' }, 400)
      });

      const error = await rejectionOf(createConnector().getBalances());

      expect(error.category).toBe(ErrorCategory.FATAL);
      expect(error.statusCode).toBe(400);
      expect(error.message).toBe('getBalances failed: HTTP 400 InvalidSignature: InvalidSignature');
    });

    it('cancels by numeric order id', async () => {
      const calls = stubExchange({ '/v1/order/cancel': json(geminiOrder({ is_live: false, is_cancelled: true })) });

      expect(await createConnector().cancelOrder('12345', 'btcusd')).toBe(true);
      expect(calls[0].payload?.order_id).toBe(12345);
    });
  });

  describe('write confirmation', () => {
    it('returns the order found by client order id after a transient placement failure', async () => {
      const calls = stubExchange({
        '/v1/order/new': json({ reason: 'Maintenance', message: 'Try again' }, 503),
        '/v1/order/status': call => new Response(JSON.stringify(geminiOrder({ order_id: '777', client_order_id: call.payload?.client_order_id })))
      });

      const orderId = await createConnector().placeOrder({
        marketId: 'btcusd',
        side: 'sell',
        quantity: Money.of(1),
        limitPrice: Money.of(101)
      });

      expect(orderId).toBe('777');
      expect(calls.map(call => call.path)).toEqual(['/v1/order/new', '/v1/order/status']);
      expect(calls[1].payload?.client_order_id).toBe(calls[0].payload?.client_order_id);
    });

    it('places the order again when the exchange has no record of it', async () => {
      const calls = stubExchange({
        '/v1/order/new': [json({ reason: 'Maintenance', message: 'Try again' }, 503), json(geminiOrder({ order_id: '888' }))],
        '/v1/order/status': json({ result: 'error', reason: 'OrderNotFound', message: 'Order not found' }, 400)
      });

      const orderId = await createConnector().placeOrder({
        marketId: 'btcusd',
        side: 'buy',
        quantity: Money.of(1),
        limitPrice: Money.of(100)
      });

      expect(orderId).toBe('888');
      expect(calls.map(call => call.path)).toEqual(['/v1/order/new', '/v1/order/status', '/v1/order/new']);
    });

    it('escalates when the confirmation read fails', async () => {
      stubExchange({
        '/v1/order/new': json({ reason: 'Maintenance', message: 'Try again' }, 503),
        '/v1/order/status': json({ reason: 'InvalidSignature', message: 'InvalidSignature' }, 400)
      });

      const error = await rejectionOf(
        createConnector().placeOrder({ marketId: 'btcusd', side: 'buy', quantity: Money.of(1), limitPrice: Money.of(100) })
      );

      expect(error.category).toBe(ErrorCategory.AMBIGUOUS_WRITE_OUTCOME);
      expect(error.phase).toBe('write');
    });

    it('treats a filled order as settled when a cancel fails transiently', async () => {
      stubExchange({
        '/v1/order/cancel': json({ reason: 'Maintenance', message: 'Try again' }, 503),
        '/v1/order/status': json(geminiOrder({ is_live: false, remaining_amount: '0' }))
      });

      expect(await createConnector().cancelOrder('12345', 'btcusd')).toBe(false);
    });
  });
});
