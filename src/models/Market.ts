/**
 * Market and market data models
 */

import type { Money } from './Money';

export interface Market {
  /** Exchange symbol, e.g. "btcusd" */
  id: string;
  name: string;
  baseCurrency: string;
  counterCurrency: string;
}

export interface OrderBookEntry {
  price: Money;
  quantity: Money;
}

/**
 * Both sides are ordered best-first: highest bid, lowest ask.
 */
export interface OrderBook {
  marketId: string;
  bids: OrderBookEntry[];
  asks: OrderBookEntry[];
  observedAt: Date;
}

export interface Ticker {
  marketId: string;
  bid: Money;
  ask: Money;
  last: Money;
  observedAt: Date;
}

export interface PriceSnapshot {
  readonly marketId: string;
  readonly bid: Money;
  readonly ask: Money;
  readonly observedAt: Date;
}

export interface Balance {
  available: Money;
  onHold: Money;
}

/** Keyed by upper-case currency code */
export type BalanceInfo = Map<string, Balance>;

export function createPriceSnapshot(marketId: string, bid: Money, ask: Money, observedAt: Date): PriceSnapshot {
  return Object.freeze({ marketId, bid, ask, observedAt });
}
