/**
 * Order models shared by connectors and the position state machine
 */

import type { Money } from './Money';

export type OrderSide = 'buy' | 'sell';

/** Opaque identifier assigned by the exchange */
export type OrderId = string;

export interface OrderRequest {
  marketId: string;
  side: OrderSide;
  quantity: Money;
  limitPrice: Money;
}

export interface OpenOrder {
  id: OrderId;
  marketId: string;
  side: OrderSide;
  price: Money;
  quantity: Money;
}

export function isOrderOpen(orderId: OrderId | undefined, openOrders: readonly OpenOrder[]): boolean {
  return orderId !== undefined && openOrders.some(order => order.id === orderId);
}
