/**
 * Position lifecycle model for a single market
 */

import { Money } from './Money';
import type { OrderId } from './Order';

export type PositionStatus = 'flat' | 'pending_entry' | 'holding' | 'pending_exit';

export interface Position {
  readonly status: PositionStatus;
  readonly entryOrderId?: OrderId;
  readonly exitOrderId?: OrderId;
  readonly entryPrice: Money;
  readonly quantity: Money;
  readonly highWaterMark: Money;
}

export function createFlatPosition(): Position {
  return {
    status: 'flat',
    entryPrice: Money.zero(),
    quantity: Money.zero(),
    highWaterMark: Money.zero()
  };
}

export function describePosition(position: Position): Record<string, string | undefined> {
  return {
    status: position.status,
    entryOrderId: position.entryOrderId,
    exitOrderId: position.exitOrderId,
    entryPrice: position.entryPrice.toString(),
    quantity: position.quantity.toString(),
    highWaterMark: position.highWaterMark.toString()
  };
}
