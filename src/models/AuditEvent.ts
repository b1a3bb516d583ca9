/**
 * Audit event models
 */

export type AuditEventType =
  | 'ORDER_PLACED'
  | 'ORDER_FAILED'
  | 'POSITION_TRANSITION'
  | 'FATAL_ABORT';

export interface AuditEvent {
  eventId: string;
  timestamp: Date;
  eventType: AuditEventType;
  marketId?: string;
  venueId?: string;
  details: Record<string, unknown>;
  signature: string;
}
