import { createHmac, randomBytes } from 'crypto';
import type { AuditEvent, AuditEventType } from '../models/AuditEvent';

const SENSITIVE_KEYS = ['apikey', 'secret', 'password', 'privatekey', 'credential', 'token', 'signature'];

/**
 * Audit Service keeps a tamper-evident, append-only trail of every order the
 * bot submits and every abort it raises, signed with HMAC-SHA256
 */
export class AuditService {
  private auditLog: AuditEvent[] = [];
  private readonly signingKey: Buffer;

  constructor(signingKey?: Buffer) {
    // Use provided key or generate a new one for this session
    this.signingKey = signingKey ?? randomBytes(32);
  }

  record(
    eventType: AuditEventType,
    details: Record<string, unknown>,
    marketId?: string,
    venueId?: string
  ): string {
    const eventId = randomBytes(16).toString('hex');
    const timestamp = new Date();
    const redactedDetails = this.redactSensitiveData(details);

    const signature = this.generateSignature({
      eventId,
      timestamp,
      eventType,
      marketId,
      venueId,
      details: redactedDetails
    });

    this.auditLog.push({
      eventId,
      timestamp,
      eventType,
      marketId,
      venueId,
      details: redactedDetails,
      signature
    });

    return eventId;
  }

  /**
   * Exports audit log, optionally restricted to a date range
   */
  exportAuditLog(startDate?: Date, endDate?: Date): AuditEvent[] {
    return this.auditLog
      .filter(event => {
        if (startDate && event.timestamp < startDate) return false;
        if (endDate && event.timestamp > endDate) return false;
        return true;
      })
      .map(event => ({ ...event, details: { ...event.details } }));
  }

  /**
   * Verifies the integrity of audit log entries
   */
  verifyLogIntegrity(): boolean {
    return this.auditLog.every(event => {
      const { signature, ...unsigned } = event;
      return signature === this.generateSignature(unsigned);
    });
  }

  getEvents(eventType?: AuditEventType): AuditEvent[] {
    return this.auditLog.filter(event => eventType === undefined || event.eventType === eventType);
  }

  private generateSignature(eventData: Omit<AuditEvent, 'signature'>): string {
    // Deterministic representation: fixed field order, sorted detail keys
    const signingData = JSON.stringify([
      eventData.eventId,
      eventData.timestamp.toISOString(),
      eventData.eventType,
      eventData.marketId ?? null,
      eventData.venueId ?? null,
      stableStringify(eventData.details)
    ]);

    return createHmac('sha256', this.signingKey).update(signingData).digest('hex');
  }

  private redactSensitiveData(data: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase();

      if (SENSITIVE_KEYS.some(sensitiveKey => lowerKey.includes(sensitiveKey))) {
        redacted[key] = '[REDACTED]';
      } else if (isPlainRecord(value)) {
        redacted[key] = this.redactSensitiveData(value);
      } else if (Array.isArray(value)) {
        redacted[key] = value.map(item => (isPlainRecord(item) ? this.redactSensitiveData(item) : item));
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }
}

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  if (isPlainRecord(value)) {
    const entries = Object.keys(value)
      .sort()
      .filter(key => value[key] !== undefined)
      .map(key => `${JSON.stringify(key)}:${stableStringify(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}
