import { createHmac, randomBytes } from 'crypto';
import { AuditDetails, AuditEvent, AuditEventType } from '../models/AuditEvent';

export interface AuditServiceOptions {
  signingKey?: Buffer;
  /** Oldest events are dropped beyond this count; 0 keeps everything */
  maxEvents?: number;
}

/**
 * Audit Service keeps a tamper-evident trail of ledger operations
 * with HMAC signatures over each recorded event
 */
export class AuditService {
  private auditLog: AuditEvent[] = [];
  private readonly signingKey: Buffer;
  private readonly maxEvents: number;
  private sequence = 0;

  constructor(options: AuditServiceOptions = {}) {
    // Use provided key or generate a new one for this session
    this.signingKey = options.signingKey ?? randomBytes(32);
    this.maxEvents = options.maxEvents ?? 0;
  }

  /**
   * Records a ledger event with a signature over its content
   */
  record(
    eventType: AuditEventType,
    details: AuditDetails,
    accountId?: string,
    assetId?: string
  ): AuditEvent {
    const redactedDetails = this.redactSensitiveData(details);

    const unsigned: Omit<AuditEvent, 'signature'> = {
      eventId: this.generateEventId(),
      sequence: ++this.sequence,
      timestamp: new Date(),
      eventType,
      accountId,
      assetId,
      details: redactedDetails
    };

    const auditEvent: AuditEvent = {
      ...unsigned,
      signature: this.generateSignature(unsigned)
    };

    // Append-only logging
    this.auditLog.push(auditEvent);
    if (this.maxEvents > 0 && this.auditLog.length > this.maxEvents) {
      this.auditLog.splice(0, this.auditLog.length - this.maxEvents);
    }

    return auditEvent;
  }

  /**
   * Exports the trail, optionally restricted to a date range
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

  getAllEvents(): AuditEvent[] {
    return [...this.auditLog];
  }

  getEventsForAsset(assetId: string): AuditEvent[] {
    return this.auditLog.filter(event => event.assetId === assetId);
  }

  /**
   * Clears audit log (for testing purposes only)
   */
  clearLog(): void {
    this.auditLog = [];
  }

  private generateEventId(): string {
    return randomBytes(16).toString('hex');
  }

  private generateSignature(eventData: Omit<AuditEvent, 'signature'>): string {
    const signingData = {
      eventId: eventData.eventId,
      sequence: eventData.sequence,
      timestamp: eventData.timestamp.toISOString(),
      eventType: eventData.eventType,
      accountId: eventData.accountId ?? null,
      assetId: eventData.assetId ?? null,
      details: eventData.details
    };

    const dataString = JSON.stringify(canonicalize(signingData));
    return createHmac('sha256', this.signingKey)
      .update(dataString)
      .digest('hex');
  }

  private redactSensitiveData(data: AuditDetails): AuditDetails {
    const sensitiveKeys = ['secret', 'password', 'privatekey', 'signingkey', 'token'];

    const redacted: AuditDetails = {};

    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase();

      if (sensitiveKeys.some(sensitiveKey => lowerKey.includes(sensitiveKey))) {
        redacted[key] = '[REDACTED]';
      } else if (isPlainRecord(value)) {
        redacted[key] = this.redactSensitiveData(value);
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }
}

function isPlainRecord(value: unknown): value is AuditDetails {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Key-sorted copy so that signatures do not depend on insertion order
 */
function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (isPlainRecord(value)) {
    const sorted: AuditDetails = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = canonicalize(value[key]);
    }
    return sorted;
  }
  return value;
}
