/**
 * Audit event and logging models
 */

export type AuditEventType =
  | 'ASSET_CREATED'
  | 'SHARES_OFFERED'
  | 'SHARES_TRANSFERRED'
  | 'SHARES_PURCHASED'
  | 'OFFER_FILLED'
  | 'OFFER_CANCELLED'
  | 'OWNERSHIP_CLAIMED'
  | 'OPERATION_REJECTED';

export type AuditDetails = Record<string, unknown>;

export interface AuditEvent {
  eventId: string;
  sequence: number;
  timestamp: Date;
  eventType: AuditEventType;
  accountId?: string;
  assetId?: string;
  details: AuditDetails;
  signature: string;
}
