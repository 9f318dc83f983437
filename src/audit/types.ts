import type { AuditEventType } from '../governance/types.js';
import { AUDIT_EVENT_TYPES } from '../governance/types.js';

export interface AuditLogEntry {
  id: number;
  /** ISO-8601 UTC. */
  timestamp: string;
  eventType: AuditEventType;
  hypothesisId?: string;
  constraintId?: string;
  symbol?: string;
  strategyId?: string;
  actionDetails: Record<string, unknown>;
  traceId?: string;
}

export type AuditEventInput = Omit<AuditLogEntry, 'id' | 'timestamp' | 'actionDetails'> & {
  timestamp?: string;
  actionDetails?: Record<string, unknown>;
};

export interface AuditQuery {
  symbol?: string;
  from?: Date | string;
  to?: Date | string;
  constraintId?: string;
  hypothesisId?: string;
  strategyId?: string;
  eventType?: AuditEventType;
  limit?: number;
}

/**
 * Append-only governance audit trail with no update or
 * delete. Query results are ordered by (timestamp, id) ascending.
 */
export interface AuditStore {
  append(event: AuditEventInput): AuditLogEntry;
  query(query?: AuditQuery): AuditLogEntry[];
  count(): number;
  close(): void;
}

export function toIsoTimestamp(value: Date | string): string {
  return typeof value === 'string' ? new Date(value).toISOString() : value.toISOString();
}

export function isAuditEventType(value: string): value is AuditEventType {
  return AUDIT_EVENT_TYPES.some((type) => type === value);
}
