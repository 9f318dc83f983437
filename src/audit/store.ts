import { Logger } from '../core/logger.js';
import { normalizeSymbol } from '../governance/types.js';
import type { AuditEventInput, AuditLogEntry, AuditQuery, AuditStore } from './types.js';
import { toIsoTimestamp } from './types.js';

export function matchesQuery(entry: AuditLogEntry, query: AuditQuery, from?: string, to?: string): boolean {
  if (query.symbol !== undefined && entry.symbol !== normalizeSymbol(query.symbol)) return false;
  if (query.constraintId !== undefined && entry.constraintId !== query.constraintId) return false;
  if (query.hypothesisId !== undefined && entry.hypothesisId !== query.hypothesisId) return false;
  if (query.strategyId !== undefined && entry.strategyId !== query.strategyId) return false;
  if (query.eventType !== undefined && entry.eventType !== query.eventType) return false;
  if (from !== undefined && entry.timestamp < from) return false;
  if (to !== undefined && entry.timestamp > to) return false;
  return true;
}

export class InMemoryAuditStore implements AuditStore {
  private entries: AuditLogEntry[] = [];
  private nextId = 1;

  constructor(
    private readonly logger: Logger = new Logger('info'),
    private readonly now: () => Date = () => new Date()
  ) {}

  append(event: AuditEventInput): AuditLogEntry {
    const entry: AuditLogEntry = {
      ...event,
      id: this.nextId,
      timestamp: event.timestamp ? toIsoTimestamp(event.timestamp) : this.now().toISOString(),
      actionDetails: structuredClone(event.actionDetails ?? {}),
    };
    this.nextId += 1;
    this.entries.push(Object.freeze(entry));
    this.logger.debug(`Audit ${entry.eventType} #${entry.id}`);
    return entry;
  }

  query(query: AuditQuery = {}): AuditLogEntry[] {
    const from = query.from !== undefined ? toIsoTimestamp(query.from) : undefined;
    const to = query.to !== undefined ? toIsoTimestamp(query.to) : undefined;
    const results = this.entries
      .filter((entry) => matchesQuery(entry, query, from, to))
      .sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : a.id - b.id));
    return query.limit !== undefined ? results.slice(0, query.limit) : results;
  }

  count(): number {
    return this.entries.length;
  }

  close(): void {
    // Nothing to release.
  }
}
