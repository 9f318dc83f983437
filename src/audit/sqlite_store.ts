import type Database from 'better-sqlite3';

import { AuditStorageError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { normalizeSymbol } from '../governance/types.js';
import { openDatabase } from './db.js';
import type { AuditEventInput, AuditLogEntry, AuditQuery, AuditStore } from './types.js';
import { isAuditEventType, toIsoTimestamp } from './types.js';

interface AuditRow {
  id: number;
  timestamp: string;
  event_type: string;
  hypothesis_id: string | null;
  constraint_id: string | null;
  symbol: string | null;
  strategy_id: string | null;
  action_details: string;
  trace_id: string | null;
}

interface InsertParams {
  timestamp: string;
  eventType: string;
  hypothesisId: string | null;
  constraintId: string | null;
  symbol: string | null;
  strategyId: string | null;
  actionDetails: string;
  traceId: string | null;
}

type QueryParams = Record<string, string | number>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rowToEntry(row: AuditRow): AuditLogEntry {
  if (!isAuditEventType(row.event_type)) {
    throw new AuditStorageError(`Audit row ${row.id} has unknown event type '${row.event_type}'`);
  }
  const details: unknown = JSON.parse(row.action_details);
  const entry: AuditLogEntry = {
    id: row.id,
    timestamp: row.timestamp,
    eventType: row.event_type,
    actionDetails: isRecord(details) ? details : {},
  };
  if (row.hypothesis_id !== null) entry.hypothesisId = row.hypothesis_id;
  if (row.constraint_id !== null) entry.constraintId = row.constraint_id;
  if (row.symbol !== null) entry.symbol = row.symbol;
  if (row.strategy_id !== null) entry.strategyId = row.strategy_id;
  if (row.trace_id !== null) entry.traceId = row.trace_id;
  return entry;
}

/**
 * Durable audit trail on better-sqlite3. The table rejects UPDATE and DELETE
 * through triggers.
 */
export class SqliteAuditStore implements AuditStore {
  private readonly db: Database.Database;

  constructor(
    db: Database.Database | string,
    private readonly logger: Logger = new Logger('info'),
    private readonly now: () => Date = () => new Date()
  ) {
    try {
      this.db = typeof db === 'string' ? openDatabase(db) : db;
    } catch (error) {
      throw new AuditStorageError(`Failed to open audit database: ${String(error)}`, { cause: error });
    }
  }

  append(event: AuditEventInput): AuditLogEntry {
    const params: InsertParams = {
      timestamp: event.timestamp ? toIsoTimestamp(event.timestamp) : this.now().toISOString(),
      eventType: event.eventType,
      hypothesisId: event.hypothesisId ?? null,
      constraintId: event.constraintId ?? null,
      symbol: event.symbol ?? null,
      strategyId: event.strategyId ?? null,
      actionDetails: JSON.stringify(event.actionDetails ?? {}),
      traceId: event.traceId ?? null,
    };
    try {
      const info = this.db
        .prepare<[InsertParams]>(
          `
            INSERT INTO governance_audit_log (
              timestamp, event_type, hypothesis_id, constraint_id,
              symbol, strategy_id, action_details, trace_id
            ) VALUES (
              @timestamp, @eventType, @hypothesisId, @constraintId,
              @symbol, @strategyId, @actionDetails, @traceId
            )
          `
        )
        .run(params);
      const id = Number(info.lastInsertRowid);
      this.logger.debug(`Audit ${event.eventType} #${id}`);
      return {
        ...event,
        id,
        timestamp: params.timestamp,
        actionDetails: event.actionDetails ?? {},
      };
    } catch (error) {
      throw new AuditStorageError(`Failed to append ${event.eventType} audit entry`, { cause: error });
    }
  }

  query(query: AuditQuery = {}): AuditLogEntry[] {
    const clauses: string[] = [];
    const params: QueryParams = {};
    if (query.symbol !== undefined) {
      clauses.push('symbol = @symbol');
      params.symbol = normalizeSymbol(query.symbol);
    }
    if (query.constraintId !== undefined) {
      clauses.push('constraint_id = @constraintId');
      params.constraintId = query.constraintId;
    }
    if (query.hypothesisId !== undefined) {
      clauses.push('hypothesis_id = @hypothesisId');
      params.hypothesisId = query.hypothesisId;
    }
    if (query.strategyId !== undefined) {
      clauses.push('strategy_id = @strategyId');
      params.strategyId = query.strategyId;
    }
    if (query.eventType !== undefined) {
      clauses.push('event_type = @eventType');
      params.eventType = query.eventType;
    }
    if (query.from !== undefined) {
      clauses.push('timestamp >= @from');
      params.from = toIsoTimestamp(query.from);
    }
    if (query.to !== undefined) {
      clauses.push('timestamp <= @to');
      params.to = toIsoTimestamp(query.to);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const limit = query.limit !== undefined ? 'LIMIT @limit' : '';
    if (query.limit !== undefined) {
      params.limit = query.limit;
    }

    try {
      const rows = this.db
        .prepare<[QueryParams], AuditRow>(
          `
            SELECT id, timestamp, event_type, hypothesis_id, constraint_id,
                   symbol, strategy_id, action_details, trace_id
            FROM governance_audit_log
            ${where}
            ORDER BY timestamp ASC, id ASC
            ${limit}
          `
        )
        .all(params);
      return rows.map(rowToEntry);
    } catch (error) {
      if (error instanceof AuditStorageError) throw error;
      throw new AuditStorageError('Failed to query audit log', { cause: error });
    }
  }

  count(): number {
    const row = this.db
      .prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM governance_audit_log')
      .get();
    return row?.total ?? 0;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
