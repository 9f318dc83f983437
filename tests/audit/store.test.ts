import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { openDatabase } from '../../src/audit/db.js';
import { SqliteAuditStore } from '../../src/audit/sqlite_store.js';
import { InMemoryAuditStore } from '../../src/audit/store.js';
import type { AuditStore } from '../../src/audit/types.js';
import { isAuditEventType } from '../../src/audit/types.js';
import { AuditStorageError } from '../../src/core/errors.js';
import type { TempDir } from '../fixtures.js';
import { createTempDir, silentLogger } from '../fixtures.js';

const FIXED_NOW = new Date(Date.UTC(2026, 4, 5, 12));

const factories: Array<[string, () => AuditStore]> = [
  ['InMemoryAuditStore', () => new InMemoryAuditStore(silentLogger(), () => FIXED_NOW)],
  ['SqliteAuditStore', () => new SqliteAuditStore(':memory:', silentLogger(), () => FIXED_NOW)],
];

describe.each(factories)('%s', (_name, create) => {
  let store: AuditStore;

  beforeEach(() => {
    store = create();
    store.append({
      eventType: 'risk_budget_adjusted',
      timestamp: '2026-05-03T10:00:00.000Z',
      symbol: 'MU',
      strategyId: 'momentum_swing',
      constraintId: 'memory_risk_budget',
      actionDetails: { multiplier: 1.5 },
      traceId: 'trace-1',
    });
    store.append({
      eventType: 'veto_downgrade',
      timestamp: '2026-05-01T10:00:00.000Z',
      symbol: 'NVDA',
      constraintId: 'ai_capex_veto',
    });
    store.append({
      eventType: 'constraint_deactivated',
      timestamp: '2026-05-03T10:00:00.000Z',
      hypothesisId: 'memory_supercycle',
      constraintId: 'memory_risk_budget',
      actionDetails: { reason: 'hypothesis_sunset' },
    });
  });

  afterEach(() => {
    store.close();
  });

  it('orders by timestamp then id', () => {
    expect(store.query().map((entry) => entry.eventType)).toEqual([
      'veto_downgrade',
      'risk_budget_adjusted',
      'constraint_deactivated',
    ]);
    expect(store.count()).toBe(3);
  });

  it('round-trips every field', () => {
    const [entry] = store.query({ symbol: 'mu' });
    expect(entry).toEqual({
      id: 1,
      timestamp: '2026-05-03T10:00:00.000Z',
      eventType: 'risk_budget_adjusted',
      symbol: 'MU',
      strategyId: 'momentum_swing',
      constraintId: 'memory_risk_budget',
      actionDetails: { multiplier: 1.5 },
      traceId: 'trace-1',
    });
  });

  it('stamps entries without a timestamp with the clock', () => {
    const entry = store.append({ eventType: 'pool_built' });
    expect(entry.timestamp).toBe('2026-05-05T12:00:00.000Z');
    expect(entry.actionDetails).toEqual({});
  });

  it('filters by constraint, hypothesis, strategy and event type', () => {
    expect(store.query({ constraintId: 'memory_risk_budget' }).map((e) => e.id)).toEqual([1, 3]);
    expect(store.query({ hypothesisId: 'memory_supercycle' }).map((e) => e.id)).toEqual([3]);
    expect(store.query({ strategyId: 'momentum_swing' }).map((e) => e.id)).toEqual([1]);
    expect(store.query({ eventType: 'veto_downgrade' }).map((e) => e.id)).toEqual([2]);
  });

  it('filters by an inclusive time range and limits results', () => {
    expect(store.query({ from: '2026-05-02T00:00:00Z' }).map((e) => e.id)).toEqual([1, 3]);
    expect(store.query({ to: new Date('2026-05-01T10:00:00Z') }).map((e) => e.id)).toEqual([2]);
    expect(store.query({ limit: 2 }).map((e) => e.id)).toEqual([2, 1]);
  });
});

describe('SqliteAuditStore', () => {
  it('refuses updates and deletes at the database level', () => {
    const db = openDatabase(':memory:');
    const store = new SqliteAuditStore(db, silentLogger());
    store.append({ eventType: 'pool_built' });

    expect(() => db.prepare('DELETE FROM governance_audit_log').run()).toThrow(/append-only/);
    expect(() => db.prepare("UPDATE governance_audit_log SET event_type = 'veto_downgrade'").run()).toThrow(
      /append-only/
    );
    expect(store.count()).toBe(1);
    store.close();
  });

  it('wraps failures in AuditStorageError', () => {
    const store = new SqliteAuditStore(':memory:', silentLogger());
    store.close();
    expect(() => store.append({ eventType: 'pool_built' })).toThrow(AuditStorageError);
  });

  describe('on disk', () => {
    let dir: TempDir;

    beforeEach(() => {
      dir = createTempDir();
    });

    afterEach(() => {
      dir.cleanup();
    });

    it('persists entries across store instances', () => {
      const path = `${dir.path}/nested/audit.sqlite`;
      const first = new SqliteAuditStore(path, silentLogger());
      first.append({ eventType: 'regime_changed', actionDetails: { from: 'NORMAL', to: 'STRESS' } });
      first.close();

      const second = new SqliteAuditStore(path, silentLogger());
      expect(second.query()[0]?.actionDetails).toEqual({ from: 'NORMAL', to: 'STRESS' });
      second.close();
    });
  });
});

describe('isAuditEventType', () => {
  it('accepts only known event types', () => {
    expect(isAuditEventType('pool_built')).toBe(true);
    expect(isAuditEventType('order_placed')).toBe(false);
  });
});
