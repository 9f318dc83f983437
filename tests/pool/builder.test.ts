import { beforeEach, describe, expect, it } from 'vitest';

import { InMemoryAuditStore } from '../../src/audit/store.js';
import { ConstraintRegistry } from '../../src/constraints/registry.js';
import { HypothesisRegistry } from '../../src/hypothesis/registry.js';
import { AlertGenerator } from '../../src/monitoring/alerts.js';
import { EmptyPoolError, formatVersionTimestamp, PoolBuilder } from '../../src/pool/builder.js';
import { checkStructuralFilters } from '../../src/pool/filters.js';
import type { PoolConfig } from '../../src/pool/types.js';
import { makeConstraint, makeHypothesis, makeSymbol, silentLogger } from '../fixtures.js';

const BUILT_AT = new Date(Date.UTC(2026, 0, 2, 3, 4, 5));

function poolConfig(overrides: Partial<PoolConfig> = {}): PoolConfig {
  return {
    universe: [
      makeSymbol('XOM', { sector: 'Energy', price: 110 }),
      makeSymbol('MU', { price: 98 }),
      makeSymbol('PENY', { sector: 'Energy', price: 2 }),
      makeSymbol('DUK', { sector: 'Utilities', price: 110 }),
      makeSymbol('NVDA', { price: 120 }),
    ],
    filters: { excludeSectors: [], minPrice: 5 },
    gating: { exclude: ['utilities_rate_drag'], include: [], prioritize: ['memory_supercycle'], biasMultiplier: 1.2 },
    ...overrides,
  };
}

describe('PoolBuilder', () => {
  let hypotheses: HypothesisRegistry;
  let audit: InMemoryAuditStore;
  let alerts: AlertGenerator;
  let builder: PoolBuilder;

  beforeEach(() => {
    hypotheses = new HypothesisRegistry(silentLogger());
    hypotheses.register(makeHypothesis());
    hypotheses.register(
      makeHypothesis({ id: 'utilities_rate_drag', scope: { symbols: [], sectors: ['Utilities'] } })
    );
    hypotheses.register(
      makeHypothesis({ id: 'ai_capex_cycle', status: 'DRAFT', scope: { symbols: ['NVDA'], sectors: [] } })
    );
    audit = new InMemoryAuditStore(silentLogger());
    alerts = new AlertGenerator(['log'], silentLogger());
    builder = new PoolBuilder({ hypotheses, audit, alerts, logger: silentLogger(), now: () => BUILT_AT });
  });

  it('filters, gates and prioritizes the universe', () => {
    const pool = builder.build(poolConfig());
    expect(pool.symbols).toEqual(['MU', 'NVDA', 'XOM']);
    expect(pool.weights).toEqual({ MU: 1.2 });
    expect(pool.version).toBe(`20260102030405_${pool.contentHash.slice(0, 12)}`);
    expect(pool.builtAt).toBe('2026-01-02T03:04:05.000Z');
    expect(pool.auditTrail.filter((entry) => entry.action !== 'included')).toEqual([
      { symbol: 'PENY', action: 'excluded', reason: 'structural_filter:min_price (price 2 < 5)', source: 'min_price' },
      {
        symbol: 'DUK',
        action: 'excluded',
        reason: 'hypothesis_exclude:utilities_rate_drag',
        source: 'utilities_rate_drag',
      },
      {
        symbol: 'MU',
        action: 'prioritized',
        reason: 'hypothesis_prioritize:memory_supercycle (bias 1.2)',
        source: 'memory_supercycle',
      },
    ]);
  });

  it('is deterministic regardless of input order and build time', () => {
    const first = builder.build(poolConfig());
    const later = new PoolBuilder({
      hypotheses,
      logger: silentLogger(),
      now: () => new Date(Date.UTC(2026, 6, 1)),
    }).build(poolConfig({ universe: [...poolConfig().universe].reverse() }));

    expect(later.symbols).toEqual(first.symbols);
    expect(later.contentHash).toBe(first.contentHash);
    expect(later.version.split('_')[1]).toBe(first.version.split('_')[1]);
    expect(later.version).not.toBe(first.version);
  });

  it('changes the hash when the active hypothesis set changes', () => {
    const before = builder.build(poolConfig());
    hypotheses.sunset('memory_supercycle', 'falsified');
    const after = builder.build(poolConfig());
    expect(after.weights).toEqual({});
    expect(after.contentHash).not.toBe(before.contentHash);
  });

  it('ignores gating by hypotheses that are not ACTIVE', () => {
    const gating = { exclude: [], include: ['ai_capex_cycle'], prioritize: [], biasMultiplier: 1 };
    expect(builder.build(poolConfig({ gating })).symbols).toEqual(['DUK', 'MU', 'NVDA', 'XOM']);

    hypotheses.activate('ai_capex_cycle', 'risk_committee');
    const pool = builder.build(poolConfig({ gating }));
    expect(pool.symbols).toEqual(['NVDA']);
    expect(pool.auditTrail.find((entry) => entry.symbol === 'MU')?.reason).toBe(
      'hypothesis_include:outside_scope(ai_capex_cycle)'
    );
  });

  it('takes the bias from active linked constraints when a constraint registry is given', () => {
    const constraints = new ConstraintRegistry(silentLogger());
    constraints.register(makeConstraint({ id: 'memory_pool_bias', actions: { poolBiasMultiplier: 1.25 } }));
    const pool = new PoolBuilder({ hypotheses, constraints, logger: silentLogger() }).build(poolConfig());
    expect(pool.weights).toEqual({ MU: 1.25 });
  });

  it('drops duplicate universe entries', () => {
    const config = poolConfig();
    const pool = builder.build({ ...config, universe: [...config.universe, makeSymbol('MU', { price: 99 })] });
    expect(pool.symbols.filter((symbol) => symbol === 'MU')).toHaveLength(1);
  });

  it('audits the build summary and every gating decision', () => {
    const pool = builder.build(poolConfig());
    const entries = audit.query({ eventType: 'pool_built' });
    expect(entries).toHaveLength(3);
    expect(entries[0]?.actionDetails).toEqual({
      version: pool.version,
      contentHash: pool.contentHash,
      symbolCount: 3,
      excludedCount: 2,
      weights: { MU: 1.2 },
    });
    expect(entries[1]).toMatchObject({ symbol: 'DUK', hypothesisId: 'utilities_rate_drag' });
    expect(entries[2]).toMatchObject({ symbol: 'MU', hypothesisId: 'memory_supercycle' });
  });

  it('throws EmptyPoolError with the audit trail and raises a critical alert', () => {
    const config = poolConfig({ filters: { excludeSectors: [], minPrice: 1000 } });
    let caught: unknown;
    try {
      builder.build(config);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(EmptyPoolError);
    if (!(caught instanceof EmptyPoolError)) return;
    expect(caught.code).toBe('EMPTY_POOL');
    expect(caught.auditTrail).toHaveLength(5);
    expect(alerts.list().map(({ severity, source }) => ({ severity, source }))).toEqual([
      { severity: 'critical', source: 'pool_builder' },
    ]);
    expect(audit.count()).toBe(0);
  });
});

describe('structural filters', () => {
  it('reports only the first failing filter in order', () => {
    const data = makeSymbol('PTRX', { stateOwnedRatio: 0.6, price: 1 });
    expect(checkStructuralFilters(data, { excludeSectors: [], excludeStateOwnedRatioGte: 0.5, minPrice: 5 })).toEqual({
      filter: 'exclude_state_owned_ratio_gte',
      reason: 'structural_filter:exclude_state_owned_ratio_gte (ratio 0.6 >= 0.5)',
    });
  });

  it('passes a symbol that meets every filter', () => {
    expect(checkStructuralFilters(makeSymbol('MU'), { excludeSectors: ['Utilities'], minMarketCap: 1e9 })).toBeUndefined();
  });
});

describe('formatVersionTimestamp', () => {
  it('formats in UTC without separators', () => {
    expect(formatVersionTimestamp(new Date(Date.UTC(2026, 10, 30, 23, 59, 1)))).toBe('20261130235901');
  });
});
