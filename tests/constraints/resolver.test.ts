import { beforeEach, describe, expect, it } from 'vitest';

import { InMemoryAuditStore } from '../../src/audit/store.js';
import type { AuditEventInput, AuditLogEntry } from '../../src/audit/types.js';
import { ConstraintRegistry } from '../../src/constraints/registry.js';
import { capPositionFraction, ConstraintResolver } from '../../src/constraints/resolver.js';
import { AuditStorageError } from '../../src/core/errors.js';
import { HypothesisRegistry } from '../../src/hypothesis/registry.js';
import { makeConstraint, makeHypothesis, silentLogger } from '../fixtures.js';

class FlakyAuditStore extends InMemoryAuditStore {
  failures = 1;

  override append(event: AuditEventInput): AuditLogEntry {
    if (this.failures > 0) {
      this.failures -= 1;
      throw new AuditStorageError('database is locked');
    }
    return super.append(event);
  }
}

describe('ConstraintResolver', () => {
  let hypotheses: HypothesisRegistry;
  let constraints: ConstraintRegistry;
  let audit: InMemoryAuditStore;
  let clock: number;
  let resolver: ConstraintResolver;

  beforeEach(() => {
    hypotheses = new HypothesisRegistry(silentLogger());
    constraints = new ConstraintRegistry(silentLogger());
    audit = new InMemoryAuditStore(silentLogger());
    clock = Date.UTC(2026, 5, 1, 14, 30);

    hypotheses.register(makeHypothesis());
    constraints.register(
      makeConstraint({
        id: 'memory_risk_budget',
        priority: 10,
        actions: { riskBudgetMultiplier: 1.5, stopMode: 'wide', holdingExtensionDays: 10 },
      })
    );
    constraints.register(
      makeConstraint({
        id: 'memory_momentum_boost',
        priority: 20,
        actions: { riskBudgetMultiplier: 2.0, stopMode: 'fundamental_guarded', holdingExtensionDays: 30 },
      })
    );

    resolver = new ConstraintResolver({
      hypotheses,
      constraints,
      audit,
      cacheTtlMs: 60_000,
      logger: silentLogger(),
      now: () => clock,
    });
  });

  it('multiplies risk budgets and lets the lowest priority number win stop mode', () => {
    const resolved = resolver.resolve('MU');
    expect(resolved.riskBudgetMultiplier).toBe(3);
    expect(resolved.stopMode).toBe('wide');
    expect(resolved.holdingExtensionDays).toBe(10);
    expect(resolved.constraintIds).toEqual(['memory_risk_budget', 'memory_momentum_boost']);
    expect(resolved.effects.filter((effect) => effect.field === 'stopMode')).toEqual([
      { constraintId: 'memory_risk_budget', priority: 10, field: 'stopMode', value: 'wide' },
    ]);
  });

  it('returns neutral values when nothing applies', () => {
    const resolved = resolver.resolve('AAPL');
    expect(resolved).toMatchObject({
      symbol: 'AAPL',
      constraintIds: [],
      riskBudgetMultiplier: 1,
      poolBiasMultiplier: 1,
      vetoDowngrade: false,
      stopMode: 'baseline',
      holdingExtensionDays: 0,
      enableStrategy: null,
      positionCapMultiplier: 1,
      guardrails: {},
    });
    expect(audit.count()).toBe(0);
  });

  it('normalizes the symbol and returns frozen results', () => {
    const resolved = resolver.resolve(' mu ');
    expect(resolved.symbol).toBe('MU');
    expect(Object.isFrozen(resolved)).toBe(true);
    expect(Object.isFrozen(resolved.effects)).toBe(true);
  });

  it('writes a risk_budget_adjusted audit entry queryable by symbol', () => {
    resolver.resolve('MU', { strategyId: 'momentum_swing', traceId: 'trace-1' });
    const entries = audit.query({ symbol: 'MU' });
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      eventType: 'risk_budget_adjusted',
      symbol: 'MU',
      strategyId: 'momentum_swing',
      constraintId: 'memory_risk_budget',
      traceId: 'trace-1',
    });
    expect(entries[0]?.actionDetails.multiplier).toBe(3);
    expect(entries[0]?.actionDetails.constraintIds).toEqual(['memory_risk_budget', 'memory_momentum_boost']);
  });

  it('does not cache a resolution whose audit entry failed to write', () => {
    const flaky = new FlakyAuditStore(silentLogger());
    const guarded = new ConstraintResolver({
      hypotheses,
      constraints,
      audit: flaky,
      cacheTtlMs: 60_000,
      logger: silentLogger(),
      now: () => clock,
    });

    expect(() => guarded.resolve('MU')).toThrow(AuditStorageError);
    expect(guarded.cacheStats().size).toBe(0);

    expect(guarded.resolve('MU').riskBudgetMultiplier).toBe(3);
    expect(flaky.query({ symbol: 'MU', eventType: 'risk_budget_adjusted' })).toHaveLength(1);
    guarded.dispose();
  });

  it('keeps a constraint closed when its hypothesis is not ACTIVE or does not exist', () => {
    constraints.register(
      makeConstraint({
        id: 'orphan_veto',
        priority: 5,
        activation: { requiresHypothesesActive: ['no_such_hypothesis'], disabledIfFalsified: true },
        actions: { vetoDowngrade: true },
      })
    );
    const resolved = resolver.resolve('MU');
    expect(resolved.vetoDowngrade).toBe(false);
    expect(resolved.constraintIds).not.toContain('orphan_veto');
  });

  it('applies strategy-specific constraints only to that strategy', () => {
    constraints.register(
      makeConstraint({
        id: 'swing_veto',
        priority: 30,
        appliesTo: { symbols: ['MU'], strategies: ['momentum_swing'] },
        actions: { vetoDowngrade: true },
      })
    );
    expect(resolver.resolve('MU', { strategyId: 'mean_reversion' }).vetoDowngrade).toBe(false);
    expect(resolver.resolve('MU', { strategyId: 'momentum_swing' }).vetoDowngrade).toBe(true);
    expect(audit.query({ eventType: 'veto_downgrade' })).toHaveLength(1);
  });

  it('lets guardrails bound the position whatever the multipliers', () => {
    constraints.register(
      makeConstraint({
        id: 'memory_cap',
        priority: 50,
        actions: { addPositionCapMultiplier: 0.5 },
        guardrails: { maxPositionPct: 0.08 },
      })
    );
    constraints.register(
      makeConstraint({
        id: 'global_cap',
        priority: 1,
        appliesTo: { symbols: [], strategies: [] },
        activation: { requiresHypothesesActive: [], disabledIfFalsified: true },
        actions: {},
        guardrails: { maxPositionPct: 0.05 },
      })
    );

    const resolved = resolver.resolve('MU');
    expect(resolved.guardrails.maxPositionPct).toBe(0.05);
    expect(resolved.positionCapMultiplier).toBe(0.5);
    expect(capPositionFraction(resolved, 0.2)).toBe(0.05);
    expect(capPositionFraction(resolved, 0.06)).toBe(0.03);

    const [cap] = audit.query({ eventType: 'position_cap_applied' });
    expect(cap?.constraintId).toBe('memory_cap');
    expect(cap?.actionDetails.constraintIds).toEqual(['memory_cap', 'global_cap']);
  });

  describe('cache', () => {
    it('serves repeated calls from the cache until the TTL expires', () => {
      const first = resolver.resolve('MU');
      expect(resolver.resolve('MU')).toBe(first);
      expect(resolver.cacheStats()).toEqual({ hits: 1, misses: 1, size: 1 });

      clock += 60_000;
      const refreshed = resolver.resolve('MU');
      expect(refreshed).not.toBe(first);
      expect(refreshed.version).toBe(first.version);
      expect(audit.query({ eventType: 'risk_budget_adjusted' })).toHaveLength(2);
    });

    it('keys the cache by strategy', () => {
      const all = resolver.resolve('MU');
      const swing = resolver.resolve('MU', { strategyId: 'momentum_swing' });
      expect(swing).not.toBe(all);
      expect(resolver.cacheStats().size).toBe(2);
    });

    it('is invalidated by a hypothesis status change', () => {
      const before = resolver.resolve('MU');
      expect(before.riskBudgetMultiplier).toBe(3);

      hypotheses.sunset('memory_supercycle', 'contract prices fell');
      expect(resolver.cacheStats().size).toBe(0);

      const after = resolver.resolve('MU');
      expect(after.riskBudgetMultiplier).toBe(1);
      expect(after.constraintIds).toEqual([]);
      expect(after.epoch).toBe('2.2');
      expect(after.version).not.toBe(before.version);
    });

    it('drops only the requested symbol on targeted invalidation', () => {
      resolver.resolve('MU');
      resolver.resolve('AAPL');
      expect(resolver.invalidate('mu')).toBe(1);
      expect(resolver.cacheStats().size).toBe(1);
      expect(resolver.invalidate()).toBe(1);
    });

    it('stops listening after dispose', () => {
      resolver.resolve('MU');
      resolver.dispose();
      expect(hypotheses.listenerCount('changed')).toBe(0);
      expect(constraints.listenerCount('changed')).toBe(0);
    });
  });

  it('derives the version from the sorted constraint ids', () => {
    const a = resolver.resolve('MU');
    const b = resolver.resolve('MU', { strategyId: 'anything' });
    expect(a.version).toMatch(/^[0-9a-f]{16}$/);
    expect(b.version).toBe(a.version);
  });
});
