import { describe, expect, it, vi } from 'vitest';

import { InvalidTransitionError, NotFoundError, RegistryConflictError } from '../../src/core/errors.js';
import type { HypothesisStatus } from '../../src/governance/types.js';
import { canTransition, HypothesisRegistry, matchesScope } from '../../src/hypothesis/registry.js';
import { makeHypothesis, silentLogger } from '../fixtures.js';

describe('HypothesisRegistry', () => {
  it('registers idempotently for identical content', () => {
    const registry = new HypothesisRegistry(silentLogger());
    const first = registry.register(makeHypothesis());
    const second = registry.register(makeHypothesis());
    expect(second).toBe(first);
    expect(registry.version).toBe(1);
    expect(registry.count()).toBe(1);
  });

  it('throws RegistryConflictError when an id is reused with different content', () => {
    const registry = new HypothesisRegistry(silentLogger());
    registry.register(makeHypothesis());
    expect(() => registry.register(makeHypothesis({ title: 'Something else' }))).toThrow(RegistryConflictError);
  });

  it('stores frozen copies', () => {
    const registry = new HypothesisRegistry(silentLogger());
    const input = makeHypothesis();
    const stored = registry.register(input);
    expect(stored).not.toBe(input);
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored.scope.symbols)).toBe(true);
  });

  it('publishes a new snapshot and emits changed on every write', () => {
    const registry = new HypothesisRegistry(silentLogger());
    const listener = vi.fn();
    registry.on('changed', listener);
    registry.register(makeHypothesis({ status: 'DRAFT' }));
    const before = registry.snapshot();
    registry.activate('memory_supercycle', 'risk_committee');

    expect(before.items.get('memory_supercycle')?.status).toBe('DRAFT');
    expect(registry.get('memory_supercycle')?.status).toBe('ACTIVE');
    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener).toHaveBeenLastCalledWith({ registry: 'hypothesis', version: 2, ids: ['memory_supercycle'] });
  });

  it('rejects duplicate ids in replaceAll without touching the snapshot', () => {
    const registry = new HypothesisRegistry(silentLogger());
    registry.register(makeHypothesis());
    expect(() => registry.replaceAll([makeHypothesis({ id: 'a' }), makeHypothesis({ id: 'a' })])).toThrow(
      RegistryConflictError
    );
    expect(registry.all().map((h) => h.id)).toEqual(['memory_supercycle']);
  });

  it('follows DRAFT -> ACTIVE -> SUNSET and records history', () => {
    const registry = new HypothesisRegistry(silentLogger());
    registry.register(makeHypothesis({ status: 'DRAFT' }));
    registry.activate('memory_supercycle', 'risk_committee');
    registry.sunset('memory_supercycle', 'contract prices fell');

    expect(registry.get('memory_supercycle')?.status).toBe('SUNSET');
    expect(
      registry.history('memory_supercycle').map(({ from, to, actor, reason }) => ({ from, to, actor, reason }))
    ).toEqual([
      { from: 'DRAFT', to: 'ACTIVE', actor: 'risk_committee', reason: 'approved' },
      { from: 'ACTIVE', to: 'SUNSET', actor: 'falsifier_monitor', reason: 'contract prices fell' },
    ]);
  });

  it('rejects illegal transitions', () => {
    const registry = new HypothesisRegistry(silentLogger());
    registry.register(makeHypothesis({ status: 'DRAFT' }));
    expect(() => registry.sunset('memory_supercycle', 'no')).toThrow(InvalidTransitionError);

    registry.reject('memory_supercycle', 'evidence too thin');
    expect(() => registry.activate('memory_supercycle', 'risk_committee')).toThrow(
      "Hypothesis 'memory_supercycle' cannot move from REJECTED to ACTIVE"
    );
  });

  it('requires a named approver to activate', () => {
    const registry = new HypothesisRegistry(silentLogger());
    registry.register(makeHypothesis({ status: 'DRAFT' }));
    expect(() => registry.activate('memory_supercycle', '  ')).toThrow(InvalidTransitionError);
    expect(registry.get('memory_supercycle')?.status).toBe('DRAFT');
  });

  it('throws NotFoundError for unknown ids', () => {
    const registry = new HypothesisRegistry(silentLogger());
    expect(() => registry.sunset('missing', 'x')).toThrow(NotFoundError);
  });

  it('filters by status and scope', () => {
    const registry = new HypothesisRegistry(silentLogger());
    registry.register(makeHypothesis());
    registry.register(
      makeHypothesis({ id: 'utilities_rate_drag', status: 'DRAFT', scope: { symbols: [], sectors: ['Utilities'] } })
    );

    expect(registry.active().map((h) => h.id)).toEqual(['memory_supercycle']);
    expect(registry.list({ symbol: 'mu' }).map((h) => h.id)).toEqual(['memory_supercycle', 'utilities_rate_drag']);
    expect(registry.list({ sector: 'Energy' }).map((h) => h.id)).toEqual(['memory_supercycle']);
    expect(registry.list({ status: ['DRAFT', 'SUNSET'] }).map((h) => h.id)).toEqual(['utilities_rate_drag']);
  });
});

describe('HypothesisRegistry.replaceFromConfig', () => {
  it('keeps a terminal status the config tries to revive', () => {
    const registry = new HypothesisRegistry(silentLogger());
    registry.register(makeHypothesis());
    registry.sunset('memory_supercycle', 'falsified');

    const overrides = registry.replaceFromConfig([makeHypothesis({ title: 'Memory upcycle, revised' })]);
    expect(overrides).toEqual([{ hypothesisId: 'memory_supercycle', configured: 'ACTIVE', kept: 'SUNSET' }]);
    expect(registry.get('memory_supercycle')).toMatchObject({ status: 'SUNSET', title: 'Memory upcycle, revised' });
  });

  it('keeps an approval but accepts a later status from config', () => {
    const registry = new HypothesisRegistry(silentLogger());
    registry.register(makeHypothesis({ status: 'DRAFT' }));
    registry.activate('memory_supercycle', 'risk_committee');

    registry.replaceFromConfig([makeHypothesis({ status: 'DRAFT' })]);
    expect(registry.get('memory_supercycle')?.status).toBe('ACTIVE');

    expect(registry.replaceFromConfig([makeHypothesis({ status: 'REJECTED' })])).toEqual([]);
    expect(registry.get('memory_supercycle')?.status).toBe('REJECTED');
  });

  it('takes the config status when nothing changed at runtime, unless persisted state says otherwise', () => {
    const registry = new HypothesisRegistry(silentLogger());
    registry.register(makeHypothesis({ status: 'DRAFT' }));
    const persisted = new Map<string, HypothesisStatus>([['ai_capex_cycle', 'SUNSET']]);
    registry.replaceFromConfig([makeHypothesis(), makeHypothesis({ id: 'ai_capex_cycle' })], persisted);
    expect(registry.get('memory_supercycle')?.status).toBe('ACTIVE');
    expect(registry.get('ai_capex_cycle')?.status).toBe('SUNSET');
  });
});

describe('transition table', () => {
  it('treats SUNSET and REJECTED as terminal', () => {
    expect(canTransition('DRAFT', 'ACTIVE')).toBe(true);
    expect(canTransition('ACTIVE', 'REJECTED')).toBe(true);
    expect(canTransition('SUNSET', 'ACTIVE')).toBe(false);
    expect(canTransition('REJECTED', 'DRAFT')).toBe(false);
    expect(canTransition('DRAFT', 'SUNSET')).toBe(false);
  });

  it('treats an empty scope list as all', () => {
    const hypothesis = makeHypothesis({ scope: { symbols: [], sectors: [] } });
    expect(matchesScope(hypothesis, 'AAPL', 'Technology')).toBe(true);
  });
});
