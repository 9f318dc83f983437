import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import type { Constraint } from '../src/constraints/types.js';
import { Logger } from '../src/core/logger.js';
import type { Hypothesis } from '../src/hypothesis/types.js';
import type { SymbolData } from '../src/pool/types.js';

export const silentLogger = (): Logger => new Logger('silent');

export function makeHypothesis(overrides: Partial<Hypothesis> = {}): Hypothesis {
  return {
    id: 'memory_supercycle',
    title: 'Memory upcycle',
    statement: 'Contract prices keep rising.',
    scope: { symbols: ['MU'], sectors: [] },
    owner: 'human',
    status: 'ACTIVE',
    reviewCycle: 'quarterly',
    createdAt: '2026-01-15',
    evidence: { sources: [], notes: '' },
    falsifiers: [
      { metric: 'dram_contract_price_change_qoq', operator: '<', threshold: 0, window: '1q', trigger: 'sunset' },
    ],
    linkedConstraints: [],
    ...overrides,
  };
}

export function makeConstraint(overrides: Partial<Constraint> = {}): Constraint {
  return {
    id: 'memory_risk_budget',
    title: 'Memory risk budget',
    appliesTo: { symbols: ['MU'], strategies: [] },
    activation: { requiresHypothesesActive: ['memory_supercycle'], disabledIfFalsified: true },
    actions: {},
    priority: 100,
    ...overrides,
  };
}

export function makeSymbol(symbol: string, overrides: Partial<SymbolData> = {}): SymbolData {
  return {
    symbol,
    sector: 'Semiconductors',
    price: 50,
    marketCap: 50_000_000_000,
    avgDollarVolume: 500_000_000,
    dividendYield: 0,
    stateOwnedRatio: 0,
    ...overrides,
  };
}

export interface TempDir {
  path: string;
  write(relativePath: string, content: string): string;
  cleanup(): void;
}

export function createTempDir(prefix = 'governance-test-'): TempDir {
  const path = mkdtempSync(join(tmpdir(), prefix));
  return {
    path,
    write(relativePath, content) {
      const file = join(path, relativePath);
      mkdirSync(dirname(file), { recursive: true });
      writeFileSync(file, content, 'utf-8');
      return file;
    },
    cleanup() {
      rmSync(path, { recursive: true, force: true });
    },
  };
}

export const HYPOTHESIS_YAML = `
id: memory_supercycle
title: Memory upcycle
statement: Contract prices keep rising.
scope:
  symbols: [MU]
status: ACTIVE
review_cycle: quarterly
created_at: "2026-01-15"
falsifiers:
  - metric: dram_contract_price_change_qoq
    operator: "<"
    threshold: 0
    window: 1q
    trigger: sunset
linked_constraints: [memory_risk_budget]
`;

export const CONSTRAINT_YAML = `
id: memory_risk_budget
title: Memory risk budget
applies_to:
  symbols: [MU]
activation:
  requires_hypotheses_active: [memory_supercycle]
actions:
  risk_budget_multiplier: 1.5
  stop_mode: wide
priority: 10
`;

export const POOL_YAML = `
universe:
  - { symbol: MU, sector: Semiconductors, price: 98, market_cap: 110000000000, avg_dollar_volume: 2000000000 }
  - { symbol: DUK, sector: Utilities, price: 110, market_cap: 86000000000, avg_dollar_volume: 400000000 }
  - { symbol: PENY, sector: Energy, price: 2, market_cap: 300000000, avg_dollar_volume: 1000000 }
filters:
  min_price: 5
gating:
  prioritize: [memory_supercycle]
  bias_multiplier: 1.2
`;

/** A minimal valid config directory: one hypothesis, one constraint, a pool. */
export function writeConfigDir(dir: TempDir): string {
  dir.write('config/hypotheses/memory_supercycle.yaml', HYPOTHESIS_YAML);
  dir.write('config/constraints/memory_risk_budget.yaml', CONSTRAINT_YAML);
  dir.write('config/pool.yaml', POOL_YAML);
  return join(dir.path, 'config');
}
