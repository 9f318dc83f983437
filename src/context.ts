import type { ResolvedConstraints } from './constraints/types.js';
import type { RegimeState, StopMode } from './governance/types.js';
import type { Pool } from './pool/types.js';
import type { Regime } from './regime/types.js';

/**
 * Everything a strategy may read from governance: numbers, flags and the pool
 * membership list. No hypothesis or constraint object crosses this boundary.
 */
export interface StrategyContext {
  readonly symbol: string;
  readonly strategyId: string | null;
  readonly poolSymbols: readonly string[];
  readonly poolVersion: string;
  readonly inPool: boolean;
  readonly poolWeight: number;
  readonly riskBudgetMultiplier: number;
  readonly vetoDowngrade: boolean;
  readonly stopMode: StopMode;
  readonly holdingExtensionDays: number;
  readonly enableStrategy: boolean | null;
  readonly positionCapMultiplier: number;
  readonly maxPositionPct: number | null;
  readonly regimeState: RegimeState;
  readonly pacingMultiplier: number;
  readonly resolutionVersion: string;
}

export function buildStrategyContext(
  pool: Pool,
  resolved: ResolvedConstraints,
  regime: Pick<Regime, 'state' | 'pacingMultiplier'>
): StrategyContext {
  return Object.freeze({
    symbol: resolved.symbol,
    strategyId: resolved.strategyId ?? null,
    poolSymbols: Object.freeze([...pool.symbols]),
    poolVersion: pool.version,
    inPool: pool.symbols.includes(resolved.symbol),
    poolWeight: pool.weights[resolved.symbol] ?? 1,
    riskBudgetMultiplier: resolved.riskBudgetMultiplier,
    vetoDowngrade: resolved.vetoDowngrade,
    stopMode: resolved.stopMode,
    holdingExtensionDays: resolved.holdingExtensionDays,
    enableStrategy: resolved.enableStrategy,
    positionCapMultiplier: resolved.positionCapMultiplier,
    maxPositionPct: resolved.guardrails.maxPositionPct ?? null,
    regimeState: regime.state,
    pacingMultiplier: regime.pacingMultiplier,
    resolutionVersion: resolved.version,
  });
}
