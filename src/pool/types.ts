export interface SymbolData {
  symbol: string;
  sector: string;
  price: number;
  marketCap: number;
  avgDollarVolume: number;
  dividendYield: number;
  stateOwnedRatio: number;
}

export interface StructuralFilters {
  excludeStateOwnedRatioGte?: number;
  excludeDividendYieldGte?: number;
  minAvgDollarVolume?: number;
  excludeSectors: string[];
  minMarketCap?: number;
  minPrice?: number;
  maxPrice?: number;
}

/** Hypothesis ids per gating mode. Only ACTIVE hypotheses take effect. */
export interface PoolGating {
  exclude: string[];
  include: string[];
  prioritize: string[];
  biasMultiplier: number;
}

export interface PoolConfig {
  universe: SymbolData[];
  filters: StructuralFilters;
  gating: PoolGating;
}

export type PoolDecision = 'included' | 'excluded' | 'prioritized';

export interface PoolAuditEntry {
  symbol: string;
  action: PoolDecision;
  reason: string;
  source: string;
}

export interface Pool {
  symbols: string[];
  weights: Record<string, number>;
  version: string;
  contentHash: string;
  builtAt: string;
  auditTrail: PoolAuditEntry[];
}
