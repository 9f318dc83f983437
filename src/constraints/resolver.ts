import type { AuditStore } from '../audit/types.js';
import { computeFingerprint, deepFreeze } from '../core/fingerprint.js';
import { Logger } from '../core/logger.js';
import { normalizeSymbol } from '../governance/types.js';
import type { HypothesisRegistry } from '../hypothesis/registry.js';
import { isConstraintActive } from './activation.js';
import type { CacheStats } from './cache.js';
import { TtlCache } from './cache.js';
import { foldConstraints } from './reducers.js';
import type { ConstraintRegistry } from './registry.js';
import type { ActionField, Constraint, ResolvedConstraints } from './types.js';

export const DEFAULT_CACHE_TTL_MS = 60_000;

export interface ResolveOptions {
  strategyId?: string;
  traceId?: string;
}

export interface ConstraintResolverOptions {
  hypotheses: HypothesisRegistry;
  constraints: ConstraintRegistry;
  audit?: AuditStore;
  cacheTtlMs?: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * Fraction of equity a new add may take. Guardrails are applied after the
 * action multipliers, so they bound the result whatever the priorities were.
 */
export function capPositionFraction(resolved: ResolvedConstraints, requested: number): number {
  const scaled = requested * resolved.positionCapMultiplier;
  const ceiling = resolved.guardrails.maxPositionPct;
  return ceiling === undefined ? scaled : Math.min(scaled, ceiling);
}

/**
 * Aggregates every active, applicable constraint for a symbol. Results are
 * cached per (symbol, strategy) for the TTL and dropped whenever either
 * registry publishes a new snapshot.
 */
export class ConstraintResolver {
  private readonly hypotheses: HypothesisRegistry;
  private readonly constraints: ConstraintRegistry;
  private readonly audit?: AuditStore;
  private readonly logger: Logger;
  private readonly cache: TtlCache<ResolvedConstraints>;
  private readonly now: () => number;
  private readonly onChange = (): void => {
    const dropped = this.cache.clear();
    if (dropped > 0) {
      this.logger.debug(`Cleared ${dropped} cached resolutions`);
    }
  };

  constructor(options: ConstraintResolverOptions) {
    this.hypotheses = options.hypotheses;
    this.constraints = options.constraints;
    this.audit = options.audit;
    this.logger = options.logger ?? new Logger('info');
    this.now = options.now ?? Date.now;
    this.cache = new TtlCache(options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS, this.now);
    this.hypotheses.on('changed', this.onChange);
    this.constraints.on('changed', this.onChange);
  }

  /** Current resolution epoch: both registry snapshot versions. */
  epoch(): string {
    return `${this.hypotheses.version}.${this.constraints.version}`;
  }

  resolve(symbol: string, options: ResolveOptions = {}): ResolvedConstraints {
    const normalized = normalizeSymbol(symbol);
    const key = `${normalized}|${options.strategyId ?? '*'}`;
    const epoch = this.epoch();
    const cached = this.cache.get(key, epoch);
    if (cached) {
      return cached;
    }

    const active = this.activeConstraints(normalized, options.strategyId);
    const fold = foldConstraints(active);
    const constraintIds = active.map((constraint) => constraint.id);

    const resolved: ResolvedConstraints = {
      symbol: normalized,
      effects: fold.effects,
      constraintIds,
      riskBudgetMultiplier: fold.values.riskBudgetMultiplier,
      poolBiasMultiplier: fold.values.poolBiasMultiplier,
      vetoDowngrade: fold.values.vetoDowngrade,
      stopMode: fold.values.stopMode ?? 'baseline',
      holdingExtensionDays: fold.values.holdingExtensionDays ?? 0,
      enableStrategy: fold.values.enableStrategy,
      positionCapMultiplier: fold.values.positionCapMultiplier,
      guardrails: fold.guardrails,
      version: computeFingerprint([...constraintIds].sort()).slice(0, 16),
      epoch,
      resolvedAt: new Date(this.now()).toISOString(),
    };
    if (options.strategyId !== undefined) {
      resolved.strategyId = options.strategyId;
    }

    deepFreeze(resolved);
    // Only an audited resolution may be served from cache.
    this.recordAudit(resolved, active, options.traceId);
    this.cache.set(key, epoch, resolved);
    return resolved;
  }

  invalidate(symbol?: string): number {
    if (symbol === undefined) {
      return this.cache.clear();
    }
    const prefix = `${normalizeSymbol(symbol)}|`;
    return this.cache.deleteMatching((key) => key.startsWith(prefix));
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  /** Detach from registry change events. */
  dispose(): void {
    this.hypotheses.off('changed', this.onChange);
    this.constraints.off('changed', this.onChange);
    this.cache.clear();
  }

  private activeConstraints(symbol: string, strategyId?: string): Constraint[] {
    const filter = strategyId === undefined ? { symbol } : { symbol, strategy: strategyId };
    return this.constraints
      .list(filter)
      .filter((constraint) => isConstraintActive(constraint, this.hypotheses, this.logger));
  }

  private recordAudit(resolved: ResolvedConstraints, active: Constraint[], traceId?: string): void {
    if (!this.audit) return;
    const firstOf = (ids: string[]): { constraintId?: string } =>
      ids.length > 0 ? { constraintId: ids[0] } : {};
    const base = {
      symbol: resolved.symbol,
      ...(resolved.strategyId !== undefined ? { strategyId: resolved.strategyId } : {}),
      ...(traceId !== undefined ? { traceId } : {}),
    };
    const settersOf = (field: ActionField): string[] =>
      resolved.effects.filter((effect) => effect.field === field).map((effect) => effect.constraintId);

    if (resolved.riskBudgetMultiplier !== 1) {
      const ids = settersOf('riskBudgetMultiplier');
      this.audit.append({
        ...base,
        ...firstOf(ids),
        eventType: 'risk_budget_adjusted',
        actionDetails: {
          multiplier: resolved.riskBudgetMultiplier,
          constraintIds: ids,
          version: resolved.version,
          epoch: resolved.epoch,
        },
      });
    }

    if (resolved.vetoDowngrade) {
      const ids = resolved.effects
        .filter((effect) => effect.field === 'vetoDowngrade' && effect.value === true)
        .map((effect) => effect.constraintId);
      this.audit.append({
        ...base,
        ...firstOf(ids),
        eventType: 'veto_downgrade',
        actionDetails: { vetoDowngrade: true, constraintIds: ids, version: resolved.version },
      });
    }

    const cap = resolved.guardrails.maxPositionPct;
    if (cap !== undefined || resolved.positionCapMultiplier !== 1) {
      const guarded = active
        .filter((constraint) => constraint.guardrails?.maxPositionPct !== undefined)
        .map((constraint) => constraint.id);
      const ids = [...new Set([...settersOf('addPositionCapMultiplier'), ...guarded])];
      this.audit.append({
        ...base,
        ...firstOf(ids),
        eventType: 'position_cap_applied',
        actionDetails: {
          positionCapMultiplier: resolved.positionCapMultiplier,
          maxPositionPct: cap ?? null,
          constraintIds: ids,
          version: resolved.version,
        },
      });
    }
  }
}
