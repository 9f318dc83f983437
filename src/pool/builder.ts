import type { AuditStore } from '../audit/types.js';
import { isConstraintActive, linkedConstraintIds } from '../constraints/activation.js';
import type { ConstraintRegistry } from '../constraints/registry.js';
import { GovernanceError } from '../core/errors.js';
import { computeFingerprint, stableStringify } from '../core/fingerprint.js';
import { Logger } from '../core/logger.js';
import type { HypothesisRegistry } from '../hypothesis/registry.js';
import type { Hypothesis } from '../hypothesis/types.js';
import type { AlertGenerator } from '../monitoring/alerts.js';
import { applyStructuralFilters } from './filters.js';
import type { Pool, PoolAuditEntry, PoolConfig, SymbolData } from './types.js';

/** Carries the full audit trail so callers can see why every symbol left. */
export class EmptyPoolError extends GovernanceError {
  constructor(
    message: string,
    public readonly auditTrail: PoolAuditEntry[]
  ) {
    super(message, 'EMPTY_POOL');
    this.name = 'EmptyPoolError';
  }
}

export interface PoolBuilderOptions {
  hypotheses: HypothesisRegistry;
  constraints?: ConstraintRegistry;
  audit?: AuditStore;
  alerts?: AlertGenerator;
  logger?: Logger;
  now?: () => Date;
}

const pad = (value: number): string => String(value).padStart(2, '0');

export function formatVersionTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

function compareSymbolData(a: SymbolData, b: SymbolData): number {
  if (a.symbol !== b.symbol) return a.symbol < b.symbol ? -1 : 1;
  const left = stableStringify(a);
  const right = stableStringify(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function inScope(hypothesis: Hypothesis, data: SymbolData): boolean {
  return hypothesis.scope.symbols.includes(data.symbol) || hypothesis.scope.sectors.includes(data.sector);
}

/**
 * Builds the tradable pool: base universe, structural filters, then gating by
 * ACTIVE hypotheses. The same inputs always yield the same symbols and the
 * same content hash; only the timestamp part of the version moves.
 */
export class PoolBuilder {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: PoolBuilderOptions) {
    this.logger = options.logger ?? new Logger('info');
    this.now = options.now ?? (() => new Date());
  }

  build(config: PoolConfig): Pool {
    const { filters, gating } = config;
    const auditTrail: PoolAuditEntry[] = [];

    const universe = this.dedupe(config.universe);
    const { passed, excluded } = applyStructuralFilters(universe, filters);
    for (const { data, rejection } of excluded) {
      auditTrail.push({ symbol: data.symbol, action: 'excluded', reason: rejection.reason, source: rejection.filter });
    }

    const excludeBy = this.activeGating(gating.exclude);
    const includeBy = this.activeGating(gating.include);
    const prioritizeBy = this.activeGating(gating.prioritize);

    let remaining: SymbolData[] = [];
    for (const data of passed) {
      const hit = excludeBy.find((hypothesis) => inScope(hypothesis, data));
      if (hit) {
        auditTrail.push({
          symbol: data.symbol,
          action: 'excluded',
          reason: `hypothesis_exclude:${hit.id}`,
          source: hit.id,
        });
      } else {
        remaining.push(data);
      }
    }

    if (includeBy.length > 0) {
      const includeIds = includeBy.map((hypothesis) => hypothesis.id).join(',');
      remaining = remaining.filter((data) => {
        if (includeBy.some((hypothesis) => inScope(hypothesis, data))) return true;
        auditTrail.push({
          symbol: data.symbol,
          action: 'excluded',
          reason: `hypothesis_include:outside_scope(${includeIds})`,
          source: includeIds,
        });
        return false;
      });
    }

    const weights: Record<string, number> = {};
    for (const data of remaining) {
      for (const hypothesis of prioritizeBy) {
        if (!inScope(hypothesis, data)) continue;
        const bias = this.biasFor(hypothesis, gating.biasMultiplier);
        weights[data.symbol] = (weights[data.symbol] ?? 1) * bias;
        auditTrail.push({
          symbol: data.symbol,
          action: 'prioritized',
          reason: `hypothesis_prioritize:${hypothesis.id} (bias ${bias})`,
          source: hypothesis.id,
        });
      }
    }

    const symbols = remaining.map((data) => data.symbol);
    for (const symbol of symbols) {
      auditTrail.push({ symbol, action: 'included', reason: 'passed_all_filters', source: 'pool_builder' });
    }

    if (symbols.length === 0) {
      this.options.alerts?.raise({
        severity: 'critical',
        source: 'pool_builder',
        title: 'Pool is empty',
        message: `All ${universe.length} symbols were excluded by filters or hypothesis gating`,
        details: { universeSize: universe.length, excluded: auditTrail.length },
      });
      throw new EmptyPoolError('Pool is empty after filtering: all symbols were excluded', auditTrail);
    }

    const contentHash = computeFingerprint({
      universe,
      filters,
      gating,
      hypotheses: [...excludeBy, ...includeBy, ...prioritizeBy].map((hypothesis) => ({
        id: hypothesis.id,
        status: hypothesis.status,
        scope: hypothesis.scope,
      })),
      weights,
    });
    const builtAt = this.now();
    const pool: Pool = {
      symbols,
      weights,
      version: `${formatVersionTimestamp(builtAt)}_${contentHash.slice(0, 12)}`,
      contentHash,
      builtAt: builtAt.toISOString(),
      auditTrail,
    };

    this.recordAudit(pool);
    this.logger.info(`Built pool ${pool.version} with ${symbols.length}/${universe.length} symbols`);
    return pool;
  }

  private dedupe(universe: readonly SymbolData[]): SymbolData[] {
    const sorted = [...universe].sort(compareSymbolData);
    const unique: SymbolData[] = [];
    for (const data of sorted) {
      if (unique.length > 0 && unique[unique.length - 1].symbol === data.symbol) {
        this.logger.debug(`Dropping duplicate universe entry for ${data.symbol}`);
        continue;
      }
      unique.push(data);
    }
    return unique;
  }

  /** ACTIVE hypotheses with a non-empty scope, in config order. */
  private activeGating(ids: readonly string[]): Hypothesis[] {
    const result: Hypothesis[] = [];
    for (const id of new Set(ids)) {
      const hypothesis = this.options.hypotheses.get(id);
      if (!hypothesis) {
        this.logger.warn(`Pool gating references unknown hypothesis ${id}`);
        continue;
      }
      if (hypothesis.status !== 'ACTIVE') continue;
      if (hypothesis.scope.symbols.length === 0 && hypothesis.scope.sectors.length === 0) {
        this.logger.debug(`Skipping gating hypothesis ${id}: empty scope`);
        continue;
      }
      result.push(hypothesis);
    }
    return result;
  }

  /** Product of the pool bias of the hypothesis's active linked constraints. */
  private biasFor(hypothesis: Hypothesis, fallback: number): number {
    const registry = this.options.constraints;
    if (!registry) return fallback;
    const ids = linkedConstraintIds(hypothesis.id, hypothesis.linkedConstraints, registry.all());
    let bias: number | undefined;
    for (const id of ids) {
      const constraint = registry.get(id);
      if (!constraint || constraint.actions.poolBiasMultiplier === undefined) continue;
      if (!isConstraintActive(constraint, this.options.hypotheses, this.logger)) continue;
      bias = (bias ?? 1) * constraint.actions.poolBiasMultiplier;
    }
    return bias ?? fallback;
  }

  private recordAudit(pool: Pool): void {
    const audit = this.options.audit;
    if (!audit) return;
    const excludedCount = pool.auditTrail.filter((entry) => entry.action === 'excluded').length;
    audit.append({
      eventType: 'pool_built',
      timestamp: pool.builtAt,
      actionDetails: {
        version: pool.version,
        contentHash: pool.contentHash,
        symbolCount: pool.symbols.length,
        excludedCount,
        weights: pool.weights,
      },
    });
    for (const entry of pool.auditTrail) {
      if (entry.action === 'included' || entry.reason.startsWith('structural_filter:')) continue;
      const hypothesisIds = entry.source.split(',');
      audit.append({
        eventType: 'pool_built',
        timestamp: pool.builtAt,
        symbol: entry.symbol,
        ...(hypothesisIds.length === 1 ? { hypothesisId: hypothesisIds[0] } : {}),
        actionDetails: { version: pool.version, action: entry.action, reason: entry.reason, source: entry.source },
      });
    }
  }
}
