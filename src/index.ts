/**
 * Hypothesis governance engine
 *
 * Main entry point for the library. Strategies should depend on
 * `StrategyContext` only; everything else here is for operators and tooling.
 *
 * @example
 * ```typescript
 * import { GovernanceEngine, MetricRegistry } from 'hypothesis-governance';
 *
 * const metrics = new MetricRegistry();
 * metrics.register('portfolio_volatility', () => 0.12);
 *
 * const engine = GovernanceEngine.fromDirectory('./config', { metrics });
 * engine.activateHypothesis('memory_supercycle', 'risk_committee');
 *
 * const ctx = engine.strategyContext('MU', { strategyId: 'momentum_swing' });
 * const size = baseSize * ctx.riskBudgetMultiplier * ctx.pacingMultiplier;
 * ```
 */

// Version
export const VERSION = '0.1.0';

export * from './governance/types.js';
export * from './hypothesis/types.js';
export * from './constraints/types.js';
export * from './factors/types.js';
export * from './pool/types.js';
export * from './regime/types.js';
export * from './monitoring/types.js';
export * from './audit/types.js';
export * from './lint/types.js';

export {
  GovernanceError,
  ValidationError,
  RegistryConflictError,
  NotFoundError,
  InvalidTransitionError,
  MetricUnavailableError,
  AuditStorageError,
  type GovernanceErrorCode,
  type ValidationIssue,
} from './core/errors.js';
export { Logger, isLogLevel, type LogLevel } from './core/logger.js';
export { loadConfig, parseConfig, defaultConfig, type GovernanceConfig } from './core/config.js';
export { stableStringify, computeFingerprint } from './core/fingerprint.js';

export {
  parseHypothesis,
  parseConstraint,
  parseFactor,
  parsePoolConfig,
  parseRegimeConfig,
  loadHypothesisFile,
  loadConstraintFile,
  loadFactorFile,
  loadPoolConfigFile,
  loadRegimeConfigFile,
  loadHypothesisDirectory,
  loadConstraintDirectory,
  loadFactorDirectory,
  loadGovernanceDefinitions,
  type GovernanceDefinitions,
} from './governance/loader.js';
export { HYPOTHESIS_FALSIFIER_GATE, CONSTRAINT_ALLOWLIST_GATE, FACTOR_FAILURE_RULE_GATE } from './governance/schemas.js';
export { SnapshotRegistry, type Snapshot, type RegistryChange, type RegistryEvents } from './governance/snapshot.js';

export { HypothesisRegistry, canTransition, matchesScope, type HypothesisTransition } from './hypothesis/registry.js';
export { ConstraintRegistry, appliesToSymbol, appliesToStrategy } from './constraints/registry.js';
export { checkActivation, isConstraintActive, linkedConstraintIds, type ActivationCheck } from './constraints/activation.js';
export { ACTION_REDUCERS, foldConstraints, mergeGuardrails, type ReduceMode } from './constraints/reducers.js';
export {
  ConstraintResolver,
  capPositionFraction,
  DEFAULT_CACHE_TTL_MS,
  type ResolveOptions,
  type ConstraintResolverOptions,
} from './constraints/resolver.js';
export type { CacheStats } from './constraints/cache.js';
export { FactorRegistry, type FactorHealthReport } from './factors/registry.js';

export { PoolBuilder, EmptyPoolError, type PoolBuilderOptions } from './pool/builder.js';
export { applyStructuralFilters, checkStructuralFilters, type FilterRejection } from './pool/filters.js';
export { RegimeDetector, classifyRegime, DEFAULT_REGIME_CONFIG, REGIME_METRICS } from './regime/detector.js';

export {
  MetricRegistry,
  type MetricProvider,
  type MetricQuery,
  type MetricScope,
} from './monitoring/metrics.js';
export { AlertGenerator, logAlertHandler, type AlertHandler } from './monitoring/alerts.js';
export { FalsifierChecker, type FalsifierCheckerOptions } from './monitoring/falsifier.js';
export {
  FalsifierMonitor,
  SCHEDULE_INTERVAL_MS,
  type FalsifierMonitorOptions,
  type HypothesisCheckReport,
  type MonitorRunReport,
} from './monitoring/scheduler.js';

export { InMemoryAuditStore } from './audit/store.js';
export { SqliteAuditStore } from './audit/sqlite_store.js';
export { openDatabase, DEFAULT_AUDIT_DB_PATH } from './audit/db.js';

export { AlphaPathLint, collectModuleSpecifiers, type AlphaPathLintOptions } from './lint/alpha_path.js';
export { AllowlistLint } from './lint/allowlist.js';

export { buildStrategyContext, type StrategyContext } from './context.js';
export { GovernanceEngine, createAuditStore, type GovernanceEngineOptions } from './engine.js';
