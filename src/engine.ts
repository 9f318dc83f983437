import { InMemoryAuditStore } from './audit/store.js';
import { SqliteAuditStore } from './audit/sqlite_store.js';
import type { AuditStore } from './audit/types.js';
import { isConstraintActive } from './constraints/activation.js';
import { ConstraintRegistry } from './constraints/registry.js';
import { ConstraintResolver } from './constraints/resolver.js';
import type { ResolveOptions } from './constraints/resolver.js';
import type { ResolvedConstraints } from './constraints/types.js';
import type { GovernanceConfig } from './core/config.js';
import { defaultConfig } from './core/config.js';
import { ValidationError } from './core/errors.js';
import { Logger } from './core/logger.js';
import { FactorRegistry } from './factors/registry.js';
import type { GovernanceDefinitions } from './governance/loader.js';
import { loadGovernanceDefinitions } from './governance/loader.js';
import type { HypothesisStatus } from './governance/types.js';
import { HypothesisRegistry } from './hypothesis/registry.js';
import type { Hypothesis } from './hypothesis/types.js';
import { AllowlistLint } from './lint/allowlist.js';
import { AlertGenerator, logAlertHandler } from './monitoring/alerts.js';
import { FalsifierChecker } from './monitoring/falsifier.js';
import { MetricRegistry } from './monitoring/metrics.js';
import { FalsifierMonitor } from './monitoring/scheduler.js';
import type { MonitorRunReport } from './monitoring/scheduler.js';
import { PoolBuilder } from './pool/builder.js';
import type { Pool } from './pool/types.js';
import { DEFAULT_REGIME_CONFIG, RegimeDetector } from './regime/detector.js';
import type { Regime } from './regime/types.js';
import type { StrategyContext } from './context.js';
import { buildStrategyContext } from './context.js';

export interface GovernanceEngineOptions {
  config?: GovernanceConfig;
  audit?: AuditStore;
  metrics?: MetricRegistry;
  alerts?: AlertGenerator;
  logger?: Logger;
  now?: () => number;
}

export function createAuditStore(config: GovernanceConfig, logger?: Logger): AuditStore {
  return config.audit.backend === 'memory'
    ? new InMemoryAuditStore(logger)
    : new SqliteAuditStore(config.audit.dbPath, logger);
}

/**
 * Owns the registries and every component derived from them for one config
 * directory. Strategies should only ever see `strategyContext()`.
 */
export class GovernanceEngine {
  readonly hypotheses: HypothesisRegistry;
  readonly constraints: ConstraintRegistry;
  readonly factors: FactorRegistry;
  readonly resolver: ConstraintResolver;
  readonly poolBuilder: PoolBuilder;
  readonly metrics: MetricRegistry;
  readonly alerts: AlertGenerator;
  readonly audit: AuditStore;
  readonly monitor: FalsifierMonitor;

  private readonly logger: Logger;
  private readonly config: GovernanceConfig;
  private definitions: GovernanceDefinitions | null = null;
  private regimeDetector: RegimeDetector;
  private pool: Pool | null = null;

  constructor(
    private readonly configDir: string,
    options: GovernanceEngineOptions = {}
  ) {
    this.config = options.config ?? defaultConfig();
    this.logger = options.logger ?? new Logger(this.config.logging.level);
    this.audit = options.audit ?? createAuditStore(this.config, this.logger.child('audit'));
    this.metrics = options.metrics ?? new MetricRegistry(this.logger.child('metrics'));
    this.alerts =
      options.alerts ??
      new AlertGenerator(this.config.alerts.channels, this.logger.child('alerts'), this.config.alerts.maxRetained);
    if (!options.alerts && this.config.alerts.channels.includes('log')) {
      this.alerts.addHandler(logAlertHandler(this.logger.child('alerts')));
    }

    this.hypotheses = new HypothesisRegistry(this.logger.child('hypotheses'));
    this.constraints = new ConstraintRegistry(this.logger.child('constraints'));
    this.factors = new FactorRegistry(this.logger.child('factors'));
    this.resolver = new ConstraintResolver({
      hypotheses: this.hypotheses,
      constraints: this.constraints,
      audit: this.audit,
      cacheTtlMs: this.config.resolver.cacheTtlSeconds * 1000,
      logger: this.logger.child('resolver'),
      ...(options.now ? { now: options.now } : {}),
    });
    this.poolBuilder = new PoolBuilder({
      hypotheses: this.hypotheses,
      constraints: this.constraints,
      audit: this.audit,
      alerts: this.alerts,
      logger: this.logger.child('pool'),
    });
    this.monitor = new FalsifierMonitor({
      hypotheses: this.hypotheses,
      constraints: this.constraints,
      checker: new FalsifierChecker(this.metrics, {
        fundamentalMetrics: this.config.monitor.fundamentalMetrics,
        logger: this.logger.child('falsifiers'),
      }),
      alerts: this.alerts,
      audit: this.audit,
      tickMs: this.config.monitor.tickMinutes * 60 * 1000,
      logger: this.logger.child('monitor'),
      ...(options.now ? { now: options.now } : {}),
    });
    this.regimeDetector = new RegimeDetector(DEFAULT_REGIME_CONFIG, this.metrics, {
      audit: this.audit,
      logger: this.logger.child('regime'),
    });
  }

  static fromDirectory(configDir: string, options: GovernanceEngineOptions = {}): GovernanceEngine {
    const engine = new GovernanceEngine(configDir, options);
    engine.reload();
    return engine;
  }

  /**
   * Re-read the config directory. Everything is validated before any registry
   * is touched, so a bad file leaves the previous state in place.
   */
  reload(): void {
    const definitions = loadGovernanceDefinitions(this.configDir, this.logger.child('loader'));
    const lint = new AllowlistLint(this.logger.child('lint')).checkConstraints(definitions.constraints);
    if (!lint.passed) {
      throw new ValidationError(
        this.configDir,
        lint.violations.map((violation) => ({ field: violation.file, message: violation.message })),
        'gate:constraint_actions_allowlist'
      );
    }

    this.withActivationAudit('config_reload', undefined, () => {
      this.hypotheses.replaceFromConfig(definitions.hypotheses, this.persistedSunsets());
      this.constraints.replaceAll(definitions.constraints);
      this.factors.replaceAll(definitions.factors);
    });
    this.definitions = definitions;
    this.pool = null;
    this.regimeDetector = this.regimeDetector.reconfigure(definitions.regime ?? DEFAULT_REGIME_CONFIG);
  }

  activateHypothesis(id: string, approvedBy: string): Hypothesis {
    return this.withActivationAudit('hypothesis_activated', id, () =>
      this.hypotheses.activate(id, approvedBy)
    );
  }

  sunsetHypothesis(id: string, reason: string, actor = 'human'): Hypothesis {
    return this.withActivationAudit('hypothesis_sunset', id, () => this.hypotheses.sunset(id, reason, actor));
  }

  rejectHypothesis(id: string, reason: string, actor = 'human'): Hypothesis {
    return this.withActivationAudit('hypothesis_rejected', id, () => this.hypotheses.reject(id, reason, actor));
  }

  buildPool(): Pool {
    const poolConfig = this.definitions?.pool;
    if (!poolConfig) {
      throw new ValidationError(this.configDir, [{ field: 'pool.yaml', message: 'pool configuration not found' }]);
    }
    this.pool = this.poolBuilder.build(poolConfig);
    return this.pool;
  }

  currentPool(): Pool | null {
    return this.pool;
  }

  resolve(symbol: string, options: ResolveOptions = {}): ResolvedConstraints {
    return this.resolver.resolve(symbol, options);
  }

  detectRegime(): Promise<Regime> {
    return this.regimeDetector.detect();
  }

  /**
   * Scalar view for one symbol. Builds the pool on first use; the regime is
   * the last detected one, NORMAL before any detection.
   */
  strategyContext(symbol: string, options: ResolveOptions = {}): StrategyContext {
    const pool = this.pool ?? this.buildPool();
    const resolved = this.resolve(symbol, options);
    const regime = this.regimeDetector.current() ?? {
      state: 'NORMAL' as const,
      pacingMultiplier: (this.definitions?.regime ?? DEFAULT_REGIME_CONFIG).pacingMultipliers.NORMAL,
    };
    return buildStrategyContext(pool, resolved, regime);
  }

  runFalsifierChecks(options: { force?: boolean } = {}): Promise<MonitorRunReport> {
    return this.monitor.runOnce(options);
  }

  startMonitor(): void {
    this.monitor.start();
  }

  stopMonitor(): void {
    this.monitor.stop();
  }

  close(): void {
    this.monitor.stop();
    this.resolver.dispose();
    this.audit.close();
  }

  /** Hypotheses a falsifier sunset in an earlier run, read back from the audit trail. */
  private persistedSunsets(): Map<string, HypothesisStatus> {
    const sunset = new Map<string, HypothesisStatus>();
    for (const entry of this.audit.query({ eventType: 'falsifier_check_triggered' })) {
      if (entry.hypothesisId !== undefined && entry.actionDetails.triggerAction === 'sunset') {
        sunset.set(entry.hypothesisId, 'SUNSET');
      }
    }
    return sunset;
  }

  private activeConstraintIds(): Set<string> {
    return new Set(
      this.constraints
        .all()
        .filter((constraint) => isConstraintActive(constraint, this.hypotheses))
        .map((constraint) => constraint.id)
    );
  }

  /** Runs `change` and writes constraint_activated / constraint_deactivated for every flip. */
  private withActivationAudit<T>(reason: string, hypothesisId: string | undefined, change: () => T): T {
    const before = this.activeConstraintIds();
    const result = change();
    const after = this.activeConstraintIds();
    const related = hypothesisId !== undefined ? { hypothesisId } : {};
    for (const id of [...after].filter((id) => !before.has(id)).sort()) {
      this.audit.append({ ...related, eventType: 'constraint_activated', constraintId: id, actionDetails: { reason } });
    }
    for (const id of [...before].filter((id) => !after.has(id)).sort()) {
      this.audit.append({ ...related, eventType: 'constraint_deactivated', constraintId: id, actionDetails: { reason } });
    }
    return result;
  }
}
