import type { AuditStore } from '../audit/types.js';
import { isConstraintActive, linkedConstraintIds } from '../constraints/activation.js';
import type { ConstraintRegistry } from '../constraints/registry.js';
import type { Constraint } from '../constraints/types.js';
import { Logger } from '../core/logger.js';
import type { CheckSchedule, HypothesisStatus } from '../governance/types.js';
import type { HypothesisRegistry } from '../hypothesis/registry.js';
import type { Hypothesis } from '../hypothesis/types.js';
import type { AlertGenerator } from './alerts.js';
import type { FalsifierChecker } from './falsifier.js';
import type { FalsifierCheckResult, HypothesisCheckState } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export const SCHEDULE_INTERVAL_MS: Record<CheckSchedule, number> = {
  daily: DAY_MS,
  weekly: 7 * DAY_MS,
};

export interface FalsifierMonitorOptions {
  hypotheses: HypothesisRegistry;
  constraints: ConstraintRegistry;
  checker: FalsifierChecker;
  alerts: AlertGenerator;
  audit?: AuditStore;
  tickMs?: number;
  logger?: Logger;
  now?: () => number;
}

export interface HypothesisCheckReport {
  hypothesisId: string;
  state: HypothesisCheckState;
  results: FalsifierCheckResult[];
  transitionedTo?: HypothesisStatus;
  deactivatedConstraints: string[];
  error?: string;
}

export interface MonitorRunReport {
  startedAt: string;
  finishedAt: string;
  hypotheses: HypothesisCheckReport[];
  checked: number;
  triggered: number;
  unavailable: number;
  errors: number;
}

/**
 * Periodically evaluates the falsifiers of every ACTIVE hypothesis. A sunset
 * trigger moves the hypothesis to SUNSET, which publishes a new registry
 * snapshot and so clears every resolver cache listening to it.
 */
export class FalsifierMonitor {
  private timer: NodeJS.Timeout | null = null;
  private stopped = true;
  private inFlight: Promise<MonitorRunReport> | null = null;
  private lastChecked = new Map<string, number>();
  private states = new Map<string, HypothesisCheckState>();
  // Falsifiers whose missing metric has already been alerted on.
  private unavailableAlerted = new Set<string>();
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly tickMs: number;

  constructor(private readonly options: FalsifierMonitorOptions) {
    this.logger = options.logger ?? new Logger('info');
    this.now = options.now ?? Date.now;
    this.tickMs = options.tickMs ?? 60 * 60 * 1000;
  }

  start(): void {
    if (this.timer) return;
    this.stopped = false;
    this.scheduleNext(0);
  }

  stop(): void {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return !this.stopped;
  }

  stateOf(hypothesisId: string): HypothesisCheckState {
    return this.states.get(hypothesisId) ?? 'not_yet_due';
  }

  /** Run one cycle now. Concurrent callers share the cycle in progress. */
  runOnce(options: { force?: boolean } = {}): Promise<MonitorRunReport> {
    if (!this.inFlight) {
      this.inFlight = this.cycle(options.force ?? false).finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private scheduleNext(delayMs: number): void {
    if (this.stopped) return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.runOnce()
        .catch((err) => this.logger.error('Falsifier monitor cycle failed', err))
        .finally(() => this.scheduleNext(this.tickMs));
    }, Math.max(0, delayMs));
  }

  private async cycle(force: boolean): Promise<MonitorRunReport> {
    const startedAt = new Date(this.now()).toISOString();
    const reports: HypothesisCheckReport[] = [];
    const active = this.options.hypotheses.active();
    this.logger.info(`Starting falsifier check run over ${active.length} active hypotheses`);

    for (const hypothesis of active) {
      try {
        reports.push(await this.checkHypothesis(hypothesis, force));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Falsifier check failed for hypothesis ${hypothesis.id}`, error);
        this.states.set(hypothesis.id, 'not_yet_due');
        reports.push({
          hypothesisId: hypothesis.id,
          state: 'not_yet_due',
          results: [],
          deactivatedConstraints: [],
          error: message,
        });
      }
    }

    const results = reports.flatMap((report) => report.results);
    const report: MonitorRunReport = {
      startedAt,
      finishedAt: new Date(this.now()).toISOString(),
      hypotheses: reports,
      checked: results.filter((result) => result.status !== 'unavailable').length,
      triggered: results.filter((result) => result.triggered).length,
      unavailable: results.filter((result) => result.status === 'unavailable').length,
      errors: reports.filter((entry) => entry.error !== undefined).length,
    };
    this.logger.info(
      `Falsifier check run complete: ${report.checked} checks, ${report.triggered} triggered, ` +
        `${report.unavailable} unavailable, ${report.errors} errors`
    );
    return report;
  }

  private isDue(hypothesis: Hypothesis, index: number, force: boolean): boolean {
    if (force) return true;
    const falsifier = hypothesis.falsifiers[index];
    const last = this.lastChecked.get(`${hypothesis.id}#${index}`);
    if (!falsifier || last === undefined) return true;
    const interval = SCHEDULE_INTERVAL_MS[this.options.checker.scheduleFor(falsifier)];
    return this.now() - last >= interval;
  }

  private async checkHypothesis(hypothesis: Hypothesis, force: boolean): Promise<HypothesisCheckReport> {
    const due = hypothesis.falsifiers
      .map((_, index) => index)
      .filter((index) => this.isDue(hypothesis, index, force));
    const report: HypothesisCheckReport = {
      hypothesisId: hypothesis.id,
      state: 'not_yet_due',
      results: [],
      deactivatedConstraints: [],
    };
    if (due.length === 0) {
      this.states.set(hypothesis.id, 'not_yet_due');
      return report;
    }

    this.states.set(hypothesis.id, 'checking');
    let evaluated = 0;
    let triggered = false;

    for (const index of due) {
      const result = await this.options.checker.evaluate(hypothesis, index);
      report.results.push(result);

      const key = `${hypothesis.id}#${index}`;
      if (result.status === 'unavailable') {
        if (this.unavailableAlerted.has(key)) {
          this.logger.debug(`Metric ${result.metric} still unavailable for ${key}`);
          continue;
        }
        this.unavailableAlerted.add(key);
        this.options.alerts.raise({
          severity: 'warning',
          source: 'metric_registry',
          hypothesisId: hypothesis.id,
          title: `Metric unavailable: ${result.metric}`,
          message: `${result.message}; falsifier [${index}] of '${hypothesis.id}' was not evaluated`,
          details: { metric: result.metric, window: result.window, falsifierIndex: index },
        });
        continue;
      }

      evaluated += 1;
      this.unavailableAlerted.delete(key);
      this.lastChecked.set(key, this.now());
      this.options.audit?.append({
        eventType: result.triggered ? 'falsifier_check_triggered' : 'falsifier_check_pass',
        hypothesisId: hypothesis.id,
        actionDetails: {
          falsifierIndex: index,
          metric: result.metric,
          metricValue: result.metricValue,
          operator: result.operator,
          threshold: result.threshold,
          window: result.window,
          triggerAction: result.triggerAction,
        },
      });

      if (!result.triggered) continue;
      triggered = true;

      if (result.triggerAction === 'sunset') {
        report.deactivatedConstraints = this.sunsetAndCascade(hypothesis, result);
        report.transitionedTo = 'SUNSET';
        this.options.alerts.fromCheck(result, { deactivatedConstraints: report.deactivatedConstraints });
        break;
      }
      this.options.alerts.fromCheck(result);
    }

    if (triggered) report.state = 'triggered';
    else if (evaluated > 0) report.state = 'passed';
    this.states.set(hypothesis.id, report.state);
    return report;
  }

  /** Returns the ids of constraints deactivated by the sunset. */
  private sunsetAndCascade(hypothesis: Hypothesis, result: FalsifierCheckResult): string[] {
    const { hypotheses, constraints, audit } = this.options;
    const linked = linkedConstraintIds(hypothesis.id, hypothesis.linkedConstraints, constraints.all())
      .map((id) => constraints.get(id))
      .filter((constraint): constraint is Constraint => constraint !== undefined);
    const wasActive = new Set(
      linked.filter((constraint) => isConstraintActive(constraint, hypotheses)).map((constraint) => constraint.id)
    );

    hypotheses.sunset(
      hypothesis.id,
      `falsifier [${result.falsifierIndex}] ${result.metric}=${result.metricValue} ${result.operator} ${result.threshold}`
    );

    const deactivated: string[] = [];
    for (const constraint of linked) {
      if (!wasActive.has(constraint.id) || isConstraintActive(constraint, hypotheses)) continue;
      const cascades = constraint.activation.disabledIfFalsified;
      if (cascades) {
        deactivated.push(constraint.id);
      } else {
        this.logger.warn(
          `Constraint ${constraint.id} lost hypothesis ${hypothesis.id} but does not cascade on falsification`
        );
      }
      audit?.append({
        eventType: 'constraint_deactivated',
        hypothesisId: hypothesis.id,
        constraintId: constraint.id,
        actionDetails: {
          reason: cascades ? 'hypothesis_sunset' : 'required_hypothesis_inactive',
          metric: result.metric,
          metricValue: result.metricValue,
          threshold: result.threshold,
        },
      });
    }
    if (deactivated.length > 0) {
      this.logger.warn(`Sunset of ${hypothesis.id} deactivated constraints: ${deactivated.join(', ')}`);
    }
    return deactivated;
  }
}
