import { NotFoundError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { SnapshotRegistry } from '../governance/snapshot.js';
import { compareMetric } from '../governance/types.js';
import type { MetricRegistry } from '../monitoring/metrics.js';
import type { Factor, FactorHealthCheckResult, FactorStatus } from './types.js';

export interface FactorHealthReport {
  factorId: string;
  previousStatus: FactorStatus;
  status: FactorStatus;
  results: FactorHealthCheckResult[];
}

export class FactorRegistry extends SnapshotRegistry<Factor> {
  constructor(logger: Logger = new Logger('info')) {
    super('factor', logger);
  }

  list(filter: { status?: FactorStatus; hypothesisId?: string } = {}): Factor[] {
    return this.all().filter(
      (factor) =>
        (filter.status === undefined || factor.status === filter.status) &&
        (filter.hypothesisId === undefined || factor.hypothesisIds.includes(filter.hypothesisId))
    );
  }

  enabled(): Factor[] {
    return this.list({ status: 'ENABLED' });
  }

  enable(id: string): Factor {
    return this.setStatus(id, 'ENABLED');
  }

  disable(id: string): Factor {
    return this.setStatus(id, 'DISABLED');
  }

  markForReview(id: string): Factor {
    return this.setStatus(id, 'REVIEW');
  }

  /**
   * Evaluates every failure rule against current metrics. A triggered
   * `disable` rule wins over any `review` rule. Rules whose metric is
   * unavailable never trigger.
   */
  async checkHealth(id: string, metrics: MetricRegistry): Promise<FactorHealthReport> {
    const factor = this.require(id);
    const checkedAt = new Date().toISOString();
    const results: FactorHealthCheckResult[] = [];
    let shouldDisable = false;
    let shouldReview = false;

    for (const [ruleIndex, rule] of factor.failureRules.entries()) {
      const value = await metrics.getValue(rule.metric, { window: rule.window });
      if (value === undefined) {
        results.push({
          factorId: id,
          ruleIndex,
          metric: rule.metric,
          metricValue: null,
          triggered: false,
          action: rule.action,
          checkedAt,
          message: `No data available for metric '${rule.metric}' (window=${rule.window})`,
        });
        continue;
      }
      const triggered = compareMetric(value, rule.operator, rule.threshold);
      if (triggered) {
        this.logger.warn(
          `Failure rule triggered for factor ${id}: ${rule.metric}=${value} ${rule.operator} ${rule.threshold}`
        );
        if (rule.action === 'disable') shouldDisable = true;
        else shouldReview = true;
      }
      results.push({
        factorId: id,
        ruleIndex,
        metric: rule.metric,
        metricValue: value,
        triggered,
        action: rule.action,
        checkedAt,
        message: triggered
          ? `TRIGGERED: ${rule.metric}=${value} ${rule.operator} ${rule.threshold} (window=${rule.window}); action: ${rule.action}`
          : `Passed: ${rule.metric}=${value}, threshold ${rule.operator} ${rule.threshold} not met (window=${rule.window})`,
      });
    }

    let status = factor.status;
    if (shouldDisable && status !== 'DISABLED') {
      status = this.disable(id).status;
    } else if (shouldReview && !shouldDisable && status === 'ENABLED') {
      status = this.markForReview(id).status;
    }
    return { factorId: id, previousStatus: factor.status, status, results };
  }

  private require(id: string): Factor {
    const factor = this.get(id);
    if (!factor) {
      throw new NotFoundError('factor', id);
    }
    return factor;
  }

  private setStatus(id: string, status: FactorStatus): Factor {
    const factor = this.require(id);
    if (factor.status === status) {
      return factor;
    }
    this.logger.info(`Factor ${id}: ${factor.status} -> ${status}`);
    return this.update({ ...factor, status });
  }
}
