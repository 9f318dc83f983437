import { Logger } from '../core/logger.js';
import type { CheckSchedule } from '../governance/types.js';
import { compareMetric } from '../governance/types.js';
import type { Falsifier, Hypothesis } from '../hypothesis/types.js';
import type { MetricRegistry } from './metrics.js';
import type { FalsifierCheckResult } from './types.js';

export interface FalsifierCheckerOptions {
  /** Metrics whose falsifiers default to a weekly schedule. */
  fundamentalMetrics?: readonly string[];
  logger?: Logger;
  now?: () => Date;
}

export class FalsifierChecker {
  private readonly fundamentalMetrics: ReadonlySet<string>;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly metrics: MetricRegistry,
    options: FalsifierCheckerOptions = {}
  ) {
    this.fundamentalMetrics = new Set(options.fundamentalMetrics ?? []);
    this.logger = options.logger ?? new Logger('info');
    this.now = options.now ?? (() => new Date());
  }

  scheduleFor(falsifier: Falsifier): CheckSchedule {
    return falsifier.schedule ?? (this.fundamentalMetrics.has(falsifier.metric) ? 'weekly' : 'daily');
  }

  /**
   * Compares the current metric value against the falsifier threshold. A
   * missing value yields status `unavailable` and never triggers.
   */
  async evaluate(hypothesis: Hypothesis, falsifierIndex: number): Promise<FalsifierCheckResult> {
    const falsifier = hypothesis.falsifiers[falsifierIndex];
    if (!falsifier) {
      throw new RangeError(`Hypothesis ${hypothesis.id} has no falsifier at index ${falsifierIndex}`);
    }
    const base = {
      hypothesisId: hypothesis.id,
      falsifierIndex,
      metric: falsifier.metric,
      operator: falsifier.operator,
      threshold: falsifier.threshold,
      window: falsifier.window,
      schedule: this.scheduleFor(falsifier),
      triggerAction: falsifier.trigger,
      checkedAt: this.now().toISOString(),
    };

    const value = await this.metrics.getValue(falsifier.metric, {
      window: falsifier.window,
      scope: {
        symbols: hypothesis.scope.symbols,
        sectors: hypothesis.scope.sectors,
        hypothesisId: hypothesis.id,
      },
    });

    if (value === undefined) {
      this.logger.warn(
        `Metric ${falsifier.metric} unavailable for hypothesis ${hypothesis.id} (window=${falsifier.window}); skipping check`
      );
      return {
        ...base,
        metricValue: null,
        status: 'unavailable',
        triggered: false,
        message: `No data available for metric '${falsifier.metric}' (window=${falsifier.window})`,
      };
    }

    const triggered = compareMetric(value, falsifier.operator, falsifier.threshold);
    return {
      ...base,
      metricValue: value,
      status: triggered ? 'triggered' : 'passed',
      triggered,
      message: triggered
        ? `TRIGGERED: ${falsifier.metric}=${value} ${falsifier.operator} ${falsifier.threshold} (window=${falsifier.window}); action: ${falsifier.trigger}`
        : `Passed: ${falsifier.metric}=${value}, threshold ${falsifier.operator} ${falsifier.threshold} not met (window=${falsifier.window})`,
    };
  }
}
