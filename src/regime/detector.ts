import type { AuditStore } from '../audit/types.js';
import { Logger } from '../core/logger.js';
import type { RegimeState } from '../governance/types.js';
import type { MetricRegistry } from '../monitoring/metrics.js';
import type { Regime, RegimeConfig, RegimeMetrics, RegimeThresholds } from './types.js';

export const REGIME_METRICS = {
  volatility: 'portfolio_volatility',
  drawdown: 'max_drawdown',
  dispersion: 'cross_sectional_dispersion',
} as const;

export const DEFAULT_REGIME_CONFIG: RegimeConfig = {
  thresholds: {
    volatilityTransition: 0.25,
    volatilityStress: 0.4,
    drawdownTransition: 0.1,
    drawdownStress: 0.2,
  },
  pacingMultipliers: { NORMAL: 1, TRANSITION: 0.5, STRESS: 0.1 },
};

const atOrAbove = (value: number, threshold: number | undefined): boolean =>
  threshold !== undefined && value >= threshold;

/** STRESS if any metric reaches its stress threshold, then TRANSITION, else NORMAL. */
export function classifyRegime(metrics: RegimeMetrics, thresholds: RegimeThresholds): RegimeState {
  const { portfolioVolatility: vol, maxDrawdown: dd, crossSectionalDispersion: disp } = metrics;
  if (
    atOrAbove(vol, thresholds.volatilityStress) ||
    atOrAbove(dd, thresholds.drawdownStress) ||
    atOrAbove(disp, thresholds.dispersionStress)
  ) {
    return 'STRESS';
  }
  if (
    atOrAbove(vol, thresholds.volatilityTransition) ||
    atOrAbove(dd, thresholds.drawdownTransition) ||
    atOrAbove(disp, thresholds.dispersionTransition)
  ) {
    return 'TRANSITION';
  }
  return 'NORMAL';
}

/**
 * Classifies the market regime for position pacing. Its output never reaches
 * alpha computation.
 */
export class RegimeDetector {
  private previous: Regime | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly config: RegimeConfig,
    private readonly metrics: MetricRegistry,
    private readonly options: { audit?: AuditStore; logger?: Logger; now?: () => Date } = {}
  ) {
    this.logger = options.logger ?? new Logger('info');
  }

  current(): Regime | null {
    return this.previous;
  }

  /**
   * Detector for a new config that remembers the last regime, so a reload
   * neither resets pacing to NORMAL nor hides the next transition.
   */
  reconfigure(config: RegimeConfig): RegimeDetector {
    const next = new RegimeDetector(config, this.metrics, this.options);
    if (this.previous) {
      next.previous = {
        ...this.previous,
        thresholds: config.thresholds,
        pacingMultiplier: config.pacingMultipliers[this.previous.state],
      };
    }
    return next;
  }

  async detect(): Promise<Regime> {
    const observed: RegimeMetrics = {
      portfolioVolatility: await this.metricOrZero(REGIME_METRICS.volatility),
      maxDrawdown: await this.metricOrZero(REGIME_METRICS.drawdown),
      crossSectionalDispersion: await this.metricOrZero(REGIME_METRICS.dispersion),
    };
    const state = classifyRegime(observed, this.config.thresholds);
    const previousState = this.previous?.state ?? null;
    const regime: Regime = {
      state,
      previousState,
      metrics: observed,
      thresholds: this.config.thresholds,
      pacingMultiplier: this.config.pacingMultipliers[state],
      detectedAt: (this.options.now?.() ?? new Date()).toISOString(),
    };

    if (previousState !== null && previousState !== state) {
      this.logger.info(
        `Regime transition: ${previousState} -> ${state} ` +
          `(vol=${observed.portfolioVolatility}, dd=${observed.maxDrawdown}, pacing=${regime.pacingMultiplier})`
      );
      this.options.audit?.append({
        eventType: 'regime_changed',
        timestamp: regime.detectedAt,
        actionDetails: {
          from: previousState,
          to: state,
          metrics: observed,
          pacingMultiplier: regime.pacingMultiplier,
        },
      });
    }
    this.previous = regime;
    return regime;
  }

  private async metricOrZero(name: string): Promise<number> {
    return (await this.metrics.getValue(name)) ?? 0;
  }
}
