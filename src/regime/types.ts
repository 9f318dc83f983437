import type { RegimeState } from '../governance/types.js';

export interface RegimeThresholds {
  volatilityTransition: number;
  volatilityStress: number;
  drawdownTransition: number;
  drawdownStress: number;
  dispersionTransition?: number;
  dispersionStress?: number;
}

export interface RegimeConfig {
  thresholds: RegimeThresholds;
  pacingMultipliers: Record<RegimeState, number>;
}

export interface RegimeMetrics {
  portfolioVolatility: number;
  maxDrawdown: number;
  crossSectionalDispersion: number;
}

/** Consumed for position pacing only. */
export interface Regime {
  state: RegimeState;
  previousState: RegimeState | null;
  metrics: RegimeMetrics;
  thresholds: RegimeThresholds;
  pacingMultiplier: number;
  detectedAt: string;
}
