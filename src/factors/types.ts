import type { ComparisonOperator } from '../governance/types.js';

export const FACTOR_STATUSES = ['ENABLED', 'DISABLED', 'REVIEW'] as const;
export type FactorStatus = (typeof FACTOR_STATUSES)[number];

export const FAILURE_ACTIONS = ['disable', 'review'] as const;
export type FailureAction = (typeof FAILURE_ACTIONS)[number];

export interface FactorFailureRule {
  metric: string;
  operator: ComparisonOperator;
  threshold: number;
  window: string;
  action: FailureAction;
}

export interface FactorIcConfig {
  window: string;
  horizonDays: number;
  minIc: number;
}

/**
 * Registration record only. Factor values are computed by the strategy layer.
 */
export interface Factor {
  id: string;
  name: string;
  description: string;
  inputs: string[];
  transform?: string;
  ic?: FactorIcConfig;
  hypothesisIds: string[];
  failureRules: FactorFailureRule[];
  status: FactorStatus;
}

export interface FactorHealthCheckResult {
  factorId: string;
  ruleIndex: number;
  metric: string;
  metricValue: number | null;
  triggered: boolean;
  action: FailureAction;
  checkedAt: string;
  message: string;
}
