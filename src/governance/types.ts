/**
 * Vocabulary shared by every governance component.
 */

export const HYPOTHESIS_STATUSES = ['DRAFT', 'ACTIVE', 'SUNSET', 'REJECTED'] as const;
export type HypothesisStatus = (typeof HYPOTHESIS_STATUSES)[number];

export const COMPARISON_OPERATORS = ['<', '<=', '>', '>=', '=='] as const;
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export const TRIGGER_ACTIONS = ['review', 'sunset'] as const;
export type TriggerAction = (typeof TRIGGER_ACTIONS)[number];

export const STOP_MODES = ['baseline', 'wide', 'fundamental_guarded'] as const;
export type StopMode = (typeof STOP_MODES)[number];

export const CHECK_SCHEDULES = ['daily', 'weekly'] as const;
export type CheckSchedule = (typeof CHECK_SCHEDULES)[number];

export const AUDIT_EVENT_TYPES = [
  'constraint_activated',
  'constraint_deactivated',
  'falsifier_check_pass',
  'falsifier_check_triggered',
  'veto_downgrade',
  'risk_budget_adjusted',
  'position_cap_applied',
  'pool_built',
  'regime_changed',
] as const;
export type AuditEventType = (typeof AUDIT_EVENT_TYPES)[number];

export const ALERT_SEVERITIES = ['info', 'warning', 'critical'] as const;
export type AlertSeverity = (typeof ALERT_SEVERITIES)[number];

export const REGIME_STATES = ['NORMAL', 'TRANSITION', 'STRESS'] as const;
export type RegimeState = (typeof REGIME_STATES)[number];

export function compareMetric(value: number, operator: ComparisonOperator, threshold: number): boolean {
  switch (operator) {
    case '<':
      return value < threshold;
    case '<=':
      return value <= threshold;
    case '>':
      return value > threshold;
    case '>=':
      return value >= threshold;
    case '==':
      return value === threshold;
  }
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}
