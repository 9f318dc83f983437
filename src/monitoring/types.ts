import type {
  AlertSeverity,
  CheckSchedule,
  ComparisonOperator,
  TriggerAction,
} from '../governance/types.js';

export type FalsifierCheckStatus = 'passed' | 'triggered' | 'unavailable';

export interface FalsifierCheckResult {
  hypothesisId: string;
  falsifierIndex: number;
  metric: string;
  operator: ComparisonOperator;
  threshold: number;
  window: string;
  schedule: CheckSchedule;
  metricValue: number | null;
  status: FalsifierCheckStatus;
  triggered: boolean;
  triggerAction: TriggerAction;
  checkedAt: string;
  message: string;
}

export type AlertChannel = 'log' | 'email' | 'webhook';

export interface Alert {
  id: string;
  createdAt: string;
  severity: AlertSeverity;
  source: string;
  title: string;
  message: string;
  hypothesisId?: string;
  constraintId?: string;
  recommendedAction?: string;
  details: Record<string, unknown>;
  channels: AlertChannel[];
  delivered: boolean;
}

export type AlertInput = Omit<Alert, 'id' | 'createdAt' | 'channels' | 'delivered' | 'details'> & {
  details?: Record<string, unknown>;
};

export type HypothesisCheckState = 'not_yet_due' | 'checking' | 'triggered' | 'passed';
