import type { StopMode } from '../governance/types.js';

export interface ConstraintAppliesTo {
  symbols: string[];
  strategies: string[];
}

export interface ConstraintActivation {
  requiresHypothesesActive: string[];
  disabledIfFalsified: boolean;
}

/**
 * Closed set of actions a constraint may take. Nothing here can name a
 * symbol to buy or sell.
 */
export interface ConstraintActions {
  enableStrategy?: boolean;
  poolBiasMultiplier?: number;
  vetoDowngrade?: boolean;
  riskBudgetMultiplier?: number;
  holdingExtensionDays?: number;
  addPositionCapMultiplier?: number;
  stopMode?: StopMode;
}

export type ActionField = keyof ConstraintActions;

/** Config spelling of each action field. */
export const ACTION_FIELD_NAMES = {
  enableStrategy: 'enable_strategy',
  poolBiasMultiplier: 'pool_bias_multiplier',
  vetoDowngrade: 'veto_downgrade',
  riskBudgetMultiplier: 'risk_budget_multiplier',
  holdingExtensionDays: 'holding_extension_days',
  addPositionCapMultiplier: 'add_position_cap_multiplier',
  stopMode: 'stop_mode',
} as const satisfies Record<ActionField, string>;

export const ACTION_FIELDS: readonly ActionField[] = [
  'enableStrategy',
  'poolBiasMultiplier',
  'vetoDowngrade',
  'riskBudgetMultiplier',
  'holdingExtensionDays',
  'addPositionCapMultiplier',
  'stopMode',
];

export const ACTION_ALLOWLIST: ReadonlySet<string> = new Set(Object.values(ACTION_FIELD_NAMES));

/** Hard ceilings that win over any action regardless of priority. */
export interface ConstraintGuardrails {
  maxPositionPct?: number;
  maxGrossExposureDelta?: number;
  maxDrawdownAddon?: number;
}

export interface Constraint {
  id: string;
  title: string;
  appliesTo: ConstraintAppliesTo;
  activation: ConstraintActivation;
  actions: ConstraintActions;
  guardrails?: ConstraintGuardrails;
  priority: number;
}

export interface ConstraintFilter {
  symbol?: string;
  strategy?: string;
}

export interface ConstraintEffect {
  constraintId: string;
  priority: number;
  field: ActionField;
  value: number | boolean | string;
}

export interface ResolvedConstraints {
  symbol: string;
  strategyId?: string;
  effects: ConstraintEffect[];
  constraintIds: string[];
  riskBudgetMultiplier: number;
  poolBiasMultiplier: number;
  vetoDowngrade: boolean;
  stopMode: StopMode;
  holdingExtensionDays: number;
  enableStrategy: boolean | null;
  positionCapMultiplier: number;
  guardrails: ConstraintGuardrails;
  version: string;
  epoch: string;
  resolvedAt: string;
}
