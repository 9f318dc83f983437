import type { StopMode } from '../governance/types.js';
import type {
  ActionField,
  Constraint,
  ConstraintActions,
  ConstraintEffect,
  ConstraintGuardrails,
} from './types.js';
import { ACTION_FIELDS } from './types.js';

export type ReduceMode = 'multiply' | 'or' | 'first_wins' | 'min';

export interface ActionAccumulator {
  riskBudgetMultiplier: number;
  poolBiasMultiplier: number;
  vetoDowngrade: boolean;
  stopMode: StopMode | null;
  holdingExtensionDays: number | null;
  enableStrategy: boolean | null;
  positionCapMultiplier: number;
}

export interface ActionReducer {
  mode: ReduceMode;
  /** Folds one constraint's action into `acc`; returns the value if it took effect. */
  apply(acc: ActionAccumulator, actions: ConstraintActions): number | boolean | string | undefined;
}

/**
 * How each action field combines across constraints visited in (priority, id)
 * order. Keyed by every ActionField so a new action cannot be added without a
 * combination rule.
 */
export const ACTION_REDUCERS: Record<ActionField, ActionReducer> = {
  enableStrategy: {
    mode: 'first_wins',
    apply(acc, { enableStrategy }) {
      if (enableStrategy === undefined || acc.enableStrategy !== null) return undefined;
      acc.enableStrategy = enableStrategy;
      return enableStrategy;
    },
  },
  poolBiasMultiplier: {
    mode: 'multiply',
    apply(acc, { poolBiasMultiplier }) {
      if (poolBiasMultiplier === undefined) return undefined;
      acc.poolBiasMultiplier *= poolBiasMultiplier;
      return poolBiasMultiplier;
    },
  },
  vetoDowngrade: {
    mode: 'or',
    apply(acc, { vetoDowngrade }) {
      if (vetoDowngrade === undefined) return undefined;
      acc.vetoDowngrade = acc.vetoDowngrade || vetoDowngrade;
      return vetoDowngrade;
    },
  },
  riskBudgetMultiplier: {
    mode: 'multiply',
    apply(acc, { riskBudgetMultiplier }) {
      if (riskBudgetMultiplier === undefined) return undefined;
      acc.riskBudgetMultiplier *= riskBudgetMultiplier;
      return riskBudgetMultiplier;
    },
  },
  holdingExtensionDays: {
    mode: 'first_wins',
    apply(acc, { holdingExtensionDays }) {
      if (holdingExtensionDays === undefined || acc.holdingExtensionDays !== null) return undefined;
      acc.holdingExtensionDays = holdingExtensionDays;
      return holdingExtensionDays;
    },
  },
  addPositionCapMultiplier: {
    mode: 'min',
    apply(acc, { addPositionCapMultiplier }) {
      if (addPositionCapMultiplier === undefined) return undefined;
      acc.positionCapMultiplier = Math.min(acc.positionCapMultiplier, addPositionCapMultiplier);
      return addPositionCapMultiplier;
    },
  },
  stopMode: {
    mode: 'first_wins',
    apply(acc, { stopMode }) {
      if (stopMode === undefined || acc.stopMode !== null) return undefined;
      acc.stopMode = stopMode;
      return stopMode;
    },
  },
};

export function emptyAccumulator(): ActionAccumulator {
  return {
    riskBudgetMultiplier: 1,
    poolBiasMultiplier: 1,
    vetoDowngrade: false,
    stopMode: null,
    holdingExtensionDays: null,
    enableStrategy: null,
    positionCapMultiplier: 1,
  };
}

function minDefined(a: number | undefined, b: number | undefined): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.min(a, b);
}

/** Field-wise minimum: the tightest ceiling always wins. */
export function mergeGuardrails(list: ReadonlyArray<ConstraintGuardrails | undefined>): ConstraintGuardrails {
  const merged: ConstraintGuardrails = {};
  for (const guardrails of list) {
    if (!guardrails) continue;
    const maxPositionPct = minDefined(merged.maxPositionPct, guardrails.maxPositionPct);
    const maxGrossExposureDelta = minDefined(merged.maxGrossExposureDelta, guardrails.maxGrossExposureDelta);
    const maxDrawdownAddon = minDefined(merged.maxDrawdownAddon, guardrails.maxDrawdownAddon);
    if (maxPositionPct !== undefined) merged.maxPositionPct = maxPositionPct;
    if (maxGrossExposureDelta !== undefined) merged.maxGrossExposureDelta = maxGrossExposureDelta;
    if (maxDrawdownAddon !== undefined) merged.maxDrawdownAddon = maxDrawdownAddon;
  }
  return merged;
}

export interface FoldResult {
  values: ActionAccumulator;
  effects: ConstraintEffect[];
  guardrails: ConstraintGuardrails;
}

/** `constraints` must already be sorted by (priority, id). */
export function foldConstraints(constraints: readonly Constraint[]): FoldResult {
  const values = emptyAccumulator();
  const effects: ConstraintEffect[] = [];
  for (const constraint of constraints) {
    for (const field of ACTION_FIELDS) {
      const value = ACTION_REDUCERS[field].apply(values, constraint.actions);
      if (value !== undefined) {
        effects.push({ constraintId: constraint.id, priority: constraint.priority, field, value });
      }
    }
  }
  return {
    values,
    effects,
    guardrails: mergeGuardrails(constraints.map((constraint) => constraint.guardrails)),
  };
}
