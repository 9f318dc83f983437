import type { Logger } from '../core/logger.js';
import type { HypothesisLookup } from '../hypothesis/types.js';
import type { Constraint } from './types.js';

export interface ActivationCheck {
  active: boolean;
  missing: string[];
  inactive: string[];
}

/**
 * Required hypotheses that are missing or not ACTIVE. A constraint with no
 * requirements is unconditionally active.
 */
export function checkActivation(constraint: Constraint, hypotheses: HypothesisLookup): ActivationCheck {
  const missing: string[] = [];
  const inactive: string[] = [];
  for (const id of constraint.activation.requiresHypothesesActive) {
    const hypothesis = hypotheses.get(id);
    if (!hypothesis) {
      missing.push(id);
    } else if (hypothesis.status !== 'ACTIVE') {
      inactive.push(id);
    }
  }
  return { active: missing.length === 0 && inactive.length === 0, missing, inactive };
}

/**
 * True iff every required hypothesis exists and is ACTIVE. Unknown
 * hypotheses close the constraint and are reported on `logger`.
 */
export function isConstraintActive(
  constraint: Constraint,
  hypotheses: HypothesisLookup,
  logger?: Logger
): boolean {
  const check = checkActivation(constraint, hypotheses);
  if (check.missing.length > 0) {
    logger?.warn(
      `Constraint ${constraint.id} requires unknown hypotheses: ${check.missing.join(', ')}; treating as inactive`
    );
  }
  return check.active;
}

/** Constraints tied to a hypothesis, either listed by it or requiring it. */
export function linkedConstraintIds(
  hypothesisId: string,
  linkedConstraints: readonly string[],
  constraints: readonly Constraint[]
): string[] {
  const ids = new Set(linkedConstraints);
  for (const constraint of constraints) {
    if (constraint.activation.requiresHypothesesActive.includes(hypothesisId)) {
      ids.add(constraint.id);
    }
  }
  return [...ids].sort();
}
