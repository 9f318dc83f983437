import { Logger } from '../core/logger.js';
import { SnapshotRegistry } from '../governance/snapshot.js';
import { normalizeSymbol } from '../governance/types.js';
import type { Constraint, ConstraintFilter } from './types.js';

export function appliesToSymbol(constraint: Constraint, symbol: string): boolean {
  const { symbols } = constraint.appliesTo;
  return symbols.length === 0 || symbols.includes(normalizeSymbol(symbol));
}

export function appliesToStrategy(constraint: Constraint, strategyId: string): boolean {
  const { strategies } = constraint.appliesTo;
  return strategies.length === 0 || strategies.includes(strategyId);
}

export class ConstraintRegistry extends SnapshotRegistry<Constraint> {
  constructor(logger: Logger = new Logger('info')) {
    super('constraint', logger);
  }

  /** Ordered by (priority, id). */
  list(filter: ConstraintFilter = {}): Constraint[] {
    return this.all()
      .filter((constraint) => filter.symbol === undefined || appliesToSymbol(constraint, filter.symbol))
      .filter((constraint) => filter.strategy === undefined || appliesToStrategy(constraint, filter.strategy))
      .sort((a, b) => a.priority - b.priority || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  requiring(hypothesisId: string): Constraint[] {
    return this.list().filter((constraint) =>
      constraint.activation.requiresHypothesesActive.includes(hypothesisId)
    );
  }
}
