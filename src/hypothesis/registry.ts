import { InvalidTransitionError, NotFoundError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { SnapshotRegistry } from '../governance/snapshot.js';
import type { HypothesisStatus } from '../governance/types.js';
import { normalizeSymbol } from '../governance/types.js';
import type { Hypothesis, HypothesisFilter, HypothesisLookup } from './types.js';

const ALLOWED_TRANSITIONS: Record<HypothesisStatus, readonly HypothesisStatus[]> = {
  DRAFT: ['ACTIVE', 'REJECTED'],
  ACTIVE: ['SUNSET', 'REJECTED'],
  SUNSET: [],
  REJECTED: [],
};

export interface HypothesisTransition {
  hypothesisId: string;
  from: HypothesisStatus;
  to: HypothesisStatus;
  actor: string;
  reason: string;
  at: string;
}

export interface StatusOverride {
  hypothesisId: string;
  configured: HypothesisStatus;
  kept: HypothesisStatus;
}

export function isTerminalStatus(status: HypothesisStatus): boolean {
  return ALLOWED_TRANSITIONS[status].length === 0;
}

export function canTransition(from: HypothesisStatus, to: HypothesisStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function matchesScope(hypothesis: Hypothesis, symbol?: string, sector?: string): boolean {
  const { symbols, sectors } = hypothesis.scope;
  if (symbol !== undefined && symbols.length > 0 && !symbols.includes(normalizeSymbol(symbol))) {
    return false;
  }
  if (sector !== undefined && sectors.length > 0 && !sectors.includes(sector)) {
    return false;
  }
  return true;
}

export class HypothesisRegistry extends SnapshotRegistry<Hypothesis> implements HypothesisLookup {
  private transitions: HypothesisTransition[] = [];

  constructor(logger: Logger = new Logger('info')) {
    super('hypothesis', logger);
  }

  list(filter: HypothesisFilter = {}): Hypothesis[] {
    const statuses =
      filter.status === undefined ? undefined : Array.isArray(filter.status) ? filter.status : [filter.status];
    return this.all().filter((hypothesis) => {
      if (statuses && !statuses.includes(hypothesis.status)) return false;
      return matchesScope(hypothesis, filter.symbol, filter.sector);
    });
  }

  active(): Hypothesis[] {
    return this.list({ status: 'ACTIVE' });
  }

  /** Human approval is the only way a hypothesis becomes ACTIVE. */
  activate(id: string, approvedBy: string): Hypothesis {
    if (!approvedBy.trim()) {
      throw new InvalidTransitionError(id, this.require(id).status, 'ACTIVE');
    }
    return this.transition(id, 'ACTIVE', approvedBy, 'approved');
  }

  sunset(id: string, reason: string, actor = 'falsifier_monitor'): Hypothesis {
    return this.transition(id, 'SUNSET', actor, reason);
  }

  reject(id: string, reason: string, actor = 'human'): Hypothesis {
    return this.transition(id, 'REJECTED', actor, reason);
  }

  /**
   * Swap in definitions re-read from config without undoing lifecycle changes
   * made at runtime. A status reached by transition (or persisted elsewhere,
   * see `persisted`) is kept unless the configured status is a legal next
   * step from it; terminal statuses therefore always stick.
   */
  replaceFromConfig(
    entities: Hypothesis[],
    persisted: ReadonlyMap<string, HypothesisStatus> = new Map()
  ): StatusOverride[] {
    const overrides: StatusOverride[] = [];
    const merged = entities.map((entity) => {
      const kept = this.runtimeStatus(entity.id) ?? persisted.get(entity.id);
      if (kept === undefined || kept === entity.status || canTransition(kept, entity.status)) {
        return entity;
      }
      overrides.push({ hypothesisId: entity.id, configured: entity.status, kept });
      this.logger.warn(`Hypothesis ${entity.id}: config says ${entity.status}, keeping ${kept}`);
      return { ...entity, status: kept };
    });
    this.replaceAll(merged);
    return overrides;
  }

  history(id?: string): HypothesisTransition[] {
    return this.transitions.filter((entry) => id === undefined || entry.hypothesisId === id);
  }

  private runtimeStatus(id: string): HypothesisStatus | undefined {
    const last = this.history(id).at(-1);
    if (last) return last.to;
    const current = this.get(id);
    return current && isTerminalStatus(current.status) ? current.status : undefined;
  }

  private require(id: string): Hypothesis {
    const hypothesis = this.get(id);
    if (!hypothesis) {
      throw new NotFoundError('hypothesis', id);
    }
    return hypothesis;
  }

  private transition(id: string, to: HypothesisStatus, actor: string, reason: string): Hypothesis {
    const current = this.require(id);
    if (!canTransition(current.status, to)) {
      throw new InvalidTransitionError(id, current.status, to);
    }
    this.transitions.push({
      hypothesisId: id,
      from: current.status,
      to,
      actor,
      reason,
      at: new Date().toISOString(),
    });
    const updated = this.update({ ...current, status: to });
    this.logger.info(`Hypothesis ${id}: ${current.status} -> ${to} (${actor}: ${reason})`);
    return updated;
  }
}
