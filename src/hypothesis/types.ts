import type {
  CheckSchedule,
  ComparisonOperator,
  HypothesisStatus,
  TriggerAction,
} from '../governance/types.js';

/** Empty lists mean "all". */
export interface HypothesisScope {
  symbols: string[];
  sectors: string[];
}

/** Opaque to the engine: stored and audited, never interpreted. */
export interface Evidence {
  sources: string[];
  notes: string;
}

export interface Falsifier {
  metric: string;
  operator: ComparisonOperator;
  threshold: number;
  window: string;
  trigger: TriggerAction;
  schedule?: CheckSchedule;
}

export interface Hypothesis {
  id: string;
  title: string;
  statement: string;
  scope: HypothesisScope;
  owner: 'human';
  status: HypothesisStatus;
  reviewCycle: string;
  createdAt: string;
  evidence: Evidence;
  falsifiers: Falsifier[];
  linkedConstraints: string[];
}

export interface HypothesisFilter {
  status?: HypothesisStatus | HypothesisStatus[];
  symbol?: string;
  sector?: string;
}

export interface HypothesisLookup {
  get(id: string): Hypothesis | undefined;
}
