import { existsSync, readdirSync, readFileSync, statSync } from 'node:fs';
import { basename, join } from 'node:path';

import { z } from 'zod';
import { parseDocument } from 'yaml';

import type { Constraint } from '../constraints/types.js';
import { ACTION_ALLOWLIST } from '../constraints/types.js';
import { ValidationError } from '../core/errors.js';
import type { ValidationIssue } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import type { Factor } from '../factors/types.js';
import type { Hypothesis } from '../hypothesis/types.js';
import type { PoolConfig, PoolGating, StructuralFilters, SymbolData } from '../pool/types.js';
import type { RegimeConfig } from '../regime/types.js';
import {
  CONSTRAINT_ALLOWLIST_GATE,
  ConstraintSchema,
  FACTOR_FAILURE_RULE_GATE,
  FactorSchema,
  HYPOTHESIS_FALSIFIER_GATE,
  HypothesisSchema,
  PoolConfigSchema,
  PoolGatingSchema,
  RegimeConfigSchema,
  StructuralFiltersSchema,
  UniverseSchema,
} from './schemas.js';

type GateDetector = (issues: z.ZodIssue[]) => string | undefined;

const ALLOWED_ACTIONS = [...ACTION_ALLOWLIST].sort().join(', ');

const requiredListGate =
  (field: string, gate: string): GateDetector =>
  (issues) =>
    issues.some((issue) => issue.path.length === 1 && issue.path[0] === field) ? gate : undefined;

const actionsAllowlistGate: GateDetector = (issues) =>
  issues.some(
    (issue) => issue.code === 'unrecognized_keys' && issue.path.length === 1 && issue.path[0] === 'actions'
  )
    ? CONSTRAINT_ALLOWLIST_GATE
    : undefined;

function toIssues(error: z.ZodError): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const issue of error.issues) {
    const base = issue.path.join('.');
    if (issue.code === 'unrecognized_keys') {
      for (const key of issue.keys) {
        const message =
          base === 'actions'
            ? `'${key}' is not an allowed action (allowed: ${ALLOWED_ACTIONS})`
            : `unrecognized field '${key}'`;
        issues.push({ field: base ? `${base}.${key}` : key, message });
      }
      continue;
    }
    issues.push({ field: base || '(root)', message: issue.message });
  }
  return issues;
}

function readYaml(text: string, file: string): unknown {
  const doc = parseDocument(text);
  if (doc.errors.length > 0) {
    throw new ValidationError(
      file,
      doc.errors.map((err) => ({ field: '(yaml)', message: err.message }))
    );
  }
  return doc.toJS();
}

function parseWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  text: string,
  file: string,
  detectGate?: GateDetector
): T {
  const raw = readYaml(text, file);
  const result = schema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ValidationError(file, toIssues(result.error), detectGate?.(result.error.issues));
  }
  return result.data;
}

export function parseHypothesis(text: string, file = '<inline>'): Hypothesis {
  return parseWith(HypothesisSchema, text, file, requiredListGate('falsifiers', HYPOTHESIS_FALSIFIER_GATE));
}

export function parseConstraint(text: string, file = '<inline>'): Constraint {
  return parseWith(ConstraintSchema, text, file, actionsAllowlistGate);
}

export function parseFactor(text: string, file = '<inline>'): Factor {
  return parseWith(FactorSchema, text, file, requiredListGate('failure_rules', FACTOR_FAILURE_RULE_GATE));
}

export function parseStructuralFilters(text: string, file = '<inline>'): StructuralFilters {
  return parseWith(StructuralFiltersSchema, text, file);
}

export function parseUniverse(text: string, file = '<inline>'): SymbolData[] {
  return parseWith(UniverseSchema, text, file);
}

export function parsePoolGating(text: string, file = '<inline>'): PoolGating {
  return parseWith(PoolGatingSchema, text, file);
}

export function parsePoolConfig(text: string, file = '<inline>'): PoolConfig {
  return parseWith(PoolConfigSchema, text, file);
}

export function parseRegimeConfig(text: string, file = '<inline>'): RegimeConfig {
  return parseWith(RegimeConfigSchema, text, file);
}

function readConfigFile(path: string): string {
  if (!existsSync(path)) {
    throw new ValidationError(path, [{ field: '(file)', message: 'file not found' }]);
  }
  return readFileSync(path, 'utf-8');
}

export const loadHypothesisFile = (path: string): Hypothesis => parseHypothesis(readConfigFile(path), path);
export const loadConstraintFile = (path: string): Constraint => parseConstraint(readConfigFile(path), path);
export const loadFactorFile = (path: string): Factor => parseFactor(readConfigFile(path), path);
export const loadPoolConfigFile = (path: string): PoolConfig => parsePoolConfig(readConfigFile(path), path);
export const loadRegimeConfigFile = (path: string): RegimeConfig =>
  parseRegimeConfig(readConfigFile(path), path);

/**
 * Every `*.yml` / `*.yaml` file in `dir`, sorted by name. Files starting with
 * `_` are drafts and are skipped.
 */
export function listConfigFiles(dir: string): string[] {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new ValidationError(dir, [{ field: '(directory)', message: 'directory not found' }]);
  }
  return readdirSync(dir)
    .filter((name) => /\.ya?ml$/.test(name) && !name.startsWith('_'))
    .sort()
    .map((name) => join(dir, name))
    .filter((path) => statSync(path).isFile());
}

function loadDirectory<T extends { id: string }>(
  dir: string,
  kind: string,
  loadFile: (path: string) => T
): T[] {
  const seen = new Map<string, string>();
  const items: T[] = [];
  for (const path of listConfigFiles(dir)) {
    const item = loadFile(path);
    const previous = seen.get(item.id);
    if (previous !== undefined) {
      throw new ValidationError(path, [
        { field: 'id', message: `duplicate ${kind} id '${item.id}' (first defined in ${basename(previous)})` },
      ]);
    }
    seen.set(item.id, path);
    items.push(item);
  }
  return items;
}

export const loadHypothesisDirectory = (dir: string): Hypothesis[] =>
  loadDirectory(dir, 'hypothesis', loadHypothesisFile);
export const loadConstraintDirectory = (dir: string): Constraint[] =>
  loadDirectory(dir, 'constraint', loadConstraintFile);
export const loadFactorDirectory = (dir: string): Factor[] => loadDirectory(dir, 'factor', loadFactorFile);

export interface GovernanceDefinitions {
  hypotheses: Hypothesis[];
  constraints: Constraint[];
  factors: Factor[];
  pool?: PoolConfig;
  regime?: RegimeConfig;
}

function firstExisting(dir: string, names: string[]): string | undefined {
  return names.map((name) => join(dir, name)).find((path) => existsSync(path));
}

/**
 * Load a whole config directory: `hypotheses/` and `constraints/` are
 * required, `factors/`, `pool.yaml` and `regime.yaml` are optional. Nothing is
 * returned unless every file validates.
 */
export function loadGovernanceDefinitions(dir: string, logger = new Logger('info')): GovernanceDefinitions {
  const hypotheses = loadHypothesisDirectory(join(dir, 'hypotheses'));
  const constraints = loadConstraintDirectory(join(dir, 'constraints'));
  const factorDir = join(dir, 'factors');
  const factors = existsSync(factorDir) ? loadFactorDirectory(factorDir) : [];

  const definitions: GovernanceDefinitions = { hypotheses, constraints, factors };
  const poolPath = firstExisting(dir, ['pool.yaml', 'pool.yml']);
  if (poolPath) definitions.pool = loadPoolConfigFile(poolPath);
  const regimePath = firstExisting(dir, ['regime.yaml', 'regime.yml']);
  if (regimePath) definitions.regime = loadRegimeConfigFile(regimePath);

  const hypothesisIds = new Set(hypotheses.map((h) => h.id));
  const constraintIds = new Set(constraints.map((c) => c.id));
  for (const hypothesis of hypotheses) {
    for (const linked of hypothesis.linkedConstraints) {
      if (!constraintIds.has(linked)) {
        logger.warn(`Hypothesis ${hypothesis.id} links unknown constraint ${linked}`);
      }
    }
  }
  for (const constraint of constraints) {
    for (const required of constraint.activation.requiresHypothesesActive) {
      if (!hypothesisIds.has(required)) {
        logger.warn(`Constraint ${constraint.id} requires unknown hypothesis ${required}; it will stay inactive`);
      }
    }
  }

  logger.info(
    `Loaded ${hypotheses.length} hypotheses, ${constraints.length} constraints, ${factors.length} factors from ${dir}`
  );
  return definitions;
}
