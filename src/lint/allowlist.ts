import { existsSync, readdirSync, readFileSync, statSync } from 'node:fs';
import { dirname, join, relative, sep } from 'node:path';

import { isMap, isScalar, isSeq, LineCounter, parseDocument } from 'yaml';

import { ACTION_ALLOWLIST, ACTION_FIELDS } from '../constraints/types.js';
import { Logger } from '../core/logger.js';
import type { AllowlistViolation, LintReport } from './types.js';
import { buildReport } from './types.js';

const ALLOWED = [...ACTION_ALLOWLIST].sort().join(', ');
const ALLOWED_IN_MEMORY = new Set<string>([...ACTION_FIELDS, ...ACTION_ALLOWLIST]);

function listYamlFiles(dir: string): string[] {
  if (!existsSync(dir)) return [];
  if (statSync(dir).isFile()) return /\.ya?ml$/.test(dir) ? [dir] : [];
  return readdirSync(dir)
    .filter((name) => /\.ya?ml$/.test(name))
    .sort()
    .map((name) => join(dir, name))
    .filter((path) => statSync(path).isFile());
}

/**
 * Reports every constraint `actions` key outside the allowlist, with its
 * source line. Works on raw YAML so it catches keys the loader never gets to
 * see, including files it would skip.
 */
export class AllowlistLint {
  constructor(private readonly logger: Logger = new Logger('info')) {}

  run(dir: string): LintReport<AllowlistViolation> {
    const files = listYamlFiles(dir);
    const base = existsSync(dir) && statSync(dir).isFile() ? dirname(dir) : dir;
    const violations = files.flatMap((file) =>
      this.checkText(readFileSync(file, 'utf-8'), relative(base, file).split(sep).join('/'))
    );
    this.logger.debug(`Allowlist lint checked ${files.length} files, ${violations.length} violations`);
    return buildReport(violations, files.length);
  }

  checkText(text: string, file: string): AllowlistViolation[] {
    const lineCounter = new LineCounter();
    const doc = parseDocument(text, { lineCounter });
    if (doc.errors.length > 0) {
      return doc.errors.map((error) => ({
        file,
        line: error.linePos?.[0].line ?? 1,
        column: error.linePos?.[0].col ?? 1,
        field: '(yaml)',
        message: error.message,
      }));
    }

    const roots = isSeq(doc.contents) ? doc.contents.items : [doc.contents];
    const violations: AllowlistViolation[] = [];
    for (const root of roots) {
      if (!isMap(root)) continue;
      const actions = root.get('actions', true);
      if (!isMap(actions)) continue;
      for (const pair of actions.items) {
        if (!isScalar(pair.key)) continue;
        const field = String(pair.key.value);
        if (ACTION_ALLOWLIST.has(field)) continue;
        const position = lineCounter.linePos(pair.key.range?.[0] ?? 0);
        violations.push({
          file,
          line: position.line,
          column: position.col,
          field,
          message: `'${field}' is not an allowed action (allowed: ${ALLOWED})`,
        });
      }
    }
    return violations;
  }

  /** Same check over already-loaded constraints, keyed by constraint id. */
  checkConstraints(
    constraints: ReadonlyArray<{ id: string; actions: object }>
  ): LintReport<AllowlistViolation> {
    const violations: AllowlistViolation[] = [];
    for (const constraint of constraints) {
      for (const field of Object.keys(constraint.actions)) {
        if (ALLOWED_IN_MEMORY.has(field)) continue;
        violations.push({
          file: `<memory>:${constraint.id}`,
          line: 0,
          column: 0,
          field,
          message: `'${field}' is not an allowed action (allowed: ${ALLOWED})`,
        });
      }
    }
    return buildReport(violations, constraints.length);
  }
}
