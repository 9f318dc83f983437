export interface LintReport<V> {
  passed: boolean;
  violations: V[];
  checkedFiles: number;
  checkedAt: string;
}

export interface ImportViolation {
  /** Path relative to the scanned root, `/`-separated. */
  file: string;
  line: number;
  column: number;
  specifier: string;
  resolved: string;
}

export interface AllowlistViolation {
  file: string;
  line: number;
  column: number;
  field: string;
  message: string;
}

export function buildReport<V>(violations: V[], checkedFiles: number, now: Date = new Date()): LintReport<V> {
  return {
    passed: violations.length === 0,
    violations,
    checkedFiles,
    checkedAt: now.toISOString(),
  };
}
