import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { AlphaPathLint, listSourceFiles } from '../../src/lint/alpha_path.js';
import type { TempDir } from '../fixtures.js';
import { createTempDir, silentLogger } from '../fixtures.js';

const CLEAN_STRATEGY = `import { clamp } from './math.js';
import yaml from 'yaml';

export const score = (value: number): number => clamp(value, 0, 1) + yaml.parse('1');
`;

describe('AlphaPathLint', () => {
  let dir: TempDir;
  let lint: AlphaPathLint;

  beforeEach(() => {
    dir = createTempDir();
    dir.write('src/strategies/math.ts', 'export const clamp = (v: number, lo: number, hi: number) => v;\n');
    dir.write('src/strategies/momentum.ts', CLEAN_STRATEGY);
    dir.write('src/constraints/types.ts', 'export interface Constraint { id: string }\n');
    lint = new AlphaPathLint({ logger: silentLogger() });
  });

  afterEach(() => {
    dir.cleanup();
  });

  it('passes a tree with no governance imports', () => {
    const report = lint.run(dir.path);
    expect(report.passed).toBe(true);
    expect(report.violations).toEqual([]);
    expect(report.checkedFiles).toBe(2);
  });

  it('reports a relative import of a constraint module with its position', () => {
    dir.write(
      'src/strategies/momentum.ts',
      `import { clamp } from './math.js';\nimport type { Constraint } from '../constraints/types.js';\n`
    );
    const report = lint.run(dir.path);
    expect(report.passed).toBe(false);
    expect(report.violations).toEqual([
      {
        file: 'src/strategies/momentum.ts',
        line: 2,
        column: 33,
        specifier: '../constraints/types.js',
        resolved: 'src/constraints/types.js',
      },
    ]);
  });

  it('catches alias, dynamic and require imports', () => {
    dir.write(
      'src/strategies/nested/loader.ts',
      [
        "import { HypothesisRegistry } from '@/hypothesis/registry';",
        "const lazy = () => import('../../constraints/resolver.js');",
        "const legacy = require('../../hypothesis');",
        '',
      ].join('\n')
    );
    const report = lint.run(dir.path);
    expect(report.violations.map((v) => [v.line, v.resolved])).toEqual([
      [1, 'src/hypothesis/registry'],
      [2, 'src/constraints/resolver.js'],
      [3, 'src/hypothesis'],
    ]);
  });

  it('ignores sibling directories that share a prefix', () => {
    dir.write('src/constraints_docs/readme.ts', 'export const x = 1;\n');
    dir.write('src/strategies/docs.ts', "import { x } from '../constraints_docs/readme.js';\n");
    expect(lint.run(dir.path).passed).toBe(true);
  });

  it('honours custom alpha and forbidden paths', () => {
    dir.write('lib/alpha/signal.ts', "import { buildPool } from '../pool/builder.js';\n");
    const custom = new AlphaPathLint({
      alphaPaths: ['lib/alpha'],
      forbiddenPaths: ['lib/pool/'],
      logger: silentLogger(),
    });
    const report = custom.run(dir.path);
    expect(report.checkedFiles).toBe(1);
    expect(report.violations[0]?.resolved).toBe('lib/pool/builder.js');
  });
});

describe('listSourceFiles', () => {
  it('skips dependencies, build output and non-source files', () => {
    const dir = createTempDir();
    try {
      dir.write('a.ts', '');
      dir.write('b.md', '');
      dir.write('node_modules/pkg/index.js', '');
      dir.write('dist/a.js', '');
      dir.write('sub/c.tsx', '');
      expect(listSourceFiles(dir.path).map((file) => file.slice(dir.path.length + 1))).toEqual(['a.ts', 'sub/c.tsx']);
    } finally {
      dir.cleanup();
    }
  });
});
