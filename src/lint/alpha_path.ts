import { existsSync, readdirSync, readFileSync, statSync } from 'node:fs';
import { dirname, extname, join, posix, relative, resolve, sep } from 'node:path';

import ts from 'typescript';

import { Logger } from '../core/logger.js';
import type { ImportViolation, LintReport } from './types.js';
import { buildReport } from './types.js';

export const SOURCE_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'];
const SKIP_DIRECTORIES = new Set(['node_modules', 'dist', 'coverage']);

export interface AlphaPathLintOptions {
  alphaPaths?: string[];
  forbiddenPaths?: string[];
  /** Import prefixes mapped to root-relative directories, e.g. `@/` -> `src/`. */
  aliases?: Record<string, string>;
  logger?: Logger;
}

const toPosix = (path: string): string => path.split(sep).join('/');

const stripExtension = (path: string): string => {
  const ext = posix.extname(path);
  return SOURCE_EXTENSIONS.includes(ext) ? path.slice(0, -ext.length) : path;
};

function scriptKindFor(file: string): ts.ScriptKind {
  switch (extname(file)) {
    case '.tsx':
      return ts.ScriptKind.TSX;
    case '.jsx':
      return ts.ScriptKind.JSX;
    case '.js':
    case '.mjs':
    case '.cjs':
      return ts.ScriptKind.JS;
    default:
      return ts.ScriptKind.TS;
  }
}

/** Module specifiers of every static, dynamic, CommonJS and type-only import in `source`. */
export function collectModuleSpecifiers(source: ts.SourceFile): Array<{ specifier: string; node: ts.Node }> {
  const found: Array<{ specifier: string; node: ts.Node }> = [];
  const visit = (node: ts.Node): void => {
    if (ts.isImportDeclaration(node) && ts.isStringLiteral(node.moduleSpecifier)) {
      found.push({ specifier: node.moduleSpecifier.text, node: node.moduleSpecifier });
    } else if (ts.isExportDeclaration(node) && node.moduleSpecifier && ts.isStringLiteral(node.moduleSpecifier)) {
      found.push({ specifier: node.moduleSpecifier.text, node: node.moduleSpecifier });
    } else if (
      ts.isImportEqualsDeclaration(node) &&
      ts.isExternalModuleReference(node.moduleReference) &&
      ts.isStringLiteral(node.moduleReference.expression)
    ) {
      found.push({ specifier: node.moduleReference.expression.text, node: node.moduleReference.expression });
    } else if (ts.isCallExpression(node)) {
      const callee = node.expression;
      const isImportCall = callee.kind === ts.SyntaxKind.ImportKeyword;
      const isRequire = ts.isIdentifier(callee) && callee.text === 'require';
      const [first] = node.arguments;
      if ((isImportCall || isRequire) && first && ts.isStringLiteralLike(first)) {
        found.push({ specifier: first.text, node: first });
      }
    } else if (
      ts.isImportTypeNode(node) &&
      ts.isLiteralTypeNode(node.argument) &&
      ts.isStringLiteral(node.argument.literal)
    ) {
      found.push({ specifier: node.argument.literal.text, node: node.argument.literal });
    }
    ts.forEachChild(node, visit);
  };
  visit(source);
  return found;
}

/**
 * Fails the build when alpha code imports governance internals. Only module
 * specifiers are inspected; governance data reaches strategies through the
 * scalar context instead.
 */
export class AlphaPathLint {
  private readonly alphaPaths: string[];
  private readonly forbiddenPaths: string[];
  private readonly aliases: Record<string, string>;
  private readonly logger: Logger;

  constructor(options: AlphaPathLintOptions = {}) {
    this.alphaPaths = options.alphaPaths ?? ['src/strategies'];
    this.forbiddenPaths = (options.forbiddenPaths ?? ['src/hypothesis', 'src/constraints']).map((path) =>
      posix.normalize(toPosix(path)).replace(/\/$/, '')
    );
    this.aliases = options.aliases ?? { '@/': 'src/', '~/': 'src/' };
    this.logger = options.logger ?? new Logger('info');
  }

  run(root: string): LintReport<ImportViolation> {
    const absoluteRoot = resolve(root);
    const files = this.alphaPaths.flatMap((alphaPath) => listSourceFiles(join(absoluteRoot, alphaPath)));
    const violations = files.flatMap((file) => this.scanFile(absoluteRoot, file));
    this.logger.debug(`Alpha-path lint scanned ${files.length} files, ${violations.length} violations`);
    return buildReport(violations, files.length);
  }

  scanFile(root: string, file: string, text = readFileSync(file, 'utf-8')): ImportViolation[] {
    const source = ts.createSourceFile(file, text, ts.ScriptTarget.Latest, true, scriptKindFor(file));
    const violations: ImportViolation[] = [];
    for (const { specifier, node } of collectModuleSpecifiers(source)) {
      const resolved = this.resolveSpecifier(root, file, specifier);
      if (resolved === undefined || !this.isForbidden(resolved)) continue;
      const { line, character } = source.getLineAndCharacterOfPosition(node.getStart(source));
      violations.push({
        file: toPosix(relative(root, file)),
        line: line + 1,
        column: character + 1,
        specifier,
        resolved,
      });
    }
    return violations;
  }

  /** Root-relative, `/`-separated target of `specifier`, or undefined for packages. */
  private resolveSpecifier(root: string, file: string, specifier: string): string | undefined {
    if (specifier.startsWith('./') || specifier.startsWith('../') || specifier === '.' || specifier === '..') {
      return toPosix(relative(root, resolve(dirname(file), specifier)));
    }
    for (const [prefix, target] of Object.entries(this.aliases)) {
      if (specifier.startsWith(prefix)) {
        return posix.normalize(`${target}${specifier.slice(prefix.length)}`);
      }
    }
    if (specifier.startsWith('/')) {
      return toPosix(relative(root, specifier));
    }
    const bare = posix.normalize(specifier);
    return this.forbiddenPaths.some((path) => bare === path || bare.startsWith(`${path}/`)) ? bare : undefined;
  }

  private isForbidden(resolved: string): boolean {
    const target = stripExtension(resolved);
    return this.forbiddenPaths.some((path) => target === path || target.startsWith(`${path}/`));
  }
}

export function listSourceFiles(dir: string): string[] {
  if (!existsSync(dir)) return [];
  if (statSync(dir).isFile()) return SOURCE_EXTENSIONS.includes(extname(dir)) ? [dir] : [];
  const files: string[] = [];
  for (const name of readdirSync(dir).sort()) {
    if (name.startsWith('.') || SKIP_DIRECTORIES.has(name)) continue;
    const path = join(dir, name);
    if (statSync(path).isDirectory()) {
      files.push(...listSourceFiles(path));
    } else if (SOURCE_EXTENSIONS.includes(extname(name)) && !name.endsWith('.d.ts')) {
      files.push(path);
    }
  }
  return files;
}
