import { readFileSync } from 'node:fs';
import { join } from 'node:path';

import { Command, CommanderError } from 'commander';
import yaml from 'yaml';

import type { AuditQuery } from '../audit/types.js';
import { isAuditEventType } from '../audit/types.js';
import type { GovernanceConfig } from '../core/config.js';
import { loadConfig } from '../core/config.js';
import type { ValidationIssue } from '../core/errors.js';
import { GovernanceError, ValidationError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import type { GovernanceEngineOptions } from '../engine.js';
import { GovernanceEngine, createAuditStore } from '../engine.js';
import { loadGovernanceDefinitions } from '../governance/loader.js';
import { normalizeSymbol } from '../governance/types.js';
import { AllowlistLint } from '../lint/allowlist.js';
import { AlphaPathLint } from '../lint/alpha_path.js';
import type { LintReport } from '../lint/types.js';
import { MetricRegistry } from '../monitoring/metrics.js';
import { EmptyPoolError } from '../pool/builder.js';
import { VERSION } from '../index.js';

export const EXIT_OK = 0;
export const EXIT_VIOLATIONS = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

interface GlobalOptions {
  config?: string;
  dir?: string;
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ValidationError('--limit', [{ field: 'limit', message: `expected a positive integer, got '${value}'` }]);
  }
  return limit;
}

/** Flat `name: value` map from a YAML or JSON file. */
export function readMetricValues(path: string): Record<string, number> {
  const raw: unknown = yaml.parse(readFileSync(path, 'utf-8'));
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ValidationError(path, [{ field: '(root)', message: 'expected a map of metric name to number' }]);
  }
  const values: Record<string, number> = {};
  const issues: ValidationIssue[] = [];
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === 'number' && Number.isFinite(value)) values[name] = value;
    else issues.push({ field: name, message: `expected a number, got ${JSON.stringify(value)}` });
  }
  if (issues.length > 0) throw new ValidationError(path, issues);
  return values;
}

function printLintReport<V extends { file: string; line: number; column: number }>(
  io: CliIo,
  report: LintReport<V>,
  describe: (violation: V) => string,
  json: boolean
): number {
  if (json) {
    io.out(JSON.stringify(report, null, 2));
  } else {
    for (const violation of report.violations) {
      io.out(`${violation.file}:${violation.line}:${violation.column} ${describe(violation)}`);
    }
    io.out(
      report.passed
        ? `PASS: ${report.checkedFiles} files checked`
        : `FAIL: ${report.violations.length} violation(s) in ${report.checkedFiles} files`
    );
  }
  return report.passed ? EXIT_OK : EXIT_VIOLATIONS;
}

export function buildProgram(io: CliIo, setExitCode: (code: number) => void): Command {
  const program = new Command();
  let cached: GovernanceConfig | null = null;

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();
  const config = (): GovernanceConfig => {
    cached ??= loadConfig(globals().config);
    return cached;
  };
  const configDir = (): string => globals().dir ?? config().governance.configDir;
  const logger = (): Logger => new Logger(config().logging.level);
  const withEngine = async <T>(
    run: (engine: GovernanceEngine) => T | Promise<T>,
    extra: GovernanceEngineOptions = {}
  ): Promise<T> => {
    const engine = GovernanceEngine.fromDirectory(configDir(), { config: config(), logger: logger(), ...extra });
    try {
      return await run(engine);
    } finally {
      engine.close();
    }
  };

  program
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    })
    .name('govern')
    .description('Hypothesis governance for trading strategies')
    .version(VERSION)
    .option('-c, --config <path>', 'Engine config file (default ~/.governance/config.yaml)')
    .option('-d, --dir <path>', 'Governance config directory (overrides governance.configDir)');

  // ============================================================================
  // Validate
  // ============================================================================

  program
    .command('validate')
    .description('Validate every hypothesis, constraint, factor, pool and regime file')
    .action(() => {
      try {
        const definitions = loadGovernanceDefinitions(configDir(), logger());
        const report = new AllowlistLint(logger()).checkConstraints(definitions.constraints);
        if (!report.passed) {
          setExitCode(printLintReport(io, report, (v) => v.message, false));
          return;
        }
        io.out(
          `OK: ${definitions.hypotheses.length} hypotheses, ${definitions.constraints.length} constraints, ` +
            `${definitions.factors.length} factors` +
            `${definitions.pool ? ', pool' : ''}${definitions.regime ? ', regime' : ''}`
        );
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        io.err(`INVALID ${error.gate ? `[${error.gate}] ` : ''}${error.file}`);
        for (const issue of error.issues) {
          io.err(`  ${issue.field}: ${issue.message}`);
        }
        setExitCode(EXIT_VIOLATIONS);
      }
    });

  // ============================================================================
  // Isolation gate
  // ============================================================================

  const lint = program.command('lint').description('Isolation gate checks');

  lint
    .command('alpha-path [root]')
    .description('Fail when alpha code imports hypothesis or constraint modules')
    .option('--alpha <paths...>', 'Alpha module paths, relative to root')
    .option('--forbidden <paths...>', 'Forbidden module paths, relative to root')
    .option('--json', 'Print the report as JSON', false)
    .action((root: string | undefined, options: { alpha?: string[]; forbidden?: string[]; json: boolean }) => {
      const lintConfig = config().lint;
      const gate = new AlphaPathLint({
        alphaPaths: options.alpha ?? lintConfig.alphaPaths,
        forbiddenPaths: options.forbidden ?? lintConfig.forbiddenPaths,
        logger: logger(),
      });
      const report = gate.run(root ?? lintConfig.root);
      setExitCode(printLintReport(io, report, (v) => `imports '${v.specifier}' (${v.resolved})`, options.json));
    });

  lint
    .command('allowlist [dir]')
    .description('Fail when a constraint uses an action outside the allowlist')
    .option('--json', 'Print the report as JSON', false)
    .action((dir: string | undefined, options: { json: boolean }) => {
      const report = new AllowlistLint(logger()).run(dir ?? join(configDir(), 'constraints'));
      setExitCode(printLintReport(io, report, (v) => v.message, options.json));
    });

  // ============================================================================
  // Pool and resolution
  // ============================================================================

  const pool = program.command('pool').description('Tradable pool');

  pool
    .command('build')
    .description('Build the pool from pool.yaml and the active hypotheses')
    .option('--json', 'Print the pool as JSON', false)
    .action(async (options: { json: boolean }) => {
      await withEngine((engine) => {
        try {
          const built = engine.buildPool();
          if (options.json) {
            io.out(JSON.stringify(built, null, 2));
            return;
          }
          io.out(`Pool ${built.version} (${built.symbols.length} symbols)`);
          for (const symbol of built.symbols) {
            const weight = built.weights[symbol];
            io.out(weight === undefined ? `  ${symbol}` : `  ${symbol} x${weight}`);
          }
        } catch (error) {
          if (!(error instanceof EmptyPoolError)) throw error;
          io.err(error.message);
          for (const entry of error.auditTrail) {
            io.err(`  ${entry.symbol}: ${entry.reason}`);
          }
          setExitCode(EXIT_VIOLATIONS);
        }
      });
    });

  program
    .command('resolve <symbol>')
    .description('Show the resolved constraint effects for a symbol')
    .option('-s, --strategy <id>', 'Strategy id')
    .option('--json', 'Print the resolution as JSON', false)
    .action(async (symbol: string, options: { strategy?: string; json: boolean }) => {
      await withEngine((engine) => {
        const resolved = engine.resolve(symbol, options.strategy ? { strategyId: options.strategy } : {});
        if (options.json) {
          io.out(JSON.stringify(resolved, null, 2));
          return;
        }
        io.out(`${resolved.symbol}${resolved.strategyId ? ` [${resolved.strategyId}]` : ''} v${resolved.version}`);
        io.out(`  constraints: ${resolved.constraintIds.join(', ') || '(none)'}`);
        io.out(`  risk_budget_multiplier: ${resolved.riskBudgetMultiplier}`);
        io.out(`  pool_bias_multiplier: ${resolved.poolBiasMultiplier}`);
        io.out(`  veto_downgrade: ${resolved.vetoDowngrade}`);
        io.out(`  stop_mode: ${resolved.stopMode}`);
        io.out(`  holding_extension_days: ${resolved.holdingExtensionDays}`);
        io.out(`  position_cap_multiplier: ${resolved.positionCapMultiplier}`);
        if (resolved.guardrails.maxPositionPct !== undefined) {
          io.out(`  max_position_pct: ${resolved.guardrails.maxPositionPct}`);
        }
      });
    });

  // ============================================================================
  // Falsifiers
  // ============================================================================

  const falsifiers = program.command('falsifiers').description('Falsifier monitoring');

  falsifiers
    .command('run')
    .description('Evaluate every due falsifier once against a metrics file')
    .requiredOption('-m, --metrics <file>', 'YAML or JSON map of metric name to value')
    .option('--force', 'Ignore check schedules', false)
    .action(async (options: { metrics: string; force: boolean }) => {
      const metrics = MetricRegistry.fromValues(readMetricValues(options.metrics), logger());
      await withEngine(async (engine) => {
        const report = await engine.runFalsifierChecks({ force: options.force });
        for (const entry of report.hypotheses) {
          io.out(`${entry.hypothesisId}: ${entry.state}${entry.transitionedTo ? ` -> ${entry.transitionedTo}` : ''}`);
          for (const result of entry.results) {
            io.out(`  [${result.falsifierIndex}] ${result.message}`);
          }
          if (entry.deactivatedConstraints.length > 0) {
            io.out(`  deactivated: ${entry.deactivatedConstraints.join(', ')}`);
          }
          if (entry.error) io.out(`  error: ${entry.error}`);
        }
        io.out(
          `${report.checked} checked, ${report.triggered} triggered, ` +
            `${report.unavailable} unavailable, ${report.errors} errors`
        );
        if (report.triggered > 0 || report.errors > 0) setExitCode(EXIT_VIOLATIONS);
      }, { metrics });
    });

  // ============================================================================
  // Audit
  // ============================================================================

  const audit = program.command('audit').description('Audit trail');

  audit
    .command('query')
    .description('Query the audit trail, oldest first')
    .option('--symbol <symbol>', 'Filter by symbol')
    .option('--constraint <id>', 'Filter by constraint id')
    .option('--hypothesis <id>', 'Filter by hypothesis id')
    .option('--strategy <id>', 'Filter by strategy id')
    .option('--event <type>', 'Filter by event type')
    .option('--from <iso>', 'Earliest timestamp (inclusive)')
    .option('--to <iso>', 'Latest timestamp (inclusive)')
    .option('--limit <n>', 'Maximum number of entries')
    .option('--json', 'Print entries as JSON', false)
    .action(
      (options: {
        symbol?: string;
        constraint?: string;
        hypothesis?: string;
        strategy?: string;
        event?: string;
        from?: string;
        to?: string;
        limit?: string;
        json: boolean;
      }) => {
        const query: AuditQuery = {};
        if (options.symbol) query.symbol = normalizeSymbol(options.symbol);
        if (options.constraint) query.constraintId = options.constraint;
        if (options.hypothesis) query.hypothesisId = options.hypothesis;
        if (options.strategy) query.strategyId = options.strategy;
        if (options.from) query.from = options.from;
        if (options.to) query.to = options.to;
        if (options.limit) query.limit = parseLimit(options.limit);
        if (options.event) {
          if (!isAuditEventType(options.event)) {
            throw new ValidationError('--event', [{ field: 'event', message: `unknown event type '${options.event}'` }]);
          }
          query.eventType = options.event;
        }

        const store = createAuditStore(config(), logger());
        try {
          const entries = store.query(query);
          if (options.json) {
            io.out(JSON.stringify(entries, null, 2));
            return;
          }
          for (const entry of entries) {
            const subject = [entry.symbol, entry.strategyId, entry.constraintId, entry.hypothesisId]
              .filter((part) => part !== undefined)
              .join(' ');
            io.out(`${entry.timestamp} ${entry.eventType} ${subject} ${JSON.stringify(entry.actionDetails)}`);
          }
          io.out(`${entries.length} entries`);
        } finally {
          store.close();
        }
      }
    );

  return program;
}

/**
 * Runs the CLI and resolves to its exit code: 0 pass, 1 violations, 2 usage
 * or configuration error.
 */
export async function runCli(argv: string[], io: CliIo = consoleIo): Promise<number> {
  let exitCode = EXIT_OK;
  const program = buildProgram(io, (code) => {
    exitCode = Math.max(exitCode, code);
  });
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }
    if (error instanceof GovernanceError) {
      io.err(`Error: ${error.message}`);
      return EXIT_USAGE;
    }
    throw error;
  }
  return exitCode;
}
