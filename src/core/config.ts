import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

import { ValidationError } from './errors.js';
import { isLogLevel } from './logger.js';

export const expandHome = (value: string): string => {
  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }
  return value;
};

const ConfigSchema = z
  .object({
    governance: z
      .object({
        configDir: z.string().default('config'),
      })
      .strict()
      .default({}),
    resolver: z
      .object({
        cacheTtlSeconds: z.number().positive().default(60),
      })
      .strict()
      .default({}),
    monitor: z
      .object({
        tickMinutes: z.number().positive().default(60),
        // Falsifiers on these metrics default to a weekly schedule; all others run daily.
        fundamentalMetrics: z
          .array(z.string())
          .default(['revenue_growth_yoy', 'eps_revision_breadth', 'gross_margin_trend', 'capex_growth']),
      })
      .strict()
      .default({}),
    audit: z
      .object({
        backend: z.enum(['memory', 'sqlite']).default('sqlite'),
        dbPath: z.string().default('~/.governance/audit.sqlite'),
      })
      .strict()
      .default({}),
    lint: z
      .object({
        root: z.string().default('.'),
        alphaPaths: z.array(z.string()).default(['src/strategies']),
        forbiddenPaths: z.array(z.string()).default(['src/hypothesis', 'src/constraints']),
      })
      .strict()
      .default({}),
    alerts: z
      .object({
        channels: z.array(z.enum(['log', 'email', 'webhook'])).default(['log']),
        // Alerts kept for list(); handlers and the `alert` event see every one.
        maxRetained: z.number().int().positive().default(500),
      })
      .strict()
      .default({}),
    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
      })
      .strict()
      .default({}),
  })
  .strict();

export type GovernanceConfig = z.infer<typeof ConfigSchema>;

export function defaultConfig(): GovernanceConfig {
  return ConfigSchema.parse({});
}

export function parseConfig(raw: unknown, source = '<inline>'): GovernanceConfig {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ValidationError(
      source,
      result.error.issues.map((issue) => ({
        field: issue.path.join('.') || '(root)',
        message: issue.message,
      }))
    );
  }
  return result.data;
}

export function loadConfig(configPath?: string): GovernanceConfig {
  const explicit = configPath ?? process.env.GOVERNANCE_CONFIG_PATH;
  const path = explicit ?? join(homedir(), '.governance', 'config.yaml');

  let cfg: GovernanceConfig;
  if (!explicit && !existsSync(path)) {
    cfg = defaultConfig();
  } else {
    const raw = readFileSync(path, 'utf-8');
    cfg = parseConfig(yaml.parse(raw) ?? {}, path);
  }

  const envLevel = process.env.GOVERNANCE_LOG_LEVEL;
  if (isLogLevel(envLevel)) {
    cfg.logging.level = envLevel;
  }
  const envDb = process.env.GOVERNANCE_AUDIT_DB;
  if (envDb) {
    cfg.audit.dbPath = envDb;
  }

  cfg.audit.dbPath = expandHome(cfg.audit.dbPath);
  cfg.governance.configDir = expandHome(cfg.governance.configDir);

  return cfg;
}
