import { homedir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { defaultConfig, expandHome, loadConfig, parseConfig } from '../../src/core/config.js';
import { ValidationError } from '../../src/core/errors.js';
import type { TempDir } from '../fixtures.js';
import { createTempDir } from '../fixtures.js';

describe('config', () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir();
    vi.stubEnv('GOVERNANCE_LOG_LEVEL', '');
    vi.stubEnv('GOVERNANCE_AUDIT_DB', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    dir.cleanup();
  });

  it('fills every section with defaults', () => {
    const config = defaultConfig();
    expect(config.governance.configDir).toBe('config');
    expect(config.resolver.cacheTtlSeconds).toBe(60);
    expect(config.monitor.tickMinutes).toBe(60);
    expect(config.audit).toEqual({ backend: 'sqlite', dbPath: '~/.governance/audit.sqlite' });
    expect(config.alerts.channels).toEqual(['log']);
    expect(config.alerts.maxRetained).toBe(500);
    expect(config.logging.level).toBe('info');
  });

  it('rejects unknown keys with the offending path', () => {
    let caught: unknown;
    try {
      parseConfig({ resolver: { cacheTtl: 5 } }, 'settings.yaml');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.file).toBe('settings.yaml');
    expect(caught.issues.map((issue) => issue.field)).toEqual(['resolver']);
  });

  it('rejects a non-positive cache TTL', () => {
    expect(() => parseConfig({ resolver: { cacheTtlSeconds: 0 } })).toThrow(ValidationError);
  });

  it('loads a YAML file and expands the home directory', () => {
    const path = dir.write(
      'config.yaml',
      'governance:\n  configDir: ~/governance\naudit:\n  backend: memory\nresolver:\n  cacheTtlSeconds: 5\n'
    );
    const config = loadConfig(path);
    expect(config.governance.configDir).toBe(join(homedir(), 'governance'));
    expect(config.audit.backend).toBe('memory');
    expect(config.audit.dbPath).toBe(join(homedir(), '.governance', 'audit.sqlite'));
    expect(config.resolver.cacheTtlSeconds).toBe(5);
  });

  it('treats an empty file as all defaults', () => {
    const path = dir.write('config.yaml', '');
    expect(loadConfig(path).logging.level).toBe('info');
  });

  it('lets the environment override the log level and database path', () => {
    const path = dir.write('config.yaml', 'logging:\n  level: warn\n');
    vi.stubEnv('GOVERNANCE_LOG_LEVEL', 'debug');
    vi.stubEnv('GOVERNANCE_AUDIT_DB', '/tmp/audit-test.sqlite');
    const config = loadConfig(path);
    expect(config.logging.level).toBe('debug');
    expect(config.audit.dbPath).toBe('/tmp/audit-test.sqlite');
  });

  it('ignores an unknown log level from the environment', () => {
    const path = dir.write('config.yaml', 'logging:\n  level: warn\n');
    vi.stubEnv('GOVERNANCE_LOG_LEVEL', 'verbose');
    expect(loadConfig(path).logging.level).toBe('warn');
  });

  it('reads the path from GOVERNANCE_CONFIG_PATH', () => {
    const path = dir.write('env.yaml', 'monitor:\n  tickMinutes: 15\n');
    vi.stubEnv('GOVERNANCE_CONFIG_PATH', path);
    expect(loadConfig().monitor.tickMinutes).toBe(15);
  });
});

describe('expandHome', () => {
  it('only expands a leading ~/', () => {
    expect(expandHome('~/a/b')).toBe(join(homedir(), 'a', 'b'));
    expect(expandHome('/var/~/x')).toBe('/var/~/x');
  });
});
