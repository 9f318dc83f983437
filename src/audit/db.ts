import { mkdirSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import Database from 'better-sqlite3';

export const DEFAULT_AUDIT_DB_PATH = join(homedir(), '.governance', 'audit.sqlite');
const INSTANCES = new Map<string, Database.Database>();

function getSchemaSql(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const schemaPath = join(here, 'schema.sql');
  return readFileSync(schemaPath, 'utf-8');
}

function ensureDirectory(path: string): void {
  mkdirSync(dirname(path), { recursive: true });
}

function applySchema(db: Database.Database): void {
  db.exec(getSchemaSql());
}

/**
 * Opens (once per path) the audit database with WAL enabled and the schema
 * applied. `:memory:` always gets a fresh, uncached connection.
 */
export function openDatabase(dbPath?: string): Database.Database {
  const resolvedPath = dbPath ?? process.env.GOVERNANCE_AUDIT_DB ?? DEFAULT_AUDIT_DB_PATH;

  if (resolvedPath === ':memory:') {
    const db = new Database(resolvedPath);
    applySchema(db);
    return db;
  }

  const existing = INSTANCES.get(resolvedPath);
  if (existing?.open) {
    return existing;
  }

  ensureDirectory(resolvedPath);

  const db = new Database(resolvedPath);
  db.pragma('journal_mode = WAL');

  applySchema(db);

  INSTANCES.set(resolvedPath, db);
  return db;
}
