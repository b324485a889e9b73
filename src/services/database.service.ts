import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import type { AppConfig } from '../config/env';
import type { Logger } from '../libs/logger';
import { migrations as allMigrations, type Migration } from '../migrations';

export type SqliteDatabase = Database.Database;

const MEMORY = ':memory:';

/**
 * `sqlite:///relative/file.db`, `sqlite:////abs/file.db`, `sqlite+aiosqlite:///…`,
 * a bare path or `:memory:` to the path better-sqlite3 opens.
 */
export function sqlitePathFromUrl(url: string): string {
  const m = /^sqlite(?:\+[\w-]+)?:(.*)$/.exec(url.trim());
  if (!m) return url.trim() || MEMORY;
  const rest = m[1] ?? '';
  if (rest.startsWith('///')) return rest.slice(3) || MEMORY;
  if (rest.startsWith('//')) return rest.slice(2) || MEMORY;
  return rest || MEMORY;
}

/** `<scheme>://***`, safe to show. */
export function maskDatabaseUrl(url: string): string {
  const sep = url.indexOf('://');
  const scheme = sep > 0 ? url.slice(0, sep) : 'sqlite';
  return `${scheme}://***`;
}

export function openDatabase(config: Pick<AppConfig, 'databaseUrl' | 'storageTimeoutMs'>): SqliteDatabase {
  const file = sqlitePathFromUrl(config.databaseUrl);
  if (file !== MEMORY) {
    fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
  }

  const db = new Database(file, { timeout: config.storageTimeoutMs });
  if (file !== MEMORY) db.pragma('journal_mode = WAL');
  return db;
}

/**
 * Brings the schema up to the latest migration. Safe to run on every start:
 * versions at or below `user_version` are skipped.
 */
export function runMigrations(db: SqliteDatabase, logger?: Logger, migrations: readonly Migration[] = allMigrations): number {
  const current = Number(db.pragma('user_version', { simple: true }));
  const pending = migrations.filter(m => m.version > current).sort((a, b) => a.version - b.version);

  if (!pending.length) {
    logger?.info({ version: current }, 'database schema up to date');
    return current;
  }

  const apply = db.transaction((steps: readonly Migration[]) => {
    for (const m of steps) {
      db.exec(m.up);
      db.pragma(`user_version = ${m.version}`);
      logger?.info({ version: m.version, name: m.name }, 'migration applied');
    }
  });

  try {
    apply(pending);
  } catch (err) {
    logger?.error({ err }, 'database migration failed');
    throw err;
  }

  return Number(db.pragma('user_version', { simple: true }));
}
