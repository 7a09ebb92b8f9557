/**
 * Database Migrations - Versioned schema management for Signalpost
 *
 * Features:
 * - Sequential migration execution
 * - Up/down migrations (string SQL or programmatic)
 * - Migration tracking via _migrations table
 * - Automatic migration on open
 * - Rollback support (last migration or down to a version)
 */

import type { Database } from './index';
import { readNumber, readString } from './rows';
import { createLogger } from '../utils/logger';
import { MIGRATION_001_UP, MIGRATION_001_DOWN } from './migration-001-metrics';
import { MIGRATION_002_UP, MIGRATION_002_DOWN } from './migration-002-alerts';
import { MIGRATION_003_UP, MIGRATION_003_DOWN } from './migration-003-webhooks';

const logger = createLogger('migrations');

/** Migration definition */
export type MigrationStep = string | ((db: Database) => void);

export interface Migration {
  /** Migration version (sequential number) */
  version: number;
  /** Migration name for display */
  name: string;
  /** SQL or function to apply migration */
  up: MigrationStep;
  /** SQL or function to revert migration */
  down: MigrationStep;
}

/** Migration status record */
export interface MigrationStatus {
  version: number;
  name: string;
  appliedAt: Date;
}

/** All migrations in order */
const MIGRATIONS: readonly Migration[] = [
  { version: 1, name: 'metric_samples', up: MIGRATION_001_UP, down: MIGRATION_001_DOWN },
  { version: 2, name: 'alerts', up: MIGRATION_002_UP, down: MIGRATION_002_DOWN },
  { version: 3, name: 'webhooks_and_queue', up: MIGRATION_003_UP, down: MIGRATION_003_DOWN },
];

export interface MigrationRunner {
  /** Get current schema version */
  getCurrentVersion(): number;

  /** Get list of applied migrations */
  getAppliedMigrations(): MigrationStatus[];

  /** Get pending migrations */
  getPendingMigrations(): Migration[];

  /** Run all pending migrations */
  migrate(): void;

  /** Rollback to a specific version */
  rollbackTo(version: number): void;

  /** Rollback last migration */
  rollbackLast(): void;
}

function runStep(db: Database, step: MigrationStep): void {
  if (typeof step === 'string') {
    db.exec(step);
  } else {
    step(db);
  }
}

export function createMigrationRunner(
  db: Database,
  migrations: readonly Migration[] = MIGRATIONS,
): MigrationRunner {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    )
  `);

  function getCurrentVersion(): number {
    const rows = db.query('SELECT COALESCE(MAX(version), 0) AS version FROM _migrations');
    return rows.length > 0 ? readNumber(rows[0], 'version') : 0;
  }

  function getAppliedMigrations(): MigrationStatus[] {
    return db
      .query('SELECT version, name, applied_at FROM _migrations ORDER BY version')
      .map((row) => ({
        version: readNumber(row, 'version'),
        name: readString(row, 'name'),
        appliedAt: new Date(readNumber(row, 'applied_at')),
      }));
  }

  function getPendingMigrations(): Migration[] {
    const currentVersion = getCurrentVersion();
    return migrations.filter((m) => m.version > currentVersion);
  }

  function applyMigration(migration: Migration): void {
    logger.info({ version: migration.version, name: migration.name }, 'Applying migration');

    try {
      db.transaction(() => {
        runStep(db, migration.up);
        db.run('INSERT INTO _migrations (version, name, applied_at) VALUES (?, ?, ?)', [
          migration.version,
          migration.name,
          Date.now(),
        ]);
      });
      logger.info({ version: migration.version }, 'Migration applied');
    } catch (err) {
      logger.error({ err, version: migration.version }, 'Migration failed');
      throw err;
    }
  }

  function revertMigration(migration: Migration): void {
    logger.info({ version: migration.version, name: migration.name }, 'Reverting migration');

    try {
      db.transaction(() => {
        runStep(db, migration.down);
        db.run('DELETE FROM _migrations WHERE version = ?', [migration.version]);
      });
      logger.info({ version: migration.version }, 'Migration reverted');
    } catch (err) {
      logger.error({ err, version: migration.version }, 'Rollback failed');
      throw err;
    }
  }

  return {
    getCurrentVersion,
    getAppliedMigrations,
    getPendingMigrations,

    migrate() {
      const pending = getPendingMigrations();

      if (pending.length === 0) {
        logger.debug('Database is up to date');
        return;
      }

      logger.info({ count: pending.length }, 'Running migrations');
      for (const migration of pending) {
        applyMigration(migration);
      }
      logger.info({ version: getCurrentVersion() }, 'Migrations complete');
    },

    rollbackTo(version) {
      const current = getCurrentVersion();
      if (version >= current) {
        logger.info('Nothing to rollback');
        return;
      }

      const toRevert = migrations
        .filter((m) => m.version > version && m.version <= current)
        .reverse();

      for (const migration of toRevert) {
        revertMigration(migration);
      }
    },

    rollbackLast() {
      const current = getCurrentVersion();
      if (current === 0) {
        logger.info('Nothing to rollback');
        return;
      }

      const migration = migrations.find((m) => m.version === current);
      if (migration) {
        revertMigration(migration);
      }
    },
  };
}

/** Get all defined migrations */
export function getMigrations(): Migration[] {
  return [...MIGRATIONS];
}
