/**
 * Database - SQLite (sql.js WASM) for local persistence
 *
 * In-memory WASM database that saves to the configured file after every
 * mutation. Without a file the database lives in memory only (tests, dry runs).
 *
 * Each process works on its own in-memory copy, so a file has exactly one
 * writer: opening it takes `<file>.lock` (pid and timestamp, created with
 * O_EXCL) and a second opener is refused while the holder is alive. A
 * read-only open skips the lock and never writes back.
 */

import initSqlJs from 'sql.js';
import type { Database as SqlJsDatabase, SqlJsStatic } from 'sql.js';
import { dirname } from 'path';
import { mkdirSync, existsSync, readFileSync, writeFileSync, renameSync, rmSync } from 'fs';
import { DatabaseLockedError } from '../infra/errors';
import { createLogger } from '../utils/logger';
import { createMigrationRunner } from './migrations';
import type { Row } from './rows';

const logger = createLogger('db');

/**
 * Values that can be bound to SQL parameters. Booleans are stored as 0/1 by callers.
 */
export type SqlBindValue = string | number | null;

export interface RunResult {
  /** Rows inserted, updated or deleted by the statement */
  changes: number;
}

// ---------------------------------------------------------------------------
// Database interface
// ---------------------------------------------------------------------------

export interface Database {
  close(): void;
  save(): void;

  /** Execute a single statement. */
  run(sql: string, params?: SqlBindValue[]): RunResult;
  /** Execute a script of one or more statements without parameters (DDL). */
  exec(sql: string): void;
  query(sql: string, params?: SqlBindValue[]): Row[];
  /** Run `fn` inside BEGIN/COMMIT, rolling back if it throws. */
  transaction<T>(fn: () => T): T;
}

export interface DatabaseOptions {
  /** File to load from and save to. Omit for a purely in-memory database. */
  file?: string | null;
  /** Apply pending migrations on open (default: true) */
  migrate?: boolean;
  /** Load a snapshot of `file` without locking it; nothing is written back. */
  readOnly?: boolean;
}

// ---------------------------------------------------------------------------
// sql.js loader
// ---------------------------------------------------------------------------

let sqlJsPromise: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJsPromise) {
    sqlJsPromise = initSqlJs().catch((err: unknown) => {
      sqlJsPromise = null;
      throw err;
    });
  }
  return sqlJsPromise;
}

// ---------------------------------------------------------------------------
// File lock
// ---------------------------------------------------------------------------

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to another user
    return errorCode(err) === 'EPERM';
  }
}

/** Pid recorded in a lock file, or null when the file is malformed. */
function readLockHolder(lockPath: string): number | null {
  const [pidLine] = readFileSync(lockPath, 'utf-8').trim().split('\n');
  const pid = Number.parseInt(pidLine, 10);
  return Number.isInteger(pid) && pid > 0 ? pid : null;
}

/**
 * Take the lock for `file`. Returns the release function. A lock left by a
 * process that no longer runs is replaced.
 */
function acquireFileLock(file: string): () => void {
  const lockPath = `${file}.lock`;
  const dir = dirname(file);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      writeFileSync(lockPath, `${process.pid}\n${Date.now()}`, { flag: 'wx' });
      return () => rmSync(lockPath, { force: true });
    } catch (err) {
      if (errorCode(err) !== 'EEXIST') throw err;
    }

    const holder = readLockHolder(lockPath);
    if (holder !== null && isProcessAlive(holder)) {
      throw new DatabaseLockedError(file, holder);
    }
    logger.warn({ file, holder }, 'Removing stale database lock');
    rmSync(lockPath, { force: true });
  }

  throw new Error(`could not lock database ${file}`);
}

// ---------------------------------------------------------------------------
// createDatabase
// ---------------------------------------------------------------------------

function wrap(raw: SqlJsDatabase, file: string | null, releaseLock: () => void): Database {
  let inTransaction = false;
  let closed = false;

  function saveDb(): void {
    if (!file || closed) return;
    const dir = dirname(file);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const tmpPath = file + '.tmp';
    writeFileSync(tmpPath, Buffer.from(raw.export()));
    renameSync(tmpPath, file);
  }

  const db: Database = {
    close() {
      if (closed) return;
      try {
        saveDb();
        raw.close();
      } finally {
        closed = true;
        releaseLock();
      }
    },

    save() {
      saveDb();
    },

    run(sql, params = []) {
      raw.run(sql, params);
      const changes = raw.getRowsModified();
      if (changes > 0 && !inTransaction) saveDb();
      return { changes };
    },

    exec(sql) {
      raw.exec(sql);
      if (!inTransaction) saveDb();
    },

    query(sql, params = []) {
      const stmt = raw.prepare(sql);
      try {
        stmt.bind(params);
        const results: Row[] = [];
        while (stmt.step()) {
          results.push(stmt.getAsObject());
        }
        return results;
      } finally {
        stmt.free();
      }
    },

    transaction(fn) {
      if (inTransaction) return fn();
      raw.run('BEGIN');
      inTransaction = true;
      try {
        const result = fn();
        raw.run('COMMIT');
        inTransaction = false;
        saveDb();
        return result;
      } catch (err) {
        inTransaction = false;
        raw.run('ROLLBACK');
        throw err;
      }
    },
  };

  return db;
}

/**
 * Open a database, loading `file` when it exists, and apply migrations.
 */
export async function createDatabase(options: DatabaseOptions = {}): Promise<Database> {
  const SQL = await loadSqlJs();
  const file = options.file ?? null;
  const readOnly = options.readOnly === true;
  const releaseLock = file && !readOnly ? acquireFileLock(file) : () => undefined;

  let db: Database;
  try {
    let raw: SqlJsDatabase;
    if (file && existsSync(file)) {
      logger.info({ file, readOnly }, 'Opening database');
      raw = new SQL.Database(readFileSync(file));
    } else {
      if (file && !readOnly) logger.info({ file }, 'Creating database');
      raw = new SQL.Database();
    }
    db = wrap(raw, readOnly ? null : file, releaseLock);
  } catch (err) {
    releaseLock();
    throw err;
  }

  if (options.migrate !== false) {
    try {
      createMigrationRunner(db).migrate();
    } catch (err) {
      db.close();
      throw err;
    }
  }
  return db;
}

/** Fresh in-memory database with the full schema applied. */
export function createMemoryDatabase(): Promise<Database> {
  return createDatabase({ file: null });
}

export type { Row } from './rows';
