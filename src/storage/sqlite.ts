/**
 * SQLite Database Infrastructure
 * Manages the database connection, schema migrations and transactions for the laundry API
 */

import Database, { type Database as DatabaseType, type RunResult } from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import type { Logger } from 'pino';
import { guard, toStorageError } from './errors.js';

// ============================================
// Types
// ============================================

export interface DatabaseConfig {
  /** Path to SQLite database file, or `:memory:` */
  path: string;
  /** Enable WAL mode for better concurrent access */
  walMode: boolean;
  /** Busy timeout in milliseconds */
  busyTimeout: number;
  /** Enable foreign keys enforcement (required for reporter checks and cascades) */
  foreignKeys: boolean;
  logger?: Logger;
}

export interface MigrationInfo {
  version: number;
  appliedAt: number;
  description: string;
}

// ============================================
// Schema Migrations
// ============================================

interface Migration {
  version: number;
  description: string;
  up: string;
}

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: 'Create room table',
    up: `
      CREATE TABLE IF NOT EXISTS room (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        description TEXT
      );
    `,
  },
  {
    version: 2,
    description: 'Create machine table',
    up: `
      CREATE TABLE IF NOT EXISTS machine (
        room_id INTEGER NOT NULL REFERENCES room(id) ON DELETE CASCADE,
        machine_id TEXT NOT NULL,
        type TEXT NOT NULL CHECK(type IN ('washer', 'dryer')),
        PRIMARY KEY (room_id, machine_id)
      );
    `,
  },
  {
    version: 3,
    description: 'Create user table',
    up: `
      CREATE TABLE IF NOT EXISTS "user" (
        username TEXT PRIMARY KEY,
        admin INTEGER NOT NULL DEFAULT 0
      );
    `,
  },
  {
    version: 4,
    description: 'Create report table',
    up: `
      CREATE TABLE IF NOT EXISTS report (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        room_id INTEGER NOT NULL,
        machine_id TEXT NOT NULL,
        reporter_username TEXT NOT NULL REFERENCES "user"(username) ON DELETE CASCADE,
        type TEXT NOT NULL CHECK(type IN ('operational', 'caution', 'broken')),
        time TEXT NOT NULL,
        description TEXT,
        archived INTEGER NOT NULL DEFAULT 0,
        FOREIGN KEY (room_id, machine_id) REFERENCES machine(room_id, machine_id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_report_machine
        ON report(room_id, machine_id, archived);
      CREATE INDEX IF NOT EXISTS idx_report_reporter
        ON report(reporter_username, archived);
    `,
  },
];

// ============================================
// Database Manager
// ============================================

export class DatabaseManager {
  private db: DatabaseType | null = null;
  private config: DatabaseConfig;

  constructor(config: Partial<DatabaseConfig> = {}) {
    this.config = {
      path: 'data/laundry.db',
      walMode: true,
      busyTimeout: 5000,
      foreignKeys: true,
      ...config,
    };
  }

  /**
   * Open the database connection and run migrations
   */
  initialize(): void {
    if (this.db) {
      return;
    }

    const inMemory = this.config.path === ':memory:';

    if (!inMemory) {
      const dbDir = dirname(this.config.path);
      if (dbDir && !existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true });
      }
    }

    this.db = guard(() => new Database(this.config.path));

    if (this.config.walMode && !inMemory) {
      this.db.pragma('journal_mode = WAL');
    }
    if (this.config.busyTimeout) {
      this.db.pragma(`busy_timeout = ${this.config.busyTimeout}`);
    }
    if (this.config.foreignKeys) {
      this.db.pragma('foreign_keys = ON');
    }

    this.db.pragma('synchronous = NORMAL');

    this.runMigrations();
  }

  /**
   * Get the database connection
   */
  getDb(): DatabaseType {
    if (!this.db) {
      throw toStorageError(new Error('Database not initialized. Call initialize() first.'));
    }
    return this.db;
  }

  // ----------------------------------------
  // Statement execution
  // ----------------------------------------

  /** First row of a query, or undefined */
  get<R>(sql: string, ...params: unknown[]): R | undefined {
    return guard(() => this.getDb().prepare<unknown[], R>(sql).get(...params));
  }

  all<R>(sql: string, ...params: unknown[]): R[] {
    return guard(() => this.getDb().prepare<unknown[], R>(sql).all(...params));
  }

  run(sql: string, ...params: unknown[]): RunResult {
    return guard(() => this.getDb().prepare(sql).run(...params));
  }

  /**
   * Execute a function within a transaction.
   * Errors thrown by `fn` roll the transaction back and propagate unchanged;
   * failures of BEGIN/COMMIT themselves surface as StorageError.
   */
  transaction<T>(fn: () => T): T {
    const db = this.getDb();
    try {
      return db.transaction(fn)();
    } catch (error) {
      if (error instanceof Database.SqliteError) {
        throw toStorageError(error);
      }
      throw error;
    }
  }

  // ----------------------------------------
  // Migrations
  // ----------------------------------------

  private runMigrations(): void {
    const db = this.getDb();

    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        applied_at INTEGER NOT NULL,
        description TEXT NOT NULL
      );
    `);

    const current = db.prepare<[], { version: number }>(
      'SELECT COALESCE(MAX(version), 0) as version FROM schema_migrations'
    ).get();
    const currentVersion = current?.version ?? 0;

    for (const migration of MIGRATIONS) {
      if (migration.version <= currentVersion) {
        continue;
      }

      guard(() => db.transaction(() => {
        db.exec(migration.up);
        db.prepare(
          'INSERT INTO schema_migrations (version, applied_at, description) VALUES (?, ?, ?)'
        ).run(migration.version, Date.now(), migration.description);
      })());

      this.config.logger?.info(
        { version: migration.version },
        `Migration ${migration.version}: ${migration.description}`
      );
    }
  }

  /**
   * Get applied migrations
   */
  getMigrations(): MigrationInfo[] {
    return this.all<MigrationInfo>(
      'SELECT version, applied_at as appliedAt, description FROM schema_migrations ORDER BY version'
    );
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (!this.db) {
      return;
    }

    if (this.config.walMode && this.config.path !== ':memory:') {
      try {
        this.db.pragma('wal_checkpoint(TRUNCATE)');
      } catch (error) {
        this.config.logger?.warn({ err: error }, 'WAL checkpoint failed on close');
      }
    }

    this.db.close();
    this.db = null;
  }

  getPath(): string {
    return this.config.path;
  }
}
