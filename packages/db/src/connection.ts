/**
 * Database connection management
 *
 * Wraps better-sqlite3 and applies the schema migrations on open.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { Logger } from '@nestjs/common';
import { MIGRATIONS } from './migrations';

export type DatabaseType = Database.Database;

export interface DbConfig {
  /** Path to the SQLite database file, `:memory:` when omitted */
  dbPath?: string;
  /** Log every statement */
  verbose?: boolean;
}

const IN_MEMORY = ':memory:';

export class DatabaseService {
  private static readonly logger = new Logger(DatabaseService.name);

  private constructor(
    private readonly db: DatabaseType,
    readonly path: string
  ) {}

  /**
   * Open (and migrate) a database.
   */
  static open(config: DbConfig = {}): DatabaseService {
    const dbPath = config.dbPath ?? IN_MEMORY;

    if (dbPath !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }

    const db = new Database(dbPath, {
      verbose: config.verbose ? (message) => DatabaseService.logger.debug(String(message)) : undefined
    });

    if (dbPath !== IN_MEMORY) {
      db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');

    const service = new DatabaseService(db, dbPath);
    service.runMigrations();
    return service;
  }

  /**
   * Underlying database instance for direct queries
   */
  get database(): DatabaseType {
    return this.db;
  }

  close(): void {
    this.db.close();
  }

  private runMigrations(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS _migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);

    const rows = this.db.prepare<[], { version: number }>('SELECT version FROM _migrations').all();
    const applied = new Set(rows.map((row) => row.version));

    for (const migration of MIGRATIONS) {
      if (applied.has(migration.version)) continue;

      DatabaseService.logger.log(`Applying migration ${migration.version}: ${migration.name}`);
      const apply = this.db.transaction(() => {
        this.db.exec(migration.sql);
        this.db
          .prepare('INSERT INTO _migrations (version, name) VALUES (?, ?)')
          .run(migration.version, migration.name);
      });
      apply();
    }
  }
}
