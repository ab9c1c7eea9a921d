/**
 * Scheduler Storage: Database Layer
 *
 * Owns the SQLite connection holding persisted events and settings.
 * Uses better-sqlite3 with WAL mode for concurrent access.
 */

import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";

const IN_MEMORY = ":memory:";

export class SchedulerDatabase {
  readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.initialize();
  }

  /**
   * Initialize database with pragmas and schema
   */
  private initialize(): void {
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        category TEXT NOT NULL DEFAULT 'task',
        time INTEGER NOT NULL,
        duration INTEGER NOT NULL DEFAULT 0,
        notifier_name TEXT NOT NULL DEFAULT '',
        action_name TEXT NOT NULL DEFAULT '',
        created TEXT NOT NULL
      );
    `);

    // Events are always read in time order up to a horizon
    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_events_time
      ON events(time);
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS settings (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated TEXT NOT NULL
      );
    `);
  }

  close(): void {
    this.db.close();
  }
}
