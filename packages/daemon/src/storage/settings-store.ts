/**
 * Settings Store
 *
 * String key/value settings, e.g. the wake webhook target.
 */

import type { SettingsStore } from "@personal-scheduler/core";
import type { SchedulerDatabase } from "./db.js";

export class SqliteSettingsStore implements SettingsStore {
  constructor(private database: SchedulerDatabase) {}

  getString(key: string): string | null {
    const row = this.database.db
      .prepare<[string], { value: string }>(
        "SELECT value FROM settings WHERE key = ?",
      )
      .get(key);
    return row?.value ?? null;
  }

  setString(key: string, value: string): void {
    this.database.db
      .prepare(
        `INSERT INTO settings (key, value, updated) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated = excluded.updated`,
      )
      .run(key, value, new Date().toISOString());
  }

  delete(key: string): boolean {
    const result = this.database.db
      .prepare("DELETE FROM settings WHERE key = ?")
      .run(key);
    return result.changes > 0;
  }
}
