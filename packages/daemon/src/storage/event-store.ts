/**
 * Event Store
 *
 * Persisted events read by rehydration and the wake policy.
 */

import { ulid } from "ulid";
import type { EventSource, SchedulerEvent } from "@personal-scheduler/core";
import type { SchedulerDatabase } from "./db.js";

interface EventRow {
  id: string;
  title: string;
  description: string;
  category: string;
  time: number;
  duration: number;
  notifier_name: string;
  action_name: string;
}

export interface CreateEventInput {
  title: string;
  time: Date;
  description?: string;
  /** Defaults to "task", the category rehydration restores */
  category?: string;
  /** Milliseconds */
  duration?: number;
  notifierName?: string;
  actionName?: string;
}

function rowToEvent(row: EventRow): SchedulerEvent {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    category: row.category,
    time: new Date(row.time),
    duration: row.duration,
    notifierName: row.notifier_name,
    actionName: row.action_name,
  };
}

export class EventStore implements EventSource {
  constructor(private database: SchedulerDatabase) {}

  createEvent(input: CreateEventInput): SchedulerEvent {
    if (Number.isNaN(input.time.getTime())) {
      throw new Error(`Event "${input.title}" has an invalid time`);
    }

    const event: SchedulerEvent = {
      id: `evt-${ulid()}`,
      title: input.title,
      description: input.description ?? "",
      category: input.category ?? "task",
      time: new Date(input.time.getTime()),
      duration: input.duration ?? 0,
      notifierName: input.notifierName ?? "",
      actionName: input.actionName ?? "",
    };

    this.database.db
      .prepare(
        `INSERT INTO events (id, title, description, category, time, duration, notifier_name, action_name, created)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        event.id,
        event.title,
        event.description,
        event.category,
        event.time.getTime(),
        event.duration,
        event.notifierName,
        event.actionName,
        new Date().toISOString(),
      );

    return event;
  }

  getEvent(id: string): SchedulerEvent | null {
    const row = this.database.db
      .prepare<[string], EventRow>(
        `SELECT id, title, description, category, time, duration, notifier_name, action_name
         FROM events WHERE id = ?`,
      )
      .get(id);

    return row ? rowToEvent(row) : null;
  }

  /**
   * @returns true when an event was deleted
   */
  deleteEvent(id: string): boolean {
    const result = this.database.db
      .prepare("DELETE FROM events WHERE id = ?")
      .run(id);
    return result.changes > 0;
  }

  async getEvents(
    limit: number,
    horizon: Date,
    from: Date = new Date(),
  ): Promise<SchedulerEvent[]> {
    const rows = this.database.db
      .prepare<[number, number, number], EventRow>(
        `SELECT id, title, description, category, time, duration, notifier_name, action_name
         FROM events
         WHERE time >= ? AND time <= ?
         ORDER BY time ASC, id ASC
         LIMIT ?`,
      )
      .all(from.getTime(), horizon.getTime(), limit);

    return rows.map(rowToEvent);
  }
}
