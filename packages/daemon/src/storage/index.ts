export { SchedulerDatabase } from "./db.js";
export { EventStore } from "./event-store.js";
export type { CreateEventInput } from "./event-store.js";
export { SqliteSettingsStore } from "./settings-store.js";
