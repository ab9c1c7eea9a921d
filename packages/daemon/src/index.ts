import { loadConfig, SETTING_WAKE_URL } from "@personal-scheduler/core";
import { createDaemon } from "./daemon.js";
import {
  EventStore,
  SchedulerDatabase,
  SqliteSettingsStore,
} from "./storage/index.js";

async function main() {
  const config = loadConfig();
  console.log(`Scheduler directory: ${config.schedulerDir}`);
  console.log(`Timezone: ${config.timezone}`);

  const database = new SchedulerDatabase(config.databasePath);
  const eventStore = new EventStore(database);
  const settings = new SqliteSettingsStore(database);

  if (config.wakeServerUrl) {
    settings.setString(SETTING_WAKE_URL, config.wakeServerUrl);
    console.log(`Wake target: ${config.wakeServerUrl}`);
  }

  const daemon = await createDaemon({
    config,
    eventSource: eventStore,
    settings,
  }).catch((err: unknown) => {
    database.close();
    throw err;
  });

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    console.log(`\n${signal} received, shutting down gracefully...`);
    try {
      await daemon.shutdown();
      console.log("Event loop stopped.");

      database.close();
      console.log("Database closed.");

      process.exit(0);
    } catch (err) {
      console.error("Error during shutdown:", err);
      process.exit(1);
    }
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
