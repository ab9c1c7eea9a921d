/**
 * Daemon
 *
 * Wires the callback registry, EventLoop and WakeScheduler together and
 * restores persisted tasks. Storage is passed in so the entry point owns
 * the database lifetime.
 */

import {
  CallbackRegistry,
  EventLoop,
  WakeScheduler,
  rehydrateTasks,
  registerBuiltinActions,
  registerBuiltinNotifiers,
} from "@personal-scheduler/core";
import type {
  EventSource,
  SchedulerConfig,
  SettingsStore,
} from "@personal-scheduler/core";

export * from "./storage/index.js";

export interface DaemonOptions {
  config: SchedulerConfig;
  eventSource: EventSource;
  settings: SettingsStore;
  /**
   * Registry to dispatch through. When omitted, a registry holding the
   * built-in notifiers and actions is created.
   */
  registry?: CallbackRegistry;
}

export interface Daemon {
  registry: CallbackRegistry;
  eventLoop: EventLoop;
  wakeScheduler: WakeScheduler;
  /** Stops the EventLoop once the in-flight callback has finished */
  shutdown(): Promise<void>;
}

function createDefaultRegistry(config: SchedulerConfig): CallbackRegistry {
  const registry = new CallbackRegistry();
  registerBuiltinNotifiers(registry);
  registerBuiltinActions(registry, {
    protocolEndpoint: config.protocols.endpoint,
    timeoutMs: config.protocols.timeoutMs,
  });
  return registry;
}

export async function createDaemon(options: DaemonOptions): Promise<Daemon> {
  const { config, eventSource, settings } = options;
  const registry = options.registry ?? createDefaultRegistry(config);

  const eventLoop = new EventLoop({ registry });
  const wakeScheduler = new WakeScheduler({
    eventLoop,
    eventSource,
    settings,
    registry,
    config: config.wake,
  });

  eventLoop.start();

  await rehydrateTasks({
    eventSource,
    eventLoop,
    registry,
    horizonMs: config.rehydration.horizonMs,
    limit: config.rehydration.limit,
    notifyLeadMs: config.rehydration.notifyLeadMs,
  });

  // Wake and maintenance are not persisted; derive them fresh on every start
  await wakeScheduler.scheduleToday();
  wakeScheduler.scheduleDailyMaintenance();

  console.log(
    `[Daemon] Ready with ${eventLoop.pendingCount} pending firing(s) (${registry.actionNames().length} actions, ${registry.notifierNames().length} notifiers)`,
  );

  return {
    registry,
    eventLoop,
    wakeScheduler,
    shutdown: async () => {
      await eventLoop.stop();
    },
  };
}
