import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { IANAZone, DateTime } from 'luxon'
import { parse } from 'yaml'
import { z } from 'zod'
import type { WakeConfig } from './scheduler/wake-scheduler.js'

const SCHEDULER_DIRNAME = '.scheduler'
const CONFIG_FILENAME = 'config.yaml'
const DATABASE_FILENAME = 'scheduler.db'

const TimeOfDaySchema = z.string().regex(/^([01]?\d|2[0-3]):[0-5]\d$/, 'expected HH:mm')

const WakeSectionSchema = z.object({
  default_time: TimeOfDaySchema.default('07:00'),
  lead_minutes: z.number().int().nonnegative().default(60),
  earliest_time: TimeOfDaySchema.default('05:00'),
  server_url: z.string().url().optional(),
  timeout_ms: z.number().int().positive().default(5000),
})

const MaintenanceSectionSchema = z.object({
  time: TimeOfDaySchema.default('00:00'),
})

const RehydrationSectionSchema = z.object({
  horizon_days: z.number().int().positive().default(365),
  limit: z.number().int().positive().default(1000),
  notify_lead_minutes: z.number().int().nonnegative().default(10),
})

const ProtocolsSectionSchema = z.object({
  endpoint: z.string().url().default('http://127.0.0.1:8000/protocols/run'),
  timeout_ms: z.number().int().positive().default(5000),
})

const YamlConfigSchema = z.object({
  timezone: z.string().optional(),
  database: z.object({ path: z.string().optional() }).default({}),
  wake: WakeSectionSchema.default({}),
  maintenance: MaintenanceSectionSchema.default({}),
  rehydration: RehydrationSectionSchema.default({}),
  protocols: ProtocolsSectionSchema.default({}),
})

type YamlConfig = z.infer<typeof YamlConfigSchema>

export interface SchedulerConfig {
  schedulerDir: string
  databasePath: string
  timezone: string
  wake: WakeConfig
  /** Initial wake webhook target; the settings store takes precedence at runtime */
  wakeServerUrl: string | null
  rehydration: {
    horizonMs: number
    limit: number
    notifyLeadMs: number
  }
  protocols: {
    endpoint: string
    timeoutMs: number
  }
}

export function findSchedulerDir(): string {
  // Walk up from cwd looking for an existing .scheduler/ directory
  let dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, SCHEDULER_DIRNAME)
    if (existsSync(candidate)) return candidate
    dir = path.dirname(dir)
  }
  // Not found: default to the project root (where .git lives)
  dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    if (existsSync(path.join(dir, '.git'))) {
      return path.join(dir, SCHEDULER_DIRNAME)
    }
    dir = path.dirname(dir)
  }
  return path.resolve(SCHEDULER_DIRNAME)
}

function defaultYamlConfig(): YamlConfig {
  return YamlConfigSchema.parse({})
}

function loadYamlConfig(schedulerDir: string): YamlConfig {
  const configPath = path.join(schedulerDir, CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    return defaultYamlConfig()
  }

  let raw: unknown
  try {
    raw = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    console.warn(
      `Warning: Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}. Using defaults.`,
    )
    return defaultYamlConfig()
  }

  const result = YamlConfigSchema.safeParse(raw ?? {})
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    console.warn(`Warning: Invalid ${configPath} (${issues}). Using defaults.`)
    return defaultYamlConfig()
  }

  return result.data
}

function resolveTimezone(candidate: string | undefined): string {
  const fallback = DateTime.local().zoneName ?? 'UTC'
  if (!candidate) return fallback
  if (IANAZone.isValidZone(candidate)) return candidate

  console.warn(`Warning: Unknown timezone "${candidate}", using ${fallback}.`)
  return fallback
}

/**
 * Load scheduler configuration from config.yaml with environment
 * overrides (SCHEDULER_DIR, SCHEDULER_DB, SCHEDULER_TIMEZONE,
 * PROTOCOL_ENDPOINT, WAKE_SERVER_URL).
 */
export function loadConfig(schedulerDir?: string): SchedulerConfig {
  const dir = schedulerDir ?? process.env.SCHEDULER_DIR ?? findSchedulerDir()
  const yaml = loadYamlConfig(dir)
  const timezone = resolveTimezone(process.env.SCHEDULER_TIMEZONE ?? yaml.timezone)

  return {
    schedulerDir: dir,
    databasePath:
      process.env.SCHEDULER_DB ??
      (yaml.database.path
        ? path.resolve(dir, yaml.database.path)
        : path.join(dir, DATABASE_FILENAME)),
    timezone,
    wake: {
      timezone,
      defaultTime: yaml.wake.default_time,
      leadMinutes: yaml.wake.lead_minutes,
      earliestTime: yaml.wake.earliest_time,
      maintenanceTime: yaml.maintenance.time,
      webhookTimeoutMs: yaml.wake.timeout_ms,
    },
    wakeServerUrl: process.env.WAKE_SERVER_URL ?? yaml.wake.server_url ?? null,
    rehydration: {
      horizonMs: yaml.rehydration.horizon_days * 24 * 60 * 60 * 1000,
      limit: yaml.rehydration.limit,
      notifyLeadMs: yaml.rehydration.notify_lead_minutes * 60 * 1000,
    },
    protocols: {
      endpoint: process.env.PROTOCOL_ENDPOINT ?? yaml.protocols.endpoint,
      timeoutMs: yaml.protocols.timeout_ms,
    },
  }
}
