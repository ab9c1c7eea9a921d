/**
 * Unit Tests: Configuration Loading
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'

import { loadConfig, findSchedulerDir } from '../src/config.js'

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

const ENV_KEYS = [
  'SCHEDULER_DIR',
  'SCHEDULER_DB',
  'SCHEDULER_TIMEZONE',
  'PROTOCOL_ENDPOINT',
  'WAKE_SERVER_URL',
] as const

const DAY_MS = 24 * 60 * 60 * 1000

function writeConfig(dir: string, content: string): void {
  fs.writeFileSync(path.join(dir, 'config.yaml'), content, 'utf-8')
}

// -------------------------------------------------------------------
// loadConfig
// -------------------------------------------------------------------

describe('loadConfig', () => {
  let tempDir: string
  let savedEnv: Map<string, string | undefined>

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scheduler-config-'))
    savedEnv = new Map(ENV_KEYS.map((key) => [key, process.env[key]]))
    for (const key of ENV_KEYS) delete process.env[key]
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    for (const [key, value] of savedEnv) {
      if (value === undefined) delete process.env[key]
      else process.env[key] = value
    }
    fs.rmSync(tempDir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  it('uses defaults when there is no config file', () => {
    process.env.SCHEDULER_TIMEZONE = 'UTC'

    const config = loadConfig(tempDir)

    expect(config).toEqual({
      schedulerDir: tempDir,
      databasePath: path.join(tempDir, 'scheduler.db'),
      timezone: 'UTC',
      wake: {
        timezone: 'UTC',
        defaultTime: '07:00',
        leadMinutes: 60,
        earliestTime: '05:00',
        maintenanceTime: '00:00',
        webhookTimeoutMs: 5000,
      },
      wakeServerUrl: null,
      rehydration: {
        horizonMs: 365 * DAY_MS,
        limit: 1000,
        notifyLeadMs: 10 * 60 * 1000,
      },
      protocols: {
        endpoint: 'http://127.0.0.1:8000/protocols/run',
        timeoutMs: 5000,
      },
    })
    expect(console.warn).not.toHaveBeenCalled()
  })

  it('reads values from config.yaml', () => {
    writeConfig(
      tempDir,
      [
        'timezone: Europe/Berlin',
        'database:',
        '  path: data/events.db',
        'wake:',
        '  default_time: "06:45"',
        '  lead_minutes: 45',
        '  earliest_time: "05:30"',
        '  server_url: http://127.0.0.1:9000/wake',
        'maintenance:',
        '  time: "00:05"',
        'rehydration:',
        '  horizon_days: 30',
        '  notify_lead_minutes: 15',
        'protocols:',
        '  endpoint: http://10.0.0.2:8000/protocols/run',
      ].join('\n'),
    )

    const config = loadConfig(tempDir)

    expect(config.timezone).toBe('Europe/Berlin')
    expect(config.databasePath).toBe(path.join(tempDir, 'data', 'events.db'))
    expect(config.wake).toEqual({
      timezone: 'Europe/Berlin',
      defaultTime: '06:45',
      leadMinutes: 45,
      earliestTime: '05:30',
      maintenanceTime: '00:05',
      webhookTimeoutMs: 5000,
    })
    expect(config.wakeServerUrl).toBe('http://127.0.0.1:9000/wake')
    expect(config.rehydration).toEqual({ horizonMs: 30 * DAY_MS, limit: 1000, notifyLeadMs: 15 * 60 * 1000 })
    expect(config.protocols.endpoint).toBe('http://10.0.0.2:8000/protocols/run')
  })

  it('lets the environment override the file', () => {
    writeConfig(tempDir, 'timezone: Europe/Berlin\nwake:\n  server_url: http://127.0.0.1:9000/wake\n')
    process.env.SCHEDULER_TIMEZONE = 'Asia/Tokyo'
    process.env.SCHEDULER_DB = '/tmp/override.db'
    process.env.PROTOCOL_ENDPOINT = 'http://127.0.0.1:7000/protocols/run'
    process.env.WAKE_SERVER_URL = 'http://127.0.0.1:7001/wake'

    const config = loadConfig(tempDir)

    expect(config.timezone).toBe('Asia/Tokyo')
    expect(config.wake.timezone).toBe('Asia/Tokyo')
    expect(config.databasePath).toBe('/tmp/override.db')
    expect(config.protocols.endpoint).toBe('http://127.0.0.1:7000/protocols/run')
    expect(config.wakeServerUrl).toBe('http://127.0.0.1:7001/wake')
  })

  it('reads the directory from SCHEDULER_DIR', () => {
    process.env.SCHEDULER_DIR = tempDir
    expect(loadConfig().schedulerDir).toBe(tempDir)
  })

  it('falls back to defaults on invalid values', () => {
    process.env.SCHEDULER_TIMEZONE = 'UTC'
    writeConfig(tempDir, 'wake:\n  default_time: "25:00"\n  lead_minutes: 45\n')

    const config = loadConfig(tempDir)

    expect(config.wake.defaultTime).toBe('07:00')
    expect(config.wake.leadMinutes).toBe(60)
    expect(console.warn).toHaveBeenCalledWith(
      `Warning: Invalid ${path.join(tempDir, 'config.yaml')} (wake.default_time: expected HH:mm). Using defaults.`,
    )
  })

  it('falls back to defaults on unparseable YAML', () => {
    writeConfig(tempDir, 'wake: [unclosed\n')

    const config = loadConfig(tempDir)

    expect(config.wake.defaultTime).toBe('07:00')
    expect(console.warn).toHaveBeenCalledTimes(1)
  })

  it('replaces an unknown timezone with the local zone', () => {
    writeConfig(tempDir, 'timezone: Mars/Olympus_Mons\n')

    const config = loadConfig(tempDir)

    expect(config.timezone).not.toBe('Mars/Olympus_Mons')
    expect(console.warn).toHaveBeenCalledWith(
      `Warning: Unknown timezone "Mars/Olympus_Mons", using ${config.timezone}.`,
    )
  })
})

describe('findSchedulerDir', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'scheduler-find-')))
  })

  afterEach(() => {
    vi.restoreAllMocks()
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('finds .scheduler in a parent directory', () => {
    const schedulerDir = path.join(tempDir, '.scheduler')
    const nested = path.join(tempDir, 'a', 'b')
    fs.mkdirSync(schedulerDir)
    fs.mkdirSync(nested, { recursive: true })
    vi.spyOn(process, 'cwd').mockReturnValue(nested)

    expect(findSchedulerDir()).toBe(schedulerDir)
  })
})
