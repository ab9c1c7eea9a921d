// Public API for consumption by other packages (daemon)

export * from './scheduler/index.js'
export * from './actions/index.js'

export { loadConfig, findSchedulerDir } from './config.js'
export type { SchedulerConfig } from './config.js'
