export { loadTaskdeskConfig, defaultConfigDir, TaskdeskConfigSchema, TASKS_SCOPE } from './config.js'
export type { TaskdeskConfig } from './config.js'
