export { TaskStatusSchema, RemoteTaskListSchema, RemoteTaskSchema } from './schemas.js'
export type { TaskStatus, RemoteTaskList, RemoteTask, TaskInput } from './schemas.js'
export type { RemoteTaskClient } from './types.js'
