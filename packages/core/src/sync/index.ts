export { AuthenticatedExecutor } from './executor.js'
export type { AuthenticatedOperation, CredentialSource } from './executor.js'

export { TaskTreeModel, describeListState, flipStatus } from './task-tree.js'
export type { TaskNode, TaskListNode, ListState, MoveFailure } from './task-tree.js'

export { TaskSyncSession, createTaskSync } from './session.js'
export type {
  SessionOperation,
  SessionFailure,
  SessionEvents,
  SessionEventName,
  TaskSyncOptions,
  TaskSync,
} from './session.js'
