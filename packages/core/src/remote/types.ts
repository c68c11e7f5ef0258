/**
 * Contract for the remote task-list service.
 *
 * Every call takes the credential explicitly. Implementations reject with a
 * TaskSyncError: AUTHORIZATION when the service refused the credential
 * (HTTP 401/403), NOT_FOUND or REMOTE_ERROR for everything else.
 */

import type { Credential } from '../credentials/index.js'
import type { RemoteTask, RemoteTaskList, TaskInput } from './schemas.js'

export interface RemoteTaskClient {
  listTaskLists(credential: Credential): Promise<RemoteTaskList[]>
  listTasks(credential: Credential, taskListId: string): Promise<RemoteTask[]>
  getTask(credential: Credential, taskListId: string, taskId: string): Promise<RemoteTask>
  createTask(credential: Credential, taskListId: string, data: TaskInput): Promise<RemoteTask>
  /** Full replacement of the task's writable fields. */
  updateTask(credential: Credential, taskListId: string, taskId: string, data: TaskInput): Promise<RemoteTask>
  deleteTask(credential: Credential, taskListId: string, taskId: string): Promise<void>
  /** Place the task directly after `previousTaskId`, or first when null. */
  moveTask(
    credential: Credential,
    taskListId: string,
    taskId: string,
    previousTaskId: string | null,
  ): Promise<RemoteTask>
  createTaskList(credential: Credential, title: string): Promise<RemoteTaskList>
  updateTaskList(credential: Credential, taskListId: string, title: string): Promise<RemoteTaskList>
  deleteTaskList(credential: Credential, taskListId: string): Promise<void>
}
