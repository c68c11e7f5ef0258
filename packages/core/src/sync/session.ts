/**
 * Task sync session — what the presentation layer talks to.
 *
 * Each call is an independent async unit of work. Besides the returned
 * promise, outcomes are published as events so a window can keep its tree,
 * status line and sign-in prompt up to date without awaiting anything.
 */

import { EventEmitter } from 'node:events'
import { Err, Ok, requiresReauthentication } from '../common/index.js'
import type { Result, TaskSyncError } from '../common/index.js'
import { AuthenticatedExecutor } from './executor.js'
import { TaskTreeModel, describeListState } from './task-tree.js'
import type { MoveFailure, TaskListNode, TaskNode } from './task-tree.js'
import type { RemoteTaskClient, TaskStatus } from '../remote/index.js'
import { CredentialLifecycleManager } from '../credentials/index.js'
import type { CredentialManagerOptions } from '../credentials/index.js'

export type SessionOperation =
  | 'load'
  | 'toggle-status'
  | 'create-task'
  | 'rename-task'
  | 'delete-task'
  | 'move-task'
  | 'create-task-list'
  | 'rename-task-list'
  | 'delete-task-list'

export interface SessionFailure {
  operation: SessionOperation
  error: TaskSyncError
}

export interface SessionEvents {
  status: [message: string]
  tree: [lists: TaskListNode[]]
  'reauth-required': [error: TaskSyncError]
  failure: [failure: SessionFailure]
}

export type SessionEventName = keyof SessionEvents

export class TaskSyncSession {
  private readonly events = new EventEmitter()

  constructor(readonly model: TaskTreeModel) {}

  on<K extends SessionEventName>(event: K, listener: (...args: SessionEvents[K]) => void): this {
    this.events.on(event, listener)
    return this
  }

  off<K extends SessionEventName>(event: K, listener: (...args: SessionEvents[K]) => void): this {
    this.events.off(event, listener)
    return this
  }

  /** Discard the tree and rebuild it from the service. */
  async reload(): Promise<Result<TaskListNode[], TaskSyncError>> {
    this.emit('status', 'Loading tasks...')
    const result = await this.model.loadAll()
    if (!result.ok) {
      this.fail('load', result.error, `Error loading task lists: ${result.error.message}`)
      return result
    }

    this.emit('tree', result.value)
    const failed = result.value.filter((l) => describeListState(l) === 'failed')
    if (result.value.length === 0) {
      this.emit('status', 'No task lists found')
    } else if (failed.length > 0) {
      const names = failed.map((l) => l.title).join(', ')
      this.emit('status', `Error loading tasks for list ${names}`)
    } else {
      this.emit('status', 'Tasks loaded successfully')
    }
    return result
  }

  async toggleStatus(taskListId: string, taskId: string): Promise<Result<TaskStatus, TaskSyncError>> {
    const result = await this.model.toggleStatus(taskListId, taskId)
    if (!result.ok) {
      this.fail('toggle-status', result.error, `Error updating task: ${result.error.message}`)
      return result
    }
    this.publishTree(`Task marked as ${result.value}`)
    return result
  }

  async createTask(taskListId: string, title: string): Promise<Result<TaskNode, TaskSyncError>> {
    const result = await this.model.createTask(taskListId, title)
    if (!result.ok) {
      this.fail('create-task', result.error, `Error creating task: ${result.error.message}`)
      return result
    }
    this.publishTree(`Task '${result.value.title}' added successfully`)
    return result
  }

  async renameTask(taskListId: string, taskId: string, title: string): Promise<Result<TaskNode, TaskSyncError>> {
    const result = await this.model.renameTask(taskListId, taskId, title)
    if (!result.ok) {
      this.fail('rename-task', result.error, `Error renaming task: ${result.error.message}`)
      return result
    }
    this.publishTree('Task renamed successfully')
    return result
  }

  async deleteTask(taskListId: string, taskId: string): Promise<Result<void, TaskSyncError>> {
    const result = await this.model.deleteTask(taskListId, taskId)
    if (!result.ok) {
      this.fail('delete-task', result.error, `Error deleting task: ${result.error.message}`)
      return result
    }
    this.publishTree('Task deleted successfully')
    return result
  }

  async createTaskList(title: string): Promise<Result<TaskListNode, TaskSyncError>> {
    const result = await this.model.createTaskList(title)
    if (!result.ok) {
      this.fail('create-task-list', result.error, `Error creating task list: ${result.error.message}`)
      return result
    }
    this.publishTree(`Task list '${result.value.title}' added successfully`)
    return result
  }

  async renameTaskList(taskListId: string, title: string): Promise<Result<TaskListNode, TaskSyncError>> {
    const result = await this.model.renameTaskList(taskListId, title)
    if (!result.ok) {
      this.fail('rename-task-list', result.error, `Error renaming task list: ${result.error.message}`)
      return result
    }
    this.publishTree('Task list renamed successfully')
    return result
  }

  async deleteTaskList(taskListId: string): Promise<Result<void, TaskSyncError>> {
    const result = await this.model.deleteTaskList(taskListId)
    if (!result.ok) {
      this.fail('delete-task-list', result.error, `Error deleting task list: ${result.error.message}`)
      return result
    }
    this.publishTree('Task list deleted successfully')
    return result
  }

  /**
   * Reorder after a drop: move the row locally, then tell the service.
   * A failed move reloads the whole tree. A move that succeeds on a list
   * already known to be stale reloads too, so silent drift gets corrected.
   */
  async moveTask(taskListId: string, taskId: string, toIndex: number): Promise<Result<void, MoveFailure | TaskSyncError>> {
    const wasStale = this.model.isListStale(taskListId)
    const local = this.model.applyLocalMove(taskListId, taskId, toIndex)
    if (!local.ok) {
      this.fail('move-task', local.error, `Error updating task position: ${local.error.message}`)
      return local
    }
    this.emit('tree', this.model.getLists())
    this.emit('status', 'Updating task position...')

    const result = await this.model.moveTask(taskListId, taskId)
    if (!result.ok) {
      this.fail('move-task', result.error.error, `Error updating task position: ${result.error.error.message}`)
      await this.reload()
      return Err(result.error)
    }

    this.emit('status', 'Task position updated successfully')
    if (wasStale) await this.reload()
    return Ok(undefined)
  }

  private publishTree(message: string): void {
    this.emit('tree', this.model.getLists())
    this.emit('status', message)
  }

  private fail(operation: SessionOperation, error: TaskSyncError, message: string): void {
    this.emit('status', message)
    this.emit('failure', { operation, error })
    if (requiresReauthentication(error)) this.emit('reauth-required', error)
  }

  private emit<K extends SessionEventName>(event: K, ...args: SessionEvents[K]): void {
    this.events.emit(event, ...args)
  }
}

export interface TaskSyncOptions extends CredentialManagerOptions {
  client: RemoteTaskClient
}

export interface TaskSync {
  credentials: CredentialLifecycleManager
  executor: AuthenticatedExecutor
  model: TaskTreeModel
  session: TaskSyncSession
}

/** Wire manager, executor, model and session for one application session. */
export function createTaskSync(opts: TaskSyncOptions): TaskSync {
  const { client, ...credentialOptions } = opts
  const credentials = new CredentialLifecycleManager(credentialOptions)
  const executor = new AuthenticatedExecutor(credentials)
  const model = new TaskTreeModel(client, executor)
  return { credentials, executor, model, session: new TaskSyncSession(model) }
}
