/**
 * In-memory tree of task lists and their ordered tasks.
 *
 * Every mutation goes to the remote service first, through the executor,
 * and touches local state only once the service accepted it. The one
 * exception is reordering: the presentation layer moves the row itself
 * (`applyLocalMove`) before `moveTask` tells the service. A failed move is
 * never undone locally; the caller reloads instead.
 */

import { Err, Ok, TaskSyncError, TitleSchema, requiresReauthentication } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { RemoteTask, RemoteTaskClient, TaskInput, TaskStatus } from '../remote/index.js'
import type { AuthenticatedExecutor } from './executor.js'

export interface TaskNode {
  id: string
  taskListId: string
  title: string
  status: TaskStatus
  notes: string
  due: string
}

export interface TaskListNode {
  id: string
  title: string
  tasks: TaskNode[]
  /** Set when this list's tasks could not be fetched; `tasks` is then empty. */
  loadError: TaskSyncError | null
}

export type ListState = 'failed' | 'empty' | 'populated'

export interface MoveFailure {
  taskListId: string
  error: TaskSyncError
  /** Local order can no longer be trusted; reload before the next move. */
  reloadRequired: true
}

export function describeListState(list: TaskListNode): ListState {
  if (list.loadError) return 'failed'
  return list.tasks.length === 0 ? 'empty' : 'populated'
}

export function flipStatus(status: TaskStatus): TaskStatus {
  return status === 'completed' ? 'needsAction' : 'completed'
}

function toTaskNode(task: RemoteTask, taskListId: string): TaskNode {
  return {
    id: task.id,
    taskListId,
    title: task.title,
    status: task.status,
    notes: task.notes ?? '',
    due: task.due ?? '',
  }
}

/** The full writable record, so an update never blanks fields we did not touch. */
function toTaskInput(task: RemoteTask): TaskInput {
  return {
    title: task.title,
    status: task.status,
    notes: task.notes,
    due: task.due,
    completed: task.completed,
  }
}

function withStatus(task: RemoteTask, status: TaskStatus): TaskInput {
  return {
    ...toTaskInput(task),
    status,
    completed: status === 'completed' ? task.completed : null,
  }
}

function copyList(list: TaskListNode): TaskListNode {
  return { ...list, tasks: list.tasks.map((t) => ({ ...t })) }
}

export class TaskTreeModel {
  private lists: TaskListNode[] = []
  private readonly staleLists = new Set<string>()
  private loaded = false

  constructor(
    private readonly client: RemoteTaskClient,
    private readonly executor: AuthenticatedExecutor,
  ) {}

  /** Snapshot of the current tree. */
  getLists(): TaskListNode[] {
    return this.lists.map(copyList)
  }

  findList(taskListId: string): TaskListNode | undefined {
    const list = this.lists.find((l) => l.id === taskListId)
    return list ? copyList(list) : undefined
  }

  findTask(taskListId: string, taskId: string): TaskNode | undefined {
    const task = this.lists.find((l) => l.id === taskListId)?.tasks.find((t) => t.id === taskId)
    return task ? { ...task } : undefined
  }

  get isLoaded(): boolean {
    return this.loaded
  }

  /** True when some list's local order may differ from the service's. */
  get isStale(): boolean {
    return this.staleLists.size > 0
  }

  isListStale(taskListId: string): boolean {
    return this.staleLists.has(taskListId)
  }

  markStale(taskListId: string): void {
    this.staleLists.add(taskListId)
  }

  /**
   * Fetch every list, then each list's tasks, and replace the whole tree.
   * Failing to fetch the lists fails the load. Failing to fetch one list's
   * tasks is recorded on that list and loading carries on, unless the
   * failure needs a new sign-in, which would repeat for every list.
   */
  async loadAll(): Promise<Result<TaskListNode[], TaskSyncError>> {
    const listsResult = await this.executor.execute((c) => this.client.listTaskLists(c))
    if (!listsResult.ok) {
      console.error('[task-tree] Could not load task lists:', listsResult.error.message)
      return Err(listsResult.error)
    }

    const lists: TaskListNode[] = []
    for (const remoteList of listsResult.value) {
      const tasksResult = await this.executor.execute((c) => this.client.listTasks(c, remoteList.id))
      if (tasksResult.ok) {
        lists.push({
          id: remoteList.id,
          title: remoteList.title,
          tasks: tasksResult.value.map((t) => toTaskNode(t, remoteList.id)),
          loadError: null,
        })
        continue
      }

      if (requiresReauthentication(tasksResult.error)) return Err(tasksResult.error)
      console.warn(`[task-tree] Could not load tasks for list ${remoteList.id}:`, tasksResult.error.message)
      lists.push({ id: remoteList.id, title: remoteList.title, tasks: [], loadError: tasksResult.error })
    }

    this.lists = lists
    this.staleLists.clear()
    this.loaded = true
    return Ok(this.getLists())
  }

  /**
   * Re-read the task, flip its status and write the whole record back.
   * Read and write run as one operation, so a retry after re-auth re-reads.
   */
  async toggleStatus(taskListId: string, taskId: string): Promise<Result<TaskStatus, TaskSyncError>> {
    const located = this.requireTask(taskListId, taskId)
    if (!located.ok) return located

    const result = await this.executor.execute(async (c) => {
      const current = await this.client.getTask(c, taskListId, taskId)
      return this.client.updateTask(c, taskListId, taskId, withStatus(current, flipStatus(current.status)))
    })
    if (!result.ok) return Err(result.error)

    this.replaceTask(taskListId, result.value)
    return Ok(result.value.status)
  }

  async createTask(taskListId: string, title: string): Promise<Result<TaskNode, TaskSyncError>> {
    const parsedTitle = TitleSchema.safeParse(title)
    if (!parsedTitle.success) return Err(TaskSyncError.validation('Task title cannot be empty'))
    const located = this.requireList(taskListId)
    if (!located.ok) return located

    const result = await this.executor.execute((c) =>
      this.client.createTask(c, taskListId, { title: parsedTitle.data, status: 'needsAction' }),
    )
    if (!result.ok) return Err(result.error)

    const node = toTaskNode(result.value, taskListId)
    this.lists.find((l) => l.id === taskListId)?.tasks.push(node)
    return Ok({ ...node })
  }

  async renameTask(taskListId: string, taskId: string, title: string): Promise<Result<TaskNode, TaskSyncError>> {
    const parsedTitle = TitleSchema.safeParse(title)
    if (!parsedTitle.success) return Err(TaskSyncError.validation('Task title cannot be empty'))
    const located = this.requireTask(taskListId, taskId)
    if (!located.ok) return located

    const result = await this.executor.execute(async (c) => {
      const current = await this.client.getTask(c, taskListId, taskId)
      return this.client.updateTask(c, taskListId, taskId, { ...toTaskInput(current), title: parsedTitle.data })
    })
    if (!result.ok) return Err(result.error)

    this.replaceTask(taskListId, result.value)
    return Ok(toTaskNode(result.value, taskListId))
  }

  async deleteTask(taskListId: string, taskId: string): Promise<Result<void, TaskSyncError>> {
    const located = this.requireTask(taskListId, taskId)
    if (!located.ok) return located

    const result = await this.executor.execute((c) => this.client.deleteTask(c, taskListId, taskId))
    if (!result.ok) return Err(result.error)

    const list = this.lists.find((l) => l.id === taskListId)
    if (list) list.tasks = list.tasks.filter((t) => t.id !== taskId)
    return Ok(undefined)
  }

  async createTaskList(title: string): Promise<Result<TaskListNode, TaskSyncError>> {
    const parsedTitle = TitleSchema.safeParse(title)
    if (!parsedTitle.success) return Err(TaskSyncError.validation('Task list title cannot be empty'))

    const result = await this.executor.execute((c) => this.client.createTaskList(c, parsedTitle.data))
    if (!result.ok) return Err(result.error)

    const list: TaskListNode = { id: result.value.id, title: result.value.title, tasks: [], loadError: null }
    this.lists.push(list)
    return Ok(copyList(list))
  }

  async renameTaskList(taskListId: string, title: string): Promise<Result<TaskListNode, TaskSyncError>> {
    const parsedTitle = TitleSchema.safeParse(title)
    if (!parsedTitle.success) return Err(TaskSyncError.validation('Task list title cannot be empty'))
    const located = this.requireList(taskListId)
    if (!located.ok) return located

    const result = await this.executor.execute((c) => this.client.updateTaskList(c, taskListId, parsedTitle.data))
    if (!result.ok) return Err(result.error)

    const list = this.lists.find((l) => l.id === taskListId)
    if (!list) return Err(TaskSyncError.notFound('Task list', taskListId))
    list.title = result.value.title
    return Ok(copyList(list))
  }

  async deleteTaskList(taskListId: string): Promise<Result<void, TaskSyncError>> {
    const located = this.requireList(taskListId)
    if (!located.ok) return located

    const result = await this.executor.execute((c) => this.client.deleteTaskList(c, taskListId))
    if (!result.ok) return Err(result.error)

    this.lists = this.lists.filter((l) => l.id !== taskListId)
    this.staleLists.delete(taskListId)
    return Ok(undefined)
  }

  /**
   * The optimistic reorder done by a drag. Tasks only move within their own
   * list; `toIndex` is clamped to the list bounds.
   */
  applyLocalMove(
    taskListId: string,
    taskId: string,
    toIndex: number,
    targetListId: string = taskListId,
  ): Result<void, TaskSyncError> {
    if (targetListId !== taskListId) {
      return Err(TaskSyncError.validation('Tasks can only be moved within their own list'))
    }
    const list = this.lists.find((l) => l.id === taskListId)
    if (!list) return Err(TaskSyncError.notFound('Task list', taskListId))
    const from = list.tasks.findIndex((t) => t.id === taskId)
    if (from === -1) return Err(TaskSyncError.notFound('Task', taskId))

    const [task] = list.tasks.splice(from, 1)
    if (!task) return Err(TaskSyncError.notFound('Task', taskId))
    const to = Math.max(0, Math.min(Math.trunc(toIndex), list.tasks.length))
    list.tasks.splice(to, 0, task)
    return Ok(undefined)
  }

  /**
   * Tell the service where the task now sits: directly after its current
   * local predecessor, or first. On failure the list is marked stale and the
   * caller must reload it; the local order is left as it is.
   */
  async moveTask(taskListId: string, taskId: string): Promise<Result<void, MoveFailure>> {
    const list = this.lists.find((l) => l.id === taskListId)
    const index = list ? list.tasks.findIndex((t) => t.id === taskId) : -1
    if (!list || index === -1) {
      this.markStale(taskListId)
      return Err({ taskListId, error: TaskSyncError.notFound('Task', taskId), reloadRequired: true })
    }

    const previousTaskId = index > 0 ? (list.tasks[index - 1]?.id ?? null) : null
    const result = await this.executor.execute((c) =>
      this.client.moveTask(c, taskListId, taskId, previousTaskId),
    )
    if (!result.ok) {
      this.markStale(taskListId)
      console.warn(`[task-tree] Move of ${taskId} failed, list ${taskListId} needs a reload:`, result.error.message)
      return Err({ taskListId, error: result.error, reloadRequired: true })
    }
    return Ok(undefined)
  }

  private requireList(taskListId: string): Result<TaskListNode, TaskSyncError> {
    const list = this.lists.find((l) => l.id === taskListId)
    return list ? Ok(list) : Err(TaskSyncError.notFound('Task list', taskListId))
  }

  private requireTask(taskListId: string, taskId: string): Result<TaskNode, TaskSyncError> {
    const list = this.requireList(taskListId)
    if (!list.ok) return list
    const task = list.value.tasks.find((t) => t.id === taskId)
    return task ? Ok(task) : Err(TaskSyncError.notFound('Task', taskId))
  }

  private replaceTask(taskListId: string, remote: RemoteTask): void {
    const list = this.lists.find((l) => l.id === taskListId)
    const index = list ? list.tasks.findIndex((t) => t.id === remote.id) : -1
    if (!list || index === -1) return
    list.tasks[index] = toTaskNode(remote, taskListId)
  }
}
