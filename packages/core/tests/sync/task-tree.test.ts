import { describe, it, expect, vi, beforeEach } from 'vitest'
import { AuthenticatedExecutor, TaskTreeModel, describeListState, flipStatus } from '../../src/sync/index.js'
import type { TaskListNode } from '../../src/sync/index.js'
import { TaskSyncError } from '../../src/common/index.js'
import { FakeTaskService, StubCredentialSource } from '../helpers/fakes.js'

let service: FakeTaskService
let model: TaskTreeModel

function ids(list: TaskListNode | undefined): string[] {
  return list?.tasks.map((t) => t.id) ?? []
}

beforeEach(async () => {
  vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  vi.spyOn(console, 'error').mockImplementation(() => undefined)
  service = new FakeTaskService()
  // Tasks get ids task-1, task-2, task-3
  service.addList('Work', ['Write report', 'Call supplier', 'Ship release'], 'work')
  service.addList('Home', [], 'home')
  model = new TaskTreeModel(service, new AuthenticatedExecutor(new StubCredentialSource()))
})

describe('flipStatus', () => {
  it('alternates between the two states', () => {
    expect(flipStatus('needsAction')).toBe('completed')
    expect(flipStatus('completed')).toBe('needsAction')
  })
})

describe('TaskTreeModel.loadAll', () => {
  it('loads every list with its tasks in service order', async () => {
    const result = await model.loadAll()

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.map((l) => l.title)).toEqual(['Work', 'Home'])
    expect(result.value[0]?.tasks.map((t) => t.title)).toEqual(['Write report', 'Call supplier', 'Ship release'])
    expect(result.value[0]?.tasks[0]).toEqual({
      id: 'task-1',
      taskListId: 'work',
      title: 'Write report',
      status: 'needsAction',
      notes: '',
      due: '',
    })
    expect(model.isLoaded).toBe(true)
  })

  it('tells an empty list apart from one that failed to load', async () => {
    service.addList('Errands', ['Buy milk'], 'errands')
    service.failTasksOf('errands', new Error('Backend error'))

    const result = await model.loadAll()

    expect(result.ok).toBe(true)
    if (!result.ok) return
    const [work, home, errands] = result.value
    expect(result.value).toHaveLength(3)
    expect(work && describeListState(work)).toBe('populated')
    expect(home && describeListState(home)).toBe('empty')
    expect(errands && describeListState(errands)).toBe('failed')
    expect(errands?.tasks).toEqual([])
    expect(errands?.loadError?.code).toBe('REMOTE_ERROR')
    expect(errands?.loadError?.message).toBe('Backend error')
  })

  it('keeps loading the remaining lists after one list fails', async () => {
    service.failTasksOf('work', TaskSyncError.remote('Rate limited', 429))

    const result = await model.loadAll()

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.map((l) => l.id)).toEqual(['work', 'home'])
    expect(result.value[0]?.loadError?.status).toBe(429)
    expect(result.value[1]?.loadError).toBeNull()
    expect(service.callCount('listTasks')).toBe(2)
  })

  it('fails the whole load when the lists cannot be fetched', async () => {
    service.failNext('listTaskLists', TaskSyncError.remote('Service unavailable', 503))

    const result = await model.loadAll()

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.status).toBe(503)
    expect(model.getLists()).toEqual([])
    expect(service.callCount('listTasks')).toBe(0)
  })

  it('stops when a list fetch needs a new sign-in', async () => {
    service.failNext('listTasks', TaskSyncError.authorization('revoked', 401), 2)

    const result = await model.loadAll()

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('AUTH_EXPIRED')
    expect(service.callCount('listTasks')).toBe(2)
  })

  it('rebuilds the tree from scratch on every load', async () => {
    await model.loadAll()
    service.addList('Garden', ['Mow lawn'], 'garden')
    await service.deleteTask({ accessToken: 'x', refreshToken: null, expiresAt: null, scopes: [] }, 'work', 'task-2')

    await model.loadAll()

    expect(model.getLists().map((l) => l.id)).toEqual(['work', 'home', 'garden'])
    expect(ids(model.findList('work'))).toEqual(['task-1', 'task-3'])
  })
})

describe('TaskTreeModel.toggleStatus', () => {
  beforeEach(async () => {
    await model.loadAll()
  })

  it('re-reads the task, flips it and writes the full record', async () => {
    const result = await model.toggleStatus('work', 'task-1')

    expect(result).toEqual({ ok: true, value: 'completed' })
    expect(service.calls.slice(-2)).toEqual(['getTask', 'updateTask'])
    expect(service.remoteTask('work', 'task-1').status).toBe('completed')
    expect(service.remoteTask('work', 'task-1').title).toBe('Write report')
    expect(model.findTask('work', 'task-1')?.status).toBe('completed')
  })

  it('toggling twice returns to the original status', async () => {
    await model.toggleStatus('work', 'task-1')
    const second = await model.toggleStatus('work', 'task-1')

    expect(second).toEqual({ ok: true, value: 'needsAction' })
    expect(service.callCount('updateTask')).toBe(2)
    expect(service.remoteTask('work', 'task-1').status).toBe('needsAction')
    expect(service.remoteTask('work', 'task-1').completed).toBeNull()
    expect(model.findTask('work', 'task-1')?.status).toBe('needsAction')
  })

  it('flips the remote status, not a stale local one', async () => {
    const current = service.remoteTask('work', 'task-2')
    current.status = 'completed'

    const result = await model.toggleStatus('work', 'task-2')

    expect(result).toEqual({ ok: true, value: 'needsAction' })
  })

  it('re-reads after a refresh when the first attempt is rejected', async () => {
    service.rejectToken('access-1')

    const result = await model.toggleStatus('work', 'task-3')

    expect(result).toEqual({ ok: true, value: 'completed' })
    expect(service.calls.slice(-3)).toEqual(['getTask', 'getTask', 'updateTask'])
    expect(service.credentialsSeen.slice(-2)).toEqual(['access-2', 'access-2'])
  })

  it('surfaces AUTH_EXPIRED and leaves the task alone', async () => {
    service.rejectToken('access-1')
    service.rejectToken('access-2')

    const result = await model.toggleStatus('work', 'task-1')

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('AUTH_EXPIRED')
    expect(model.findTask('work', 'task-1')?.status).toBe('needsAction')
  })

  it('leaves local state untouched when the update fails', async () => {
    service.failNext('updateTask', TaskSyncError.remote('Backend error', 500))

    const result = await model.toggleStatus('work', 'task-1')

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('REMOTE_ERROR')
    expect(model.findTask('work', 'task-1')?.status).toBe('needsAction')
  })

  it('rejects unknown tasks without calling the service', async () => {
    const before = service.calls.length
    const result = await model.toggleStatus('work', 'nope')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('Task not found: nope')
    expect(service.calls.length).toBe(before)
  })
})

describe('TaskTreeModel create / rename / delete', () => {
  beforeEach(async () => {
    await model.loadAll()
  })

  it('creates remotely first and appends the returned task', async () => {
    const result = await model.createTask('work', '  Book venue  ')

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.title).toBe('Book venue')
    expect(result.value.status).toBe('needsAction')
    expect(ids(model.findList('work')).at(-1)).toBe(result.value.id)
    expect(service.taskIds('work')).toEqual(ids(model.findList('work')))
  })

  it('refuses a blank title without a remote call', async () => {
    const before = service.calls.length
    const result = await model.createTask('work', '   ')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('VALIDATION_ERROR')
    expect(service.calls.length).toBe(before)
  })

  it('does not add a task the service refused', async () => {
    service.failNext('createTask', TaskSyncError.remote('Quota exceeded', 429))
    const result = await model.createTask('home', 'Water plants')
    expect(result.ok).toBe(false)
    expect(model.findList('home')?.tasks).toEqual([])
  })

  it('renames a task keeping its status', async () => {
    await model.toggleStatus('work', 'task-2')
    const result = await model.renameTask('work', 'task-2', 'Call supplier again')

    expect(result.ok).toBe(true)
    expect(model.findTask('work', 'task-2')).toMatchObject({ title: 'Call supplier again', status: 'completed' })
    expect(service.remoteTask('work', 'task-2').status).toBe('completed')
  })

  it('deletes remotely before removing locally', async () => {
    const result = await model.deleteTask('work', 'task-2')
    expect(result.ok).toBe(true)
    expect(ids(model.findList('work'))).toEqual(['task-1', 'task-3'])
    expect(service.taskIds('work')).toEqual(['task-1', 'task-3'])
  })

  it('keeps a task whose delete failed', async () => {
    service.failNext('deleteTask', TaskSyncError.remote('Backend error', 500))
    const result = await model.deleteTask('work', 'task-2')
    expect(result.ok).toBe(false)
    expect(ids(model.findList('work'))).toEqual(['task-1', 'task-2', 'task-3'])
  })

  it('creates, renames and deletes task lists', async () => {
    const created = await model.createTaskList('Reading')
    expect(created.ok).toBe(true)
    if (!created.ok) return
    const list = model.findList(created.value.id)
    expect(list && describeListState(list)).toBe('empty')

    const renamed = await model.renameTaskList(created.value.id, 'Books')
    expect(renamed.ok && renamed.value.title).toBe('Books')

    const deleted = await model.deleteTaskList(created.value.id)
    expect(deleted.ok).toBe(true)
    expect(model.getLists().map((l) => l.id)).toEqual(['work', 'home'])
  })

  it('keeps a task list whose delete failed', async () => {
    service.failNext('deleteTaskList', TaskSyncError.remote('Backend error', 500))
    const result = await model.deleteTaskList('home')
    expect(result.ok).toBe(false)
    expect(model.findList('home')).toBeDefined()
  })
})

describe('TaskTreeModel reordering', () => {
  beforeEach(async () => {
    await model.loadAll()
  })

  it('sends a null predecessor when the task moved to the top', async () => {
    const move = vi.spyOn(service, 'moveTask')
    model.applyLocalMove('work', 'task-3', 0)

    const result = await model.moveTask('work', 'task-3')

    expect(result.ok).toBe(true)
    expect(move).toHaveBeenCalledWith(expect.anything(), 'work', 'task-3', null)
    expect(service.taskIds('work')).toEqual(['task-3', 'task-1', 'task-2'])
  })

  it('sends the new local predecessor', async () => {
    const move = vi.spyOn(service, 'moveTask')
    model.applyLocalMove('work', 'task-1', 2)

    await model.moveTask('work', 'task-1')

    expect(move).toHaveBeenCalledWith(expect.anything(), 'work', 'task-1', 'task-3')
    expect(ids(model.findList('work'))).toEqual(['task-2', 'task-3', 'task-1'])
    expect(service.taskIds('work')).toEqual(['task-2', 'task-3', 'task-1'])
  })

  it('clamps the drop index and rejects moves across lists', () => {
    expect(model.applyLocalMove('work', 'task-1', 99).ok).toBe(true)
    expect(ids(model.findList('work'))).toEqual(['task-2', 'task-3', 'task-1'])

    const across = model.applyLocalMove('work', 'task-1', 0, 'home')
    expect(across.ok).toBe(false)
    if (!across.ok) expect(across.error.code).toBe('VALIDATION_ERROR')
  })

  it('does not undo a failed move and asks for a reload', async () => {
    service.failNext('moveTask', TaskSyncError.remote('Backend error', 500))
    model.applyLocalMove('work', 'task-3', 0)

    const result = await model.moveTask('work', 'task-3')

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.reloadRequired).toBe(true)
      expect(result.error.taskListId).toBe('work')
      expect(result.error.error.code).toBe('REMOTE_ERROR')
    }
    expect(ids(model.findList('work'))).toEqual(['task-3', 'task-1', 'task-2'])
    expect(model.isStale).toBe(true)

    await model.loadAll()
    expect(model.isStale).toBe(false)
    expect(ids(model.findList('work'))).toEqual(['task-1', 'task-2', 'task-3'])
  })

  it('matches a fresh load after a run of successful mutations', async () => {
    const created = await model.createTask('work', 'Plan retro')
    if (!created.ok) throw created.error
    model.applyLocalMove('work', created.value.id, 1)
    await model.moveTask('work', created.value.id)
    await model.toggleStatus('work', 'task-3')
    await model.deleteTask('work', 'task-2')
    model.applyLocalMove('work', 'task-3', 0)
    await model.moveTask('work', 'task-3')

    const local = model.getLists()
    const fresh = await model.loadAll()

    expect(fresh.ok).toBe(true)
    if (fresh.ok) expect(fresh.value).toEqual(local)
    expect(ids(model.findList('work'))).toEqual(['task-3', 'task-1', created.value.id])
  })
})
