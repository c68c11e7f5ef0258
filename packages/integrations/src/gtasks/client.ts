/**
 * Google Tasks binding of the remote task client contract.
 *
 * Stateless apart from paging config: each call builds an OAuth2 client from
 * the credential it is given. The client never refreshes tokens itself, so an
 * expired token surfaces as AUTHORIZATION and the credential manager decides
 * what to do.
 */

import { google } from 'googleapis'
import type { tasks_v1 } from 'googleapis'
import { z } from 'zod'
import { RemoteTaskListSchema, RemoteTaskSchema, TaskSyncError, TaskStatusSchema } from '@taskdesk/core'
import type { Credential, RemoteTask, RemoteTaskClient, RemoteTaskList, TaskInput } from '@taskdesk/core'
import { classifyGoogleError } from './errors.js'
import type { GoogleTasksClientConfig } from './types.js'

/** The API refuses larger pages. */
const MAX_PAGE_SIZE = 100

const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined)

const GoogleTaskListSchema = z
  .object({
    id: z.string().nullish(),
    title: z
      .string()
      .nullish()
      .transform((v) => v ?? ''),
    updated: optionalText,
  })
  .pipe(RemoteTaskListSchema)

/** Nulls from the API normalised, then checked against the remote task contract. */
const GoogleTaskSchema = z
  .object({
    id: z.string().nullish(),
    title: z
      .string()
      .nullish()
      .transform((v) => v ?? ''),
    status: TaskStatusSchema.nullish().transform((v) => v ?? 'needsAction'),
    notes: optionalText,
    due: optionalText,
    completed: optionalText,
    parent: optionalText,
    position: optionalText,
    updated: optionalText,
  })
  .pipe(RemoteTaskSchema)

export function toRemoteTaskList(data: tasks_v1.Schema$TaskList): RemoteTaskList {
  const parsed = GoogleTaskListSchema.safeParse(data)
  if (!parsed.success) {
    throw TaskSyncError.remote(`Google Tasks returned an invalid task list: ${parsed.error.issues[0]?.message ?? ''}`)
  }
  return parsed.data
}

export function toRemoteTask(data: tasks_v1.Schema$Task): RemoteTask {
  const parsed = GoogleTaskSchema.safeParse(data)
  if (!parsed.success) {
    throw TaskSyncError.remote(`Google Tasks returned an invalid task: ${parsed.error.issues[0]?.message ?? ''}`)
  }
  return parsed.data
}

function toRequestBody(data: TaskInput): tasks_v1.Schema$Task {
  return {
    title: data.title,
    status: data.status,
    notes: data.notes,
    due: data.due,
    completed: data.completed,
  }
}

export class GoogleTasksRemoteClient implements RemoteTaskClient {
  private readonly pageSize: number

  constructor(config: GoogleTasksClientConfig = {}) {
    this.pageSize = Math.min(Math.max(config.pageSize ?? MAX_PAGE_SIZE, 1), MAX_PAGE_SIZE)
  }

  async listTaskLists(credential: Credential): Promise<RemoteTaskList[]> {
    const api = this.api(credential)
    const lists: RemoteTaskList[] = []
    let pageToken: string | undefined

    try {
      do {
        const res = await api.tasklists.list({ maxResults: this.pageSize, pageToken })
        for (const item of res.data.items ?? []) lists.push(toRemoteTaskList(item))
        pageToken = res.data.nextPageToken ?? undefined
      } while (pageToken)
    } catch (e) {
      throw classifyGoogleError(e, 'Listing task lists')
    }
    return lists
  }

  /** All tasks of a list, completed and hidden ones included, in service order. */
  async listTasks(credential: Credential, taskListId: string): Promise<RemoteTask[]> {
    const api = this.api(credential)
    const tasks: RemoteTask[] = []
    let pageToken: string | undefined

    try {
      do {
        const res = await api.tasks.list({
          tasklist: taskListId,
          showCompleted: true,
          showHidden: true,
          maxResults: this.pageSize,
          pageToken,
        })
        for (const item of res.data.items ?? []) tasks.push(toRemoteTask(item))
        pageToken = res.data.nextPageToken ?? undefined
      } while (pageToken)
    } catch (e) {
      throw classifyGoogleError(e, `Listing tasks of ${taskListId}`)
    }
    return tasks
  }

  async getTask(credential: Credential, taskListId: string, taskId: string): Promise<RemoteTask> {
    try {
      const res = await this.api(credential).tasks.get({ tasklist: taskListId, task: taskId })
      return toRemoteTask(res.data)
    } catch (e) {
      throw classifyGoogleError(e, `Reading task ${taskId}`)
    }
  }

  async createTask(credential: Credential, taskListId: string, data: TaskInput): Promise<RemoteTask> {
    try {
      const res = await this.api(credential).tasks.insert({
        tasklist: taskListId,
        requestBody: toRequestBody(data),
      })
      return toRemoteTask(res.data)
    } catch (e) {
      throw classifyGoogleError(e, 'Creating task')
    }
  }

  async updateTask(credential: Credential, taskListId: string, taskId: string, data: TaskInput): Promise<RemoteTask> {
    try {
      const res = await this.api(credential).tasks.update({
        tasklist: taskListId,
        task: taskId,
        requestBody: { ...toRequestBody(data), id: taskId },
      })
      return toRemoteTask(res.data)
    } catch (e) {
      throw classifyGoogleError(e, `Updating task ${taskId}`)
    }
  }

  async deleteTask(credential: Credential, taskListId: string, taskId: string): Promise<void> {
    try {
      await this.api(credential).tasks.delete({ tasklist: taskListId, task: taskId })
    } catch (e) {
      throw classifyGoogleError(e, `Deleting task ${taskId}`)
    }
  }

  async moveTask(
    credential: Credential,
    taskListId: string,
    taskId: string,
    previousTaskId: string | null,
  ): Promise<RemoteTask> {
    try {
      const res = await this.api(credential).tasks.move({
        tasklist: taskListId,
        task: taskId,
        ...(previousTaskId ? { previous: previousTaskId } : {}),
      })
      return toRemoteTask(res.data)
    } catch (e) {
      throw classifyGoogleError(e, `Moving task ${taskId}`)
    }
  }

  async createTaskList(credential: Credential, title: string): Promise<RemoteTaskList> {
    try {
      const res = await this.api(credential).tasklists.insert({ requestBody: { title } })
      return toRemoteTaskList(res.data)
    } catch (e) {
      throw classifyGoogleError(e, 'Creating task list')
    }
  }

  async updateTaskList(credential: Credential, taskListId: string, title: string): Promise<RemoteTaskList> {
    try {
      const res = await this.api(credential).tasklists.update({
        tasklist: taskListId,
        requestBody: { id: taskListId, title },
      })
      return toRemoteTaskList(res.data)
    } catch (e) {
      throw classifyGoogleError(e, `Updating task list ${taskListId}`)
    }
  }

  async deleteTaskList(credential: Credential, taskListId: string): Promise<void> {
    try {
      await this.api(credential).tasklists.delete({ tasklist: taskListId })
    } catch (e) {
      throw classifyGoogleError(e, `Deleting task list ${taskListId}`)
    }
  }

  private api(credential: Credential): tasks_v1.Tasks {
    const auth = new google.auth.OAuth2()
    auth.setCredentials({ access_token: credential.accessToken })
    return google.tasks({ version: 'v1', auth })
  }
}
