/**
 * Zod schemas for records returned by a remote task service.
 */

import { z } from 'zod'
import { RemoteIdSchema } from '../common/index.js'

export const TaskStatusSchema = z.enum(['needsAction', 'completed'])
export type TaskStatus = z.infer<typeof TaskStatusSchema>

export const RemoteTaskListSchema = z.object({
  id: RemoteIdSchema,
  title: z.string(),
  updated: z.string().optional(),
})
export type RemoteTaskList = z.infer<typeof RemoteTaskListSchema>

export const RemoteTaskSchema = z.object({
  id: RemoteIdSchema,
  title: z.string(),
  status: TaskStatusSchema,
  notes: z.string().optional(),
  due: z.string().optional(),
  /** Completion timestamp; null clears it on update. */
  completed: z.string().nullable().optional(),
  parent: z.string().optional(),
  position: z.string().optional(),
  updated: z.string().optional(),
})
export type RemoteTask = z.infer<typeof RemoteTaskSchema>

/** Writable part of a task. */
export type TaskInput = Omit<RemoteTask, 'id' | 'parent' | 'position' | 'updated'>
