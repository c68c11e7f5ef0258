/**
 * Shared Zod schemas used across modules.
 */

import { z } from 'zod'

export const RemoteIdSchema = z.string().min(1, 'Id cannot be empty')

export const TitleSchema = z
  .string()
  .transform((s) => s.trim())
  .pipe(z.string().min(1, 'Title cannot be empty'))

export const FilePathSchema = z.string().min(1, 'File path cannot be empty')
