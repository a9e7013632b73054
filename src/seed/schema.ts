/**
 * Zod schemas for the activity seed file
 */

import { z } from 'zod'
import type { ActivitySeed } from '../directory/types'

export const ActivitySeedEntrySchema = z
  .object({
    description: z.string(),
    schedule: z.string(),
    max_participants: z.number().int().positive(),
    participants: z.array(z.string().min(1)).default([]),
  })
  .refine(entry => new Set(entry.participants).size === entry.participants.length, {
    message: 'participants must be unique',
    path: ['participants'],
  })

export const ActivitySeedSchema = z
  .record(z.string().min(1), ActivitySeedEntrySchema)
  .refine(seed => Object.keys(seed).length > 0, {
    message: 'at least one activity is required',
  })

export type ActivitySeedFile = z.infer<typeof ActivitySeedSchema>

/**
 * Validate raw seed data and map it to the directory's shape
 * @throws Error listing every validation issue
 */
export function parseActivitySeed(raw: unknown): ActivitySeed {
  const result = ActivitySeedSchema.safeParse(raw)
  if (!result.success) {
    throw new Error(`Invalid activity seed:\n${formatIssues(result.error).join('\n')}`)
  }
  return toActivitySeed(result.data)
}

export function parseActivitySeedSafe(
  raw: unknown
): { success: true; data: ActivitySeed } | { success: false; errors: string[] } {
  const result = ActivitySeedSchema.safeParse(raw)
  if (!result.success) {
    return { success: false, errors: formatIssues(result.error) }
  }
  return { success: true, data: toActivitySeed(result.data) }
}

function toActivitySeed(file: ActivitySeedFile): ActivitySeed {
  return Object.fromEntries(
    Object.entries(file).map(([name, entry]) => [
      name,
      {
        description: entry.description,
        schedule: entry.schedule,
        maxParticipants: entry.max_participants,
        participants: entry.participants,
      },
    ] as const)
  )
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map(err => {
    const path = err.path.join('.')
    return path ? `${path}: ${err.message}` : err.message
  })
}
