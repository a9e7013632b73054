import type { LockManager } from '../storage/lock-manager'
import { InMemoryLockManager } from '../storage/in-memory-lock-manager'
import type {
  ActivityDetails,
  ActivitySeed,
  ActivitySnapshot,
  DirectoryResult,
  RosterConfirmation,
} from './types'

export interface ActivityDirectoryOptions {
  lockManager?: LockManager
  /**
   * Reject signups once a roster reaches `maxParticipants` (default: true)
   */
  enforceCapacity?: boolean
}

interface ActivityRecord {
  readonly description: string
  readonly schedule: string
  readonly maxParticipants: number
  readonly participants: Set<string>
}

const DIRECTORY_LOCK_KEY = 'activity-directory'

/**
 * Activity Directory - Activities and their participant rosters
 *
 * The set of activities is fixed at construction. Rosters change only through
 * `signUp` and `unregister`. Every operation, reads included, runs under the
 * same directory lock. Failures are returned as typed results, never thrown.
 */
export class ActivityDirectory {
  private readonly activities = new Map<string, ActivityRecord>()
  private readonly lockManager: LockManager
  readonly enforceCapacity: boolean

  constructor(seed: ActivitySeed, options: ActivityDirectoryOptions = {}) {
    this.lockManager = options.lockManager ?? new InMemoryLockManager()
    this.enforceCapacity = options.enforceCapacity ?? true

    for (const [name, definition] of Object.entries(seed)) {
      const participants = new Set(definition.participants)

      if (participants.size !== definition.participants.length) {
        throw new Error(`Seed for activity "${name}" lists a participant more than once`)
      }
      if (!Number.isInteger(definition.maxParticipants) || definition.maxParticipants < 1) {
        throw new Error(`Seed for activity "${name}" has an invalid capacity: ${definition.maxParticipants}`)
      }
      if (this.enforceCapacity && participants.size > definition.maxParticipants) {
        throw new Error(
          `Seed for activity "${name}" has ${participants.size} participants but a capacity of ${definition.maxParticipants}`
        )
      }

      this.activities.set(name, {
        description: definition.description,
        schedule: definition.schedule,
        maxParticipants: definition.maxParticipants,
        participants,
      })
    }
  }

  /**
   * Number of activities (fixed for the directory's lifetime)
   */
  get size(): number {
    return this.activities.size
  }

  /**
   * Snapshot of every activity. Safe for the caller to mutate.
   */
  async list(): Promise<ActivitySnapshot> {
    return this.lockManager.withLock(DIRECTORY_LOCK_KEY, (): ActivitySnapshot =>
      Object.fromEntries(
        Array.from(this.activities, ([name, record]) => [name, toDetails(record)] as const)
      )
    )
  }

  /**
   * Snapshot of a single activity
   */
  async describe(activityName: string): Promise<DirectoryResult<ActivityDetails>> {
    return this.lockManager.withLock(DIRECTORY_LOCK_KEY, (): DirectoryResult<ActivityDetails> => {
      const record = this.activities.get(activityName)
      if (!record) {
        return { success: false, error: { kind: 'ActivityNotFound', activityName } }
      }
      return { success: true, data: toDetails(record) }
    })
  }

  async signUp(activityName: string, participantId: string): Promise<DirectoryResult<RosterConfirmation>> {
    return this.lockManager.withLock(DIRECTORY_LOCK_KEY, (): DirectoryResult<RosterConfirmation> => {
      const record = this.activities.get(activityName)
      if (!record) {
        return { success: false, error: { kind: 'ActivityNotFound', activityName } }
      }

      if (record.participants.has(participantId)) {
        return { success: false, error: { kind: 'AlreadyRegistered', activityName, participantId } }
      }

      if (this.enforceCapacity && record.participants.size >= record.maxParticipants) {
        return {
          success: false,
          error: { kind: 'ActivityFull', activityName, maxParticipants: record.maxParticipants },
        }
      }

      record.participants.add(participantId)
      return { success: true, data: { activityName, participantId } }
    })
  }

  async unregister(activityName: string, participantId: string): Promise<DirectoryResult<RosterConfirmation>> {
    return this.lockManager.withLock(DIRECTORY_LOCK_KEY, (): DirectoryResult<RosterConfirmation> => {
      const record = this.activities.get(activityName)
      if (!record) {
        return { success: false, error: { kind: 'ActivityNotFound', activityName } }
      }

      if (!record.participants.delete(participantId)) {
        return { success: false, error: { kind: 'ParticipantNotFound', activityName, participantId } }
      }

      return { success: true, data: { activityName, participantId } }
    })
  }
}

function toDetails(record: ActivityRecord): ActivityDetails {
  return {
    description: record.description,
    schedule: record.schedule,
    maxParticipants: record.maxParticipants,
    participants: Array.from(record.participants),
  }
}
