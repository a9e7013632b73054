/**
 * Activity Directory types
 */

/**
 * An activity's attributes and roster. Description, schedule and capacity
 * are fixed at startup; only the roster changes.
 */
export interface ActivityDetails {
  description: string
  schedule: string
  maxParticipants: number
  participants: string[]
}

/**
 * Every activity keyed by name, as returned by `list()`
 */
export type ActivitySnapshot = Record<string, ActivityDetails>

/**
 * Seed passed to the directory: activity name → initial record
 */
export type ActivitySeed = Record<string, ActivityDetails>

export interface RosterConfirmation {
  activityName: string
  participantId: string
}

export type DirectoryError =
  | { kind: 'ActivityNotFound'; activityName: string }
  | { kind: 'AlreadyRegistered'; activityName: string; participantId: string }
  | { kind: 'ParticipantNotFound'; activityName: string; participantId: string }
  | { kind: 'ActivityFull'; activityName: string; maxParticipants: number }

export type DirectoryResult<T> =
  | { success: true; data: T }
  | { success: false; error: DirectoryError }
