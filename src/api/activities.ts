/**
 * Activities API
 *
 * Translates directory outcomes into HTTP responses
 */

import { Router } from 'express'
import { z } from 'zod'
import type { ActivityService } from '../services/activity-service'
import type { ActivityDetails, DirectoryError } from '../directory/types'
import { ApiError } from '../middleware/error-handler'
import { rosterOperationsTotal } from '../observability/metrics'
import { logger } from '../utils/logger'

// Participant ids are passed through untouched
const EmailQuerySchema = z.object({
  email: z.string({
    required_error: 'email query parameter is required',
    invalid_type_error: 'email query parameter must be given once'
  })
})

/**
 * Wire format of an activity record
 */
export interface ActivityResponse {
  description: string
  schedule: string
  max_participants: number
  participants: string[]
}

export function toActivityResponse(details: ActivityDetails): ActivityResponse {
  return {
    description: details.description,
    schedule: details.schedule,
    max_participants: details.maxParticipants,
    participants: details.participants
  }
}

export function toApiError(error: DirectoryError): ApiError {
  switch (error.kind) {
    case 'ActivityNotFound':
      return new ApiError(404, 'Activity not found', 'ACTIVITY_NOT_FOUND')
    case 'AlreadyRegistered':
      return new ApiError(400, 'Student is already signed up for this activity', 'ALREADY_REGISTERED')
    case 'ParticipantNotFound':
      return new ApiError(404, 'Participant not found', 'PARTICIPANT_NOT_FOUND')
    case 'ActivityFull':
      return new ApiError(400, 'Activity is full', 'ACTIVITY_FULL')
  }
}

function parseEmail(query: unknown): string {
  const result = EmailQuerySchema.safeParse(query)
  if (!result.success) {
    throw new ApiError(422, result.error.errors[0]?.message ?? 'Invalid query', 'VALIDATION_ERROR')
  }
  return result.data.email
}

export function createActivitiesRouter(activityService: ActivityService): Router {
  const router = Router()

  // GET /activities - All activities with their rosters
  router.get('/', async (req, res) => {
    const snapshot = await activityService.directory.list()

    res.json(Object.fromEntries(
      Object.entries(snapshot).map(([name, details]) => [name, toActivityResponse(details)] as const)
    ))
  })

  // GET /activities/:activityName - One activity
  router.get('/:activityName', async (req, res) => {
    const result = await activityService.directory.describe(req.params.activityName)

    if (!result.success) {
      throw toApiError(result.error)
    }

    res.json(toActivityResponse(result.data))
  })

  // POST /activities/:activityName/signup?email= - Sign up a participant
  router.post('/:activityName/signup', async (req, res) => {
    const { activityName } = req.params
    const email = parseEmail(req.query)

    const result = await activityService.directory.signUp(activityName, email)

    if (!result.success) {
      rosterOperationsTotal.inc({ operation: 'signup', outcome: result.error.kind })
      throw toApiError(result.error)
    }

    rosterOperationsTotal.inc({ operation: 'signup', outcome: 'success' })
    logger.info('Participant signed up', { activityName, email })

    res.json({ message: `Signed up ${result.data.participantId} for ${result.data.activityName}` })
  })

  // DELETE /activities/:activityName/unregister?email= - Remove a participant
  router.delete('/:activityName/unregister', async (req, res) => {
    const { activityName } = req.params
    const email = parseEmail(req.query)

    const result = await activityService.directory.unregister(activityName, email)

    if (!result.success) {
      rosterOperationsTotal.inc({ operation: 'unregister', outcome: result.error.kind })
      throw toApiError(result.error)
    }

    rosterOperationsTotal.inc({ operation: 'unregister', outcome: 'success' })
    logger.info('Participant unregistered', { activityName, email })

    res.json({ message: `Unregistered ${result.data.participantId} from ${result.data.activityName}` })
  })

  return router
}
