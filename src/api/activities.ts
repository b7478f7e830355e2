/**
 * Activities API
 *
 * Roster reads and mutations backed by the ActivityRegistry
 */

import { Router, type Request } from 'express'
import { z } from 'zod'
import type { ActivityRegistry } from '../registry/activity-registry'
import { RegistryError } from '../registry/errors'
import type { RosterChange } from '../registry/types'
import { ApiError } from '../middleware/error-handler'
import { rosterOperationsTotal } from '../observability/metrics'

const EmailQuerySchema = z.object({
  email: z.string().min(1)
})

function requireEmail(req: Request): string {
  const parsed = EmailQuerySchema.safeParse(req.query)
  if (!parsed.success) {
    throw new ApiError(422, 'email query parameter is required', 'ValidationError')
  }
  return parsed.data.email
}

function recordOperation(operation: 'signup' | 'unregister', run: () => RosterChange): RosterChange {
  try {
    const change = run()
    rosterOperationsTotal.inc({ operation, outcome: 'success' })
    return change
  } catch (error) {
    rosterOperationsTotal.inc({
      operation,
      outcome: error instanceof RegistryError ? error.kind : 'error'
    })
    throw error
  }
}

export function createActivityRouter(registry: ActivityRegistry) {
  const router = Router()

  // GET /activities - All activities with their current participants
  router.get('/', (req, res) => {
    res.json(registry.list())
  })

  // POST /activities/:activityName/signup?email= - Add a participant
  router.post('/:activityName/signup', (req, res) => {
    const { activityName } = req.params
    const email = requireEmail(req)

    res.json(recordOperation('signup', () => registry.signUp(activityName, email)))
  })

  // POST /activities/:activityName/unregister?email= - Remove a participant
  router.post('/:activityName/unregister', (req, res) => {
    const { activityName } = req.params
    const email = requireEmail(req)

    res.json(recordOperation('unregister', () => registry.unregister(activityName, email)))
  })

  return router
}
