/**
 * Activity Types
 *
 * Field names follow the JSON shape served by GET /activities.
 */

import { z } from 'zod'

export const ActivitySchema = z.object({
  description: z.string(),
  schedule: z.string(),
  // Advisory only: signups are not checked against it
  max_participants: z.number().int().nonnegative(),
  participants: z.array(z.string().min(1)).refine(
    (participants) => new Set(participants).size === participants.length,
    { message: 'participants must not contain duplicate emails' }
  )
})

export const ActivityCatalogSchema = z.record(z.string().min(1), ActivitySchema)

export type Activity = z.infer<typeof ActivitySchema>

/** Activity name -> activity, in seed order */
export type ActivityCatalog = Record<string, Activity>

export interface RosterChange {
  message: string
}
