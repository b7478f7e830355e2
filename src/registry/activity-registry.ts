/**
 * Activity Registry - In-memory roster store
 *
 * Owns the activity name -> Activity mapping for the life of the process.
 * Each mutation runs its membership check and its append/remove in one
 * synchronous call, so operations on the same activity never interleave.
 */

import type { Activity, ActivityCatalog, RosterChange } from './types'
import {
  ActivityNotFoundError,
  AlreadyRegisteredError,
  NotRegisteredError
} from './errors'
import { logger } from '../utils/logger'

function cloneActivity(activity: Activity): Activity {
  return { ...activity, participants: [...activity.participants] }
}

export class ActivityRegistry {
  private activities = new Map<string, Activity>()

  constructor(private readonly seed: ActivityCatalog) {
    this.reset()
  }

  /**
   * Snapshot of every activity. Mutating the result does not touch the registry.
   */
  list(): ActivityCatalog {
    const catalog: ActivityCatalog = {}
    for (const [name, activity] of this.activities) {
      catalog[name] = cloneActivity(activity)
    }
    return catalog
  }

  get(activityName: string): Activity | undefined {
    const activity = this.activities.get(activityName)
    return activity ? cloneActivity(activity) : undefined
  }

  get size(): number {
    return this.activities.size
  }

  /**
   * Append `email` to the activity's participants.
   * max_participants is not checked.
   */
  signUp(activityName: string, email: string): RosterChange {
    const activity = this.require(activityName)

    if (activity.participants.includes(email)) {
      throw new AlreadyRegisteredError(activityName, email)
    }

    activity.participants.push(email)
    logger.info('Participant signed up', {
      activityName,
      email,
      participants: activity.participants.length
    })

    return { message: `Signed up ${email} for ${activityName}` }
  }

  /**
   * Remove one occurrence of `email` from the activity's participants.
   */
  unregister(activityName: string, email: string): RosterChange {
    const activity = this.require(activityName)

    const index = activity.participants.indexOf(email)
    if (index === -1) {
      throw new NotRegisteredError(activityName, email)
    }

    activity.participants.splice(index, 1)
    logger.info('Participant unregistered', {
      activityName,
      email,
      participants: activity.participants.length
    })

    return { message: `Unregistered ${email} from ${activityName}` }
  }

  /**
   * Restore every activity to the state the registry was constructed with.
   */
  reset(): void {
    this.activities = new Map(
      Object.entries(this.seed).map(([name, activity]) => [name, cloneActivity(activity)])
    )
    logger.debug('Activity registry reset to seed', { activities: this.activities.size })
  }

  // Exact-match lookup: names are not trimmed or case-folded
  private require(activityName: string): Activity {
    const activity = this.activities.get(activityName)
    if (!activity) {
      throw new ActivityNotFoundError(activityName)
    }
    return activity
  }
}
