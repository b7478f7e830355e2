/**
 * Seed catalog loading
 */

import { readFileSync } from 'fs'
import { resolve } from 'path'
import type { ZodError } from 'zod'
import defaultCatalog from '../../data/activities.json'
import { ActivityCatalogSchema, type ActivityCatalog } from './types'

export class ConfigurationError extends Error {
  constructor(message: string, public readonly source: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
}

/**
 * Validate a raw catalog value. `source` names where it came from in error messages.
 */
export function parseActivityCatalog(raw: unknown, source: string): ActivityCatalog {
  const result = ActivityCatalogSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid activity catalog in ${source}: ${describeIssues(result.error)}`,
      source
    )
  }
  return result.data
}

/**
 * Load the seed activities, from `seedFile` when given, otherwise the bundled catalog.
 */
export function loadSeedActivities(seedFile?: string): ActivityCatalog {
  if (!seedFile) {
    return parseActivityCatalog(defaultCatalog, 'data/activities.json')
  }

  const path = resolve(seedFile)
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Cannot read activity catalog ${path}: ${reason}`, path)
  }

  return parseActivityCatalog(raw, path)
}
