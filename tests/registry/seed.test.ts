/**
 * Tests for seed catalog loading and validation
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { ConfigurationError, loadSeedActivities, parseActivityCatalog } from '../../src/registry/seed'

const chessClub = {
  description: 'Learn strategies and compete in chess tournaments',
  schedule: 'Fridays, 3:30 PM - 5:00 PM',
  max_participants: 12,
  participants: ['michael@mergington.edu', 'daniel@mergington.edu']
}

describe('loadSeedActivities', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'roster-seed-test-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  test('loads the bundled catalog in seed order', () => {
    const catalog = loadSeedActivities()

    expect(Object.keys(catalog)).toEqual([
      'Chess Club',
      'Programming Class',
      'Gym Class',
      'Soccer Team',
      'Basketball Team',
      'Art Club',
      'Drama Club',
      'Math Club',
      'Debate Team'
    ])
    expect(catalog['Chess Club']).toEqual(chessClub)
  })

  test('loads a catalog from a file', () => {
    const file = join(dir, 'activities.json')
    writeFileSync(file, JSON.stringify({ 'Chess Club': chessClub }))

    expect(loadSeedActivities(file)).toEqual({ 'Chess Club': chessClub })
  })

  test('fails with ConfigurationError for a missing file', () => {
    const file = join(dir, 'missing.json')

    expect(() => loadSeedActivities(file)).toThrow(ConfigurationError)
    expect(() => loadSeedActivities(file)).toThrow(`Cannot read activity catalog ${file}`)
  })

  test('fails with ConfigurationError for malformed JSON', () => {
    const file = join(dir, 'broken.json')
    writeFileSync(file, '{ "Chess Club": ')

    expect(() => loadSeedActivities(file)).toThrow(ConfigurationError)
  })
})

describe('parseActivityCatalog', () => {
  test('rejects duplicate participants', () => {
    const raw = {
      'Chess Club': { ...chessClub, participants: ['michael@mergington.edu', 'michael@mergington.edu'] }
    }

    expect(() => parseActivityCatalog(raw, 'inline')).toThrow(
      'Invalid activity catalog in inline: Chess Club.participants: participants must not contain duplicate emails'
    )
  })

  test('rejects a fractional capacity', () => {
    const raw = { 'Chess Club': { ...chessClub, max_participants: 12.5 } }

    expect(() => parseActivityCatalog(raw, 'inline')).toThrow(ConfigurationError)
  })

  test('rejects an activity missing its schedule', () => {
    const { schedule: _schedule, ...withoutSchedule } = chessClub

    const error = (() => {
      try {
        parseActivityCatalog({ 'Chess Club': withoutSchedule }, 'inline')
      } catch (caught) {
        return caught
      }
    })()

    expect(error).toBeInstanceOf(ConfigurationError)
    expect(error).toMatchObject({ source: 'inline' })
    expect(String(error)).toContain('Chess Club.schedule: Required')
  })

  test('accepts an activity with no participants', () => {
    const raw = { 'Robotics Club': { ...chessClub, participants: [] } }

    expect(parseActivityCatalog(raw, 'inline')['Robotics Club'].participants).toEqual([])
  })
})
