import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import { mkdtempSync, writeFileSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import {
  loadActivitySeed,
  loadActivitySeedSafe,
  parseActivitySeed,
  parseActivitySeedSafe,
} from '../../src/seed'

const SCHOOL_ACTIVITIES = [
  'Chess Club',
  'Programming Class',
  'Gym Class',
  'Basketball Team',
  'Soccer Club',
  'Art Class',
  'Drama Club',
  'Debate Team',
  'Science Club',
]

describe('parseActivitySeed', () => {
  it('should map seed entries to directory records', () => {
    const seed = parseActivitySeed({
      'Chess Club': {
        description: 'Learn strategies',
        schedule: 'Fridays',
        max_participants: 12,
        participants: ['michael@school.edu'],
      },
      'Science Club': {
        description: 'Run experiments',
        schedule: 'Fridays',
        max_participants: 20,
      },
    })

    expect(seed).toEqual({
      'Chess Club': {
        description: 'Learn strategies',
        schedule: 'Fridays',
        maxParticipants: 12,
        participants: ['michael@school.edu'],
      },
      'Science Club': {
        description: 'Run experiments',
        schedule: 'Fridays',
        maxParticipants: 20,
        participants: [],
      },
    })
  })

  it('should reject duplicate participants', () => {
    expect(() =>
      parseActivitySeed({
        'Chess Club': {
          description: 'Learn strategies',
          schedule: 'Fridays',
          max_participants: 12,
          participants: ['a@school.edu', 'a@school.edu'],
        },
      })
    ).toThrow('Chess Club.participants: participants must be unique')
  })

  it('should reject a non-positive capacity', () => {
    expect(() =>
      parseActivitySeed({
        'Chess Club': {
          description: 'Learn strategies',
          schedule: 'Fridays',
          max_participants: 0,
        },
      })
    ).toThrow('Chess Club.max_participants')
  })

  it('should reject an empty seed', () => {
    const result = parseActivitySeedSafe({})

    expect(result).toEqual({
      success: false,
      errors: ['at least one activity is required'],
    })
  })
})

describe('loadActivitySeed', () => {
  let dir: string

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'activity-seed-'))
  })

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('should load the bundled seed file', () => {
    const seed = loadActivitySeed('config/activities.yaml')

    for (const name of SCHOOL_ACTIVITIES) {
      expect(seed).toHaveProperty([name])
    }
    expect(seed['Chess Club']).toEqual({
      description: 'Learn strategies and compete in chess tournaments',
      schedule: 'Fridays, 3:30 PM - 5:00 PM',
      maxParticipants: 12,
      participants: ['michael@mergington.edu', 'daniel@mergington.edu'],
    })
    expect(seed['Science Club'].participants).toEqual([])
  })

  it('should load a YAML file', () => {
    const file = join(dir, 'valid.yaml')
    writeFileSync(
      file,
      [
        'Robotics Club:',
        '  description: Build robots',
        '  schedule: Tuesdays',
        '  max_participants: 8',
        '  participants:',
        '    - ada@school.edu',
      ].join('\n')
    )

    expect(loadActivitySeed(file)).toEqual({
      'Robotics Club': {
        description: 'Build robots',
        schedule: 'Tuesdays',
        maxParticipants: 8,
        participants: ['ada@school.edu'],
      },
    })
  })

  it('should throw when the file is missing', () => {
    expect(() => loadActivitySeed(join(dir, 'missing.yaml'))).toThrow('Seed file not found')
  })

  it('should throw with the file name when validation fails', () => {
    const file = join(dir, 'invalid.yaml')
    writeFileSync(file, ['Robotics Club:', '  description: Build robots'].join('\n'))

    expect(() => loadActivitySeed(file)).toThrow(`Failed to load seed from ${file}: Invalid activity seed`)
  })
})

describe('loadActivitySeedSafe', () => {
  let dir: string

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'activity-seed-safe-'))
  })

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('should report a missing file', () => {
    const result = loadActivitySeedSafe(join(dir, 'missing.yaml'))

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.errors[0]).toContain('Seed file not found')
    }
  })

  it('should report malformed YAML', () => {
    const file = join(dir, 'broken.yaml')
    writeFileSync(file, 'Chess Club: [unclosed')

    const result = loadActivitySeedSafe(file)

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.errors[0]).toMatch(/^Failed to parse YAML: /)
    }
  })

  it('should return the parsed seed', () => {
    const result = loadActivitySeedSafe('config/activities.yaml')

    expect(result.success).toBe(true)
    if (result.success) {
      expect(Object.keys(result.data)).toEqual(SCHOOL_ACTIVITIES)
    }
  })
})
