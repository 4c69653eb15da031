import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { Database } from '../database.js'
import { escalationRate } from '../event-store.js'
import type { CrisisEvent } from '../../assessment/types.js'
import { existsSync, unlinkSync } from 'fs'
import { tmpdir } from 'os'
import path from 'path'

const TEST_DB = path.join(tmpdir(), `sakina-test-${process.pid}.db`)

function removeDb(): void {
  for (const file of [TEST_DB, `${TEST_DB}-wal`, `${TEST_DB}-shm`]) {
    if (existsSync(file)) unlinkSync(file)
  }
}

function event(id: string, overrides: Partial<CrisisEvent> = {}): CrisisEvent {
  return {
    id,
    sessionId: 's1',
    timestamp: new Date('2026-03-01T09:30:00Z'),
    crisisLevel: 6,
    crisisType: 'suicide_risk',
    contributingCategories: ['suicide'],
    indicatorCount: 1,
    escalated: false,
    followUpNeeded: true,
    message: null,
    ...overrides
  }
}

describe('Database', () => {
  let db: Database

  beforeEach(() => {
    removeDb()
    db = new Database(TEST_DB)
  })

  afterEach(() => {
    db.close()
    removeDb()
  })

  it('creates tables on init', () => {
    expect(db.listTables()).toContain('crisis_events')
  })

  it('round-trips a crisis event', () => {
    db.appendEvent('s1', event('e1', {
      crisisLevel: 8,
      contributingCategories: ['suicide', 'hopelessness'],
      indicatorCount: 3,
      escalated: true,
      message: 'kept for review'
    }))

    const [stored] = db.queryRecentEvents('s1', 10)
    expect(stored).toEqual({
      id: 'e1',
      sessionId: 's1',
      timestamp: new Date('2026-03-01T09:30:00Z'),
      crisisLevel: 8,
      crisisType: 'suicide_risk',
      contributingCategories: ['suicide', 'hopelessness'],
      indicatorCount: 3,
      escalated: true,
      followUpNeeded: true,
      message: 'kept for review'
    })
  })

  it('returns the newest events oldest first', () => {
    for (let i = 0; i < 5; i++) db.appendEvent('s1', event(`e${i}`))

    expect(db.queryRecentEvents('s1', 3).map(e => e.id)).toEqual(['e2', 'e3', 'e4'])
    expect(db.queryRecentEvents('s1', 0)).toEqual([])
  })

  it('keeps sessions apart', () => {
    db.appendEvent('s1', event('a1'))
    db.appendEvent('s2', event('b1', { sessionId: 's2' }))

    expect(db.queryRecentEvents('s2', 10).map(e => e.id)).toEqual(['b1'])
  })

  it('rejects crisis levels outside the scale', () => {
    expect(() => db.appendEvent('s1', event('bad', { crisisLevel: 11 }))).toThrow()
  })

  it('survives a reopen', () => {
    db.appendEvent('s1', event('e1'))
    db.close()
    db = new Database(TEST_DB)

    expect(db.queryRecentEvents('s1', 10).map(e => e.id)).toEqual(['e1'])
  })

  it('computes crisis statistics since a date', () => {
    db.appendEvent('s1', event('old', { timestamp: new Date('2026-01-01T00:00:00Z'), crisisLevel: 9 }))
    db.appendEvent('s1', event('e1', { crisisLevel: 6 }))
    db.appendEvent('s1', event('e2', { crisisLevel: 8, escalated: true }))
    db.appendEvent('s2', event('e3', { sessionId: 's2', crisisLevel: 7, crisisType: 'social_crisis' }))

    const stats = db.getCrisisStatistics(new Date('2026-02-01T00:00:00Z'))

    expect(stats.totalCrisisEvents).toBe(3)
    expect(stats.escalatedEvents).toBe(1)
    expect(stats.sessionCount).toBe(2)
    expect(stats.averageCrisisLevel).toBe(7)
    expect(stats.crisisTypes).toEqual({ suicide_risk: 2, social_crisis: 1 })
    expect(escalationRate(stats)).toBeCloseTo(1 / 3)
  })

  it('returns zeroed statistics for an empty log', () => {
    const stats = db.getCrisisStatistics(new Date('2026-01-01T00:00:00Z'))

    expect(stats.totalCrisisEvents).toBe(0)
    expect(stats.averageCrisisLevel).toBe(0)
    expect(escalationRate(stats)).toBe(0)
  })
})
