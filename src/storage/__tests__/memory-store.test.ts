import { describe, it, expect } from 'vitest'
import { MemoryEventStore } from '../memory-store.js'
import { summarizeEvents } from '../event-store.js'
import type { CrisisEvent } from '../../assessment/types.js'

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

describe('MemoryEventStore', () => {
  it('returns the newest events oldest first', () => {
    const store = new MemoryEventStore()
    for (let i = 0; i < 4; i++) store.appendEvent('s1', event(`e${i}`))

    expect(store.queryRecentEvents('s1', 2).map(e => e.id)).toEqual(['e2', 'e3'])
    expect(store.queryRecentEvents('s1', 0)).toEqual([])
    expect(store.queryRecentEvents('missing', 5)).toEqual([])
    expect(store.size).toBe(4)
  })

  it('filters statistics by timestamp', () => {
    const store = new MemoryEventStore()
    store.appendEvent('s1', event('old', { timestamp: new Date('2026-01-01T00:00:00Z') }))
    store.appendEvent('s1', event('new'))

    expect(store.getCrisisStatistics(new Date('2026-02-01T00:00:00Z')).totalCrisisEvents).toBe(1)
  })
})

describe('summarizeEvents', () => {
  it('aggregates counts, sessions and levels', () => {
    const since = new Date('2026-01-01T00:00:00Z')
    const stats = summarizeEvents([
      event('e1', { crisisLevel: 6, escalated: true }),
      event('e2', { crisisLevel: 8 }),
      event('e3', { sessionId: 's2', crisisLevel: 5, crisisType: 'social_crisis' })
    ], since)

    expect(stats).toEqual({
      since,
      totalCrisisEvents: 3,
      escalatedEvents: 1,
      sessionCount: 2,
      averageCrisisLevel: 19 / 3,
      crisisTypes: { suicide_risk: 2, social_crisis: 1 }
    })
  })
})
