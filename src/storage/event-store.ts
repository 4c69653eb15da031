import type { CrisisEvent, CrisisType } from '../assessment/types.js'

/**
 * Where crisis events go to outlive the process. Implementations may be
 * synchronous (SQLite) or asynchronous; callers always await.
 */
export interface EventStore {
  appendEvent(sessionId: string, event: CrisisEvent): void | Promise<void>
  /** The newest `limit` events for the session, oldest first. */
  queryRecentEvents(sessionId: string, limit: number): readonly CrisisEvent[] | Promise<readonly CrisisEvent[]>
}

export interface CrisisStatistics {
  since: Date
  totalCrisisEvents: number
  escalatedEvents: number
  sessionCount: number
  averageCrisisLevel: number
  crisisTypes: Partial<Record<CrisisType, number>>
}

export interface CrisisLog extends EventStore {
  getCrisisStatistics(since: Date): CrisisStatistics
}

export function summarizeEvents(events: readonly CrisisEvent[], since: Date): CrisisStatistics {
  const crisisTypes: Partial<Record<CrisisType, number>> = {}
  const sessions = new Set<string>()
  let escalated = 0
  let levelSum = 0

  for (const event of events) {
    crisisTypes[event.crisisType] = (crisisTypes[event.crisisType] ?? 0) + 1
    sessions.add(event.sessionId)
    if (event.escalated) escalated++
    levelSum += event.crisisLevel
  }

  return {
    since,
    totalCrisisEvents: events.length,
    escalatedEvents: escalated,
    sessionCount: sessions.size,
    averageCrisisLevel: events.length > 0 ? levelSum / events.length : 0,
    crisisTypes
  }
}

export function escalationRate(stats: CrisisStatistics): number {
  if (stats.totalCrisisEvents === 0) return 0
  return stats.escalatedEvents / stats.totalCrisisEvents
}
