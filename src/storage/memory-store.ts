import type { CrisisEvent } from '../assessment/types.js'
import { summarizeEvents } from './event-store.js'
import type { CrisisLog, CrisisStatistics } from './event-store.js'

export class MemoryEventStore implements CrisisLog {
  private events: Map<string, CrisisEvent[]> = new Map()

  appendEvent(sessionId: string, event: CrisisEvent): void {
    const list = this.events.get(sessionId) ?? []
    list.push(event)
    this.events.set(sessionId, list)
  }

  queryRecentEvents(sessionId: string, limit: number): CrisisEvent[] {
    const list = this.events.get(sessionId) ?? []
    return limit > 0 ? list.slice(-limit) : []
  }

  getCrisisStatistics(since: Date): CrisisStatistics {
    const all = [...this.events.values()].flat().filter(e => e.timestamp.getTime() >= since.getTime())
    return summarizeEvents(all, since)
  }

  get size(): number {
    let total = 0
    for (const list of this.events.values()) total += list.length
    return total
  }
}
