import type { SakinaConfig } from '../config.js'
import type { ContextSignals, CrisisEvent } from '../assessment/types.js'
import type { EventStore } from '../storage/event-store.js'

export const NEGATIVE_EMOTIONS: readonly string[] = ['sad', 'anxious', 'hopeless', 'angry']

const THEME_WINDOW = 3
const EMOTION_WINDOW = 5
const ESCALATION_THEME_COUNT = 2
const DETERIORATION_MIN_NEGATIVE = 3

interface SessionCrisisState {
  events: CrisisEvent[]
  emotionalStates: string[]
  totalEvents: number
}

/**
 * Owns every session's bounded crisis history. State is created on first
 * access (seeded from the event store, if one is given) and dropped only by
 * `endSession`. Callers serialise access per session.
 */
export class SessionContextTracker {
  private sessions: Map<string, SessionCrisisState> = new Map()
  private store: EventStore | null
  private maxEvents: number
  private maxEmotionalStates: number

  constructor(options: { session: SakinaConfig['session']; store?: EventStore }) {
    this.store = options.store || null
    this.maxEvents = options.session.maxEvents
    this.maxEmotionalStates = options.session.maxEmotionalStates
  }

  private async loadEvents(sessionId: string): Promise<CrisisEvent[]> {
    if (!this.store) return []
    try {
      return [...await this.store.queryRecentEvents(sessionId, this.maxEvents)].slice(-this.maxEvents)
    } catch (e) {
      console.error(`[session] Loading history for ${sessionId} failed:`, e)
      return []
    }
  }

  private async state(sessionId: string): Promise<SessionCrisisState> {
    const existing = this.sessions.get(sessionId)
    if (existing) return existing

    const events = await this.loadEvents(sessionId)

    // Another caller may have created the state while we were loading
    const raced = this.sessions.get(sessionId)
    if (raced) return raced

    const created: SessionCrisisState = { events, emotionalStates: [], totalEvents: events.length }
    this.sessions.set(sessionId, created)
    return created
  }

  async getContext(sessionId: string): Promise<ContextSignals> {
    const state = await this.state(sessionId)

    const repeatedCrisisThemes = state.events
      .slice(-THEME_WINDOW)
      .reduce((sum, event) => sum + event.indicatorCount, 0)
    const negative = state.emotionalStates
      .slice(-EMOTION_WINDOW)
      .filter(emotion => NEGATIVE_EMOTIONS.includes(emotion)).length

    return {
      repeatedCrisisThemes,
      escalationDetected: repeatedCrisisThemes > ESCALATION_THEME_COUNT,
      emotionalDeterioration: negative >= DETERIORATION_MIN_NEGATIVE,
      previousInterventions: state.totalEvents
    }
  }

  async recordEvent(event: CrisisEvent): Promise<void> {
    const state = await this.state(event.sessionId)
    state.events.push(event)
    if (state.events.length > this.maxEvents) {
      state.events.splice(0, state.events.length - this.maxEvents)
    }
    state.totalEvents++

    if (this.store) {
      try {
        await this.store.appendEvent(event.sessionId, event)
      } catch (e) {
        console.error(`[session] Persisting crisis event ${event.id} failed:`, e)
      }
    }
  }

  async recordEmotionalState(sessionId: string, emotionalState: string): Promise<void> {
    const normalized = emotionalState.trim().toLowerCase()
    if (!normalized) return

    const state = await this.state(sessionId)
    state.emotionalStates.push(normalized)
    if (state.emotionalStates.length > this.maxEmotionalStates) {
      state.emotionalStates.splice(0, state.emotionalStates.length - this.maxEmotionalStates)
    }
  }

  async recentEvents(sessionId: string): Promise<readonly CrisisEvent[]> {
    const state = await this.state(sessionId)
    return [...state.events]
  }

  /** Like `recentEvents`, but leaves no session state behind. */
  async peekEvents(sessionId: string): Promise<readonly CrisisEvent[]> {
    const state = this.sessions.get(sessionId)
    if (state) return [...state.events]
    return this.loadEvents(sessionId)
  }

  async emotionalStates(sessionId: string): Promise<readonly string[]> {
    const state = await this.state(sessionId)
    return [...state.emotionalStates]
  }

  async totalEvents(sessionId: string): Promise<number> {
    return (await this.state(sessionId)).totalEvents
  }

  endSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId)
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId)
  }

  get activeSessions(): number {
    return this.sessions.size
  }
}
