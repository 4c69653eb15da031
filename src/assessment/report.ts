import type { ResponseTemplates } from '../response/templates.js'
import { NEGATIVE_EMOTIONS } from '../session/tracker.js'
import type { CrisisEvent, CrisisType } from './types.js'

export const POSITIVE_EMOTIONS: readonly string[] = ['happy', 'grateful', 'hopeful', 'calm']

export type EmotionalProgression =
  | { status: 'no_data' }
  | {
      status: 'ok'
      distribution: Record<string, number>
      recentNegative: number
      recentPositive: number
      trend: 'improving' | 'concerning' | 'stable'
      dominantEmotion: string
    }

export interface SafetyReport {
  sessionId: string
  totalCrisisEvents: number
  highestCrisisLevel: number
  crisisTypesEncountered: CrisisType[]
  escalatedEvents: number
  emotionalProgression: EmotionalProgression
  recommendations: string[]
  followUpRequired: boolean
}

export function analyzeEmotionalProgression(states: readonly string[]): EmotionalProgression {
  if (states.length === 0) return { status: 'no_data' }

  const distribution: Record<string, number> = {}
  let dominantEmotion = states[0]
  for (const state of states) {
    distribution[state] = (distribution[state] ?? 0) + 1
    if (distribution[state] > distribution[dominantEmotion]) dominantEmotion = state
  }

  const recent = states.slice(-5)
  const recentNegative = recent.filter(s => NEGATIVE_EMOTIONS.includes(s)).length
  const recentPositive = recent.filter(s => POSITIVE_EMOTIONS.includes(s)).length

  let trend: 'improving' | 'concerning' | 'stable' = 'stable'
  if (recentPositive > recentNegative) trend = 'improving'
  else if (recentNegative > recentPositive) trend = 'concerning'

  return { status: 'ok', distribution, recentNegative, recentPositive, trend, dominantEmotion }
}

export function sessionRecommendations(events: readonly CrisisEvent[], phrases: ResponseTemplates['session']): string[] {
  if (events.length === 0) return [...phrases.safe]

  const highest = Math.max(...events.map(e => e.crisisLevel))
  if (highest >= 8) return [...phrases.critical]
  if (highest >= 6) return [...phrases.elevated]
  return [...phrases.routine]
}

export function buildSafetyReport(params: {
  sessionId: string
  events: readonly CrisisEvent[]
  emotionalStates: readonly string[]
  phrases: ResponseTemplates['session']
}): SafetyReport {
  const { events } = params
  const types: CrisisType[] = []
  for (const event of events) {
    if (!types.includes(event.crisisType)) types.push(event.crisisType)
  }

  return {
    sessionId: params.sessionId,
    totalCrisisEvents: events.length,
    highestCrisisLevel: events.reduce((max, e) => Math.max(max, e.crisisLevel), 0),
    crisisTypesEncountered: types,
    escalatedEvents: events.filter(e => e.escalated).length,
    emotionalProgression: analyzeEmotionalProgression(params.emotionalStates),
    recommendations: sessionRecommendations(events, params.phrases),
    followUpRequired: events.length > 0
  }
}
