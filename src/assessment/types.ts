import type { RiskCategory } from '../detection/lexicon.js'
import type { CategoryAnalysis } from '../detection/categories.js'
import type { PatternAnalysis } from '../detection/patterns.js'

export const CRISIS_TYPES = [
  'suicide_risk',
  'self_harm_risk',
  'violence_risk',
  'mental_health_emergency',
  'substance_abuse',
  'severe_depression',
  'social_crisis',
  'emotional_distress'
] as const

export type CrisisType = typeof CRISIS_TYPES[number]

export function isCrisisType(value: string): value is CrisisType {
  return (CRISIS_TYPES as readonly string[]).includes(value)
}

export type Urgency = 'none' | 'low' | 'moderate' | 'urgent' | 'immediate'

export interface ContextSignals {
  repeatedCrisisThemes: number
  escalationDetected: boolean
  emotionalDeterioration: boolean
  previousInterventions: number
}

export const EMPTY_CONTEXT: ContextSignals = Object.freeze({
  repeatedCrisisThemes: 0,
  escalationDetected: false,
  emotionalDeterioration: false,
  previousInterventions: 0
})

export interface CrisisEvent {
  readonly id: string
  readonly sessionId: string
  readonly timestamp: Date
  readonly crisisLevel: number
  readonly crisisType: CrisisType
  readonly contributingCategories: readonly RiskCategory[]
  /** Crisis keyword hits in the message; linguistic patterns are not counted. */
  readonly indicatorCount: number
  readonly escalated: boolean
  readonly followUpNeeded: boolean
  readonly message: string | null
}

export interface EscalationCriteria {
  sustainedHighRisk: boolean
  increasingSeverity: boolean
  failedInterventions: boolean
  immediateDanger: boolean
}

export interface EscalationAssessment {
  escalationNeeded: boolean
  criteriaMet: EscalationCriteria
  recommendedAction: string
  urgency: 'immediate' | 'urgent'
}

export interface ExternalRiskEstimate {
  crisisLevel: number
  categories: RiskCategory[]
  rationale?: string
}

export type ExternalSignal =
  | { status: 'disabled' }
  | { status: 'ok'; estimate: ExternalRiskEstimate }
  | { status: 'failed'; reason: string }

export interface SafetyIndicators {
  categories: CategoryAnalysis
  patterns: PatternAnalysis
  context: ContextSignals
  external: ExternalSignal
}

export interface AssessedVerdict {
  kind: 'assessed'
  sessionId: string
  crisisLevel: number
  crisisType: CrisisType
  urgency: Urgency
  indicators: SafetyIndicators
  recommendations: string[]
  requiresIntervention: boolean
  requiresEscalation: boolean
  escalation: EscalationAssessment
}

/** Conservative verdict returned when local detection itself failed. */
export interface FallbackVerdict {
  kind: 'fallback'
  sessionId: string
  crisisLevel: 8
  crisisType: 'unknown'
  urgency: 'high'
  indicators: null
  recommendations: string[]
  requiresIntervention: true
  requiresEscalation: false
  error: string
}

export type SafetyVerdict = AssessedVerdict | FallbackVerdict
