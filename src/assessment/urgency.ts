import type { ResponseTemplates } from '../response/templates.js'
import type { SakinaConfig } from '../config.js'
import type { ContextSignals, CrisisType, Urgency } from './types.js'

const LIFE_THREAT_TYPES: readonly CrisisType[] = ['suicide_risk', 'violence_risk', 'mental_health_emergency']

/**
 * First matching rule wins. With the default thresholds this reads
 * 9 immediate; life-threat types 7 immediate, 5 urgent; escalating
 * sessions 6 urgent; then 7 urgent, 5 moderate, 3 low.
 */
export function assessUrgency(
  crisisLevel: number,
  crisisType: CrisisType,
  context: ContextSignals,
  thresholds: SakinaConfig['thresholds']
): Urgency {
  if (crisisLevel >= thresholds.critical) return 'immediate'

  if (LIFE_THREAT_TYPES.includes(crisisType)) {
    if (crisisLevel >= thresholds.high) return 'immediate'
    if (crisisLevel >= thresholds.medium) return 'urgent'
  }

  if (context.escalationDetected && crisisLevel >= thresholds.medium + 1) return 'urgent'

  if (crisisLevel >= thresholds.high) return 'urgent'
  if (crisisLevel >= thresholds.medium) return 'moderate'
  if (crisisLevel >= thresholds.low) return 'low'
  return 'none'
}

export function safetyRecommendations(
  urgency: Urgency | 'high',
  recommendations: ResponseTemplates['recommendations']
): string[] {
  switch (urgency) {
    case 'immediate':
    case 'high':
      return [...recommendations.immediate]
    case 'urgent':
      return [...recommendations.urgent]
    case 'moderate':
      return [...recommendations.moderate]
    default:
      return [...recommendations.default]
  }
}
