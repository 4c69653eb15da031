import type { SakinaConfig } from '../config.js'
import type { ResponseTemplates } from '../response/templates.js'
import { fillTemplate } from '../response/templates.js'
import type { EscalationAssessment, EscalationCriteria } from './types.js'

const SUSTAINED_WINDOW = 5
const SUSTAINED_MIN_EVENTS = 3
const TREND_WINDOW = 3
const TREND_MIN_SUM = 18
const FAILED_INTERVENTION_EVENTS = 2

function isStrictlyIncreasing(levels: number[]): boolean {
  for (let i = 1; i < levels.length; i++) {
    if (levels[i] <= levels[i - 1]) return false
  }
  return true
}

export function evaluateCriteria(
  history: readonly number[],
  currentCrisisLevel: number,
  thresholds: SakinaConfig['thresholds']
): EscalationCriteria {
  const recentHigh = history.slice(-SUSTAINED_WINDOW).filter(level => level >= thresholds.high)
  const trend = history.slice(-TREND_WINDOW)
  const trendSum = trend.reduce((sum, level) => sum + level, 0)

  return {
    sustainedHighRisk: recentHigh.length >= SUSTAINED_MIN_EVENTS,
    increasingSeverity: trend.length === TREND_WINDOW && isStrictlyIncreasing(trend) && trendSum > TREND_MIN_SUM,
    failedInterventions: history.length > FAILED_INTERVENTION_EVENTS,
    immediateDanger: currentCrisisLevel >= thresholds.critical
  }
}

export function escalationRecommendation(
  criteria: EscalationCriteria,
  phrases: ResponseTemplates['escalation'],
  values: Record<string, string>
): string {
  if (criteria.immediateDanger) return fillTemplate(phrases.immediateDanger, values)
  if (criteria.sustainedHighRisk) return fillTemplate(phrases.sustainedHighRisk, values)
  if (criteria.increasingSeverity) return fillTemplate(phrases.increasingSeverity, values)
  if (criteria.failedInterventions) return fillTemplate(phrases.failedInterventions, values)
  return fillTemplate(phrases.none, values)
}

/**
 * Decide whether the session needs a human. `history` is the session's
 * crisis levels in chronological order. Immediate danger always escalates.
 */
export function assessEscalation(params: {
  history: readonly number[]
  currentCrisisLevel: number
  thresholds: SakinaConfig['thresholds']
  phrases: ResponseTemplates['escalation']
  values: Record<string, string>
}): EscalationAssessment {
  const criteria = evaluateCriteria(params.history, params.currentCrisisLevel, params.thresholds)

  const escalationNeeded =
    criteria.immediateDanger ||
    (criteria.sustainedHighRisk && criteria.increasingSeverity) ||
    (criteria.failedInterventions && params.currentCrisisLevel >= params.thresholds.high)

  return {
    escalationNeeded,
    criteriaMet: criteria,
    recommendedAction: escalationRecommendation(criteria, params.phrases, params.values),
    urgency: criteria.immediateDanger ? 'immediate' : 'urgent'
  }
}
