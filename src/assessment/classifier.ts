import type { RiskCategory } from '../detection/lexicon.js'
import type { CategoryAnalysis } from '../detection/categories.js'
import type { PatternAnalysis } from '../detection/patterns.js'
import type { CrisisType } from './types.js'

// Life-threatening signals first. Do not reorder.
const CATEGORY_PRIORITY: readonly [RiskCategory, CrisisType][] = [
  ['suicide', 'suicide_risk'],
  ['self_harm', 'self_harm_risk'],
  ['violence', 'violence_risk'],
  ['psychosis', 'mental_health_emergency'],
  ['substance_abuse', 'substance_abuse'],
  ['hopelessness', 'severe_depression'],
  ['isolation', 'social_crisis']
]

export function classifyCrisis(categories: CategoryAnalysis, patterns: PatternAnalysis): CrisisType {
  for (const [category, crisisType] of CATEGORY_PRIORITY) {
    if (categories.matches[category]) return crisisType
  }

  if (patterns.highRiskPatterns.includes('finality_statement') || patterns.highRiskPatterns.includes('goodbye_message')) {
    return 'suicide_risk'
  }

  return 'emotional_distress'
}
