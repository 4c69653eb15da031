import type { CategoryAnalysis } from '../detection/categories.js'
import type { PatternAnalysis } from '../detection/patterns.js'
import type { SakinaConfig } from '../config.js'
import type { ContextSignals } from './types.js'

export function contextBonus(
  categories: CategoryAnalysis,
  context: ContextSignals,
  fusion: SakinaConfig['fusion']
): number {
  let bonus = 0
  if (context.escalationDetected) bonus += fusion.escalationBonus
  if (context.emotionalDeterioration) bonus += fusion.deteriorationBonus
  if (context.previousInterventions > 1) bonus += fusion.priorInterventionBonus
  bonus += categories.highRiskCategories.length * fusion.highRiskCategoryBonus
  return bonus
}

/**
 * Fuse lexical, pattern and session signals into a 0-10 integer.
 * Rounds half up, so 5.5 becomes 6.
 */
export function computeCrisisLevel(
  categories: CategoryAnalysis,
  patterns: PatternAnalysis,
  context: ContextSignals,
  fusion: SakinaConfig['fusion']
): number {
  const score =
    categories.totalSeverity * fusion.categoryFactor +
    patterns.severity * fusion.patternFactor +
    contextBonus(categories, context, fusion)

  // Guard against float noise such as 0.3 * 5 = 1.4999999999999998
  const rounded = Math.round(Number(score.toFixed(6)))
  if (!Number.isFinite(rounded)) {
    throw new Error(`Crisis score is not a finite number: ${score}`)
  }
  return Math.max(0, Math.min(10, rounded))
}
