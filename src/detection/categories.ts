import { RISK_CATEGORIES, normalizeText } from './lexicon.js'
import type { RiskCategory, RiskLexicon } from './lexicon.js'

export const HIGH_RISK_CATEGORIES: readonly RiskCategory[] = ['suicide', 'self_harm', 'violence']

export interface CategoryMatch {
  terms: string[]
  count: number
  severity: number
}

export interface CategoryAnalysis {
  matches: Partial<Record<RiskCategory, CategoryMatch>>
  totalSeverity: number
  highRiskCategories: RiskCategory[]
  matchCount: number
}

export function clampSeverity(value: number): number {
  return Math.max(0, Math.min(10, value))
}

export function countTerms(normalized: string, terms: readonly string[]): string[] {
  return terms.filter(term => normalized.includes(term))
}

export function matchCategories(
  text: string,
  lexicon: RiskLexicon,
  weights: Record<RiskCategory, number>
): CategoryAnalysis {
  const normalized = normalizeText(text)
  const matches: Partial<Record<RiskCategory, CategoryMatch>> = {}
  let total = 0
  let matchCount = 0

  for (const category of RISK_CATEGORIES) {
    const terms = countTerms(normalized, lexicon.categories[category])
    if (terms.length === 0) continue

    const severity = terms.length * weights[category]
    matches[category] = { terms, count: terms.length, severity }
    total += severity
    matchCount += terms.length
  }

  return {
    matches,
    totalSeverity: clampSeverity(total),
    highRiskCategories: HIGH_RISK_CATEGORIES.filter(category => matches[category] !== undefined),
    matchCount
  }
}
