import { RISK_PATTERNS, normalizeText } from './lexicon.js'
import type { RiskLexicon, RiskPattern } from './lexicon.js'
import { clampSeverity, countTerms } from './categories.js'

// Patterns that on their own point at suicidal intent
export const HIGH_RISK_PATTERNS: readonly RiskPattern[] = ['finality_statement', 'goodbye_message', 'burden_statement']

export interface PatternAnalysis {
  counts: Record<RiskPattern, number>
  matchedPhrases: Partial<Record<RiskPattern, string[]>>
  severity: number
  highRiskPatterns: RiskPattern[]
  matchCount: number
}

export function detectPatterns(
  text: string,
  lexicon: RiskLexicon,
  weights: Record<RiskPattern, number>
): PatternAnalysis {
  const normalized = normalizeText(text)
  const counts: Record<RiskPattern, number> = {
    finality_statement: 0,
    goodbye_message: 0,
    extreme_language: 0,
    worthlessness: 0,
    burden_statement: 0,
    isolation_expression: 0
  }
  const matchedPhrases: Partial<Record<RiskPattern, string[]>> = {}
  let weighted = 0
  let matchCount = 0

  for (const pattern of RISK_PATTERNS) {
    const phrases = countTerms(normalized, lexicon.patterns[pattern])
    counts[pattern] = phrases.length
    if (phrases.length === 0) continue

    matchedPhrases[pattern] = phrases
    weighted += phrases.length * weights[pattern]
    matchCount += phrases.length
  }

  return {
    counts,
    matchedPhrases,
    severity: clampSeverity(weighted),
    highRiskPatterns: HIGH_RISK_PATTERNS.filter(pattern => counts[pattern] > 0),
    matchCount
  }
}
