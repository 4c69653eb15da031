import { describe, it, expect } from 'vitest'
import { computeCrisisLevel, contextBonus } from '../aggregator.js'
import { classifyCrisis } from '../classifier.js'
import { EMPTY_CONTEXT } from '../types.js'
import type { CategoryAnalysis } from '../../detection/categories.js'
import type { PatternAnalysis } from '../../detection/patterns.js'
import type { RiskCategory, RiskPattern } from '../../detection/lexicon.js'
import { DEFAULT_CONFIG } from '../../config.js'

const fusion = DEFAULT_CONFIG.fusion

function categories(totalSeverity: number, matched: RiskCategory[] = [], highRisk: RiskCategory[] = []): CategoryAnalysis {
  const matches: CategoryAnalysis['matches'] = {}
  for (const category of matched) matches[category] = { terms: [category], count: 1, severity: 1 }
  return { matches, totalSeverity, highRiskCategories: highRisk, matchCount: matched.length }
}

function patterns(severity: number, highRisk: RiskPattern[] = []): PatternAnalysis {
  return {
    counts: {
      finality_statement: highRisk.includes('finality_statement') ? 1 : 0,
      goodbye_message: highRisk.includes('goodbye_message') ? 1 : 0,
      extreme_language: 0,
      worthlessness: 0,
      burden_statement: highRisk.includes('burden_statement') ? 1 : 0,
      isolation_expression: 0
    },
    matchedPhrases: {},
    severity,
    highRiskPatterns: highRisk,
    matchCount: highRisk.length
  }
}

describe('computeCrisisLevel', () => {
  it('scores a single suicide term at 6', () => {
    expect(computeCrisisLevel(categories(9, ['suicide'], ['suicide']), patterns(0), EMPTY_CONTEXT, fusion)).toBe(6)
  })

  it('is zero with no signals', () => {
    expect(computeCrisisLevel(categories(0), patterns(0), EMPTY_CONTEXT, fusion)).toBe(0)
  })

  it('rounds half up', () => {
    expect(computeCrisisLevel(categories(5), patterns(0), EMPTY_CONTEXT, fusion)).toBe(3)
    expect(computeCrisisLevel(categories(0), patterns(5), EMPTY_CONTEXT, fusion)).toBe(2)
  })

  it('adds pattern severity on top of categories', () => {
    // 10 * 0.5 + 3 * 0.3 + 2 * 1.5 = 8.9
    const level = computeCrisisLevel(
      categories(10, ['suicide', 'self_harm'], ['suicide', 'self_harm']),
      patterns(3, ['finality_statement']),
      EMPTY_CONTEXT,
      fusion
    )
    expect(level).toBe(9)
  })

  it('clamps at 10', () => {
    const level = computeCrisisLevel(
      categories(10, ['suicide', 'self_harm', 'violence'], ['suicide', 'self_harm', 'violence']),
      patterns(10),
      { repeatedCrisisThemes: 5, escalationDetected: true, emotionalDeterioration: true, previousInterventions: 3 },
      fusion
    )
    expect(level).toBe(10)
  })

  it('throws on a non-finite score', () => {
    expect(() => computeCrisisLevel(categories(Number.NaN), patterns(0), EMPTY_CONTEXT, fusion)).toThrow()
  })
})

describe('contextBonus', () => {
  it('adds the escalation bonus', () => {
    const context = { repeatedCrisisThemes: 3, escalationDetected: true, emotionalDeterioration: false, previousInterventions: 1 }
    expect(contextBonus(categories(0), context, fusion)).toBe(2)
  })

  it('counts prior interventions only above one', () => {
    const once = { ...EMPTY_CONTEXT, previousInterventions: 1 }
    const twice = { ...EMPTY_CONTEXT, previousInterventions: 2 }
    expect(contextBonus(categories(0), once, fusion)).toBe(0)
    expect(contextBonus(categories(0), twice, fusion)).toBe(1)
  })

  it('adds the deterioration bonus', () => {
    expect(contextBonus(categories(0), { ...EMPTY_CONTEXT, emotionalDeterioration: true }, fusion)).toBe(1)
  })

  it('adds a bonus per high-risk category', () => {
    expect(contextBonus(categories(0, [], ['suicide', 'violence']), EMPTY_CONTEXT, fusion)).toBe(3)
  })
})

describe('classifyCrisis', () => {
  it('puts suicide ahead of every other category', () => {
    expect(classifyCrisis(categories(10, ['hopelessness', 'suicide', 'violence']), patterns(0))).toBe('suicide_risk')
  })

  it('puts violence ahead of psychosis', () => {
    expect(classifyCrisis(categories(10, ['psychosis', 'violence']), patterns(0))).toBe('violence_risk')
  })

  it('maps single categories', () => {
    expect(classifyCrisis(categories(2, ['self_harm']), patterns(0))).toBe('self_harm_risk')
    expect(classifyCrisis(categories(2, ['psychosis']), patterns(0))).toBe('mental_health_emergency')
    expect(classifyCrisis(categories(2, ['substance_abuse']), patterns(0))).toBe('substance_abuse')
    expect(classifyCrisis(categories(2, ['hopelessness']), patterns(0))).toBe('severe_depression')
    expect(classifyCrisis(categories(2, ['isolation']), patterns(0))).toBe('social_crisis')
  })

  it('treats goodbye and finality patterns as suicide risk', () => {
    expect(classifyCrisis(categories(0), patterns(3, ['goodbye_message']))).toBe('suicide_risk')
    expect(classifyCrisis(categories(0), patterns(3, ['finality_statement']))).toBe('suicide_risk')
  })

  it('falls back to emotional distress', () => {
    expect(classifyCrisis(categories(0), patterns(2, ['burden_statement']))).toBe('emotional_distress')
    expect(classifyCrisis(categories(0), patterns(0))).toBe('emotional_distress')
  })
})
