import { describe, it, expect } from 'vitest'
import { createLexicon } from '../lexicon.js'
import { matchCategories } from '../categories.js'
import { detectPatterns } from '../patterns.js'
import { DEFAULT_CONFIG } from '../../config.js'

const lexicon = createLexicon({
  categories: {
    suicide: ['kill myself', 'end it all'],
    self_harm: ['cut myself'],
    hopelessness: ['hopeless'],
    isolation: ['lonely'],
    substance_abuse: ['pills'],
    violence: ['hurt them'],
    psychosis: ['hearing voices']
  },
  patterns: {
    finality_statement: ['this is the end'],
    goodbye_message: ['farewell'],
    extreme_language: ['never', 'always'],
    worthlessness: ['worthless'],
    burden_statement: ['a burden'],
    isolation_expression: ['no one to talk to']
  }
})

const categoryWeights = DEFAULT_CONFIG.weights.categories
const patternWeights = DEFAULT_CONFIG.weights.patterns

describe('matchCategories', () => {
  it('scores each matched category by count times weight', () => {
    const analysis = matchCategories('I feel hopeless and lonely', lexicon, categoryWeights)

    expect(analysis.matches.hopelessness).toEqual({ terms: ['hopeless'], count: 1, severity: 2 })
    expect(analysis.matches.isolation).toEqual({ terms: ['lonely'], count: 1, severity: 2 })
    expect(analysis.totalSeverity).toBe(4)
    expect(analysis.highRiskCategories).toEqual([])
    expect(analysis.matchCount).toBe(2)
  })

  it('clamps total severity at 10', () => {
    const analysis = matchCategories('I want to kill myself and end it all', lexicon, categoryWeights)

    expect(analysis.matches.suicide?.count).toBe(2)
    expect(analysis.matches.suicide?.severity).toBe(18)
    expect(analysis.totalSeverity).toBe(10)
    expect(analysis.highRiskCategories).toEqual(['suicide'])
  })

  it('lists high-risk categories in fixed order', () => {
    const analysis = matchCategories('I will hurt them and then cut myself', lexicon, categoryWeights)
    expect(analysis.highRiskCategories).toEqual(['self_harm', 'violence'])
  })

  it('ignores case and spacing', () => {
    const analysis = matchCategories('KILL   MYSELF', lexicon, categoryWeights)
    expect(analysis.matches.suicide?.terms).toEqual(['kill myself'])
  })

  it('returns an empty analysis when nothing matches', () => {
    const analysis = matchCategories('What a lovely day', lexicon, categoryWeights)

    expect(analysis.matches).toEqual({})
    expect(analysis.totalSeverity).toBe(0)
    expect(analysis.matchCount).toBe(0)
  })
})

describe('detectPatterns', () => {
  it('flags finality and goodbye as high-risk', () => {
    const analysis = detectPatterns('This is the end. Farewell', lexicon, patternWeights)

    expect(analysis.counts.finality_statement).toBe(1)
    expect(analysis.counts.goodbye_message).toBe(1)
    expect(analysis.severity).toBe(6)
    expect(analysis.highRiskPatterns).toEqual(['finality_statement', 'goodbye_message'])
  })

  it('counts every matched phrase', () => {
    const analysis = detectPatterns('I never do anything right, I always fail', lexicon, patternWeights)

    expect(analysis.counts.extreme_language).toBe(2)
    expect(analysis.matchedPhrases.extreme_language).toEqual(['never', 'always'])
    expect(analysis.counts.worthlessness).toBe(0)
    expect(analysis.severity).toBe(2)
    expect(analysis.highRiskPatterns).toEqual([])
  })

  it('treats burden statements as high-risk', () => {
    const analysis = detectPatterns('I am worthless and a burden', lexicon, patternWeights)

    expect(analysis.severity).toBe(4)
    expect(analysis.highRiskPatterns).toEqual(['burden_statement'])
    expect(analysis.matchCount).toBe(2)
  })

  it('clamps severity at 10', () => {
    const analysis = detectPatterns(
      'never always worthless, a burden, this is the end, farewell, no one to talk to',
      lexicon,
      patternWeights
    )
    expect(analysis.matchCount).toBe(7)
    expect(analysis.severity).toBe(10)
  })
})
