import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { parseRiskEstimate, runAnalyzer } from '../external.js'
import type { RiskAnalyzer } from '../external.js'
import { buildRiskPrompt } from '../prompts.js'

describe('parseRiskEstimate', () => {
  it('parses a fenced JSON reply and drops unknown categories', () => {
    const estimate = parseRiskEstimate(
      '```json\n{"crisis_level": 7.6, "categories": ["suicide", "grief"], "rationale": "mentions ending things"}\n```'
    )

    expect(estimate).toEqual({
      crisisLevel: 8,
      categories: ['suicide'],
      rationale: 'mentions ending things'
    })
  })

  it('defaults missing categories to none', () => {
    expect(parseRiskEstimate('{"crisis_level": 2}').categories).toEqual([])
  })

  it('rejects levels outside the scale', () => {
    expect(() => parseRiskEstimate('{"crisis_level": 12}')).toThrow()
  })

  it('rejects replies that are not JSON', () => {
    expect(() => parseRiskEstimate('I think this person is fine')).toThrow()
  })
})

describe('buildRiskPrompt', () => {
  it('embeds the message', () => {
    expect(buildRiskPrompt('I feel lost')).toContain('I feel lost')
  })
})

describe('runAnalyzer', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('returns the estimate when the analyzer answers in time', async () => {
    const analyzer: RiskAnalyzer = vi.fn().mockResolvedValue({ crisisLevel: 6, categories: ['hopelessness'] })

    const signal = await runAnalyzer(analyzer, 'hello', 1000)

    expect(signal).toEqual({ status: 'ok', estimate: { crisisLevel: 6, categories: ['hopelessness'] } })
    expect(analyzer).toHaveBeenCalledWith('hello', expect.any(AbortSignal))
  })

  it('reports failure instead of throwing', async () => {
    const analyzer: RiskAnalyzer = vi.fn().mockRejectedValue(new Error('rate limited'))

    const signal = await runAnalyzer(analyzer, 'hello', 1000)

    expect(signal).toEqual({ status: 'failed', reason: 'rate limited' })
    expect(console.error).toHaveBeenCalled()
  })

  it('treats an out-of-range level as a failure', async () => {
    const notANumber: RiskAnalyzer = vi.fn().mockResolvedValue({ crisisLevel: NaN, categories: [] })
    const tooHigh: RiskAnalyzer = vi.fn().mockResolvedValue({ crisisLevel: 11, categories: [] })

    expect(await runAnalyzer(notANumber, 'hello', 1000)).toEqual({
      status: 'failed',
      reason: 'Risk analyzer returned an invalid crisis level: NaN'
    })
    expect(await runAnalyzer(tooHigh, 'hello', 1000)).toEqual({
      status: 'failed',
      reason: 'Risk analyzer returned an invalid crisis level: 11'
    })
  })

  it('times out and aborts a hung analyzer', async () => {
    let seen: AbortSignal | undefined
    const analyzer: RiskAnalyzer = (_message, abortSignal) => {
      seen = abortSignal
      return new Promise(() => {})
    }

    const signal = await runAnalyzer(analyzer, 'hello', 20)

    expect(signal).toEqual({ status: 'failed', reason: 'Risk analyzer timed out after 20ms' })
    expect(seen?.aborted).toBe(true)
  })
})
