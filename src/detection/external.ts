import { generateText } from 'ai'
import { z } from 'zod'
import type { SakinaConfig } from '../config.js'
import type { ExternalRiskEstimate, ExternalSignal } from '../assessment/types.js'
import { createLLMProvider } from '../providers/llm.js'
import { isRiskCategory } from './lexicon.js'
import { buildRiskPrompt } from './prompts.js'

/** Optional second opinion on a message. Must honour the abort signal. */
export type RiskAnalyzer = (message: string, signal: AbortSignal) => Promise<ExternalRiskEstimate>

const AnalyzerReply = z.object({
  crisis_level: z.number().min(0).max(10),
  categories: z.array(z.string()).default([]),
  rationale: z.string().optional()
})

export function parseRiskEstimate(text: string): ExternalRiskEstimate {
  // Models often wrap JSON in ```json ... ``` fences
  const cleaned = text.replace(/^```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim()
  const reply = AnalyzerReply.parse(JSON.parse(cleaned))
  return {
    crisisLevel: Math.round(reply.crisis_level),
    categories: reply.categories.filter(isRiskCategory),
    rationale: reply.rationale
  }
}

export function createRiskAnalyzer(config: SakinaConfig['analyzer']): RiskAnalyzer {
  const provider = createLLMProvider(config)
  const model = provider(config.model)

  return async (message, signal) => {
    const { text } = await generateText({
      model,
      prompt: buildRiskPrompt(message),
      temperature: 0,
      maxOutputTokens: 200,
      abortSignal: signal
    })
    return parseRiskEstimate(text)
  }
}

/**
 * Run the analyzer under a hard timeout. Never throws: failures and
 * timeouts come back as `{ status: 'failed' }` so callers keep the local verdict.
 */
export async function runAnalyzer(analyzer: RiskAnalyzer, message: string, timeoutMs: number): Promise<ExternalSignal> {
  const controller = new AbortController()
  let expire: (reason: Error) => void = () => {}
  const timeout = new Promise<never>((_, reject) => {
    expire = reject
  })
  const timer = setTimeout(() => {
    controller.abort()
    expire(new Error(`Risk analyzer timed out after ${timeoutMs}ms`))
  }, timeoutMs)

  try {
    const estimate = await Promise.race([analyzer(message, controller.signal), timeout])
    const level = estimate.crisisLevel
    if (!Number.isFinite(level) || level < 0 || level > 10) {
      throw new Error(`Risk analyzer returned an invalid crisis level: ${level}`)
    }
    return { status: 'ok', estimate }
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    console.error('[analyzer] External risk analysis failed, using local detectors:', reason)
    return { status: 'failed', reason }
  } finally {
    clearTimeout(timer)
  }
}
