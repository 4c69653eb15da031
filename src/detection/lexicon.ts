import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import path from 'node:path'
import { z } from 'zod'

export const RISK_CATEGORIES = [
  'suicide',
  'self_harm',
  'hopelessness',
  'isolation',
  'substance_abuse',
  'violence',
  'psychosis'
] as const

export type RiskCategory = typeof RISK_CATEGORIES[number]

export function isRiskCategory(value: string): value is RiskCategory {
  return (RISK_CATEGORIES as readonly string[]).includes(value)
}

export const RISK_PATTERNS = [
  'finality_statement',
  'goodbye_message',
  'extreme_language',
  'worthlessness',
  'burden_statement',
  'isolation_expression'
] as const

export type RiskPattern = typeof RISK_PATTERNS[number]

export interface RiskLexicon {
  readonly categories: Readonly<Record<RiskCategory, readonly string[]>>
  readonly patterns: Readonly<Record<RiskPattern, readonly string[]>>
}

const termList = z.array(z.string().min(1))

const LexiconFile = z.object({
  version: z.number().int(),
  categories: z.object({
    suicide: termList,
    self_harm: termList,
    hopelessness: termList,
    isolation: termList,
    substance_abuse: termList,
    violence: termList,
    psychosis: termList
  }),
  patterns: z.object({
    finality_statement: termList,
    goodbye_message: termList,
    extreme_language: termList,
    worthlessness: termList,
    burden_statement: termList,
    isolation_expression: termList
  })
})

// Harakat, superscript alef and tatweel carry no meaning for matching
const ARABIC_MARKS = /[\u064B-\u065F\u0670\u0640]/g
const ALEF_VARIANTS = /[\u0622\u0623\u0625]/g
const APOSTROPHES = /[\u2018\u2019\u02BC]/g

export function normalizeText(text: string): string {
  return text
    .normalize('NFKC')
    .toLowerCase()
    .replace(ARABIC_MARKS, '')
    .replace(ALEF_VARIANTS, '\u0627')
    .replace(APOSTROPHES, "'")
    .replace(/\s+/g, ' ')
    .trim()
}

function normalizeTerms(terms: string[]): readonly string[] {
  const seen = new Set<string>()
  for (const term of terms) {
    const normalized = normalizeText(term)
    if (normalized.length > 0) seen.add(normalized)
  }
  return Object.freeze([...seen])
}

/**
 * Build an immutable lexicon from raw term tables. Terms are normalised the
 * same way messages are, so matching is a plain substring test.
 */
export function createLexicon(raw: {
  categories: Record<RiskCategory, string[]>
  patterns: Record<RiskPattern, string[]>
}): RiskLexicon {
  const c = raw.categories
  const p = raw.patterns
  const categories: Record<RiskCategory, readonly string[]> = {
    suicide: normalizeTerms(c.suicide),
    self_harm: normalizeTerms(c.self_harm),
    hopelessness: normalizeTerms(c.hopelessness),
    isolation: normalizeTerms(c.isolation),
    substance_abuse: normalizeTerms(c.substance_abuse),
    violence: normalizeTerms(c.violence),
    psychosis: normalizeTerms(c.psychosis)
  }
  const patterns: Record<RiskPattern, readonly string[]> = {
    finality_statement: normalizeTerms(p.finality_statement),
    goodbye_message: normalizeTerms(p.goodbye_message),
    extreme_language: normalizeTerms(p.extreme_language),
    worthlessness: normalizeTerms(p.worthlessness),
    burden_statement: normalizeTerms(p.burden_statement),
    isolation_expression: normalizeTerms(p.isolation_expression)
  }
  return Object.freeze({
    categories: Object.freeze(categories),
    patterns: Object.freeze(patterns)
  })
}

export const DEFAULT_LEXICON_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../data/risk-lexicon.json'
)

export function loadLexicon(filePath: string = DEFAULT_LEXICON_PATH): RiskLexicon {
  const parsed = LexiconFile.parse(JSON.parse(readFileSync(filePath, 'utf-8')))
  return createLexicon(parsed)
}
