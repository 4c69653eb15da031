import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import path from 'node:path'
import { z } from 'zod'
import type { ResponseLanguage } from '../config.js'

const lines = z.array(z.string().min(1)).min(1)

const LanguageTemplates = z.object({
  openers: lines,
  base: z.object({
    suicide_risk: z.string(),
    self_harm_risk: z.string(),
    substance_abuse: z.string(),
    generic: z.string()
  }),
  cultural: z.object({
    preamble: z.string(),
    suicide_risk: z.string(),
    default: z.string()
  }),
  recommendations: z.object({
    immediate: lines,
    urgent: lines,
    moderate: lines,
    default: lines
  }),
  immediateActions: z.object({
    critical: lines,
    high: lines,
    medium: lines,
    default: lines
  }),
  escalation: z.object({
    immediateDanger: z.string(),
    sustainedHighRisk: z.string(),
    increasingSeverity: z.string(),
    failedInterventions: z.string(),
    none: z.string()
  }),
  session: z.object({
    safe: lines,
    critical: lines,
    elevated: lines,
    routine: lines
  })
})

const TemplateFile = z.object({
  en: LanguageTemplates,
  ar: LanguageTemplates
})

export type ResponseTemplates = z.infer<typeof LanguageTemplates>

export const DEFAULT_TEMPLATES_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../data/responses.json'
)

export function loadTemplates(language: ResponseLanguage, filePath: string = DEFAULT_TEMPLATES_PATH): ResponseTemplates {
  const parsed = TemplateFile.parse(JSON.parse(readFileSync(filePath, 'utf-8')))
  return parsed[language]
}

/** Replace `{name}` placeholders; unknown names are left as written. */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) => values[key] ?? whole)
}
