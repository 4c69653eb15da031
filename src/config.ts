import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs'
import { homedir } from 'node:os'
import path from 'node:path'
import type { RiskCategory, RiskPattern } from './detection/lexicon.js'

export type ResponseLanguage = 'en' | 'ar'

export interface SakinaConfig {
  thresholds: {
    low: number
    medium: number
    high: number
    critical: number
  }
  weights: {
    categories: Record<RiskCategory, number>
    patterns: Record<RiskPattern, number>
  }
  fusion: {
    categoryFactor: number
    patternFactor: number
    escalationBonus: number
    deteriorationBonus: number
    priorInterventionBonus: number
    highRiskCategoryBonus: number
  }
  session: {
    maxEvents: number
    maxEmotionalStates: number
  }
  analyzer: {
    enabled: boolean
    provider: 'openai' | 'openrouter' | 'ollama' | 'cerebras'
    model: string
    apiKey?: string
    baseUrl?: string
    timeoutMs: number
  }
  responses: {
    language: ResponseLanguage
    phraseSelection: 'rotate' | 'seeded'
    seed: number
  }
  resources: {
    directoryPath?: string
  }
  storage: {
    dbPath: string
    retainMessages: boolean
  }
}

export const DEFAULT_CONFIG: SakinaConfig = {
  thresholds: {
    low: 3,
    medium: 5,
    high: 7,
    critical: 9
  },
  weights: {
    categories: {
      suicide: 9,
      self_harm: 6,
      violence: 6,
      psychosis: 4,
      substance_abuse: 2,
      hopelessness: 2,
      isolation: 2
    },
    patterns: {
      finality_statement: 3,
      goodbye_message: 3,
      extreme_language: 1,
      worthlessness: 2,
      burden_statement: 2,
      isolation_expression: 2
    }
  },
  fusion: {
    categoryFactor: 0.5,
    patternFactor: 0.3,
    escalationBonus: 2,
    deteriorationBonus: 1,
    priorInterventionBonus: 1,
    highRiskCategoryBonus: 1.5
  },
  session: {
    maxEvents: 10,
    maxEmotionalStates: 20
  },
  analyzer: {
    enabled: false,
    provider: 'openai',
    model: 'gpt-4o-mini',
    baseUrl: 'https://api.openai.com/v1',
    timeoutMs: 4000
  },
  responses: {
    language: 'ar',
    phraseSelection: 'rotate',
    seed: 1
  },
  resources: {},
  storage: {
    dbPath: '~/.sakina/crisis.db',
    retainMessages: false
  }
}

const CONFIG_DIR = path.join(homedir(), '.sakina')
const CONFIG_PATH = path.join(CONFIG_DIR, 'config.json')

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target }
  for (const key of Object.keys(source)) {
    const value = source[key]
    if (isPlainObject(value)) {
      const base = target[key]
      result[key] = deepMerge(isPlainObject(base) ? base : {}, value)
    } else {
      result[key] = value
    }
  }
  return result
}

export function mergeConfig(overrides: Record<string, unknown>, base: SakinaConfig = DEFAULT_CONFIG): SakinaConfig {
  const merged = deepMerge(structuredClone(base) as unknown as Record<string, unknown>, overrides)
  return merged as unknown as SakinaConfig
}

export function loadConfig(configPath: string = CONFIG_PATH): SakinaConfig {
  let fileConfig: Record<string, unknown> = {}

  if (existsSync(configPath)) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'))
      if (isPlainObject(parsed)) fileConfig = parsed
    } catch (e) {
      console.error('Failed to load config:', e)
    }
  }

  const merged = mergeConfig(fileConfig)

  // Environment variables win over the file for secrets and paths
  const apiKey = process.env.SAKINA_API_KEY || process.env.OPENAI_API_KEY
  if (apiKey && !merged.analyzer.apiKey) {
    merged.analyzer.apiKey = apiKey
  }
  if (process.env.SAKINA_DB_PATH) {
    merged.storage.dbPath = process.env.SAKINA_DB_PATH
  }

  return merged
}

export function saveConfig(config: Partial<SakinaConfig>, configPath: string = CONFIG_PATH): void {
  mkdirSync(path.dirname(configPath), { recursive: true })

  let existing: Record<string, unknown> = {}
  if (existsSync(configPath)) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'))
      if (isPlainObject(parsed)) existing = parsed
    } catch (e) {
      console.error('Existing config is unreadable, overwriting:', e)
    }
  }

  const merged = deepMerge(existing, config as unknown as Record<string, unknown>)
  writeFileSync(configPath, JSON.stringify(merged, null, 2))
}

export function resolveHomePath(p: string): string {
  return p.startsWith('~') ? path.join(homedir(), p.slice(1)) : p
}

export interface ConfigError {
  field: string
  message: string
}

export function validateConfig(config: SakinaConfig): ConfigError[] {
  const errors: ConfigError[] = []
  const { low, medium, high, critical } = config.thresholds

  if (!(low < medium && medium < high && high < critical)) {
    errors.push({
      field: 'thresholds',
      message: `Thresholds must be strictly increasing (got low=${low}, medium=${medium}, high=${high}, critical=${critical})`
    })
  }
  if (critical > 10 || low < 0) {
    errors.push({ field: 'thresholds', message: 'Thresholds must lie within the 0-10 crisis scale' })
  }

  for (const [name, weight] of Object.entries({ ...config.weights.categories, ...config.weights.patterns })) {
    if (typeof weight !== 'number' || !Number.isFinite(weight) || weight < 0) {
      errors.push({ field: `weights.${name}`, message: `Weight for ${name} must be a non-negative number` })
    }
  }

  for (const [name, value] of Object.entries(config.fusion)) {
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      errors.push({ field: `fusion.${name}`, message: `Fusion coefficient ${name} must be a non-negative number` })
    }
  }

  if (!Number.isInteger(config.session.maxEvents) || config.session.maxEvents < 5) {
    errors.push({ field: 'session.maxEvents', message: 'session.maxEvents must be an integer of at least 5 (the escalation window)' })
  }

  if (config.analyzer.enabled) {
    if (!config.analyzer.apiKey && config.analyzer.provider !== 'ollama') {
      errors.push({
        field: 'analyzer.apiKey',
        message: 'The external analyzer is enabled but no API key is set. Set SAKINA_API_KEY or OPENAI_API_KEY, or disable analyzer.enabled.'
      })
    }
    if (config.analyzer.timeoutMs <= 0) {
      errors.push({ field: 'analyzer.timeoutMs', message: 'analyzer.timeoutMs must be positive' })
    }
  }

  return errors
}
