import { mkdirSync } from 'node:fs'
import path from 'node:path'
import { nanoid } from 'nanoid'
import { SafetyEngine } from '../assessment/engine.js'
import { Database } from '../storage/database.js'
import { escalationRate } from '../storage/event-store.js'
import { loadConfig, resolveHomePath, validateConfig } from '../config.js'
import type { SakinaConfig } from '../config.js'
import { startChat } from './chat.js'
import { formatReport, formatResponse, formatVerdict } from './format.js'

const DAY_MS = 24 * 60 * 60 * 1000

export interface EngineHandle {
  engine: SafetyEngine
  db: Database
  config: SakinaConfig
}

/** Load config, open the crisis log and build an engine over it. Exits on bad config. */
export function openEngine(): EngineHandle {
  const config = loadConfig()
  const errors = validateConfig(config)
  if (errors.length > 0) {
    console.error('Cannot start: invalid configuration:\n')
    for (const err of errors) {
      console.error(`  ${err.field}: ${err.message}\n`)
    }
    process.exit(1)
  }

  const dbPath = resolveHomePath(config.storage.dbPath)
  mkdirSync(path.dirname(dbPath), { recursive: true })
  const db = new Database(dbPath)

  return { engine: new SafetyEngine({ config, store: db }), db, config }
}

export async function analyzeCommand(
  words: string[],
  options: { session?: string; emotion?: string; json?: boolean }
): Promise<void> {
  const { engine, db, config } = openEngine()
  const sessionId = options.session || nanoid()

  try {
    const verdict = await engine.analyze(sessionId, words.join(' '), options.emotion)
    const response = engine.getCrisisResponse(verdict)

    if (options.json) {
      console.log(JSON.stringify({ verdict, response }, null, 2))
      return
    }

    console.log('')
    console.log(`  Session: ${sessionId}`)
    for (const line of formatVerdict(verdict)) console.log(line)
    for (const line of formatResponse(response, config.responses.language)) console.log(line)
    console.log('')
  } finally {
    db.close()
  }
}

export async function chatCommand(options: { session?: string }): Promise<void> {
  const handle = openEngine()
  await startChat(handle, options.session || nanoid())
}

export async function reportCommand(sessionId: string): Promise<void> {
  const { engine, db } = openEngine()
  try {
    const report = await engine.generateSafetyReport(sessionId)
    for (const line of formatReport(report)) console.log(line)
  } finally {
    db.close()
  }
}

export async function statsCommand(options: { days?: string }): Promise<void> {
  const days = options.days ? parseInt(options.days, 10) : 7
  if (!Number.isInteger(days) || days <= 0) {
    console.error(`Invalid --days value: ${options.days}`)
    process.exit(1)
  }

  const { db } = openEngine()
  try {
    const stats = db.getCrisisStatistics(new Date(Date.now() - days * DAY_MS))

    console.log('')
    console.log(`  Crisis Statistics (last ${days} day${days === 1 ? '' : 's'})`)
    console.log('  ------------------')
    console.log(`  Crisis events:     ${stats.totalCrisisEvents}`)
    console.log(`  Sessions:          ${stats.sessionCount}`)
    console.log(`  Escalated events:  ${stats.escalatedEvents}`)
    console.log(`  Escalation rate:   ${(escalationRate(stats) * 100).toFixed(1)}%`)
    console.log(`  Average level:     ${stats.averageCrisisLevel.toFixed(1)}`)
    for (const [type, count] of Object.entries(stats.crisisTypes)) {
      console.log(`    ${type}: ${count}`)
    }
    console.log('')
  } finally {
    db.close()
  }
}

export async function healthCommand(): Promise<void> {
  const { engine, db } = openEngine()
  try {
    const health = engine.healthCheck()
    const { thresholds } = health

    console.log('')
    console.log('  Safety Engine Health')
    console.log('  --------------------')
    console.log(`  Status:            ${health.status}`)
    console.log(`  Categories:        ${health.categoriesLoaded}`)
    console.log(`  Patterns:          ${health.patternsLoaded}`)
    console.log(`  Lexicon terms:     ${health.termsLoaded}`)
    console.log(`  Hotlines:          ${health.hotlinesLoaded}`)
    console.log(`  Active sessions:   ${health.activeSessions}`)
    console.log(`  External analyzer: ${health.analyzerEnabled ? 'enabled' : 'disabled'}`)
    console.log(`  Thresholds:        low=${thresholds.low} medium=${thresholds.medium} high=${thresholds.high} critical=${thresholds.critical}`)
    console.log('')
  } finally {
    db.close()
  }
}
