import { nanoid } from 'nanoid'
import { DEFAULT_CONFIG } from '../config.js'
import type { SakinaConfig } from '../config.js'
import { loadLexicon, RISK_CATEGORIES, RISK_PATTERNS } from '../detection/lexicon.js'
import type { RiskLexicon } from '../detection/lexicon.js'
import { matchCategories } from '../detection/categories.js'
import type { CategoryAnalysis } from '../detection/categories.js'
import { detectPatterns } from '../detection/patterns.js'
import type { PatternAnalysis } from '../detection/patterns.js'
import { createRiskAnalyzer, runAnalyzer } from '../detection/external.js'
import type { RiskAnalyzer } from '../detection/external.js'
import { SessionContextTracker } from '../session/tracker.js'
import { SessionLock } from '../session/lock.js'
import type { EventStore } from '../storage/event-store.js'
import { loadTemplates } from '../response/templates.js'
import type { ResponseTemplates } from '../response/templates.js'
import { directoryValues, loadResourceDirectory } from '../response/resources.js'
import type { ResourceDirectory } from '../response/resources.js'
import { PhraseSelector, seededRandom } from '../response/phrases.js'
import type { RandomSource } from '../response/phrases.js'
import { composeCrisisResponse } from '../response/composer.js'
import type { CrisisResponse } from '../response/composer.js'
import { computeCrisisLevel } from './aggregator.js'
import { classifyCrisis } from './classifier.js'
import { assessUrgency, safetyRecommendations } from './urgency.js'
import { assessEscalation } from './escalation.js'
import { buildSafetyReport } from './report.js'
import type { SafetyReport } from './report.js'
import type {
  AssessedVerdict,
  CrisisEvent,
  EscalationAssessment,
  ExternalSignal,
  FallbackVerdict,
  SafetyVerdict
} from './types.js'

export interface Detectors {
  categories: (text: string) => CategoryAnalysis
  patterns: (text: string) => PatternAnalysis
}

export interface SafetyEngineOptions {
  config?: SakinaConfig
  store?: EventStore
  lexicon?: RiskLexicon
  templates?: ResponseTemplates
  directory?: ResourceDirectory
  /** `null` disables the external analyzer even when the config enables it. */
  analyzer?: RiskAnalyzer | null
  random?: RandomSource
  detectors?: Partial<Detectors>
  now?: () => Date
}

export interface SafetyHealth {
  status: 'healthy'
  categoriesLoaded: number
  patternsLoaded: number
  termsLoaded: number
  hotlinesLoaded: number
  activeSessions: number
  analyzerEnabled: boolean
  thresholds: SakinaConfig['thresholds']
}

const REPORT_EVENT_LIMIT = 1000

function clampLevel(level: number, fallback = 0): number {
  if (!Number.isFinite(level)) return fallback
  return Math.max(0, Math.min(10, Math.round(level)))
}

export class SafetyEngine {
  private config: SakinaConfig
  private store: EventStore | null
  private lexicon: RiskLexicon
  private templates: ResponseTemplates
  private directory: ResourceDirectory
  private analyzer: RiskAnalyzer | null
  private selector: PhraseSelector
  private detectors: Detectors
  private tracker: SessionContextTracker
  private lock: SessionLock = new SessionLock()
  private now: () => Date

  constructor(options: SafetyEngineOptions = {}) {
    this.config = options.config || DEFAULT_CONFIG
    this.store = options.store || null
    this.lexicon = options.lexicon || loadLexicon()
    this.templates = options.templates || loadTemplates(this.config.responses.language)
    this.directory = options.directory || loadResourceDirectory(this.config.resources.directoryPath)
    this.now = options.now || (() => new Date())

    if (options.analyzer !== undefined) {
      this.analyzer = options.analyzer
    } else {
      this.analyzer = this.config.analyzer.enabled ? createRiskAnalyzer(this.config.analyzer) : null
    }

    const random = options.random
      || (this.config.responses.phraseSelection === 'seeded' ? seededRandom(this.config.responses.seed) : undefined)
    this.selector = new PhraseSelector(random)

    this.detectors = {
      categories: options.detectors?.categories
        || (text => matchCategories(text, this.lexicon, this.config.weights.categories)),
      patterns: options.detectors?.patterns
        || (text => detectPatterns(text, this.lexicon, this.config.weights.patterns))
    }

    this.tracker = new SessionContextTracker({
      session: this.config.session,
      store: this.store ?? undefined
    })
  }

  /**
   * Assess one inbound message. Always resolves with a verdict; if local
   * detection fails the verdict is the conservative fallback.
   */
  async analyze(sessionId: string, message: string, recentEmotionalState?: string): Promise<SafetyVerdict> {
    return this.lock.run(sessionId, async () => {
      try {
        return await this.assess(sessionId, message, recentEmotionalState)
      } catch (e) {
        console.error(`[safety] Safety analysis failed for session ${sessionId}:`, e)
        return this.fallbackVerdict(sessionId, e)
      }
    })
  }

  async checkEscalation(sessionId: string, currentCrisisLevel: number): Promise<EscalationAssessment> {
    return this.lock.run(sessionId, async () => {
      const history = (await this.tracker.peekEvents(sessionId)).map(e => e.crisisLevel)
      return this.evaluateEscalation(history, clampLevel(currentCrisisLevel))
    })
  }

  getCrisisResponse(verdict: SafetyVerdict): CrisisResponse {
    return composeCrisisResponse(verdict, {
      templates: this.templates,
      directory: this.directory,
      selector: this.selector,
      thresholds: this.config.thresholds
    })
  }

  async endSession(sessionId: string): Promise<boolean> {
    return this.lock.run(sessionId, () => this.tracker.endSession(sessionId))
  }

  async generateSafetyReport(sessionId: string): Promise<SafetyReport> {
    return this.lock.run(sessionId, async () => {
      const active = this.tracker.hasSession(sessionId)
      let events: readonly CrisisEvent[] = active ? await this.tracker.recentEvents(sessionId) : []

      if (this.store) {
        try {
          events = await this.store.queryRecentEvents(sessionId, REPORT_EVENT_LIMIT)
        } catch (e) {
          console.error(`[safety] Loading events for the report on ${sessionId} failed:`, e)
        }
      }

      return buildSafetyReport({
        sessionId,
        events,
        emotionalStates: active ? await this.tracker.emotionalStates(sessionId) : [],
        phrases: this.templates.session
      })
    })
  }

  healthCheck(): SafetyHealth {
    let termsLoaded = 0
    for (const category of RISK_CATEGORIES) termsLoaded += this.lexicon.categories[category].length
    for (const pattern of RISK_PATTERNS) termsLoaded += this.lexicon.patterns[pattern].length

    return {
      status: 'healthy',
      categoriesLoaded: RISK_CATEGORIES.length,
      patternsLoaded: RISK_PATTERNS.length,
      termsLoaded,
      hotlinesLoaded: this.directory.hotlines.length,
      activeSessions: this.tracker.activeSessions,
      analyzerEnabled: this.analyzer !== null,
      thresholds: this.config.thresholds
    }
  }

  private async assess(sessionId: string, message: string, recentEmotionalState?: string): Promise<AssessedVerdict> {
    const { thresholds } = this.config

    if (recentEmotionalState) {
      await this.tracker.recordEmotionalState(sessionId, recentEmotionalState)
    }
    const context = await this.tracker.getContext(sessionId)

    const categories = this.detectors.categories(message)
    const patterns = this.detectors.patterns(message)
    const localLevel = computeCrisisLevel(categories, patterns, context, this.config.fusion)
    const crisisType = classifyCrisis(categories, patterns)

    // The external estimate may only raise the local level
    const external: ExternalSignal = this.analyzer
      ? await runAnalyzer(this.analyzer, message, this.config.analyzer.timeoutMs)
      : { status: 'disabled' }
    const crisisLevel = external.status === 'ok'
      ? Math.max(localLevel, clampLevel(external.estimate.crisisLevel, localLevel))
      : localLevel

    const urgency = assessUrgency(crisisLevel, crisisType, context, thresholds)

    const history = (await this.tracker.recentEvents(sessionId)).map(e => e.crisisLevel)
    const recordable = crisisLevel >= thresholds.medium
    const window = recordable ? [...history, crisisLevel].slice(-this.config.session.maxEvents) : history
    const escalation = this.evaluateEscalation(window, crisisLevel)

    if (recordable) {
      await this.tracker.recordEvent({
        id: nanoid(),
        sessionId,
        timestamp: this.now(),
        crisisLevel,
        crisisType,
        contributingCategories: RISK_CATEGORIES.filter(c => categories.matches[c] !== undefined),
        indicatorCount: categories.matchCount,
        escalated: escalation.escalationNeeded,
        followUpNeeded: true,
        message: this.config.storage.retainMessages ? message : null
      })
      console.log(`[safety] session=${sessionId} level=${crisisLevel} type=${crisisType} urgency=${urgency} escalate=${escalation.escalationNeeded}`)
    }

    return {
      kind: 'assessed',
      sessionId,
      crisisLevel,
      crisisType,
      urgency,
      indicators: { categories, patterns, context, external },
      recommendations: safetyRecommendations(urgency, this.templates.recommendations),
      requiresIntervention: crisisLevel >= thresholds.high,
      requiresEscalation: escalation.escalationNeeded,
      escalation
    }
  }

  private evaluateEscalation(history: readonly number[], currentCrisisLevel: number): EscalationAssessment {
    return assessEscalation({
      history,
      currentCrisisLevel,
      thresholds: this.config.thresholds,
      phrases: this.templates.escalation,
      values: directoryValues(this.directory)
    })
  }

  private fallbackVerdict(sessionId: string, error: unknown): FallbackVerdict {
    return {
      kind: 'fallback',
      sessionId,
      crisisLevel: 8,
      crisisType: 'unknown',
      urgency: 'high',
      indicators: null,
      recommendations: safetyRecommendations('high', this.templates.recommendations),
      requiresIntervention: true,
      requiresEscalation: false,
      error: error instanceof Error ? error.message : String(error)
    }
  }
}
