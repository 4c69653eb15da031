import type { SakinaConfig } from '../config.js'
import type { SafetyVerdict } from '../assessment/types.js'
import type { ResponseTemplates } from './templates.js'
import { fillTemplate } from './templates.js'
import type { EmergencyContact, Hotline, ResourceDirectory } from './resources.js'
import { directoryValues } from './resources.js'
import type { PhraseSelector } from './phrases.js'

export interface CrisisResponse {
  message: string
  crisisLevel: number
  urgency: SafetyVerdict['urgency']
  resources: Hotline[]
  emergencyContacts: EmergencyContact[]
  immediateActions: string[]
  followUpRequired: boolean
}

export interface ComposerDeps {
  templates: ResponseTemplates
  directory: ResourceDirectory
  selector: PhraseSelector
  thresholds: SakinaConfig['thresholds']
}

function baseMessage(crisisType: SafetyVerdict['crisisType'], base: ResponseTemplates['base']): string {
  switch (crisisType) {
    case 'suicide_risk':
      return base.suicide_risk
    case 'self_harm_risk':
      return base.self_harm_risk
    case 'substance_abuse':
      return base.substance_abuse
    default:
      return base.generic
  }
}

export function culturalSupport(
  crisisType: SafetyVerdict['crisisType'],
  cultural: ResponseTemplates['cultural'],
  values: Record<string, string>
): string {
  const body = crisisType === 'suicide_risk' ? cultural.suicide_risk : cultural.default
  return `${cultural.preamble}\n\n${fillTemplate(body, values)}`
}

export function immediateActions(
  crisisLevel: number,
  actions: ResponseTemplates['immediateActions'],
  thresholds: SakinaConfig['thresholds'],
  values: Record<string, string>
): string[] {
  let tier: readonly string[]
  if (crisisLevel >= thresholds.critical) tier = actions.critical
  else if (crisisLevel >= thresholds.high) tier = actions.high
  else if (crisisLevel >= thresholds.medium) tier = actions.medium
  else tier = actions.default
  return tier.map(action => fillTemplate(action, values))
}

export function composeCrisisResponse(verdict: SafetyVerdict, deps: ComposerDeps): CrisisResponse {
  const values = directoryValues(deps.directory)
  const highRisk = verdict.crisisLevel >= deps.thresholds.high

  const opener = deps.selector.pick(deps.templates.openers)
  const message = [
    `${opener} ${baseMessage(verdict.crisisType, deps.templates.base)}`,
    culturalSupport(verdict.crisisType, deps.templates.cultural, values)
  ].join('\n\n')

  return {
    message,
    crisisLevel: verdict.crisisLevel,
    urgency: verdict.urgency,
    resources: highRisk ? [...deps.directory.hotlines] : [],
    emergencyContacts: highRisk ? [...deps.directory.emergencyContacts] : [],
    immediateActions: immediateActions(verdict.crisisLevel, deps.templates.immediateActions, deps.thresholds, values),
    followUpRequired: verdict.crisisLevel >= deps.thresholds.medium
  }
}
