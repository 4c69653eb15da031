import type { SafetyVerdict } from '../assessment/types.js'
import type { SafetyReport } from '../assessment/report.js'
import type { CrisisResponse } from '../response/composer.js'
import { displayName } from '../response/resources.js'
import type { ResponseLanguage } from '../config.js'

export function formatVerdict(verdict: SafetyVerdict): string[] {
  const lines = [
    `  Crisis level:          ${verdict.crisisLevel}/10`,
    `  Crisis type:           ${verdict.crisisType}`,
    `  Urgency:               ${verdict.urgency}`,
    `  Requires intervention: ${verdict.requiresIntervention ? 'yes' : 'no'}`,
    `  Requires escalation:   ${verdict.requiresEscalation ? 'yes' : 'no'}`
  ]

  if (verdict.kind === 'fallback') {
    lines.push(`  Analysis error:        ${verdict.error}`)
  } else {
    const categories = Object.keys(verdict.indicators.categories.matches)
    if (categories.length > 0) lines.push(`  Categories:            ${categories.join(', ')}`)
    if (verdict.indicators.patterns.highRiskPatterns.length > 0) {
      lines.push(`  High-risk patterns:    ${verdict.indicators.patterns.highRiskPatterns.join(', ')}`)
    }
    if (verdict.escalation.escalationNeeded) {
      lines.push(`  Escalation action:     ${verdict.escalation.recommendedAction}`)
    }
  }

  return lines
}

export function formatResponse(response: CrisisResponse, language: ResponseLanguage): string[] {
  const lines = ['', ...response.message.split('\n').map(line => `  ${line}`)]

  if (response.immediateActions.length > 0) {
    lines.push('', '  Immediate actions:')
    for (const action of response.immediateActions) lines.push(`    - ${action}`)
  }
  if (response.resources.length > 0) {
    lines.push('', '  Support lines:')
    for (const hotline of response.resources) {
      lines.push(`    ${displayName(hotline, language)}: ${hotline.number}${hotline.available ? ` (${hotline.available})` : ''}`)
    }
  }
  if (response.emergencyContacts.length > 0) {
    lines.push('', '  Emergency:')
    for (const contact of response.emergencyContacts) {
      lines.push(`    ${displayName(contact, language)}: ${contact.number} (${contact.available})`)
    }
  }

  return lines
}

export function formatReport(report: SafetyReport): string[] {
  const lines = [
    '',
    `  Safety Report: ${report.sessionId}`,
    '  ' + '-'.repeat(15 + report.sessionId.length),
    `  Crisis events:       ${report.totalCrisisEvents}`,
    `  Highest level:       ${report.highestCrisisLevel}`,
    `  Escalated events:    ${report.escalatedEvents}`,
    `  Crisis types:        ${report.crisisTypesEncountered.join(', ') || 'none'}`,
    `  Follow-up required:  ${report.followUpRequired ? 'yes' : 'no'}`
  ]

  const progression = report.emotionalProgression
  if (progression.status === 'ok') {
    lines.push(`  Emotional trend:     ${progression.trend} (dominant: ${progression.dominantEmotion})`)
  }

  lines.push('', '  Recommendations:')
  for (const recommendation of report.recommendations) lines.push(`    - ${recommendation}`)
  lines.push('')
  return lines
}
