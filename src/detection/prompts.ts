import { RISK_CATEGORIES } from './lexicon.js'

export function buildRiskPrompt(message: string): string {
  return `You are a clinical safety screener for a mental health support service.
Rate the suicide, self-harm and violence risk expressed in the user's message.
The message may be written in Arabic or English. Rate only what the text says; do not guess.

Crisis level scale (integer 0-10):
- 0: no risk signal
- 3: mild distress
- 5: clear distress that needs follow-up
- 7: high risk, needs a specialist soon
- 9-10: immediate danger to life

Allowed categories: ${RISK_CATEGORIES.join(', ')}

Message:
"""
${message}
"""

Return JSON only: { "crisis_level": number, "categories": ["category"], "rationale": "one short sentence" }`
}
