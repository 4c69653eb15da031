import * as readline from 'node:readline'
import type { EngineHandle } from './commands.js'
import { formatReport, formatResponse, formatVerdict } from './format.js'
import type { SafetyVerdict } from '../assessment/types.js'

// ANSI color codes
const RESET = '\x1b[0m'
const BOLD = '\x1b[1m'
const DIM = '\x1b[2m'
const CYAN = '\x1b[36m'
const GREEN = '\x1b[32m'
const YELLOW = '\x1b[33m'
const RED = '\x1b[31m'
const MAGENTA = '\x1b[35m'

const HELP_TEXT = `
${BOLD}Commands:${RESET}
  ${CYAN}/emotion <state>${RESET}   Attach an emotional state to the next message
  ${CYAN}/escalation <n>${RESET}    Check escalation for crisis level <n>
  ${CYAN}/report${RESET}            Show the session safety report
  ${CYAN}/end${RESET}               End the session and forget its history
  ${CYAN}/help${RESET}              Show this help
`

function levelColor(verdict: SafetyVerdict): string {
  if (verdict.requiresEscalation || verdict.kind === 'fallback') return RED
  if (verdict.requiresIntervention) return YELLOW
  return GREEN
}

export interface ChatStreams {
  input: NodeJS.ReadableStream
  output: NodeJS.WritableStream
}

export async function startChat(
  handle: EngineHandle,
  sessionId: string,
  streams: ChatStreams = { input: process.stdin, output: process.stdout }
): Promise<void> {
  const { engine, db, config } = handle
  let pendingEmotion: string | undefined

  console.log(`${GREEN}Session ${sessionId} started.${RESET} Type a message and press Enter. ${DIM}Ctrl+C to exit.${RESET}`)
  console.log(`${DIM}Type /help for commands.${RESET}\n`)

  const rl = readline.createInterface({
    input: streams.input,
    output: streams.output,
    prompt: `${CYAN}>${RESET} `
  })

  rl.prompt()

  rl.on('line', async (line: string) => {
    const message = line.trim()
    if (!message) {
      rl.prompt()
      return
    }

    if (message.startsWith('/')) {
      const parts = message.slice(1).split(/\s+/)
      const cmd = parts[0]?.toLowerCase()
      const args = parts.slice(1).join(' ')

      try {
        switch (cmd) {
          case 'help':
            console.log(HELP_TEXT)
            break

          case 'emotion':
            if (!args) {
              console.log(`${DIM}Usage: /emotion <state>${RESET}`)
              break
            }
            pendingEmotion = args
            console.log(`${DIM}Emotional state "${args}" will be attached to the next message.${RESET}`)
            break

          case 'escalation': {
            const level = parseInt(args, 10)
            if (Number.isNaN(level)) {
              console.log(`${DIM}Usage: /escalation <crisis level 0-10>${RESET}`)
              break
            }
            const assessment = await engine.checkEscalation(sessionId, level)
            const met = Object.entries(assessment.criteriaMet).filter(([, v]) => v).map(([k]) => k)
            console.log('')
            console.log(`  ${DIM}Escalation needed:${RESET}  ${assessment.escalationNeeded ? `${RED}yes${RESET}` : 'no'}`)
            console.log(`  ${DIM}Criteria met:${RESET}       ${met.join(', ') || 'none'}`)
            console.log(`  ${DIM}Action:${RESET}             ${assessment.recommendedAction}`)
            console.log('')
            break
          }

          case 'report':
            for (const reportLine of formatReport(await engine.generateSafetyReport(sessionId))) {
              console.log(reportLine)
            }
            break

          case 'end': {
            const ended = await engine.endSession(sessionId)
            console.log(ended ? `${DIM}Session history cleared.${RESET}` : `${DIM}No active session state.${RESET}`)
            break
          }

          default:
            console.log(`${YELLOW}Unknown command: /${cmd}${RESET}`)
            console.log(`${DIM}Type /help for available commands.${RESET}`)
        }
      } catch (e) {
        console.error(`${YELLOW}Command failed:${RESET}`, e instanceof Error ? e.message : e)
      }
      rl.prompt()
      return
    }

    const emotion = pendingEmotion
    pendingEmotion = undefined

    try {
      const verdict = await engine.analyze(sessionId, message, emotion)
      const response = engine.getCrisisResponse(verdict)

      const color = levelColor(verdict)
      console.log('')
      for (const verdictLine of formatVerdict(verdict)) console.log(`${color}${verdictLine}${RESET}`)
      process.stdout.write(`\n${MAGENTA}Response:${RESET}`)
      for (const responseLine of formatResponse(response, config.responses.language)) console.log(responseLine)
    } catch (e) {
      const errorMessage = e instanceof Error ? e.message : 'Unknown error'
      console.error(`\n${YELLOW}Error: ${errorMessage}${RESET}`)
    }

    process.stdout.write('\n')
    rl.prompt()
  })

  rl.on('close', () => {
    console.log(`\n${DIM}Goodbye.${RESET}`)
    db.close()
    process.exit(0)
  })
}
