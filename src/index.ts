#!/usr/bin/env node

import { Command } from 'commander'
import {
  analyzeCommand,
  chatCommand,
  reportCommand,
  statsCommand,
  healthCommand
} from './cli/commands.js'

const program = new Command()

program
  .name('sakina')
  .description('Crisis risk assessment and escalation engine for mental-health support conversations')
  .version('0.1.0')

program
  .command('analyze')
  .description('Assess a single message and print the verdict and support response')
  .argument('<message...>', 'Message text')
  .option('--session <id>', 'Session id (defaults to a new session)')
  .option('--emotion <state>', 'Recent emotional state reported by the user')
  .option('--json', 'Print the verdict and response as JSON')
  .action(async (message: string[], options: { session?: string; emotion?: string; json?: boolean }) => {
    await analyzeCommand(message, options)
  })

program
  .command('chat')
  .description('Start an interactive assessment session')
  .option('--session <id>', 'Resume an existing session id')
  .action(async (options: { session?: string }) => {
    await chatCommand(options)
  })

program
  .command('report')
  .description('Show the safety report for a session')
  .argument('<sessionId>', 'Session id')
  .action(async (sessionId: string) => {
    await reportCommand(sessionId)
  })

program
  .command('stats')
  .description('Show crisis statistics from the crisis log')
  .option('--days <n>', 'Look back this many days', '7')
  .action(async (options: { days?: string }) => {
    await statsCommand(options)
  })

program
  .command('health')
  .description('Check that the lexicon, resources and configuration load')
  .action(async () => {
    await healthCommand()
  })

program.parseAsync(process.argv).catch((err) => {
  console.error(err)
  process.exit(1)
})
