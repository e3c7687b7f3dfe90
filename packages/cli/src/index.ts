#!/usr/bin/env tsx
import cac from 'cac'
import { chatCommand, type ChatCommandOptions } from './commands/chat'

const VERSION = '0.1.0'
const cli = cac('reserva')

cli
  .command('chat [goal]', 'Negotiate a table booking; you play the restaurant staff')
  .option('-e, --env-file <path>', 'Path to env file', { default: '.env' })
  .option('-o, --output <dir>', 'Directory for saved reservations')
  .option('-v, --verbose', 'Log actions, transitions and model calls')
  .action(async (goalPath: string | undefined, options: ChatCommandOptions) => {
    try {
      await chatCommand(goalPath, options)
    } catch {
      process.exit(1)
    }
  })

cli.help()
cli.version(VERSION)
cli.parse()
