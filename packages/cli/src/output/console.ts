import type { Logger, SessionState } from '@reserva/core'
import { c } from './colors'

export function printBanner(): void {
  console.log()
  console.log(c('cyan', '  reserva'))
  console.log(c('dim', '  You are the restaurant staff. Type "quit" or "exit" to leave.'))
  console.log()
}

export function printProgress(message: string): void {
  console.log(c('dim', `  ${message}`))
}

export function printAgentReply(reply: string): void {
  console.log(`${c('magenta', 'guest>')} ${reply}`)
}

export function printSummary(state: SessionState): void {
  const { workflow } = state
  console.log()
  console.log(`  ${c('bold', 'Stage:')}   ${workflow.stage}`)

  if (workflow.selectedSlotNote) {
    console.log(`  ${c('bold', 'Slot:')}    ${workflow.selectedSlotNote}`)
  }

  if (workflow.savedFilePath?.startsWith('save-failed')) {
    console.log(`  ${c('bold', 'Saved:')}   ${c('red', workflow.savedFilePath)}`)
  } else if (workflow.savedFilePath) {
    console.log(`  ${c('bold', 'Saved:')}   ${c('green', workflow.savedFilePath)}`)
  } else {
    console.log(`  ${c('bold', 'Saved:')}   ${c('yellow', 'nothing was saved')}`)
  }
  console.log()
}

export function printError(error: Error): void {
  console.error()
  console.error(c('red', '  ✗ Error:'))
  console.error()
  console.error(`  ${error.message}`)
  console.error()
}

function formatMs(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`
  }
  return `${(ms / 1000).toFixed(2)}s`
}

/**
 * Logger for `--verbose`: one dim line per event on stderr, so the chat
 * transcript on stdout stays readable.
 */
export function createConsoleLogger(): Logger {
  return {
    onActionSelected(event) {
      console.error(c('dim', `  · action ${event.action} (stage ${event.stage})`))
    },
    onTransition(event) {
      console.error(c('dim', `  · ${event.from} → ${event.to}`))
    },
    onLLMCallEnd(event) {
      const { duration, usage, error } = event.response
      if (error) {
        console.error(c('red', `  · ${event.promptId} failed after ${formatMs(duration)}: ${error.message}`))
        return
      }
      const tokens = usage?.totalTokens !== undefined ? `, ${usage.totalTokens} tokens` : ''
      console.error(c('dim', `  · ${event.modelId} ${event.promptId} ${formatMs(duration)}${tokens}`))
    },
    log(level, message, data) {
      const color = level === 'error' ? 'red' : level === 'warn' ? 'yellow' : 'dim'
      const suffix = data ? ` ${JSON.stringify(data)}` : ''
      console.error(c(color, `  [${level}] ${message}${suffix}`))
    },
  }
}
