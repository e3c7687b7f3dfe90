import { resolve } from 'node:path'
import { createInterface, type Interface } from 'node:readline/promises'
import {
  createJsonReservationStore,
  createLLMActionExecutor,
  createOpenRouterModel,
  createReservationAgent,
  noopLogger,
  type GoalFactsInput,
  type ReservationAgent,
  type SessionState,
} from '@reserva/core'
import { loadEnvFile, loadGoalFile, loadSettings } from '../config/index'
import {
  createConsoleLogger,
  printAgentReply,
  printBanner,
  printError,
  printProgress,
  printSummary,
} from '../output/console'

export interface ChatCommandOptions {
  envFile: string
  output?: string
  verbose?: boolean
}

const EXIT_COMMANDS = new Set(['quit', 'exit'])

/** Prompts for staff lines; resolves `null` once stdin closes (Ctrl-D). */
function staffPrompt(rl: Interface): () => Promise<string | null> {
  let closed = false
  const whenClosed = new Promise<null>((resolveClosed) => {
    rl.once('close', () => {
      closed = true
      resolveClosed(null)
    })
  })
  return async () => (closed ? null : Promise.race([rl.question('staff> '), whenClosed]))
}

export interface ChatLoopOptions {
  agent: ReservationAgent
  state: SessionState
  /** Reads the next staff line; `null` means input ended */
  ask: () => Promise<string | null>
  onReply: (reply: string) => void
}

/**
 * Runs the agent's opening turn, then alternates staff input and agent
 * replies until the session completes or the staff leaves.
 */
export async function runChatLoop(options: ChatLoopOptions): Promise<SessionState> {
  const { agent, ask, onReply } = options

  const opening = await agent.step(options.state)
  onReply(opening.reply)
  let state = opening.state

  while (!agent.isComplete(state)) {
    const line = await ask()
    if (line === null) break

    const message = line.trim()
    if (EXIT_COMMANDS.has(message.toLowerCase())) break
    if (!message) continue

    const result = await agent.step(state, message)
    onReply(result.reply)
    state = result.state
  }

  return state
}

export async function chatCommand(
  goalPath: string | undefined,
  options: ChatCommandOptions
): Promise<void> {
  try {
    printBanner()

    loadEnvFile(options.envFile)
    const settings = loadSettings()
    const goal: GoalFactsInput = goalPath ? await loadGoalFile(goalPath) : {}

    const logger = options.verbose ? createConsoleLogger() : noopLogger
    const executor = createLLMActionExecutor({
      model: createOpenRouterModel({ apiKey: settings.apiKey, modelId: settings.model }),
      logger,
      temperature: settings.temperature,
      maxOutputTokens: settings.maxOutputTokens,
    })
    const store = createJsonReservationStore({
      directory: resolve(options.output ?? settings.outputDir),
    })
    const agent = createReservationAgent({ executor, store, logger })

    printProgress(`Calling ${goal.restaurantName || 'the restaurant'} with ${settings.model}...`)
    console.log()

    const rl = createInterface({ input: process.stdin, output: process.stdout })

    try {
      const finalState = await runChatLoop({
        agent,
        state: agent.create(goal),
        ask: staffPrompt(rl),
        onReply: printAgentReply,
      })
      printSummary(finalState)
    } finally {
      rl.close()
    }
  } catch (error) {
    printError(error instanceof Error ? error : new Error(String(error)))
    throw error
  }
}
