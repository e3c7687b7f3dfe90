import type { ActionKind } from '../actions/kinds';
import type { ActionExecutor } from '../executor/types';
import { createInitialState, recordIncomingTurn, type CreateStateOptions } from '../memory/state';
import type { GoalFactsInput, SessionState } from '../memory/types';
import { noopLogger, type Logger } from '../observability/logger';
import type { ReservationStore } from '../persistence/types';
import { selectAction } from '../workflow/coordinator';
import { applyActionResult } from '../workflow/reducer';

export const SESSION_COMPLETE_REPLY = 'The reservation has already been completed.';
export const DEFAULT_MAX_STEPS = 50;

export interface ReservationAgentOptions {
  executor: ActionExecutor;
  store: ReservationStore;
  logger?: Logger;
}

export interface StepResult {
  state: SessionState;
  reply: string;
  /** Action that produced the reply; `null` when the session was already complete */
  action: ActionKind | null;
}

export interface RunResult {
  state: SessionState;
  replies: string[];
}

/**
 * Conversational entry point. The agent holds no session of its own: every
 * call takes a snapshot and hands back a new one.
 */
export interface ReservationAgent {
  create(goal?: GoalFactsInput, options?: CreateStateOptions): SessionState;
  step(state: SessionState, message?: string): Promise<StepResult>;
  isComplete(state: SessionState): boolean;
  runUntilDone(state: SessionState, maxSteps?: number): Promise<RunResult>;
}

/**
 * @example
 * ```typescript
 * const agent = createReservationAgent({ executor, store });
 * let state = agent.create({ guestName: 'Anna', restaurantName: 'Trattoria' });
 * const first = await agent.step(state);
 * const second = await agent.step(first.state, 'Hello, how can I help?');
 * ```
 */
export function createReservationAgent(options: ReservationAgentOptions): ReservationAgent {
  const { executor, store } = options;
  const logger = options.logger ?? noopLogger;

  async function advance(state: SessionState, action: ActionKind): Promise<StepResult> {
    logger.onActionSelected?.({
      type: 'action_selected',
      action,
      stage: state.workflow.stage,
      timestamp: Date.now(),
    });

    const incoming = state.scratchpad.lastIncomingMessage ?? '';
    const result = await executor.run(action, state, incoming);
    const next = await applyActionResult(state, result, { store, logger });

    logger.onTransition?.({
      type: 'transition',
      action,
      from: state.workflow.stage,
      to: next.workflow.stage,
      timestamp: Date.now(),
    });

    return { state: next, reply: result.reply, action };
  }

  return {
    create(goal: GoalFactsInput = {}, createOptions: CreateStateOptions = {}): SessionState {
      return createInitialState(goal, createOptions);
    },

    async step(state: SessionState, message?: string): Promise<StepResult> {
      if (selectAction(state) === null) {
        return { state, reply: SESSION_COMPLETE_REPLY, action: null };
      }

      const current = message ? recordIncomingTurn(state, message) : state;
      const action = selectAction(current);
      if (action === null) {
        return { state: current, reply: SESSION_COMPLETE_REPLY, action: null };
      }
      return advance(current, action);
    },

    isComplete(state: SessionState): boolean {
      return selectAction(state) === null;
    },

    async runUntilDone(state: SessionState, maxSteps: number = DEFAULT_MAX_STEPS): Promise<RunResult> {
      const replies: string[] = [];
      let current = state;

      for (let steps = 0; steps < maxSteps; steps++) {
        const action = selectAction(current);
        if (action === null) {
          break;
        }
        const result = await advance(current, action);
        current = result.state;
        replies.push(result.reply);
      }

      if (selectAction(current) !== null) {
        logger.log?.('warn', 'Step limit reached before the session completed', {
          maxSteps,
          stage: current.workflow.stage,
        });
      }
      return { state: current, replies };
    },
  };
}
