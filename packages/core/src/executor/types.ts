import type { ActionKind } from '../actions/kinds';
import type { ActionResult } from '../actions/schemas';
import type { SessionState } from '../memory/types';

/**
 * Turns an action kind plus the current session into a structured result.
 * The core only relies on this contract; a rejected promise means the turn
 * never reaches the reducer.
 */
export interface ActionExecutor {
  run(kind: ActionKind, state: SessionState, incomingMessage: string): Promise<ActionResult>;
}
