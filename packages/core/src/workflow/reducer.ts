import { ActionKind } from '../actions/kinds';
import type { ActionResult } from '../actions/schemas';
import type { SessionState } from '../memory/types';
import {
  handleAlternative,
  handleAvailability,
  handleConfirmation,
  handleDetails,
  handleErrorRecovery,
  handleGreeting,
  handleMenu,
  handleSaveReservation,
  type TransitionDeps,
} from './transitions';

function assertNever(value: never): never {
  throw new Error(`Unhandled action result: ${JSON.stringify(value)}`);
}

/**
 * Folds one action's structured result into a new session snapshot. The
 * input snapshot is never modified.
 */
export async function applyActionResult(
  state: SessionState,
  result: ActionResult,
  deps: TransitionDeps
): Promise<SessionState> {
  switch (result.kind) {
    case ActionKind.GREETING:
      return handleGreeting(state, result);
    case ActionKind.AVAILABILITY:
      return handleAvailability(state, result);
    case ActionKind.DETAILS_COLLECTION:
      return handleDetails(state, result);
    case ActionKind.MENU_DISCUSSION:
      return handleMenu(state, result);
    case ActionKind.CONFIRMATION:
      return handleConfirmation(state, result);
    case ActionKind.ALTERNATIVE:
      return handleAlternative(state, result);
    case ActionKind.ERROR_RECOVERY:
      return handleErrorRecovery(state, result);
    case ActionKind.SAVE_RESERVATION:
      return handleSaveReservation(state, result, deps);
    default:
      return assertNever(result);
  }
}
