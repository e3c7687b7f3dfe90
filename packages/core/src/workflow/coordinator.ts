import { ActionKind } from '../actions/kinds';
import { ConfirmationStatus, WorkflowStage } from '../memory/enums';
import type { SessionState } from '../memory/types';

const TERMINAL_STAGES: ReadonlySet<WorkflowStage> = new Set([
  WorkflowStage.WRAP_UP,
  WorkflowStage.END,
]);

export function isTerminalStage(stage: WorkflowStage): boolean {
  return TERMINAL_STAGES.has(stage);
}

/**
 * Picks the next action for the session, or `null` once a terminal stage is
 * reached. Total over every state: an unrecognised stage falls back to the
 * greeting so the loop never stalls.
 */
export function selectAction(state: SessionState): ActionKind | null {
  const { workflow } = state;

  if (isTerminalStage(workflow.stage)) {
    return null;
  }

  if (workflow.blockingIssue) {
    return ActionKind.ERROR_RECOVERY;
  }

  switch (workflow.stage) {
    case WorkflowStage.INTRO:
      return ActionKind.GREETING;
    case WorkflowStage.SHARE_PREFERENCES:
    case WorkflowStage.AWAIT_AVAILABILITY:
      return ActionKind.AVAILABILITY;
    case WorkflowStage.REVIEW_ALTERNATIVES:
      return ActionKind.ALTERNATIVE;
    case WorkflowStage.PROVIDE_CONTACT:
      return ActionKind.DETAILS_COLLECTION;
    case WorkflowStage.MENU_DISCUSSION:
      return ActionKind.MENU_DISCUSSION;
    case WorkflowStage.AWAIT_CONFIRMATION:
      return workflow.confirmationStatus === ConfirmationStatus.NEEDS_CLARIFICATION
        ? ActionKind.DETAILS_COLLECTION
        : ActionKind.CONFIRMATION;
    case WorkflowStage.SAVE_DATA:
      return ActionKind.SAVE_RESERVATION;
    default:
      return ActionKind.GREETING;
  }
}
