import type {
  AlternativeResult,
  AvailabilityResult,
  ConfirmationResult,
  DetailsResult,
  ErrorRecoveryResult,
  GreetingResult,
  MenuResult,
  SaveReservationResult,
} from '../actions/schemas';
import { toErrorMessage } from '../errors/utils';
import {
  CONFIRMATION_PRIORITY,
  allRequiredConfirmed,
  markAllConfirmed,
} from '../memory/confirmed-fields';
import { AvailabilityStatus, ConfirmationStatus, WorkflowStage } from '../memory/enums';
import { cloneState, pushTurn } from '../memory/state';
import type {
  ReservationDetails,
  ReservationField,
  SessionState,
} from '../memory/types';
import { noopLogger, type Logger } from '../observability/logger';
import type { ReservationStore } from '../persistence/types';
import { fieldsNeedingClarification } from './clarification';
import { syncTopic } from './topic';

export const SPECIAL_REQUEST_REJECTED = 'special_request_rejected';
export const SAVE_FAILED_MARKER = 'save-failed';

/**
 * Fields staff must have repeated back before a confirmation counts. Narrower
 * than the seven flags behind `allRequiredConfirmed`; both checks are kept
 * as they are.
 */
export const POST_CONFIRMATION_FIELDS: readonly ReservationField[] = [
  'date',
  'time',
  'partySize',
  'specialRequests',
];

export interface TransitionDeps {
  store: ReservationStore;
  logger?: Logger;
}

/** Working copy with the guest's reply already on the transcript. */
function beginTransition(state: SessionState, reply: string): SessionState {
  const next = cloneState(state);
  pushTurn(next, 'agent', reply);
  return next;
}

function copyField<F extends ReservationField>(
  target: ReservationDetails,
  source: ReservationDetails,
  field: F
): void {
  target[field] = source[field];
}

function mergeReservation(
  base: ReservationDetails,
  update: ReservationDetails
): ReservationDetails {
  const merged = { ...base };
  for (const field of CONFIRMATION_PRIORITY) {
    if (update[field] !== null) {
      copyField(merged, update, field);
    }
  }
  return merged;
}

export function handleGreeting(state: SessionState, result: GreetingResult): SessionState {
  const next = beginTransition(state, result.reply);
  next.workflow.stage = WorkflowStage.SHARE_PREFERENCES;
  next.scratchpad.pendingQuestions = [];
  syncTopic(next);
  return next;
}

export function handleAvailability(state: SessionState, result: AvailabilityResult): SessionState {
  const next = beginTransition(state, result.reply);
  const { workflow, scratchpad } = next;

  workflow.availabilityStatus = result.availabilityStatus;
  workflow.selectedSlotNote = result.selectedSlotNote;
  scratchpad.pendingQuestions = [...result.pendingQuestions];

  if (result.specialRequestRejected) {
    // Dead end: the restaurant cannot meet the request, so there is nothing to recover to.
    workflow.stage = WorkflowStage.WRAP_UP;
    workflow.blockingIssue = SPECIAL_REQUEST_REJECTED;
    scratchpad.proposedAlternatives = [];
    next.episodic.events.push('Staff rejected the special request; ending the negotiation.');
    syncTopic(next);
    return next;
  }

  if (result.suggestedAlternatives.length > 0) {
    scratchpad.proposedAlternatives = result.suggestedAlternatives.map((description) => ({
      description,
      notes: null,
      accepted: false,
    }));
  } else if (result.availabilityStatus === AvailabilityStatus.SLOT_ACCEPTED) {
    scratchpad.proposedAlternatives = [];
  }

  switch (result.availabilityStatus) {
    case AvailabilityStatus.SLOT_ACCEPTED:
      workflow.confirmedFields.date = true;
      workflow.confirmedFields.time = true;
      workflow.stage = WorkflowStage.PROVIDE_CONTACT;
      break;
    case AvailabilityStatus.WAITING_ON_STAFF:
      workflow.stage = WorkflowStage.AWAIT_AVAILABILITY;
      break;
    case AvailabilityStatus.ALTERNATIVES_OFFERED:
    case AvailabilityStatus.DECLINED:
      workflow.stage = WorkflowStage.REVIEW_ALTERNATIVES;
      break;
    default:
      workflow.stage = WorkflowStage.SHARE_PREFERENCES;
  }

  syncTopic(next);
  return next;
}

/**
 * Marks every field staff acknowledged in this turn. Flags only ever flip
 * from false to true here; the clarification path is the one place that
 * clears them.
 */
export function handleDetails(state: SessionState, result: DetailsResult): SessionState {
  const next = beginTransition(state, result.reply);
  const { workflow, scratchpad, goal } = next;

  const payload: ReservationDetails = {
    ...result.reservationDetails,
    contactName: result.reservationDetails.contactName ?? (goal.guestName || null),
    contactPhone: result.reservationDetails.contactPhone ?? (goal.guestPhone || null),
  };

  for (const field of CONFIRMATION_PRIORITY) {
    if (payload[field] !== null && !workflow.confirmedFields[field]) {
      workflow.confirmedFields[field] = true;
      copyField(scratchpad.confirmedReservation, payload, field);
    }
  }

  if (allRequiredConfirmed(workflow.confirmedFields)) {
    scratchpad.pendingQuestions = [];
    workflow.missingExplicitConfirmations = [];
    // A fresh confirmation round starts; leaving NEEDS_CLARIFICATION here keeps
    // the coordinator from routing straight back to details collection.
    workflow.confirmationStatus = ConfirmationStatus.PENDING;
    workflow.stage = result.needsMenuDialog
      ? WorkflowStage.MENU_DISCUSSION
      : WorkflowStage.AWAIT_CONFIRMATION;
  } else {
    workflow.stage = WorkflowStage.PROVIDE_CONTACT;
  }

  syncTopic(next);
  return next;
}

export function handleMenu(state: SessionState, result: MenuResult): SessionState {
  const next = beginTransition(state, result.reply);
  next.scratchpad.menuPreferences = {
    ...result.menuPreferences,
    highlights: [...result.menuPreferences.highlights],
  };
  next.workflow.stage = result.nextStage;
  syncTopic(next);
  return next;
}

export function handleConfirmation(state: SessionState, result: ConfirmationResult): SessionState {
  const next = beginTransition(state, result.reply);
  const { workflow, scratchpad } = next;

  workflow.confirmationStatus = result.confirmationStatus;
  workflow.blockingIssue =
    result.confirmationStatus === ConfirmationStatus.PENDING ? result.errorMessage : null;
  if (result.bookingReference) {
    workflow.selectedSlotNote = result.bookingReference;
  }

  switch (result.confirmationStatus) {
    case ConfirmationStatus.CONFIRMED_BY_STAFF: {
      const confirmed = mergeReservation(
        scratchpad.confirmedReservation,
        result.confirmedReservation
      );
      scratchpad.confirmedReservation = confirmed;

      const missing = POST_CONFIRMATION_FIELDS.filter((field) => confirmed[field] === null);
      if (missing.length > 0) {
        // Staff said yes without repeating everything back; keep asking.
        workflow.confirmationStatus = ConfirmationStatus.PENDING;
        workflow.missingExplicitConfirmations = missing;
        workflow.stage = WorkflowStage.AWAIT_CONFIRMATION;
      } else {
        markAllConfirmed(workflow.confirmedFields);
        workflow.missingExplicitConfirmations = [];
        scratchpad.pendingQuestions = [];
        workflow.stage = WorkflowStage.SAVE_DATA;
      }
      break;
    }
    case ConfirmationStatus.NEEDS_CLARIFICATION:
      workflow.stage = WorkflowStage.PROVIDE_CONTACT;
      scratchpad.pendingQuestions = result.errorMessage ? [result.errorMessage] : [];
      for (const field of fieldsNeedingClarification(result.errorMessage)) {
        workflow.confirmedFields[field] = false;
      }
      break;
    default:
      workflow.stage = WorkflowStage.AWAIT_CONFIRMATION;
  }

  syncTopic(next);
  return next;
}

export function handleAlternative(state: SessionState, result: AlternativeResult): SessionState {
  const next = beginTransition(state, result.reply);
  const { workflow, scratchpad } = next;

  if (result.alternativeSelected && result.acceptedSlotDescription) {
    workflow.availabilityStatus = AvailabilityStatus.SLOT_ACCEPTED;
    workflow.selectedSlotNote = result.acceptedSlotDescription;
    workflow.confirmedFields.date = true;
    workflow.confirmedFields.time = true;
    scratchpad.proposedAlternatives = [
      { description: result.acceptedSlotDescription, notes: 'accepted by guest', accepted: true },
    ];
    workflow.stage = WorkflowStage.PROVIDE_CONTACT;
    next.episodic.events.push(`Accepted alternative slot: ${result.acceptedSlotDescription}`);
  } else {
    workflow.availabilityStatus = AvailabilityStatus.ALTERNATIVES_OFFERED;
    workflow.stage = result.shouldEndConversation
      ? WorkflowStage.END
      : WorkflowStage.AWAIT_AVAILABILITY;
  }

  syncTopic(next);
  return next;
}

export function handleErrorRecovery(state: SessionState, result: ErrorRecoveryResult): SessionState {
  const next = beginTransition(state, result.reply);
  next.workflow.blockingIssue = null;
  next.workflow.confirmationStatus = ConfirmationStatus.PENDING;
  next.workflow.stage = result.resetStage;
  syncTopic(next);
  return next;
}

/**
 * Persists the confirmed booking and closes the conversation. A store
 * failure is recorded as a `save-failed: <reason>` marker; it never aborts
 * the session.
 */
export async function handleSaveReservation(
  state: SessionState,
  result: SaveReservationResult,
  deps: TransitionDeps
): Promise<SessionState> {
  const next = beginTransition(state, result.reply);
  const logger = deps.logger ?? noopLogger;

  if (result.followUpNeeded) {
    next.workflow.stage = WorkflowStage.AWAIT_CONFIRMATION;
    syncTopic(next);
    return next;
  }

  next.workflow.stage = WorkflowStage.WRAP_UP;
  syncTopic(next);

  try {
    const location = await deps.store.save(cloneState(next));
    next.workflow.savedFilePath = location;
    next.episodic.events.push(`Reservation saved to ${location}`);
  } catch (error) {
    const reason = toErrorMessage(error);
    next.workflow.savedFilePath = `${SAVE_FAILED_MARKER}: ${reason}`;
    next.episodic.events.push(`Saving the reservation failed: ${reason}`);
    logger.log?.('warn', 'Reservation could not be saved', { reason });
  }

  return next;
}
