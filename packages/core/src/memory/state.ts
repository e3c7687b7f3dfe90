import cloneDeep from 'lodash/cloneDeep';

import { createConfirmedFields } from './confirmed-fields';
import { DEFAULT_IDENTITY, defaultDesiredReservation } from './defaults';
import {
  AvailabilityStatus,
  ConfirmationStatus,
  DiscussionTopic,
  WorkflowStage,
} from './enums';
import type {
  GoalFacts,
  GoalFactsInput,
  Identity,
  ReservationDetails,
  SessionState,
  Speaker,
} from './types';

export interface CreateStateOptions {
  identity?: Partial<Identity>;
  /** Reference clock for the default desired date. */
  now?: Date;
}

export function emptyReservation(): ReservationDetails {
  return {
    date: null,
    time: null,
    partySize: null,
    occasion: null,
    specialRequests: null,
    contactName: null,
    contactPhone: null,
  };
}

function resolveGoalFacts(input: GoalFactsInput, now: Date): GoalFacts {
  return {
    restaurantName: input.restaurantName ?? '',
    guestName: input.guestName ?? '',
    guestPhone: input.guestPhone ?? '',
    celebrationReason: input.celebrationReason ?? '',
    favoriteDishes: [...(input.favoriteDishes ?? [])],
    dietaryNotes: input.dietaryNotes ?? '',
    talkingPoints: [...(input.talkingPoints ?? [])],
    desiredReservation: { ...defaultDesiredReservation(now), ...input.desiredReservation },
    fallbackSlots: [...(input.fallbackSlots ?? [])],
  };
}

/**
 * Builds the memory tree for a new session. The goal reservation scratchpad
 * entry is derived from the goal facts so later confirmations can be compared
 * against what the guest originally asked for.
 */
export function createInitialState(
  goalInput: GoalFactsInput = {},
  options: CreateStateOptions = {}
): SessionState {
  const goal = resolveGoalFacts(goalInput, options.now ?? new Date());
  const desired = goal.desiredReservation;

  return {
    identity: { ...DEFAULT_IDENTITY, ...options.identity },
    goal,
    episodic: { events: [] },
    workflow: {
      stage: WorkflowStage.INTRO,
      availabilityStatus: AvailabilityStatus.UNKNOWN,
      confirmationStatus: ConfirmationStatus.PENDING,
      confirmedFields: createConfirmedFields(),
      missingExplicitConfirmations: [],
      blockingIssue: null,
      selectedSlotNote: null,
      savedFilePath: null,
      currentTopic: DiscussionTopic.GREETING,
    },
    scratchpad: {
      turns: [],
      lastIncomingMessage: null,
      lastOutgoingMessage: null,
      goalReservation: {
        date: desired.date,
        time: desired.time,
        partySize: desired.partySize,
        occasion: desired.occasion,
        specialRequests: desired.specialRequests,
        contactName: goal.guestName,
        contactPhone: goal.guestPhone,
      },
      confirmedReservation: emptyReservation(),
      menuPreferences: { requested: false, highlights: [], dietaryNotes: null },
      proposedAlternatives: [],
      pendingQuestions: [],
    },
  };
}

/**
 * Deep copy used as a handler's private working copy.
 */
export function cloneState(state: SessionState): SessionState {
  return cloneDeep(state);
}

/**
 * In-place append on a working copy. Handlers use this; everything else goes
 * through {@link appendTurn}.
 *
 * @internal
 */
export function pushTurn(state: SessionState, speaker: Speaker, message: string): void {
  state.scratchpad.turns.push({ speaker, message });
  if (speaker === 'staff') {
    state.scratchpad.lastIncomingMessage = message;
  } else {
    state.scratchpad.lastOutgoingMessage = message;
  }
}

/**
 * Returns a new snapshot with one more transcript entry. Identical messages
 * are appended again; the transcript is never deduplicated.
 */
export function appendTurn(state: SessionState, speaker: Speaker, message: string): SessionState {
  const next = cloneState(state);
  pushTurn(next, speaker, message);
  return next;
}

export function recordIncomingTurn(state: SessionState, message: string): SessionState {
  return appendTurn(state, 'staff', message);
}
