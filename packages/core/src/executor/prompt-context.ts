import { CONFIRMATION_PRIORITY } from '../memory/confirmed-fields';
import type { ConversationTurn, ReservationDetails, SessionState } from '../memory/types';

type ReservationText = { [F in keyof ReservationDetails]: string };

/**
 * Flat view of the session handed to prompt templates. Every value is
 * present (empty string instead of null) because templates render in strict
 * mode.
 */
export interface PromptContext {
  agentName: string;
  persona: string;
  languages: string[];
  corePrinciples: string[];
  restaurantName: string;
  guestName: string;
  guestPhone: string;
  celebrationReason: string;
  favoriteDishes: string[];
  dietaryNotes: string;
  talkingPoints: string[];
  fallbackSlots: string[];
  goal: ReservationText;
  confirmed: ReservationText;
  stage: string;
  topic: string;
  availabilityStatus: string;
  confirmationStatus: string;
  selectedSlotNote: string;
  blockingIssue: string;
  unconfirmedFields: string[];
  missingConfirmations: string[];
  alternatives: string[];
  pendingQuestions: string[];
  menuHighlights: string[];
  transcript: ConversationTurn[];
  incomingMessage: string;
  actionDescription: string;
}

function toText(details: ReservationDetails): ReservationText {
  return {
    date: details.date ?? '',
    time: details.time ?? '',
    partySize: details.partySize === null ? '' : String(details.partySize),
    occasion: details.occasion ?? '',
    specialRequests: details.specialRequests ?? '',
    contactName: details.contactName ?? '',
    contactPhone: details.contactPhone ?? '',
  };
}

export function buildPromptContext(
  state: SessionState,
  incomingMessage: string,
  actionDescription: string
): PromptContext {
  const { identity, goal, workflow, scratchpad } = state;

  return {
    agentName: identity.agentName,
    persona: identity.persona,
    languages: [...identity.languages],
    corePrinciples: [...identity.corePrinciples],
    restaurantName: goal.restaurantName,
    guestName: goal.guestName,
    guestPhone: goal.guestPhone,
    celebrationReason: goal.celebrationReason,
    favoriteDishes: [...goal.favoriteDishes],
    dietaryNotes: goal.dietaryNotes,
    talkingPoints: [...goal.talkingPoints],
    fallbackSlots: [...goal.fallbackSlots],
    goal: toText(scratchpad.goalReservation),
    confirmed: toText(scratchpad.confirmedReservation),
    stage: workflow.stage,
    topic: workflow.currentTopic,
    availabilityStatus: workflow.availabilityStatus,
    confirmationStatus: workflow.confirmationStatus,
    selectedSlotNote: workflow.selectedSlotNote ?? '',
    blockingIssue: workflow.blockingIssue ?? '',
    unconfirmedFields: CONFIRMATION_PRIORITY.filter((field) => !workflow.confirmedFields[field]),
    missingConfirmations: [...workflow.missingExplicitConfirmations],
    alternatives: scratchpad.proposedAlternatives.map((alt) => alt.description),
    pendingQuestions: [...scratchpad.pendingQuestions],
    menuHighlights: [...scratchpad.menuPreferences.highlights],
    transcript: scratchpad.turns.map((turn) => ({ ...turn })),
    incomingMessage,
    actionDescription,
  };
}
