import type {
  AvailabilityStatus,
  ConfirmationStatus,
  DiscussionTopic,
  WorkflowStage,
} from './enums';

export type Speaker = 'staff' | 'agent';

export interface ConversationTurn {
  speaker: Speaker;
  message: string;
}

/**
 * Booking attributes. Every field starts out unknown (`null`).
 * `date` is an ISO calendar date, `time` is `HH:MM`, `partySize` is 1-16.
 */
export interface ReservationDetails {
  date: string | null;
  time: string | null;
  partySize: number | null;
  occasion: string | null;
  specialRequests: string | null;
  contactName: string | null;
  contactPhone: string | null;
}

export type ReservationField = keyof ReservationDetails;

export interface MenuPreferences {
  requested: boolean;
  highlights: string[];
  dietaryNotes: string | null;
}

/** A slot suggested by staff when the requested one is not available. */
export interface AlternativeOption {
  description: string;
  notes: string | null;
  accepted: boolean;
}

/** Static persona description and ground rules. */
export interface Identity {
  readonly agentName: string;
  readonly persona: string;
  readonly languages: readonly string[];
  readonly corePrinciples: readonly string[];
}

export interface DesiredReservation {
  date: string;
  time: string;
  partySize: number;
  occasion: string;
  specialRequests: string;
}

/**
 * Long-term goal knowledge. Set once when the session is created; the reducer
 * compares against it but never rewrites it.
 */
export interface GoalFacts {
  restaurantName: string;
  guestName: string;
  guestPhone: string;
  celebrationReason: string;
  favoriteDishes: string[];
  dietaryNotes: string;
  talkingPoints: string[];
  desiredReservation: DesiredReservation;
  fallbackSlots: string[];
}

export interface EpisodicLog {
  events: string[];
}

/** One flag per negotiable field, flipped once staff acknowledged it. */
export interface ConfirmedFields {
  date: boolean;
  time: boolean;
  partySize: boolean;
  occasion: boolean;
  specialRequests: boolean;
  contactName: boolean;
  contactPhone: boolean;
}

export type ConfirmableField = keyof ConfirmedFields;

/** The state-machine cursor. */
export interface WorkflowProgress {
  stage: WorkflowStage;
  availabilityStatus: AvailabilityStatus;
  confirmationStatus: ConfirmationStatus;
  confirmedFields: ConfirmedFields;
  missingExplicitConfirmations: ConfirmableField[];
  blockingIssue: string | null;
  selectedSlotNote: string | null;
  savedFilePath: string | null;
  currentTopic: DiscussionTopic;
}

export interface Scratchpad {
  turns: ConversationTurn[];
  lastIncomingMessage: string | null;
  lastOutgoingMessage: string | null;
  goalReservation: ReservationDetails;
  confirmedReservation: ReservationDetails;
  menuPreferences: MenuPreferences;
  proposedAlternatives: AlternativeOption[];
  pendingQuestions: string[];
}

/**
 * Root of one negotiation session. Snapshots are replaced wholesale on every
 * step and never mutated once handed out.
 */
export interface SessionState {
  identity: Identity;
  goal: GoalFacts;
  episodic: EpisodicLog;
  workflow: WorkflowProgress;
  scratchpad: Scratchpad;
}

export interface GoalFactsInput extends Partial<Omit<GoalFacts, 'desiredReservation'>> {
  desiredReservation?: Partial<DesiredReservation>;
}
