export {
  WorkflowStage,
  AvailabilityStatus,
  ConfirmationStatus,
  DiscussionTopic,
} from './enums';

export type {
  Speaker,
  ConversationTurn,
  ReservationDetails,
  ReservationField,
  MenuPreferences,
  AlternativeOption,
  Identity,
  DesiredReservation,
  GoalFacts,
  GoalFactsInput,
  EpisodicLog,
  ConfirmedFields,
  ConfirmableField,
  WorkflowProgress,
  Scratchpad,
  SessionState,
} from './types';

export {
  CONFIRMATION_PRIORITY,
  createConfirmedFields,
  allRequiredConfirmed,
  firstUnconfirmedField,
} from './confirmed-fields';

export { DEFAULT_IDENTITY, defaultDesiredReservation } from './defaults';

export {
  createInitialState,
  emptyReservation,
  cloneState,
  appendTurn,
  recordIncomingTurn,
  type CreateStateOptions,
} from './state';
