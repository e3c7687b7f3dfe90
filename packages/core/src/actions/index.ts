export { ActionKind } from './kinds';

export {
  reservationDetailsSchema,
  menuPreferencesSchema,
  greetingResultSchema,
  availabilityResultSchema,
  detailsResultSchema,
  menuResultSchema,
  confirmationResultSchema,
  alternativeResultSchema,
  errorRecoveryResultSchema,
  saveReservationResultSchema,
  ACTION_RESULT_SCHEMAS,
  parseActionResult,
  type ActionOutput,
  type ActionResultSchema,
  type ActionResultOf,
  type ActionResult,
  type GreetingResult,
  type AvailabilityResult,
  type DetailsResult,
  type MenuResult,
  type ConfirmationResult,
  type AlternativeResult,
  type ErrorRecoveryResult,
  type SaveReservationResult,
} from './schemas';

export { getAction, allActions, type ActionDefinition } from './registry';
