import { z } from 'zod';

import {
  AvailabilityStatus,
  ConfirmationStatus,
  WorkflowStage,
} from '../memory/enums';
import { ActionKind } from './kinds';

const optionalText = z.string().nullable().default(null);

export const reservationDetailsSchema = z.object({
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be YYYY-MM-DD')
    .nullable()
    .default(null),
  time: z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'time must be HH:MM')
    .nullable()
    .default(null),
  partySize: z.number().int().min(1).max(16).nullable().default(null),
  occasion: optionalText,
  specialRequests: optionalText,
  contactName: optionalText,
  contactPhone: optionalText,
});

export const menuPreferencesSchema = z.object({
  requested: z.boolean().default(false),
  highlights: z.array(z.string()).default([]),
  dietaryNotes: optionalText,
});

const baseResultSchema = z.object({
  reply: z.string().describe('What the guest says to staff on this turn'),
});

export const greetingResultSchema = baseResultSchema;

export const availabilityResultSchema = baseResultSchema.extend({
  availabilityStatus: z.nativeEnum(AvailabilityStatus).default(AvailabilityStatus.UNKNOWN),
  suggestedAlternatives: z.array(z.string()).default([]),
  selectedSlotNote: optionalText,
  pendingQuestions: z.array(z.string()).default([]),
  specialRequestRejected: z.boolean().default(false),
});

export const detailsResultSchema = baseResultSchema.extend({
  reservationDetails: reservationDetailsSchema.default({}),
  needsMenuDialog: z.boolean().default(false),
});

export const menuResultSchema = baseResultSchema.extend({
  menuPreferences: menuPreferencesSchema.default({}),
  nextStage: z.nativeEnum(WorkflowStage).default(WorkflowStage.AWAIT_CONFIRMATION),
});

export const confirmationResultSchema = baseResultSchema.extend({
  confirmationStatus: z.nativeEnum(ConfirmationStatus).default(ConfirmationStatus.PENDING),
  bookingReference: optionalText,
  errorMessage: optionalText,
  confirmedReservation: reservationDetailsSchema.default({}),
});

export const alternativeResultSchema = baseResultSchema.extend({
  alternativeSelected: z.boolean().default(false),
  acceptedSlotDescription: optionalText,
  shouldEndConversation: z.boolean().default(false),
});

export const errorRecoveryResultSchema = baseResultSchema.extend({
  resetStage: z.nativeEnum(WorkflowStage).default(WorkflowStage.SHARE_PREFERENCES),
});

export const saveReservationResultSchema = baseResultSchema.extend({
  followUpNeeded: z.boolean().default(false),
});

const RESULT_SCHEMAS = {
  [ActionKind.GREETING]: greetingResultSchema,
  [ActionKind.AVAILABILITY]: availabilityResultSchema,
  [ActionKind.DETAILS_COLLECTION]: detailsResultSchema,
  [ActionKind.MENU_DISCUSSION]: menuResultSchema,
  [ActionKind.CONFIRMATION]: confirmationResultSchema,
  [ActionKind.ALTERNATIVE]: alternativeResultSchema,
  [ActionKind.ERROR_RECOVERY]: errorRecoveryResultSchema,
  [ActionKind.SAVE_RESERVATION]: saveReservationResultSchema,
} as const;

/** Output shape (defaults applied) produced for one action kind. */
export type ActionOutput<K extends ActionKind> = z.output<(typeof RESULT_SCHEMAS)[K]>;

export type ActionResultSchema<K extends ActionKind> = z.ZodType<ActionOutput<K>, z.ZodTypeDef, unknown>;

export const ACTION_RESULT_SCHEMAS: { readonly [K in ActionKind]: ActionResultSchema<K> } =
  RESULT_SCHEMAS;

/**
 * Result of one action, tagged with its kind so the reducer can switch on it.
 */
export type ActionResultOf<K extends ActionKind> = { kind: K } & ActionOutput<K>;

export type GreetingResult = ActionResultOf<ActionKind.GREETING>;
export type AvailabilityResult = ActionResultOf<ActionKind.AVAILABILITY>;
export type DetailsResult = ActionResultOf<ActionKind.DETAILS_COLLECTION>;
export type MenuResult = ActionResultOf<ActionKind.MENU_DISCUSSION>;
export type ConfirmationResult = ActionResultOf<ActionKind.CONFIRMATION>;
export type AlternativeResult = ActionResultOf<ActionKind.ALTERNATIVE>;
export type ErrorRecoveryResult = ActionResultOf<ActionKind.ERROR_RECOVERY>;
export type SaveReservationResult = ActionResultOf<ActionKind.SAVE_RESERVATION>;

export type ActionResult =
  | GreetingResult
  | AvailabilityResult
  | DetailsResult
  | MenuResult
  | ConfirmationResult
  | AlternativeResult
  | ErrorRecoveryResult
  | SaveReservationResult;

function assertNever(value: never): never {
  throw new Error(`Unknown action kind: ${String(value)}`);
}

/**
 * Validates raw structured output for an action and tags it with the kind.
 *
 * @throws {z.ZodError} If the output does not match the action's contract
 */
export function parseActionResult(kind: ActionKind, raw: unknown): ActionResult {
  switch (kind) {
    case ActionKind.GREETING:
      return { ...greetingResultSchema.parse(raw), kind };
    case ActionKind.AVAILABILITY:
      return { ...availabilityResultSchema.parse(raw), kind };
    case ActionKind.DETAILS_COLLECTION:
      return { ...detailsResultSchema.parse(raw), kind };
    case ActionKind.MENU_DISCUSSION:
      return { ...menuResultSchema.parse(raw), kind };
    case ActionKind.CONFIRMATION:
      return { ...confirmationResultSchema.parse(raw), kind };
    case ActionKind.ALTERNATIVE:
      return { ...alternativeResultSchema.parse(raw), kind };
    case ActionKind.ERROR_RECOVERY:
      return { ...errorRecoveryResultSchema.parse(raw), kind };
    case ActionKind.SAVE_RESERVATION:
      return { ...saveReservationResultSchema.parse(raw), kind };
    default:
      return assertNever(kind);
  }
}
