import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { AvailabilityStatus, ConfirmationStatus, WorkflowStage } from '../memory/enums';
import { ActionKind } from './kinds';
import { allActions, getAction } from './registry';
import { parseActionResult } from './schemas';

describe('parseActionResult', () => {
  it('should tag the result with its kind', () => {
    expect(parseActionResult(ActionKind.GREETING, { reply: 'Hello!' })).toEqual({
      kind: ActionKind.GREETING,
      reply: 'Hello!',
    });
  });

  it('should fill availability defaults', () => {
    expect(parseActionResult(ActionKind.AVAILABILITY, { reply: 'Hi' })).toEqual({
      kind: ActionKind.AVAILABILITY,
      reply: 'Hi',
      availabilityStatus: AvailabilityStatus.UNKNOWN,
      suggestedAlternatives: [],
      selectedSlotNote: null,
      pendingQuestions: [],
      specialRequestRejected: false,
    });
  });

  it('should fill nested reservation details with nulls', () => {
    const result = parseActionResult(ActionKind.DETAILS_COLLECTION, {
      reply: 'Two of us',
      reservationDetails: { partySize: 2 },
    });

    expect(result).toEqual({
      kind: ActionKind.DETAILS_COLLECTION,
      reply: 'Two of us',
      reservationDetails: {
        date: null,
        time: null,
        partySize: 2,
        occasion: null,
        specialRequests: null,
        contactName: null,
        contactPhone: null,
      },
      needsMenuDialog: false,
    });
  });

  it('should fill confirmation and menu defaults', () => {
    const confirmation = parseActionResult(ActionKind.CONFIRMATION, { reply: 'Ok' });
    const menu = parseActionResult(ActionKind.MENU_DISCUSSION, { reply: 'Ok' });

    expect(confirmation).toMatchObject({
      confirmationStatus: ConfirmationStatus.PENDING,
      bookingReference: null,
      errorMessage: null,
    });
    expect(menu).toMatchObject({
      menuPreferences: { requested: false, highlights: [], dietaryNotes: null },
      nextStage: WorkflowStage.AWAIT_CONFIRMATION,
    });
  });

  it('should default the error recovery reset stage', () => {
    expect(parseActionResult(ActionKind.ERROR_RECOVERY, { reply: 'Sorry' })).toEqual({
      kind: ActionKind.ERROR_RECOVERY,
      reply: 'Sorry',
      resetStage: WorkflowStage.SHARE_PREFERENCES,
    });
  });

  it('should reject a result without a reply', () => {
    expect(() => parseActionResult(ActionKind.SAVE_RESERVATION, {})).toThrow(ZodError);
  });

  it.each([
    ['date', { date: '11/03/2026' }],
    ['time', { time: '7pm' }],
    ['party size', { partySize: 0 }],
    ['party size', { partySize: 17 }],
  ])('should reject a malformed %s', (_field, reservationDetails) => {
    expect(() =>
      parseActionResult(ActionKind.DETAILS_COLLECTION, { reply: 'x', reservationDetails })
    ).toThrow(ZodError);
  });

  it('should reject an unknown stage', () => {
    expect(() =>
      parseActionResult(ActionKind.ERROR_RECOVERY, { reply: 'x', resetStage: 'lunch' })
    ).toThrow(ZodError);
  });
});

describe('action registry', () => {
  it('should define one action per kind', () => {
    expect(allActions().map((action) => action.kind)).toEqual(Object.values(ActionKind));
  });

  it('should name prompts after the action', () => {
    expect(getAction(ActionKind.ERROR_RECOVERY).promptId).toBe('error-recovery');
    expect(getAction(ActionKind.DETAILS_COLLECTION).promptId).toBe('details');
  });

  it('should expose the result schema', () => {
    const schema = getAction(ActionKind.SAVE_RESERVATION).schema;

    expect(schema.parse({ reply: 'Bye' })).toEqual({ reply: 'Bye', followUpNeeded: false });
  });
});
