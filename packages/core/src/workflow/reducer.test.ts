import { describe, it, expect, vi } from 'vitest';
import { ActionKind } from '../actions/kinds';
import { parseActionResult } from '../actions/schemas';
import { markAllConfirmed } from '../memory/confirmed-fields';
import {
  AvailabilityStatus,
  ConfirmationStatus,
  DiscussionTopic,
  WorkflowStage,
} from '../memory/enums';
import { cloneState, createInitialState } from '../memory/state';
import type { SessionState } from '../memory/types';
import { createMemoryStore } from '../testing/doubles';
import { applyActionResult } from './reducer';
import { SAVE_FAILED_MARKER, SPECIAL_REQUEST_REJECTED } from './transitions';

const NOW = new Date('2026-03-10T12:00:00Z');

function sessionAt(stage: WorkflowStage, mutate?: (state: SessionState) => void): SessionState {
  const state = cloneState(
    createInitialState(
      { guestName: 'Anna Nowak', guestPhone: '+48 600 000 000', restaurantName: 'Trattoria Test' },
      { now: NOW }
    )
  );
  state.workflow.stage = stage;
  mutate?.(state);
  return state;
}

function apply(state: SessionState, kind: ActionKind, raw: Record<string, unknown>) {
  return applyActionResult(state, parseActionResult(kind, raw), { store: createMemoryStore() });
}

describe('applyActionResult', () => {
  it('should never modify the input snapshot', async () => {
    const state = sessionAt(WorkflowStage.PROVIDE_CONTACT);
    const before = JSON.stringify(state);

    const next = await apply(state, ActionKind.DETAILS_COLLECTION, {
      reply: 'We are two.',
      reservationDetails: { partySize: 2 },
    });

    expect(JSON.stringify(state)).toBe(before);
    expect(next).not.toBe(state);
  });

  it('should append the reply as an agent turn', async () => {
    const next = await apply(sessionAt(WorkflowStage.INTRO), ActionKind.GREETING, {
      reply: 'Good evening!',
    });

    expect(next.scratchpad.turns).toEqual([{ speaker: 'agent', message: 'Good evening!' }]);
    expect(next.scratchpad.lastOutgoingMessage).toBe('Good evening!');
  });

  describe('greeting', () => {
    it('should move to sharing preferences and clear pending questions', async () => {
      const state = sessionAt(WorkflowStage.INTRO, (s) => {
        s.scratchpad.pendingQuestions = ['For when?'];
      });

      const next = await apply(state, ActionKind.GREETING, { reply: 'Hello!' });

      expect(next.workflow.stage).toBe(WorkflowStage.SHARE_PREFERENCES);
      expect(next.scratchpad.pendingQuestions).toEqual([]);
      expect(next.workflow.currentTopic).toBe(DiscussionTopic.CONFIRMING_AVAILABILITY);
    });
  });

  describe('availability', () => {
    it('should confirm date and time when the slot is accepted', async () => {
      const next = await apply(sessionAt(WorkflowStage.SHARE_PREFERENCES), ActionKind.AVAILABILITY, {
        reply: 'Wonderful, thank you.',
        availabilityStatus: AvailabilityStatus.SLOT_ACCEPTED,
        selectedSlotNote: 'Wednesday 19:00, table 4',
        pendingQuestions: ['How many guests?'],
      });

      expect(next.workflow.stage).toBe(WorkflowStage.PROVIDE_CONTACT);
      expect(next.workflow.availabilityStatus).toBe(AvailabilityStatus.SLOT_ACCEPTED);
      expect(next.workflow.confirmedFields.date).toBe(true);
      expect(next.workflow.confirmedFields.time).toBe(true);
      expect(next.workflow.selectedSlotNote).toBe('Wednesday 19:00, table 4');
      expect(next.scratchpad.pendingQuestions).toEqual(['How many guests?']);
      expect(next.workflow.currentTopic).toBe(DiscussionTopic.CONFIRMING_PARTY_SIZE);
    });

    it('should store offered alternatives and review them', async () => {
      const next = await apply(sessionAt(WorkflowStage.SHARE_PREFERENCES), ActionKind.AVAILABILITY, {
        reply: 'Let me think.',
        availabilityStatus: AvailabilityStatus.ALTERNATIVES_OFFERED,
        suggestedAlternatives: ['18:00', '21:30'],
      });

      expect(next.workflow.stage).toBe(WorkflowStage.REVIEW_ALTERNATIVES);
      expect(next.scratchpad.proposedAlternatives).toEqual([
        { description: '18:00', notes: null, accepted: false },
        { description: '21:30', notes: null, accepted: false },
      ]);
    });

    it('should review alternatives when the slot is declined', async () => {
      const next = await apply(sessionAt(WorkflowStage.SHARE_PREFERENCES), ActionKind.AVAILABILITY, {
        reply: 'Oh, I see.',
        availabilityStatus: AvailabilityStatus.DECLINED,
      });

      expect(next.workflow.stage).toBe(WorkflowStage.REVIEW_ALTERNATIVES);
    });

    it('should keep waiting while staff checks', async () => {
      const next = await apply(sessionAt(WorkflowStage.SHARE_PREFERENCES), ActionKind.AVAILABILITY, {
        reply: 'Sure, I can wait.',
        availabilityStatus: AvailabilityStatus.WAITING_ON_STAFF,
      });

      expect(next.workflow.stage).toBe(WorkflowStage.AWAIT_AVAILABILITY);
    });

    it('should go back to sharing preferences when the answer is unclear', async () => {
      const next = await apply(sessionAt(WorkflowStage.AWAIT_AVAILABILITY), ActionKind.AVAILABILITY, {
        reply: 'Sorry, could you say that again?',
      });

      expect(next.workflow.stage).toBe(WorkflowStage.SHARE_PREFERENCES);
    });

    it('should end the negotiation when the special request is rejected', async () => {
      const state = sessionAt(WorkflowStage.SHARE_PREFERENCES, (s) => {
        s.scratchpad.proposedAlternatives = [{ description: '18:00', notes: null, accepted: false }];
      });

      const next = await apply(state, ActionKind.AVAILABILITY, {
        reply: 'That is a pity, thank you anyway.',
        availabilityStatus: AvailabilityStatus.SLOT_ACCEPTED,
        specialRequestRejected: true,
      });

      expect(next.workflow.stage).toBe(WorkflowStage.WRAP_UP);
      expect(next.workflow.blockingIssue).toBe(SPECIAL_REQUEST_REJECTED);
      expect(next.scratchpad.proposedAlternatives).toEqual([]);
      expect(next.workflow.confirmedFields.date).toBe(false);
      expect(next.episodic.events).toHaveLength(1);
    });
  });

  describe('details collection', () => {
    it('should confirm only the fields present in the result', async () => {
      const next = await apply(sessionAt(WorkflowStage.PROVIDE_CONTACT), ActionKind.DETAILS_COLLECTION, {
        reply: 'There will be two of us.',
        reservationDetails: { partySize: 2 },
      });

      // Contact defaults come from the guest facts.
      expect(next.workflow.confirmedFields).toEqual({
        date: false,
        time: false,
        partySize: true,
        occasion: false,
        specialRequests: false,
        contactName: true,
        contactPhone: true,
      });
      expect(next.scratchpad.confirmedReservation.partySize).toBe(2);
      expect(next.scratchpad.confirmedReservation.contactName).toBe('Anna Nowak');
      expect(next.workflow.stage).toBe(WorkflowStage.PROVIDE_CONTACT);
      expect(next.workflow.currentTopic).toBe(DiscussionTopic.CONFIRMING_OCCASION);
    });

    it('should not default contact fields when the guest has none', async () => {
      const state = cloneState(createInitialState({}, { now: NOW }));
      state.workflow.stage = WorkflowStage.PROVIDE_CONTACT;

      const next = await apply(state, ActionKind.DETAILS_COLLECTION, {
        reply: 'Two people.',
        reservationDetails: { partySize: 2 },
      });

      expect(next.workflow.confirmedFields.partySize).toBe(true);
      expect(next.workflow.confirmedFields.contactName).toBe(false);
      expect(next.workflow.stage).toBe(WorkflowStage.PROVIDE_CONTACT);
      expect(next.workflow.currentTopic).toBe(DiscussionTopic.CONFIRMING_CONTACT_DETAILS);
    });

    it('should never overwrite an already confirmed value', async () => {
      const state = sessionAt(WorkflowStage.PROVIDE_CONTACT, (s) => {
        s.workflow.confirmedFields.partySize = true;
        s.scratchpad.confirmedReservation.partySize = 4;
      });

      const next = await apply(state, ActionKind.DETAILS_COLLECTION, {
        reply: 'Two people.',
        reservationDetails: { partySize: 2 },
      });

      expect(next.scratchpad.confirmedReservation.partySize).toBe(4);
    });

    it('should move to confirmation once all fields are confirmed', async () => {
      const state = sessionAt(WorkflowStage.PROVIDE_CONTACT, (s) => {
        s.workflow.confirmationStatus = ConfirmationStatus.NEEDS_CLARIFICATION;
        s.workflow.missingExplicitConfirmations = ['date'];
        s.scratchpad.pendingQuestions = ['What date?'];
      });

      const next = await apply(state, ActionKind.DETAILS_COLLECTION, {
        reply: 'Here are all the details.',
        reservationDetails: {
          date: '2026-03-11',
          time: '19:00',
          partySize: 2,
          occasion: 'birthday',
          specialRequests: 'none',
        },
      });

      expect(next.workflow.stage).toBe(WorkflowStage.AWAIT_CONFIRMATION);
      expect(next.workflow.confirmationStatus).toBe(ConfirmationStatus.PENDING);
      expect(next.workflow.missingExplicitConfirmations).toEqual([]);
      expect(next.scratchpad.pendingQuestions).toEqual([]);
      expect(next.workflow.currentTopic).toBe(DiscussionTopic.CONFIRMATION);
    });

    it('should detour into the menu when requested', async () => {
      const state = sessionAt(WorkflowStage.PROVIDE_CONTACT, (s) => {
        markAllConfirmed(s.workflow.confirmedFields);
      });

      const next = await apply(state, ActionKind.DETAILS_COLLECTION, {
        reply: 'Could I ask about the menu?',
        needsMenuDialog: true,
      });

      expect(next.workflow.stage).toBe(WorkflowStage.MENU_DISCUSSION);
    });
  });

  describe('menu discussion', () => {
    it('should store preferences and follow the requested stage', async () => {
      const next = await apply(sessionAt(WorkflowStage.MENU_DISCUSSION), ActionKind.MENU_DISCUSSION, {
        reply: 'The risotto sounds lovely.',
        menuPreferences: { requested: true, highlights: ['risotto'], dietaryNotes: 'no nuts' },
        nextStage: WorkflowStage.PROVIDE_CONTACT,
      });

      expect(next.scratchpad.menuPreferences).toEqual({
        requested: true,
        highlights: ['risotto'],
        dietaryNotes: 'no nuts',
      });
      expect(next.workflow.stage).toBe(WorkflowStage.PROVIDE_CONTACT);
    });

    it('should default to awaiting confirmation', async () => {
      const next = await apply(sessionAt(WorkflowStage.MENU_DISCUSSION), ActionKind.MENU_DISCUSSION, {
        reply: 'Thanks for the tips.',
      });

      expect(next.workflow.stage).toBe(WorkflowStage.AWAIT_CONFIRMATION);
    });
  });

  describe('confirmation', () => {
    it('should downgrade a confirmation that did not repeat the date', async () => {
      const next = await apply(sessionAt(WorkflowStage.AWAIT_CONFIRMATION), ActionKind.CONFIRMATION, {
        reply: 'Could you confirm the date as well?',
        confirmationStatus: ConfirmationStatus.CONFIRMED_BY_STAFF,
        confirmedReservation: { time: '19:00', partySize: 2, specialRequests: 'none' },
      });

      expect(next.workflow.confirmationStatus).toBe(ConfirmationStatus.PENDING);
      expect(next.workflow.stage).toBe(WorkflowStage.AWAIT_CONFIRMATION);
      expect(next.workflow.missingExplicitConfirmations).toEqual(['date']);
    });

    it('should move to saving when every checked field is known', async () => {
      const state = sessionAt(WorkflowStage.AWAIT_CONFIRMATION, (s) => {
        s.scratchpad.confirmedReservation.date = '2026-03-11';
        s.scratchpad.pendingQuestions = ['Anything else?'];
      });

      const next = await apply(state, ActionKind.CONFIRMATION, {
        reply: 'Perfect, thank you!',
        confirmationStatus: ConfirmationStatus.CONFIRMED_BY_STAFF,
        bookingReference: 'REF-42',
        confirmedReservation: { time: '19:00', partySize: 2, specialRequests: 'none' },
      });

      expect(next.workflow.stage).toBe(WorkflowStage.SAVE_DATA);
      expect(next.workflow.confirmationStatus).toBe(ConfirmationStatus.CONFIRMED_BY_STAFF);
      expect(next.workflow.selectedSlotNote).toBe('REF-42');
      expect(Object.values(next.workflow.confirmedFields).every(Boolean)).toBe(true);
      expect(next.scratchpad.confirmedReservation.date).toBe('2026-03-11');
      expect(next.scratchpad.pendingQuestions).toEqual([]);
      expect(next.workflow.currentTopic).toBe(DiscussionTopic.CLOSING);
    });

    it('should unconfirm fields named in a clarification request', async () => {
      const state = sessionAt(WorkflowStage.AWAIT_CONFIRMATION, (s) => {
        markAllConfirmed(s.workflow.confirmedFields);
      });

      const next = await apply(state, ActionKind.CONFIRMATION, {
        reply: 'Of course.',
        confirmationStatus: ConfirmationStatus.NEEDS_CLARIFICATION,
        errorMessage: 'Please repeat the phone number',
      });

      expect(next.workflow.stage).toBe(WorkflowStage.PROVIDE_CONTACT);
      expect(next.workflow.confirmedFields.contactPhone).toBe(false);
      expect(next.workflow.confirmedFields.date).toBe(true);
      expect(next.scratchpad.pendingQuestions).toEqual(['Please repeat the phone number']);
      expect(next.workflow.blockingIssue).toBeNull();
      expect(next.workflow.currentTopic).toBe(DiscussionTopic.CONFIRMING_CONTACT_DETAILS);
    });

    it('should record a blocking issue from a pending result with an error', async () => {
      const next = await apply(sessionAt(WorkflowStage.AWAIT_CONFIRMATION), ActionKind.CONFIRMATION, {
        reply: 'Oh no.',
        errorMessage: 'The booking system is down',
      });

      expect(next.workflow.blockingIssue).toBe('The booking system is down');
      expect(next.workflow.stage).toBe(WorkflowStage.AWAIT_CONFIRMATION);
      expect(next.workflow.currentTopic).toBe(DiscussionTopic.ERROR_RECOVERY);
    });
  });

  describe('alternative evaluation', () => {
    it('should accept the chosen alternative', async () => {
      const state = sessionAt(WorkflowStage.REVIEW_ALTERNATIVES, (s) => {
        s.scratchpad.proposedAlternatives = [
          { description: 'tomorrow 8pm', notes: null, accepted: false },
          { description: 'Friday 6pm', notes: null, accepted: false },
        ];
      });

      const next = await apply(state, ActionKind.ALTERNATIVE, {
        reply: 'Tomorrow at 8pm works for us.',
        alternativeSelected: true,
        acceptedSlotDescription: 'tomorrow 8pm',
      });

      expect(next.workflow.confirmedFields.date).toBe(true);
      expect(next.workflow.confirmedFields.time).toBe(true);
      expect(next.scratchpad.proposedAlternatives).toEqual([
        { description: 'tomorrow 8pm', notes: 'accepted by guest', accepted: true },
      ]);
      expect(next.workflow.stage).toBe(WorkflowStage.PROVIDE_CONTACT);
      expect(next.workflow.availabilityStatus).toBe(AvailabilityStatus.SLOT_ACCEPTED);
      expect(next.workflow.selectedSlotNote).toBe('tomorrow 8pm');
      expect(next.episodic.events).toEqual(['Accepted alternative slot: tomorrow 8pm']);
    });

    it('should treat a selection without a description as a refusal', async () => {
      const next = await apply(sessionAt(WorkflowStage.REVIEW_ALTERNATIVES), ActionKind.ALTERNATIVE, {
        reply: 'Hmm.',
        alternativeSelected: true,
      });

      expect(next.workflow.stage).toBe(WorkflowStage.AWAIT_AVAILABILITY);
      expect(next.workflow.availabilityStatus).toBe(AvailabilityStatus.ALTERNATIVES_OFFERED);
    });

    it('should end the conversation when asked to', async () => {
      const next = await apply(sessionAt(WorkflowStage.REVIEW_ALTERNATIVES), ActionKind.ALTERNATIVE, {
        reply: 'None of those work, thank you anyway.',
        shouldEndConversation: true,
      });

      expect(next.workflow.stage).toBe(WorkflowStage.END);
      expect(next.workflow.currentTopic).toBe(DiscussionTopic.NONE);
    });
  });

  describe('error recovery', () => {
    it('should clear the issue and restart from the requested stage', async () => {
      const state = sessionAt(WorkflowStage.AWAIT_CONFIRMATION, (s) => {
        s.workflow.blockingIssue = 'The booking system is down';
        s.workflow.confirmationStatus = ConfirmationStatus.NEEDS_CLARIFICATION;
      });

      const next = await apply(state, ActionKind.ERROR_RECOVERY, {
        reply: 'No problem, shall we try again?',
        resetStage: WorkflowStage.SHARE_PREFERENCES,
      });

      expect(next.workflow.blockingIssue).toBeNull();
      expect(next.workflow.confirmationStatus).toBe(ConfirmationStatus.PENDING);
      expect(next.workflow.stage).toBe(WorkflowStage.SHARE_PREFERENCES);
    });
  });

  describe('save reservation', () => {
    it('should save the booking and wrap up', async () => {
      const store = createMemoryStore();
      const state = sessionAt(WorkflowStage.SAVE_DATA);

      const next = await applyActionResult(
        state,
        parseActionResult(ActionKind.SAVE_RESERVATION, { reply: 'Thank you, goodbye!' }),
        { store }
      );

      expect(next.workflow.stage).toBe(WorkflowStage.WRAP_UP);
      expect(next.workflow.savedFilePath).toBe('memory://reservations/1');
      expect(store.saved).toHaveLength(1);
      expect(store.saved[0]?.workflow.stage).toBe(WorkflowStage.WRAP_UP);
      expect(store.saved[0]?.scratchpad.lastOutgoingMessage).toBe('Thank you, goodbye!');
      expect(next.episodic.events).toEqual(['Reservation saved to memory://reservations/1']);
    });

    it('should record a marker instead of failing when the store rejects', async () => {
      const log = vi.fn();
      const store = createMemoryStore({ failWith: new Error('disk full') });

      const next = await applyActionResult(
        sessionAt(WorkflowStage.SAVE_DATA),
        parseActionResult(ActionKind.SAVE_RESERVATION, { reply: 'Thank you!' }),
        { store, logger: { log } }
      );

      expect(next.workflow.stage).toBe(WorkflowStage.WRAP_UP);
      expect(next.workflow.savedFilePath).toBe(`${SAVE_FAILED_MARKER}: disk full`);
      expect(log).toHaveBeenCalledWith('warn', 'Reservation could not be saved', {
        reason: 'disk full',
      });
    });

    it('should wait for confirmation again when follow-up is needed', async () => {
      const store = createMemoryStore();

      const next = await applyActionResult(
        sessionAt(WorkflowStage.SAVE_DATA),
        parseActionResult(ActionKind.SAVE_RESERVATION, {
          reply: 'One more thing...',
          followUpNeeded: true,
        }),
        { store }
      );

      expect(next.workflow.stage).toBe(WorkflowStage.AWAIT_CONFIRMATION);
      expect(store.saved).toEqual([]);
      expect(next.workflow.savedFilePath).toBeNull();
    });
  });
});
