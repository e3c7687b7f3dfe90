import type { DesiredReservation, Identity } from './types';

export const DEFAULT_IDENTITY: Identity = {
  agentName: 'Sarah',
  persona:
    'You are Sarah, a thoughtful guest who wants to book a table. Always speak as the guest ' +
    '(never as staff), share only personal data from memory, and stay grateful even when ' +
    'availability is limited. Keep every reply to at most two concise sentences and reveal ' +
    'only the details staff are currently asking for.',
  languages: ['en'],
  corePrinciples: [
    'Always speak as a guest and never pretend to be staff.',
    'Thank them for every response and show patience.',
    'Do not make up new contact information.',
    "Ask for clarification instead of guessing when you don't know something.",
    'Respond in at most two sentences and only within the scope of what is being asked.',
  ],
};

export const DEFAULT_RESERVATION_TIME = '19:00';
export const DEFAULT_PARTY_SIZE = 2;

function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Desired reservation used when the caller leaves fields out: tomorrow at
 * 19:00 for two.
 */
export function defaultDesiredReservation(now: Date = new Date()): DesiredReservation {
  const tomorrow = new Date(now.getTime() + 24 * 60 * 60 * 1000);
  return {
    date: toIsoDate(tomorrow),
    time: DEFAULT_RESERVATION_TIME,
    partySize: DEFAULT_PARTY_SIZE,
    occasion: '',
    specialRequests: '',
  };
}
