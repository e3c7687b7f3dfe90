import type { ConfirmableField, ConfirmedFields } from './types';

/**
 * Order in which unconfirmed fields are raised with staff.
 */
export const CONFIRMATION_PRIORITY: readonly ConfirmableField[] = [
  'partySize',
  'contactName',
  'contactPhone',
  'occasion',
  'specialRequests',
  'date',
  'time',
];

export function createConfirmedFields(): ConfirmedFields {
  return {
    date: false,
    time: false,
    partySize: false,
    occasion: false,
    specialRequests: false,
    contactName: false,
    contactPhone: false,
  };
}

/**
 * True only when all seven tracked fields were acknowledged. This is the sole
 * gate out of the contact/confirmation phase.
 */
export function allRequiredConfirmed(fields: ConfirmedFields): boolean {
  return CONFIRMATION_PRIORITY.every((field) => fields[field]);
}

export function firstUnconfirmedField(fields: ConfirmedFields): ConfirmableField | null {
  return CONFIRMATION_PRIORITY.find((field) => !fields[field]) ?? null;
}

export function markAllConfirmed(fields: ConfirmedFields): void {
  for (const field of CONFIRMATION_PRIORITY) {
    fields[field] = true;
  }
}
