/**
 * Deterministic stages of the reservation flow, seen from the guest's side.
 */
export enum WorkflowStage {
  INTRO = 'intro',
  SHARE_PREFERENCES = 'share_preferences',
  AWAIT_AVAILABILITY = 'await_availability',
  REVIEW_ALTERNATIVES = 'review_alternatives',
  PROVIDE_CONTACT = 'provide_contact',
  MENU_DISCUSSION = 'menu_discussion',
  AWAIT_CONFIRMATION = 'await_confirmation',
  SAVE_DATA = 'save_data',
  WRAP_UP = 'wrap_up',
  END = 'end',
}

/** How the restaurant responded to the requested slot. */
export enum AvailabilityStatus {
  UNKNOWN = 'unknown',
  WAITING_ON_STAFF = 'waiting_on_staff',
  SLOT_ACCEPTED = 'slot_accepted',
  ALTERNATIVES_OFFERED = 'alternatives_offered',
  DECLINED = 'declined',
}

/** State of the staff's confirmation attempt. */
export enum ConfirmationStatus {
  PENDING = 'pending',
  CONFIRMED_BY_STAFF = 'confirmed_by_staff',
  NEEDS_CLARIFICATION = 'needs_clarification',
}

export enum DiscussionTopic {
  GREETING = 'greeting',
  CONFIRMING_AVAILABILITY = 'confirming availability',
  CONFIRMING_DATE = 'confirming date',
  CONFIRMING_TIME = 'confirming time',
  CONFIRMING_PARTY_SIZE = 'confirming party size',
  CONFIRMING_SPECIAL_REQUESTS = 'confirming special requests',
  CONFIRMING_CONTACT_DETAILS = 'confirming contact details',
  CONFIRMING_OCCASION = 'confirming occasion',
  MENU_DISCUSSION = 'menu discussion',
  CONFIRMATION = 'awaiting final confirmation',
  CLOSING = 'closing the reservation',
  ERROR_RECOVERY = 'resolving an issue',
  NONE = 'no specific topic',
}
