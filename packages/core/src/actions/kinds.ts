/** The capability invoked on a turn; each kind has one fixed result shape. */
export enum ActionKind {
  GREETING = 'greeting',
  AVAILABILITY = 'availability',
  DETAILS_COLLECTION = 'details',
  MENU_DISCUSSION = 'menu',
  CONFIRMATION = 'confirmation',
  ALTERNATIVE = 'alternative',
  ERROR_RECOVERY = 'error_recovery',
  SAVE_RESERVATION = 'save_reservation',
}
