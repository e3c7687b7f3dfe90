import type { ConfirmableField } from '../memory/types';

const CLARIFICATION_KEYWORDS: ReadonlyArray<readonly [string, ConfirmableField]> = [
  ['date', 'date'],
  ['time', 'time'],
  ['phone', 'contactPhone'],
  ['name', 'contactName'],
];

/**
 * Fields staff seem to be asking about again, guessed from keywords in their
 * clarification message (case-insensitive substring match).
 *
 * Keyword matching is a stopgap: an executor that returns an explicit list of
 * fields needing clarification can replace this function without touching
 * the transitions.
 */
export function fieldsNeedingClarification(message: string | null): ConfirmableField[] {
  if (!message) {
    return [];
  }
  const lowered = message.toLowerCase();
  return CLARIFICATION_KEYWORDS.filter(([keyword]) => lowered.includes(keyword)).map(
    ([, field]) => field
  );
}
