import type { SessionState } from '../memory/types';

/**
 * Stores a finished negotiation and returns where it went. The location
 * format is the store's own business.
 *
 * @throws {PersistenceError} If the snapshot could not be written
 */
export interface ReservationStore {
  save(state: SessionState): Promise<string>;
}
