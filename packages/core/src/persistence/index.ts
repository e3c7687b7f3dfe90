export type { ReservationStore } from './types';
export {
  createJsonReservationStore,
  slugify,
  formatFileTimestamp,
  toSavedReservation,
  type JsonReservationStoreOptions,
  type SavedReservation,
  type WritableFileSystem,
} from './json-store';
