import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { PersistenceError, PersistenceErrorCode } from '../errors/types';
import type { ReservationDetails, SessionState } from '../memory/types';
import type { ReservationStore } from './types';

/**
 * File system subset the JSON store writes through.
 */
export interface WritableFileSystem {
  mkdir(dirPath: string, options: { recursive: true }): Promise<unknown>;
  writeFile(filePath: string, content: string): Promise<void>;
}

export interface JsonReservationStoreOptions {
  /** Output directory, created on first save */
  directory: string;
  /** Custom file system implementation (defaults to Node.js fs) */
  fs?: WritableFileSystem;
  /** Clock used for the file name and `generatedAt` */
  now?: () => Date;
}

export interface SavedReservation {
  generatedAt: string;
  guest: { name: string; phone: string };
  restaurant: string;
  workflow: {
    stage: string;
    availabilityStatus: string;
    confirmationStatus: string;
    selectedSlotNote: string | null;
  };
  goalReservation: ReservationDetails;
  confirmedReservation: ReservationDetails;
  menuPreferences: {
    requested: boolean;
    highlights: string[];
    dietaryNotes: string | null;
  };
  conversation: {
    turns: Array<{ speaker: string; message: string }>;
  };
}

const defaultFileSystem: WritableFileSystem = {
  mkdir: (dirPath, options) => fs.mkdir(dirPath, options),
  writeFile: (filePath, content) => fs.writeFile(filePath, content, 'utf-8'),
};

/**
 * @example slugify('Anna Kowalska') => 'anna_kowalska'
 */
export function slugify(value: string): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return slug || 'reservation';
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** UTC timestamp as `YYYYMMDD_HHMMSS`. */
export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

function toIsoSeconds(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

export function toSavedReservation(state: SessionState, generatedAt: Date): SavedReservation {
  const { goal, workflow, scratchpad } = state;
  return {
    generatedAt: toIsoSeconds(generatedAt),
    guest: { name: goal.guestName, phone: goal.guestPhone },
    restaurant: goal.restaurantName,
    workflow: {
      stage: workflow.stage,
      availabilityStatus: workflow.availabilityStatus,
      confirmationStatus: workflow.confirmationStatus,
      selectedSlotNote: workflow.selectedSlotNote,
    },
    goalReservation: { ...scratchpad.goalReservation },
    confirmedReservation: { ...scratchpad.confirmedReservation },
    menuPreferences: {
      requested: scratchpad.menuPreferences.requested,
      highlights: [...scratchpad.menuPreferences.highlights],
      dietaryNotes: scratchpad.menuPreferences.dietaryNotes,
    },
    conversation: {
      turns: scratchpad.turns.map((turn) => ({ speaker: turn.speaker, message: turn.message })),
    },
  };
}

/**
 * Store that writes one pretty-printed JSON summary per saved reservation
 * and returns the file path.
 *
 * @example
 * ```typescript
 * const store = createJsonReservationStore({ directory: './reservations' });
 * const filePath = await store.save(state);
 * ```
 */
export function createJsonReservationStore(options: JsonReservationStoreOptions): ReservationStore {
  const fileSystem = options.fs ?? defaultFileSystem;
  const now = options.now ?? (() => new Date());

  return {
    async save(state: SessionState): Promise<string> {
      const timestamp = now();
      const fileName = `${slugify(state.goal.guestName)}_${formatFileTimestamp(timestamp)}.json`;
      const filePath = path.join(options.directory, fileName);
      const payload = toSavedReservation(state, timestamp);

      try {
        await fileSystem.mkdir(options.directory, { recursive: true });
        await fileSystem.writeFile(filePath, `${JSON.stringify(payload, null, 2)}\n`);
      } catch (error) {
        throw PersistenceError.from(error, PersistenceErrorCode.WRITE_ERROR, { filePath });
      }
      return filePath;
    },
  };
}
