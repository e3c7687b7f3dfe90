import { randomUUID } from 'node:crypto';

import type { SessionState } from '../memory/types';

/**
 * Latest snapshot per session id. Callers that juggle several negotiations
 * keep them here instead of in the agent.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, SessionState>();

  /** Stores a new session and returns its generated id. */
  register(state: SessionState): string {
    const id = randomUUID();
    this.sessions.set(id, state);
    return id;
  }

  get(id: string): SessionState | undefined {
    return this.sessions.get(id);
  }

  /**
   * Replaces the snapshot of a known session.
   *
   * @throws {Error} If the id was never registered
   */
  update(id: string, state: SessionState): void {
    if (!this.sessions.has(id)) {
      throw new Error(`Unknown session: ${id}`);
    }
    this.sessions.set(id, state);
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  ids(): string[] {
    return [...this.sessions.keys()];
  }

  get size(): number {
    return this.sessions.size;
  }
}
