// src/services/Query/SessionStore.ts

import { randomUUID } from 'crypto';
import { SessionHistory } from './SessionHistory';

/**
 * In-process conversation sessions. Nothing survives a restart.
 */
export class SessionStore {
  private sessions = new Map<string, SessionHistory>();

  /**
   * Starts an empty session under a fresh id.
   */
  create(): { sessionId: string; history: SessionHistory } {
    const sessionId = randomUUID();
    const history = new SessionHistory();
    this.sessions.set(sessionId, history);
    return { sessionId, history };
  }

  get(sessionId: string): SessionHistory | undefined {
    return this.sessions.get(sessionId);
  }

  end(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
