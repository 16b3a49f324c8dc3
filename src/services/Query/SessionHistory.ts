// src/services/Query/SessionHistory.ts

import type { ConversationTurn } from '../../Types/model';

/**
 * Append-only turn log of one conversation. Lives as long as the session does.
 */
export class SessionHistory {
  private turns: ConversationTurn[] = [];

  constructor(initial: readonly ConversationTurn[] = []) {
    for (const turn of initial) {
      this.append(turn);
    }
  }

  addUserMessage(content: string) {
    this.append({ role: 'user', content });
  }

  addAssistantMessage(content: string) {
    this.append({ role: 'assistant', content });
  }

  get messages(): readonly ConversationTurn[] {
    return this.turns.map(turn => ({ ...turn }));
  }

  get length(): number {
    return this.turns.length;
  }

  private append(turn: ConversationTurn) {
    this.turns.push({ role: turn.role, content: turn.content });
  }
}
