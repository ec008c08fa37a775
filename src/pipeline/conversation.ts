import type { ChatMessage, ConversationTurn, ConversationView } from '../types.js';

/**
 * Session history. Append-only until `reset()`; the pipeline is the only
 * writer, everything else receives it as a ConversationView.
 */
export class ConversationContext implements ConversationView {
  private history: ConversationTurn[] = [];

  get length(): number {
    return this.history.length;
  }

  append(user: string, assistant: string): void {
    this.history.push({ user, assistant });
  }

  turns(): readonly ConversationTurn[] {
    return this.history;
  }

  /** The last `limit` messages, oldest first. */
  recentMessages(limit: number): ChatMessage[] {
    if (limit <= 0) return [];
    const messages: ChatMessage[] = [];
    for (const turn of this.history) {
      messages.push({ role: 'user', content: turn.user }, { role: 'assistant', content: turn.assistant });
    }
    return messages.slice(-limit);
  }

  reset(): void {
    this.history = [];
  }
}
