import type { ChatHistory, ChatRole, ChatTurn } from '../types';

export const createTurn = (role: ChatRole, text: string, now: number = Date.now()): ChatTurn =>
  Object.freeze({ role, text, sentAt: now });

/**
 * Returns a new history with the turn at the end. The previous array and its turns
 * are left untouched, so earlier renders keep seeing the history they were given.
 */
export const appendTurn = (history: ChatHistory, turn: ChatTurn): ChatHistory =>
  Object.freeze([...history, Object.freeze({ ...turn })]);

export const formatTurnTime = (sentAt: number): string => {
  const date = new Date(sentAt);
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  return `${hours}:${minutes}`;
};

/** Replies already given in this session, keyed by the normalized question. */
export class ResponseCache {
  private replies: Map<string, string> = new Map();

  static keyFor(message: string): string {
    return message.trim().toLowerCase();
  }

  get(message: string): string | undefined {
    return this.replies.get(ResponseCache.keyFor(message));
  }

  set(message: string, reply: string): void {
    this.replies.set(ResponseCache.keyFor(message), reply);
  }

  get size(): number {
    return this.replies.size;
  }
}
