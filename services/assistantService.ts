import { AssistantUnavailableError } from '../errors';
import type { ChatHistory, ExtractedTerm, FilterSelection, GarmentRecord } from '../types';
import { appendTurn, createTurn, ResponseCache } from './chatSession';
import { findGarments } from './garmentStore';
import { buildKeywords } from './keywordService';

export interface ReplySource {
  reply(history: ChatHistory, newMessage: string): Promise<string>;
}

export interface TurnRequest {
  history: ChatHistory;
  message: string;
  filters: FilterSelection;
  garments: readonly GarmentRecord[];
  client: ReplySource;
  cache: ResponseCache;
  now?: () => number;
}

export type TurnResult =
  | { status: 'ignored'; history: ChatHistory }
  | { status: 'failed'; history: ChatHistory; error: string }
  | { status: 'answered'; history: ChatHistory; reply: string; keywords: ExtractedTerm[]; garments: GarmentRecord[] };

/**
 * Runs one user turn: ask the model (or reuse this session's answer to the same
 * question), then look up garments for the message. When the model is
 * unavailable only the user's message is added and no lookup runs.
 */
export const submitMessage = async ({
  history,
  message,
  filters,
  garments,
  client,
  cache,
  now = Date.now
}: TurnRequest): Promise<TurnResult> => {
  const text = message.trim();
  if (!text) return { status: 'ignored', history };

  const withQuestion = appendTurn(history, createTurn('user', text, now()));

  let reply = cache.get(text);
  if (reply === undefined) {
    try {
      reply = await client.reply(history, text);
    } catch (error) {
      if (error instanceof AssistantUnavailableError) {
        return { status: 'failed', history: withQuestion, error: error.message };
      }
      throw error;
    }
    cache.set(text, reply);
  }

  const keywords = buildKeywords(text, reply);
  return {
    status: 'answered',
    history: appendTurn(withQuestion, createTurn('assistant', reply, now())),
    reply,
    keywords,
    garments: findGarments(garments, { keywords, ...filters })
  };
};
