import { afterEach, describe, expect, it, vi } from 'vitest';
import type { GenerateContentParameters } from '@google/genai';
import { DEFAULT_GEMINI_SETTINGS } from '../config';
import { AssistantUnavailableError } from '../errors';
import { createTurn } from './chatSession';
import { ConversationClient, CULTURAL_PREAMBLE, toContents } from './geminiService';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('toContents', () => {
  it('maps assistant turns to the model role and ends with the new message', () => {
    const history = [createTurn('user', 'Hi', 1), createTurn('assistant', 'Namaste!', 2)];

    expect(toContents(history, 'What about a sangeet?')).toEqual([
      { role: 'user', parts: [{ text: 'Hi' }] },
      { role: 'model', parts: [{ text: 'Namaste!' }] },
      { role: 'user', parts: [{ text: 'What about a sangeet?' }] }
    ]);
  });
});

describe('ConversationClient', () => {
  it('sends the preamble, settings and history and returns the trimmed reply', async () => {
    const generateContent = vi.fn(async (_params: GenerateContentParameters) => ({ text: '  Try a lehenga.\n' }));
    const client = new ConversationClient({ generateContent }, DEFAULT_GEMINI_SETTINGS);
    const history = [createTurn('user', 'Hi', 1), createTurn('assistant', 'Namaste!', 2)];

    await expect(client.reply(history, 'What about a sangeet?')).resolves.toBe('Try a lehenga.');

    expect(generateContent).toHaveBeenCalledTimes(1);
    const params = generateContent.mock.calls[0][0];
    expect(params.model).toBe('gemini-2.5-flash');
    expect(params.contents).toEqual(toContents(history, 'What about a sangeet?'));
    expect(params.config?.systemInstruction).toBe(CULTURAL_PREAMBLE);
    expect(params.config?.temperature).toBe(0.7);
    expect(params.config?.topP).toBe(0.8);
    expect(params.config?.topK).toBe(40);
    expect(params.config?.maxOutputTokens).toBe(2048);
    expect(params.config?.safetySettings).toHaveLength(4);
  });

  it('reports a failed call as the assistant being unavailable', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const cause = new Error('fetch failed');
    const generateContent = vi.fn(async (): Promise<{ text?: string }> => {
      throw cause;
    });
    const client = new ConversationClient({ generateContent }, DEFAULT_GEMINI_SETTINGS);

    const failure = client.reply([], 'Hello');
    await expect(failure).rejects.toBeInstanceOf(AssistantUnavailableError);
    await expect(failure).rejects.toMatchObject({ cause });
    expect(generateContent).toHaveBeenCalledTimes(1);
    expect(consoleError).toHaveBeenCalledWith('Gemini Chat Error:', cause);
  });

  it('treats an empty reply as unavailable', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const generateContent = vi.fn(async () => ({ text: '   ' }));
    const client = new ConversationClient({ generateContent }, DEFAULT_GEMINI_SETTINGS);

    await expect(client.reply([], 'Hello')).rejects.toThrow(
      'The assistant is unavailable right now. Please try again.'
    );
  });
});
