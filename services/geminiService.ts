import { GoogleGenAI, HarmBlockThreshold, HarmCategory } from "@google/genai";
import type { Content, GenerateContentParameters, SafetySetting } from "@google/genai";
import type { AppConfig, GeminiSettings } from "../config";
import { AssistantUnavailableError } from "../errors";
import type { ChatHistory } from "../types";

export const CULTURAL_PREAMBLE = `You are a friendly expert in Indian ethnic and traditional wear.

You help people choose garments such as sarees, lehengas, salwar kameez, kurta pajamas, sherwanis, dhotis, Nehru jackets, Indo-Western outfits and vestis.

When you answer:
- Name the specific garment types that suit the person's occasion, region and season.
- Explain briefly why they fit the occasion and its customs.
- Suggest fabrics, colours and accessories that complement the outfit.
- Respect regional traditions (North, South, East and West India) and mention them where relevant.
- Keep the tone warm and conversational, and keep answers short enough to read in a chat window.
- Do not invent prices, product links or stock levels; the app shows matching products from its own collection.`;

const SAFETY_SETTINGS: SafetySetting[] = [
  HarmCategory.HARM_CATEGORY_HARASSMENT,
  HarmCategory.HARM_CATEGORY_HATE_SPEECH,
  HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
  HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT
].map(category => ({ category, threshold: HarmBlockThreshold.BLOCK_MEDIUM_AND_ABOVE }));

/** The slice of the Gemini SDK the chat needs; `GoogleGenAI#models` satisfies it. */
export interface ContentGenerator {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
}

export const toContents = (history: ChatHistory, newMessage: string): Content[] => [
  ...history.map(turn => ({
    role: turn.role === 'assistant' ? 'model' : 'user',
    parts: [{ text: turn.text }]
  })),
  { role: 'user', parts: [{ text: newMessage }] }
];

export class ConversationClient {
  constructor(
    private readonly generator: ContentGenerator,
    private readonly settings: GeminiSettings
  ) {}

  /**
   * Sends the running history plus the new message and returns the model's reply.
   * Every failure, an empty reply included, becomes an AssistantUnavailableError.
   */
  async reply(history: ChatHistory, newMessage: string): Promise<string> {
    const { model, temperature, topP, topK, maxOutputTokens } = this.settings;

    let text: string | undefined;
    try {
      const response = await this.generator.generateContent({
        model,
        contents: toContents(history, newMessage),
        config: {
          systemInstruction: CULTURAL_PREAMBLE,
          temperature,
          topP,
          topK,
          maxOutputTokens,
          safetySettings: SAFETY_SETTINGS
        }
      });
      text = response.text?.trim();
    } catch (error) {
      console.error("Gemini Chat Error:", error);
      throw new AssistantUnavailableError(undefined, { cause: error });
    }

    if (!text) {
      console.warn("Gemini returned an empty reply");
      throw new AssistantUnavailableError();
    }
    return text;
  }
}

export const createConversationClient = (config: AppConfig): ConversationClient => {
  const ai = new GoogleGenAI({ apiKey: config.apiKey });
  return new ConversationClient(ai.models, config.gemini);
};
