import { GoogleGenerativeAI } from '@google/generative-ai';
import { TransportError } from '../agents/errors';
import { CLASSIFY_CONFIG } from '../agents/config';

export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
}

/** A text-generation backend. Implementations throw `TransportError` on any call failure. */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

export interface GeminiSettings {
  apiKey: string;
  model: string;
  temperature: number;
  timeoutMs?: number;
  maxOutputTokens?: number;
}

export class GeminiCompletionClient implements CompletionClient {
  private ai: GoogleGenerativeAI;

  constructor(private readonly settings: GeminiSettings) {
    this.ai = new GoogleGenerativeAI(settings.apiKey);
  }

  get model(): string {
    return this.settings.model;
  }

  async complete({ systemPrompt, userPrompt }: CompletionRequest): Promise<string> {
    const timeoutMs = this.settings.timeoutMs ?? CLASSIFY_CONFIG.timeoutMs;
    const model = this.ai.getGenerativeModel({
      model: this.settings.model,
      systemInstruction: systemPrompt,
    });

    const apiCall = model.generateContent({
      contents: [{ role: 'user', parts: [{ text: userPrompt }] }],
      generationConfig: {
        temperature: this.settings.temperature,
        maxOutputTokens: this.settings.maxOutputTokens ?? CLASSIFY_CONFIG.maxTokens,
        responseMimeType: 'application/json',
      },
    });

    let timeoutHandle: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutHandle = setTimeout(() => {
        reject(new TransportError('gemini', `timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      const result = await Promise.race([apiCall, timeoutPromise]);
      const text = result.response.text().trim();
      if (!text) {
        throw new TransportError('gemini', 'no text content in response');
      }
      return text;
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      throw new TransportError(
        'gemini',
        error instanceof Error ? error.message : String(error),
        error
      );
    } finally {
      clearTimeout(timeoutHandle);
    }
  }
}
