import OpenAI from 'openai';
import { config } from './config.js';
import { ExternalCapabilityError } from './errors.js';
import type { TextGenerationCapability } from './narrative.js';

// =============================================================================
// Text generation over any OpenAI-compatible chat completions endpoint.
// Absent API key → no capability; the insight engine simply skips narratives.
// =============================================================================

export type LlmSettings = {
  apiKey: string;
  baseUrl?: string;
  model: string;
  timeoutMs: number;
};

type ChatRequest = {
  model: string;
  messages: Array<{ role: 'user'; content: string }>;
  max_tokens: number;
  temperature: number;
};

/** The slice of the OpenAI client used here; tests pass a fake. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatRequest,
        options?: { timeout?: number; signal?: AbortSignal },
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export class OpenAITextGenerator implements TextGenerationCapability {
  private readonly client: ChatCompletionsClient;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(settings: LlmSettings, client?: ChatCompletionsClient) {
    this.client = client ?? new OpenAI({
      apiKey: settings.apiKey,
      baseURL: settings.baseUrl || undefined,
      timeout: settings.timeoutMs,
      maxRetries: 0,
    });
    this.model = settings.model;
    this.timeoutMs = settings.timeoutMs;
  }

  async complete(prompt: string): Promise<string> {
    const startTime = Date.now();
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          max_tokens: 1024,
          temperature: 0.4,
        },
        { timeout: this.timeoutMs, signal: AbortSignal.timeout(this.timeoutMs) },
      );
      const content = response.choices[0]?.message?.content ?? '';
      console.log(`[LLM] ${this.model} responded in ${Date.now() - startTime}ms`);
      if (!content) throw new Error('empty completion');
      return content;
    } catch (err) {
      throw new ExternalCapabilityError(`${this.model} completion failed after ${Date.now() - startTime}ms`, err);
    }
  }
}

export function createTextGenerator(settings: LlmSettings = config.narrative): TextGenerationCapability | null {
  if (!settings.apiKey) {
    console.warn('[LLM] No API key configured; narrative insights disabled');
    return null;
  }
  return new OpenAITextGenerator(settings);
}
