/**
 * LLM providers for answer synthesis
 * Claude (primary) or Gemini, picked by LLM_PROVIDER.
 */
import Anthropic from '@anthropic-ai/sdk';
import { GoogleGenerativeAI } from '@google/generative-ai';
import type { LlmConfig } from '../../../shared/config/env.js';
import { ConfigError } from '../../../shared/lib/errors.js';

export interface LlmPrompt {
  system: string;
  user: string;
}

export interface LlmProvider {
  readonly name: string;
  readonly model: string;
  /** Model reply text; '' when the model returned no text */
  complete(prompt: LlmPrompt, signal: AbortSignal): Promise<string>;
}

interface GenerationSettings {
  maxTokens: number;
  temperature: number;
}

/**
 * Claude API. SDK retries are off; the synthesizer owns the retry policy.
 */
export class AnthropicProvider implements LlmProvider {
  readonly name = 'anthropic';

  constructor(
    private readonly client: Anthropic,
    readonly model: string,
    private readonly settings: GenerationSettings
  ) {}

  async complete(prompt: LlmPrompt, signal: AbortSignal): Promise<string> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: this.settings.maxTokens,
        temperature: this.settings.temperature,
        system: prompt.system,
        messages: [{ role: 'user', content: prompt.user }],
      },
      { signal }
    );

    return response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();
  }
}

/**
 * Gemini API
 */
export class GeminiProvider implements LlmProvider {
  readonly name = 'gemini';

  constructor(
    private readonly client: GoogleGenerativeAI,
    readonly model: string,
    private readonly settings: GenerationSettings
  ) {}

  async complete(prompt: LlmPrompt, signal: AbortSignal): Promise<string> {
    const model = this.client.getGenerativeModel({
      model: this.model,
      systemInstruction: prompt.system,
      generationConfig: {
        maxOutputTokens: this.settings.maxTokens,
        temperature: this.settings.temperature,
      },
    });

    const result = await model.generateContent(
      { contents: [{ role: 'user', parts: [{ text: prompt.user }] }] },
      { signal }
    );
    return result.response.text().trim();
  }
}

export function createLlmProvider(config: LlmConfig): LlmProvider {
  const settings = { maxTokens: config.maxTokens, temperature: config.temperature };

  if (config.provider === 'anthropic') {
    if (!config.apiKey) {
      throw new ConfigError('[llm] Missing required environment variable: CLAUDE_API_KEY');
    }
    return new AnthropicProvider(new Anthropic({ apiKey: config.apiKey, maxRetries: 0 }), config.modelId, settings);
  }

  if (!config.apiKey) {
    throw new ConfigError('[llm] Missing required environment variable: GEMINI_API_KEY');
  }
  return new GeminiProvider(new GoogleGenerativeAI(config.apiKey), config.modelId, settings);
}
