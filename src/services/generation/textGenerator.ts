import Anthropic from '@anthropic-ai/sdk';
import { ConfigurationError } from '../../utils/errors';

export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

export interface AnthropicGeneratorOptions {
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  timeoutMs?: number;
}

const DEFAULT_MODEL = 'claude-sonnet-4-20250514';

/**
 * Single-shot text generation through the Messages API
 */
export class AnthropicTextGenerator implements TextGenerator {
  private readonly client: Anthropic;
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(options: AnthropicGeneratorOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError(
        'ANTHROPIC_API_KEY is not set. Add it to .env to generate posts (https://console.anthropic.com/).'
      );
    }

    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs ?? 60_000,
      maxRetries: 0,
    });
    this.model = options.model ?? DEFAULT_MODEL;
    this.maxTokens = options.maxTokens ?? 1500;
  }

  async generate(prompt: string): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      messages: [{ role: 'user', content: prompt }],
    });

    const text = response.content.find(block => block.type === 'text');
    if (!text || text.type !== 'text') {
      throw new Error('No text content in generation response');
    }

    return text.text;
  }
}
