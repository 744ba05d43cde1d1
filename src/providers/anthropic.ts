import Anthropic from '@anthropic-ai/sdk';
import { BaseGenerationProvider, type GenerationOptions, type GenerationResult, type ProviderConfig } from './base.js';

const DEFAULT_MODEL = 'claude-sonnet-4-20250514';

export class AnthropicProvider extends BaseGenerationProvider {
  private client: Anthropic;

  constructor(config: ProviderConfig = {}) {
    super(config);
    this.client = new Anthropic({
      apiKey: config.apiKey || process.env.ANTHROPIC_API_KEY,
      ...(config.baseUrl && { baseURL: config.baseUrl }),
      // Retries are the caller's decision
      maxRetries: 0,
    });
  }

  async generate(prompt: string, options: GenerationOptions): Promise<GenerationResult> {
    const response = await this.client.messages.create(
      {
        model: options.model,
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        messages: [{ role: 'user', content: prompt }],
      },
      { signal: options.signal }
    );

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      }
    }

    return {
      text,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }

  async *generateStream(prompt: string, options: GenerationOptions): AsyncGenerator<string, void, undefined> {
    const stream = this.client.messages.stream(
      {
        model: options.model,
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        messages: [{ role: 'user', content: prompt }],
      },
      { signal: options.signal }
    );

    let finished = false;
    try {
      for await (const event of stream) {
        if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
          yield event.delta.text;
        }
      }
      finished = true;
    } finally {
      if (!finished) {
        stream.abort();
      }
    }
  }

  getName(): string {
    return 'Anthropic';
  }

  /**
   * The modes name OpenAI models, so Anthropic always supplies its own.
   */
  getDefaultModel(): string {
    return this.config.model || DEFAULT_MODEL;
  }
}
