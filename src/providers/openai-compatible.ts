import OpenAI from 'openai';
import { BaseGenerationProvider, type GenerationOptions, type GenerationResult, type ProviderConfig } from './base.js';

// Models that use max_completion_tokens instead of max_tokens
const COMPLETION_TOKEN_MODELS = ['gpt-5', 'o1', 'o3'];

/**
 * OpenAI-compatible provider that works with:
 * - OpenAI API
 * - Ollama (via OpenAI compatibility layer)
 * - vLLM
 * - Any other OpenAI-compatible server
 */
export class OpenAICompatibleProvider extends BaseGenerationProvider {
  private client: OpenAI;
  private providerName: string;

  constructor(config: ProviderConfig & { providerName?: string } = {}) {
    super(config);
    this.client = new OpenAI({
      apiKey: config.apiKey || process.env.OPENAI_API_KEY || 'not-needed',
      baseURL: config.baseUrl,
      // Retries are the caller's decision
      maxRetries: 0,
    });
    this.providerName = config.providerName || 'OpenAI';
  }

  private getTokenParams(model: string, maxTokens: number): { max_tokens?: number; max_completion_tokens?: number } {
    const usesCompletionTokens = COMPLETION_TOKEN_MODELS.some(m => model.startsWith(m));
    return usesCompletionTokens
      ? { max_completion_tokens: maxTokens }
      : { max_tokens: maxTokens };
  }

  async generate(prompt: string, options: GenerationOptions): Promise<GenerationResult> {
    const response = await this.client.chat.completions.create(
      {
        model: options.model,
        temperature: options.temperature,
        ...this.getTokenParams(options.model, options.maxTokens),
        messages: [{ role: 'user', content: prompt }],
      },
      { signal: options.signal }
    );

    return {
      text: response.choices[0]?.message.content ?? '',
      model: response.model,
      ...(response.usage && {
        usage: {
          inputTokens: response.usage.prompt_tokens,
          outputTokens: response.usage.completion_tokens,
        },
      }),
    };
  }

  async *generateStream(prompt: string, options: GenerationOptions): AsyncGenerator<string, void, undefined> {
    const stream = await this.client.chat.completions.create(
      {
        model: options.model,
        temperature: options.temperature,
        ...this.getTokenParams(options.model, options.maxTokens),
        messages: [{ role: 'user', content: prompt }],
        stream: true,
      },
      { signal: options.signal }
    );

    let finished = false;
    try {
      for await (const chunk of stream) {
        const content = chunk.choices[0]?.delta?.content;
        if (content) {
          yield content;
        }
      }
      finished = true;
    } finally {
      // Consumer stopped early: drop the HTTP connection
      if (!finished) {
        stream.controller.abort();
      }
    }
  }

  getName(): string {
    return this.providerName;
  }
}

/**
 * Create a provider for Ollama (running locally)
 */
export function createOllamaProvider(model: string = 'llama3.2', baseUrl: string = 'http://localhost:11434/v1'): OpenAICompatibleProvider {
  return new OpenAICompatibleProvider({
    baseUrl,
    model,
    providerName: 'Ollama',
  });
}
