/**
 * OpenAI chat-completions provider.
 * Each call gets a timeout and up to `maxAttempts` tries with exponential
 * backoff (2s, 4s, capped at 10s); the last error is rethrown.
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { GenerationOptions, IGenerationProvider } from './IGenerationProvider.js';
import type { ILogProvider } from './ILogProvider.js';
import { retry, type RetryOptions } from '../utils/retry.js';
import { errorMessage } from '../utils/outcome.js';

const DEFAULT_MODEL = 'gpt-4o';
const DEFAULT_TIMEOUT_MS = 30_000;

export class OpenAIGenerationProvider implements IGenerationProvider {
  private client: OpenAI;
  private model: string;
  private retryOptions: RetryOptions;

  constructor(
    opts: {
      apiKey: string;
      model?: string;
      timeoutMs?: number;
      maxAttempts?: number;
    },
    private readonly logger?: ILogProvider
  ) {
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      timeout: opts.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      // Retries are ours, so the SDK must not multiply them
      maxRetries: 0,
    });
    this.model = opts.model ?? DEFAULT_MODEL;
    this.retryOptions = {
      maxAttempts: opts.maxAttempts ?? 3,
      initialDelayMs: 2000,
      backoffFactor: 2,
      maxDelayMs: 10_000,
      onRetry: (attempt, err, delayMs) => {
        this.logger?.warn('Generation attempt failed, retrying', {
          attempt,
          delayMs,
          error: errorMessage(err),
        });
      },
    };
  }

  async generate(prompt: string, options: GenerationOptions = {}): Promise<string> {
    const messages: ChatCompletionMessageParam[] = [];
    if (options.systemMessage) {
      messages.push({ role: 'system', content: options.systemMessage });
    }
    messages.push({ role: 'user', content: prompt });

    return retry(async () => {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages,
        temperature: options.temperature ?? 0.7,
        max_tokens: options.maxTokens ?? 2000,
      });

      const content = response.choices[0]?.message.content?.trim();
      if (!content) {
        throw new Error('Generation returned an empty completion');
      }

      this.logger?.debug('Generation completed', {
        model: this.model,
        totalTokens: response.usage?.total_tokens,
      });
      return content;
    }, this.retryOptions);
  }
}
