import OpenAI from 'openai';
import {
  FatalError,
  GenerationAbortedError,
  type ProviderName,
  RetryableError,
  ValidationError,
  errorFromStatus,
} from '../../errors/index.js';
import logger from '../../utils/logger.js';
import type { TextGenerationOptions, TextGenerator } from './types.js';

export interface OpenAISettings {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export function createOpenAIClient(apiKey: string, timeoutMs: number): OpenAI {
  // Retries happen in withRetry so attempts are counted in one place
  return new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 0 });
}

/**
 * Translate an OpenAI SDK failure into the retry taxonomy.
 * Shared by the text generator and the conversation image client.
 */
export function toOpenAIProviderError(error: unknown, provider: ProviderName): Error {
  if (error instanceof OpenAI.APIUserAbortError) {
    return new GenerationAbortedError();
  }
  // Covers APIConnectionTimeoutError as well
  if (error instanceof OpenAI.APIConnectionError) {
    return new RetryableError(`OpenAI connection error: ${error.message}`, provider, undefined, undefined, { cause: error });
  }
  if (error instanceof OpenAI.APIError && typeof error.status === 'number') {
    return errorFromStatus(provider, error.status, `OpenAI API error: ${error.status} - ${error.message}`, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new FatalError(`OpenAI request failed: ${message}`, provider, undefined, { cause: error });
}

export class OpenAITextGenerator implements TextGenerator {
  readonly provider = 'openai' as const;
  private client: OpenAI;

  constructor(private settings: OpenAISettings) {
    this.client = createOpenAIClient(settings.apiKey, settings.timeoutMs);
  }

  async generateText(prompt: string, options: TextGenerationOptions = {}): Promise<string> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (options.systemMessage) {
      messages.push({ role: 'system', content: options.systemMessage });
    }
    messages.push({ role: 'user', content: prompt });

    logger.debug('OPENAI', `generateText model=${this.settings.model} promptLength=${prompt.length}`);

    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.settings.model,
          messages,
          temperature: options.temperature,
          max_tokens: options.maxTokens,
        },
        { signal: options.signal }
      );
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      throw toOpenAIProviderError(error, 'openai');
    }

    if (!content) {
      throw new ValidationError('No content in OpenAI response');
    }
    return content;
  }
}
