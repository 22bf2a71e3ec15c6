import Anthropic from '@anthropic-ai/sdk';
import {
  FatalError,
  GenerationAbortedError,
  RetryableError,
  ValidationError,
  errorFromStatus,
} from '../../errors/index.js';
import logger from '../../utils/logger.js';
import type { TextGenerationOptions, TextGenerator } from './types.js';

export interface ClaudeSettings {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

function toProviderError(error: unknown): Error {
  if (error instanceof Anthropic.APIUserAbortError) {
    return new GenerationAbortedError();
  }
  // Covers APIConnectionTimeoutError as well
  if (error instanceof Anthropic.APIConnectionError) {
    return new RetryableError(`Claude connection error: ${error.message}`, 'claude', undefined, undefined, { cause: error });
  }
  if (error instanceof Anthropic.APIError && typeof error.status === 'number') {
    return errorFromStatus('claude', error.status, `Claude API error: ${error.status} - ${error.message}`, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new FatalError(`Claude request failed: ${message}`, 'claude', undefined, { cause: error });
}

export class ClaudeTextGenerator implements TextGenerator {
  readonly provider = 'claude' as const;
  private client: Anthropic;

  constructor(private settings: ClaudeSettings) {
    this.client = new Anthropic({
      apiKey: settings.apiKey,
      timeout: settings.timeoutMs,
      // Retries happen in withRetry so attempts are counted in one place
      maxRetries: 0,
    });
  }

  async generateText(prompt: string, options: TextGenerationOptions = {}): Promise<string> {
    logger.debug('CLAUDE', `generateText model=${this.settings.model} promptLength=${prompt.length}`);

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: this.settings.model,
          max_tokens: options.maxTokens ?? 1024,
          temperature: options.temperature,
          system: options.systemMessage,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal: options.signal }
      );
    } catch (error) {
      throw toProviderError(error);
    }

    const parts: string[] = [];
    for (const block of response.content) {
      if (block.type === 'text') {
        parts.push(block.text);
      }
    }

    const text = parts.join('');
    if (!text) {
      throw new ValidationError('No text content in Claude response');
    }
    return text;
  }
}
