/**
 * Gemini text generation.
 *
 * Used for story text, scene summaries and character extraction when
 * TEXT_PROVIDER=gemini.
 */

import {
  GoogleGenerativeAI,
  GoogleGenerativeAIError,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIRequestInputError,
  GoogleGenerativeAIResponseError,
} from '@google/generative-ai';
import {
  FatalError,
  GenerationAbortedError,
  RetryableError,
  ValidationError,
  errorFromStatus,
} from '../../errors/index.js';
import logger from '../../utils/logger.js';
import type { TextGenerationOptions, TextGenerator } from './types.js';

export interface GeminiSettings {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

function toProviderError(error: unknown, signal?: AbortSignal): Error {
  if (signal?.aborted) {
    return new GenerationAbortedError();
  }
  if (error instanceof GoogleGenerativeAIFetchError && typeof error.status === 'number') {
    return errorFromStatus('gemini', error.status, `Gemini API error: ${error.status} - ${error.message}`, error);
  }
  if (error instanceof GoogleGenerativeAIRequestInputError) {
    return new FatalError(`Gemini rejected the request: ${error.message}`, 'gemini', undefined, { cause: error });
  }
  if (error instanceof GoogleGenerativeAIResponseError) {
    return new ValidationError(`Gemini response was blocked or empty: ${error.message}`);
  }
  // Remaining SDK errors wrap network failures
  if (error instanceof GoogleGenerativeAIError) {
    return new RetryableError(`Gemini connection error: ${error.message}`, 'gemini', undefined, undefined, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new FatalError(`Gemini request failed: ${message}`, 'gemini', undefined, { cause: error });
}

export class GeminiTextGenerator implements TextGenerator {
  readonly provider = 'gemini' as const;
  private genAI: GoogleGenerativeAI;

  constructor(private settings: GeminiSettings) {
    this.genAI = new GoogleGenerativeAI(settings.apiKey);
  }

  async generateText(prompt: string, options: TextGenerationOptions = {}): Promise<string> {
    const model = this.genAI.getGenerativeModel(
      {
        model: this.settings.model,
        systemInstruction: options.systemMessage,
        generationConfig: {
          temperature: options.temperature,
          maxOutputTokens: options.maxTokens,
        },
      },
      { timeout: this.settings.timeoutMs }
    );

    logger.debug('GEMINI', `generateText model=${this.settings.model} promptLength=${prompt.length}`);

    let content: string;
    try {
      const result = await model.generateContent(prompt, { signal: options.signal });
      content = result.response.text();
    } catch (error) {
      throw toProviderError(error, options.signal);
    }

    if (!content) {
      throw new ValidationError('No content in Gemini response');
    }
    return content;
  }
}
