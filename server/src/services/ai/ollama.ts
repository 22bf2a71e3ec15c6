/**
 * Ollama text generation against a local server, over plain fetch.
 */

import { z } from 'zod';
import {
  GenerationAbortedError,
  RetryableError,
  ValidationError,
  errorFromStatus,
} from '../../errors/index.js';
import logger from '../../utils/logger.js';
import type { TextGenerationOptions, TextGenerator } from './types.js';

export interface OllamaSettings {
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

const OllamaResponseSchema = z.object({
  response: z.string(),
});

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

export class OllamaTextGenerator implements TextGenerator {
  readonly provider = 'ollama' as const;

  constructor(private settings: OllamaSettings) {}

  async generateText(prompt: string, options: TextGenerationOptions = {}): Promise<string> {
    const body = {
      model: this.settings.model,
      prompt,
      system: options.systemMessage,
      stream: false,
      options: {
        temperature: options.temperature,
        num_predict: options.maxTokens,
      },
    };

    const timeoutSignal = AbortSignal.timeout(this.settings.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeoutSignal]) : timeoutSignal;

    logger.debug('OLLAMA', `generateText model=${this.settings.model} promptLength=${prompt.length}`);

    let response: Response;
    try {
      response = await fetch(`${this.settings.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      if (options.signal?.aborted) {
        throw new GenerationAbortedError();
      }
      // Timeouts and refused connections are both transient
      const message = error instanceof Error ? error.message : String(error);
      throw new RetryableError(`Ollama connection error: ${message}`, 'ollama', undefined, undefined, { cause: error });
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw errorFromStatus(
        'ollama',
        response.status,
        `Ollama API error: ${response.status} - ${errorText}`,
        undefined,
        parseRetryAfter(response.headers.get('retry-after'))
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new ValidationError('Ollama returned a body that is not JSON');
    }

    const parsed = OllamaResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ValidationError('Ollama response is missing the "response" field', parsed.error.issues);
    }
    if (!parsed.data.response) {
      throw new ValidationError('Ollama returned an empty response');
    }
    return parsed.data.response;
  }
}
