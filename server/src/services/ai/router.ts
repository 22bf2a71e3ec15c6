/**
 * AI Router - builds the configured text and image providers.
 *
 * TEXT_PROVIDER picks claude, openai, gemini or ollama for story text, scene
 * summaries and character extraction. IMAGE_PROVIDER picks the conversation
 * image client. A selected provider without credentials is a configuration
 * error and fails at startup, never at the first request.
 */

import { config, type Config } from '../../config/index.js';
import { ConfigurationError } from '../../errors/index.js';
import { ClaudeTextGenerator } from './claude.js';
import { GeminiTextGenerator } from './gemini.js';
import { GptImageClient } from './gptImage.js';
import { OllamaTextGenerator } from './ollama.js';
import { OpenAITextGenerator } from './openai.js';
import { StubImageClient } from './stubImage.js';
import type { ImageConversationClient, TextGenerator } from './types.js';

type AISettings = Config['ai'];

function requireKey(value: string, variable: string, provider: string): string {
  if (!value) {
    throw new ConfigurationError(`${provider} provider selected but ${variable} is not set`);
  }
  return value;
}

export function createTextGenerator(ai: AISettings = config.ai): TextGenerator {
  switch (ai.textProvider) {
    case 'claude':
      return new ClaudeTextGenerator({
        apiKey: requireKey(ai.anthropic, 'ANTHROPIC_API_KEY', 'Claude'),
        model: ai.models.claude,
        timeoutMs: ai.timeoutMs,
      });

    case 'openai':
      return new OpenAITextGenerator({
        apiKey: requireKey(ai.openai, 'OPENAI_API_KEY', 'OpenAI'),
        model: ai.models.openaiText,
        timeoutMs: ai.timeoutMs,
      });

    case 'gemini':
      return new GeminiTextGenerator({
        apiKey: requireKey(ai.google, 'GOOGLE_AI_API_KEY', 'Gemini'),
        model: ai.models.gemini,
        timeoutMs: ai.timeoutMs,
      });

    case 'ollama':
      return new OllamaTextGenerator({
        baseUrl: ai.ollama.baseUrl,
        model: ai.ollama.model,
        timeoutMs: ai.timeoutMs,
      });
  }
}

export function createImageClient(ai: AISettings = config.ai): ImageConversationClient {
  switch (ai.imageProvider) {
    case 'gpt-image':
      return new GptImageClient({
        apiKey: requireKey(ai.openai, 'OPENAI_API_KEY', 'GPT image'),
        model: ai.models.openaiImage,
        timeoutMs: ai.timeoutMs,
      });

    case 'stub':
      return new StubImageClient();
  }
}
