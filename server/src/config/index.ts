import dotenv from 'dotenv';
import path from 'path';
import { ConfigurationError } from '../errors/index.js';
import { IMAGE_QUALITIES, IMAGE_SIZES, type ImageQuality, type ImageSize } from '../../../shared/types/index.js';

dotenv.config();

export type TextProvider = 'claude' | 'openai' | 'gemini' | 'ollama';
export type ImageProvider = 'gpt-image' | 'stub';

const TEXT_PROVIDERS: readonly TextProvider[] = ['claude', 'openai', 'gemini', 'ollama'];
const IMAGE_PROVIDERS: readonly ImageProvider[] = ['gpt-image', 'stub'];

function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function integer(key: string, defaultValue: number): number {
  const raw = process.env[key];
  if (!raw) return defaultValue;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    throw new ConfigurationError(`Environment variable ${key} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function oneOf<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
  const raw = process.env[key];
  if (!raw) return defaultValue;
  const match = allowed.find(value => value === raw);
  if (!match) {
    throw new ConfigurationError(`Environment variable ${key} must be one of ${allowed.join(', ')}, got "${raw}"`);
  }
  return match;
}

export const config = {
  // Server
  port: integer('PORT', 4000),
  nodeEnv: optional('NODE_ENV', 'development'),
  clientUrl: optional('CLIENT_URL', 'http://localhost:3000'),

  // Storage
  dataDir: path.resolve(optional('DATA_DIR', './data')),

  // AI Providers
  ai: {
    textProvider: oneOf('TEXT_PROVIDER', TEXT_PROVIDERS, 'claude'),
    imageProvider: oneOf('IMAGE_PROVIDER', IMAGE_PROVIDERS, 'gpt-image'),
    anthropic: optional('ANTHROPIC_API_KEY', ''),
    openai: optional('OPENAI_API_KEY', ''),
    google: optional('GOOGLE_AI_API_KEY', ''),
    ollama: {
      baseUrl: optional('OLLAMA_BASE_URL', 'http://localhost:11434'),
      model: optional('OLLAMA_MODEL', 'granite4:small-h'),
    },
    models: {
      claude: optional('CLAUDE_MODEL', 'claude-sonnet-4-20250514'),
      openaiText: optional('OPENAI_TEXT_MODEL', 'gpt-4o'),
      gemini: optional('GEMINI_MODEL', 'gemini-1.5-flash'),
      openaiImage: optional('OPENAI_IMAGE_MODEL', 'gpt-4o'),
    },
    timeoutMs: integer('AI_TIMEOUT_MS', 300_000),
  },

  // Retry policy for transient provider failures
  retry: {
    maxAttempts: Math.max(1, integer('RETRY_MAX_ATTEMPTS', 3)),
    baseDelayMs: integer('RETRY_BASE_DELAY_MS', 2000),
  },

  prompts: {
    maxImagePromptLength: integer('MAX_IMAGE_PROMPT_LENGTH', 1500),
  },

  images: {
    pageSize: oneOf<ImageSize>('PAGE_IMAGE_SIZE', IMAGE_SIZES, '1024x1024'),
    pageQuality: oneOf<ImageQuality>('PAGE_IMAGE_QUALITY', IMAGE_QUALITIES, 'high'),
    referenceSize: oneOf<ImageSize>('REFERENCE_IMAGE_SIZE', IMAGE_SIZES, '1536x1024'),
    referenceQuality: oneOf<ImageQuality>('REFERENCE_IMAGE_QUALITY', IMAGE_QUALITIES, 'low'),
  },
} as const;

export type Config = typeof config;
