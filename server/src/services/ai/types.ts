import type { ImageQuality, ImageSize } from '../../../../shared/types/index.js';
import type { ProviderName } from '../../errors/index.js';

export interface TextGenerationOptions {
  systemMessage?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

/**
 * Text generation capability. Implementations throw RetryableError or
 * FatalError (never raw SDK errors) on provider failures.
 */
export interface TextGenerator {
  readonly provider: ProviderName;
  generateText(prompt: string, options?: TextGenerationOptions): Promise<string>;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface StartSessionRequest {
  storyId: string;
  artStyle: string;
  title?: string;
}

export interface ImageTurnRequest {
  storyId: string;
  sessionToken: string;
  prompt: string;
  size: ImageSize;
  quality: ImageQuality;
}

export interface ImageTurnResult {
  imageUrl: string;
  // Providers chain turns; the next turn must continue from this token
  sessionToken: string;
}

/**
 * Multi-turn image generation. A session token identifies the provider-side
 * conversation that carries the art bible and character designs.
 */
export interface ImageConversationClient {
  readonly provider: ProviderName;
  startSession(request: StartSessionRequest, options?: CallOptions): Promise<string>;
  generateImage(request: ImageTurnRequest, options?: CallOptions): Promise<ImageTurnResult>;
  validateSession(storyId: string, sessionToken: string, options?: CallOptions): Promise<boolean>;
}
