/**
 * Conversation image client on the OpenAI Responses API.
 *
 * Every image for a story (art bible, character sheets, pages) is produced in
 * one response chain: each turn passes the previous response id, so the model
 * keeps the established style and characters in context. The response id of
 * the latest turn is the session token.
 */

import OpenAI from 'openai';
import { z } from 'zod';
import { SessionInvalidError, ValidationError } from '../../errors/index.js';
import logger from '../../utils/logger.js';
import { buildSessionSystemPrompt } from '../story/promptComposer.js';
import { createOpenAIClient, toOpenAIProviderError } from './openai.js';
import type {
  CallOptions,
  ImageConversationClient,
  ImageTurnRequest,
  ImageTurnResult,
  StartSessionRequest,
} from './types.js';

export interface GptImageSettings {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

const ImageGenerationCallSchema = z.object({
  type: z.literal('image_generation_call'),
  result: z.string().nullish(),
  status: z.string().optional(),
});

const MessageSchema = z.object({
  type: z.literal('message'),
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
});

const OutputItemSchema = z.discriminatedUnion('type', [ImageGenerationCallSchema, MessageSchema]);

const ResponseEnvelopeSchema = z.object({
  id: z.string().min(1),
  output: z.array(z.unknown()).default([]),
});

export interface DecodedImageTurn {
  responseId: string;
  imageUrl: string;
}

export function toImageUrl(result: string): string {
  if (result.startsWith('http') || result.startsWith('data:')) {
    return result;
  }
  return `data:image/png;base64,${result}`;
}

/**
 * Decode a Responses API payload into the image it produced. Output items of
 * other types (reasoning, tool calls) are skipped. A reply that only contains
 * text is the one fallback path: it fails with the model's own words.
 */
export function decodeImageTurn(payload: unknown): DecodedImageTurn {
  const envelope = ResponseEnvelopeSchema.safeParse(payload);
  if (!envelope.success) {
    throw new ValidationError('Image response is missing its id or output', envelope.error.issues);
  }

  const replyText: string[] = [];
  for (const raw of envelope.data.output) {
    const item = OutputItemSchema.safeParse(raw);
    if (!item.success) continue;

    switch (item.data.type) {
      case 'image_generation_call':
        if (item.data.result) {
          return { responseId: envelope.data.id, imageUrl: toImageUrl(item.data.result) };
        }
        break;
      case 'message':
        for (const part of item.data.content) {
          if (part.text) replyText.push(part.text);
        }
        break;
    }
  }

  const reply = replyText.join(' ').trim();
  throw new ValidationError(
    reply ? `No image was generated; model replied: ${reply.slice(0, 300)}` : 'No image was generated in the response'
  );
}

export class GptImageClient implements ImageConversationClient {
  readonly provider = 'gpt-image' as const;
  private client: OpenAI;

  constructor(private settings: GptImageSettings) {
    this.client = createOpenAIClient(settings.apiKey, settings.timeoutMs);
  }

  async startSession(request: StartSessionRequest, options: CallOptions = {}): Promise<string> {
    logger.info('GPT_IMAGE', `Starting session for story ${request.storyId} (style: ${request.artStyle})`);

    try {
      const response = await this.client.responses.create(
        {
          model: this.settings.model,
          input: buildSessionSystemPrompt(request.artStyle, request.title),
        },
        { signal: options.signal }
      );
      logger.info('GPT_IMAGE', `Session started for story ${request.storyId}: ${response.id}`);
      return response.id;
    } catch (error) {
      throw toOpenAIProviderError(error, this.provider);
    }
  }

  async generateImage(request: ImageTurnRequest, options: CallOptions = {}): Promise<ImageTurnResult> {
    logger.info(
      'GPT_IMAGE',
      `generateImage story=${request.storyId} size=${request.size} quality=${request.quality} previous=${request.sessionToken}`
    );
    logger.debug('GPT_IMAGE', `Prompt (first 200 chars): ${request.prompt.slice(0, 200)}`);

    let response: OpenAI.Responses.Response;
    try {
      response = await this.client.responses.create(
        {
          model: this.settings.model,
          input: request.prompt,
          previous_response_id: request.sessionToken,
          tools: [{ type: 'image_generation', size: request.size, quality: request.quality }],
        },
        { signal: options.signal }
      );
    } catch (error) {
      // The chain is gone when the provider rejects the previous response id itself
      if (error instanceof OpenAI.APIError && (error.status === 404 || error.param === 'previous_response_id')) {
        throw new SessionInvalidError(
          `Session ${request.sessionToken} is no longer valid: ${error.message}`,
          this.provider,
          error.status,
          { cause: error }
        );
      }
      throw toOpenAIProviderError(error, this.provider);
    }

    const decoded = decodeImageTurn(response);
    logger.info('GPT_IMAGE', `Image generated for story ${request.storyId}, session now ${decoded.responseId}`);
    return { imageUrl: decoded.imageUrl, sessionToken: decoded.responseId };
  }

  async validateSession(storyId: string, sessionToken: string, options: CallOptions = {}): Promise<boolean> {
    try {
      await this.client.responses.retrieve(sessionToken, {}, { signal: options.signal });
      return true;
    } catch (error) {
      if (error instanceof OpenAI.NotFoundError) {
        logger.info('GPT_IMAGE', `Stored session for story ${storyId} no longer exists`);
        return false;
      }
      throw toOpenAIProviderError(error, this.provider);
    }
  }
}
