import type { CharacterProfile } from '../../../../shared/types/index.js';
import { GenerationAbortedError, describeError, isAbortError } from '../../errors/index.js';
import logger from '../../utils/logger.js';
import type { TextGenerator } from '../ai/types.js';
import { buildSceneSummaryRequest, smartTruncate } from './promptComposer.js';

const FALLBACK_LENGTH = 200;

export interface SceneSummarizer {
  summarize(sceneText: string, profiles: CharacterProfile[], signal?: AbortSignal): Promise<string>;
}

/**
 * Condenses a page into the visual moment to illustrate. Any provider failure
 * degrades to a word-boundary truncation of the page; only an abort escapes.
 */
export class AISceneSummarizer implements SceneSummarizer {
  constructor(private textGenerator?: TextGenerator) {}

  async summarize(sceneText: string, profiles: CharacterProfile[], signal?: AbortSignal): Promise<string> {
    const fallback = smartTruncate(sceneText.trim(), FALLBACK_LENGTH);
    if (!this.textGenerator) return fallback;

    const request = buildSceneSummaryRequest(sceneText, profiles);
    try {
      const summary = await this.textGenerator.generateText(request.prompt, {
        systemMessage: request.systemMessage,
        temperature: 0.3,
        maxTokens: 200,
        signal,
      });
      return summary.trim() || fallback;
    } catch (error) {
      if (isAbortError(error)) throw error;
      if (signal?.aborted) throw new GenerationAbortedError();
      logger.warn('SCENE', 'Scene summary failed, using truncated page text', describeError(error));
      return fallback;
    }
  }
}
