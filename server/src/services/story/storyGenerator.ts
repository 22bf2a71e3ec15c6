import { randomUUID } from 'crypto';
import type { Character, CharacterProfile, Page, Story, StoryMetadata } from '../../../../shared/types/index.js';
import { config } from '../../config/index.js';
import { ValidationError, describeError, isAbortError } from '../../errors/index.js';
import logger from '../../utils/logger.js';
import { withRetry } from '../../utils/retry.js';
import type { TextGenerator } from '../ai/types.js';
import { CharacterExtractor } from './characterExtractor.js';
import { paginate } from './paginator.js';
import { buildStoryPrompt } from './promptComposer.js';

const STORY_SYSTEM_MESSAGE =
  "You are an award-winning children's author. You write warm, vivid, age-appropriate stories that are a joy to read aloud.";

const STORY_TEMPERATURE = 0.8;
const MIN_STORY_TOKENS = 1000;
const MAX_STORY_TOKENS = 8000;
// Tokens per requested word, with headroom for languages that tokenize long
const TOKENS_PER_WORD = 2.25;

export function storyTokenBudget(metadata: StoryMetadata): number {
  const estimate = Math.round(metadata.numPages * metadata.wordsPerPage * TOKENS_PER_WORD);
  return Math.min(MAX_STORY_TOKENS, Math.max(MIN_STORY_TOKENS, estimate));
}

export interface GenerateStoryOptions {
  theme?: string;
  customPrompt?: string;
  signal?: AbortSignal;
  // Regeneration keeps the story identity
  storyId?: string;
}

export interface StoryGeneratorDeps {
  textGenerator: TextGenerator;
  extractor?: CharacterExtractor;
  retry?: { maxAttempts: number; baseDelayMs: number };
}

export class StoryGenerator {
  private textGenerator: TextGenerator;
  private extractor: CharacterExtractor;
  private retry: { maxAttempts: number; baseDelayMs: number };

  constructor(deps: StoryGeneratorDeps) {
    this.textGenerator = deps.textGenerator;
    this.extractor = deps.extractor ?? new CharacterExtractor(deps.textGenerator);
    this.retry = deps.retry ?? config.retry;
  }

  /**
   * Generate the story text and split it into pages. Transient provider
   * failures are retried; a reply that yields no pages is a ValidationError.
   */
  async generateStory(metadata: StoryMetadata, options: GenerateStoryOptions = {}): Promise<Story> {
    const prompt = buildStoryPrompt(metadata, options.theme, options.customPrompt);
    const maxTokens = storyTokenBudget(metadata);

    logger.info('STORY', `Generating "${metadata.title}" (${metadata.numPages} pages, maxTokens=${maxTokens})`);

    const text = await withRetry(
      () =>
        this.textGenerator.generateText(prompt, {
          systemMessage: STORY_SYSTEM_MESSAGE,
          temperature: STORY_TEMPERATURE,
          maxTokens,
          signal: options.signal,
        }),
      { label: 'story text', ...this.retry, signal: options.signal }
    );

    const pages = paginate(text, metadata.numPages, metadata.wordsPerPage);
    if (pages.length === 0) {
      throw new ValidationError('Story generation returned no usable text');
    }

    const now = new Date().toISOString();
    logger.info('STORY', `Story "${metadata.title}" generated with ${pages.length} pages`);
    return {
      id: options.storyId ?? randomUUID(),
      metadata,
      pages,
      createdAt: now,
      updatedAt: now,
    };
  }

  /**
   * Build character profiles from the story pages. One failed profile skips
   * that character; a failed extraction returns no profiles at all.
   */
  async extractCharacters(pages: Page[], signal?: AbortSignal): Promise<CharacterProfile[]> {
    let characters: Character[];
    try {
      characters = await this.extractor.extractCharacters(pages, signal);
    } catch (error) {
      if (isAbortError(error)) throw error;
      logger.error('CHARACTERS', 'Character extraction failed', describeError(error));
      return [];
    }

    const storyContext = pages
      .slice(0, 2)
      .map(page => page.text)
      .join(' ');

    const profiles: CharacterProfile[] = [];
    for (const character of characters) {
      try {
        profiles.push(await this.extractor.createProfile(character, storyContext, signal));
      } catch (error) {
        if (isAbortError(error)) throw error;
        logger.warn('CHARACTERS', `Skipping ${character.name}: profile generation failed`, describeError(error));
      }
    }
    return profiles;
  }
}
