/**
 * Visual context orchestration.
 *
 * Keeps one image conversation per story so that the art bible, the character
 * reference sheets and every page illustration are drawn in the same thread.
 * A missing or rejected session is rebuilt by opening a new conversation and
 * replaying the art bible and character references into it.
 *
 * Session lifecycle per story:
 *   NoSession -> SessionLoadedUnvalidated -> ContextInitialized
 * and clearSession() returns to NoSession.
 */

import type {
  ArtBible,
  CharacterProfile,
  CharacterReference,
  ImageQuality,
  ImageSize,
  Story,
} from '../../../../shared/types/index.js';
import { config } from '../../config/index.js';
import {
  ConfigurationError,
  SessionInvalidError,
  ValidationError,
  describeError,
  isAbortError,
} from '../../errors/index.js';
import logger from '../../utils/logger.js';
import { throwIfAborted, withRetry } from '../../utils/retry.js';
import type { ImageConversationClient } from '../ai/types.js';
import { composeConversationPrompt, composeImagePrompt } from '../story/promptComposer.js';
import type { SceneSummarizer } from '../story/sceneSummarizer.js';
import { SessionStore } from './sessionStore.js';

export const DEFAULT_ART_STYLE = 'cartoon';

export interface ImageSettings {
  pageSize: ImageSize;
  pageQuality: ImageQuality;
  referenceSize: ImageSize;
  referenceQuality: ImageQuality;
}

export interface VisualContextDeps {
  imageClient: ImageConversationClient;
  summarizer: SceneSummarizer;
  sessions?: SessionStore;
  retry?: { maxAttempts: number; baseDelayMs: number };
  images?: ImageSettings;
  maxPromptLength?: number;
}

export interface VisualOptions {
  signal?: AbortSignal;
}

export interface PageImageOptions extends VisualOptions {
  // Replaces the summarized scene prompt
  customPrompt?: string;
}

export interface StoryImageOptions extends VisualOptions {
  size?: ImageSize;
  quality?: ImageQuality;
  onPage?: (pageNumber: number, totalPages: number) => void;
}

export interface PageImage {
  imageUrl: string;
  prompt: string;
}

export interface StandalonePrompt {
  sceneSummary: string;
  prompt: string;
}

export class VisualContextService {
  readonly sessions: SessionStore;
  private imageClient: ImageConversationClient;
  private summarizer: SceneSummarizer;
  private retry: { maxAttempts: number; baseDelayMs: number };
  private images: ImageSettings;
  private maxPromptLength: number;

  constructor(deps: VisualContextDeps) {
    this.imageClient = deps.imageClient;
    this.summarizer = deps.summarizer;
    this.sessions = deps.sessions ?? new SessionStore();
    this.retry = deps.retry ?? config.retry;
    this.images = deps.images ?? config.images;
    this.maxPromptLength = deps.maxPromptLength ?? config.prompts.maxImagePromptLength;
  }

  /**
   * Return a session token that is known to carry the story's visual context,
   * validating a stored token or rebuilding the context when needed.
   */
  ensureSession(story: Story, options: VisualOptions = {}): Promise<string> {
    return this.sessions.withLock(story.id, () => this.ensureSessionUnlocked(story, options.signal));
  }

  rebuildVisualContext(story: Story, options: VisualOptions = {}): Promise<string> {
    return this.sessions.withLock(story.id, () => this.rebuildUnlocked(story, options.signal));
  }

  generateImageForPage(
    story: Story,
    sceneText: string,
    characterProfiles: CharacterProfile[],
    artStyle: string,
    size: ImageSize,
    quality: ImageQuality,
    options: PageImageOptions = {}
  ): Promise<PageImage> {
    return this.sessions.withLock(story.id, () =>
      this.pageImageUnlocked(story, sceneText, characterProfiles, artStyle, size, quality, options)
    );
  }

  /**
   * Illustrate every page in order. A failed page is logged and left without
   * an image; configuration errors and aborts stop the run.
   */
  generateImagesForStory(story: Story, options: StoryImageOptions = {}): Promise<Story> {
    return this.sessions.withLock(story.id, () => this.storyImagesUnlocked(story, options));
  }

  generateArtBibleImage(story: Story, options: VisualOptions = {}): Promise<ArtBible> {
    return this.sessions.withLock(story.id, async () => {
      const artBible = story.artBible;
      if (!artBible?.prompt) {
        throw new ValidationError(`Story ${story.id} has no art bible to illustrate`);
      }
      artBible.imageUrl = await this.referenceTurn(story, artBible.prompt, 'art bible', options.signal);
      story.updatedAt = new Date().toISOString();
      return artBible;
    });
  }

  generateCharacterReferenceImage(
    story: Story,
    characterName: string,
    options: VisualOptions = {}
  ): Promise<CharacterReference> {
    return this.sessions.withLock(story.id, async () => {
      const key = characterName.toLowerCase();
      const reference = story.characterReferences?.find(ref => ref.characterName.toLowerCase() === key);
      if (!reference?.prompt) {
        throw new ValidationError(`Story ${story.id} has no character reference for ${characterName}`);
      }
      reference.imageUrl = await this.referenceTurn(
        story,
        reference.prompt,
        `character ${reference.characterName}`,
        options.signal
      );
      story.updatedAt = new Date().toISOString();
      return reference;
    });
  }

  /**
   * Self-contained prompt for a scene, for use outside an image conversation:
   * the scene is summarized, then style, characters and references are
   * restated in full.
   */
  async composeStandalonePrompt(
    sceneText: string,
    characterProfiles: CharacterProfile[],
    artStyle: string,
    artBible?: ArtBible,
    characterReferences: CharacterReference[] = [],
    options: VisualOptions = {}
  ): Promise<StandalonePrompt> {
    const sceneSummary = await this.summarizer.summarize(sceneText, characterProfiles, options.signal);
    const prompt = composeImagePrompt(
      sceneSummary,
      characterProfiles,
      artStyle,
      artBible,
      characterReferences,
      this.maxPromptLength
    );
    logger.debug('VISUAL', `Composed standalone prompt (${prompt.length} chars) for ${characterProfiles.length} characters`);
    return { sceneSummary, prompt };
  }

  clearSession(storyId: string): Promise<void> {
    return this.sessions.withLock(storyId, async () => {
      this.sessions.clear(storyId);
      logger.info('VISUAL', `Cleared image session for story ${storyId}`);
    });
  }

  // Everything below assumes the caller holds the story's lock

  private async ensureSessionUnlocked(story: Story, signal?: AbortSignal): Promise<string> {
    throwIfAborted(signal);

    const loaded = this.sessions.get(story.id);
    if (loaded && this.sessions.isInitialized(story.id)) {
      return loaded;
    }

    const stored = loaded ?? story.imageSessionId;
    if (stored) {
      if (!loaded) this.sessions.set(story.id, stored);

      let valid = false;
      try {
        valid = await this.imageClient.validateSession(story.id, stored, { signal });
      } catch (error) {
        if (isAbortError(error)) throw error;
        logger.warn('VISUAL', `Could not validate session for story ${story.id}, rebuilding`, describeError(error));
      }

      if (valid) {
        this.sessions.markInitialized(story.id);
        story.imageSessionId = stored;
        logger.info('VISUAL', `Reusing stored session for story ${story.id}`);
        return stored;
      }
      logger.info('VISUAL', `Stored session for story ${story.id} is no longer valid`);
    }

    return this.rebuildUnlocked(story, signal);
  }

  private async rebuildUnlocked(story: Story, signal?: AbortSignal): Promise<string> {
    logger.info('VISUAL', `Rebuilding visual context for story ${story.id}`);
    this.sessions.clear(story.id);
    await this.openSession(story, signal);

    const artBible = story.artBible;
    if (artBible?.prompt) {
      try {
        artBible.imageUrl = await this.turn(
          story,
          artBible.prompt,
          this.images.referenceSize,
          this.images.referenceQuality,
          signal
        );
      } catch (error) {
        if (isAbortError(error)) throw error;
        logger.error('VISUAL', `Art bible failed during rebuild for story ${story.id}`, describeError(error));
      }
    }

    for (const reference of story.characterReferences ?? []) {
      if (!reference.prompt.trim()) continue;
      try {
        reference.imageUrl = await this.turn(
          story,
          reference.prompt,
          this.images.referenceSize,
          this.images.referenceQuality,
          signal
        );
      } catch (error) {
        if (isAbortError(error)) throw error;
        logger.error('VISUAL', `Character reference ${reference.characterName} failed during rebuild`, describeError(error));
      }
    }

    const token = this.requireToken(story.id);
    this.sessions.markInitialized(story.id);
    story.imageSessionId = token;
    logger.info('VISUAL', `Visual context ready for story ${story.id}`);
    return token;
  }

  private async pageImageUnlocked(
    story: Story,
    sceneText: string,
    characterProfiles: CharacterProfile[],
    artStyle: string,
    size: ImageSize,
    quality: ImageQuality,
    options: PageImageOptions
  ): Promise<PageImage> {
    const { signal } = options;
    await this.ensureSessionUnlocked(story, signal);

    let prompt = options.customPrompt?.trim();
    if (!prompt) {
      const summary = await this.summarizer.summarize(sceneText, characterProfiles, signal);
      prompt = composeConversationPrompt(summary, artStyle, this.maxPromptLength);
    }

    let imageUrl: string;
    try {
      imageUrl = await this.turn(story, prompt, size, quality, signal);
    } catch (error) {
      if (!(error instanceof SessionInvalidError)) throw error;
      logger.warn('VISUAL', `Session rejected for story ${story.id}, rebuilding once`, describeError(error));
      await this.rebuildUnlocked(story, signal);
      imageUrl = await this.turn(story, prompt, size, quality, signal);
    }

    return { imageUrl, prompt };
  }

  private async storyImagesUnlocked(story: Story, options: StoryImageOptions): Promise<Story> {
    const { signal } = options;
    const artStyle = story.metadata.artStyle ?? DEFAULT_ART_STYLE;
    const profiles = story.characters ?? [];
    const size = options.size ?? this.images.pageSize;
    const quality = options.quality ?? this.images.pageQuality;
    const pages = [...story.pages].sort((a, b) => a.pageNumber - b.pageNumber);

    let generated = 0;
    for (const page of pages) {
      throwIfAborted(signal);

      // A session that cannot be opened fails every later page the same way
      try {
        await this.ensureSessionUnlocked(story, signal);
      } catch (error) {
        if (error instanceof ConfigurationError || isAbortError(error)) throw error;
        logger.error(
          'VISUAL',
          `No image session for story ${story.id}, skipping the remaining pages`,
          describeError(error)
        );
        break;
      }

      options.onPage?.(page.pageNumber, pages.length);

      try {
        const result = await this.pageImageUnlocked(story, page.text, profiles, artStyle, size, quality, { signal });
        page.imageUrl = result.imageUrl;
        page.imagePrompt = result.prompt;
        generated++;
      } catch (error) {
        if (error instanceof ConfigurationError || isAbortError(error)) throw error;
        logger.error('VISUAL', `Page ${page.pageNumber} of story ${story.id} failed`, describeError(error));
      }
    }

    story.updatedAt = new Date().toISOString();
    logger.info('VISUAL', `Generated ${generated}/${pages.length} page images for story ${story.id}`);
    return story;
  }

  /**
   * One reference image inside the story's session. Opens a session without
   * replaying references when none exists, and starts over once if the
   * provider has forgotten the stored one.
   */
  private async referenceTurn(story: Story, prompt: string, label: string, signal?: AbortSignal): Promise<string> {
    const { referenceSize, referenceQuality } = this.images;

    if (!this.sessions.get(story.id)) {
      if (story.imageSessionId) {
        this.sessions.set(story.id, story.imageSessionId);
      } else {
        await this.openSession(story, signal);
      }
    }

    logger.info('VISUAL', `Generating ${label} image for story ${story.id}`);
    try {
      return await this.turn(story, prompt, referenceSize, referenceQuality, signal);
    } catch (error) {
      if (!(error instanceof SessionInvalidError)) throw error;
      logger.warn('VISUAL', `Session rejected for story ${story.id}, opening a new one`, describeError(error));
      this.sessions.clear(story.id);
      await this.openSession(story, signal);
      return this.turn(story, prompt, referenceSize, referenceQuality, signal);
    }
  }

  private async openSession(story: Story, signal?: AbortSignal): Promise<string> {
    const request = {
      storyId: story.id,
      artStyle: story.metadata.artStyle ?? DEFAULT_ART_STYLE,
      title: story.metadata.title,
    };
    const token = await withRetry(() => this.imageClient.startSession(request, { signal }), {
      label: `start session ${story.id}`,
      ...this.retry,
      signal,
    });
    this.sessions.set(story.id, token);
    story.imageSessionId = token;
    return token;
  }

  // A single image turn; the rotated token replaces the stored one
  private async turn(
    story: Story,
    prompt: string,
    size: ImageSize,
    quality: ImageQuality,
    signal?: AbortSignal
  ): Promise<string> {
    const sessionToken = this.requireToken(story.id);
    const result = await withRetry(
      () => this.imageClient.generateImage({ storyId: story.id, sessionToken, prompt, size, quality }, { signal }),
      { label: `image turn ${story.id}`, ...this.retry, signal }
    );
    this.sessions.set(story.id, result.sessionToken);
    story.imageSessionId = result.sessionToken;
    return result.imageUrl;
  }

  private requireToken(storyId: string): string {
    const token = this.sessions.get(storyId);
    if (!token) {
      throw new Error(`No image session for story ${storyId}`);
    }
    return token;
  }
}
