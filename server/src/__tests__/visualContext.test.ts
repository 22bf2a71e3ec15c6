import { beforeEach, describe, it, expect } from 'vitest';
import { ConfigurationError, FatalError, GenerationAbortedError, ValidationError } from '../errors/index.js';
import { AISceneSummarizer } from '../services/story/sceneSummarizer.js';
import { VisualContextService } from '../services/visual/visualContext.js';
import { FakeImageClient, NO_RETRY, makeStory } from './helpers/fakes.js';

const IMAGES = {
  pageSize: '1024x1024',
  pageQuality: 'high',
  referenceSize: '1536x1024',
  referenceQuality: 'low',
} as const;

describe('VisualContextService', () => {
  let client: FakeImageClient;
  let visual: VisualContextService;

  beforeEach(() => {
    client = new FakeImageClient();
    visual = new VisualContextService({
      imageClient: client,
      summarizer: new AISceneSummarizer(),
      retry: NO_RETRY,
      images: IMAGES,
    });
  });

  describe('ensureSession', () => {
    it('rebuilds at most once across repeated calls', async () => {
      const story = makeStory();

      const first = await visual.ensureSession(story);
      const second = await visual.ensureSession(story);

      expect(first).toBe('tok-1');
      expect(second).toBe('tok-1');
      expect(client.sessionsStarted).toHaveLength(1);
      expect(client.validations).toEqual([]);
      expect(story.imageSessionId).toBe('tok-1');
    });

    it('opens the session with the art style and title', async () => {
      await visual.ensureSession(makeStory());

      expect(client.sessionsStarted).toEqual([{ storyId: 'story-1', artStyle: 'cartoon', title: 'The Brave Fox' }]);
    });

    it('reuses a stored session that the provider still knows', async () => {
      client.accept('tok-saved');
      const story = makeStory({ imageSessionId: 'tok-saved' });

      const token = await visual.ensureSession(story);

      expect(token).toBe('tok-saved');
      expect(client.validations).toEqual(['tok-saved']);
      expect(client.sessionsStarted).toHaveLength(0);
      expect(visual.sessions.isInitialized('story-1')).toBe(true);
    });

    it('rebuilds exactly once when the stored session is invalid', async () => {
      const story = makeStory({ imageSessionId: 'tok-stale' });

      const token = await visual.ensureSession(story);

      expect(token).toBe('tok-1');
      expect(client.sessionsStarted).toHaveLength(1);
      expect(story.imageSessionId).toBe('tok-1');
    });

    it('rebuilds when validating the stored session fails', async () => {
      client.accept('tok-saved');
      client.validateError = new FatalError('lookup failed', 'stub', 500);
      const story = makeStory({ imageSessionId: 'tok-saved' });

      const token = await visual.ensureSession(story);

      expect(token).toBe('tok-1');
      expect(client.sessionsStarted).toHaveLength(1);
    });
  });

  describe('rebuildVisualContext', () => {
    it('still replays every character reference when the art bible fails', async () => {
      client.failWhen = request => (request.prompt === 'ART' ? new FatalError('boom', 'stub', 400) : undefined);
      const story = makeStory({
        artBible: { prompt: 'ART', artStyle: 'cartoon' },
        characterReferences: [
          { characterName: 'Luna', prompt: 'LUNA' },
          { characterName: 'Max', prompt: 'MAX' },
          { characterName: 'Blank', prompt: '   ' },
        ],
      });

      const token = await visual.ensureSession(story);

      expect(client.turns.map(turn => turn.prompt)).toEqual(['ART', 'LUNA', 'MAX']);
      expect(story.artBible?.imageUrl).toBeUndefined();
      expect(story.characterReferences?.map(ref => ref.imageUrl)).toEqual([
        'https://images.test/2.png',
        'https://images.test/3.png',
        undefined,
      ]);
      expect(token).toBe('tok-3');
      expect(story.imageSessionId).toBe('tok-3');
    });

    it('draws references at the reference size and quality', async () => {
      const story = makeStory({ artBible: { prompt: 'ART', artStyle: 'cartoon' } });

      await visual.rebuildVisualContext(story);

      expect(client.turns[0]).toMatchObject({ prompt: 'ART', size: '1536x1024', quality: 'low', sessionToken: 'tok-1' });
    });
  });

  describe('generateImagesForStory', () => {
    it('leaves a failed page without an image and carries on', async () => {
      client.failWhen = request =>
        request.prompt.includes('meadow') ? new FatalError('content rejected', 'stub', 400) : undefined;
      const story = makeStory();

      const result = await visual.generateImagesForStory(story);

      expect(result.pages.map(page => page.imageUrl)).toEqual([
        'https://images.test/1.png',
        undefined,
        'https://images.test/3.png',
      ]);
      expect(result.pages[0].imagePrompt).toContain('Scene: Finn the fox woke up early.');
      expect(client.turns.every(turn => turn.size === '1024x1024' && turn.quality === 'high')).toBe(true);
    });

    it('reports each page before illustrating it', async () => {
      const seen: Array<[number, number]> = [];

      await visual.generateImagesForStory(makeStory(), { onPage: (page, total) => seen.push([page, total]) });

      expect(seen).toEqual([
        [1, 3],
        [2, 3],
        [3, 3],
      ]);
    });

    it('tries to open a session once when the provider refuses it', async () => {
      client.startError = new FatalError('invalid api key', 'stub', 401);
      const seen: number[] = [];

      const result = await visual.generateImagesForStory(makeStory(), { onPage: page => seen.push(page) });

      expect(client.sessionsStarted).toHaveLength(1);
      expect(client.turns).toHaveLength(0);
      expect(seen).toEqual([]);
      expect(result.pages.map(page => page.imageUrl)).toEqual([undefined, undefined, undefined]);
    });

    it('stops on a configuration error', async () => {
      client.failWhen = () => new ConfigurationError('OPENAI_API_KEY is not set');

      await expect(visual.generateImagesForStory(makeStory())).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('stops when aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(visual.generateImagesForStory(makeStory(), { signal: controller.signal })).rejects.toBeInstanceOf(
        GenerationAbortedError
      );
      expect(client.turns).toHaveLength(0);
    });
  });

  describe('generateImageForPage', () => {
    it('rebuilds once and retries when the provider forgets the session', async () => {
      const story = makeStory();
      await visual.ensureSession(story);
      client.revoke('tok-1');

      const result = await visual.generateImageForPage(story, 'The owl hoots.', [], 'cartoon', '1024x1024', 'high');

      expect(result.imageUrl).toBe('https://images.test/2.png');
      expect(client.sessionsStarted).toHaveLength(2);
      expect(client.turns.map(turn => turn.sessionToken)).toEqual(['tok-1', 'tok-2']);
      expect(story.imageSessionId).toBe('tok-3');
    });

    it('sends a caller-edited prompt as is', async () => {
      const result = await visual.generateImageForPage(makeStory(), 'ignored', [], 'cartoon', 'auto', 'auto', {
        customPrompt: 'Draw the owl on a branch.',
      });

      expect(result.prompt).toBe('Draw the owl on a branch.');
      expect(client.turns[0].prompt).toBe('Draw the owl on a branch.');
    });
  });

  describe('reference images', () => {
    it('draws the art bible in a new session without replaying references', async () => {
      const story = makeStory({
        artBible: { prompt: 'ART', artStyle: 'cartoon' },
        characterReferences: [{ characterName: 'Luna', prompt: 'LUNA' }],
      });

      const artBible = await visual.generateArtBibleImage(story);

      expect(artBible.imageUrl).toBe('https://images.test/1.png');
      expect(client.turns.map(turn => turn.prompt)).toEqual(['ART']);
      expect(story.imageSessionId).toBe('tok-2');
    });

    it('finds character references by name regardless of case', async () => {
      const story = makeStory({ characterReferences: [{ characterName: 'Luna', prompt: 'LUNA' }] });

      const reference = await visual.generateCharacterReferenceImage(story, 'luna');

      expect(reference.imageUrl).toBe('https://images.test/1.png');
    });

    it('rejects an unknown character', async () => {
      await expect(visual.generateCharacterReferenceImage(makeStory(), 'Nobody')).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('starts over once when the stored session is gone', async () => {
      const story = makeStory({
        imageSessionId: 'tok-stale',
        artBible: { prompt: 'ART', artStyle: 'cartoon' },
      });

      const artBible = await visual.generateArtBibleImage(story);

      expect(client.turns.map(turn => turn.sessionToken)).toEqual(['tok-stale', 'tok-1']);
      expect(artBible.imageUrl).toBe('https://images.test/2.png');
    });
  });

  it('forgets the session on clearSession', async () => {
    const story = makeStory();
    await visual.ensureSession(story);

    await visual.clearSession(story.id);

    expect(visual.sessions.get(story.id)).toBeUndefined();
    await visual.ensureSession(story);
    expect(client.validations).toEqual(['tok-1']);
  });
});
