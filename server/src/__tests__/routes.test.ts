import { once } from 'events';
import type { Server } from 'http';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { z } from 'zod';
import { createApp } from '../app.js';
import { FatalError } from '../errors/index.js';
import { ProjectOrchestrator } from '../services/project/projectOrchestrator.js';
import { AISceneSummarizer } from '../services/story/sceneSummarizer.js';
import { StoryGenerator } from '../services/story/storyGenerator.js';
import { VisualContextService } from '../services/visual/visualContext.js';
import { FakeImageClient, FakeTextGenerator, InMemoryProjectRepository, NO_RETRY, makeMetadata } from './helpers/fakes.js';

const CreatedSchema = z.object({ project: z.object({ id: z.string() }) });
const ProgressSchema = z.object({ projectId: z.string(), stage: z.string() });

describe('HTTP API', () => {
  const images = new FakeImageClient();
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const orchestrator = new ProjectOrchestrator({
      storyGenerator: new StoryGenerator({
        textGenerator: new FakeTextGenerator(() => 'Finn woke. He ran. He won.'),
        retry: NO_RETRY,
      }),
      visual: new VisualContextService({ imageClient: images, summarizer: new AISceneSummarizer(), retry: NO_RETRY }),
      repository: new InMemoryProjectRepository(),
    });
    server = createApp({ orchestrator, accessLog: false }).listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Server has no TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    server.close();
    await once(server, 'close');
  });

  function post(path: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  async function createStory(): Promise<string> {
    const res = await post('/api/stories', { metadata: makeMetadata() });
    return CreatedSchema.parse(await res.json()).project.id;
  }

  it('answers the health check', async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });

  it('serves the story options', async () => {
    const res = await fetch(`${baseUrl}/api/config/story-options`);
    expect(await res.json()).toMatchObject({
      success: true,
      parameters: { languages: expect.arrayContaining(['English']) },
      defaults: { artStyle: 'cartoon' },
      artStyleDetails: { watercolor: { colorPalette: 'soft pastel washes with muted earth tones' } },
    });
  });

  it('creates a story and reads it back', async () => {
    const res = await post('/api/stories', { metadata: makeMetadata(), projectName: 'Bedtime' });
    const body: unknown = await res.json();

    expect(res.status).toBe(201);
    expect(body).toMatchObject({ success: true, project: { name: 'Bedtime', status: 'story_generated' } });

    const read = await fetch(`${baseUrl}/api/projects/${CreatedSchema.parse(body).project.id}`);
    expect(await read.json()).toMatchObject({
      project: { story: { pages: [{ pageNumber: 1 }, { pageNumber: 2 }, { pageNumber: 3 }] } },
    });
  });

  it('rejects an invalid story request with the field at fault', async () => {
    const res = await post('/api/stories', { metadata: makeMetadata({ numPages: 0 }) });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: expect.stringMatching(/^Invalid request: metadata\.numPages: /),
      details: expect.any(Array),
    });
  });

  it('rejects a body that is not JSON', async () => {
    const res = await fetch(`${baseUrl}/api/stories`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"metadata":',
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Request body is not valid JSON' });
  });

  it('returns 404 for an unknown project and an unknown route', async () => {
    const missing = await fetch(`${baseUrl}/api/projects/nope`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: 'Project nope not found' });

    const unknown = await fetch(`${baseUrl}/api/unknown`);
    expect(unknown.status).toBe(404);
    expect(await unknown.json()).toEqual({ error: 'Not found' });
  });

  it('illustrates a single page with an edited prompt', async () => {
    const id = await createStory();

    const res = await post(`/api/images/stories/${id}/pages/2`, { customPrompt: 'Finn runs through tall grass.' });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ page: { pageNumber: 2, imagePrompt: 'Finn runs through tall grass.' } });
  });

  it('validates page numbers and image options', async () => {
    const id = await createStory();

    const badPage = await post(`/api/images/stories/${id}/pages/abc`, {});
    expect(badPage.status).toBe(400);
    expect(await badPage.json()).toEqual({ error: 'Invalid page number: abc' });

    const badSize = await post(`/api/images/stories/${id}`, { size: '640x480' });
    expect(badSize.status).toBe(400);
  });

  it('reports provider failures as 500 with their message', async () => {
    const id = await createStory();
    images.failWhen = () => new FatalError('content policy violation', 'stub', 400);

    try {
      const res = await post(`/api/images/stories/${id}/pages/1`, {});

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: 'content policy violation' });
    } finally {
      images.failWhen = undefined;
    }
  });

  it('composes an image prompt from a scene', async () => {
    const res = await post('/api/prompts/image', {
      sceneDescription: 'Finn runs to the river.',
      artStyle: 'watercolor',
      characterProfiles: [{ name: 'Finn', species: 'Fox', physicalDescription: 'red fur' }],
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      sceneSummary: 'Finn runs to the river.',
      prompt:
        "A watercolor style children's book illustration. Characters: Finn (a Fox, red fur). " +
        "Scene: Finn runs to the river. Vibrant colors, child-friendly, professional children's book illustration style.",
    });
  });

  it('composes an image prompt with the project art bible', async () => {
    const id = await createStory();
    await post('/api/visual-consistency/art-bible', { projectId: id, generateImage: false });

    const res = await post('/api/prompts/image', { projectId: id, sceneDescription: 'Finn naps.' });

    expect(await res.json()).toMatchObject({
      prompt: expect.stringMatching(
        /^A cartoon style children's book illustration\. Color palette: .* Scene: Finn naps\. Keep the art style, colors and character designs exactly consistent/
      ),
    });
  });

  it('validates prompt requests', async () => {
    const missing = await post('/api/prompts/image', {});
    expect(missing.status).toBe(400);
    expect(await missing.json()).toMatchObject({ error: expect.stringMatching(/^Invalid request: sceneDescription: /) });

    const unknown = await post('/api/prompts/image', { projectId: 'nope', sceneDescription: 'Finn naps.' });
    expect(unknown.status).toBe(404);
  });

  it('streams progress for the requested project only', async () => {
    const target = await createStory();
    const other = await createStory();
    const controller = new AbortController();
    const res = await fetch(`${baseUrl}/api/projects/progress?projectId=${target}`, { signal: controller.signal });
    if (!res.body) throw new Error('Progress stream has no body');
    const reader = res.body.getReader();
    const decoder = new TextDecoder();
    let received = '';

    const readUntil = async (marker: string) => {
      while (!received.includes(marker)) {
        const { done, value } = await reader.read();
        if (done) throw new Error('Progress stream ended early');
        received += decoder.decode(value, { stream: true });
      }
    };

    try {
      await readUntil('"connected":true');
      await post(`/api/images/stories/${other}`, {});
      await post(`/api/images/stories/${target}`, {});
      await readUntil('"isComplete":true');
    } finally {
      controller.abort();
    }

    const events = received
      .split('\n\n')
      .filter(chunk => chunk.startsWith('data: '))
      .slice(1)
      .map(chunk => ProgressSchema.parse(JSON.parse(chunk.slice('data: '.length))));

    expect(events.map(event => event.stage)).toEqual([
      'visual_context',
      'page_image',
      'page_image',
      'page_image',
      'complete',
    ]);
    expect(events.every(event => event.projectId === target)).toBe(true);
  });

  it('rebuilds and clears the visual session', async () => {
    const id = await createStory();

    const rebuilt = await post('/api/visual-consistency/session/rebuild', { projectId: id });
    expect(await rebuilt.json()).toMatchObject({ success: true, sessionId: expect.stringMatching(/^tok-\d+$/) });

    const cleared = await post('/api/visual-consistency/session/clear', { projectId: id });
    expect(await cleared.json()).toEqual({ success: true });
  });

  it('builds an art bible without drawing it', async () => {
    const id = await createStory();

    const res = await post('/api/visual-consistency/art-bible', { projectId: id, generateImage: false });
    const body: unknown = await res.json();

    expect(body).toMatchObject({ artBible: { artStyle: 'cartoon' } });
    expect(body).not.toHaveProperty('artBible.imageUrl');
  });

  it('deletes a project', async () => {
    const id = await createStory();

    const res = await fetch(`${baseUrl}/api/projects/${id}`, { method: 'DELETE' });

    expect(res.status).toBe(204);
    expect((await fetch(`${baseUrl}/api/projects/${id}`)).status).toBe(404);
  });
});
