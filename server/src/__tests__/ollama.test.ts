import { afterEach, describe, it, expect, vi } from 'vitest';
import { FatalError, RetryableError, ValidationError } from '../errors/index.js';
import { OllamaTextGenerator } from '../services/ai/ollama.js';

const settings = { baseUrl: 'http://ollama.test', model: 'tiny', timeoutMs: 5_000 };

function respondWith(response: Response) {
  const fetchMock = vi.fn(async () => response);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('OllamaTextGenerator', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the generated text', async () => {
    const fetchMock = respondWith(new Response(JSON.stringify({ response: 'Once upon a time.' }), { status: 200 }));

    const text = await new OllamaTextGenerator(settings).generateText('Tell a story', {
      systemMessage: 'Be kind',
      maxTokens: 100,
    });

    expect(text).toBe('Once upon a time.');
    expect(fetchMock).toHaveBeenCalledWith('http://ollama.test/api/generate', expect.objectContaining({ method: 'POST' }));
  });

  it('maps 503 with Retry-After to a retryable error', async () => {
    respondWith(new Response('busy', { status: 503, headers: { 'Retry-After': '2' } }));

    const failure = new OllamaTextGenerator(settings).generateText('Tell a story');

    await expect(failure).rejects.toBeInstanceOf(RetryableError);
    await expect(failure).rejects.toMatchObject({ status: 503, retryAfterMs: 2000 });
  });

  it('maps other client errors to a fatal error', async () => {
    respondWith(new Response('model not found', { status: 404 }));

    await expect(new OllamaTextGenerator(settings).generateText('Tell a story')).rejects.toBeInstanceOf(FatalError);
  });

  it('rejects an empty or malformed reply', async () => {
    respondWith(new Response(JSON.stringify({ done: true }), { status: 200 }));

    await expect(new OllamaTextGenerator(settings).generateText('Tell a story')).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it('treats a refused connection as transient', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    await expect(new OllamaTextGenerator(settings).generateText('Tell a story')).rejects.toBeInstanceOf(
      RetryableError
    );
  });
});
