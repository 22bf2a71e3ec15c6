/**
 * Offline image client for development (IMAGE_PROVIDER=stub).
 *
 * Returns placeholder URLs and chains fake session tokens so the whole
 * visual-context flow can run without an API key.
 */

import logger from '../../utils/logger.js';
import type {
  CallOptions,
  ImageConversationClient,
  ImageTurnRequest,
  ImageTurnResult,
  StartSessionRequest,
} from './types.js';

export class StubImageClient implements ImageConversationClient {
  readonly provider = 'stub' as const;
  private turn = 0;
  private issued = new Set<string>();

  async startSession(request: StartSessionRequest, _options?: CallOptions): Promise<string> {
    const token = this.nextToken(request.storyId);
    logger.debug('STUB_IMAGE', `Session ${token} started for ${request.storyId}`);
    return token;
  }

  async generateImage(request: ImageTurnRequest, _options?: CallOptions): Promise<ImageTurnResult> {
    const [width, height] = request.size === 'auto' ? ['1024', '1024'] : request.size.split('x');
    const label = request.prompt.split(/\s+/).filter(Boolean).slice(0, 3).join(' ') || 'Story Image';
    return {
      imageUrl: `https://placehold.co/${width}x${height}?text=${encodeURIComponent(label)}`,
      sessionToken: this.nextToken(request.storyId),
    };
  }

  async validateSession(_storyId: string, sessionToken: string, _options?: CallOptions): Promise<boolean> {
    return this.issued.has(sessionToken);
  }

  private nextToken(storyId: string): string {
    this.turn += 1;
    const token = `stub_${storyId}_${this.turn}`;
    this.issued.add(token);
    return token;
  }
}
