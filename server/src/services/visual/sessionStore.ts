/**
 * In-memory image conversation sessions, keyed by story id.
 *
 * Providers rotate the session token on every turn, so `set` replaces the
 * token but keeps the initialized flag. Work that spans awaits must run under
 * `withLock` so turns for one story never interleave.
 */

interface SessionEntry {
  token?: string;
  initialized: boolean;
}

export class SessionStore {
  private sessions = new Map<string, SessionEntry>();
  private locks = new Map<string, Promise<void>>();

  get(storyId: string): string | undefined {
    return this.sessions.get(storyId)?.token;
  }

  set(storyId: string, token: string): void {
    const entry = this.sessions.get(storyId);
    this.sessions.set(storyId, { token, initialized: entry?.initialized ?? false });
  }

  clear(storyId: string): void {
    this.sessions.delete(storyId);
  }

  isInitialized(storyId: string): boolean {
    return this.sessions.get(storyId)?.initialized ?? false;
  }

  markInitialized(storyId: string): void {
    const entry = this.sessions.get(storyId);
    this.sessions.set(storyId, { token: entry?.token, initialized: true });
  }

  /**
   * Run task once every earlier task for the same story has settled. Tasks for
   * other stories are not blocked.
   */
  async withLock<T>(storyId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(storyId) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(storyId, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.locks.get(storyId) === tail) {
        this.locks.delete(storyId);
      }
    }
  }
}
