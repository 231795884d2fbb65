/**
 * In-memory conversation state keyed by session id, with a per-session
 * promise chain so that work for one session never interleaves.
 */
export class SessionStore<S> {
  private readonly sessions = new Map<string, S>();
  private readonly queues = new Map<string, Promise<void>>();

  get(sessionId: string): S | undefined {
    return this.sessions.get(sessionId);
  }

  set(sessionId: string, state: S): void {
    this.sessions.set(sessionId, state);
  }

  clear(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(sessionId) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.queues.set(sessionId, tail);
    void tail.then(() => {
      if (this.queues.get(sessionId) === tail) {
        this.queues.delete(sessionId);
      }
    });
    return result;
  }
}
