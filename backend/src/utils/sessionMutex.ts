// Per-session FIFO mutex. Each run() waits on the tail of the session's chain
// and becomes the new tail. Sessions never contend with each other.

export type SessionMutexTask<T> = () => Promise<T> | T;

export class SessionMutex {
  private chains = new Map<string, Promise<void>>();

  async run<T>(sessionKey: string, task: SessionMutexTask<T>): Promise<T> {
    const prev = this.chains.get(sessionKey) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });

    const tail = prev.then(() => done);
    this.chains.set(sessionKey, tail);

    try {
      await prev;
      return await task();
    } finally {
      release();
      // Drop the chain when nobody queued behind us
      if (this.chains.get(sessionKey) === tail) {
        this.chains.delete(sessionKey);
      }
    }
  }
}
