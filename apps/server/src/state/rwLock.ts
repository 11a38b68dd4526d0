// apps/server/src/state/rwLock.ts
//
// Async reader/writer lock.
// Many readers may hold it together; a writer holds it alone. Waiters are
// served in arrival order, so a queued writer is not starved by a stream of
// later readers.

type Release = () => void;

interface Waiter {
  kind: 'read' | 'write';
  grant: (release: Release) => void;
}

export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private waiters: Waiter[] = [];

  acquireRead(): Promise<Release> {
    return new Promise((resolve) => {
      this.waiters.push({ kind: 'read', grant: resolve });
      this.drain();
    });
  }

  acquireWrite(): Promise<Release> {
    return new Promise((resolve) => {
      this.waiters.push({ kind: 'write', grant: resolve });
      this.drain();
    });
  }

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get activeReaders(): number {
    return this.readers;
  }

  get isWriting(): boolean {
    return this.writing;
  }

  private drain(): void {
    while (this.waiters.length > 0) {
      const next = this.waiters[0];
      if (next.kind === 'write') {
        if (this.writing || this.readers > 0) return;
        this.waiters.shift();
        this.writing = true;
        next.grant(this.once(() => {
          this.writing = false;
        }));
        return;
      }
      if (this.writing) return;
      this.waiters.shift();
      this.readers++;
      next.grant(this.once(() => {
        this.readers--;
      }));
    }
  }

  private once(onRelease: () => void): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      onRelease();
      this.drain();
    };
  }
}
