export type Release = () => void;

export class Mutex {
  private queue: Array<() => void> = [];
  private locked = false;

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  acquire(): Promise<Release> {
    return new Promise<Release>((resolve) => {
      const tryAcquire = () => {
        if (!this.locked) {
          this.locked = true;
          resolve(this.releaseOnce());
        } else {
          this.queue.push(tryAcquire);
        }
      };
      tryAcquire();
    });
  }

  get isLocked(): boolean {
    return this.locked;
  }

  get waiting(): number {
    return this.queue.length;
  }

  private releaseOnce(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release() {
    this.locked = false;
    this.queue.shift()?.();
  }
}

/**
 * One mutex per key, created on first use and dropped again once nobody holds or waits on it.
 */
export class KeyedMutexes {
  private map = new Map<string, Mutex>();

  private get(key: string): Mutex {
    let m = this.map.get(key);
    if (!m) {
      m = new Mutex();
      this.map.set(key, m);
    }
    return m;
  }

  async acquire(key: string): Promise<Release> {
    const m = this.get(key);
    const release = await m.acquire();
    return () => {
      release();
      if (!m.isLocked && m.waiting === 0 && this.map.get(key) === m) {
        this.map.delete(key);
      }
    };
  }

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get size(): number {
    return this.map.size;
  }
}
