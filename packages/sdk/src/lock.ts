/**
 * In-process readers/writer lock guarding a catalog
 *
 * Readers share the lock; a writer holds it alone. Waiters are served in
 * arrival order, and a waiting writer makes later readers queue behind it.
 */

type Release = () => void;

interface Waiter {
  write: boolean;
  grant: () => void;
}

export class ReadWriteLock {
  #readers = 0;
  #writing = false;
  #queue: Waiter[] = [];

  /**
   * Acquire the shared side
   * @returns A release function (calling it more than once is a no-op)
   */
  async acquireRead(): Promise<Release> {
    if (!this.#writing && this.#queue.length === 0) {
      this.#readers++;
    } else {
      await new Promise<void>((resolve) => this.#queue.push({ write: false, grant: resolve }));
    }
    return this.#releaser(() => {
      this.#readers--;
    });
  }

  /**
   * Acquire the exclusive side
   * @returns A release function (calling it more than once is a no-op)
   */
  async acquireWrite(): Promise<Release> {
    if (!this.#writing && this.#readers === 0 && this.#queue.length === 0) {
      this.#writing = true;
    } else {
      await new Promise<void>((resolve) => this.#queue.push({ write: true, grant: resolve }));
    }
    return this.#releaser(() => {
      this.#writing = false;
    });
  }

  /**
   * Execute a function with the shared side held
   */
  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Execute a function with the exclusive side held
   */
  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get readers(): number {
    return this.#readers;
  }

  isWriteLocked(): boolean {
    return this.#writing;
  }

  /** Number of callers waiting for either side */
  get pending(): number {
    return this.#queue.length;
  }

  #releaser(undo: () => void): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      undo();
      this.#drain();
    };
  }

  // Grant as many queued waiters as the current state allows, in order
  #drain(): void {
    while (this.#queue.length > 0) {
      const head = this.#queue[0];
      if (!head) return;

      if (head.write) {
        if (this.#writing || this.#readers > 0) return;
        this.#queue.shift();
        this.#writing = true;
        head.grant();
        return;
      }

      if (this.#writing) return;
      this.#queue.shift();
      this.#readers++;
      head.grant();
    }
  }
}
