// Per-key mutual exclusion for async work.
// Tasks sharing a key run one at a time in arrival order; tasks under
// different keys never wait on each other.

interface Gate {
  promise: Promise<void>;
  open: () => void;
}

function createGate(): Gate {
  let open!: () => void;
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}

export class SessionLock {
  private tails: Map<string, Promise<void>> = new Map();

  /** Runs `task` once every earlier task for `key` has settled. */
  async runExclusive<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const gate = createGate();
    const tail = previous.then(() => gate.promise);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      gate.open();
      // Last in line cleans up so idle keys do not accumulate.
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** True while a task for `key` is running or queued. */
  isBusy(key: string): boolean {
    return this.tails.has(key);
  }
}
