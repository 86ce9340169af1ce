/**
 * Per-key FIFO queue.
 *
 * Tasks sharing a key run one after another in submission order; different keys run concurrently.
 * A failing task does not block the ones queued behind it.
 */
export class KeyedSerialQueue {
  private tails: Map<string, Promise<void>> = new Map();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    const current = previous.then(task);
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  pendingKeys(): number {
    return this.tails.size;
  }
}
