/**
 * Serializes async tasks that share a key while letting tasks under
 * different keys interleave freely.
 */
export class KeyedQueue {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const next = previous.then(task);

    const tail: Promise<void> = next
      .then(settled, settled)
      .then(() => {
        if (this.tails.get(key) === tail) {
          this.tails.delete(key);
        }
      });
    this.tails.set(key, tail);

    return next;
  }

  get pending(): number {
    return this.tails.size;
  }
}

function settled(): void {}
