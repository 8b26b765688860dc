//per-key promise queue: calls sharing a key run one after another, different keys never wait on each other

export class PartitionLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    const current = prev.then(() => task());
    //the queue keeps moving whether the task settles or throws
    const tail = current.then(() => undefined, () => undefined);
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  //number of partitions with a queued or running write
  get activePartitions(): number {
    return this.tails.size;
  }
}
