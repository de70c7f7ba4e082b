/**
 * Per-key FIFO serialisation of async critical sections.
 *
 * The trust store runs every load and every load-mutate-save sequence for a
 * profile through here, so two confirmations that land close together (a
 * parallel batch of tool calls, say) cannot overwrite each other's rules.
 * Different keys never wait on each other. There is no coordination across
 * processes: two processes writing one profile file race, last write wins.
 */

interface KeyQueue {
  entries: Array<() => Promise<void>>;
  processing: boolean;
}

export class KeyedLock {
  private readonly queues = new Map<string, KeyQueue>();

  /**
   * Run `fn` once every earlier section for `key` has settled. The returned
   * promise settles with `fn`'s own result or rejection; a failing section
   * does not block the ones queued behind it.
   */
  run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const q = this.queueFor(key);

    const result = new Promise<T>((resolve, reject) => {
      q.entries.push(() => Promise.resolve().then(fn).then(resolve, reject));
    });

    if (!q.processing) {
      this.drain(key, q).catch((err) => console.error("Lock drain error:", err));
    }

    return result;
  }

  private queueFor(key: string): KeyQueue {
    const existing = this.queues.get(key);
    if (existing) return existing;
    const created: KeyQueue = { entries: [], processing: false };
    this.queues.set(key, created);
    return created;
  }

  private async drain(key: string, q: KeyQueue): Promise<void> {
    q.processing = true;

    let next = q.entries.shift();
    while (next) {
      await next();
      next = q.entries.shift();
    }

    q.processing = false;
    this.queues.delete(key);
  }

  /** Sections waiting behind the running one. Exposed for tests. */
  queueDepth(key: string): number {
    return this.queues.get(key)?.entries.length ?? 0;
  }

  isLocked(key: string): boolean {
    return this.queues.get(key)?.processing ?? false;
  }
}
