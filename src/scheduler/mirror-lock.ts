/**
 * One mirror-mutating pass at a time. Waiters are served in arrival order; sync and fixup
 * share a single instance so their index writes never interleave.
 */
export class MirrorLock {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  get busy(): boolean {
    return this.holders > 0;
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const next = new Promise<void>(resolve => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);
    this.holders++;
    try {
      await previous;
      return await task();
    } finally {
      this.holders--;
      release();
    }
  }
}
