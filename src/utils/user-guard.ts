/**
 * In-flight guard keyed by user id.
 *
 * Member-facing triggers use `run`: a second trigger for a user who is already
 * being processed is dropped, not queued. Admin operations use `runExclusive`,
 * which waits for the slot instead. The slots live in process memory: they do
 * not coordinate several instances and are empty after a restart.
 */
export class UserGuard {
  private readonly inFlight = new Map<number, Promise<void>>();

  isBusy(userId: number): boolean {
    return this.inFlight.has(userId);
  }

  get size(): number {
    return this.inFlight.size;
  }

  /**
   * Runs `operation` while holding the slot for `userId`. Resolves to
   * `{ acquired: false }` without running anything when the slot is taken.
   */
  async run<T>(
    userId: number,
    operation: () => Promise<T>
  ): Promise<{ acquired: true; value: T } | { acquired: false }> {
    if (this.inFlight.has(userId)) {
      return { acquired: false };
    }
    return { acquired: true, value: await this.hold(userId, operation) };
  }

  /**
   * Waits until nothing holds the slot for `userId`, then runs `operation`
   * while holding it.
   */
  async runExclusive<T>(userId: number, operation: () => Promise<T>): Promise<T> {
    for (let pending = this.inFlight.get(userId); pending; pending = this.inFlight.get(userId)) {
      await pending;
    }
    return this.hold(userId, operation);
  }

  private async hold<T>(userId: number, operation: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    this.inFlight.set(
      userId,
      new Promise<void>(resolve => {
        release = resolve;
      })
    );

    try {
      return await operation();
    } finally {
      this.inFlight.delete(userId);
      release();
    }
  }
}
