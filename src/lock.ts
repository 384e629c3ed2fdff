/**
 * Promise-chain lock.
 *
 * Serialises asynchronous critical sections: each `run()` starts only after
 * every earlier one has settled. The lock is NOT reentrant. Code running inside
 * a critical section must never call `run()` again and await it, or it waits on
 * itself forever; methods that expect the lock to be held carry a `Locked` suffix.
 */
export class SerialLock {
  private _tail: Promise<void> = Promise.resolve();
  private _held = false;
  private _waiting = 0;

  /**
   * Whether a critical section is executing.
   */
  get held(): boolean {
    return this._held;
  }

  /**
   * Number of critical sections queued behind the current one.
   */
  get waiting(): number {
    return this._waiting;
  }

  run<T>(section: () => T | Promise<T>): Promise<T> {
    this._waiting++;
    const result = this._tail.then(async () => {
      this._waiting--;
      this._held = true;
      try {
        return await section();
      } finally {
        this._held = false;
      }
    });
    // Keep the chain alive when a section rejects; the caller still sees the rejection.
    this._tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
