/**
 * Timer abstraction.
 *
 * All delays go through a `TimerScheduler` so that tests can drive time by hand.
 */

/**
 * Cancels whatever created it. Calling it more than once is harmless.
 */
export type Cancel = () => void;

export interface TimerScheduler {
  /**
   * Run `callback` once after `delayMs`.
   */
  schedule(callback: () => void, delayMs: number): Cancel;

  /**
   * Keep the process alive until the returned function is called.
   */
  hold(): Cancel;
}

// Longest delay setInterval accepts without clamping to 1ms.
const HOLD_INTERVAL_MS = 2 ** 31 - 1;

/**
 * Scheduler backed by Node's global timers.
 */
export const systemTimers: TimerScheduler = {
  schedule(callback, delayMs) {
    const timer = setTimeout(callback, delayMs);
    return () => clearTimeout(timer);
  },
  hold() {
    const interval = setInterval(() => {}, HOLD_INTERVAL_MS);
    return () => clearInterval(interval);
  },
};

/**
 * A single-shot timer with a fixed delay. Arming it again replaces the pending
 * instance, so at most one is ever pending.
 */
export class SingleShotTimer {
  private _timers: TimerScheduler;
  private _delayMs: number;
  private _onFire: () => void;
  private _cancel: Cancel | null = null;

  constructor(timers: TimerScheduler, delayMs: number, onFire: () => void) {
    this._timers = timers;
    this._delayMs = delayMs;
    this._onFire = onFire;
  }

  get pending(): boolean {
    return this._cancel !== null;
  }

  get delayMs(): number {
    return this._delayMs;
  }

  schedule(): void {
    this.cancel();
    this._cancel = this._timers.schedule(() => {
      this._cancel = null;
      this._onFire();
    }, this._delayMs);
  }

  cancel(): void {
    if (this._cancel) {
      this._cancel();
      this._cancel = null;
    }
  }
}
