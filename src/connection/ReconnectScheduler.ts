/**
 * Fixed-delay reconnect timer.
 *
 * Single-shot: arming it again replaces the pending instance. When the timer
 * fires it re-checks that the client should still be active before asking for
 * another attempt. The caller re-arms after every failed attempt, so the cycle
 * attempt → fail → wait repeats until a connection succeeds or the client stops.
 */

import createDebug from 'debug';
import { SingleShotTimer } from '../timers.ts';
import type { TimerScheduler } from '../timers.ts';

const debug = createDebug('resilient-ws:controller');

export interface ReconnectSchedulerOptions {
  delayMs: number;
  timers: TimerScheduler;
  /** Re-checked when the timer fires */
  isActive: () => boolean;
  /** Start the next connection attempt */
  onAttempt: () => void;
}

export class ReconnectScheduler {
  private _timer: SingleShotTimer;
  private _isActive: () => boolean;
  private _onAttempt: () => void;

  constructor(options: ReconnectSchedulerOptions) {
    this._isActive = options.isActive;
    this._onAttempt = options.onAttempt;
    this._timer = new SingleShotTimer(options.timers, options.delayMs, () => this._fire());
  }

  get pending(): boolean {
    return this._timer.pending;
  }

  schedule(): void {
    debug('Retrying in %dms', this._timer.delayMs);
    this._timer.schedule();
  }

  cancel(): void {
    this._timer.cancel();
  }

  private _fire(): void {
    if (!this._isActive()) {
      debug('Reconnect timer fired while inactive, ignoring');
      return;
    }
    this._onAttempt();
  }
}
