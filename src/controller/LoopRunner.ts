/**
 * Keeps the client's background work alive and accountable.
 *
 * While active, the runner holds a keep-alive token so the process does not
 * exit when the client is idle between reconnect attempts. Every background
 * task (attempts, read loops, drains, reconnects) is tracked so that a stop can
 * wait for all of them to settle before it returns.
 */

import createDebug from 'debug';
import type { Cancel, TimerScheduler } from '../timers.ts';

const debug = createDebug('resilient-ws:runner');

export class LoopRunner {
  private _timers: TimerScheduler;
  private _keepAlive: boolean;
  private _active = false;
  private _release: Cancel | null = null;
  private _tasks = new Set<Promise<void>>();

  constructor(timers: TimerScheduler, keepAlive = true) {
    this._timers = timers;
    this._keepAlive = keepAlive;
  }

  get active(): boolean {
    return this._active;
  }

  /**
   * Number of tracked tasks that have not settled yet.
   */
  get pendingTasks(): number {
    return this._tasks.size;
  }

  activate(): void {
    if (this._active) return;
    this._active = true;
    if (this._keepAlive) {
      this._release = this._timers.hold();
    }
    debug('Activated');
  }

  /**
   * Track a background task. A rejection is logged, never rethrown.
   */
  track(task: Promise<unknown>): void {
    const tasks = this._tasks;
    const settled: Promise<void> = task.then(
      () => {
        tasks.delete(settled);
      },
      (err) => {
        tasks.delete(settled);
        debug('Background task failed: %o', err);
      }
    );
    tasks.add(settled);
  }

  /**
   * Release the keep-alive token and wait for every task tracked so far.
   * Tasks tracked afterwards belong to the next activation.
   */
  deactivate(): Promise<void> {
    if (this._release) {
      this._release();
      this._release = null;
    }
    this._active = false;

    const tasks = [...this._tasks];
    this._tasks = new Set();
    debug('Deactivated, waiting for %d task(s)', tasks.length);
    return Promise.all(tasks).then(() => undefined);
  }
}
