/**
 * Connection state controller.
 *
 * Single source of truth for whether the client should be active. Start, stop
 * and reconnect are serialised through one lock; network I/O runs outside it,
 * guarded by the in-flight attempt and the queue's draining flag. Everything
 * between two awaits runs to completion on the event loop, so the synchronous
 * bookkeeping around those awaits needs no further locking.
 *
 * `_generation` changes on every start and stop. Work created under an earlier
 * activation compares its generation before touching any state.
 */

import createDebug from 'debug';
import { toConnectionTarget } from '../config.ts';
import { ConnectionAttempt } from '../connection/ConnectionAttempt.ts';
import type { AttemptResult } from '../connection/ConnectionAttempt.ts';
import { ReadLoop } from '../connection/ReadLoop.ts';
import { ReconnectScheduler } from '../connection/ReconnectScheduler.ts';
import { writePayload } from '../connection/write.ts';
import type { ReadFaultError } from '../errors.ts';
import { SerialLock } from '../lock.ts';
import { OutboundQueue } from '../queue/OutboundQueue.ts';
import { SingleShotTimer } from '../timers.ts';
import { NORMAL_CLOSURE } from '../transports/ConnectionTransport.ts';
import type { ConnectionHandle } from '../transports/ConnectionTransport.ts';
import type { ClientStatus, ConnectionTarget, EmitFn, ResolvedConfig } from '../types.ts';
import { LoopRunner } from './LoopRunner.ts';

const debug = createDebug('resilient-ws:controller');

export type AttemptOutcome = 'connected' | 'failed' | 'superseded';

export class ConnectionController {
  private _config: ResolvedConfig;
  private _target: ConnectionTarget;
  private _emit: EmitFn;

  private _lock = new SerialLock();
  private _runner: LoopRunner;
  private _queue: OutboundQueue;
  private _reconnect: ReconnectScheduler;
  private _queueRetry: SingleShotTimer;

  private _shouldBeActive = false;
  private _generation = 0;
  private _handle: ConnectionHandle | null = null;
  private _attempt: ConnectionAttempt | null = null;
  private _attemptOutcome: Promise<AttemptOutcome> | null = null;

  constructor(config: ResolvedConfig, emit: EmitFn) {
    this._config = config;
    this._target = toConnectionTarget(config);
    this._emit = emit;

    this._runner = new LoopRunner(config.timers, config.keepAlive);
    this._queue = new OutboundQueue(() => this._handle);
    this._reconnect = new ReconnectScheduler({
      delayMs: config.reconnectDelayMs,
      timers: config.timers,
      isActive: () => this._shouldBeActive,
      onAttempt: () => this._onReconnectTimer(),
    });
    this._queueRetry = new SingleShotTimer(config.timers, config.queueRetryDelayMs, () =>
      this._onQueueRetryTimer()
    );
  }

  get active(): boolean {
    return this._shouldBeActive;
  }

  get status(): ClientStatus {
    return {
      active: this._shouldBeActive,
      connected: this._handle !== null && this._handle.open,
      queued: this._queue.size,
      attemptInFlight: this._attempt !== null,
      reconnectPending: this._reconnect.pending,
      queueRetryPending: this._queueRetry.pending,
      backgroundTasks: this._runner.pendingTasks,
    };
  }

  /**
   * Snapshot of the queued messages, head first.
   */
  queuedMessages(): string[] {
    return this._queue.toArray();
  }

  /**
   * Become active and make the first connection attempt. Resolves once that
   * attempt has settled.
   */
  async start(): Promise<void> {
    const started = await this._lock.run(() => {
      if (this._shouldBeActive) return null;
      this._shouldBeActive = true;
      this._generation++;
      debug('Connecting to %s:%s%s', this._target.host, this._target.port, this._target.path);
      this._runner.activate();
      return { outcome: this._beginAttemptLocked() };
    });
    if (started) {
      await started.outcome;
    }
  }

  /**
   * Become inactive, tear the connection down and wait for all background work.
   */
  async stop(): Promise<boolean> {
    const stopped = await this._lock.run(async () => {
      if (!this._shouldBeActive) return null;
      this._shouldBeActive = false;
      this._generation++;
      await this._teardownLocked();
      return { settled: this._runner.deactivate() };
    });
    if (!stopped) return false;

    await stopped.settled;
    debug('Stopped');
    return true;
  }

  /**
   * Send one message now, or queue it for in-order delivery.
   */
  async send(payload: string, queueIfOffline: boolean): Promise<boolean> {
    if (queueIfOffline) {
      this._queue.enqueue(payload);
      if (this._shouldBeActive) {
        this._drainQueue();
      }
      return true;
    }

    const handle = this._handle;
    if (!handle) {
      debug('Cannot send, not connected');
      return false;
    }
    const result = await writePayload(handle, payload);
    if (!result.ok) {
      debug('Send failed: %s', result.error.message);
    }
    return result.ok;
  }

  /**
   * Start a connection attempt unless one is already in flight.
   */
  private _beginAttemptLocked(): Promise<AttemptOutcome> {
    if (this._attemptOutcome) return this._attemptOutcome;

    const attempt = new ConnectionAttempt(this._config.transport, this._target);
    const outcome = attempt.run().then((result) => this._completeAttempt(attempt, result));
    this._attempt = attempt;
    this._attemptOutcome = outcome;
    this._runner.track(outcome);
    return outcome;
  }

  private async _completeAttempt(
    attempt: ConnectionAttempt,
    result: AttemptResult
  ): Promise<AttemptOutcome> {
    if (this._attempt !== attempt) {
      // Cancelled by a stop or replaced by a newer attempt.
      if (result.ok) {
        await result.handle.close(NORMAL_CLOSURE);
      }
      return 'superseded';
    }
    this._attempt = null;
    this._attemptOutcome = null;

    if (!result.ok) {
      debug('Connection to server failed: %s', result.error.message);
      this._reconnect.schedule();
      this._emit('connectFailed', result.error);
      return 'failed';
    }

    const handle = result.handle;
    this._handle = handle;
    debug('Connected to the server');
    this._startReadLoop(handle, this._generation);
    this._drainQueue();
    this._emit('connected');
    return 'connected';
  }

  private _startReadLoop(handle: ConnectionHandle, generation: number): void {
    const loop = new ReadLoop(handle, {
      onMessage: this._config.onMessage,
      onFault: (error) => this._dispatchReconnect(handle, generation, error),
    });
    this._runner.track(loop.run());
  }

  /**
   * Replace a broken connection. Runs as its own tracked task rather than inside
   * the read that noticed the failure.
   */
  private _dispatchReconnect(handle: ConnectionHandle, generation: number, error: ReadFaultError): void {
    if (!this._isCurrent(generation) || this._handle !== handle) return;
    this._emit('disconnected', error);
    this._runner.track(this._lock.run(() => this._reconnectLocked(handle, generation)));
  }

  private async _reconnectLocked(handle: ConnectionHandle, generation: number): Promise<void> {
    // A stop (or an earlier reconnect) may have won the race for the lock.
    if (!this._isCurrent(generation) || this._handle !== handle) return;

    debug('Reconnecting');
    this._emit('reconnecting');
    await this._teardownLocked();
    if (!this._isCurrent(generation)) return;
    this._beginAttemptLocked();
  }

  private _onReconnectTimer(): void {
    const generation = this._generation;
    this._runner.track(
      this._lock.run(() => {
        if (!this._isCurrent(generation) || this._handle) return;
        this._beginAttemptLocked();
      })
    );
  }

  private _onQueueRetryTimer(): void {
    if (!this._shouldBeActive) return;
    this._drainQueue();
  }

  private _drainQueue(): void {
    const generation = this._generation;
    const drain = this._queue.drain().then((result) => {
      if (result.status === 'stalled' && this._isCurrent(generation)) {
        this._queueRetry.schedule();
      }
    });
    this._runner.track(drain);
  }

  /**
   * Cancel both timers, abort any in-flight attempt and close the handle.
   */
  private async _teardownLocked(): Promise<void> {
    this._reconnect.cancel();
    this._queueRetry.cancel();

    const attempt = this._attempt;
    this._attempt = null;
    this._attemptOutcome = null;

    const handle = this._handle;
    this._handle = null;

    if (attempt) {
      await attempt.cancel();
    }
    if (handle) {
      await handle.close(NORMAL_CLOSURE);
    }
  }

  private _isCurrent(generation: number): boolean {
    return this._shouldBeActive && generation === this._generation;
  }
}
