/**
 * ResilientClient - public API.
 *
 * Keeps one WebSocket connection alive on behalf of its caller: reconnects
 * after failures, retries queued sends and delivers queued messages in order.
 */

import { EventEmitter } from 'events';
import createDebug from 'debug';
import { resolveConfig } from './config.ts';
import { ConnectionController } from './controller/ConnectionController.ts';
import { toError } from './errors.ts';
import type { ClientConfig, ClientStatus, EmitFn, ResolvedConfig } from './types.ts';

const debug = createDebug('resilient-ws:client');

/**
 * Self-healing WebSocket client.
 *
 * Events: `connected`, `connectFailed`, `disconnected`, `reconnecting`, `stopped`
 * (see `ClientEvents`).
 *
 * @example
 * ```typescript
 * const client = new ResilientClient({
 *   host: 'example.test',
 *   port: '443',
 *   path: '/stream',
 *   onMessage: (payload) => console.log(payload),
 * });
 *
 * await client.start();
 * await client.sendMessage('hello', true);
 * // ...
 * await client.close();
 * ```
 */
export class ResilientClient extends EventEmitter {
  private _config: ResolvedConfig;
  private _controller: ConnectionController;

  /**
   * @throws ConfigError if the configuration is invalid
   */
  constructor(config: ClientConfig) {
    super();
    this._config = resolveConfig(config);
    this._controller = new ConnectionController(this._config, this._emitEvent);
  }

  get config(): ResolvedConfig {
    return this._config;
  }

  /**
   * Whether start() is in effect.
   */
  get active(): boolean {
    return this._controller.active;
  }

  /**
   * Whether a connection is currently open.
   */
  get connected(): boolean {
    return this._controller.status.connected;
  }

  get status(): ClientStatus {
    return this._controller.status;
  }

  /**
   * Messages waiting in the outbound queue, oldest first.
   */
  get queuedMessages(): string[] {
    return this._controller.queuedMessages();
  }

  /**
   * Start connecting. Does nothing if already started.
   *
   * Resolves once the first connection attempt has settled: either the
   * connection is open, or a retry is scheduled.
   */
  async start(): Promise<void> {
    await this._controller.start();
  }

  /**
   * Stop and disconnect. Does nothing if not started.
   *
   * Resolves once every timer is cancelled, the connection is closed and all
   * background work has finished. The client can be started again afterwards.
   */
  async stop(): Promise<void> {
    if (await this._controller.stop()) {
      debug('Client stopped');
      this._emitEvent('stopped');
    }
  }

  /**
   * Stop the client for good. Call this before dropping the last reference,
   * so that no timer or socket outlives it.
   */
  async close(): Promise<void> {
    await this.stop();
  }

  /**
   * Send a message.
   *
   * With `queueIfOffline` false the message is written to the current
   * connection right away; `false` means there was no open connection or the
   * write failed, and the message is dropped.
   *
   * With `queueIfOffline` true the message is appended to the outbound queue
   * and the queue is drained if possible. Always resolves `true`: queued
   * messages are delivered in order, at least once, whenever a connection is open.
   */
  async sendMessage(payload: string, queueIfOffline = false): Promise<boolean> {
    return this._controller.send(payload, queueIfOffline);
  }

  // Listener exceptions are logged, not propagated.
  private _emitEvent: EmitFn = (event, ...args) => {
    try {
      this.emit(event, ...args);
    } catch (err) {
      debug('Listener for %s threw: %o', event, toError(err));
    }
  };
}
