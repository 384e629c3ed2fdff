/**
 * One resolve → connect → handshake sequence on a brand-new handle.
 */

import createDebug from 'debug';
import { CancelledError, ConnectionError, toError } from '../errors.ts';
import type { ConnectionHandle, ConnectionTransport } from '../transports/ConnectionTransport.ts';
import type { ConnectionTarget } from '../types.ts';

const debug = createDebug('resilient-ws:attempt');

export type AttemptResult =
  | { ok: true; handle: ConnectionHandle }
  | { ok: false; error: ConnectionError | CancelledError };

export class ConnectionAttempt {
  private _transport: ConnectionTransport;
  private _target: ConnectionTarget;
  private _handle: ConnectionHandle | null = null;
  private _cancelled = false;

  constructor(transport: ConnectionTransport, target: ConnectionTarget) {
    this._transport = transport;
    this._target = target;
  }

  get cancelled(): boolean {
    return this._cancelled;
  }

  /**
   * Run the attempt. Never rejects: any failure, at any step, closes the
   * partially opened handle and is reported as `{ ok: false }`.
   */
  async run(): Promise<AttemptResult> {
    const { host, port, path, headers } = this._target;
    try {
      const endpoints = await this._transport.resolve(host, port);
      this._throwIfCancelled();

      // A closed handle cannot be reopened, so every attempt gets its own.
      const handle = this._transport.open();
      this._handle = handle;

      await handle.connect(endpoints);
      this._throwIfCancelled();

      for (const [name, value] of Object.entries(headers)) {
        handle.setHeader(name, value);
      }
      await handle.handshake(host, path);
      this._throwIfCancelled();

      debug('Connected to %s:%s%s', host, port, path);
      return { ok: true, handle };
    } catch (err) {
      const handle = this._handle;
      this._handle = null;
      if (handle) {
        await handle.close();
      }

      if (this._cancelled || err instanceof CancelledError) {
        debug('Attempt cancelled');
        return { ok: false, error: err instanceof CancelledError ? err : new CancelledError('Attempt cancelled') };
      }
      const cause = toError(err);
      debug('Connection to %s:%s%s failed: %s', host, port, path, cause.message);
      return {
        ok: false,
        error: cause instanceof ConnectionError ? cause : new ConnectionError(cause.message, cause),
      };
    }
  }

  /**
   * Abort the attempt; `run()` then settles with a `CancelledError`.
   */
  async cancel(): Promise<void> {
    this._cancelled = true;
    if (this._handle) {
      await this._handle.close();
    }
  }

  private _throwIfCancelled(): void {
    if (this._cancelled) {
      throw new CancelledError('Attempt cancelled');
    }
  }
}
