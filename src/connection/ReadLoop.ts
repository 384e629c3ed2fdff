/**
 * Keeps exactly one read outstanding on a connection.
 *
 * Reads do not repeat by themselves: after every delivered message the loop
 * issues the next read. A local close ends the loop quietly; anything else is
 * handed to `onFault` and ends it too.
 */

import createDebug from 'debug';
import { toError } from '../errors.ts';
import type { ReadFaultError } from '../errors.ts';
import type { ConnectionHandle } from '../transports/ConnectionTransport.ts';
import type { MessageCallback } from '../types.ts';

const debug = createDebug('resilient-ws:read-loop');

export interface ReadLoopOptions {
  onMessage: MessageCallback;
  onFault: (error: ReadFaultError) => void;
}

export class ReadLoop {
  private _handle: ConnectionHandle;
  private _onMessage: MessageCallback;
  private _onFault: (error: ReadFaultError) => void;
  private _delivered = 0;

  constructor(handle: ConnectionHandle, options: ReadLoopOptions) {
    this._handle = handle;
    this._onMessage = options.onMessage;
    this._onFault = options.onFault;
  }

  /**
   * Messages delivered so far.
   */
  get delivered(): number {
    return this._delivered;
  }

  /**
   * Resolves when the loop ends.
   */
  async run(): Promise<void> {
    for (;;) {
      const outcome = await this._handle.read();

      if (outcome.kind === 'cancelled') {
        debug('Read cancelled, stopping');
        return;
      }

      if (outcome.kind === 'fault') {
        debug('Read failed: %s', outcome.error.message);
        this._onFault(outcome.error);
        return;
      }

      this._delivered++;
      try {
        this._onMessage(outcome.payload);
      } catch (err) {
        debug('Message callback threw: %o', toError(err));
      }
    }
  }
}
