/**
 * FIFO buffer of outbound messages that survives reconnects.
 *
 * A drain writes the head message, pops it once the write succeeded, and
 * continues until the queue is empty or a write fails. A failed message stays
 * at the head, so nothing is ever delivered ahead of an earlier message. Only
 * one drain runs at a time; it reads the current handle before every write and
 * picks up messages appended while it runs. A write that fails on a handle which
 * has since been replaced is retried on the current one.
 */

import createDebug from 'debug';
import { writePayload } from '../connection/write.ts';
import type { WriteError } from '../errors.ts';
import type { ConnectionHandle } from '../transports/ConnectionTransport.ts';

const debug = createDebug('resilient-ws:queue');

export type DrainResult =
  | { status: 'drained' }
  | { status: 'offline'; remaining: number }
  | { status: 'stalled'; remaining: number; error: WriteError };

export class OutboundQueue {
  private _messages: string[] = [];
  private _getHandle: () => ConnectionHandle | null;
  private _draining = false;
  private _current: Promise<DrainResult> = Promise.resolve({ status: 'drained' });

  constructor(getHandle: () => ConnectionHandle | null) {
    this._getHandle = getHandle;
  }

  get size(): number {
    return this._messages.length;
  }

  get draining(): boolean {
    return this._draining;
  }

  /**
   * Snapshot of the queued messages, head first.
   */
  toArray(): string[] {
    return [...this._messages];
  }

  enqueue(payload: string): void {
    this._messages.push(payload);
  }

  /**
   * Start a drain, or join the one already running.
   */
  drain(): Promise<DrainResult> {
    if (this._draining) return this._current;
    this._draining = true;
    this._current = this._drain();
    return this._current;
  }

  private async _drain(): Promise<DrainResult> {
    try {
      while (this._messages.length > 0) {
        const handle = this._getHandle();
        if (!handle || !handle.open) {
          return { status: 'offline', remaining: this._messages.length };
        }

        const result = await writePayload(handle, this._messages[0]);
        if (!result.ok) {
          if (this._getHandle() !== handle) {
            debug('Write failed on a replaced connection, retrying on the current one');
            continue;
          }
          debug('Write failed, %d message(s) held: %s', this._messages.length, result.error.message);
          return { status: 'stalled', remaining: this._messages.length, error: result.error };
        }
        this._messages.shift();
      }
      return { status: 'drained' };
    } finally {
      this._draining = false;
    }
  }
}
