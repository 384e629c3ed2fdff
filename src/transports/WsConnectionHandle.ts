/**
 * Connection handle using the `ws` package.
 *
 * `ws` opens the TCP (or TLS) connection and performs the upgrade in one step,
 * so `connect()` only pins the resolved endpoints and `handshake()` tries them
 * in order until one accepts the upgrade. Frames are buffered between reads so
 * that none is lost while the read loop re-arms.
 */

import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import createDebug from 'debug';
import { CancelledError, ConnectionError, ReadFaultError, WriteError, toError } from '../errors.ts';
import { NORMAL_CLOSURE } from './ConnectionTransport.ts';
import type { ConnectionHandle, ReadOutcome, ResolvedEndpoint } from './ConnectionTransport.ts';

const debug = createDebug('resilient-ws:ws-transport');

export interface WsConnectionHandleOptions {
  secure: boolean;
  handshakeTimeoutMs: number;
  closeTimeoutMs: number;
}

/**
 * Build the URL for one resolved endpoint.
 */
export function endpointUrl(endpoint: ResolvedEndpoint, path: string, secure: boolean): string {
  const scheme = secure ? 'wss' : 'ws';
  const address = endpoint.family === 6 ? `[${endpoint.address}]` : endpoint.address;
  return `${scheme}://${address}:${endpoint.port}${path}`;
}

/**
 * Value of the `Host` header for a server name; the port is omitted when it is
 * the scheme's default.
 */
export function hostHeader(host: string, port: number, secure: boolean): string {
  const defaultPort = secure ? 443 : 80;
  return port === defaultPort ? host : `${host}:${port}`;
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString();
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString();
  return data.toString();
}

export class WsConnectionHandle implements ConnectionHandle {
  private _options: WsConnectionHandleOptions;
  private _ws: WebSocket | null = null;
  private _endpoints: ResolvedEndpoint[] = [];
  private _headers: Record<string, string> = {};
  private _used = false;
  private _closing = false;

  private _inbox: string[] = [];
  private _pendingRead: ((outcome: ReadOutcome) => void) | null = null;
  private _terminal: ReadOutcome | null = null;

  constructor(options: WsConnectionHandleOptions) {
    this._options = options;
  }

  get open(): boolean {
    return !this._closing && this._ws !== null && this._ws.readyState === WebSocket.OPEN;
  }

  async connect(endpoints: ResolvedEndpoint[]): Promise<void> {
    if (endpoints.length === 0) {
      throw new ConnectionError('No endpoints to connect to');
    }
    this._endpoints = endpoints;
  }

  setHeader(name: string, value: string): void {
    this._headers[name] = value;
  }

  async handshake(host: string, path: string): Promise<void> {
    if (this._used) {
      throw new ConnectionError('Connection handle cannot be reused');
    }
    this._used = true;

    let lastError: Error = new ConnectionError('No endpoints to connect to');
    for (const endpoint of this._endpoints) {
      if (this._closing) {
        throw new CancelledError('Handshake cancelled');
      }
      try {
        await this._openSocket(endpoint, host, path);
        return;
      } catch (err) {
        lastError = toError(err);
        debug('Handshake with %s failed: %s', endpoint.address, lastError.message);
      }
    }
    if (this._closing) {
      throw new CancelledError('Handshake cancelled');
    }
    throw lastError;
  }

  read(): Promise<ReadOutcome> {
    if (this._pendingRead) {
      return Promise.reject(new Error('A read is already outstanding'));
    }
    const payload = this._inbox.shift();
    if (payload !== undefined) {
      return Promise.resolve({ kind: 'message', payload });
    }
    if (this._terminal) {
      return Promise.resolve(this._terminal);
    }
    if (!this._ws) {
      return Promise.resolve(this._closing ? this._cancelled() : this._fault('Not connected'));
    }
    return new Promise((resolve) => {
      this._pendingRead = resolve;
    });
  }

  write(payload: string): Promise<void> {
    const ws = this._ws;
    if (!ws || !this.open) {
      return Promise.reject(new WriteError('Connection is not open'));
    }
    return new Promise((resolve, reject) => {
      ws.send(payload, (err) => {
        if (err) reject(new WriteError(err.message, err));
        else resolve();
      });
    });
  }

  close(code = NORMAL_CLOSURE): Promise<void> {
    this._closing = true;
    const ws = this._ws;
    if (!ws || ws.readyState === WebSocket.CLOSED) {
      this._settle(this._cancelled());
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        debug('Close handshake timed out, terminating');
        ws.terminate();
      }, this._options.closeTimeoutMs);

      ws.once('close', () => {
        clearTimeout(timer);
        resolve();
      });

      if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
      } else if (ws.readyState === WebSocket.OPEN) {
        ws.close(code);
      }
    });
  }

  private _openSocket(endpoint: ResolvedEndpoint, host: string, path: string): Promise<void> {
    const { secure, handshakeTimeoutMs } = this._options;
    const url = endpointUrl(endpoint, path, secure);
    debug('Connecting to %s (host %s)', url, host);

    const ws = new WebSocket(url, {
      headers: { Host: hostHeader(host, endpoint.port, secure), ...this._headers },
      handshakeTimeout: handshakeTimeoutMs,
      ...(secure ? { servername: host } : {}),
    });
    this._ws = ws;

    return new Promise((resolve, reject) => {
      let settled = false;
      let opened = false;

      ws.on('open', () => {
        settled = true;
        opened = true;
        debug('Connected to %s', url);
        resolve();
      });

      ws.on('message', (data: RawData) => {
        this._deliver(rawDataToString(data));
      });

      ws.on('error', (err) => {
        debug('WebSocket error on %s: %o', url, err);
        if (!settled) {
          settled = true;
          this._ws = null;
          reject(this._closing ? new CancelledError('Handshake cancelled') : err);
          return;
        }
        // Only a socket that reached open may end the handle.
        if (opened && !this._closing) {
          this._settle(this._fault(err.message, err));
        }
      });

      ws.on('close', (code, reason) => {
        debug('Disconnected from %s (code: %d)', url, code);
        if (!settled) {
          settled = true;
          this._ws = null;
          reject(
            this._closing
              ? new CancelledError('Handshake cancelled')
              : new ConnectionError(`WebSocket closed before open (code: ${code})`)
          );
          return;
        }
        if (!opened) return;
        this._settle(
          this._closing
            ? this._cancelled()
            : this._fault(`Connection closed (code: ${code}${reason.length ? `, reason: ${reason.toString()}` : ''})`)
        );
      });
    });
  }

  private _deliver(payload: string): void {
    const pending = this._pendingRead;
    if (pending) {
      this._pendingRead = null;
      pending({ kind: 'message', payload });
      return;
    }
    this._inbox.push(payload);
  }

  /**
   * Record how the connection ended; the first reason wins.
   */
  private _settle(outcome: ReadOutcome): void {
    if (!this._terminal) {
      this._terminal = outcome;
    }
    const pending = this._pendingRead;
    if (pending) {
      this._pendingRead = null;
      pending(this._terminal);
    }
  }

  private _cancelled(): ReadOutcome {
    return { kind: 'cancelled', error: new CancelledError('Connection closed locally') };
  }

  private _fault(message: string, cause?: unknown): ReadOutcome {
    return { kind: 'fault', error: new ReadFaultError(message, cause) };
  }
}
