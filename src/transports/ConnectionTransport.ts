/**
 * Wire collaborator interfaces.
 *
 * The core never parses frames itself. Everything below the handshake is
 * delegated to a transport; the default one is built on the `ws` package.
 */

import type { CancelledError, ReadFaultError } from '../errors.ts';

/**
 * Normal closure status code.
 */
export const NORMAL_CLOSURE = 1000;

/**
 * One address the server name resolved to.
 */
export interface ResolvedEndpoint {
  address: string;
  family: 4 | 6;
  port: number;
}

/**
 * Result of a single read.
 */
export type ReadOutcome =
  | { kind: 'message'; payload: string }
  | { kind: 'cancelled'; error: CancelledError }
  | { kind: 'fault'; error: ReadFaultError };

/**
 * A single logical connection. Handles are single-use: once closed, a new one
 * must be opened.
 */
export interface ConnectionHandle {
  /**
   * Whether the connection is open for reading and writing.
   */
  readonly open: boolean;

  /**
   * Pin the endpoints to connect to.
   */
  connect(endpoints: ResolvedEndpoint[]): Promise<void>;

  /**
   * Set an outgoing header for the handshake.
   */
  setHeader(name: string, value: string): void;

  /**
   * Perform the WebSocket handshake.
   */
  handshake(host: string, path: string): Promise<void>;

  /**
   * Wait for the next message. At most one read may be outstanding.
   */
  read(): Promise<ReadOutcome>;

  /**
   * Write a text frame. Resolves once the frame has been flushed, rejects on failure.
   */
  write(payload: string): Promise<void>;

  /**
   * Close the connection. Never rejects; a pending read settles as `cancelled`.
   */
  close(code?: number): Promise<void>;
}

/**
 * Factory for connection handles plus name resolution.
 */
export interface ConnectionTransport {
  /**
   * Resolve a host and port to connectable endpoints.
   */
  resolve(host: string, port: string): Promise<ResolvedEndpoint[]>;

  /**
   * Open a fresh, unconnected handle.
   */
  open(): ConnectionHandle;
}
