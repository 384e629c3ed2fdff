/**
 * Core type definitions for the connection manager.
 */

import type { ConnectionTransport } from './transports/ConnectionTransport.ts';
import type { TimerScheduler } from './timers.ts';

/**
 * Receives every message delivered by the server.
 */
export type MessageCallback = (payload: string) => void;

/**
 * Client configuration.
 *
 * Only `host`, `port`, `path` and `onMessage` are required. The configuration
 * is validated and frozen when the client is constructed.
 */
export interface ClientConfig {
  /** Server hostname or IP address */
  host: string;
  /** Server port, e.g. "443" */
  port: string;
  /** Endpoint path requested in the handshake, e.g. "/stream" */
  path: string;
  /** Message sink */
  onMessage: MessageCallback;
  /** Use TLS (`wss://`). Default: true when port is "443" */
  secure?: boolean;
  /** Value of the `User-Agent` handshake header. Default: `resilient-ws/<version>` */
  userAgent?: string;
  /** Extra handshake headers */
  headers?: Record<string, string>;
  /** Delay between failed connection attempts in milliseconds. Default: 10000 */
  reconnectDelayMs?: number;
  /** Delay before retrying a stuck queued write in milliseconds. Default: 1000 */
  queueRetryDelayMs?: number;
  /** Handshake timeout in milliseconds. Default: 10000 */
  handshakeTimeoutMs?: number;
  /** How long a close handshake may take before the socket is terminated. Default: 1000 */
  closeTimeoutMs?: number;
  /** Keep the process alive while the client is active. Default: true */
  keepAlive?: boolean;
  /**
   * Override the wire transport.
   * Default: `ws` transport.
   */
  transport?: ConnectionTransport;
  /**
   * Override the timer scheduler.
   * Default: Node's global timers.
   */
  timers?: TimerScheduler;
}

/**
 * Configuration after validation and defaulting.
 */
export interface ResolvedConfig {
  readonly host: string;
  readonly port: string;
  readonly path: string;
  readonly onMessage: MessageCallback;
  readonly secure: boolean;
  readonly headers: Readonly<Record<string, string>>;
  readonly reconnectDelayMs: number;
  readonly queueRetryDelayMs: number;
  readonly handshakeTimeoutMs: number;
  readonly closeTimeoutMs: number;
  readonly keepAlive: boolean;
  readonly transport: ConnectionTransport;
  readonly timers: TimerScheduler;
}

/**
 * Everything a connection attempt needs to reach the server.
 */
export interface ConnectionTarget {
  host: string;
  port: string;
  path: string;
  /** Handshake headers, `User-Agent` included */
  headers: Readonly<Record<string, string>>;
}

/**
 * Point-in-time view of the client's internal state.
 */
export interface ClientStatus {
  /** Whether start() is in effect */
  active: boolean;
  /** Whether a handle is currently open */
  connected: boolean;
  /** Number of messages waiting in the outbound queue */
  queued: number;
  /** Whether a connection attempt is in flight */
  attemptInFlight: boolean;
  /** Whether the reconnect timer is armed */
  reconnectPending: boolean;
  /** Whether the queue retry timer is armed */
  queueRetryPending: boolean;
  /** Background tasks not yet settled */
  backgroundTasks: number;
}

/**
 * Events emitted by `ResilientClient` and their listener arguments.
 */
export interface ClientEvents {
  /** A connection attempt succeeded */
  connected: [];
  /** A connection attempt failed; a retry has been scheduled */
  connectFailed: [error: Error];
  /** An open connection broke */
  disconnected: [error: Error];
  /** The broken connection is being replaced */
  reconnecting: [];
  /** stop() finished */
  stopped: [];
}

/**
 * Emit function handed to internal components.
 */
export type EmitFn = <K extends keyof ClientEvents>(event: K, ...args: ClientEvents[K]) => void;
