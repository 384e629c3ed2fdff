/**
 * resilient-ws: a WebSocket client that survives transient network failure.
 *
 * ## Public API
 * - `ResilientClient`: start/stop/sendMessage with automatic reconnects and an
 *   in-order outbound queue.
 * - `WsTransport`: the default wire transport, built on `ws`.
 * - Error classes, all carrying a stable `code`.
 *
 * ## Example
 * ```ts
 * import { ResilientClient } from 'resilient-ws';
 *
 * const client = new ResilientClient({
 *   host: 'example.test',
 *   port: '443',
 *   path: '/stream',
 *   onMessage: (payload) => console.log('received', payload),
 * });
 * client.on('connected', () => console.log('connected'));
 * client.on('connectFailed', (err) => console.log('retrying after', err.message));
 *
 * await client.start();
 * await client.sendMessage('ping', true); // queued until a connection is open
 * await client.sendMessage('now-or-never'); // false unless connected
 *
 * await client.close();
 * ```
 */

export { ResilientClient } from './ResilientClient.ts';
export { DEFAULTS, DEFAULT_USER_AGENT, VERSION } from './config.ts';
export { systemTimers } from './timers.ts';
export type { Cancel, TimerScheduler } from './timers.ts';

export {
  ErrorCode,
  ConnectionError,
  ReadFaultError,
  WriteError,
  CancelledError,
  ConfigError,
  hasErrorCode,
  getErrorCode,
} from './errors.ts';
export type { ErrorCodeType } from './errors.ts';

export type {
  ClientConfig,
  ClientEvents,
  ClientStatus,
  MessageCallback,
  ResolvedConfig,
} from './types.ts';

export { WsTransport, WsConnectionHandle, NORMAL_CLOSURE } from './transports/index.ts';
export type {
  ConnectionHandle,
  ConnectionTransport,
  ReadOutcome,
  ResolvedEndpoint,
  WsTransportOptions,
} from './transports/index.ts';
