/**
 * Transport layer exports.
 */

export type {
  ConnectionHandle,
  ConnectionTransport,
  ReadOutcome,
  ResolvedEndpoint,
} from './ConnectionTransport.ts';
export { NORMAL_CLOSURE } from './ConnectionTransport.ts';

export { WsTransport } from './WsTransport.ts';
export type { WsTransportOptions } from './WsTransport.ts';
export { WsConnectionHandle, endpointUrl, hostHeader } from './WsConnectionHandle.ts';
export type { WsConnectionHandleOptions } from './WsConnectionHandle.ts';
