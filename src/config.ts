/**
 * Configuration validation using TypeBox.
 *
 * Checks the caller's settings once at construction and fills in defaults.
 */

import { Type } from 'typebox';
import { Compile } from 'typebox/compile';
import { ConfigError } from './errors.ts';
import { systemTimers } from './timers.ts';
import { WsTransport } from './transports/WsTransport.ts';
import type { ClientConfig, ConnectionTarget, ResolvedConfig } from './types.ts';

export const VERSION = '0.1.0';

export const DEFAULT_USER_AGENT = `resilient-ws/${VERSION}`;

export const DEFAULTS = {
  reconnectDelayMs: 10_000,
  queueRetryDelayMs: 1_000,
  handshakeTimeoutMs: 10_000,
  closeTimeoutMs: 1_000,
  keepAlive: true,
} as const;

const Delay = Type.Optional(Type.Integer({ minimum: 0 }));

/**
 * Schema for the plain-data part of `ClientConfig`.
 */
export const ClientSettingsSchema = Type.Object({
  host: Type.String({ minLength: 1 }),
  port: Type.String({ pattern: '^[0-9]{1,5}$' }),
  path: Type.String({ pattern: '^/' }),
  secure: Type.Optional(Type.Boolean()),
  userAgent: Type.Optional(Type.String({ minLength: 1 })),
  headers: Type.Optional(Type.Record(Type.String(), Type.String())),
  reconnectDelayMs: Delay,
  queueRetryDelayMs: Delay,
  handshakeTimeoutMs: Delay,
  closeTimeoutMs: Delay,
  keepAlive: Type.Optional(Type.Boolean()),
});

const settingsValidator = Compile(ClientSettingsSchema);

/**
 * TypeBox localized validation error type.
 */
interface LocalizedValidationError {
  keyword: string;
  schemaPath: string;
  instancePath: string;
  params: object;
  message: string;
}

/**
 * Format validation errors for display.
 */
function formatErrors(errors: LocalizedValidationError[]): string {
  if (errors.length === 0) {
    return 'Unknown validation error';
  }
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message}`).join('; ');
}

/**
 * Validate a client configuration and apply defaults.
 *
 * @throws ConfigError if any setting is invalid
 */
export function resolveConfig(config: ClientConfig): ResolvedConfig {
  if (!settingsValidator.Check(config)) {
    throw new ConfigError(formatErrors(settingsValidator.Errors(config)));
  }
  if (typeof config.onMessage !== 'function') {
    throw new ConfigError('/onMessage: must be a function');
  }
  const portNumber = Number(config.port);
  if (portNumber < 1 || portNumber > 65535) {
    throw new ConfigError(`/port: out of range: ${config.port}`);
  }

  const secure = config.secure ?? config.port === '443';
  const handshakeTimeoutMs = config.handshakeTimeoutMs ?? DEFAULTS.handshakeTimeoutMs;
  const closeTimeoutMs = config.closeTimeoutMs ?? DEFAULTS.closeTimeoutMs;

  const resolved: ResolvedConfig = {
    host: config.host,
    port: config.port,
    path: config.path,
    onMessage: config.onMessage,
    secure,
    headers: Object.freeze({
      'User-Agent': config.userAgent ?? DEFAULT_USER_AGENT,
      ...config.headers,
    }),
    reconnectDelayMs: config.reconnectDelayMs ?? DEFAULTS.reconnectDelayMs,
    queueRetryDelayMs: config.queueRetryDelayMs ?? DEFAULTS.queueRetryDelayMs,
    handshakeTimeoutMs,
    closeTimeoutMs,
    keepAlive: config.keepAlive ?? DEFAULTS.keepAlive,
    transport:
      config.transport ?? new WsTransport({ secure, handshakeTimeoutMs, closeTimeoutMs }),
    timers: config.timers ?? systemTimers,
  };
  return Object.freeze(resolved);
}

/**
 * Extract what a connection attempt needs from a resolved configuration.
 */
export function toConnectionTarget(config: ResolvedConfig): ConnectionTarget {
  return {
    host: config.host,
    port: config.port,
    path: config.path,
    headers: config.headers,
  };
}
