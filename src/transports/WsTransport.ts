/**
 * Client transport using the `ws` package and Node's resolver.
 */

import { lookup } from 'node:dns/promises';
import createDebug from 'debug';
import { ConnectionError } from '../errors.ts';
import { WsConnectionHandle } from './WsConnectionHandle.ts';
import type { WsConnectionHandleOptions } from './WsConnectionHandle.ts';
import type { ConnectionTransport, ResolvedEndpoint } from './ConnectionTransport.ts';

const debug = createDebug('resilient-ws:ws-transport');

export type WsTransportOptions = WsConnectionHandleOptions;

export class WsTransport implements ConnectionTransport {
  private _options: WsTransportOptions;

  constructor(options: WsTransportOptions) {
    this._options = options;
  }

  async resolve(host: string, port: string): Promise<ResolvedEndpoint[]> {
    const portNumber = parseInt(port, 10);
    if (isNaN(portNumber)) {
      throw new ConnectionError(`Invalid port: ${port}`);
    }

    const addresses = await lookup(host, { all: true });
    debug('Resolved %s to %d address(es)', host, addresses.length);
    return addresses.map((entry) => ({
      address: entry.address,
      family: entry.family === 6 ? 6 : 4,
      port: portNumber,
    }));
  }

  open(): WsConnectionHandle {
    return new WsConnectionHandle(this._options);
  }
}
