/**
 * ConnectionAttempt tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ConnectionAttempt } from '../src/connection/ConnectionAttempt.ts';
import { CancelledError, ConnectionError } from '../src/errors.ts';
import type { ConnectionTarget } from '../src/types.ts';
import { FakeTransport, flush } from './helpers.ts';

const target: ConnectionTarget = {
  host: 'example.test',
  port: '443',
  path: '/stream',
  headers: { 'User-Agent': 'resilient-ws/0.1.0', 'X-Client': 'tests' },
};

describe('ConnectionAttempt', () => {
  it('should resolve, connect, set headers and handshake in order', async () => {
    const transport = new FakeTransport();
    const result = await new ConnectionAttempt(transport, target).run();

    assert.strictEqual(result.ok, true);
    const handle = transport.lastHandle;
    assert.ok(result.ok && result.handle === handle);
    assert.deepStrictEqual(transport.resolveCalls, [{ host: 'example.test', port: '443' }]);
    assert.deepStrictEqual(handle.calls, [
      'connect',
      'setHeader:User-Agent',
      'setHeader:X-Client',
      'handshake',
    ]);
    assert.deepStrictEqual(handle.endpoints, [{ address: '192.0.2.1', family: 4, port: 443 }]);
    assert.deepStrictEqual(handle.handshakes, [{ host: 'example.test', path: '/stream' }]);
    assert.strictEqual(handle.open, true);
  });

  it('should report a resolve failure without opening a handle', async () => {
    const transport = new FakeTransport();
    transport.resolveFailures = 1;

    const result = await new ConnectionAttempt(transport, target).run();

    assert.strictEqual(result.ok, false);
    if (!result.ok) {
      assert.ok(result.error instanceof ConnectionError);
      assert.strictEqual(result.error.message, 'getaddrinfo ENOTFOUND example.test');
      assert.ok(result.error.cause instanceof Error);
    }
    assert.strictEqual(transport.handles.length, 0);
  });

  it('should close the handle when the handshake fails', async () => {
    const transport = new FakeTransport();
    transport.handshakeFailures = 1;

    const result = await new ConnectionAttempt(transport, target).run();

    assert.strictEqual(result.ok, false);
    if (!result.ok) {
      assert.ok(result.error instanceof ConnectionError);
      assert.strictEqual(result.error.message, 'handshake rejected');
    }
    assert.deepStrictEqual(transport.lastHandle.closeCodes, [1000]);
  });

  it('should settle as cancelled when cancelled mid-way', async () => {
    const transport = new FakeTransport();
    const release = transport.holdResolve();
    const attempt = new ConnectionAttempt(transport, target);

    const running = attempt.run();
    await flush();
    await attempt.cancel();
    release();
    const result = await running;

    assert.strictEqual(attempt.cancelled, true);
    assert.strictEqual(result.ok, false);
    if (!result.ok) {
      assert.ok(result.error instanceof CancelledError);
    }
    assert.strictEqual(transport.handles.length, 0);
  });
});
