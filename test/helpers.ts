/**
 * Test utilities: in-process transport and timer stand-ins plus polling helpers.
 */

import { CancelledError, ReadFaultError, WriteError } from '../src/errors.ts';
import type {
  ConnectionHandle,
  ConnectionTransport,
  ReadOutcome,
  ResolvedEndpoint,
} from '../src/transports/ConnectionTransport.ts';
import type { Cancel, TimerScheduler } from '../src/timers.ts';

/**
 * Promise-based delay.
 *
 * @param ms - Delay in milliseconds
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Let every pending promise callback run.
 */
export async function flush(): Promise<void> {
  for (let i = 0; i < 3; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

/**
 * Wait until a condition becomes true, with polling and timeout.
 *
 * @param condition - Function that returns true when condition is met
 * @param timeout - Maximum time to wait in milliseconds (default: 5000)
 * @param pollInterval - How often to check condition in milliseconds (default: 10)
 */
export async function waitUntil(
  condition: () => boolean,
  timeout = 5000,
  pollInterval = 10
): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeout) {
      throw new Error(`Timeout waiting for condition after ${timeout}ms`);
    }
    await delay(pollInterval);
  }
}

/**
 * A promise that the test settles by hand.
 */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

interface FakeTimer {
  id: number;
  due: number;
  callback: () => void;
}

/**
 * Manually driven timer scheduler.
 */
export class FakeTimers implements TimerScheduler {
  private _now = 0;
  private _nextId = 0;
  private _timers: FakeTimer[] = [];
  private _holds = 0;

  get now(): number {
    return this._now;
  }

  /**
   * Number of armed timers.
   */
  get pending(): number {
    return this._timers.length;
  }

  /**
   * Number of keep-alive tokens not yet released.
   */
  get holds(): number {
    return this._holds;
  }

  /**
   * Delays of the armed timers, soonest first.
   */
  get pendingDelays(): number[] {
    return this._timers.map((t) => t.due - this._now).sort((a, b) => a - b);
  }

  schedule(callback: () => void, delayMs: number): Cancel {
    const timer: FakeTimer = { id: this._nextId++, due: this._now + delayMs, callback };
    this._timers.push(timer);
    return () => {
      this._timers = this._timers.filter((t) => t !== timer);
    };
  }

  hold(): Cancel {
    this._holds++;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this._holds--;
    };
  }

  /**
   * Move the clock forward, firing every timer that comes due on the way.
   */
  advance(ms: number): void {
    const target = this._now + ms;
    for (;;) {
      const due = this._timers
        .filter((t) => t.due <= target)
        .sort((a, b) => a.due - b.due || a.id - b.id);
      const next = due[0];
      if (!next) break;
      this._timers = this._timers.filter((t) => t !== next);
      this._now = next.due;
      next.callback();
    }
    this._now = target;
  }
}

/**
 * In-process connection handle. The test plays the server through
 * `receive()` and `fail()`.
 */
export class FakeHandle implements ConnectionHandle {
  readonly id: number;
  isOpen = false;
  endpoints: ResolvedEndpoint[] = [];
  headers: Record<string, string> = {};
  handshakes: { host: string; path: string }[] = [];
  calls: string[] = [];
  written: string[] = [];
  closeCodes: number[] = [];
  readsIssued = 0;
  /** Error thrown by the next handshake */
  handshakeError: Error | null = null;
  /** Number of upcoming writes that fail */
  writeFailures = 0;

  private _inbox: string[] = [];
  private _terminal: ReadOutcome | null = null;
  private _pendingRead: ((outcome: ReadOutcome) => void) | null = null;

  constructor(id: number) {
    this.id = id;
  }

  get open(): boolean {
    return this.isOpen;
  }

  get readOutstanding(): boolean {
    return this._pendingRead !== null;
  }

  /**
   * Open without a handshake, for tests that use the handle directly.
   */
  markOpen(): this {
    this.isOpen = true;
    return this;
  }

  async connect(endpoints: ResolvedEndpoint[]): Promise<void> {
    this.calls.push('connect');
    this.endpoints = endpoints;
  }

  setHeader(name: string, value: string): void {
    this.calls.push(`setHeader:${name}`);
    this.headers[name] = value;
  }

  async handshake(host: string, path: string): Promise<void> {
    this.calls.push('handshake');
    this.handshakes.push({ host, path });
    if (this.handshakeError) {
      throw this.handshakeError;
    }
    this.isOpen = true;
  }

  read(): Promise<ReadOutcome> {
    if (this._pendingRead) {
      throw new Error('A read is already outstanding');
    }
    this.readsIssued++;
    const payload = this._inbox.shift();
    if (payload !== undefined) {
      return Promise.resolve({ kind: 'message', payload });
    }
    if (this._terminal) {
      return Promise.resolve(this._terminal);
    }
    return new Promise((resolve) => {
      this._pendingRead = resolve;
    });
  }

  async write(payload: string): Promise<void> {
    if (!this.isOpen) {
      throw new WriteError('Connection is not open');
    }
    if (this.writeFailures > 0) {
      this.writeFailures--;
      throw new WriteError('simulated write failure');
    }
    this.written.push(payload);
  }

  async close(code = 1000): Promise<void> {
    this.closeCodes.push(code);
    this.isOpen = false;
    this._end({ kind: 'cancelled', error: new CancelledError('Connection closed locally') });
  }

  /**
   * Deliver a message from the server.
   */
  receive(payload: string): void {
    const pending = this._pendingRead;
    if (pending) {
      this._pendingRead = null;
      pending({ kind: 'message', payload });
      return;
    }
    this._inbox.push(payload);
  }

  /**
   * Break the connection from the server side.
   */
  fail(message: string): void {
    this.isOpen = false;
    this._end({ kind: 'fault', error: new ReadFaultError(message) });
  }

  private _end(outcome: ReadOutcome): void {
    if (!this._terminal) {
      this._terminal = outcome;
    }
    const pending = this._pendingRead;
    if (pending) {
      this._pendingRead = null;
      pending(this._terminal);
    }
  }
}

/**
 * In-process transport handing out `FakeHandle`s.
 */
export class FakeTransport implements ConnectionTransport {
  handles: FakeHandle[] = [];
  resolveCalls: { host: string; port: string }[] = [];
  /** Number of upcoming resolves that fail */
  resolveFailures = 0;
  /** Number of upcoming handles whose handshake fails */
  handshakeFailures = 0;
  /** Write failures preset on the next handle */
  nextWriteFailures = 0;

  private _resolveGate: Promise<void> | null = null;

  get lastHandle(): FakeHandle {
    const handle = this.handles[this.handles.length - 1];
    if (!handle) {
      throw new Error('No handle opened yet');
    }
    return handle;
  }

  /**
   * Make resolves wait until the returned function is called.
   */
  holdResolve(): () => void {
    const gate = deferred();
    this._resolveGate = gate.promise;
    return () => {
      this._resolveGate = null;
      gate.resolve();
    };
  }

  async resolve(host: string, port: string): Promise<ResolvedEndpoint[]> {
    this.resolveCalls.push({ host, port });
    if (this._resolveGate) {
      await this._resolveGate;
    }
    if (this.resolveFailures > 0) {
      this.resolveFailures--;
      throw new Error(`getaddrinfo ENOTFOUND ${host}`);
    }
    return [{ address: '192.0.2.1', family: 4, port: Number(port) }];
  }

  open(): FakeHandle {
    const handle = new FakeHandle(this.handles.length);
    if (this.handshakeFailures > 0) {
      this.handshakeFailures--;
      handle.handshakeError = new Error('handshake rejected');
    }
    handle.writeFailures = this.nextWriteFailures;
    this.nextWriteFailures = 0;
    this.handles.push(handle);
    return handle;
  }
}
