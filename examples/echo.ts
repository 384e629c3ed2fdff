/**
 * Echo Example
 *
 * Runs a local echo server, queues messages before the client connects, then
 * drops the connection from the server side to show the client reconnecting.
 *
 * Run with: node --import tsx examples/echo.ts
 */

import { WebSocketServer } from 'ws';
import { ResilientClient } from '../src/index.ts';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function main() {
  // 1. Start a local echo server
  const server = new WebSocketServer({ host: '127.0.0.1', port: 3000 });
  server.on('connection', (socket) => {
    console.log('[Server] Client connected');
    socket.on('message', (data) => socket.send(`echo:${data.toString()}`));
  });

  // 2. Create the client. Port 3000 is not 443, so the connection is plain ws://
  const client = new ResilientClient({
    host: '127.0.0.1',
    port: '3000',
    path: '/echo',
    onMessage: (payload) => console.log(`[Client] Received: ${payload}`),
    reconnectDelayMs: 1000,
  });

  client.on('connected', () => console.log('[Client] Connected'));
  client.on('disconnected', (err: Error) => console.log(`[Client] Disconnected: ${err.message}`));
  client.on('connectFailed', (err: Error) => console.log(`[Client] Connect failed: ${err.message}`));

  // 3. Queued messages wait for the connection and go out in order
  await client.sendMessage('first', true);
  await client.sendMessage('second', true);
  await client.start();
  await delay(100);

  // 4. Direct sends report whether the write succeeded
  const sent = await client.sendMessage('direct');
  console.log(`[Client] Direct send: ${sent}`);
  await delay(100);

  // 5. Drop every connection from the server side; the client reconnects on its own
  for (const socket of server.clients) {
    socket.terminate();
  }
  await delay(200);
  await client.sendMessage('after reconnect', true);
  await delay(100);

  // 6. Cleanup: stop the client first, then the server
  console.log('Cleaning up...');
  await client.close();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  console.log('Done!');
}

main().catch(console.error);
