import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { AccessToken, AuthError, ShutdownError, TransportError } from '@pbr/domain';
import { WsStreamTransportAdapter } from '@pbr/relay/infrastructure/adapters/stream/ws-stream-transport.adapter';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { type WebSocket, WebSocketServer } from 'ws';

describe('WsStreamTransportAdapter', () => {
  let server: Server;
  let wss: WebSocketServer;
  let baseUrl: string;
  let requestedPaths: string[];
  let onConnection: (socket: WebSocket) => void;

  const createTransport = (frameQueueLimit = 16): WsStreamTransportAdapter =>
    new WsStreamTransportAdapter({ url: `${baseUrl}/websocket`, connectTimeoutMs: 2_000, frameQueueLimit });

  beforeEach(async () => {
    requestedPaths = [];
    onConnection = () => undefined;
    server = createServer();
    wss = new WebSocketServer({ noServer: true });

    server.on('upgrade', (request, socket, head) => {
      requestedPaths.push(request.url ?? '');
      if (request.url?.endsWith('/bad-token')) {
        socket.end('HTTP/1.1 401 Unauthorized\r\nContent-Length: 0\r\nConnection: close\r\n\r\n');
        return;
      }
      wss.handleUpgrade(request, socket, head, (ws) => onConnection(ws));
    });

    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address: AddressInfo | string | null = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server has no TCP address');
    }
    baseUrl = `ws://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    for (const client of wss.clients) {
      client.terminate();
    }
    wss.close();
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('connects with the token in the path and yields frames in order', async () => {
    onConnection = (ws) => {
      ws.send('{"type":"nop"}');
      ws.send('{"type":"tickle","subtype":"push"}');
    };

    const handle = await createTransport().open(AccessToken.create('test-token'));

    expect(requestedPaths).toEqual(['/websocket/test-token']);
    expect(await handle.receive()).toBe('{"type":"nop"}');
    expect(await handle.receive()).toBe('{"type":"tickle","subtype":"push"}');
    handle.close();
  });

  it('rejects a refused token with AuthError', async () => {
    await expect(createTransport().open(AccessToken.create('bad-token'))).rejects.toBeInstanceOf(AuthError);
  });

  it('reports a server-side close as a disconnect', async () => {
    onConnection = (ws) => ws.close(4000, 'bye');

    const handle = await createTransport().open(AccessToken.create('test-token'));

    await expect(handle.receive()).rejects.toMatchObject({ reason: 'disconnected' });
    expect(handle.closed).toBe(true);
  });

  it('fails the connection when the frame queue overflows', async () => {
    onConnection = (ws) => {
      for (let i = 0; i < 5; i++) {
        ws.send(`{"type":"push","n":${i}}`);
      }
    };

    const handle = await createTransport(2).open(AccessToken.create('test-token'));
    await vi.waitFor(() => expect(handle.closed).toBe(true));

    expect(await handle.receive()).toBe('{"type":"push","n":0}');
    expect(await handle.receive()).toBe('{"type":"push","n":1}');
    await expect(handle.receive()).rejects.toMatchObject({ reason: 'overflow' });
  });

  it('closes locally', async () => {
    const handle = await createTransport().open(AccessToken.create('test-token'));
    const pending = handle.receive();

    handle.close();

    await expect(pending).rejects.toBeInstanceOf(TransportError);
    expect(handle.closed).toBe(true);
  });

  it('reports an unreachable server as a network error', async () => {
    const transport = createTransport();
    for (const client of wss.clients) {
      client.terminate();
    }
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    // Re-listen on a fresh port so afterEach can close it.
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));

    await expect(transport.open(AccessToken.create('test-token'))).rejects.toMatchObject({ reason: 'network' });
  });

  it('does not connect once shutdown was requested', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(createTransport().open(AccessToken.create('test-token'), controller.signal)).rejects.toBeInstanceOf(
      ShutdownError,
    );
    expect(requestedPaths).toEqual([]);
  });
});
