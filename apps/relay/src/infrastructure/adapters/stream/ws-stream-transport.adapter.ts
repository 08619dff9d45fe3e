import type { ClientRequest, IncomingMessage } from 'node:http';
import { type AccessToken, AuthError, ShutdownError, TransportError } from '@pbr/domain';
import type { StreamTransportPort, TransportHandle } from '@pbr/relay/domain/services/ports/stream-transport.port';
import { createChildLogger } from '@pbr/relay/infrastructure/logging/pino-logger';
import WebSocket from 'ws';
import { FrameQueue } from './frame-queue';

const log = createChildLogger('ws-transport');

export interface WsStreamTransportOptions {
  url: string;
  connectTimeoutMs: number;
  frameQueueLimit: number;
}

export class WsStreamTransportAdapter implements StreamTransportPort {
  constructor(private readonly options: WsStreamTransportOptions) {}

  async open(token: AccessToken, signal?: AbortSignal): Promise<TransportHandle> {
    if (signal?.aborted) {
      throw new ShutdownError();
    }

    // The token is part of the URL: never log it.
    const url = `${this.options.url.replace(/\/+$/, '')}/${encodeURIComponent(token.reveal())}`;

    return new Promise<TransportHandle>((resolve, reject) => {
      const socket = new WebSocket(url, { handshakeTimeout: this.options.connectTimeoutMs });
      let settled = false;

      const cleanup = (): void => {
        socket.off('open', onOpen);
        socket.off('unexpected-response', onUnexpectedResponse);
        socket.off('close', onClose);
        signal?.removeEventListener('abort', onAbort);
      };

      const fail = (error: Error): void => {
        if (settled) {
          return;
        }
        settled = true;
        cleanup();
        reject(error);
      };

      const onOpen = (): void => {
        if (settled) {
          return;
        }
        settled = true;
        cleanup();
        socket.off('error', onError);
        resolve(new WsTransportHandle(socket, this.options.frameQueueLimit));
      };

      const onUnexpectedResponse = (request: ClientRequest, response: IncomingMessage): void => {
        const status = response.statusCode ?? 0;
        request.destroy();
        response.resume();
        if (status === 401 || status === 403) {
          fail(new AuthError(`Stream rejected the access token (HTTP ${status})`));
          return;
        }
        fail(new TransportError('network', `Stream handshake rejected with HTTP ${status}`));
      };

      // Stays attached until open: ws emits late errors after a rejected handshake.
      const onError = (error: Error): void => {
        log.debug(`Stream socket error before open: ${error.message}`);
        fail(new TransportError('network', `Stream connection failed: ${error.message}`, { cause: error }));
      };

      const onClose = (code: number): void => {
        fail(new TransportError('disconnected', `Stream closed during handshake (code=${code})`));
      };

      const onAbort = (): void => {
        socket.terminate();
        fail(new ShutdownError());
      };

      socket.on('open', onOpen);
      socket.on('unexpected-response', onUnexpectedResponse);
      socket.on('error', onError);
      socket.on('close', onClose);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

class WsTransportHandle implements TransportHandle {
  private readonly queue: FrameQueue;
  private isClosed = false;

  constructor(
    private readonly socket: WebSocket,
    frameQueueLimit: number,
  ) {
    this.queue = new FrameQueue(frameQueueLimit);

    socket.on('message', (data: WebSocket.RawData) => {
      if (!this.queue.push(rawDataToString(data))) {
        log.warn(`Frame queue overflow (${frameQueueLimit} pending); dropping connection`);
        this.close();
      }
    });

    socket.on('close', (code: number, reason: Buffer) => {
      this.isClosed = true;
      const detail = reason.length > 0 ? `, reason=${reason.toString('utf8')}` : '';
      this.queue.fail(new TransportError('disconnected', `Stream closed (code=${code}${detail})`));
    });

    socket.on('error', (error: Error) => {
      this.queue.fail(new TransportError('network', `Stream socket error: ${error.message}`, { cause: error }));
    });
  }

  get closed(): boolean {
    return this.isClosed || this.queue.failed;
  }

  receive(signal?: AbortSignal): Promise<string> {
    return this.queue.next(signal);
  }

  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    this.queue.fail(new TransportError('disconnected', 'Stream closed locally'));
    // A stale peer may never answer a close handshake.
    this.socket.terminate();
  }
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}
