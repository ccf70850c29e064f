import { createServer } from 'node:http';
import type { IncomingMessage, Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Duplex } from 'node:stream';
import { WebSocketServer } from 'ws';
import type { WebSocket } from 'ws';
import { ConnectionAcceptError, errorMessage } from '../errors.js';
import { componentLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { ClientRegistry } from '../broadcast/clientRegistry.js';
import { WsClientHandle } from './clientHandle.js';

export interface ConnectionAcceptorOptions {
  /** Path clients upgrade on, e.g. `/`. */
  path: string;
  closeTimeoutMs: number;
  /** Clients never need to send audio; anything larger than this is refused. */
  maxInboundBytes?: number;
}

export function describeRemote(req: IncomingMessage): string {
  const { remoteAddress, remotePort } = req.socket;
  return `${remoteAddress ?? 'unknown'}:${remotePort ?? '?'}`;
}

/**
 * Accepts WebSocket clients on the delivery port and keeps the registry in
 * step with their connections. Knows nothing about audio.
 */
export class ConnectionAcceptor {
  readonly #registry: ClientRegistry;
  readonly #options: ConnectionAcceptorOptions;
  readonly #log: Logger;
  readonly #server: Server;
  readonly #wss: WebSocketServer;
  readonly #handles = new Set<WsClientHandle>();
  #closing: Promise<void> | null = null;

  constructor(registry: ClientRegistry, options: ConnectionAcceptorOptions, log: Logger = componentLogger('acceptor')) {
    this.#registry = registry;
    this.#options = options;
    this.#log = log;
    this.#wss = new WebSocketServer({ noServer: true, maxPayload: options.maxInboundBytes ?? 4 * 1024 });
    this.#server = createServer((_req, res) => {
      res.writeHead(426, { 'Content-Type': 'text/plain', Upgrade: 'websocket' });
      res.end('This endpoint only serves WebSocket audio streams\n');
    });

    this.#server.on('upgrade', this.#onUpgrade);
    this.#server.on('clientError', (err: Error, socket: Duplex) => {
      this.#reportAcceptError(new ConnectionAcceptError(`malformed request: ${err.message}`, 'unknown', { cause: err }));
      socket.destroy();
    });
    this.#wss.on('connection', this.#onConnection);
    this.#wss.on('wsClientError', (err: Error, socket: Duplex, req: IncomingMessage) => {
      this.#reportAcceptError(
        new ConnectionAcceptError(`handshake failed: ${err.message}`, describeRemote(req), { cause: err })
      );
      if (socket.writable) {
        socket.end('HTTP/1.1 400 Bad Request\r\nConnection: close\r\n\r\n');
      }
      socket.destroy();
    });
    this.#wss.on('error', (err: Error) => {
      this.#reportAcceptError(new ConnectionAcceptError(err.message, 'unknown', { cause: err }));
    });
  }

  get address(): AddressInfo | null {
    const address = this.#server.address();
    return address && typeof address === 'object' ? address : null;
  }

  get connectionCount(): number {
    return this.#handles.size;
  }

  listen(port: number, host: string): Promise<AddressInfo> {
    return new Promise<AddressInfo>((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.#server.once('error', onError);
      this.#server.listen(port, host, () => {
        this.#server.off('error', onError);
        const address = this.address;
        if (!address) {
          reject(new Error('delivery server did not report a TCP address'));
          return;
        }
        resolve(address);
      });
    });
  }

  /** Stops accepting, closes every client this acceptor registered and shuts the port. */
  close(): Promise<void> {
    if (!this.#closing) {
      this.#closing = this.#shutdown();
    }
    return this.#closing;
  }

  async #shutdown(): Promise<void> {
    const handles = Array.from(this.#handles);
    for (const handle of handles) {
      this.#registry.remove(handle);
      handle.close(1001, 'server shutting down');
    }
    this.#log.info({ event: 'acceptor_closing', clients: handles.length });
    await new Promise<void>((resolve) => this.#wss.close(() => resolve()));
    if (!this.#server.listening) return;
    await new Promise<void>((resolve, reject) => {
      this.#server.close((err) => (err ? reject(err) : resolve()));
      this.#server.closeAllConnections();
    });
  }

  readonly #onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    if (this.#closing) {
      socket.destroy();
      return;
    }
    if (url.pathname !== this.#options.path) {
      socket.write('HTTP/1.1 404 Not Found\r\n\r\n');
      socket.destroy();
      return;
    }
    socket.on('error', (err: Error) => {
      this.#log.debug({ event: 'client_socket_error', remoteAddress: describeRemote(req), message: err.message });
    });
    this.#wss.handleUpgrade(req, socket, head, (ws) => this.#wss.emit('connection', ws, req));
  };

  readonly #onConnection = (ws: WebSocket, req: IncomingMessage) => {
    const remoteAddress = describeRemote(req);
    if (this.#closing) {
      ws.terminate();
      return;
    }
    const handle = new WsClientHandle(ws, remoteAddress, { closeTimeoutMs: this.#options.closeTimeoutMs });
    this.#handles.add(handle);
    this.#registry.add(handle);
    this.#log.info({ event: 'client_connected', clientId: handle.id, remoteAddress, clients: this.#registry.size });

    ws.on('message', (_data, isBinary) => {
      this.#log.debug({ event: 'client_message_ignored', clientId: handle.id, isBinary });
    });
    ws.on('error', (err: Error) => {
      this.#log.warn({ event: 'client_socket_error', clientId: handle.id, remoteAddress, message: err.message });
      this.#registry.remove(handle);
    });
    ws.once('close', (code: number) => {
      this.#handles.delete(handle);
      this.#registry.remove(handle);
      this.#log.info({
        event: 'client_disconnected',
        clientId: handle.id,
        remoteAddress,
        code,
        clients: this.#registry.size,
      });
    });
  };

  #reportAcceptError(error: ConnectionAcceptError): void {
    this.#log.warn({
      event: 'connection_accept_failed',
      remoteAddress: error.remoteAddress,
      message: errorMessage(error),
    });
  }
}
