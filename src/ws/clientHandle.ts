import { randomUUID } from 'node:crypto';
import { WebSocket } from 'ws';
import type { ClientHandle } from '../types.js';

export class WsClientHandle implements ClientHandle {
  readonly id = randomUUID();
  readonly remoteAddress: string;
  readonly connectedAt = Date.now();
  readonly #ws: WebSocket;
  readonly #closeTimeoutMs: number;

  constructor(ws: WebSocket, remoteAddress: string, options: { closeTimeoutMs: number }) {
    this.#ws = ws;
    this.remoteAddress = remoteAddress;
    this.#closeTimeoutMs = options.closeTimeoutMs;
  }

  get closed(): boolean {
    return this.#ws.readyState !== WebSocket.OPEN;
  }

  get pendingBytes(): number {
    return this.#ws.bufferedAmount;
  }

  send(data: Buffer): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.#ws.send(data, { binary: true }, (err) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }

  /** Starts the close handshake; a peer that does not answer in time is cut off. */
  close(code = 1001, reason = ''): void {
    if (this.#ws.readyState === WebSocket.CLOSED) return;
    const timer = setTimeout(() => this.#ws.terminate(), this.#closeTimeoutMs);
    timer.unref();
    this.#ws.once('close', () => clearTimeout(timer));
    if (this.#ws.readyState === WebSocket.OPEN) {
      this.#ws.close(code, reason);
    }
  }

  terminate(): void {
    this.#ws.terminate();
  }
}
