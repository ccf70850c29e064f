import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { ClientSendError, DeviceReadError, errorMessage } from '../errors.js';
import { componentLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { ClientRegistry } from './clientRegistry.js';
import type { AudioBlock, BlockRead, BlockSource, BroadcastStats, ClientHandle } from '../types.js';

export interface BroadcastEngineOptions {
  /** A send not flushed within this budget drops the client. */
  sendTimeoutMs: number;
  /** A client already behind whose backlog would grow past this is dropped. */
  maxPendingBytes: number;
}

/**
 * Reads one block at a time and hands it to every registered client. Sends are
 * started and tracked but never awaited, so a slow or dead client can only
 * lose its own connection; it never delays the next device read.
 */
export class BroadcastEngine {
  readonly #source: BlockSource;
  readonly #registry: ClientRegistry;
  readonly #options: BroadcastEngineOptions;
  readonly #log: Logger;
  readonly #stats: BroadcastStats = {
    blocksRead: 0,
    overflows: 0,
    droppedBlocks: 0,
    messagesSent: 0,
    clientsDropped: 0,
  };
  #running = false;

  constructor(
    source: BlockSource,
    registry: ClientRegistry,
    options: BroadcastEngineOptions,
    log: Logger = componentLogger('broadcast')
  ) {
    this.#source = source;
    this.#registry = registry;
    this.#options = options;
    this.#log = log;
  }

  get stats(): Readonly<BroadcastStats> {
    return { ...this.#stats };
  }

  get running(): boolean {
    return this.#running;
  }

  /**
   * Runs until `signal` aborts (resolves with the final stats) or the device
   * fails (rejects with DeviceReadError). The capture session is closed before
   * either happens.
   */
  async run(signal: AbortSignal): Promise<BroadcastStats> {
    if (this.#running) {
      throw new Error('broadcast engine is already running');
    }
    this.#running = true;
    this.#log.info({ event: 'broadcast_started', clients: this.#registry.size });
    try {
      while (!signal.aborted) {
        let read: BlockRead;
        try {
          read = await this.#source.readBlock({ signal });
        } catch (error) {
          if (signal.aborted) break;
          throw error instanceof DeviceReadError
            ? error
            : new DeviceReadError(`capture read failed: ${errorMessage(error)}`, { cause: error });
        }

        this.#stats.blocksRead += 1;
        if (read.overflowed) {
          this.#stats.overflows += 1;
          this.#stats.droppedBlocks += read.droppedBlocks;
          this.#log.warn({
            event: 'capture_overflow',
            seq: read.block.seq,
            droppedBlocks: read.droppedBlocks,
          });
        }

        this.fanOut(read.block);
        // let socket events (connects, closes, send callbacks) run between blocks
        await yieldToEventLoop();
      }
      return this.stats;
    } finally {
      this.#running = false;
      await this.#closeSource();
      this.#log.info({ event: 'broadcast_stopped', ...this.#stats });
    }
  }

  /** Delivers one block to the clients registered right now. */
  fanOut(block: AudioBlock): void {
    for (const handle of this.#registry.snapshot()) {
      this.#deliver(handle, block);
    }
  }

  #deliver(handle: ClientHandle, block: AudioBlock): void {
    // removed earlier in this same pass
    if (!this.#registry.has(handle)) return;

    if (handle.closed) {
      this.#drop(handle, new ClientSendError(handle.id, 'closed', 'connection is closed'));
      return;
    }
    // an idle client always takes the block, even one larger than the limit
    if (handle.pendingBytes > 0 && handle.pendingBytes + block.data.length > this.#options.maxPendingBytes) {
      this.#drop(
        handle,
        new ClientSendError(
          handle.id,
          'backpressure',
          `client is ${handle.pendingBytes} bytes behind (limit ${this.#options.maxPendingBytes})`
        )
      );
      return;
    }

    let sending: Promise<void>;
    try {
      sending = handle.send(block.data);
    } catch (error) {
      this.#drop(handle, new ClientSendError(handle.id, 'transport', errorMessage(error), { cause: error }));
      return;
    }
    this.#stats.messagesSent += 1;

    const timer = setTimeout(() => {
      this.#drop(
        handle,
        new ClientSendError(handle.id, 'timeout', `block ${block.seq} not flushed within ${this.#options.sendTimeoutMs}ms`)
      );
    }, this.#options.sendTimeoutMs);
    timer.unref();
    void sending.then(
      () => clearTimeout(timer),
      (error: unknown) => {
        clearTimeout(timer);
        this.#drop(handle, new ClientSendError(handle.id, 'transport', errorMessage(error), { cause: error }));
      }
    );
  }

  #drop(handle: ClientHandle, error: ClientSendError): void {
    if (!this.#registry.remove(handle)) return;
    this.#stats.clientsDropped += 1;
    this.#log.info({
      event: 'client_dropped',
      clientId: handle.id,
      remoteAddress: handle.remoteAddress,
      reason: error.reason,
      message: error.message,
      clients: this.#registry.size,
    });
    try {
      handle.terminate();
    } catch (terminateError) {
      this.#log.debug({ event: 'client_terminate_failed', clientId: handle.id, message: errorMessage(terminateError) });
    }
  }

  async #closeSource(): Promise<void> {
    try {
      await this.#source.close();
    } catch (error) {
      this.#log.error({ event: 'capture_close_failed', message: errorMessage(error) });
    }
  }
}
