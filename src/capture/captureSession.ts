import type { Readable } from 'node:stream';
import { DeviceReadError, errorMessage } from '../errors.js';
import { PcmBlockQueue } from './pcmBlockQueue.js';
import { blockDurationMs, bytesPerBlock } from '../types.js';
import type {
  AudioFormat,
  BlockRead,
  BlockSource,
  CaptureDeviceInfo,
  CaptureMode,
  ReadBlockOptions,
} from '../types.js';

/** A running capture process as seen by the session. */
export interface CaptureStream {
  /** Raw interleaved s16le bytes, in arbitrary chunk sizes. */
  readonly pcm: Readable;
  /** Settles once the device is gone; carries the failure when it did not stop on request. Never rejects. */
  readonly exited: Promise<Error | null>;
  stop(): Promise<void>;
}

export interface CaptureSessionOptions {
  device: CaptureDeviceInfo;
  mode: CaptureMode;
  format: AudioFormat;
  readTimeoutMs: number;
  maxQueuedBlocks: number;
  onClose?: () => void;
  now?: () => number;
}

interface PendingRead {
  resolve: (read: BlockRead) => void;
  reject: (error: unknown) => void;
  /** Restarts the silence timer. */
  touch: () => void;
}

export class CaptureSession implements BlockSource {
  readonly device: CaptureDeviceInfo;
  readonly mode: CaptureMode;
  readonly format: AudioFormat;
  readonly #stream: CaptureStream;
  readonly #queue: PcmBlockQueue;
  /** Longest gap between device chunks before a read fails. */
  readonly #silenceTimeoutMs: number;
  readonly #onClose?: () => void;
  #pending: PendingRead | null = null;
  #failure: DeviceReadError | null = null;
  #closing: Promise<void> | null = null;

  constructor(stream: CaptureStream, options: CaptureSessionOptions) {
    this.device = options.device;
    this.mode = options.mode;
    this.format = options.format;
    this.#stream = stream;
    // a device may hold back up to one block period before writing
    this.#silenceTimeoutMs = Math.ceil(options.readTimeoutMs + blockDurationMs(options.format));
    this.#onClose = options.onClose;
    this.#queue = new PcmBlockQueue({
      blockBytes: bytesPerBlock(options.format),
      maxQueuedBlocks: options.maxQueuedBlocks,
      now: options.now,
    });

    stream.pcm.on('data', this.#onData);
    stream.pcm.on('error', (error: Error) => {
      this.#fail(new DeviceReadError(`capture stream failed: ${error.message}`, { cause: error }));
    });
    stream.pcm.once('end', () => {
      void stream.exited.then((error) => {
        this.#fail(error ?? new DeviceReadError('capture stream ended'));
      });
    });
    void stream.exited.then((error) => {
      if (error) this.#fail(error);
    });
  }

  get closed(): boolean {
    return this.#closing !== null;
  }

  readBlock(options: ReadBlockOptions = {}): Promise<BlockRead> {
    if (this.#closing) {
      return Promise.reject(new DeviceReadError('capture session is closed'));
    }
    if (this.#pending) {
      return Promise.reject(new Error('a block read is already pending on this session'));
    }
    const ready = this.#takeBlock();
    if (ready) {
      return Promise.resolve(ready);
    }
    if (this.#failure) {
      return Promise.reject(this.#failure);
    }
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<BlockRead>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.#fail(new DeviceReadError(`no audio from device for ${this.#silenceTimeoutMs}ms`));
      }, this.#silenceTimeoutMs);
      const onAbort = () => settle(() => reject(signal?.reason));
      const settle = (action: () => void) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.#pending = null;
        action();
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.#pending = {
        resolve: (read) => settle(() => resolve(read)),
        reject: (error) => settle(() => reject(error)),
        touch: () => {
          timer.refresh();
        },
      };
    });
  }

  /** Stops the device and releases it. Safe to call more than once. */
  close(): Promise<void> {
    if (!this.#closing) {
      this.#closing = this.#shutdown();
    }
    return this.#closing;
  }

  async #shutdown(): Promise<void> {
    this.#pending?.reject(new DeviceReadError('capture session closed'));
    this.#stream.pcm.off('data', this.#onData);
    this.#queue.clear();
    try {
      await this.#stream.stop();
    } finally {
      this.#onClose?.();
    }
  }

  readonly #onData = (chunk: Buffer) => {
    if (this.#closing) return;
    const produced = this.#queue.push(chunk);
    const pending = this.#pending;
    if (!pending) return;
    if (produced === 0) {
      pending.touch();
      return;
    }
    const read = this.#takeBlock();
    if (read) pending.resolve(read);
  };

  #takeBlock(): BlockRead | undefined {
    const taken = this.#queue.take();
    if (!taken) return undefined;
    return {
      block: {
        seq: taken.seq,
        capturedAt: taken.capturedAt,
        frames: this.format.blockSize,
        channels: this.format.channels,
        data: taken.data,
      },
      overflowed: taken.droppedBefore > 0,
      droppedBlocks: taken.droppedBefore,
    };
  }

  #fail(error: Error): void {
    if (this.#failure || this.#closing) return;
    this.#failure =
      error instanceof DeviceReadError ? error : new DeviceReadError(errorMessage(error), { cause: error });
    this.#pending?.reject(this.#failure);
  }
}
