import type { AudioBlock, BlockRead, BlockSource, ClientHandle, ReadBlockOptions } from '../types.js';

/** In-memory client that records every message it is sent. */
export class FakeClient implements ClientHandle {
  readonly id: string;
  readonly remoteAddress: string;
  readonly connectedAt = 0;
  closed = false;
  terminated = false;
  pendingBytes = 0;
  readonly received: Buffer[] = [];
  onSend: ((data: Buffer) => Promise<void>) | null = null;

  constructor(id: string) {
    this.id = id;
    this.remoteAddress = `10.0.0.${id.length}:5000`;
  }

  send(data: Buffer): Promise<void> {
    this.received.push(data);
    return this.onSend ? this.onSend(data) : Promise.resolve();
  }

  close(): void {
    this.closed = true;
  }

  terminate(): void {
    this.closed = true;
    this.terminated = true;
  }
}

export function makeBlock(seq: number, bytes = 8, channels = 2): AudioBlock {
  return {
    seq,
    capturedAt: 1_000 + seq,
    frames: bytes / (channels * 2),
    channels,
    data: Buffer.alloc(bytes, seq % 256),
  };
}

export interface ScriptedSourceOptions {
  /** Runs before every read with the number of blocks handed out so far. */
  beforeRead?: (delivered: number) => void;
  /** Thrown once the script runs out; without it the read waits for abort. */
  failWith?: Error;
}

/** Plays back a fixed list of reads, then fails or waits for cancellation. */
export class ScriptedSource implements BlockSource {
  readonly #reads: BlockRead[];
  readonly #options: ScriptedSourceOptions;
  delivered = 0;
  closeCalls = 0;

  constructor(reads: BlockRead[], options: ScriptedSourceOptions = {}) {
    this.#reads = reads;
    this.#options = options;
  }

  static ofBlocks(blocks: AudioBlock[], options?: ScriptedSourceOptions): ScriptedSource {
    return new ScriptedSource(
      blocks.map((block) => ({ block, overflowed: false, droppedBlocks: 0 })),
      options
    );
  }

  async readBlock(options: ReadBlockOptions = {}): Promise<BlockRead> {
    this.#options.beforeRead?.(this.delivered);
    const next = this.#reads[this.delivered];
    if (next) {
      this.delivered += 1;
      return next;
    }
    if (this.#options.failWith) {
      throw this.#options.failWith;
    }
    const { signal } = options;
    return new Promise<BlockRead>((_resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }
      signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
    });
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
  }
}
