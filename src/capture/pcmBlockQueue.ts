export interface QueuedBlock {
  data: Buffer;
  capturedAt: number;
  seq: number;
}

export interface TakenBlock extends QueuedBlock {
  droppedBefore: number;
}

/**
 * Cuts an arbitrary byte stream into fixed-size blocks and holds at most
 * `maxQueuedBlocks` of them. When the reader falls behind, the oldest blocks
 * are discarded whole, so a surviving block always starts on a frame boundary.
 */
export class PcmBlockQueue {
  readonly #blockBytes: number;
  readonly #maxQueuedBlocks: number;
  readonly #now: () => number;
  #pending: Buffer = Buffer.alloc(0);
  #blocks: QueuedBlock[] = [];
  #nextSeq = 0;
  #dropped = 0;
  #totalDropped = 0;

  constructor(options: { blockBytes: number; maxQueuedBlocks: number; now?: () => number }) {
    if (!Number.isInteger(options.blockBytes) || options.blockBytes <= 0) {
      throw new RangeError(`blockBytes must be a positive integer, got ${options.blockBytes}`);
    }
    this.#blockBytes = options.blockBytes;
    this.#maxQueuedBlocks = Math.max(1, options.maxQueuedBlocks);
    this.#now = options.now ?? Date.now;
  }

  get length(): number {
    return this.#blocks.length;
  }

  get pendingBytes(): number {
    return this.#pending.length;
  }

  get totalDropped(): number {
    return this.#totalDropped;
  }

  /** Returns the number of complete blocks produced by this chunk. */
  push(chunk: Buffer): number {
    if (chunk.length === 0) return 0;
    const combined = this.#pending.length > 0 ? Buffer.concat([this.#pending, chunk]) : chunk;
    let offset = 0;
    let produced = 0;
    while (combined.length - offset >= this.#blockBytes) {
      // Buffer.from copies, so the block never aliases the device's read buffer.
      const data = Buffer.from(combined.subarray(offset, offset + this.#blockBytes));
      this.#blocks.push({ data, capturedAt: this.#now(), seq: this.#nextSeq });
      this.#nextSeq += 1;
      offset += this.#blockBytes;
      produced += 1;
    }
    this.#pending = offset === combined.length ? Buffer.alloc(0) : Buffer.from(combined.subarray(offset));

    while (this.#blocks.length > this.#maxQueuedBlocks) {
      this.#blocks.shift();
      this.#dropped += 1;
      this.#totalDropped += 1;
    }
    return produced;
  }

  take(): TakenBlock | undefined {
    const next = this.#blocks.shift();
    if (!next) return undefined;
    const droppedBefore = this.#dropped;
    this.#dropped = 0;
    return { ...next, droppedBefore };
  }

  clear(): void {
    this.#blocks = [];
    this.#pending = Buffer.alloc(0);
    this.#dropped = 0;
  }
}
