export const CAPTURE_MODES = ['loopback', 'input'] as const;

export type CaptureMode = (typeof CAPTURE_MODES)[number];

/** Fixed for the lifetime of one server run and shared by every block. */
export interface AudioFormat {
  sampleRate: number;
  channels: number;
  /** Frames per block (samples per channel). */
  blockSize: number;
}

export const BYTES_PER_SAMPLE = 2;

export function bytesPerBlock(format: AudioFormat): number {
  return format.blockSize * format.channels * BYTES_PER_SAMPLE;
}

export function blockDurationMs(format: AudioFormat): number {
  return (format.blockSize / format.sampleRate) * 1000;
}

/**
 * One block of interleaved little-endian signed 16-bit PCM. `data` is a
 * private copy owned by the block; recipients must treat it as read-only.
 */
export interface AudioBlock {
  readonly seq: number;
  /** Wall-clock ms at which the last byte of the block arrived. */
  readonly capturedAt: number;
  readonly frames: number;
  readonly channels: number;
  readonly data: Buffer;
}

export interface BlockRead {
  block: AudioBlock;
  /** true when blocks were discarded before this one because the reader fell behind. */
  overflowed: boolean;
  droppedBlocks: number;
}

export interface ReadBlockOptions {
  signal?: AbortSignal;
}

/** What the broadcast loop needs from a capture session. */
export interface BlockSource {
  readBlock(options?: ReadBlockOptions): Promise<BlockRead>;
  close(): Promise<void>;
}

export interface CaptureDeviceInfo {
  index: number;
  name: string;
  description: string;
  maxInputChannels: number;
  maxOutputChannels: number;
  isDefault: boolean;
}

export interface ClientHandle {
  readonly id: string;
  readonly remoteAddress: string;
  readonly connectedAt: number;
  /** Liveness flag: true once the transport can no longer carry messages. */
  readonly closed: boolean;
  /** Bytes handed to the transport and not yet flushed to the network. */
  readonly pendingBytes: number;
  /** Resolves once the transport has flushed the message. */
  send(data: Buffer): Promise<void>;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

export interface BroadcastStats {
  blocksRead: number;
  overflows: number;
  droppedBlocks: number;
  messagesSent: number;
  clientsDropped: number;
}

export interface CaptureStatus {
  deviceIndex: number;
  deviceName: string;
  mode: CaptureMode;
  format: AudioFormat;
}
