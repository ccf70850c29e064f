import { CaptureSession } from './captureSession.js';
import { CaptureUnavailableError, DeviceOpenError, errorMessage } from '../errors.js';
import { componentLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { CAPTURE_MODES } from '../types.js';
import type { AudioFormat, CaptureDeviceInfo, CaptureMode } from '../types.js';
import type { CaptureStream } from './captureSession.js';

/** Device boundary: enumeration plus starting a PCM stream in one capture mode. */
export interface CaptureBackend {
  listDevices(): Promise<CaptureDeviceInfo[]>;
  /** Rejects with DeviceOpenError when the device cannot deliver audio in this mode. */
  start(device: CaptureDeviceInfo, mode: CaptureMode, format: AudioFormat): Promise<CaptureStream>;
}

export interface CaptureSourceOptions {
  readTimeoutMs: number;
  maxQueuedBlocks: number;
}

/**
 * Owns the single capture session of a server run. Opening tries the device's
 * loopback (monitor) mode first and falls back to a plain input stream.
 */
export class CaptureSource {
  readonly #backend: CaptureBackend;
  readonly #options: CaptureSourceOptions;
  readonly #log: Logger;
  #active: CaptureSession | null = null;
  #opening = false;

  constructor(backend: CaptureBackend, options: CaptureSourceOptions, log: Logger = componentLogger('capture')) {
    this.#backend = backend;
    this.#options = options;
    this.#log = log;
  }

  get activeSession(): CaptureSession | null {
    return this.#active;
  }

  listDevices(): Promise<CaptureDeviceInfo[]> {
    return this.#backend.listDevices();
  }

  async open(device: CaptureDeviceInfo, format: AudioFormat): Promise<CaptureSession> {
    if (this.#active || this.#opening) {
      throw new Error('a capture session is already active; close it before opening another');
    }
    this.#opening = true;
    try {
      const failures: DeviceOpenError[] = [];
      for (const mode of CAPTURE_MODES) {
        try {
          const stream = await this.#backend.start(device, mode, format);
          return this.#activate(stream, device, mode, format);
        } catch (error) {
          const failure =
            error instanceof DeviceOpenError
              ? error
              : new DeviceOpenError(errorMessage(error), { deviceIndex: device.index, mode, cause: error });
          failures.push(failure);
          this.#log.warn({
            event: 'capture_open_failed',
            deviceIndex: device.index,
            device: device.name,
            mode,
            message: failure.message,
          });
        }
      }
      throw new DeviceOpenError(
        `device #${device.index} (${device.name}) could not be opened in loopback or input mode`,
        { deviceIndex: device.index, mode: 'any', cause: new AggregateError(failures) }
      );
    } finally {
      this.#opening = false;
    }
  }

  /** Walks the candidates in order and returns the first session that opens. */
  async openFirst(candidates: readonly CaptureDeviceInfo[], format: AudioFormat): Promise<CaptureSession> {
    if (candidates.length === 0) {
      throw new CaptureUnavailableError('no capture device candidates found');
    }
    const attempts: DeviceOpenError[] = [];
    for (const device of candidates) {
      try {
        return await this.open(device, format);
      } catch (error) {
        if (!(error instanceof DeviceOpenError)) throw error;
        attempts.push(error);
      }
    }
    throw new CaptureUnavailableError(
      'could not open any capture device; enable a monitor/loopback source or set CAPTURE_DEVICE',
      attempts
    );
  }

  #activate(
    stream: CaptureStream,
    device: CaptureDeviceInfo,
    mode: CaptureMode,
    format: AudioFormat
  ): CaptureSession {
    const session: CaptureSession = new CaptureSession(stream, {
      device,
      mode,
      format,
      readTimeoutMs: this.#options.readTimeoutMs,
      maxQueuedBlocks: this.#options.maxQueuedBlocks,
      onClose: () => {
        if (this.#active === session) {
          this.#active = null;
          this.#log.info({ event: 'capture_closed', deviceIndex: device.index, mode });
        }
      },
    });
    this.#active = session;
    this.#log.info({
      event: 'capture_opened',
      deviceIndex: device.index,
      device: device.description || device.name,
      mode,
      ...format,
    });
    return session;
  }
}
