import { spawn } from 'node:child_process';
import type { ChildProcessByStdio } from 'node:child_process';
import type { Readable } from 'node:stream';
import ffmpegInstaller from '@ffmpeg-installer/ffmpeg';
import { DeviceOpenError, DeviceReadError } from '../errors.js';
import { componentLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { bytesPerBlock } from '../types.js';
import type { AudioFormat, CaptureDeviceInfo, CaptureMode } from '../types.js';
import { buildDeviceTable, parseFfmpegDeviceList } from './devices.js';
import type { CaptureBackend } from './captureSource.js';
import type { CaptureStream } from './captureSession.js';

type CaptureProcess = ChildProcessByStdio<null, Readable, Readable>;

export interface FfmpegCaptureOptions {
  /** ffmpeg input device format, e.g. `pulse`, `alsa`, `dshow`. */
  inputFormat: string;
  ffmpegPath?: string;
  openTimeoutMs: number;
  stopTimeoutMs?: number;
  /** Reported as the channel capability of enumerated devices. */
  channels: number;
}

const STDERR_TAIL_CHARS = 2_000;
// Formats whose demuxer takes -sample_rate / -channels as input options.
const RATE_AWARE_FORMATS = new Set(['pulse', 'alsa', 'dshow', 'oss', 'sndio']);

/** Name handed to `-i`, or null when the device cannot be captured in this mode. */
export function resolveInputName(
  inputFormat: string,
  device: CaptureDeviceInfo,
  mode: CaptureMode
): string | null {
  if (mode === 'loopback') {
    if (inputFormat !== 'pulse' || device.maxOutputChannels === 0) return null;
    return `${device.name}.monitor`;
  }
  if (inputFormat === 'dshow') return `audio=${device.name}`;
  return device.name;
}

export function buildCaptureArgs(inputFormat: string, inputName: string, format: AudioFormat): string[] {
  const inputOptions = RATE_AWARE_FORMATS.has(inputFormat)
    ? ['-sample_rate', String(format.sampleRate), '-channels', String(format.channels)]
    : [];
  // Ask PulseAudio for block-sized fragments so the first block is not held back.
  const fragment = inputFormat === 'pulse' ? ['-fragment_size', String(bytesPerBlock(format))] : [];
  return [
    '-nostdin',
    '-hide_banner',
    '-v',
    'error',
    '-fflags',
    'nobuffer',
    '-f',
    inputFormat,
    ...inputOptions,
    ...fragment,
    '-i',
    inputName,
    '-ac',
    String(format.channels),
    '-ar',
    String(format.sampleRate),
    '-f',
    's16le',
    'pipe:1',
  ];
}

class StderrTail {
  #text = '';

  push(chunk: Buffer | string): void {
    this.#text = (this.#text + chunk.toString()).slice(-STDERR_TAIL_CHARS);
  }

  toString(): string {
    return this.#text.trim().split(/\r?\n/).slice(-3).join(' | ');
  }
}

function runListing(ffmpegPath: string, args: string[]): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const proc = spawn(ffmpegPath, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    const stderr = new StderrTail();
    proc.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    proc.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    proc.once('error', (err) => reject(err));
    proc.once('close', (code) => {
      if (code === 0) {
        resolve(stdout);
        return;
      }
      const detail = stderr.toString();
      reject(new Error(`ffmpeg ${args.join(' ')} exited with code ${code ?? 'unknown'}${detail ? `: ${detail}` : ''}`));
    });
  });
}

function waitForFirstAudio(
  proc: CaptureProcess,
  timeoutMs: number,
  fail: (reason: string, cause?: unknown) => DeviceOpenError
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const { stdout } = proc;
    const cleanup = () => {
      clearTimeout(timer);
      stdout.off('readable', onReadable);
      proc.off('close', onClose);
      proc.off('error', onError);
    };
    const onReadable = () => {
      if (stdout.readableLength === 0) return;
      cleanup();
      resolve();
    };
    const onClose = (code: number | null, signal: NodeJS.Signals | null) => {
      cleanup();
      reject(fail(`ffmpeg exited with ${code ?? signal ?? 'unknown status'} before producing audio`));
    };
    const onError = (err: Error) => {
      cleanup();
      reject(fail(`ffmpeg could not be started: ${err.message}`, err));
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(fail(`no audio within ${timeoutMs}ms`));
    }, timeoutMs);

    stdout.on('readable', onReadable);
    proc.once('close', onClose);
    proc.once('error', onError);
  });
}

/** Captures through an ffmpeg child process writing raw s16le to stdout. */
export class FfmpegCaptureBackend implements CaptureBackend {
  readonly #options: FfmpegCaptureOptions;
  readonly #ffmpegPath: string;
  readonly #log: Logger;

  constructor(options: FfmpegCaptureOptions, log: Logger = componentLogger('ffmpeg')) {
    this.#options = options;
    this.#ffmpegPath = options.ffmpegPath ?? ffmpegInstaller.path;
    this.#log = log;
  }

  async listDevices(): Promise<CaptureDeviceInfo[]> {
    const { inputFormat, channels } = this.#options;
    const [sinks, sources] = await Promise.allSettled([
      runListing(this.#ffmpegPath, ['-hide_banner', '-sinks', inputFormat]),
      runListing(this.#ffmpegPath, ['-hide_banner', '-sources', inputFormat]),
    ]);
    if (sinks.status === 'rejected' && sources.status === 'rejected') {
      const reason: unknown = sources.reason;
      throw new Error(
        `ffmpeg could not list ${inputFormat} devices: ${reason instanceof Error ? reason.message : String(reason)}`
      );
    }
    for (const result of [sinks, sources]) {
      if (result.status === 'rejected') {
        const reason: unknown = result.reason;
        this.#log.debug({ event: 'device_listing_partial', message: String(reason) });
      }
    }
    return buildDeviceTable(
      sinks.status === 'fulfilled' ? parseFfmpegDeviceList(sinks.value) : [],
      sources.status === 'fulfilled' ? parseFfmpegDeviceList(sources.value) : [],
      channels
    );
  }

  async start(device: CaptureDeviceInfo, mode: CaptureMode, format: AudioFormat): Promise<CaptureStream> {
    const { inputFormat, openTimeoutMs } = this.#options;
    const fail = (reason: string, cause?: unknown) =>
      new DeviceOpenError(`${mode} capture of device #${device.index} (${device.name}) failed: ${reason}`, {
        deviceIndex: device.index,
        mode,
        cause,
      });

    const inputName = resolveInputName(inputFormat, device, mode);
    if (!inputName) {
      throw fail(`${mode} mode is not supported for this device with ${inputFormat}`);
    }

    const args = buildCaptureArgs(inputFormat, inputName, format);
    this.#log.debug({ event: 'ffmpeg_spawn', args });
    const proc = spawn(this.#ffmpegPath, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const stderr = new StderrTail();
    let started = false;
    let stopping = false;

    proc.stderr.on('data', (chunk: Buffer) => {
      stderr.push(chunk);
      if (started && !stopping) {
        this.#log.warn({ event: 'ffmpeg_stderr', deviceIndex: device.index, message: chunk.toString().trim() });
      }
    });

    const exited = new Promise<Error | null>((resolve) => {
      proc.once('error', (err) => resolve(new DeviceReadError(`ffmpeg failed: ${err.message}`, { cause: err })));
      proc.once('close', (code, signal) => {
        if (stopping || code === 0) {
          resolve(null);
          return;
        }
        const detail = stderr.toString();
        resolve(
          new DeviceReadError(
            `ffmpeg exited with ${code ?? signal ?? 'unknown status'}${detail ? `: ${detail}` : ''}`
          )
        );
      });
    });

    const stop = async () => {
      stopping = true;
      if (proc.exitCode === null && proc.signalCode === null) {
        proc.kill('SIGTERM');
        const escalate = setTimeout(() => proc.kill('SIGKILL'), this.#options.stopTimeoutMs ?? 2_000);
        escalate.unref();
        await exited;
        clearTimeout(escalate);
        return;
      }
      await exited;
    };

    try {
      await waitForFirstAudio(proc, openTimeoutMs, (reason, cause) => {
        const detail = stderr.toString();
        return fail(detail ? `${reason}: ${detail}` : reason, cause);
      });
    } catch (error) {
      await stop();
      throw error;
    }

    started = true;
    return { pcm: proc.stdout, exited, stop };
  }
}
