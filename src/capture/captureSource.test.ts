import { describe, expect, it, vi } from 'vitest';
import { PassThrough } from 'node:stream';
import { CaptureSource } from './captureSource.js';
import type { CaptureBackend } from './captureSource.js';
import type { CaptureStream } from './captureSession.js';
import { CaptureUnavailableError, DeviceOpenError } from '../errors.js';
import type { AudioFormat, CaptureDeviceInfo, CaptureMode } from '../types.js';

const format: AudioFormat = { sampleRate: 44100, channels: 2, blockSize: 1024 };

const makeDevice = (index: number, name: string, output = true): CaptureDeviceInfo => ({
  index,
  name,
  description: name,
  maxInputChannels: output ? 0 : 2,
  maxOutputChannels: output ? 2 : 0,
  isDefault: index === 0,
});

function fakeStream(): CaptureStream {
  let finish: (error: Error | null) => void = () => undefined;
  const exited = new Promise<Error | null>((resolve) => {
    finish = resolve;
  });
  return {
    pcm: new PassThrough(),
    exited,
    stop: async () => finish(null),
  };
}

/** Backend whose devices open only in the listed modes. */
function createBackend(openable: Record<number, CaptureMode[]>) {
  const start = vi.fn(async (device: CaptureDeviceInfo, mode: CaptureMode, _format: AudioFormat) => {
    if (!(openable[device.index] ?? []).includes(mode)) {
      throw new DeviceOpenError(`${mode} refused by #${device.index}`, { deviceIndex: device.index, mode });
    }
    return fakeStream();
  });
  const backend: CaptureBackend = {
    listDevices: async () => [],
    start,
  };
  return { backend, start };
}

const createSource = (backend: CaptureBackend) =>
  new CaptureSource(backend, { readTimeoutMs: 1_000, maxQueuedBlocks: 4 });

describe('CaptureSource.open', () => {
  it('uses loopback mode when the device supports it', async () => {
    const { backend, start } = createBackend({ 0: ['loopback', 'input'] });
    const source = createSource(backend);

    const session = await source.open(makeDevice(0, 'speakers'), format);

    expect(session.mode).toBe('loopback');
    expect(start).toHaveBeenCalledTimes(1);
    await session.close();
  });

  it('falls back to a plain input stream when loopback fails', async () => {
    const { backend, start } = createBackend({ 3: ['input'] });
    const source = createSource(backend);
    const device = makeDevice(3, 'stereo mix', false);

    const session = await source.open(device, format);

    expect(session.mode).toBe('input');
    expect(session.device).toBe(device);
    expect(start.mock.calls.map((call) => call[1])).toEqual(['loopback', 'input']);
    expect(start.mock.calls.every((call) => call[2] === format)).toBe(true);
    await session.close();
  });

  it('raises DeviceOpenError when neither mode opens', async () => {
    const { backend } = createBackend({});
    const source = createSource(backend);

    const failure = await source.open(makeDevice(5, 'broken'), format).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(DeviceOpenError);
    expect(failure).toMatchObject({ deviceIndex: 5, mode: 'any' });
    expect(source.activeSession).toBeNull();
  });

  it('wraps unexpected backend errors as open failures', async () => {
    const backend: CaptureBackend = {
      listDevices: async () => [],
      start: vi.fn(async () => {
        throw new Error('spawn ENOENT');
      }),
    };
    const source = createSource(backend);

    await expect(source.open(makeDevice(0, 'speakers'), format)).rejects.toBeInstanceOf(DeviceOpenError);
  });

  it('keeps a single active session', async () => {
    const { backend } = createBackend({ 0: ['loopback'] });
    const source = createSource(backend);
    const device = makeDevice(0, 'speakers');

    const session = await source.open(device, format);
    expect(source.activeSession).toBe(session);
    await expect(source.open(device, format)).rejects.toThrow('a capture session is already active');

    await session.close();
    expect(source.activeSession).toBeNull();
    const reopened = await source.open(device, format);
    expect(reopened).not.toBe(session);
    await reopened.close();
  });
});

describe('CaptureSource.openFirst', () => {
  it('returns the first candidate that opens', async () => {
    const { backend, start } = createBackend({ 1: ['input'], 2: ['loopback'] });
    const source = createSource(backend);
    const candidates = [makeDevice(0, 'hdmi'), makeDevice(1, 'monitor', false), makeDevice(2, 'speakers')];

    const session = await source.openFirst(candidates, format);

    expect(session.device.index).toBe(1);
    expect(start.mock.calls.map((call) => [call[0].index, call[1]])).toEqual([
      [0, 'loopback'],
      [0, 'input'],
      [1, 'loopback'],
      [1, 'input'],
    ]);
    await session.close();
  });

  it('reports every failed candidate when none opens', async () => {
    const { backend } = createBackend({});
    const source = createSource(backend);

    const failure = await source
      .openFirst([makeDevice(0, 'a'), makeDevice(1, 'b')], format)
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(CaptureUnavailableError);
    if (!(failure instanceof CaptureUnavailableError)) return;
    expect(failure.attempts.map((attempt) => attempt.deviceIndex)).toEqual([0, 1]);
  });

  it('fails fast without candidates', async () => {
    const { backend, start } = createBackend({});
    const source = createSource(backend);

    await expect(source.openFirst([], format)).rejects.toThrow('no capture device candidates found');
    expect(start).not.toHaveBeenCalled();
  });
});
