import { CaptureUnavailableError } from '../errors.js';
import type { CaptureDeviceInfo } from '../types.js';

export interface ListedDevice {
  name: string;
  description: string;
  isDefault: boolean;
}

const DEVICE_LINE = /^\s*(\*)?\s*(\S+)\s+\[(.*)\](?:\s+\([^)]*\))?\s*$/;

/**
 * Parses the output of `ffmpeg -sinks <fmt>` / `ffmpeg -sources <fmt>`:
 *
 *   Auto-detected sinks for pulse:
 *   * alsa_output.pci-0000_00_1f.3.analog-stereo [Built-in Audio Analog Stereo] (none)
 */
export function parseFfmpegDeviceList(output: string): ListedDevice[] {
  const devices: ListedDevice[] = [];
  for (const line of output.split(/\r?\n/)) {
    if (!line.trim() || /^auto-detected/i.test(line.trim())) continue;
    const match = DEVICE_LINE.exec(line);
    if (!match) continue;
    devices.push({ name: match[2], description: match[3].trim(), isDefault: match[1] === '*' });
  }
  return devices;
}

/**
 * Output devices come first and get the lowest indices. ffmpeg does not report
 * channel layouts, so `channels` stands in for the direction a device supports.
 */
export function buildDeviceTable(
  sinks: readonly ListedDevice[],
  sources: readonly ListedDevice[],
  channels: number
): CaptureDeviceInfo[] {
  const table: CaptureDeviceInfo[] = [];
  for (const sink of sinks) {
    table.push({ ...sink, index: table.length, maxInputChannels: 0, maxOutputChannels: channels });
  }
  for (const source of sources) {
    table.push({ ...source, index: table.length, maxInputChannels: channels, maxOutputChannels: 0 });
  }
  return table;
}

const MIX_SOURCE_HINTS = ['monitor', 'stereo mix', 'loopback', 'what u hear'];

export function looksLikeMixSource(device: CaptureDeviceInfo): boolean {
  const haystack = `${device.name} ${device.description}`.toLowerCase();
  return MIX_SOURCE_HINTS.some((hint) => haystack.includes(hint));
}

/**
 * Candidate order: the operator's explicit index alone, otherwise every
 * output-capable device followed by devices that look like a monitor/mix source.
 */
export function selectCaptureCandidates(
  devices: readonly CaptureDeviceInfo[],
  explicitIndex: number | null
): CaptureDeviceInfo[] {
  if (explicitIndex !== null) {
    const chosen = devices.find((device) => device.index === explicitIndex);
    if (!chosen) {
      throw new CaptureUnavailableError(
        `capture device #${explicitIndex} does not exist (${devices.length} devices found)`
      );
    }
    return [chosen];
  }

  const candidates: CaptureDeviceInfo[] = [];
  const seen = new Set<number>();
  const consider = (device: CaptureDeviceInfo) => {
    if (seen.has(device.index)) return;
    seen.add(device.index);
    candidates.push(device);
  };
  devices.filter((device) => device.maxOutputChannels > 0).forEach(consider);
  devices.filter(looksLikeMixSource).forEach(consider);
  return candidates;
}

export function formatDeviceTable(devices: readonly CaptureDeviceInfo[]): string {
  return devices
    .map(
      (device) =>
        `${String(device.index).padStart(3)}: ${device.description || device.name} | ` +
        `Out: ${String(device.maxOutputChannels).padStart(2)} | In: ${String(device.maxInputChannels).padStart(2)}` +
        (device.isDefault ? ' (default)' : '')
    )
    .join('\n');
}
