import { describe, expect, it } from 'vitest';
import {
  buildDeviceTable,
  formatDeviceTable,
  looksLikeMixSource,
  parseFfmpegDeviceList,
  selectCaptureCandidates,
} from './devices.js';
import { CaptureUnavailableError } from '../errors.js';

const SINKS_OUTPUT = [
  'Auto-detected sinks for pulse:',
  '* alsa_output.pci-0000_00_1f.3.analog-stereo [Built-in Audio Analog Stereo] (none)',
  '  bluez_sink.AA_BB_CC [Headphones] (none)',
  '',
].join('\n');

const SOURCES_OUTPUT = [
  'Auto-detected sources for pulse:',
  '  alsa_output.pci-0000_00_1f.3.analog-stereo.monitor [Monitor of Built-in Audio Analog Stereo] (none)',
  '* alsa_input.pci-0000_00_1f.3.analog-stereo [Built-in Audio Analog Stereo] (none)',
].join('\n');

const table = () =>
  buildDeviceTable(parseFfmpegDeviceList(SINKS_OUTPUT), parseFfmpegDeviceList(SOURCES_OUTPUT), 2);

describe('parseFfmpegDeviceList', () => {
  it('reads names, descriptions and the default marker', () => {
    expect(parseFfmpegDeviceList(SINKS_OUTPUT)).toEqual([
      {
        name: 'alsa_output.pci-0000_00_1f.3.analog-stereo',
        description: 'Built-in Audio Analog Stereo',
        isDefault: true,
      },
      { name: 'bluez_sink.AA_BB_CC', description: 'Headphones', isDefault: false },
    ]);
  });

  it('ignores lines that are not device entries', () => {
    expect(parseFfmpegDeviceList('Cannot list sources: Not implemented\n')).toEqual([]);
  });
});

describe('buildDeviceTable', () => {
  it('indexes output devices before input devices', () => {
    const devices = table();

    expect(devices.map((device) => [device.index, device.maxOutputChannels, device.maxInputChannels])).toEqual([
      [0, 2, 0],
      [1, 2, 0],
      [2, 0, 2],
      [3, 0, 2],
    ]);
    expect(devices[2].name).toBe('alsa_output.pci-0000_00_1f.3.analog-stereo.monitor');
  });
});

describe('selectCaptureCandidates', () => {
  it('prefers output devices, then monitor-like sources', () => {
    const candidates = selectCaptureCandidates(table(), null);
    expect(candidates.map((device) => device.index)).toEqual([0, 1, 2]);
  });

  it('lists a device matching both rules once', () => {
    const devices = buildDeviceTable(
      [{ name: 'loopback_sink', description: 'Loopback', isDefault: false }],
      [{ name: 'stereo_mix', description: 'Stereo Mix', isDefault: false }],
      2
    );
    expect(selectCaptureCandidates(devices, null).map((device) => device.index)).toEqual([0, 1]);
  });

  it('uses only the operator-selected device when one is given', () => {
    const candidates = selectCaptureCandidates(table(), 3);
    expect(candidates).toHaveLength(1);
    expect(candidates[0].name).toBe('alsa_input.pci-0000_00_1f.3.analog-stereo');
  });

  it('rejects an operator-selected index that does not exist', () => {
    expect(() => selectCaptureCandidates(table(), 9)).toThrow(CaptureUnavailableError);
    expect(() => selectCaptureCandidates(table(), 9)).toThrow('capture device #9 does not exist (4 devices found)');
  });
});

describe('looksLikeMixSource', () => {
  it('matches on the description as well as the name', () => {
    const [device] = buildDeviceTable([], [{ name: 'hw_2', description: 'What U Hear', isDefault: false }], 2);
    expect(looksLikeMixSource(device)).toBe(true);
  });
});

describe('formatDeviceTable', () => {
  it('prints one aligned line per device', () => {
    const lines = formatDeviceTable(table()).split('\n');
    expect(lines[0]).toBe('  0: Built-in Audio Analog Stereo | Out:  2 | In:  0 (default)');
    expect(lines[2]).toBe('  2: Monitor of Built-in Audio Analog Stereo | Out:  0 | In:  2');
  });
});
