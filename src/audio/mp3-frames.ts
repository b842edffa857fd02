/**
 * MPEG audio Layer III frame helpers.
 *
 * Speech segments are joined frame-wise, so silence has to be made of frames in the
 * same stream format. A Layer III frame whose side information is all zero carries no
 * Huffman data and decodes to digital silence.
 */

export type MpegVersion = 'mpeg1' | 'mpeg2' | 'mpeg2.5';

const VERSIONS: readonly MpegVersion[] = ['mpeg1', 'mpeg2', 'mpeg2.5'];

export interface Mp3StreamFormat {
  version: MpegVersion;
  sampleRate: number;
  channels: 1 | 2;
  bitrateKbps: number;
}

const SAMPLE_RATES: Record<MpegVersion, readonly number[]> = {
  mpeg1: [44100, 48000, 32000],
  mpeg2: [22050, 24000, 16000],
  'mpeg2.5': [11025, 12000, 8000],
};

const BITRATES_KBPS: Record<MpegVersion, readonly number[]> = {
  mpeg1: [0, 32, 40, 48, 56, 64, 80, 96, 112, 128, 160, 192, 224, 256, 320],
  mpeg2: [0, 8, 16, 24, 32, 40, 48, 56, 64, 80, 96, 112, 128, 144, 160],
  'mpeg2.5': [0, 8, 16, 24, 32, 40, 48, 56, 64, 80, 96, 112, 128, 144, 160],
};

const VERSION_BITS: Record<MpegVersion, number> = { mpeg1: 0b11, mpeg2: 0b10, 'mpeg2.5': 0b00 };

const SIDE_INFO_BYTES: Record<MpegVersion, Record<1 | 2, number>> = {
  mpeg1: { 1: 17, 2: 32 },
  mpeg2: { 1: 9, 2: 17 },
  'mpeg2.5': { 1: 9, 2: 17 },
};

export const DEFAULT_SILENCE_BITRATE_KBPS = 48;

export function versionForSampleRate(sampleRate: number): MpegVersion | undefined {
  return VERSIONS.find((version) => SAMPLE_RATES[version].includes(sampleRate));
}

/** Closest bitrate the version allows, never the free-format slot. */
export function nearestBitrateKbps(version: MpegVersion, kbps: number): number {
  const allowed = BITRATES_KBPS[version].slice(1);
  return allowed.reduce((best, candidate) => (Math.abs(candidate - kbps) < Math.abs(best - kbps) ? candidate : best));
}

export function formatForSampleRate(
  sampleRate: number,
  options?: { channels?: number; bitrateKbps?: number },
): Mp3StreamFormat {
  const version = versionForSampleRate(sampleRate);
  if (!version) {
    throw new Error(`${sampleRate} Hz is not an MPEG audio sample rate`);
  }
  const requested = options?.bitrateKbps && options.bitrateKbps > 0 ? options.bitrateKbps : DEFAULT_SILENCE_BITRATE_KBPS;
  return {
    version,
    sampleRate,
    channels: options?.channels === 2 ? 2 : 1,
    bitrateKbps: nearestBitrateKbps(version, requested),
  };
}

export function samplesPerFrame(format: Mp3StreamFormat): number {
  return format.version === 'mpeg1' ? 1152 : 576;
}

export function frameLength(format: Mp3StreamFormat): number {
  const coefficient = format.version === 'mpeg1' ? 144000 : 72000;
  return Math.floor((coefficient * format.bitrateKbps) / format.sampleRate);
}

export function encodeFrameHeader(format: Mp3StreamFormat): Buffer {
  const bitrateIndex = BITRATES_KBPS[format.version].indexOf(format.bitrateKbps);
  const sampleRateIndex = SAMPLE_RATES[format.version].indexOf(format.sampleRate);
  if (bitrateIndex <= 0 || sampleRateIndex < 0) {
    throw new Error(`Unsupported MP3 format ${format.version} ${format.sampleRate} Hz ${format.bitrateKbps} kbps`);
  }
  const channelMode = format.channels === 1 ? 0b11 : 0b00;
  return Buffer.from([
    0xff,
    0xe0 | (VERSION_BITS[format.version] << 3) | (0b01 << 1) | 0b1,
    (bitrateIndex << 4) | (sampleRateIndex << 2),
    channelMode << 6,
  ]);
}

export function readFrameHeader(buffer: Buffer, offset = 0): Mp3StreamFormat | undefined {
  if (buffer.length < offset + 4) {
    return undefined;
  }
  const [b0, b1, b2, b3] = [buffer[offset], buffer[offset + 1], buffer[offset + 2], buffer[offset + 3]];
  if (b0 !== 0xff || (b1 & 0xe0) !== 0xe0 || ((b1 >> 1) & 0b11) !== 0b01) {
    return undefined;
  }
  const versionBits = (b1 >> 3) & 0b11;
  const version = VERSIONS.find((v) => VERSION_BITS[v] === versionBits);
  if (!version) {
    return undefined;
  }
  const bitrateKbps = BITRATES_KBPS[version][b2 >> 4];
  const sampleRate = SAMPLE_RATES[version][(b2 >> 2) & 0b11];
  if (!bitrateKbps || !sampleRate) {
    return undefined;
  }
  return { version, sampleRate, bitrateKbps, channels: b3 >> 6 === 0b11 ? 1 : 2 };
}

export function silentFrameCount(durationMs: number, format: Mp3StreamFormat): number {
  if (durationMs <= 0) {
    return 0;
  }
  // Rounded up: a pause never plays shorter than requested.
  const frames = Math.ceil((durationMs * format.sampleRate) / (1000 * samplesPerFrame(format)));
  return Math.max(1, frames);
}

export function createSilence(durationMs: number, format: Mp3StreamFormat): Buffer {
  const length = frameLength(format);
  if (length < 4 + SIDE_INFO_BYTES[format.version][format.channels]) {
    throw new Error(`Frame of ${length} bytes cannot hold ${format.version} side information`);
  }
  const frame = Buffer.alloc(length);
  encodeFrameHeader(format).copy(frame, 0);
  const count = silentFrameCount(durationMs, format);
  return Buffer.concat(Array.from({ length: count }, () => frame));
}

/** Drops a leading ID3v2 tag and a trailing ID3v1 tag so segments join on frame boundaries. */
export function stripId3(buffer: Buffer): Buffer {
  let start = 0;
  if (buffer.length >= 10 && buffer.toString('latin1', 0, 3) === 'ID3') {
    const size = ((buffer[6] & 0x7f) << 21) | ((buffer[7] & 0x7f) << 14) | ((buffer[8] & 0x7f) << 7) | (buffer[9] & 0x7f);
    const hasFooter = (buffer[5] & 0x10) !== 0;
    start = Math.min(buffer.length, 10 + size + (hasFooter ? 10 : 0));
  }
  let end = buffer.length;
  if (end - start >= 128 && buffer.toString('latin1', end - 128, end - 125) === 'TAG') {
    end -= 128;
  }
  return start === 0 && end === buffer.length ? buffer : buffer.subarray(start, end);
}
