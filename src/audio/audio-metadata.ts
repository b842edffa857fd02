import { parseBuffer } from 'music-metadata';

export interface AudioInfo {
  sampleRate?: number;
  channels?: number;
  bitrate?: number;
  durationSeconds?: number;
}

export async function readAudioInfo(buffer: Buffer, options?: { duration?: boolean }): Promise<AudioInfo> {
  const { format } = await parseBuffer(buffer, 'audio/mpeg', { duration: options?.duration ?? false });
  return {
    sampleRate: format.sampleRate,
    channels: format.numberOfChannels,
    bitrate: format.bitrate,
    durationSeconds: format.duration,
  };
}
