import { Injectable, Logger } from '@nestjs/common';
import { AudioSegment, SampleRate } from '../domain/types';
import { readAudioInfo } from './audio-metadata';
import { createSilence, formatForSampleRate, Mp3StreamFormat, readFrameHeader, stripId3 } from './mp3-frames';

export interface StitchedAudio {
  audio: Buffer;
  format: Mp3StreamFormat;
  durationMs?: number;
}

@Injectable()
export class AudioStitcherService {
  private readonly logger = new Logger(AudioStitcherService.name);

  /**
   * Joins segments in the order given. Speech is appended frame-wise as returned by the
   * provider; pauses become silent frames in the format of the first speech segment.
   */
  async stitch(segments: AudioSegment[], sampleRate: SampleRate): Promise<StitchedAudio> {
    if (!segments.length) {
      throw new Error('No segments to stitch');
    }
    const firstSpeech = segments.find((segment) => segment.kind === 'speech');
    const format = firstSpeech?.kind === 'speech'
      ? await this.detectAudioFormat(stripId3(firstSpeech.audio), sampleRate)
      : formatForSampleRate(Number(sampleRate));

    const silenceByDuration = new Map<number, Buffer>();
    const parts = segments.map((segment) => {
      if (segment.kind === 'speech') {
        return stripId3(segment.audio);
      }
      let silence = silenceByDuration.get(segment.durationMs);
      if (!silence) {
        silence = createSilence(segment.durationMs, format);
        silenceByDuration.set(segment.durationMs, silence);
      }
      return silence;
    });

    const audio = Buffer.concat(parts);
    const durationMs = await this.measureDurationMs(audio);
    return { audio, format, durationMs };
  }

  async detectAudioFormat(buffer: Buffer, requested: SampleRate): Promise<Mp3StreamFormat> {
    const fallback = readFrameHeader(buffer) ?? formatForSampleRate(Number(requested));
    let detected = fallback;
    try {
      const info = await readAudioInfo(buffer);
      if (info.sampleRate) {
        detected = formatForSampleRate(info.sampleRate, {
          channels: info.channels ?? fallback.channels,
          bitrateKbps: info.bitrate ? info.bitrate / 1000 : fallback.bitrateKbps,
        });
      }
    } catch (error) {
      this.logger.warn(`Failed to read speech audio format: ${error instanceof Error ? error.message : error}`);
    }
    if (detected.sampleRate !== Number(requested)) {
      this.logger.warn(`Speech audio is ${detected.sampleRate} Hz but ${requested} Hz was requested`);
    }
    return detected;
  }

  private async measureDurationMs(buffer: Buffer): Promise<number | undefined> {
    try {
      const { durationSeconds: seconds } = await readAudioInfo(buffer, { duration: true });
      if (!seconds || !isFinite(seconds) || seconds <= 0) {
        return undefined;
      }
      return Math.round(seconds * 1000);
    } catch (error) {
      this.logger.warn(
        `Failed to read stitched audio duration: ${error instanceof Error ? error.message : error}`,
      );
      return undefined;
    }
  }
}
