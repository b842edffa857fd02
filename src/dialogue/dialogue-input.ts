import { BadRequestException } from '@nestjs/common';
import { MAX_PAUSE_MS, PAUSE_STEP_MS } from '../config/dialogue.config';
import { isQualityTier, isSampleRate, QualityTier, SampleRate, TurnInput } from '../domain/types';

export function parseQualityTier(value: unknown, fallback?: QualityTier): QualityTier {
  if (value === undefined && fallback) {
    return fallback;
  }
  const normalized = typeof value === 'string' ? value.trim().toLowerCase() : value;
  if (!isQualityTier(normalized)) {
    throw new BadRequestException('qualityTier must be either "generative" or "neural"');
  }
  return normalized;
}

export function parseSampleRate(value: unknown, fallback?: SampleRate): SampleRate {
  if (value === undefined && fallback) {
    return fallback;
  }
  const normalized = typeof value === 'number' ? String(value) : value;
  if (!isSampleRate(normalized)) {
    throw new BadRequestException('sampleRate must be either "22050" or "48000"');
  }
  return normalized;
}

export function parsePause(value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > MAX_PAUSE_MS) {
    throw new BadRequestException(`pauseAfterMs must be an integer between 0 and ${MAX_PAUSE_MS}`);
  }
  if (value % PAUSE_STEP_MS !== 0) {
    throw new BadRequestException(`pauseAfterMs must be a multiple of ${PAUSE_STEP_MS}`);
  }
  return value;
}

export function parseTurnInputs(value: unknown, maxTurns: number): TurnInput[] {
  if (!Array.isArray(value)) {
    throw new BadRequestException('turns must be an array');
  }
  if (value.length > maxTurns) {
    throw new BadRequestException(`A dialogue can have at most ${maxTurns} speakers`);
  }
  return value.map((entry: unknown, index) => {
    if (!entry || typeof entry !== 'object') {
      throw new BadRequestException(`turns[${index}] must be an object`);
    }
    const voiceId = 'voiceId' in entry ? entry.voiceId : undefined;
    const rawText = 'rawText' in entry ? entry.rawText : '';
    const pauseAfterMs = 'pauseAfterMs' in entry ? entry.pauseAfterMs : 0;
    if (typeof voiceId !== 'string' || !voiceId.trim()) {
      throw new BadRequestException(`turns[${index}].voiceId is required`);
    }
    if (typeof rawText !== 'string') {
      throw new BadRequestException(`turns[${index}].rawText must be a string`);
    }
    return { voiceId: voiceId.trim(), rawText, pauseAfterMs: parsePause(pauseAfterMs) };
  });
}
