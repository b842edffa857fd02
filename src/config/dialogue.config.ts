import { ConfigService } from '@nestjs/config';
import { isQualityTier, isSampleRate, QualityTier, SampleRate } from '../domain/types';

export const DIALOGUE_FILE_NAME = 'dialogue.mp3';
export const MAX_PAUSE_MS = 3000;
export const PAUSE_STEP_MS = 100;

export interface DialogueLimits {
  maxTurns: number;
  maxTurnChars: number;
}

export function getDialogueLimits(configService: ConfigService): DialogueLimits {
  return {
    maxTurns: readPositiveInt(configService, 'DIALOGUE_MAX_TURNS', 20),
    maxTurnChars: readPositiveInt(configService, 'DIALOGUE_MAX_TURN_CHARS', 3000),
  };
}

export function getDefaultQualityTier(configService: ConfigService): QualityTier {
  const raw = (configService.get<string>('DIALOGUE_DEFAULT_QUALITY') || '').trim().toLowerCase();
  return isQualityTier(raw) ? raw : 'generative';
}

export function getDefaultSampleRate(configService: ConfigService): SampleRate {
  const raw = (configService.get<string>('DIALOGUE_DEFAULT_SAMPLE_RATE') || '').trim();
  return isSampleRate(raw) ? raw : '22050';
}

export function getSessionTtlMs(configService: ConfigService): number {
  return readPositiveInt(configService, 'SESSION_TTL_MINUTES', 120) * 60 * 1000;
}

export function readPositiveInt(configService: ConfigService, key: string, fallback: number): number {
  const value = Number(configService.get<string>(key));
  if (!Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return Math.floor(value);
}
