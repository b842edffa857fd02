import type { SynthesisError } from './errors';

export const QUALITY_TIERS = ['generative', 'neural'] as const;
export type QualityTier = (typeof QUALITY_TIERS)[number];

export const SAMPLE_RATES = ['22050', '48000'] as const;
export type SampleRate = (typeof SAMPLE_RATES)[number];

export function isQualityTier(value: unknown): value is QualityTier {
  return typeof value === 'string' && (QUALITY_TIERS as readonly string[]).includes(value);
}

export function isSampleRate(value: unknown): value is SampleRate {
  return typeof value === 'string' && (SAMPLE_RATES as readonly string[]).includes(value);
}

export interface Voice {
  id: string;
  name: string;
  languageCode: string;
  languageName?: string;
  gender?: string;
  supportedTiers: QualityTier[];
}

export interface Turn {
  id: string;
  voiceId: string;
  rawText: string;
  pauseAfterMs: number;
}

/** What the assembler needs from a turn; session turns carry an id on top. */
export type TurnInput = Pick<Turn, 'voiceId' | 'rawText' | 'pauseAfterMs'>;

export interface DialogueSettings {
  languageCode: string;
  qualityTier: QualityTier;
  sampleRate: SampleRate;
}

export interface SpeechSegment {
  kind: 'speech';
  turnIndex: number;
  lineIndex: number;
  voiceId: string;
  text: string;
  audio: Buffer;
}

export interface SilenceSegment {
  kind: 'silence';
  turnIndex: number;
  durationMs: number;
}

export type AudioSegment = SpeechSegment | SilenceSegment;

export interface DialogueArtifact {
  audio: Buffer;
  contentType: 'audio/mpeg';
  fileName: string;
  segmentCount: number;
  durationMs?: number;
}

export type AssemblyOutcome =
  | { status: 'ok'; artifact: DialogueArtifact; segments: AudioSegment[] }
  | { status: 'empty' }
  | { status: 'failed'; error: SynthesisError; turnIndex: number };
