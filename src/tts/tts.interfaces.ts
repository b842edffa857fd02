import { SynthesisError } from '../domain/errors';
import { QualityTier, SampleRate } from '../domain/types';

export interface SynthesisRequest {
  text: string;
  voiceId: string;
  qualityTier: QualityTier;
  sampleRate: SampleRate;
}

export type SynthesisResult = { ok: true; audio: Buffer } | { ok: false; error: SynthesisError };

export interface SynthesisClient {
  synthesize(request: SynthesisRequest): Promise<SynthesisResult>;
}
