import { Inject, Injectable, Logger } from '@nestjs/common';
import { PollyClient, ServiceFailureException, SynthesizeSpeechCommand } from '@aws-sdk/client-polly';
import { POLLY_CLIENT } from '../polly/polly.constants';
import { SynthesisError } from '../domain/errors';
import { VoiceCatalogService } from '../voices/voice-catalog.service';
import { SynthesisClient, SynthesisRequest, SynthesisResult } from './tts.interfaces';

const TRANSIENT_ERROR_NAMES = new Set(['ThrottlingException', 'TooManyRequestsException', 'RequestTimeout']);

export function isTransientPollyError(error: unknown): boolean {
  if (error instanceof ServiceFailureException) {
    return true;
  }
  if (!(error instanceof Error)) {
    return false;
  }
  if (TRANSIENT_ERROR_NAMES.has(error.name)) {
    return true;
  }
  return '$retryable' in error && Boolean(error.$retryable);
}

@Injectable()
export class PollySynthesisClient implements SynthesisClient {
  private readonly logger = new Logger(PollySynthesisClient.name);

  constructor(
    @Inject(POLLY_CLIENT) private readonly polly: PollyClient,
    private readonly voiceCatalog: VoiceCatalogService,
  ) {}

  async synthesize(request: SynthesisRequest): Promise<SynthesisResult> {
    const { text, voiceId, qualityTier, sampleRate } = request;
    try {
      const pollyVoiceId = await this.voiceCatalog.resolvePollyVoiceId(voiceId);
      if (!pollyVoiceId) {
        return { ok: false, error: new SynthesisError(voiceId, new Error(`Unknown Polly voice ${voiceId}`)) };
      }
      const response = await this.polly.send(
        new SynthesizeSpeechCommand({
          Text: text,
          TextType: 'text',
          VoiceId: pollyVoiceId,
          Engine: qualityTier,
          OutputFormat: 'mp3',
          SampleRate: sampleRate,
        }),
      );
      if (!response.AudioStream) {
        throw new Error('Polly returned no audio stream');
      }
      const bytes = await response.AudioStream.transformToByteArray();
      if (!bytes.byteLength) {
        throw new Error('Polly returned an empty audio stream');
      }
      return { ok: true, audio: Buffer.from(bytes) };
    } catch (error) {
      const transient = isTransientPollyError(error);
      this.logger.error(
        `SynthesizeSpeech failed for voice ${voiceId} (${qualityTier}, ${sampleRate} Hz${transient ? ', transient' : ''}): ${
          error instanceof Error ? error.message : error
        }`,
      );
      return { ok: false, error: new SynthesisError(voiceId, error, { transient }) };
    }
  }
}
