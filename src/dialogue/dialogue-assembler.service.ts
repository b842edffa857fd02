import { Inject, Injectable, Logger } from '@nestjs/common';
import { AudioStitcherService } from '../audio/audio-stitcher.service';
import { DIALOGUE_FILE_NAME } from '../config/dialogue.config';
import { AssemblyCancelledError } from '../domain/errors';
import { AssemblyOutcome, AudioSegment, QualityTier, SampleRate, TurnInput } from '../domain/types';
import { SYNTHESIS_CLIENT } from '../tts/tts.constants';
import { SynthesisClient } from '../tts/tts.interfaces';
import { splitLines } from './line-splitter';

export interface AssemblyRequest {
  turns: readonly TurnInput[];
  qualityTier: QualityTier;
  sampleRate: SampleRate;
  signal?: AbortSignal;
}

type CollectedSegments =
  | { status: 'collected'; segments: AudioSegment[] }
  | Extract<AssemblyOutcome, { status: 'failed' }>;

@Injectable()
export class DialogueAssemblerService {
  private readonly logger = new Logger(DialogueAssemblerService.name);

  constructor(
    @Inject(SYNTHESIS_CLIENT) private readonly synthesisClient: SynthesisClient,
    private readonly stitcher: AudioStitcherService,
  ) {}

  /**
   * Synthesizes every non-blank line of every turn, in order, one request at a time, and
   * joins the clips with each turn's trailing pause. The first synthesis failure ends the
   * run; nothing is stitched in that case.
   */
  async assemble(request: AssemblyRequest): Promise<AssemblyOutcome> {
    const turns = request.turns.map((turn) => ({ ...turn }));
    this.logger.log(`Assembling dialogue: ${turns.length} turn(s), ${request.qualityTier}, ${request.sampleRate} Hz`);

    const collected = await this.collectSegments(turns, request);
    if (collected.status === 'failed') {
      this.logger.warn(`Dialogue aborted at turn ${collected.turnIndex + 1}: ${collected.error.message}`);
      return collected;
    }

    const { segments } = collected;
    if (!segments.length) {
      this.logger.log('No dialogue to synthesise');
      return { status: 'empty' };
    }

    const stitched = await this.stitcher.stitch(segments, request.sampleRate);
    this.logger.log(
      `Dialogue ready: ${segments.length} segment(s), ${stitched.audio.length} bytes` +
        (stitched.durationMs !== undefined ? `, ${stitched.durationMs} ms` : ''),
    );
    return {
      status: 'ok',
      segments,
      artifact: {
        audio: stitched.audio,
        contentType: 'audio/mpeg',
        fileName: DIALOGUE_FILE_NAME,
        segmentCount: segments.length,
        durationMs: stitched.durationMs,
      },
    };
  }

  private async collectSegments(turns: TurnInput[], request: AssemblyRequest): Promise<CollectedSegments> {
    const segments: AudioSegment[] = [];
    for (const [turnIndex, turn] of turns.entries()) {
      let lineIndex = 0;
      for (const text of splitLines(turn.rawText)) {
        if (request.signal?.aborted) {
          throw new AssemblyCancelledError();
        }
        const result = await this.synthesisClient.synthesize({
          text,
          voiceId: turn.voiceId,
          qualityTier: request.qualityTier,
          sampleRate: request.sampleRate,
        });
        if (!result.ok) {
          return { status: 'failed', error: result.error, turnIndex };
        }
        segments.push({ kind: 'speech', turnIndex, lineIndex, voiceId: turn.voiceId, text, audio: result.audio });
        lineIndex += 1;
      }
      if (turn.pauseAfterMs > 0) {
        segments.push({ kind: 'silence', turnIndex, durationMs: turn.pauseAfterMs });
      }
    }
    return { status: 'collected', segments };
  }
}
