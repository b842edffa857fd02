import { BadGatewayException, UnprocessableEntityException } from '@nestjs/common';
import { AssemblyOutcome, DialogueArtifact } from '../domain/types';

export const EMPTY_DIALOGUE_MESSAGE = 'No dialogue to synthesise.';

/** The part of the Express response a download writes to. */
export interface DownloadResponse {
  readonly writableEnded: boolean;
  setHeader(name: string, value: string): unknown;
  status(code: number): { end(chunk: Buffer): unknown };
  on(event: 'close', listener: () => void): unknown;
}

/** Narrows an outcome to its artifact, turning the other outcomes into HTTP errors. */
export function artifactOrThrow(outcome: AssemblyOutcome): DialogueArtifact {
  if (outcome.status === 'failed') {
    throw new BadGatewayException({
      message: outcome.error.message,
      voiceId: outcome.error.voiceId,
      turnIndex: outcome.turnIndex,
      transient: outcome.error.transient,
    });
  }
  if (outcome.status === 'empty') {
    throw new UnprocessableEntityException(EMPTY_DIALOGUE_MESSAGE);
  }
  return outcome.artifact;
}

export function sendArtifact(res: DownloadResponse, artifact: DialogueArtifact): void {
  res.setHeader('Content-Type', artifact.contentType);
  res.setHeader('Content-Disposition', `attachment; filename="${artifact.fileName}"`);
  res.setHeader('Content-Length', artifact.audio.length.toString());
  res.setHeader('X-Dialogue-Segments', artifact.segmentCount.toString());
  if (artifact.durationMs !== undefined) {
    res.setHeader('X-Dialogue-Duration-Ms', artifact.durationMs.toString());
  }
  res.status(200).end(artifact.audio);
}

/** Aborts when the client goes away before the response is written. */
export function abortOnDisconnect(res: DownloadResponse): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}
