import { BadGatewayException, UnprocessableEntityException } from '@nestjs/common';
import { SynthesisError } from '../domain/errors';
import { DialogueArtifact } from '../domain/types';
import { abortOnDisconnect, artifactOrThrow, sendArtifact } from './dialogue-response';
import { FakeDownloadResponse } from './download-response.fake';

const artifact: DialogueArtifact = {
  audio: Buffer.from([0xff, 0xf3, 0x60, 0xc0]),
  contentType: 'audio/mpeg',
  fileName: 'dialogue.mp3',
  segmentCount: 3,
  durationMs: 1250,
};

describe('artifactOrThrow', () => {
  it('returns the artifact of a finished run', () => {
    expect(artifactOrThrow({ status: 'ok', artifact, segments: [] })).toBe(artifact);
  });

  it('names the failing voice and turn in a 502', () => {
    const error = new SynthesisError('Matthew', new Error('Rate exceeded'), { transient: true });

    let thrown: unknown;
    try {
      artifactOrThrow({ status: 'failed', error, turnIndex: 1 });
    } catch (caught) {
      thrown = caught;
    }

    expect(thrown).toBeInstanceOf(BadGatewayException);
    if (!(thrown instanceof BadGatewayException)) {
      return;
    }
    expect(thrown.getStatus()).toBe(502);
    expect(thrown.getResponse()).toEqual({
      message: 'Polly error with voice "Matthew": Rate exceeded',
      voiceId: 'Matthew',
      turnIndex: 1,
      transient: true,
    });
  });

  it('turns an empty dialogue into a 422', () => {
    expect(() => artifactOrThrow({ status: 'empty' })).toThrow(
      new UnprocessableEntityException('No dialogue to synthesise.'),
    );
    expect(() => artifactOrThrow({ status: 'empty' })).toThrow(UnprocessableEntityException);
  });
});

describe('sendArtifact', () => {
  it('sends the MP3 as a dialogue.mp3 download', () => {
    const res = new FakeDownloadResponse();

    sendArtifact(res, artifact);

    expect(res.statusCode).toBe(200);
    expect(res.headers).toEqual({
      'Content-Type': 'audio/mpeg',
      'Content-Disposition': 'attachment; filename="dialogue.mp3"',
      'Content-Length': '4',
      'X-Dialogue-Segments': '3',
      'X-Dialogue-Duration-Ms': '1250',
    });
    expect(res.body).toBe(artifact.audio);
  });

  it('leaves out the duration when it is unknown', () => {
    const res = new FakeDownloadResponse();

    sendArtifact(res, { ...artifact, durationMs: undefined });

    expect(res.headers).not.toHaveProperty('X-Dialogue-Duration-Ms');
  });
});

describe('abortOnDisconnect', () => {
  it('aborts when the client leaves before the download is sent', () => {
    const res = new FakeDownloadResponse();
    const signal = abortOnDisconnect(res);

    res.close();

    expect(signal.aborted).toBe(true);
  });

  it('does not abort once the download is sent', () => {
    const res = new FakeDownloadResponse();
    const signal = abortOnDisconnect(res);

    sendArtifact(res, artifact);
    res.close();

    expect(signal.aborted).toBe(false);
  });
});
