import { SampleRate } from '../domain/types';
import { AudioStitcherService } from './audio-stitcher.service';

describe('AudioStitcherService durations', () => {
  const stitcher = new AudioStitcherService();

  it.each<[number, SampleRate]>([
    [500, '22050'],
    [500, '48000'],
    [300, '48000'],
    [1300, '22050'],
    [3000, '22050'],
  ])('a %i ms pause at %s Hz plays at least that long', async (pauseAfterMs, sampleRate) => {
    const result = await stitcher.stitch([{ kind: 'silence', turnIndex: 0, durationMs: pauseAfterMs }], sampleRate);

    expect(result.durationMs).toBeDefined();
    expect(result.durationMs).toBeGreaterThanOrEqual(pauseAfterMs);
  });
});
