import { describe, expect, it } from '@jest/globals';
import { safeFps, summarizeProbe } from './mediaProbe';

describe('mediaProbe', () => {
  it('safeFps reads ffprobe frame-rate fractions', () => {
    expect(safeFps('30/1')).toBe(30);
    expect(safeFps('25/0')).toBeUndefined();
    expect(safeFps('30')).toBeUndefined();
    expect(safeFps(undefined)).toBeUndefined();
  });

  it('summarizeProbe picks the video stream and format duration', () => {
    const info = summarizeProbe({
      streams: [
        { index: 0, codec_type: 'audio' },
        { index: 1, codec_type: 'video', width: 1080, height: 1920, r_frame_rate: '60/2' },
      ],
      format: { duration: 42.5 },
      chapters: [],
    });

    expect(info).toEqual({
      duration: 42.5,
      frame: { width: 1080, height: 1920 },
      fps: 30,
      hasAudio: true,
    });
  });

  it('summarizeProbe rejects inputs without video', () => {
    expect(() =>
      summarizeProbe({
        streams: [{ index: 0, codec_type: 'audio' }],
        format: { duration: 3 },
        chapters: [],
      }),
    ).toThrow('Input has no video stream');
  });
});
