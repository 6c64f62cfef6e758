import { describe, expect, it } from '@jest/globals';
import type {
  ArtifactImageEntry,
  TimelineArtifact,
} from './timelineArtifact';
import { buildRenderTimeline, getTimelineStats } from './renderTimeline';
import { DEFAULT_PLANNER_CONFIG } from './timelinePlanner';

function createImage(
  time: number,
  imagePath: string | null,
  faceAvoided = true,
): ArtifactImageEntry {
  return {
    time,
    duration: 1,
    prompt: `prompt ${time}`,
    text: `text ${time}`,
    importance: 9,
    imagePath,
    placement: {
      x: 0,
      y: 0,
      width: 100,
      height: 50,
      faceAvoided,
      usedFallback: !faceAvoided,
    },
  };
}

function createArtifact(images: ArtifactImageEntry[]): TimelineArtifact {
  return {
    version: 1,
    source: 'clip.mp4',
    generatedAt: '2026-01-05T10:00:00.000Z',
    videoDuration: 20,
    frame: { width: 1280, height: 720 },
    config: DEFAULT_PLANNER_CONFIG,
    images,
    captions: [
      {
        id: 'caption-1',
        start: 0,
        end: 4,
        text: 'Thank You Ma\'am',
        sentiment: 'grateful',
        placement: {
          x: 0,
          y: 600,
          width: 1088,
          height: 108,
          faceAvoided: false,
          usedFallback: true,
        },
      },
    ],
  };
}

describe('renderTimeline', () => {
  it('alternates original video and image spans', () => {
    const artifact = createArtifact([
      createImage(3, '/img/a.png'),
      createImage(8, null),
      createImage(12, '/img/b.png'),
    ]);

    expect(buildRenderTimeline(artifact)).toEqual([
      { type: 'original_video', start: 0, end: 3 },
      { type: 'image', start: 3, end: 4, imagePath: '/img/a.png' },
      { type: 'original_video', start: 4, end: 12 },
      { type: 'image', start: 12, end: 13, imagePath: '/img/b.png' },
      { type: 'original_video', start: 13, end: 20 },
    ]);
  });

  it('starts with an image when one is placed at zero', () => {
    const artifact = createArtifact([createImage(0, '/img/a.png')]);

    expect(buildRenderTimeline(artifact)).toEqual([
      { type: 'image', start: 0, end: 1, imagePath: '/img/a.png' },
      { type: 'original_video', start: 1, end: 20 },
    ]);
  });

  it('counts rendered, failed and degraded entries', () => {
    const artifact = createArtifact([
      createImage(3, '/img/a.png'),
      createImage(8, null, false),
      createImage(12, '/img/b.png'),
    ]);

    expect(getTimelineStats(artifact)).toEqual({
      imageEvents: 3,
      renderedImages: 2,
      failedImages: 1,
      captions: 1,
      degradedPlacements: 2,
      imageSeconds: 2,
    });
  });
});
