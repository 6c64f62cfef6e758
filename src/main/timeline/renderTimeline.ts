import type { ArtifactImageEntry, TimelineArtifact } from './timelineArtifact';

export type RenderSpan =
  | { type: 'original_video'; start: number; end: number }
  | { type: 'image'; start: number; end: number; imagePath: string };

export interface TimelineStats {
  imageEvents: number;
  renderedImages: number;
  failedImages: number;
  captions: number;
  degradedPlacements: number;
  imageSeconds: number;
}

/**
 * Lay the image inserts over the source duration. Gaps become
 * `original_video` spans; events without a generated image keep the
 * original frames. Image spans are never shortened, so a span may run
 * into the next one when events sit closer than their duration.
 */
export function buildRenderTimeline(artifact: TimelineArtifact): RenderSpan[] {
  const spans: RenderSpan[] = [];
  let cursor = 0;

  const inserts = artifact.images
    .filter(
      (entry): entry is ArtifactImageEntry & { imagePath: string } =>
        entry.imagePath !== null,
    )
    .sort((a, b) => a.time - b.time);

  for (const entry of inserts) {
    if (entry.time > cursor) {
      spans.push({ type: 'original_video', start: cursor, end: entry.time });
    }
    const end = entry.time + entry.duration;
    spans.push({
      type: 'image',
      start: entry.time,
      end,
      imagePath: entry.imagePath,
    });
    cursor = Math.max(cursor, end);
  }

  if (cursor < artifact.videoDuration) {
    spans.push({
      type: 'original_video',
      start: cursor,
      end: artifact.videoDuration,
    });
  }

  return spans;
}

export function getTimelineStats(artifact: TimelineArtifact): TimelineStats {
  const rendered = artifact.images.filter((entry) => entry.imagePath !== null);
  const degraded =
    artifact.images.filter((entry) => !entry.placement.faceAvoided).length +
    artifact.captions.filter((entry) => !entry.placement.faceAvoided).length;

  return {
    imageEvents: artifact.images.length,
    renderedImages: rendered.length,
    failedImages: artifact.images.length - rendered.length,
    captions: artifact.captions.length,
    degradedPlacements: degraded,
    imageSeconds: rendered.reduce((total, entry) => total + entry.duration, 0),
  };
}
