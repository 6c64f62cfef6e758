import log from 'electron-log/node';
import type {
  CaptionCue,
  CaptionPlacement,
  FaceRegion,
  ImageEvent,
  OverlayAnchor,
  OverlayPlacement,
  Rect,
} from '../../shared/timelineTypes';

export const DEFAULT_CAPTION_ANCHORS: OverlayAnchor[] = [
  'bottom-center',
  'top-left',
  'top-right',
  'bottom-left',
  'bottom-right',
];

const WIDE_BOX_RATIO = 0.85;
const CORNER_BOX_RATIO = 0.4;
const BOX_HEIGHT_RATIO = 0.15;
const MARGIN_RATIO = 0.04;

interface PositionChoice {
  position: Rect;
  faceAvoided: boolean;
  usedFallback: boolean;
}

/** Interiors overlap; rectangles that only share an edge do not intersect. */
export function rectsIntersect(a: Rect, b: Rect): boolean {
  return (
    a.x < b.x + b.width &&
    b.x < a.x + a.width &&
    a.y < b.y + b.height &&
    b.y < a.y + a.height
  );
}

function fitsInFrame(rect: Rect, frameWidth: number, frameHeight: number): boolean {
  return (
    rect.width > 0 &&
    rect.height > 0 &&
    rect.x >= 0 &&
    rect.y >= 0 &&
    rect.x + rect.width <= frameWidth &&
    rect.y + rect.height <= frameHeight
  );
}

export function clampToFrame(
  rect: Rect,
  frameWidth: number,
  frameHeight: number,
): Rect {
  const width = Math.max(0, Math.min(rect.width, frameWidth));
  const height = Math.max(0, Math.min(rect.height, frameHeight));
  return {
    x: Math.min(Math.max(0, rect.x), Math.max(0, frameWidth - width)),
    y: Math.min(Math.max(0, rect.y), Math.max(0, frameHeight - height)),
    width,
    height,
  };
}

function hitsAnyFace(rect: Rect, faceRegions: readonly FaceRegion[]): boolean {
  return faceRegions.some((face) => rectsIntersect(rect, face.boundingBox));
}

function choosePosition(
  faceRegions: readonly FaceRegion[],
  frameWidth: number,
  frameHeight: number,
  candidatePositions: readonly Rect[],
  fallbackPosition: Rect,
): PositionChoice {
  const candidate = candidatePositions.find(
    (rect) =>
      fitsInFrame(rect, frameWidth, frameHeight) &&
      !hitsAnyFace(rect, faceRegions),
  );
  if (candidate) {
    return { position: candidate, faceAvoided: true, usedFallback: false };
  }

  const fallback = clampToFrame(fallbackPosition, frameWidth, frameHeight);
  return {
    position: fallback,
    faceAvoided: !hitsAnyFace(fallback, faceRegions),
    usedFallback: true,
  };
}

/**
 * Position the text shown with an image event: the first candidate, in
 * priority order, that lies inside the frame and clears every face box.
 * Falls back to `fallbackPosition` (clamped into the frame) otherwise.
 */
export function placeOverlay(
  event: ImageEvent,
  faceRegions: readonly FaceRegion[],
  text: string,
  frameWidth: number,
  frameHeight: number,
  candidatePositions: readonly Rect[],
  fallbackPosition: Rect,
): OverlayPlacement {
  const choice = choosePosition(
    faceRegions,
    frameWidth,
    frameHeight,
    candidatePositions,
    fallbackPosition,
  );
  if (!choice.faceAvoided) {
    log.warn(
      `[OverlayPlacer] Image text at ${event.time.toFixed(2)}s overlaps a face; no face-free position among ${candidatePositions.length} candidates`,
    );
  }
  return { text, event, ...choice };
}

export function placeCaption(
  cue: CaptionCue,
  faceRegions: readonly FaceRegion[],
  frameWidth: number,
  frameHeight: number,
  candidatePositions: readonly Rect[],
  fallbackPosition: Rect,
): CaptionPlacement {
  const choice = choosePosition(
    faceRegions,
    frameWidth,
    frameHeight,
    candidatePositions,
    fallbackPosition,
  );
  if (!choice.faceAvoided) {
    log.warn(
      `[OverlayPlacer] Caption ${cue.id} (${cue.start.toFixed(2)}s) overlaps a face`,
    );
  }
  return { text: cue.text, cue, ...choice };
}

export function anchorRect(
  anchor: OverlayAnchor,
  frameWidth: number,
  frameHeight: number,
): Rect {
  const margin = Math.round(Math.min(frameWidth, frameHeight) * MARGIN_RATIO);
  const height = Math.round(frameHeight * BOX_HEIGHT_RATIO);
  const isWide =
    anchor === 'bottom-center' || anchor === 'top-center' || anchor === 'center';
  const width = Math.round(frameWidth * (isWide ? WIDE_BOX_RATIO : CORNER_BOX_RATIO));

  const left = margin;
  const right = frameWidth - margin - width;
  const centerX = Math.round((frameWidth - width) / 2);
  const top = margin;
  const bottom = frameHeight - margin - height;

  switch (anchor) {
    case 'bottom-center':
      return { x: centerX, y: bottom, width, height };
    case 'top-center':
      return { x: centerX, y: top, width, height };
    case 'center':
      return {
        x: centerX,
        y: Math.round((frameHeight - height) / 2),
        width,
        height,
      };
    case 'top-left':
      return { x: left, y: top, width, height };
    case 'top-right':
      return { x: right, y: top, width, height };
    case 'bottom-left':
      return { x: left, y: bottom, width, height };
    default:
      return { x: right, y: bottom, width, height };
  }
}

export function buildCandidatePositions(
  frameWidth: number,
  frameHeight: number,
  anchors: readonly OverlayAnchor[],
): Rect[] {
  return anchors.map((anchor) => anchorRect(anchor, frameWidth, frameHeight));
}

/** Face boxes sampled within `tolerance` seconds of `[from, to]`. */
export function selectFaceRegions(
  regions: readonly FaceRegion[],
  from: number,
  to: number,
  tolerance: number,
): FaceRegion[] {
  return regions.filter(
    (region) =>
      region.frameTime >= from - tolerance && region.frameTime <= to + tolerance,
  );
}
