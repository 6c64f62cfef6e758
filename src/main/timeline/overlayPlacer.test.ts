import { describe, expect, it } from '@jest/globals';
import type {
  CaptionCue,
  FaceRegion,
  ImageEvent,
  Rect,
} from '../../shared/timelineTypes';
import {
  DEFAULT_CAPTION_ANCHORS,
  buildCandidatePositions,
  placeCaption,
  placeOverlay,
  rectsIntersect,
  selectFaceRegions,
} from './overlayPlacer';

const FRAME_WIDTH = 1080;
const FRAME_HEIGHT = 1920;

const event: ImageEvent = {
  time: 42,
  duration: 1,
  prompt: 'a crowded train platform',
  segment: {
    start: 42,
    end: 45,
    text: 'We waited for hours at the station',
    importance: 9,
  },
};

function face(boundingBox: Rect, frameTime = 42): FaceRegion {
  return { boundingBox, frameTime };
}

const candidates = buildCandidatePositions(
  FRAME_WIDTH,
  FRAME_HEIGHT,
  DEFAULT_CAPTION_ANCHORS,
);
const bottomCenter: Rect = { x: 81, y: 1589, width: 918, height: 288 };

describe('overlayPlacer', () => {
  it('builds anchor rectangles inside a portrait frame', () => {
    expect(candidates).toEqual([
      bottomCenter,
      { x: 43, y: 43, width: 432, height: 288 },
      { x: 605, y: 43, width: 432, height: 288 },
      { x: 43, y: 1589, width: 432, height: 288 },
      { x: 605, y: 1589, width: 432, height: 288 },
    ]);
    expect(buildCandidatePositions(FRAME_WIDTH, FRAME_HEIGHT, ['center'])).toEqual([
      { x: 81, y: 816, width: 918, height: 288 },
    ]);
  });

  it('takes the first candidate when no faces are known', () => {
    const placement = placeOverlay(
      event,
      [],
      'Hours at the station',
      FRAME_WIDTH,
      FRAME_HEIGHT,
      candidates,
      bottomCenter,
    );

    expect(placement.position).toEqual(bottomCenter);
    expect(placement.faceAvoided).toBe(true);
    expect(placement.usedFallback).toBe(false);
    expect(placement.text).toBe('Hours at the station');
    expect(placement.event).toBe(event);
  });

  it('skips candidates that intersect a face', () => {
    const placement = placeOverlay(
      event,
      [face({ x: 400, y: 1500, width: 300, height: 300 })],
      'text',
      FRAME_WIDTH,
      FRAME_HEIGHT,
      candidates,
      bottomCenter,
    );

    expect(placement.position).toEqual({ x: 43, y: 43, width: 432, height: 288 });
    expect(placement.faceAvoided).toBe(true);
  });

  it('falls back and flags the overlap when a face covers every candidate', () => {
    const placement = placeOverlay(
      event,
      [face({ x: 0, y: 0, width: FRAME_WIDTH, height: FRAME_HEIGHT })],
      'text',
      FRAME_WIDTH,
      FRAME_HEIGHT,
      candidates,
      bottomCenter,
    );

    expect(placement.position).toEqual(bottomCenter);
    expect(placement.faceAvoided).toBe(false);
    expect(placement.usedFallback).toBe(true);
  });

  it('treats shared edges as non-intersecting', () => {
    const topLeft = { x: 43, y: 43, width: 432, height: 288 };
    expect(rectsIntersect(topLeft, { x: 0, y: 0, width: 43, height: 43 })).toBe(false);
    expect(rectsIntersect(topLeft, { x: 0, y: 0, width: 44, height: 44 })).toBe(true);
  });

  it('skips candidates outside the frame and clamps the fallback', () => {
    const inside = { x: 0, y: 0, width: 100, height: 100 };
    const placement = placeOverlay(
      event,
      [],
      'text',
      FRAME_WIDTH,
      FRAME_HEIGHT,
      [{ x: 1000, y: 0, width: 200, height: 100 }, inside],
      bottomCenter,
    );
    expect(placement.position).toEqual(inside);

    const clamped = placeOverlay(
      event,
      [],
      'text',
      FRAME_WIDTH,
      FRAME_HEIGHT,
      [],
      { x: -50, y: 1900, width: 200, height: 100 },
    );
    expect(clamped.position).toEqual({ x: 0, y: 1820, width: 200, height: 100 });
    expect(clamped.faceAvoided).toBe(true);
    expect(clamped.usedFallback).toBe(true);
  });

  it('places captions with the same policy', () => {
    const cue: CaptionCue = {
      id: 'caption-1',
      start: 10,
      end: 14,
      text: 'Lost & Confused',
      sentiment: 'sad',
    };

    const placement = placeCaption(
      cue,
      [face({ x: 100, y: 1600, width: 200, height: 200 }, 12)],
      FRAME_WIDTH,
      FRAME_HEIGHT,
      candidates,
      bottomCenter,
    );

    expect(placement.position).toEqual({ x: 43, y: 43, width: 432, height: 288 });
    expect(placement.text).toBe('Lost & Confused');
    expect(placement.cue).toBe(cue);
  });

  it('selects face regions sampled near an interval', () => {
    const regions = [0, 5, 10, 15].map((frameTime) =>
      face({ x: 0, y: 0, width: 10, height: 10 }, frameTime),
    );

    const selected = selectFaceRegions(regions, 9, 10, 5);

    expect(selected.map((region) => region.frameTime)).toEqual([5, 10, 15]);
  });
});
