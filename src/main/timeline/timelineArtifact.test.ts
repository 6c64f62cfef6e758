import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import type {
  CaptionPlacement,
  ImageEvent,
  OverlayPlacement,
} from '../../shared/timelineTypes';
import { TimelineArtifactError } from '../errors';
import {
  buildTimelineArtifact,
  parseTimelineArtifact,
  readTimelineArtifact,
  writeTimelineArtifact,
  type TimelineArtifact,
} from './timelineArtifact';
import { DEFAULT_PLANNER_CONFIG } from './timelinePlanner';

function createPlacement(time: number, text: string): OverlayPlacement {
  const event: ImageEvent = {
    time,
    duration: 1,
    prompt: `prompt ${time}`,
    segment: { start: time, end: time + 3, text, importance: 9 },
  };
  return {
    text,
    event,
    position: { x: 10, y: 20, width: 300, height: 100 },
    faceAvoided: true,
    usedFallback: false,
  };
}

const caption: CaptionPlacement = {
  text: '14 Hours After Workshop!',
  cue: {
    id: 'caption-1',
    start: 2,
    end: 6.5,
    text: '14 Hours After Workshop!',
    sentiment: 'excited',
  },
  position: { x: 81, y: 1589, width: 918, height: 288 },
  faceAvoided: false,
  usedFallback: true,
};

function createArtifact(): TimelineArtifact {
  return buildTimelineArtifact({
    source: 'clip.mp4',
    generatedAt: new Date('2026-01-05T10:00:00.000Z'),
    videoDuration: 95.5,
    frame: { width: 1080, height: 1920 },
    config: DEFAULT_PLANNER_CONFIG,
    images: [
      { placement: createPlacement(30, 'later line'), imagePath: null },
      { placement: createPlacement(12, 'earlier line'), imagePath: '/cache/a.png' },
    ],
    captions: [caption],
  });
}

describe('timelineArtifact', () => {
  let tempDir = '';

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'timeline-artifact-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('lists one image entry per event in time order', () => {
    const artifact = createArtifact();

    expect(artifact.images.map((entry) => entry.time)).toEqual([12, 30]);
    expect(artifact.images[0]).toEqual({
      time: 12,
      duration: 1,
      prompt: 'prompt 12',
      text: 'earlier line',
      importance: 9,
      imagePath: '/cache/a.png',
      placement: {
        x: 10,
        y: 20,
        width: 300,
        height: 100,
        faceAvoided: true,
        usedFallback: false,
      },
    });
    expect(artifact.captions[0]?.placement.usedFallback).toBe(true);
    expect(artifact.generatedAt).toBe('2026-01-05T10:00:00.000Z');
  });

  it('reads back what it writes', async () => {
    const artifact = createArtifact();
    const filePath = path.join(tempDir, 'nested', 'clip_timeline.json');

    await writeTimelineArtifact(filePath, artifact);

    await expect(readTimelineArtifact(filePath)).resolves.toEqual(artifact);
  });

  it('rejects out-of-order images and unknown versions', () => {
    const artifact = createArtifact();
    const swapped = { ...artifact, images: [...artifact.images].reverse() };

    expect(() => parseTimelineArtifact(swapped)).toThrow(
      'images[1].time must be later than images[0].time',
    );
    expect(() => parseTimelineArtifact({ ...artifact, version: 2 })).toThrow(
      TimelineArtifactError,
    );
  });

  it('names the broken field', () => {
    const artifact = createArtifact();
    const broken = {
      ...artifact,
      captions: [{ ...artifact.captions[0], sentiment: 'confused' }],
    };

    expect(() => parseTimelineArtifact(broken)).toThrow(
      'captions[0].sentiment is not a known sentiment',
    );
  });

  it('reports unreadable JSON as an artifact error', async () => {
    const filePath = path.join(tempDir, 'bad.json');
    await fs.writeFile(filePath, 'not json', 'utf-8');

    await expect(readTimelineArtifact(filePath)).rejects.toThrow(
      TimelineArtifactError,
    );
  });
});
