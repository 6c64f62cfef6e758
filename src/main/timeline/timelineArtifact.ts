import fs from 'fs/promises';
import path from 'path';
import type {
  CaptionPlacement,
  FrameSize,
  OverlayPlacement,
  PlannerConfig,
  Rect,
  Sentiment,
} from '../../shared/timelineTypes';
import { TimelineArtifactError } from '../errors';
import {
  isRecord,
  readFiniteNumber,
  safeJsonParse,
} from '../utils/safeJsonParse';
import { isSentiment } from './sentiment';

export const TIMELINE_ARTIFACT_VERSION = 1;

export interface ArtifactPlacement extends Rect {
  faceAvoided: boolean;
  usedFallback: boolean;
}

export interface ArtifactImageEntry {
  time: number;
  duration: number;
  prompt: string;
  text: string;
  importance: number;
  /** Null when generation failed; the renderer keeps the original frames. */
  imagePath: string | null;
  placement: ArtifactPlacement;
}

export interface ArtifactCaptionEntry {
  id: string;
  start: number;
  end: number;
  text: string;
  sentiment: Sentiment;
  placement: ArtifactPlacement;
}

export interface TimelineArtifact {
  version: typeof TIMELINE_ARTIFACT_VERSION;
  source: string;
  generatedAt: string;
  videoDuration: number;
  frame: FrameSize;
  config: PlannerConfig;
  images: ArtifactImageEntry[];
  captions: ArtifactCaptionEntry[];
}

export interface PlacedImage {
  placement: OverlayPlacement;
  imagePath: string | null;
}

export interface BuildTimelineArtifactInput {
  source: string;
  generatedAt: Date;
  videoDuration: number;
  frame: FrameSize;
  config: PlannerConfig;
  images: PlacedImage[];
  captions: CaptionPlacement[];
}

function toArtifactPlacement(
  placement: Pick<OverlayPlacement, 'position' | 'faceAvoided' | 'usedFallback'>,
): ArtifactPlacement {
  return {
    ...placement.position,
    faceAvoided: placement.faceAvoided,
    usedFallback: placement.usedFallback,
  };
}

export function buildTimelineArtifact(
  input: BuildTimelineArtifactInput,
): TimelineArtifact {
  const images = input.images
    .map(({ placement, imagePath }) => ({
      time: placement.event.time,
      duration: placement.event.duration,
      prompt: placement.event.prompt,
      text: placement.text,
      importance: placement.event.segment.importance,
      imagePath,
      placement: toArtifactPlacement(placement),
    }))
    .sort((a, b) => a.time - b.time);

  const captions = input.captions
    .map((caption) => ({
      id: caption.cue.id,
      start: caption.cue.start,
      end: caption.cue.end,
      text: caption.text,
      sentiment: caption.cue.sentiment,
      placement: toArtifactPlacement(caption),
    }))
    .sort((a, b) => a.start - b.start);

  return {
    version: TIMELINE_ARTIFACT_VERSION,
    source: input.source,
    generatedAt: input.generatedAt.toISOString(),
    videoDuration: input.videoDuration,
    frame: { ...input.frame },
    config: { ...input.config },
    images,
    captions,
  };
}

export function serializeTimelineArtifact(artifact: TimelineArtifact): string {
  return `${JSON.stringify(artifact, null, 2)}\n`;
}

function requireNumber(value: unknown, field: string): number {
  const parsed = readFiniteNumber(value);
  if (parsed === null) {
    throw new TimelineArtifactError(`${field} must be a finite number`);
  }
  return parsed;
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new TimelineArtifactError(`${field} must be a string`);
  }
  return value;
}

function requireRecord(value: unknown, field: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new TimelineArtifactError(`${field} must be an object`);
  }
  return value;
}

function requireArray(value: unknown, field: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new TimelineArtifactError(`${field} must be an array`);
  }
  return value;
}

function parsePlacement(value: unknown, field: string): ArtifactPlacement {
  const record = requireRecord(value, field);
  return {
    x: requireNumber(record.x, `${field}.x`),
    y: requireNumber(record.y, `${field}.y`),
    width: requireNumber(record.width, `${field}.width`),
    height: requireNumber(record.height, `${field}.height`),
    faceAvoided: record.faceAvoided === true,
    usedFallback: record.usedFallback === true,
  };
}

function parseImageEntry(value: unknown, field: string): ArtifactImageEntry {
  const record = requireRecord(value, field);
  const imagePath = record.imagePath;
  if (imagePath !== null && typeof imagePath !== 'string') {
    throw new TimelineArtifactError(`${field}.imagePath must be a string or null`);
  }
  return {
    time: requireNumber(record.time, `${field}.time`),
    duration: requireNumber(record.duration, `${field}.duration`),
    prompt: requireString(record.prompt, `${field}.prompt`),
    text: requireString(record.text, `${field}.text`),
    importance: requireNumber(record.importance, `${field}.importance`),
    imagePath,
    placement: parsePlacement(record.placement, `${field}.placement`),
  };
}

function parseCaptionEntry(value: unknown, field: string): ArtifactCaptionEntry {
  const record = requireRecord(value, field);
  if (!isSentiment(record.sentiment)) {
    throw new TimelineArtifactError(`${field}.sentiment is not a known sentiment`);
  }
  return {
    id: requireString(record.id, `${field}.id`),
    start: requireNumber(record.start, `${field}.start`),
    end: requireNumber(record.end, `${field}.end`),
    text: requireString(record.text, `${field}.text`),
    sentiment: record.sentiment,
    placement: parsePlacement(record.placement, `${field}.placement`),
  };
}

export function parseTimelineArtifact(raw: unknown): TimelineArtifact {
  const record = requireRecord(raw, 'timeline');
  if (record.version !== TIMELINE_ARTIFACT_VERSION) {
    throw new TimelineArtifactError(
      `Unsupported timeline version ${String(record.version)}`,
    );
  }

  const frame = requireRecord(record.frame, 'frame');
  const config = requireRecord(record.config, 'config');
  const images = requireArray(record.images, 'images').map((entry, index) =>
    parseImageEntry(entry, `images[${index}]`),
  );
  images.forEach((entry, index) => {
    const previous = images[index - 1];
    if (previous && entry.time <= previous.time) {
      throw new TimelineArtifactError(
        `images[${index}].time must be later than images[${index - 1}].time`,
      );
    }
  });

  return {
    version: TIMELINE_ARTIFACT_VERSION,
    source: requireString(record.source, 'source'),
    generatedAt: requireString(record.generatedAt, 'generatedAt'),
    videoDuration: requireNumber(record.videoDuration, 'videoDuration'),
    frame: {
      width: requireNumber(frame.width, 'frame.width'),
      height: requireNumber(frame.height, 'frame.height'),
    },
    config: {
      minImportanceScore: requireNumber(
        config.minImportanceScore,
        'config.minImportanceScore',
      ),
      maxImagesPerWindow: requireNumber(
        config.maxImagesPerWindow,
        'config.maxImagesPerWindow',
      ),
      windowSeconds: requireNumber(config.windowSeconds, 'config.windowSeconds'),
      imageDurationSeconds: requireNumber(
        config.imageDurationSeconds,
        'config.imageDurationSeconds',
      ),
    },
    images,
    captions: requireArray(record.captions, 'captions').map((entry, index) =>
      parseCaptionEntry(entry, `captions[${index}]`),
    ),
  };
}

export async function writeTimelineArtifact(
  filePath: string,
  artifact: TimelineArtifact,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, serializeTimelineArtifact(artifact), 'utf-8');
}

export async function readTimelineArtifact(
  filePath: string,
): Promise<TimelineArtifact> {
  const content = await fs.readFile(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = safeJsonParse(content);
  } catch (error) {
    throw new TimelineArtifactError(
      `${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parseTimelineArtifact(raw);
}
