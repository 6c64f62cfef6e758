import fs from 'fs/promises';
import path from 'path';
import ffmpeg from 'fluent-ffmpeg';
import log from 'electron-log/node';
import type { FaceRegion, FrameSize, Rect } from '../../shared/timelineTypes';
import { FACE_DETECTION_PROMPT } from '../prompts';
import {
  isRecord,
  readFiniteNumber,
  safeJsonParse,
} from '../utils/safeJsonParse';
import type { JsonCompletion } from './openaiChat';

export interface FaceDetector {
  detectFaces(videoPath: string, frame: FrameSize): Promise<FaceRegion[]>;
}

function readRect(value: unknown): Rect | null {
  if (!isRecord(value)) return null;
  const x = readFiniteNumber(value.x);
  const y = readFiniteNumber(value.y);
  const width = readFiniteNumber(value.width);
  const height = readFiniteNumber(value.height);
  if (x === null || y === null || width === null || height === null) return null;
  if (width <= 0 || height <= 0) return null;
  return { x, y, width, height };
}

/**
 * Read face regions from JSON: either an array or `{ "faces": [...] }`,
 * each entry `{ frameTime, boundingBox: { x, y, width, height } }` in
 * frame pixels. Entries are returned in frame-time order.
 */
export function parseFaceRegions(raw: unknown): FaceRegion[] {
  const entries = isRecord(raw) ? raw.faces : raw;
  if (!Array.isArray(entries)) {
    throw new Error('Face regions must be an array or an object with a "faces" array');
  }

  return entries
    .map((entry: unknown, index): FaceRegion => {
      const frameTime = isRecord(entry) ? readFiniteNumber(entry.frameTime) : null;
      const boundingBox = isRecord(entry) ? readRect(entry.boundingBox) : null;
      if (frameTime === null || frameTime < 0 || !boundingBox) {
        throw new Error(`Face region ${index} needs a frameTime and a positive boundingBox`);
      }
      return { frameTime, boundingBox };
    })
    .sort((a, b) => a.frameTime - b.frameTime);
}

export class FaceRegionFileSource implements FaceDetector {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async detectFaces(): Promise<FaceRegion[]> {
    const content = await fs.readFile(this.filePath, 'utf-8');
    const regions = parseFaceRegions(safeJsonParse(content));
    log.info(`[FaceDetector] Loaded ${regions.length} face regions from ${this.filePath}`);
    return regions;
  }
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/** Convert a vision reply of normalised boxes into pixel face regions. */
export function parseNormalizedFaces(
  content: string,
  frameTime: number,
  frame: FrameSize,
): FaceRegion[] {
  const parsed = safeJsonParse(content);
  const faces = isRecord(parsed) ? parsed.faces : parsed;
  if (!Array.isArray(faces)) return [];

  const regions: FaceRegion[] = [];
  faces.forEach((face: unknown) => {
    const box = readRect(face);
    if (!box) return;
    const left = clampUnit(box.x);
    const top = clampUnit(box.y);
    const right = clampUnit(box.x + box.width);
    const bottom = clampUnit(box.y + box.height);
    const x = Math.round(left * frame.width);
    const y = Math.round(top * frame.height);
    const width = Math.round(right * frame.width) - x;
    const height = Math.round(bottom * frame.height) - y;
    if (width <= 0 || height <= 0) return;
    regions.push({ frameTime, boundingBox: { x, y, width, height } });
  });
  return regions;
}

export interface VisionFaceDetectorOptions {
  intervalSeconds: number;
  tempDir: string;
}

/**
 * Samples one frame every `intervalSeconds` with ffmpeg and asks a vision
 * chat model for the face boxes in each. A frame whose request fails
 * contributes no regions.
 */
export class VisionFaceDetector implements FaceDetector {
  private readonly complete: JsonCompletion;

  private readonly options: VisionFaceDetectorOptions;

  constructor(complete: JsonCompletion, options: VisionFaceDetectorOptions) {
    this.complete = complete;
    this.options = options;
  }

  async detectFaces(videoPath: string, frame: FrameSize): Promise<FaceRegion[]> {
    const framesDir = path.join(
      this.options.tempDir,
      `faces_${path.parse(videoPath).name}`,
    );
    await fs.rm(framesDir, { recursive: true, force: true });
    await fs.mkdir(framesDir, { recursive: true });

    try {
      const framePaths = await this.sampleFrames(videoPath, framesDir);
      log.info(`[FaceDetector] Checking ${framePaths.length} sampled frames`);

      const regions: FaceRegion[] = [];
      for (let index = 0; index < framePaths.length; index += 1) {
        const frameTime = index * this.options.intervalSeconds;
        regions.push(...(await this.detectInFrame(framePaths[index], frameTime, frame)));
      }
      log.info(`[FaceDetector] Found ${regions.length} face regions`);
      return regions;
    } finally {
      await fs.rm(framesDir, { recursive: true, force: true });
    }
  }

  private async sampleFrames(videoPath: string, framesDir: string): Promise<string[]> {
    await new Promise<void>((resolve, reject) => {
      ffmpeg(videoPath)
        .outputOptions([
          '-vf',
          `fps=1/${this.options.intervalSeconds},scale=512:-2`,
          '-q:v',
          '4',
        ])
        .output(path.join(framesDir, 'frame_%05d.jpg'))
        .on('end', () => resolve())
        .on('error', (error) => reject(error))
        .run();
    });

    const files = await fs.readdir(framesDir);
    return files
      .filter((file) => file.endsWith('.jpg'))
      .sort()
      .map((file) => path.join(framesDir, file));
  }

  private async detectInFrame(
    framePath: string,
    frameTime: number,
    frame: FrameSize,
  ): Promise<FaceRegion[]> {
    try {
      const image = await fs.readFile(framePath);
      const reply = await this.complete([
        {
          role: 'user',
          content: [
            { type: 'text', text: FACE_DETECTION_PROMPT },
            {
              type: 'image_url',
              image_url: { url: `data:image/jpeg;base64,${image.toString('base64')}` },
            },
          ],
        },
      ]);
      return parseNormalizedFaces(reply, frameTime, frame);
    } catch (error) {
      log.warn(
        `[FaceDetector] Frame at ${frameTime}s skipped: ${error instanceof Error ? error.message : String(error)}`,
      );
      return [];
    }
  }
}
