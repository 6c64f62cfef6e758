import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import log from 'electron-log/node';
import type { CacheSettings } from '../../shared/settingsTypes';
import type { FaceRegion } from '../../shared/timelineTypes';
import { isRecord, safeJsonParse } from '../utils/safeJsonParse';
import { parseVerboseTranslation, type TranslationResult } from './audioService';
import { parseFaceRegions } from './faceDetector';

export type CacheSection = 'transcriptions' | 'images' | 'face_detection';

export interface CacheInfo {
  transcriptions: number;
  images: number;
  faceDetection: number;
}

const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.webp'];

export function cacheKey(identifier: string): string {
  return crypto.createHash('md5').update(identifier).digest('hex');
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

async function countFiles(dir: string, extensions: string[]): Promise<number> {
  try {
    const entries = await fs.readdir(dir);
    return entries.filter((entry) =>
      extensions.includes(path.extname(entry).toLowerCase()),
    ).length;
  } catch {
    return 0;
  }
}

/**
 * MD5-keyed on-disk cache for the expensive AI results: translations and
 * face regions as JSON envelopes, generated images as files.
 */
export class CacheManager {
  private readonly cacheDir: string;

  private readonly enabled: CacheSettings;

  constructor(cacheDir: string, enabled: CacheSettings) {
    this.cacheDir = cacheDir;
    this.enabled = enabled;
  }

  private sectionDir(section: CacheSection): string {
    return path.join(this.cacheDir, section);
  }

  private async readEnvelope(section: CacheSection, identifier: string): Promise<unknown> {
    const file = path.join(this.sectionDir(section), `${cacheKey(identifier)}.json`);
    if (!(await pathExists(file))) return null;
    const envelope = safeJsonParse(await fs.readFile(file, 'utf-8'));
    return isRecord(envelope) ? envelope.data : null;
  }

  private async writeEnvelope(
    section: CacheSection,
    identifier: string,
    data: unknown,
  ): Promise<void> {
    const dir = this.sectionDir(section);
    await fs.mkdir(dir, { recursive: true });
    const envelope = { identifier, timestamp: new Date().toISOString(), data };
    await fs.writeFile(
      path.join(dir, `${cacheKey(identifier)}.json`),
      `${JSON.stringify(envelope, null, 2)}\n`,
      'utf-8',
    );
  }

  async loadTranscription(videoPath: string): Promise<TranslationResult | null> {
    if (!this.enabled.transcription) return null;
    const data = await this.readEnvelope('transcriptions', videoPath);
    if (data === null || data === undefined) return null;
    log.info('[Cache] Using cached transcription');
    return parseVerboseTranslation(data);
  }

  async saveTranscription(videoPath: string, result: TranslationResult): Promise<void> {
    if (!this.enabled.transcription) return;
    await this.writeEnvelope('transcriptions', videoPath, result);
  }

  async loadFaceRegions(videoPath: string): Promise<FaceRegion[] | null> {
    if (!this.enabled.faceDetection) return null;
    const data = await this.readEnvelope('face_detection', videoPath);
    if (data === null || data === undefined) return null;
    log.info('[Cache] Using cached face regions');
    return parseFaceRegions(data);
  }

  async saveFaceRegions(videoPath: string, regions: FaceRegion[]): Promise<void> {
    if (!this.enabled.faceDetection) return;
    await this.writeEnvelope('face_detection', videoPath, regions);
  }

  async loadImage(prompt: string): Promise<string | null> {
    if (!this.enabled.images) return null;
    const key = cacheKey(prompt);
    for (const extension of IMAGE_EXTENSIONS) {
      const candidate = path.join(this.sectionDir('images'), `${key}${extension}`);
      if (await pathExists(candidate)) return candidate;
    }
    return null;
  }

  async saveImage(prompt: string, imagePath: string): Promise<string> {
    if (!this.enabled.images) return imagePath;
    const dir = this.sectionDir('images');
    await fs.mkdir(dir, { recursive: true });
    const key = cacheKey(prompt);
    const cachedPath = path.join(dir, `${key}${path.extname(imagePath) || '.png'}`);
    await fs.copyFile(imagePath, cachedPath);
    await fs.writeFile(
      path.join(dir, `${key}.json`),
      `${JSON.stringify({ prompt, timestamp: new Date().toISOString() }, null, 2)}\n`,
      'utf-8',
    );
    return cachedPath;
  }

  async getCacheInfo(): Promise<CacheInfo> {
    return {
      transcriptions: await countFiles(this.sectionDir('transcriptions'), ['.json']),
      images: await countFiles(this.sectionDir('images'), IMAGE_EXTENSIONS),
      faceDetection: await countFiles(this.sectionDir('face_detection'), ['.json']),
    };
  }
}
