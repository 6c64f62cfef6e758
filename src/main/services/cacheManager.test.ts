import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { CacheManager, cacheKey } from './cacheManager';

const ALL_ON = { transcription: true, images: true, faceDetection: true };

describe('CacheManager', () => {
  let cacheDir = '';

  beforeEach(async () => {
    cacheDir = await fs.mkdtemp(path.join(os.tmpdir(), 'reel-cache-'));
  });

  afterEach(async () => {
    await fs.rm(cacheDir, { recursive: true, force: true });
  });

  it('keys entries by the MD5 of their identifier', () => {
    expect(cacheKey('hello')).toBe('5d41402abc4b2a76b9719d911017c592');
  });

  it('round-trips transcriptions and face regions', async () => {
    const cache = new CacheManager(cacheDir, ALL_ON);
    const transcription = {
      text: 'hello there',
      language: 'en' as const,
      segments: [{ id: 0, start: 0, end: 1.5, text: 'hello there' }],
    };
    const regions = [{ frameTime: 2, boundingBox: { x: 1, y: 2, width: 3, height: 4 } }];

    expect(await cache.loadTranscription('/videos/a.mp4')).toBeNull();
    await cache.saveTranscription('/videos/a.mp4', transcription);
    await cache.saveFaceRegions('/videos/a.mp4', regions);

    expect(await cache.loadTranscription('/videos/a.mp4')).toEqual(transcription);
    expect(await cache.loadFaceRegions('/videos/a.mp4')).toEqual(regions);
    expect(await cache.loadFaceRegions('/videos/b.mp4')).toBeNull();
  });

  it('stores generated images under the prompt key', async () => {
    const cache = new CacheManager(cacheDir, ALL_ON);
    const source = path.join(cacheDir, 'generated.png');
    await fs.writeFile(source, 'png-bytes');

    const cached = await cache.saveImage('a lighthouse', source);

    expect(cached).toBe(path.join(cacheDir, 'images', `${cacheKey('a lighthouse')}.png`));
    expect(await cache.loadImage('a lighthouse')).toBe(cached);
    expect(await cache.loadImage('a harbour')).toBeNull();
    expect(await cache.getCacheInfo()).toEqual({
      transcriptions: 0,
      images: 1,
      faceDetection: 0,
    });
  });

  it('skips sections that are turned off', async () => {
    const cache = new CacheManager(cacheDir, {
      transcription: false,
      images: false,
      faceDetection: false,
    });
    await cache.saveFaceRegions('/videos/a.mp4', []);

    expect(await cache.loadFaceRegions('/videos/a.mp4')).toBeNull();
    expect(await cache.getCacheInfo()).toEqual({
      transcriptions: 0,
      images: 0,
      faceDetection: 0,
    });
  });
});
