import fs from 'fs';
import path from 'path';
import ffmpeg from 'fluent-ffmpeg';
import log from 'electron-log/node';
import type OpenAI from 'openai';
import type { Phrase, TranscriptSegment } from '../../shared/timelineTypes';
import { isRecord, readFiniteNumber, readString } from '../utils/safeJsonParse';

export interface TranslationResult {
  text: string;
  language: 'en';
  segments: TranscriptSegment[];
}

export interface SpeechTranslator {
  translate(audioPath: string): Promise<TranslationResult>;
}

export async function extractAudio(
  videoPath: string,
  tempDir: string,
): Promise<string> {
  await fs.promises.mkdir(tempDir, { recursive: true });
  const audioPath = path.join(
    tempDir,
    `${path.parse(videoPath).name}_audio.mp3`,
  );

  log.info(`[Audio] Extracting audio from ${path.basename(videoPath)}`);
  await new Promise<void>((resolve, reject) => {
    ffmpeg(videoPath)
      .noVideo()
      .audioCodec('libmp3lame')
      .outputOptions(['-q:a', '2'])
      .output(audioPath)
      .on('end', () => resolve())
      .on('error', (error) => reject(error))
      .run();
  });
  log.info(`[Audio] Audio extracted to ${audioPath}`);
  return audioPath;
}

/**
 * Read a Whisper `verbose_json` translation body. Segments without text,
 * with non-finite bounds or with `end <= start` are dropped; the rest keep
 * their order.
 */
export function parseVerboseTranslation(body: unknown): TranslationResult {
  if (typeof body === 'string') {
    return { text: body.trim(), language: 'en', segments: [] };
  }
  if (!isRecord(body)) {
    throw new Error('Translation response is not an object');
  }

  const rawSegments = Array.isArray(body.segments) ? body.segments : [];
  const segments: TranscriptSegment[] = [];
  rawSegments.forEach((raw: unknown, index) => {
    if (!isRecord(raw)) return;
    const start = readFiniteNumber(raw.start);
    const end = readFiniteNumber(raw.end);
    const text = readString(raw.text)?.trim();
    if (start === null || end === null || !text) return;
    if (end <= start) {
      log.debug(`[Audio] Dropping empty segment at ${start}s: "${text}"`);
      return;
    }
    segments.push({
      id: readFiniteNumber(raw.id) ?? index,
      start,
      end,
      text,
    });
  });

  return {
    text: readString(body.text)?.trim() ?? segments.map((s) => s.text).join(' '),
    language: 'en',
    segments,
  };
}

export function createWhisperTranslator(
  client: OpenAI,
  model: string,
): SpeechTranslator {
  return {
    async translate(audioPath) {
      log.info(`[Audio] Translating ${path.basename(audioPath)} to English`);
      const response: unknown = await client.audio.translations.create({
        file: fs.createReadStream(audioPath),
        model,
        response_format: 'verbose_json',
      });
      const result = parseVerboseTranslation(response);
      log.info(`[Audio] Translation complete: ${result.segments.length} segments`);
      return result;
    },
  };
}

/**
 * Merge consecutive segments into caption phrases. A segment that would
 * stretch the open phrase past `maxDuration` closes it at that segment's
 * start and opens the next phrase.
 */
export function groupPhrases(
  segments: TranscriptSegment[],
  maxDuration: number = 5,
): Phrase[] {
  const phrases: Phrase[] = [];
  let current: Phrase | null = null;

  for (const segment of segments) {
    if (current && segment.end - current.start > maxDuration) {
      phrases.push({ ...current, end: segment.start });
      current = null;
    }

    if (!current) {
      current = {
        text: segment.text,
        start: segment.start,
        end: segment.end,
        segmentIds: [segment.id],
      };
      continue;
    }

    current = {
      text: `${current.text} ${segment.text}`,
      start: current.start,
      end: segment.end,
      segmentIds: [...current.segmentIds, segment.id],
    };
  }

  if (current) phrases.push(current);
  log.info(`[Audio] Created ${phrases.length} phrases from ${segments.length} segments`);
  return phrases;
}
