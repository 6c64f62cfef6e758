import fs from 'fs/promises';
import path from 'path';
import log from 'electron-log/node';
import type { AppSettings } from '../shared/settingsTypes';
import type {
  CaptionPlacement,
  FaceRegion,
  FrameSize,
  Phrase,
  Segment,
  TranscriptSegment,
} from '../shared/timelineTypes';
import { formatDuration, logSection } from './logger';
import { groupPhrases, type SpeechTranslator } from './services/audioService';
import type { CacheManager } from './services/cacheManager';
import type { CaptionSummary } from './services/contentAnalyzer';
import type { FaceDetector } from './services/faceDetector';
import type { ImageGenerator } from './services/imageGenerator';
import type { VideoInfo } from './services/mediaProbe';
import type { RenderResult } from './services/videoAssembler';
import {
  anchorRect,
  buildCandidatePositions,
  placeCaption,
  placeOverlay,
  selectFaceRegions,
} from './timeline/overlayPlacer';
import { getTimelineStats, type TimelineStats } from './timeline/renderTimeline';
import {
  buildTimelineArtifact,
  readTimelineArtifact,
  writeTimelineArtifact,
  type PlacedImage,
  type TimelineArtifact,
} from './timeline/timelineArtifact';
import { planTimeline } from './timeline/timelinePlanner';

export interface SegmentScorer {
  scoreSegments(segments: TranscriptSegment[], contextWindow?: number): Promise<Segment[]>;
  summarizeCaption(phrase: Phrase, maxLength?: number): Promise<CaptionSummary>;
}

export interface MediaTools {
  probe(videoPath: string): Promise<VideoInfo>;
  extractAudio(videoPath: string, tempDir: string): Promise<string>;
  render(
    videoPath: string,
    artifact: TimelineArtifact,
    outputDir: string,
  ): Promise<RenderResult>;
}

export interface PipelineDependencies {
  translator: SpeechTranslator;
  analyzer: SegmentScorer;
  faceDetector: FaceDetector;
  imageGenerator: ImageGenerator;
  cache: CacheManager;
  media: MediaTools;
  now?: () => Date;
}

export interface PipelineResult {
  outputPath: string;
  timelinePath: string;
  reportPath: string;
  stats: TimelineStats;
}

export interface ReportInput {
  inputPath: string;
  outputPath: string;
  timelinePath: string;
  stats: TimelineStats;
  elapsedMs?: number;
}

export function buildReport(input: ReportInput): string {
  const lines = [
    'Video Processing Report',
    '='.repeat(60),
    '',
    `Input: ${path.basename(input.inputPath)}`,
    `Output: ${path.basename(input.outputPath)}`,
    `Timeline: ${path.basename(input.timelinePath)}`,
  ];
  if (input.elapsedMs !== undefined) {
    lines.push(`Elapsed: ${formatDuration(input.elapsedMs)}`);
  }
  lines.push('', 'Timeline Stats:');
  Object.entries(input.stats).forEach(([key, value]) => {
    lines.push(`- ${key}: ${value}`);
  });
  return `${lines.join('\n')}\n`;
}

function phraseFromSegment(segment: Segment): Phrase {
  return { text: segment.text, start: segment.start, end: segment.end, segmentIds: [] };
}

async function renderAndReport(
  settings: AppSettings,
  media: MediaTools,
  videoPath: string,
  artifact: TimelineArtifact,
  timelinePath: string,
  startedAt: number,
): Promise<PipelineResult> {
  const stats = getTimelineStats(artifact);
  log.info(`[Pipeline] Timeline stats: ${JSON.stringify(stats)}`);
  const { outputPath } = await media.render(videoPath, artifact, settings.outputDir);

  const reportPath = path.join(
    settings.outputDir,
    `${path.parse(videoPath).name}_report.txt`,
  );
  await fs.writeFile(
    reportPath,
    buildReport({
      inputPath: videoPath,
      outputPath,
      timelinePath,
      stats,
      elapsedMs: Date.now() - startedAt,
    }),
    'utf-8',
  );

  logSection('Processing Complete!');
  log.info(`[Pipeline] Output video: ${outputPath}`);
  return { outputPath, timelinePath, reportPath, stats };
}

/**
 * Render a saved timeline again. Images that no longer exist on disk
 * fall back to the original frames.
 */
export async function resumeAssembly(
  settings: AppSettings,
  media: MediaTools,
  videoPath: string,
  timelinePath: string,
): Promise<PipelineResult> {
  const startedAt = Date.now();
  logSection(`Resuming Assembly: ${path.basename(videoPath)}`);
  const loaded = await readTimelineArtifact(timelinePath);
  const images = await Promise.all(
    loaded.images.map(async (entry) => {
      if (entry.imagePath === null) return entry;
      try {
        await fs.access(entry.imagePath);
        return entry;
      } catch {
        log.warn(`[Pipeline] Image missing, keeping original frames: ${entry.imagePath}`);
        return { ...entry, imagePath: null };
      }
    }),
  );
  const artifact: TimelineArtifact = { ...loaded, images };
  log.info(
    `[Pipeline] Loaded ${artifact.images.length} image events and ${artifact.captions.length} captions`,
  );
  return renderAndReport(settings, media, videoPath, artifact, timelinePath, startedAt);
}

/**
 * Orchestrates one processing run. Each phase logs a section banner; AI
 * results go through the cache so a rerun only pays for what changed.
 */
export class VideoEditorPipeline {
  private readonly settings: AppSettings;

  private readonly deps: PipelineDependencies;

  constructor(settings: AppSettings, deps: PipelineDependencies) {
    this.settings = settings;
    this.deps = deps;
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  async process(videoPath: string): Promise<PipelineResult> {
    const startedAt = Date.now();
    const { settings, deps } = this;
    logSection(`Processing Video: ${path.basename(videoPath)}`);
    const info = await deps.media.probe(videoPath);
    log.info(
      `[Pipeline] ${info.frame.width}x${info.frame.height}, ${info.duration.toFixed(2)}s`,
    );

    logSection('Phase 1: Audio Extraction & Translation');
    const segments = await this.transcribe(videoPath);
    const phrases = groupPhrases(segments, settings.phraseMaxDurationSeconds);

    logSection('Phase 2: Content Analysis');
    const scored = await deps.analyzer.scoreSegments(segments, settings.contextWindow);

    logSection('Phase 3: Timeline Planning');
    const events = planTimeline(scored, settings.planner);
    log.info(`[Pipeline] Planned ${events.length} image events`);

    logSection('Phase 4: Face Detection');
    const faces = await this.detectFaces(videoPath, info.frame);

    logSection('Phase 5: Image Generation');
    const imagePaths: Array<string | null> = [];
    for (let index = 0; index < events.length; index += 1) {
      const event = events[index];
      imagePaths.push(
        await this.generateImage(event.prompt, `event_${index + 1}_${event.time}s`),
      );
    }
    log.info(
      `[Pipeline] ${imagePaths.filter((p) => p !== null).length}/${events.length} images available`,
    );

    logSection('Phase 6: Overlay Placement');
    const { frame } = info;
    const tolerance = settings.faceDetectionIntervalSeconds;
    const imageTextCandidates = buildCandidatePositions(
      frame.width,
      frame.height,
      settings.imageTextAnchors,
    );
    const imageTextFallback = anchorRect(
      settings.imageTextFallbackAnchor,
      frame.width,
      frame.height,
    );
    const images: PlacedImage[] = [];
    for (let index = 0; index < events.length; index += 1) {
      const event = events[index];
      const summary = await deps.analyzer.summarizeCaption(
        phraseFromSegment(event.segment),
        settings.maxCaptionLength,
      );
      images.push({
        imagePath: imagePaths[index],
        placement: placeOverlay(
          event,
          selectFaceRegions(faces, event.time, event.time + event.duration, tolerance),
          summary.text,
          frame.width,
          frame.height,
          imageTextCandidates,
          imageTextFallback,
        ),
      });
    }

    const captionCandidates = buildCandidatePositions(
      frame.width,
      frame.height,
      settings.captionAnchors,
    );
    const captionFallback = anchorRect(
      settings.captionFallbackAnchor,
      frame.width,
      frame.height,
    );
    const captions: CaptionPlacement[] = [];
    for (let index = 0; index < phrases.length; index += 1) {
      const phrase = phrases[index];
      const summary = await deps.analyzer.summarizeCaption(
        phrase,
        settings.maxCaptionLength,
      );
      captions.push(
        placeCaption(
          {
            id: `caption-${index + 1}`,
            start: phrase.start,
            end: phrase.end,
            text: summary.text,
            sentiment: summary.sentiment,
          },
          selectFaceRegions(faces, phrase.start, phrase.end, tolerance),
          frame.width,
          frame.height,
          captionCandidates,
          captionFallback,
        ),
      );
    }

    const artifact = buildTimelineArtifact({
      source: path.basename(videoPath),
      generatedAt: this.now(),
      videoDuration: info.duration,
      frame,
      config: settings.planner,
      images,
      captions,
    });
    const timelinePath = path.join(
      settings.outputDir,
      `${path.parse(videoPath).name}_timeline.json`,
    );
    await writeTimelineArtifact(timelinePath, artifact);
    log.info(`[Pipeline] Timeline written to ${timelinePath}`);

    logSection('Phase 7: Final Video Assembly');
    return renderAndReport(settings, deps.media, videoPath, artifact, timelinePath, startedAt);
  }

  /** Re-render from a saved timeline without calling any AI service. */
  async resume(videoPath: string, timelinePath: string): Promise<PipelineResult> {
    return resumeAssembly(this.settings, this.deps.media, videoPath, timelinePath);
  }

  private async transcribe(videoPath: string): Promise<TranscriptSegment[]> {
    const { cache, media, translator } = this.deps;
    const cached = await cache.loadTranscription(videoPath);
    if (cached) return cached.segments;

    const audioPath = await media.extractAudio(videoPath, this.settings.tempDir);
    try {
      const result = await translator.translate(audioPath);
      await cache.saveTranscription(videoPath, result);
      if (result.segments.length === 0) {
        log.warn('[Pipeline] No speech segments found');
      }
      return result.segments;
    } finally {
      await fs.rm(audioPath, { force: true });
    }
  }

  private async detectFaces(videoPath: string, frame: FrameSize): Promise<FaceRegion[]> {
    const { cache, faceDetector } = this.deps;
    const cached = await cache.loadFaceRegions(videoPath);
    if (cached) return cached;

    const regions = await faceDetector.detectFaces(videoPath, frame);
    await cache.saveFaceRegions(videoPath, regions);
    return regions;
  }

  private async generateImage(prompt: string, name: string): Promise<string | null> {
    const { cache, imageGenerator } = this.deps;
    const cached = await cache.loadImage(prompt);
    if (cached) {
      log.info(`[Pipeline] Using cached image for ${name}`);
      return cached;
    }

    const generated = await imageGenerator.generateImage(prompt, name);
    return generated ? cache.saveImage(prompt, generated) : null;
  }
}
