import path from 'path';
import OpenAI from 'openai';
import type { AppSettings } from '../shared/settingsTypes';
import type { MediaTools, PipelineDependencies } from './pipeline';
import { createWhisperTranslator, extractAudio } from './services/audioService';
import { CacheManager } from './services/cacheManager';
import { ContentAnalyzer } from './services/contentAnalyzer';
import {
  FaceRegionFileSource,
  VisionFaceDetector,
  type FaceDetector,
} from './services/faceDetector';
import { OpenAiImageGenerator } from './services/imageGenerator';
import { getVideoInfo } from './services/mediaProbe';
import { createOpenAiJsonCompletion } from './services/openaiChat';
import { renderTimelineArtifact } from './services/videoAssembler';
import { requireApiKey } from './settingsManager';

export interface DependencyOptions {
  /** JSON file of face regions used instead of the vision detector. */
  facesFile?: string;
}

export function createMediaTools(): MediaTools {
  return {
    probe: getVideoInfo,
    extractAudio,
    render: renderTimelineArtifact,
  };
}

export function createPipelineDependencies(
  settings: AppSettings,
  options: DependencyOptions = {},
): PipelineDependencies {
  const client = new OpenAI({ apiKey: requireApiKey(settings) });
  const complete = createOpenAiJsonCompletion(client, settings.chatModel);

  const faceDetector: FaceDetector = options.facesFile
    ? new FaceRegionFileSource(options.facesFile)
    : new VisionFaceDetector(complete, {
        intervalSeconds: settings.faceDetectionIntervalSeconds,
        tempDir: settings.tempDir,
      });

  return {
    translator: createWhisperTranslator(client, settings.translationModel),
    analyzer: new ContentAnalyzer(complete, {
      contextWindow: settings.contextWindow,
      maxCaptionLength: settings.maxCaptionLength,
    }),
    faceDetector,
    imageGenerator: new OpenAiImageGenerator(client, {
      model: settings.imageModel,
      size: settings.imageSize,
      quality: settings.imageQuality,
      outputDir: path.join(settings.outputDir, 'images'),
    }),
    cache: new CacheManager(settings.cacheDir, settings.cache),
    media: createMediaTools(),
  };
}
