import type { OverlayAnchor, PlannerConfig } from './timelineTypes';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type ImageSize = '1024x1024' | '1792x1024' | '1024x1792';

export type ImageQuality = 'standard' | 'hd';

export interface CacheSettings {
  transcription: boolean;
  images: boolean;
  faceDetection: boolean;
}

export interface AppSettings {
  openaiApiKey: string;
  chatModel: string;
  translationModel: string;
  imageModel: string;
  imageSize: ImageSize;
  imageQuality: ImageQuality;
  planner: PlannerConfig;
  /** Neighbouring segments on each side handed to the scorer as context. */
  contextWindow: number;
  maxCaptionLength: number;
  phraseMaxDurationSeconds: number;
  faceDetectionIntervalSeconds: number;
  captionAnchors: OverlayAnchor[];
  captionFallbackAnchor: OverlayAnchor;
  imageTextAnchors: OverlayAnchor[];
  imageTextFallbackAnchor: OverlayAnchor;
  outputDir: string;
  cacheDir: string;
  tempDir: string;
  cache: CacheSettings;
  logLevel: LogLevel;
  ffmpegPath?: string;
  ffprobePath?: string;
}
