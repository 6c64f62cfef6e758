import path from 'path';
import type {
  AppSettings,
  ImageQuality,
  ImageSize,
  LogLevel,
} from '../shared/settingsTypes';
import type { OverlayAnchor } from '../shared/timelineTypes';
import { SettingsError } from './errors';
import { DEFAULT_CAPTION_ANCHORS } from './timeline/overlayPlacer';
import { DEFAULT_PLANNER_CONFIG } from './timeline/timelinePlanner';

export interface SettingsOverrides {
  openaiApiKey?: string;
  logLevel?: LogLevel;
  outputDir?: string;
  skipCache?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];
const IMAGE_SIZES: readonly ImageSize[] = ['1024x1024', '1792x1024', '1024x1792'];
const IMAGE_QUALITIES: readonly ImageQuality[] = ['standard', 'hd'];
const ANCHORS: readonly OverlayAnchor[] = [
  'bottom-center',
  'top-center',
  'center',
  'top-left',
  'top-right',
  'bottom-left',
  'bottom-right',
];

export const defaults: Omit<AppSettings, 'outputDir' | 'cacheDir' | 'tempDir'> = {
  openaiApiKey: '',
  chatModel: 'gpt-4o',
  translationModel: 'whisper-1',
  imageModel: 'dall-e-3',
  imageSize: '1024x1024',
  imageQuality: 'standard',
  planner: { ...DEFAULT_PLANNER_CONFIG },
  contextWindow: 2,
  maxCaptionLength: 60,
  phraseMaxDurationSeconds: 5,
  faceDetectionIntervalSeconds: 2,
  captionAnchors: [...DEFAULT_CAPTION_ANCHORS],
  captionFallbackAnchor: 'bottom-center',
  imageTextAnchors: ['top-center', 'top-left', 'top-right'],
  imageTextFallbackAnchor: 'top-center',
  cache: { transcription: true, images: true, faceDetection: true },
  logLevel: 'info',
};

type Env = Record<string, string | undefined>;

function readEnvString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readEnvNumber(env: Env, key: string, fallback: number): number {
  const raw = readEnvString(env, key);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new SettingsError(`${key} must be a number (got "${raw}")`);
  }
  return parsed;
}

function readEnvPositive(env: Env, key: string, fallback: number): number {
  const value = readEnvNumber(env, key, fallback);
  if (value <= 0) {
    throw new SettingsError(`${key} must be greater than 0 (got ${value})`);
  }
  return value;
}

function readEnvCount(env: Env, key: string, fallback: number): number {
  const value = readEnvNumber(env, key, fallback);
  if (!Number.isInteger(value) || value < 0) {
    throw new SettingsError(`${key} must be a whole number of 0 or more (got ${value})`);
  }
  return value;
}

function readEnvBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = readEnvString(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new SettingsError(`${key} must be true or false (got "${raw}")`);
}

function readEnvChoice<T extends string>(
  env: Env,
  key: string,
  choices: readonly T[],
  fallback: T,
): T {
  const raw = readEnvString(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new SettingsError(
      `${key} must be one of ${choices.join(', ')} (got "${raw}")`,
    );
  }
  return match;
}

function readEnvAnchors(
  env: Env,
  key: string,
  fallback: OverlayAnchor[],
): OverlayAnchor[] {
  const raw = readEnvString(env, key);
  if (raw === undefined) return fallback;
  return raw
    .split(',')
    .map((part) => part.trim().toLowerCase())
    .filter(Boolean)
    .map((part) => {
      const anchor = ANCHORS.find((choice) => choice === part);
      if (!anchor) {
        throw new SettingsError(
          `${key} contains unknown anchor "${part}" (expected ${ANCHORS.join(', ')})`,
        );
      }
      return anchor;
    });
}

/**
 * Resolve the settings for one run from defaults, the environment and
 * command-line overrides, in that order. Directories resolve against `cwd`.
 */
export function loadSettings(
  env: Env,
  overrides: SettingsOverrides = {},
  cwd: string = process.cwd(),
): AppSettings {
  const cacheEnabled =
    !overrides.skipCache && readEnvBoolean(env, 'CACHE_ENABLED', true);
  const outputDir = path.resolve(
    cwd,
    overrides.outputDir ?? readEnvString(env, 'OUTPUT_DIR') ?? 'output',
  );

  return {
    ...defaults,
    openaiApiKey:
      overrides.openaiApiKey ?? readEnvString(env, 'OPENAI_API_KEY') ?? '',
    chatModel: readEnvString(env, 'OPENAI_CHAT_MODEL') ?? defaults.chatModel,
    translationModel:
      readEnvString(env, 'OPENAI_TRANSLATION_MODEL') ?? defaults.translationModel,
    imageModel: readEnvString(env, 'OPENAI_IMAGE_MODEL') ?? defaults.imageModel,
    imageSize: readEnvChoice(env, 'IMAGE_SIZE', IMAGE_SIZES, defaults.imageSize),
    imageQuality: readEnvChoice(
      env,
      'IMAGE_QUALITY',
      IMAGE_QUALITIES,
      defaults.imageQuality,
    ),
    planner: {
      minImportanceScore: readEnvNumber(
        env,
        'MIN_IMPORTANCE_SCORE',
        defaults.planner.minImportanceScore,
      ),
      maxImagesPerWindow: readEnvNumber(
        env,
        'MAX_IMAGES_PER_2_MINUTES',
        defaults.planner.maxImagesPerWindow,
      ),
      windowSeconds: readEnvNumber(
        env,
        'IMAGE_WINDOW_SECONDS',
        defaults.planner.windowSeconds,
      ),
      imageDurationSeconds: readEnvNumber(
        env,
        'IMAGE_DISPLAY_DURATION',
        defaults.planner.imageDurationSeconds,
      ),
    },
    contextWindow: readEnvCount(env, 'CONTEXT_WINDOW', defaults.contextWindow),
    maxCaptionLength: readEnvPositive(env, 'MAX_TEXT_LENGTH', defaults.maxCaptionLength),
    phraseMaxDurationSeconds: readEnvPositive(
      env,
      'PHRASE_MAX_DURATION',
      defaults.phraseMaxDurationSeconds,
    ),
    faceDetectionIntervalSeconds: readEnvPositive(
      env,
      'FACE_DETECTION_INTERVAL',
      defaults.faceDetectionIntervalSeconds,
    ),
    captionAnchors: readEnvAnchors(env, 'CAPTION_ANCHORS', [
      ...defaults.captionAnchors,
    ]),
    imageTextAnchors: readEnvAnchors(env, 'IMAGE_TEXT_ANCHORS', [
      ...defaults.imageTextAnchors,
    ]),
    outputDir,
    cacheDir: path.resolve(cwd, readEnvString(env, 'CACHE_DIR') ?? 'cache'),
    tempDir: path.resolve(cwd, readEnvString(env, 'TEMP_DIR') ?? 'temp'),
    cache: {
      transcription: cacheEnabled,
      images: cacheEnabled,
      faceDetection: cacheEnabled,
    },
    logLevel:
      overrides.logLevel ??
      readEnvChoice(env, 'LOG_LEVEL', LOG_LEVELS, defaults.logLevel),
    ffmpegPath: readEnvString(env, 'FFMPEG_PATH'),
    ffprobePath: readEnvString(env, 'FFPROBE_PATH'),
  };
}

export function requireApiKey(settings: AppSettings): string {
  if (!settings.openaiApiKey) {
    throw new SettingsError(
      'OpenAI API key is required. Provide it with --api-key or the OPENAI_API_KEY environment variable.',
    );
  }
  return settings.openaiApiKey;
}

export { LOG_LEVELS };
