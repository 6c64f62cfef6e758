import type {
  ImageEvent,
  PlannerConfig,
  Segment,
} from '../../shared/timelineTypes';
import { ConfigurationError, InvalidSegmentsError } from '../errors';

export const DEFAULT_PLANNER_CONFIG: PlannerConfig = {
  minImportanceScore: 8,
  maxImagesPerWindow: 5,
  windowSeconds: 120,
  imageDurationSeconds: 1.0,
};

export function validatePlannerConfig(config: PlannerConfig): void {
  if (!Number.isFinite(config.minImportanceScore)) {
    throw new ConfigurationError(
      `minImportanceScore must be a finite number (got ${config.minImportanceScore})`,
    );
  }
  if (
    !Number.isInteger(config.maxImagesPerWindow) ||
    config.maxImagesPerWindow <= 0
  ) {
    throw new ConfigurationError(
      `maxImagesPerWindow must be a positive integer (got ${config.maxImagesPerWindow})`,
    );
  }
  if (!Number.isFinite(config.windowSeconds) || config.windowSeconds <= 0) {
    throw new ConfigurationError(
      `windowSeconds must be greater than zero (got ${config.windowSeconds})`,
    );
  }
  if (
    !Number.isFinite(config.imageDurationSeconds) ||
    config.imageDurationSeconds <= 0
  ) {
    throw new ConfigurationError(
      `imageDurationSeconds must be greater than zero (got ${config.imageDurationSeconds})`,
    );
  }
}

function validateSegments(segments: readonly Segment[]): void {
  let previousStart = Number.NEGATIVE_INFINITY;

  segments.forEach((segment, index) => {
    if (!Number.isFinite(segment.start) || !Number.isFinite(segment.end)) {
      throw new InvalidSegmentsError(
        `Segment ${index} has a non-finite time range`,
        index,
      );
    }
    if (segment.start >= segment.end) {
      throw new InvalidSegmentsError(
        `Segment ${index} starts at ${segment.start}s but ends at ${segment.end}s`,
        index,
      );
    }
    if (segment.start < previousStart) {
      throw new InvalidSegmentsError(
        `Segment ${index} starts at ${segment.start}s, before the previous segment (${previousStart}s); segments must be sorted by start`,
        index,
      );
    }
    previousStart = segment.start;
  });
}

export function derivePrompt(segment: Segment): string {
  const prompt = segment.prompt?.trim();
  return prompt || segment.text.trim();
}

/**
 * Pick the segments that receive a generated image.
 *
 * Candidates at or above the importance threshold are taken earliest first
 * in a single pass. A candidate is accepted only while fewer than
 * `maxImagesPerWindow` events were accepted in the closed trailing window
 * `[start - windowSeconds, start]`, so every window of that length holds at
 * most the cap. Greedy: earlier candidates are never given up for later,
 * more important ones.
 */
export function planTimeline(
  segments: readonly Segment[],
  config: PlannerConfig,
): ImageEvent[] {
  validatePlannerConfig(config);
  validateSegments(segments);

  const events: ImageEvent[] = [];
  // accepted times, ascending; entries before `head` have left the window
  const acceptedTimes: number[] = [];
  let head = 0;

  for (const segment of segments) {
    if (!(segment.importance >= config.minImportanceScore)) continue;

    const time = segment.start;
    while (
      head < acceptedTimes.length &&
      time - acceptedTimes[head] > config.windowSeconds
    ) {
      head += 1;
    }

    const lastAccepted = acceptedTimes[acceptedTimes.length - 1];
    if (lastAccepted === time) continue;
    if (acceptedTimes.length - head >= config.maxImagesPerWindow) continue;

    acceptedTimes.push(time);
    events.push({
      time,
      duration: config.imageDurationSeconds,
      segment,
      prompt: derivePrompt(segment),
    });
  }

  return events;
}
