import type { Sentiment } from '../../shared/timelineTypes';

export type RgbColour = readonly [number, number, number];

export const SENTIMENT_COLOURS: Record<Sentiment, RgbColour> = {
  important: [255, 215, 0],
  happy: [0, 255, 127],
  grateful: [0, 255, 127],
  excited: [255, 105, 180],
  sad: [100, 149, 237],
  worried: [100, 149, 237],
  angry: [255, 69, 0],
  neutral: [255, 255, 255],
};

export function isSentiment(value: unknown): value is Sentiment {
  return (
    typeof value === 'string' &&
    Object.prototype.hasOwnProperty.call(SENTIMENT_COLOURS, value)
  );
}

export function toSentiment(value: unknown): Sentiment {
  if (typeof value !== 'string') return 'neutral';
  const normalized = value.trim().toLowerCase();
  return isSentiment(normalized) ? normalized : 'neutral';
}
