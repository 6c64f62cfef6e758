/**
 * Timeline domain types shared by the planner, the overlay placer,
 * the timeline artifact and the renderer. All times are in seconds,
 * all rectangles in frame pixels with the origin at the top-left corner.
 */

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface FrameSize {
  width: number;
  height: number;
}

/** One translated utterance as returned by the speech translator. */
export interface TranscriptSegment {
  id: number;
  start: number;
  end: number;
  text: string;
}

/** A transcript segment after importance scoring. */
export interface Segment {
  readonly start: number;
  readonly end: number;
  readonly text: string;
  readonly importance: number;
  /** Image prompt proposed by the scorer; the segment text is used when absent. */
  readonly prompt?: string;
}

export interface PlannerConfig {
  minImportanceScore: number;
  maxImagesPerWindow: number;
  windowSeconds: number;
  imageDurationSeconds: number;
}

export interface ImageEvent {
  readonly time: number;
  readonly duration: number;
  readonly segment: Segment;
  readonly prompt: string;
}

export interface FaceRegion {
  boundingBox: Rect;
  frameTime: number;
}

export interface OverlayPlacement {
  text: string;
  position: Rect;
  event: ImageEvent;
  /** False when the chosen position still overlaps a face box. */
  faceAvoided: boolean;
  /** True when no candidate qualified and the fallback position was taken. */
  usedFallback: boolean;
}

export type Sentiment =
  | 'important'
  | 'happy'
  | 'sad'
  | 'angry'
  | 'neutral'
  | 'excited'
  | 'grateful'
  | 'worried';

/** Grouped phrase of consecutive transcript segments, shown as one caption. */
export interface Phrase {
  text: string;
  start: number;
  end: number;
  segmentIds: number[];
}

export interface CaptionCue {
  id: string;
  start: number;
  end: number;
  text: string;
  sentiment: Sentiment;
}

export interface CaptionPlacement {
  text: string;
  position: Rect;
  cue: CaptionCue;
  faceAvoided: boolean;
  usedFallback: boolean;
}

export type OverlayAnchor =
  | 'bottom-center'
  | 'top-center'
  | 'center'
  | 'top-left'
  | 'top-right'
  | 'bottom-left'
  | 'bottom-right';
