import type { FrameSize, Rect } from '../../shared/timelineTypes';
import type { TimelineArtifact } from '../timeline/timelineArtifact';
import { SENTIMENT_COLOURS, type RgbColour } from '../timeline/sentiment';

export interface AssOverlayLine {
  layer: number;
  style: 'Caption' | 'ImageText';
  startTime: number;
  endTime: number;
  text: string;
  rect: Rect;
  colour: RgbColour;
}

const DEFAULT_MAX_LINES = 2;
const MIN_LINE_LENGTH = 8;
const CHAR_WIDTH_RATIO = 0.55;
const IMAGE_TEXT_COLOUR: RgbColour = [255, 255, 255];

function formatAssTimestamp(seconds: number): string {
  const centiseconds = Math.max(0, Math.round(seconds * 100));
  const pad = (value: number) => String(value).padStart(2, '0');
  const hours = Math.floor(centiseconds / 360000);
  const minutes = Math.floor(centiseconds / 6000) % 60;
  const secs = Math.floor(centiseconds / 100) % 60;
  return `${hours}:${pad(minutes)}:${pad(secs)}.${pad(centiseconds % 100)}`;
}

// Override-tag braces become parentheses; a lone backslash would start an escape.
function escapeAssText(input: string): string {
  return input.replace(/\\/g, '\\\\').replace(/{/g, '(').replace(/}/g, ')');
}

export function toAssColour([red, green, blue]: RgbColour): string {
  const hex = (value: number) =>
    Math.max(0, Math.min(255, Math.round(value)))
      .toString(16)
      .toUpperCase()
      .padStart(2, '0');
  return `&H${hex(blue)}${hex(green)}${hex(red)}&`;
}

export function overlayFontSize(frame: FrameSize): number {
  return Math.max(16, Math.round(Math.min(frame.width, frame.height) * 0.04));
}

export function maxLineLengthForWidth(width: number, fontSize: number): number {
  return Math.max(MIN_LINE_LENGTH, Math.floor(width / (fontSize * CHAR_WIDTH_RATIO)));
}

export function wrapOverlayText(
  rawText: string,
  maxLineLength: number,
  maxLines: number = DEFAULT_MAX_LINES,
): string {
  const chunk = new RegExp(`.{1,${maxLineLength}}`, 'gu');
  const words = escapeAssText(rawText)
    .split(/\s+/)
    .filter(Boolean)
    .flatMap((word) => word.match(chunk) ?? []);

  const lines: string[] = [];
  for (const word of words) {
    const last = lines.length - 1;
    if (last >= 0 && lines[last].length + 1 + word.length <= maxLineLength) {
      lines[last] = `${lines[last]} ${word}`;
    } else {
      lines.push(word);
    }
  }
  if (lines.length <= maxLines) return lines.join('\\N');

  const kept = lines.slice(0, maxLines);
  const tail = kept[maxLines - 1];
  kept[maxLines - 1] =
    tail.length < maxLineLength ? `${tail}…` : `${tail.slice(0, maxLineLength - 1).trimEnd()}…`;
  return kept.join('\\N');
}

export function collectOverlayLines(artifact: TimelineArtifact): AssOverlayLine[] {
  const captions: AssOverlayLine[] = artifact.captions.map((caption) => ({
    layer: 0,
    style: 'Caption',
    startTime: caption.start,
    endTime: caption.end,
    text: caption.text,
    rect: caption.placement,
    colour: SENTIMENT_COLOURS[caption.sentiment],
  }));

  const imageText: AssOverlayLine[] = artifact.images
    .filter((entry) => entry.imagePath !== null)
    .map((entry) => ({
      layer: 1,
      style: 'ImageText',
      startTime: entry.time,
      endTime: entry.time + entry.duration,
      text: entry.text,
      rect: entry.placement,
      colour: IMAGE_TEXT_COLOUR,
    }));

  return [...captions, ...imageText];
}

/**
 * Subtitle track for the render: every caption and image text drawn at
 * its placed rectangle with `\pos`, top-centre aligned.
 */
export function buildAssFromTimeline(artifact: TimelineArtifact): string {
  const { frame } = artifact;
  const fontSize = overlayFontSize(frame);
  const outline = Math.max(1, Math.round(fontSize / 14));
  const header = [
    '[Script Info]',
    'ScriptType: v4.00+',
    `PlayResX: ${frame.width}`,
    `PlayResY: ${frame.height}`,
    'WrapStyle: 2',
    'ScaledBorderAndShadow: yes',
    '',
    '[V4+ Styles]',
    'Format: Name,Fontname,Fontsize,PrimaryColour,SecondaryColour,OutlineColour,BackColour,Bold,Italic,Underline,StrikeOut,ScaleX,ScaleY,Spacing,Angle,BorderStyle,Outline,Shadow,Alignment,MarginL,MarginR,MarginV,Encoding',
    `Style: Caption,Arial,${fontSize},&H00FFFFFF,&H00FFFFFF,&H00000000,&H33000000,1,0,0,0,100,100,0,0,3,${outline},0,8,0,0,0,1`,
    `Style: ImageText,Arial,${fontSize},&H00FFFFFF,&H00FFFFFF,&H00000000,&H00000000,1,0,0,0,100,100,0,0,1,${outline},2,8,0,0,0,1`,
    '',
    '[Events]',
    'Format: Layer,Start,End,Style,Name,MarginL,MarginR,MarginV,Effect,Text',
  ];

  const events = collectOverlayLines(artifact)
    .filter((line) => Number.isFinite(line.startTime) && Number.isFinite(line.endTime))
    .filter((line) => line.endTime > line.startTime)
    .map((line) => ({
      ...line,
      text: wrapOverlayText(line.text, maxLineLengthForWidth(line.rect.width, fontSize)),
    }))
    .filter((line) => line.text.length > 0)
    .sort((a, b) => a.startTime - b.startTime || a.layer - b.layer)
    .map((line) => {
      const start = formatAssTimestamp(line.startTime);
      const end = formatAssTimestamp(line.endTime);
      const centerX = Math.round(line.rect.x + line.rect.width / 2);
      const top = Math.round(line.rect.y);
      const tags = `{\\pos(${centerX},${top})\\c${toAssColour(line.colour)}}`;
      return `Dialogue: ${line.layer},${start},${end},${line.style},,0,0,0,,${tags}${line.text}`;
    });

  return [...header, ...events, ''].join('\n');
}
