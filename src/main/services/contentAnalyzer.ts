import log from 'electron-log/node';
import type {
  Phrase,
  Segment,
  Sentiment,
  TranscriptSegment,
} from '../../shared/timelineTypes';
import {
  ANALYSIS_SYSTEM_PROMPT,
  CAPTION_SYSTEM_PROMPT,
  buildCaptionPrompt,
  buildSegmentAnalysisPrompt,
} from '../prompts';
import { toSentiment } from '../timeline/sentiment';
import {
  isRecord,
  readFiniteNumber,
  readString,
  safeJsonParse,
} from '../utils/safeJsonParse';
import type { JsonCompletion } from './openaiChat';

export interface SegmentAnalysis {
  needsVisualization: boolean;
  importanceScore: number;
  reasoning: string;
  imagePrompt: string | null;
  imageDescription: string | null;
}

export interface CaptionSummary {
  text: string;
  sentiment: Sentiment;
}

export interface ContentAnalyzerOptions {
  contextWindow: number;
  maxCaptionLength: number;
}

const PROGRESS_EVERY = 10;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function clampScore(value: number): number {
  return Math.min(10, Math.max(0, value));
}

export function truncateCaption(text: string, maxLength: number): string {
  const trimmed = text.trim();
  return trimmed.length <= maxLength ? trimmed : trimmed.slice(0, maxLength).trimEnd();
}

export function parseSegmentAnalysis(content: string): SegmentAnalysis {
  const parsed = safeJsonParse(content);
  if (!isRecord(parsed)) {
    throw new Error('Analysis reply is not a JSON object');
  }
  return {
    needsVisualization: parsed.needs_visualization === true,
    importanceScore: clampScore(readFiniteNumber(parsed.importance_score) ?? 0),
    reasoning: readString(parsed.reasoning) ?? '',
    imagePrompt: readString(parsed.image_prompt),
    imageDescription: readString(parsed.image_description),
  };
}

/**
 * Importance scorer and caption writer. Model failures never escape: a
 * segment that cannot be analysed scores 0, a caption that cannot be
 * summarised falls back to the truncated phrase text.
 */
export class ContentAnalyzer {
  private readonly complete: JsonCompletion;

  private readonly options: ContentAnalyzerOptions;

  constructor(complete: JsonCompletion, options: ContentAnalyzerOptions) {
    this.complete = complete;
    this.options = options;
  }

  async analyzeSegment(
    text: string,
    contextBefore: string = '',
    contextAfter: string = '',
  ): Promise<SegmentAnalysis> {
    try {
      const reply = await this.complete([
        { role: 'system', content: ANALYSIS_SYSTEM_PROMPT },
        {
          role: 'user',
          content: buildSegmentAnalysisPrompt({ text, contextBefore, contextAfter }),
        },
      ]);
      const analysis = parseSegmentAnalysis(reply);
      log.debug(
        `[ContentAnalyzer] "${text.slice(0, 40)}" scored ${analysis.importanceScore}`,
      );
      return analysis;
    } catch (error) {
      log.error(`[ContentAnalyzer] Analysis failed: ${errorMessage(error)}`);
      return {
        needsVisualization: false,
        importanceScore: 0,
        reasoning: `Analysis failed: ${errorMessage(error)}`,
        imagePrompt: null,
        imageDescription: null,
      };
    }
  }

  async scoreSegments(
    segments: TranscriptSegment[],
    contextWindow: number = this.options.contextWindow,
  ): Promise<Segment[]> {
    const ordered = [...segments].sort((a, b) => a.start - b.start);
    const scored: Segment[] = [];
    log.info(`[ContentAnalyzer] Scoring ${ordered.length} segments`);

    for (let index = 0; index < ordered.length; index += 1) {
      const segment = ordered[index];
      const before = ordered
        .slice(Math.max(0, index - contextWindow), index)
        .map((item) => item.text)
        .join(' ');
      const after = ordered
        .slice(index + 1, index + 1 + contextWindow)
        .map((item) => item.text)
        .join(' ');

      const analysis = await this.analyzeSegment(segment.text, before, after);
      scored.push({
        start: segment.start,
        end: segment.end,
        text: segment.text,
        importance: analysis.needsVisualization ? analysis.importanceScore : 0,
        prompt: analysis.imagePrompt ?? undefined,
      });

      if ((index + 1) % PROGRESS_EVERY === 0) {
        log.info(`[ContentAnalyzer] Scored ${index + 1}/${ordered.length} segments`);
      }
    }

    return scored;
  }

  async summarizeCaption(
    phrase: Phrase,
    maxLength: number = this.options.maxCaptionLength,
  ): Promise<CaptionSummary> {
    const fallback: CaptionSummary = {
      text: truncateCaption(phrase.text, maxLength),
      sentiment: 'neutral',
    };

    try {
      const reply = await this.complete([
        { role: 'system', content: CAPTION_SYSTEM_PROMPT },
        { role: 'user', content: buildCaptionPrompt(phrase.text, maxLength) },
      ]);
      const parsed = safeJsonParse(reply);
      const text = isRecord(parsed) ? readString(parsed.english_text) : null;
      if (!isRecord(parsed) || !text) {
        log.warn('[ContentAnalyzer] Caption reply had no text, using phrase text');
        return fallback;
      }
      return {
        text: truncateCaption(text, maxLength),
        sentiment: toSentiment(parsed.sentiment),
      };
    } catch (error) {
      log.error(`[ContentAnalyzer] Caption summary failed: ${errorMessage(error)}`);
      return fallback;
    }
  }
}
