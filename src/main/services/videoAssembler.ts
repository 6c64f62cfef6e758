import fs from 'fs/promises';
import path from 'path';
import ffmpeg from 'fluent-ffmpeg';
import log from 'electron-log/node';
import type { FrameSize } from '../../shared/timelineTypes';
import type { TimelineArtifact } from '../timeline/timelineArtifact';
import { buildRenderTimeline, type RenderSpan } from '../timeline/renderTimeline';
import { buildAssFromTimeline, collectOverlayLines } from './overlayAss';

export interface FilterGraph {
  graph: string;
  imageInputs: string[];
}

export interface RenderResult {
  outputPath: string;
  subtitlePath: string | null;
}

/** Escape a file path for use as an unquoted filtergraph option value. */
export function escapeFilterPath(filePath: string): string {
  return filePath
    .replace(/\\/g, '/')
    .replace(/([:'[\],;])/g, '\\$1');
}

/**
 * Filtergraph for the final render: every image span is scaled onto the
 * frame and overlaid between its start and end, then the subtitle track
 * is burned in. Output pad is `[vout]`.
 */
export function buildFilterGraph(
  spans: RenderSpan[],
  frame: FrameSize,
  subtitlePath: string | null,
): FilterGraph {
  const imageSpans = spans.filter(
    (span): span is Extract<RenderSpan, { type: 'image' }> => span.type === 'image',
  );
  const filters: string[] = [];
  let current = '0:v';

  imageSpans.forEach((span, index) => {
    const input = index + 1;
    const { width, height } = frame;
    filters.push(
      `[${input}:v]scale=${width}:${height}:force_original_aspect_ratio=decrease,pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2,setsar=1[img${input}]`,
    );
    filters.push(
      `[${current}][img${input}]overlay=0:0:enable='between(t,${span.start},${span.end})'[v${input}]`,
    );
    current = `v${input}`;
  });

  if (subtitlePath) {
    filters.push(`[${current}]ass=${escapeFilterPath(subtitlePath)}[vout]`);
  } else if (filters.length > 0) {
    const last = filters.length - 1;
    filters[last] = filters[last].replace(/\[v\d+\]$/, '[vout]');
  } else {
    filters.push('[0:v]null[vout]');
  }

  return {
    graph: filters.join(';'),
    imageInputs: imageSpans.map((span) => span.imagePath),
  };
}

export async function renderTimelineArtifact(
  videoPath: string,
  artifact: TimelineArtifact,
  outputDir: string,
): Promise<RenderResult> {
  await fs.mkdir(outputDir, { recursive: true });
  const stem = path.parse(videoPath).name;
  const outputPath = path.join(outputDir, `${stem}_edited.mp4`);

  let subtitlePath: string | null = null;
  if (collectOverlayLines(artifact).length > 0) {
    subtitlePath = path.join(outputDir, `${stem}_overlays.ass`);
    await fs.writeFile(subtitlePath, buildAssFromTimeline(artifact), 'utf-8');
  }

  const spans = buildRenderTimeline(artifact);
  const { graph, imageInputs } = buildFilterGraph(spans, artifact.frame, subtitlePath);
  log.info(
    `[VideoAssembler] Rendering ${imageInputs.length} image inserts${subtitlePath ? ' with overlays' : ''}`,
  );
  log.debug(`[VideoAssembler] Filter graph: ${graph}`);

  await new Promise<void>((resolve, reject) => {
    const command = ffmpeg(videoPath);
    imageInputs.forEach((imagePath) => command.input(imagePath));
    command
      .complexFilter(graph)
      .outputOptions([
        '-map',
        '[vout]',
        '-map',
        '0:a?',
        '-c:v',
        'libx264',
        '-preset',
        'medium',
        '-crf',
        '20',
        '-pix_fmt',
        'yuv420p',
        '-c:a',
        'copy',
        '-movflags',
        '+faststart',
      ])
      .output(outputPath)
      .on('progress', (progress) => {
        if (typeof progress.percent === 'number') {
          log.debug(`[VideoAssembler] ${progress.percent.toFixed(1)}%`);
        }
      })
      .on('end', () => resolve())
      .on('error', (error) => reject(error))
      .run();
  });

  log.info(`[VideoAssembler] Video saved: ${outputPath}`);
  return { outputPath, subtitlePath };
}
