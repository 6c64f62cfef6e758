import ffmpeg, { type FfprobeData } from 'fluent-ffmpeg';
import type { FrameSize } from '../../shared/timelineTypes';

export interface VideoInfo {
  duration: number;
  frame: FrameSize;
  fps: number | undefined;
  hasAudio: boolean;
}

export function safeFps(rFrameRate: string | undefined): number | undefined {
  if (!rFrameRate || !rFrameRate.includes('/')) return undefined;
  const [numRaw, denRaw] = rFrameRate.split('/');
  const numerator = Number(numRaw);
  const denominator = Number(denRaw);
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator)) {
    return undefined;
  }
  if (denominator === 0) return undefined;
  const fps = numerator / denominator;
  return Number.isFinite(fps) ? fps : undefined;
}

export function summarizeProbe(data: FfprobeData): VideoInfo {
  const videoStream = data.streams.find((stream) => stream.codec_type === 'video');
  if (!videoStream || !videoStream.width || !videoStream.height) {
    throw new Error('Input has no video stream');
  }
  const formatDuration = Number(data.format.duration);
  const streamDuration = Number(videoStream.duration);
  const duration = Number.isFinite(formatDuration)
    ? formatDuration
    : Number.isFinite(streamDuration)
      ? streamDuration
      : 0;

  return {
    duration,
    frame: { width: videoStream.width, height: videoStream.height },
    fps: safeFps(videoStream.r_frame_rate),
    hasAudio: data.streams.some((stream) => stream.codec_type === 'audio'),
  };
}

export async function getVideoInfo(videoPath: string): Promise<VideoInfo> {
  const data = await new Promise<FfprobeData>((resolve, reject) => {
    ffmpeg.ffprobe(videoPath, (error: unknown, metadata: FfprobeData) => {
      if (error) {
        reject(error instanceof Error ? error : new Error(String(error)));
        return;
      }
      resolve(metadata);
    });
  });
  return summarizeProbe(data);
}
