import ffmpeg from 'fluent-ffmpeg';
import * as ffmpegInstaller from '@ffmpeg-installer/ffmpeg';
import log from 'electron-log/node';
import type { AppSettings } from '../../shared/settingsTypes';

export interface FfmpegBinaries {
  ffmpegPath: string;
  ffprobePath: string;
}

export function resolveFfmpegBinaries(
  settings: Pick<AppSettings, 'ffmpegPath' | 'ffprobePath'>,
  bundledPath: string = ffmpegInstaller.path,
): FfmpegBinaries {
  const ffmpegPath = settings.ffmpegPath ?? bundledPath;
  return {
    ffmpegPath,
    ffprobePath:
      settings.ffprobePath ?? ffmpegPath.replace(/ffmpeg(\.exe)?$/, 'ffprobe$1'),
  };
}

export function configureFfmpeg(
  settings: Pick<AppSettings, 'ffmpegPath' | 'ffprobePath'>,
): FfmpegBinaries {
  const binaries = resolveFfmpegBinaries(settings);
  ffmpeg.setFfmpegPath(binaries.ffmpegPath);
  ffmpeg.setFfprobePath(binaries.ffprobePath);
  log.debug(`[Ffmpeg] Using ${binaries.ffmpegPath}`);
  return binaries;
}
