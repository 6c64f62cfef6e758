/**
 * Logging setup for a processing run: console output plus a full debug log
 * written next to the rendered video.
 */
import path from 'path';
import log from 'electron-log/node';
import type { LogLevel } from '../shared/settingsTypes';

const SECTION_RULE = '='.repeat(60);

export interface LoggingOptions {
  level: LogLevel;
  outputDir: string;
}

export function configureLogging(options: LoggingOptions): string {
  const logFile = path.join(options.outputDir, 'processing.log');
  log.transports.file.resolvePathFn = () => logFile;
  log.transports.file.level = 'debug';
  log.transports.console.level = options.level;
  return logFile;
}

export function logSection(title: string): void {
  log.info(SECTION_RULE);
  log.info(` ${title}`);
  log.info(SECTION_RULE);
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${Math.floor(ms / 60000)}m ${Math.floor((ms % 60000) / 1000)}s`;
}
