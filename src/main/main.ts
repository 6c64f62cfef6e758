#!/usr/bin/env node
import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import log from 'electron-log/node';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createMediaTools, createPipelineDependencies } from './dependencies';
import { configureLogging } from './logger';
import { VideoEditorPipeline, resumeAssembly } from './pipeline';
import { configureFfmpeg } from './services/ffmpegSetup';
import { LOG_LEVELS, loadSettings, type SettingsOverrides } from './settingsManager';

function resolveInput(input: string): string {
  const resolved = path.resolve(input);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Input video not found: ${input}`);
  }
  return resolved;
}

function prepare(overrides: SettingsOverrides) {
  const settings = loadSettings(process.env, overrides);
  fs.mkdirSync(settings.outputDir, { recursive: true });
  const logFile = configureLogging({
    level: settings.logLevel,
    outputDir: settings.outputDir,
  });
  configureFfmpeg(settings);
  log.debug(`[Main] Logging to ${logFile}`);
  return settings;
}

async function main(): Promise<void> {
  await yargs(hideBin(process.argv))
    .scriptName('reelcraft')
    .option('api-key', { type: 'string', describe: 'OpenAI API key' })
    .option('log-level', { choices: LOG_LEVELS, describe: 'Console log level' })
    .option('output-dir', { type: 'string', describe: 'Directory for rendered output' })
    .command(
      'process <input>',
      'Translate, illustrate and caption a video',
      (command) =>
        command
          .positional('input', { type: 'string', demandOption: true })
          .option('skip-cache', { type: 'boolean', default: false })
          .option('faces', {
            type: 'string',
            describe: 'JSON file of face regions to use instead of detection',
          }),
      async (argv) => {
        const input = resolveInput(argv.input);
        const settings = prepare({
          openaiApiKey: argv.apiKey,
          logLevel: argv.logLevel,
          outputDir: argv.outputDir,
          skipCache: argv.skipCache,
        });
        const pipeline = new VideoEditorPipeline(
          settings,
          createPipelineDependencies(settings, {
            facesFile: argv.faces ? path.resolve(argv.faces) : undefined,
          }),
        );
        const result = await pipeline.process(input);
        log.info(`Success! Output video: ${result.outputPath}`);
      },
    )
    .command(
      'resume <input>',
      'Render again from a saved timeline',
      (command) =>
        command
          .positional('input', { type: 'string', demandOption: true })
          .option('timeline', {
            type: 'string',
            demandOption: true,
            describe: 'Timeline JSON written by a previous run',
          }),
      async (argv) => {
        const input = resolveInput(argv.input);
        const settings = prepare({
          logLevel: argv.logLevel,
          outputDir: argv.outputDir,
        });
        const result = await resumeAssembly(
          settings,
          createMediaTools(),
          input,
          path.resolve(argv.timeline),
        );
        log.info(`Success! Output video: ${result.outputPath}`);
      },
    )
    .demandCommand(1)
    .strict()
    .fail(false)
    .help()
    .parseAsync();
}

main().catch((error: unknown) => {
  log.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
