#!/usr/bin/env node
/**
 * Command-line entry point
 *
 * Usage: subburn <input.mp4> <output.mp4> [--mode srt|overlay]
 *
 * Loads .env, resolves the font and the API client once, then runs the
 * subtitle pipeline for a single video.
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
import { parseArgs } from 'util';
import { loadConfig } from './config';
import { runHandler } from './handlers/handlers';
import { handleSubtitleVideo } from './handlers/subtitle-video-handler';
import { configureBinaries, createFfmpegToolkit } from './services/ffmpeg';
import { resolveGlyphProvider } from './services/fonts';
import { OpenAISpeechToText, createOpenAIClient } from './services/transcription';
import { OpenAITranslator } from './services/translation';
import { isPipelineError, type OutputMode } from '../types/pipeline';

const USAGE = 'Usage: subburn <input video> <output video> [--mode srt|overlay]';

function parseMode(value: string | undefined): OutputMode | undefined {
  if (value === undefined) return undefined;
  if (value === 'srt' || value === 'overlay') return value;
  throw new Error(`Unknown --mode '${value}'. ${USAGE}`);
}

async function main(): Promise<number> {
  dotenv.config();

  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      mode: { type: 'string', short: 'm' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help || positionals.length !== 2) {
    console.log(USAGE);
    return values.help ? 0 : 1;
  }

  const [input, output] = positionals.map((p) => path.resolve(p));
  const config = loadConfig();

  configureBinaries({ ffmpegPath: config.ffmpegPath });
  const provider = resolveGlyphProvider(config.fontPaths, { fontSize: config.fontSize, sample: config.fontSample });
  const client = createOpenAIClient({ apiKey: config.apiKey, baseURL: config.baseURL });

  const result = await runHandler('subtitle-video', () =>
    handleSubtitleVideo(
      { jobId: `job-${Date.now()}`, videoPath: input, outputPath: output, mode: parseMode(values.mode) },
      {
        media: createFfmpegToolkit({ maxDuration: config.maxDuration }),
        speech: new OpenAISpeechToText(client, { model: config.transcribeModel, language: config.sourceLanguage }),
        translator: new OpenAITranslator(client, {
          model: config.translateModel,
          sourceLanguage: config.sourceLanguage,
          targetLanguage: config.targetLanguage,
        }),
        provider,
        config,
      },
      (e) => {
        if (e.phase === 'error') return;
        console.log(`[PROGRESS] ${e.progress ?? 0}% ${e.message ?? e.phase}`);
      }
    )
  );

  if (isPipelineError(result)) {
    console.error(`Error: ${result.error}`);
    if (result.details) console.error(result.details);
    return 1;
  }

  for (const note of result.degraded) console.warn(`Degraded: ${note}`);
  console.log(`Wrote ${result.outputPath} (${result.segmentCount} subtitle segment(s), mode=${result.mode})`);
  console.log(`Original text: ${result.originalExcerpt}...`);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('[MAIN] Fatal error:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
