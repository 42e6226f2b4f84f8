/**
 * FFmpeg Service Module
 *
 * Everything the pipeline asks of the video transcoder:
 * - video metadata via ffprobe
 * - audio extraction for the speech-to-text service
 * - burning an SRT file in with the `subtitles` filter
 * - compositing rasterized subtitle overlays, each enabled for its own time window
 *
 * DEPENDENCIES:
 * - fluent-ffmpeg: High-level FFmpeg API for Node.js
 * - ffprobe-static: Pre-bundled FFprobe binary
 *
 * The ffmpeg binary itself comes from FFMPEG_PATH or the system PATH.
 */

import ffmpeg from 'fluent-ffmpeg';
import * as ffprobeStatic from 'ffprobe-static';
import * as fs from 'fs';
import * as path from 'path';
import type { BurnInStyle, OverlayImage, VideoMetadata } from '../../types/media';
import { CollaboratorError } from './errors';

/**
 * The transcoder as seen by the video handler
 */
export interface MediaToolkit {
  probe(videoPath: string): Promise<VideoMetadata>;
  extractAudio(videoPath: string, outputPath: string): Promise<void>;
  burnSubtitles(videoPath: string, srtPath: string, outputPath: string, style: BurnInStyle): Promise<void>;
  compositeOverlays(videoPath: string, overlays: readonly OverlayImage[], outputPath: string): Promise<void>;
}

export interface FfmpegBinaries {
  /** explicit ffmpeg binary; when absent fluent-ffmpeg looks in PATH */
  ffmpegPath?: string;
  /** explicit ffprobe binary; defaults to the one bundled by ffprobe-static */
  ffprobePath?: string;
}

function pathIfExists(p: string | null | undefined): string | null {
  if (!p) return null;
  try {
    return fs.existsSync(p) ? p : null;
  } catch {
    return null;
  }
}

/**
 * Point fluent-ffmpeg at the binaries to use. Call once at startup.
 */
export function configureBinaries(binaries: FfmpegBinaries = {}): void {
  const resolvedFfmpegPath = pathIfExists(binaries.ffmpegPath);
  const resolvedFfprobePath = pathIfExists(binaries.ffprobePath) ?? pathIfExists(ffprobeStatic.path);

  // npm does not always preserve the execute bit on bundled binaries
  if (resolvedFfprobePath && process.platform !== 'win32') {
    try {
      fs.chmodSync(resolvedFfprobePath, 0o755);
    } catch (chmodError) {
      console.warn('[FFMPEG] Could not set permissions (may already be set):', chmodError);
    }
  }

  if (resolvedFfmpegPath) {
    ffmpeg.setFfmpegPath(resolvedFfmpegPath);
  } else if (binaries.ffmpegPath) {
    console.error(`[FFMPEG] FFMPEG_PATH does not exist: ${binaries.ffmpegPath}; falling back to PATH`);
  }

  if (!resolvedFfprobePath) {
    console.error('[FFMPEG] Unable to resolve ffprobe binary path. Ensure ffprobe-static is installed.');
  } else {
    ffmpeg.setFfprobePath(resolvedFfprobePath);
  }

  console.log('[FFMPEG] FFmpeg binary path:', resolvedFfmpegPath ?? '(PATH)');
  console.log('[FFMPEG] FFprobe binary path:', resolvedFfprobePath);
}

function ensureParentDirectory(filePath: string): void {
  const outDir = path.dirname(filePath);
  if (!fs.existsSync(outDir)) {
    fs.mkdirSync(outDir, { recursive: true });
  }
}

/**
 * Extract video metadata using FFprobe
 *
 * - Duration comes from the container format (seconds)
 * - Resolution comes from the first video stream
 * - File size falls back to fs.statSync when ffprobe does not report it
 *
 * @throws CollaboratorError if the file cannot be probed or has no video stream
 */
export function getVideoMetadata(filePath: string): Promise<VideoMetadata> {
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(filePath, (err, metadata) => {
      if (err) {
        console.error('[FFMPEG] Error extracting metadata:', err);
        reject(new CollaboratorError('ffprobe', `Failed to extract metadata: ${err.message}`, err));
        return;
      }

      const videoStream = metadata.streams.find((stream) => stream.codec_type === 'video');
      if (!videoStream) {
        reject(new CollaboratorError('ffprobe', `No video stream found in ${filePath}`));
        return;
      }

      let size = metadata.format.size || 0;
      if (!size) {
        size = fs.statSync(filePath).size;
      }

      resolve({
        duration: metadata.format.duration || 0,
        width: videoStream.width || 0,
        height: videoStream.height || 0,
        size,
      });
    });
  });
}

/**
 * Extract the audio track to Ogg/Opus at 64 kbit/s, a format the
 * transcription endpoints accept at a small upload size.
 */
export function extractAudio(inputVideoPath: string, outputPath: string): Promise<void> {
  return new Promise((resolve, reject) => {
    ensureParentDirectory(outputPath);
    ffmpeg(inputVideoPath)
      .noVideo()
      .audioCodec('libopus')
      .audioBitrate('64k')
      .format('ogg')
      .on('end', () => resolve())
      .on('error', (err, _stdout, stderr) => {
        reject(new CollaboratorError('ffmpeg', `Audio extraction failed: ${err.message}${stderrTail(stderr)}`, err));
      })
      .save(outputPath);
  });
}

export function buildForceStyle(style: BurnInStyle): string {
  return [
    `Fontname=${style.fontName}`,
    `FontSize=${style.fontSize}`,
    `Alignment=${style.alignment}`,
    `Outline=${style.outline}`,
    `Shadow=${style.shadow}`,
    `MarginV=${style.marginV}`,
  ].join(',');
}

export function buildBurnInFilter(srtPath: string, style: BurnInStyle): string {
  return `subtitles=${escapeFFmpegPathForFilter(srtPath)}:force_style='${buildForceStyle(style)}'`;
}

/**
 * Filter graph chaining one full-canvas overlay per subtitle onto input 0.
 * Overlay i is input i + 1 and is only enabled inside its own time window,
 * which is half-open so back-to-back subtitles never draw on the same frame.
 */
export function buildOverlayGraph(overlays: readonly OverlayImage[]): { filters: string[]; mapVideo: string } {
  const filters: string[] = [];
  let current = '0:v';
  overlays.forEach((ov, i) => {
    const next = `v${i + 1}`;
    const end = ov.start + ov.duration;
    filters.push(`[${current}][${i + 1}:v]overlay=0:0:enable='gte(t,${f(ov.start)})*lt(t,${f(end)})'[${next}]`);
    current = next;
  });
  filters.push(`[${current}]format=yuv420p[vout]`);
  return { filters, mapVideo: 'vout' };
}

const ENCODE_OPTIONS = ['-pix_fmt', 'yuv420p', '-preset', 'ultrafast', '-crf', '23', '-movflags', '+faststart'];

function runEncode(cmd: ffmpeg.FfmpegCommand, outputPath: string, label: string): Promise<void> {
  return new Promise((resolve, reject) => {
    ensureParentDirectory(outputPath);
    cmd
      .output(outputPath)
      .on('start', (commandLine) => {
        console.log(`[FFMPEG][${label}][start]`, commandLine);
      })
      .on('end', () => resolve())
      .on('error', (err, _stdout, stderr) => {
        console.error(`[FFMPEG][${label}] failed:`, err.message);
        reject(new CollaboratorError('ffmpeg', `${label} failed: ${err.message}${stderrTail(stderr)}`, err));
      })
      .run();
  });
}

/**
 * Burn an SRT file into the video with libass, re-encoding with H.264 ultrafast
 * and copying the audio stream.
 */
export function burnSubtitles(
  inputPath: string,
  srtPath: string,
  outputPath: string,
  style: BurnInStyle,
  maxDuration?: number
): Promise<void> {
  const cmd = ffmpeg(inputPath)
    .videoFilters(buildBurnInFilter(srtPath, style))
    .videoCodec('libx264')
    .audioCodec('copy')
    .outputOptions(withDurationLimit(ENCODE_OPTIONS, maxDuration));
  return runEncode(cmd, outputPath, 'burn-in');
}

/**
 * Composite rasterized subtitle PNGs over the video.
 */
export function compositeOverlays(
  inputPath: string,
  overlays: readonly OverlayImage[],
  outputPath: string,
  maxDuration?: number
): Promise<void> {
  const cmd = ffmpeg(inputPath);
  overlays.forEach((ov) => cmd.input(ov.path));
  const { filters, mapVideo } = buildOverlayGraph(overlays);
  console.log('[FFMPEG][overlay][filters]', filters.join(';'));
  cmd
    .complexFilter(filters, [mapVideo])
    .outputOptions(['-map', '0:a?', ...withDurationLimit(ENCODE_OPTIONS, maxDuration)])
    .videoCodec('libx264')
    .audioCodec('copy');
  return runEncode(cmd, outputPath, 'overlay');
}

/**
 * Default toolkit backed by the functions above
 */
export function createFfmpegToolkit(options: { maxDuration?: number } = {}): MediaToolkit {
  return {
    probe: getVideoMetadata,
    extractAudio,
    burnSubtitles: (videoPath, srtPath, outputPath, style) =>
      burnSubtitles(videoPath, srtPath, outputPath, style, options.maxDuration),
    compositeOverlays: (videoPath, overlays, outputPath) =>
      compositeOverlays(videoPath, overlays, outputPath, options.maxDuration),
  };
}

// Helpers
function withDurationLimit(opts: string[], maxDuration?: number): string[] {
  return maxDuration && maxDuration > 0 ? [...opts, '-t', f(maxDuration)] : opts;
}

function stderrTail(stderr: string | null): string {
  if (!stderr) return '';
  return `. Stderr: ${stderr.slice(-2000)}`;
}

function f(num: number): string {
  return Number(num.toFixed(6)).toString();
}

export function escapeFFmpegPathForFilter(p: string): string {
  // Wrap in single quotes and escape existing single quotes
  const escaped = p.replace(/'/g, "\\'");
  return `'${escaped}'`;
}
