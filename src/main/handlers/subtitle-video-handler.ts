import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { AppConfig } from '../config';
import type { OverlayImage } from '../../types/media';
import type {
  OutputMode,
  PipelineProgressEvent,
  PipelineResult,
  SubtitleVideoRequest,
  SubtitleVideoResponse,
} from '../../types/pipeline';
import type {
  SubtitleBlock,
  SubtitleSegment,
  SubtitleStyle,
  TranslationUnit,
} from '../../types/subtitles';
import { toOverlaySequence } from '../services/block-renderer';
import { CollaboratorError, EmptyTranscriptError, ReconciliationError, errorMessage } from '../services/errors';
import type { MediaToolkit } from '../services/ffmpeg';
import type { GlyphMetricsProvider } from '../services/fonts';
import { rasterizeBlock } from '../services/rasterizer';
import { fallbackToFullText } from '../services/reconciler';
import { filterAndOffsetSegments } from '../services/segments';
import { toSrt, writeSRTFile } from '../services/srt';
import { buildSubtitleTrack, type SubtitleTrack } from '../services/subtitle-track';
import type { SpeechToText } from '../services/transcription';
import type { Translator } from '../services/translation';
import { toErrorResponse } from './handlers';

export type RasterizeFn = (
  block: SubtitleBlock,
  provider: GlyphMetricsProvider,
  style: SubtitleStyle
) => Promise<Buffer>;

/**
 * Collaborator handles for one run. All are created by the caller; the handler
 * holds no process-wide state.
 */
export interface SubtitleVideoDeps {
  media: MediaToolkit;
  speech: SpeechToText;
  translator: Translator;
  provider: GlyphMetricsProvider;
  config: Pick<AppConfig, 'maxDuration' | 'outputMode' | 'style' | 'burnIn' | 'fallbackOnCountMismatch'>;
  rasterize?: RasterizeFn;
  /** parent of the per-job temp directory; defaults to os.tmpdir() */
  tempRoot?: string;
}

const EXCERPT_LENGTH = 100;

/**
 * Subtitle one video end to end: probe, extract audio, transcribe, translate,
 * reconcile and lay out, then burn in (SRT) or composite (overlay).
 *
 * Never throws; failures come back as a PipelineErrorResponse and an 'error'
 * progress event.
 */
export async function handleSubtitleVideo(
  req: SubtitleVideoRequest,
  deps: SubtitleVideoDeps,
  onProgress: (e: PipelineProgressEvent) => void = () => undefined
): Promise<PipelineResult<SubtitleVideoResponse>> {
  const { jobId, videoPath, outputPath } = req;
  // jobId names the temp directory, so it may not leave tempRoot
  if (!jobId || typeof jobId !== 'string' || /[\\/]|\.\./.test(jobId)) {
    return { success: false, error: 'Invalid jobId' };
  }
  if (!videoPath || typeof videoPath !== 'string' || !fs.existsSync(videoPath)) {
    return { success: false, error: 'Invalid or missing videoPath' };
  }
  if (!outputPath || typeof outputPath !== 'string') {
    return { success: false, error: 'Invalid or missing outputPath' };
  }

  const { config, media } = deps;
  const mode: OutputMode = req.mode ?? config.outputMode;
  const sendProgress = (e: Omit<PipelineProgressEvent, 'jobId'>) => onProgress({ jobId, ...e });

  let tmpDir: string | null = null;
  try {
    sendProgress({ phase: 'probing', message: 'Reading video metadata...', progress: 2 });
    const meta = await media.probe(videoPath);
    if (meta.duration > config.maxDuration) {
      return {
        success: false,
        error: `Video is too long: ${Math.round(meta.duration)}s (limit ${config.maxDuration}s)`,
      };
    }
    if (!meta.width || !meta.height) {
      throw new CollaboratorError('ffprobe', `Could not determine video resolution of ${videoPath}`);
    }

    tmpDir = fs.mkdtempSync(path.join(deps.tempRoot ?? os.tmpdir(), `subburn-${jobId}-`));
    const audioPath = path.join(tmpDir, 'audio.ogg');

    sendProgress({ phase: 'extracting_audio', message: 'Extracting audio...', progress: 10 });
    await media.extractAudio(videoPath, audioPath);

    sendProgress({ phase: 'transcribing', message: 'Transcribing audio...', progress: 30 });
    const transcript = await deps.speech.transcribe(audioPath);
    if (transcript.text.trim().length === 0 && transcript.segments.length === 0) {
      throw new EmptyTranscriptError();
    }
    const segments = meta.duration > 0
      ? filterAndOffsetSegments(transcript.segments, 0, meta.duration)
      : transcript.segments;

    sendProgress({ phase: 'translating', message: 'Translating transcript...', progress: 50 });
    const translation = await deps.translator.translate({
      text: transcript.text,
      segments: segments.length > 0 ? segments.map((s) => s.text) : undefined,
    });

    sendProgress({ phase: 'rendering', message: 'Laying out subtitles...', progress: 65 });
    const style: SubtitleStyle = { ...config.style, canvasWidth: meta.width, canvasHeight: meta.height };
    const track = buildTrack(segments, translation, deps, style, meta.duration);

    sendProgress({ phase: 'encoding', message: 'Rendering subtitled video...', progress: 75 });
    if (mode === 'srt') {
      const srtPath = path.join(tmpDir, 'subtitles.srt');
      await writeSRTFile(toSrt(track.blocks), srtPath);
      await media.burnSubtitles(videoPath, srtPath, outputPath, config.burnIn);
    } else {
      const rasterize = deps.rasterize ?? rasterizeBlock;
      const overlays: OverlayImage[] = [];
      for (const frame of toOverlaySequence(track.blocks)) {
        const png = await rasterize(frame.block, deps.provider, style);
        const pngPath = path.join(tmpDir, `overlay-${String(frame.index).padStart(4, '0')}.png`);
        await fs.promises.writeFile(pngPath, png);
        overlays.push({ path: pngPath, start: frame.start, duration: frame.duration });
      }
      await media.compositeOverlays(videoPath, overlays, outputPath);
    }

    sendProgress({ phase: 'complete', message: 'Subtitles burned in', progress: 100 });
    return {
      success: true,
      outputPath,
      mode,
      originalExcerpt: transcript.text.slice(0, EXCERPT_LENGTH),
      segmentCount: track.segments.length,
      degraded: track.degraded,
      warnings: track.warnings,
    };
  } catch (e) {
    const msg = errorMessage(e);
    console.error(`[HANDLER] Job ${jobId} failed:`, msg);
    sendProgress({ phase: 'error', errorMessage: msg });
    return toErrorResponse(e, 'Subtitle generation failed');
  } finally {
    if (tmpDir) cleanupTempDir(tmpDir);
  }
}

/**
 * Engine call with the caller-side recovery for a count mismatch: the
 * segmented translation is collapsed and re-run through the whole-text heuristic.
 */
function buildTrack(
  segments: readonly SubtitleSegment[],
  translation: TranslationUnit,
  deps: SubtitleVideoDeps,
  style: SubtitleStyle,
  duration: number
): SubtitleTrack {
  const options = { provider: deps.provider, style, duration };
  try {
    return buildSubtitleTrack(segments, translation, options);
  } catch (e) {
    if (!(e instanceof ReconciliationError) || e.kind !== 'count-mismatch' || !deps.config.fallbackOnCountMismatch) {
      throw e;
    }
    const note = `${e.message}; falling back to whole-text alignment`;
    console.warn(`[HANDLER] ${note}`);
    const track = buildSubtitleTrack(segments, fallbackToFullText(translation), options);
    return { ...track, degraded: [note, ...track.degraded] };
  }
}

function cleanupTempDir(dir: string): void {
  try {
    fs.rmSync(dir, { recursive: true, force: true });
    console.log(`[HANDLER] Cleaned up temporary directory: ${dir}`);
  } catch (err) {
    console.error(`[HANDLER] Error during cleanup of ${dir}:`, err);
  }
}
