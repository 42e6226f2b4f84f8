/**
 * Pipeline Request/Response Types
 *
 * Request and response shapes for the video handler, plus the shared error
 * envelope every handler returns instead of throwing.
 *
 * NAMING CONVENTION:
 * - Phase names use snake_case (e.g., 'extracting_audio')
 * - Request/Response interfaces use PascalCase with suffix (e.g., SubtitleVideoRequest)
 */

import type { LayoutOverflowWarning } from './subtitles';

/**
 * Output format chosen by the caller. Both are produced from the same
 * SubtitleBlock data.
 * - 'srt': write an SRT file and burn it in with the subtitles filter
 * - 'overlay': rasterize each block to PNG and composite the overlays
 */
export type OutputMode = 'srt' | 'overlay';

// ============================================================================
// SUBTITLE VIDEO HANDLER
// ============================================================================

export interface SubtitleVideoRequest {
  /** Caller-chosen identifier, used for temp file names and progress events */
  jobId: string;
  /** Absolute path to the source video */
  videoPath: string;
  /** Where the subtitled video is written */
  outputPath: string;
  /** Defaults to the configured output mode */
  mode?: OutputMode;
}

export interface SubtitleVideoResponse {
  success: true;
  outputPath: string;
  mode: OutputMode;
  /** First 100 characters of the source-language transcript */
  originalExcerpt: string;
  segmentCount: number;
  /** Degraded-mode substitutions applied while reconciling the translation */
  degraded: string[];
  warnings: LayoutOverflowWarning[];
}

// =========================================================================
// PROGRESS
// =========================================================================

export type PipelinePhase =
  | 'probing'
  | 'extracting_audio'
  | 'transcribing'
  | 'translating'
  | 'rendering'
  | 'encoding'
  | 'complete'
  | 'error';

export interface PipelineProgressEvent {
  jobId: string;
  phase: PipelinePhase;
  message?: string;
  progress?: number; // 0..100
  errorMessage?: string;
}

/**
 * Error response structure used across all handlers
 */
export interface PipelineErrorResponse {
  /** Indicates this is an error response */
  success: false;
  /** User-facing error message */
  error: string;
  /** Error code of a SubtitleEngineError, when the failure was a typed one */
  code?: string;
  /** Technical error details (stack, ffmpeg stderr), truncated */
  details?: string;
}

// ============================================================================
// TYPE HELPERS
// ============================================================================

/**
 * Type guard to check if a response is an error
 *
 * USAGE:
 * const response = await handleSubtitleVideo(request, deps);
 * if (isPipelineError(response)) {
 *   console.error(response.error);
 * } else {
 *   console.log(response.outputPath);
 * }
 */
export function isPipelineError(response: unknown): response is PipelineErrorResponse {
  return (
    typeof response === 'object' &&
    response !== null &&
    'success' in response &&
    response.success === false
  );
}

/**
 * Combined response type that includes potential errors
 * This is what handlers should return
 */
export type PipelineResult<T = SubtitleVideoResponse> = T | PipelineErrorResponse;
