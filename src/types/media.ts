/**
 * Media Types and Interfaces
 *
 * Data passed between the video handler and the ffmpeg-backed media toolkit.
 */

/**
 * Video Metadata
 *
 * What ffprobe reports about an input file. Used by the handler to enforce
 * the duration limit, to size the subtitle canvas, and as the time span of the
 * single whole-text subtitle when transcription returns no timing.
 *
 * @example
 * const meta: VideoMetadata = { duration: 42.5, width: 1280, height: 720, size: 3145728 };
 */
export interface VideoMetadata {
  /** Duration in seconds (e.g., 125.5) */
  duration: number;

  /** Video width in pixels */
  width: number;

  /** Video height in pixels */
  height: number;

  /** File size in bytes */
  size: number;
}

/**
 * Style applied by the `subtitles` filter when burning an SRT file in.
 * Field names follow libass' force_style keys.
 */
export interface BurnInStyle {
  fontName: string;
  fontSize: number;
  /** libass numpad alignment (10 = legacy bottom-center) */
  alignment: number;
  outline: number;
  shadow: number;
  marginV: number;
}

/**
 * One rasterized subtitle overlay: a full-canvas transparent PNG shown
 * between `start` and `start + duration`.
 */
export interface OverlayImage {
  path: string;
  start: number;
  duration: number;
}
