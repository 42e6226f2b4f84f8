/**
 * Subtitle types shared by the reconciler, the layout engine and the renderers
 */

export interface SubtitleSegment {
  /** start time in seconds */
  readonly start: number;
  /** end time in seconds, always greater than start */
  readonly end: number;
  /** transcript or translated text */
  readonly text: string;
}

export interface SubtitleData {
  /** ordered list of segments */
  segments: SubtitleSegment[];
  /** optional language code (e.g., 'en') */
  language?: string;
}

/**
 * Result of a speech-to-text call. `segments` is empty when the service
 * returned no timing information, in which case only `text` is usable.
 */
export interface TranscriptResult extends SubtitleData {
  /** full transcript text */
  text: string;
}

/**
 * What the translation service hands back: either one undifferentiated block
 * or an array that may or may not line up with the original segments.
 */
export type TranslationUnit =
  | { kind: 'full'; text: string }
  | { kind: 'segmented'; texts: string[] };

export type TextDirection = 'ltr' | 'rtl' | 'auto';

/**
 * One wrapped line. `text` is in visual (draw) order, `logicalText` keeps
 * the reading order the line was built from.
 */
export interface Line {
  text: string;
  logicalText: string;
  width: number;
  height: number;
}

export interface PositionedLine extends Line {
  /** horizontal offset inside the panel */
  x: number;
  /** vertical offset of the line box top inside the panel */
  y: number;
}

export interface SubtitleBlock {
  lines: PositionedLine[];
  panelWidth: number;
  panelHeight: number;
  /** panel top-left on the video canvas */
  panelX: number;
  panelY: number;
  segment: SubtitleSegment;
}

export interface OverlayFrame {
  /** 1-based, matches the SRT index of the same segment */
  index: number;
  start: number;
  duration: number;
  block: SubtitleBlock;
}

export interface TextBox {
  width: number;
  height: number;
}

export interface LayoutOverflowWarning {
  kind: 'layout-overflow';
  word: string;
  width: number;
  maxWidth: number;
}

export interface LayoutResult {
  lines: Line[];
  warnings: LayoutOverflowWarning[];
}

/**
 * Visual parameters for panel sizing, placement and rasterization
 */
export interface SubtitleStyle {
  canvasWidth: number;
  canvasHeight: number;
  /** fraction of the canvas width text may occupy before wrapping */
  maxWidthRatio: number;
  paddingX: number;
  paddingY: number;
  bottomMargin: number;
  strokeWidth: number;
  textColor: string;
  outlineColor: string;
  panelColor: string;
  /** 0..1 */
  panelOpacity: number;
  direction: TextDirection;
}
