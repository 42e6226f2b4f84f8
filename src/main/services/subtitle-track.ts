import type {
  LayoutOverflowWarning,
  SubtitleBlock,
  SubtitleSegment,
  SubtitleStyle,
  TranslationUnit,
} from '../../types/subtitles';
import { buildSubtitleBlock } from './block-renderer';
import type { GlyphMetricsProvider } from './fonts';
import { reconcileTranslation } from './reconciler';

export interface SubtitleTrack {
  /** translated text on the original timings */
  segments: SubtitleSegment[];
  /** one per segment with non-blank text, in segment order */
  blocks: SubtitleBlock[];
  warnings: LayoutOverflowWarning[];
  degraded: string[];
}

export interface BuildTrackOptions {
  provider: GlyphMetricsProvider;
  style: SubtitleStyle;
  /** video duration, used when the transcript carries no timing */
  duration?: number;
}

/**
 * Synchronous engine entry point: reconcile the translation onto the
 * transcript timings, then lay out and render one block per segment.
 */
export function buildSubtitleTrack(
  segments: readonly SubtitleSegment[],
  translation: TranslationUnit,
  options: BuildTrackOptions
): SubtitleTrack {
  const degraded: string[] = [];
  const translated = reconcileTranslation(segments, translation, {
    duration: options.duration,
    onDegraded: (message) => degraded.push(message),
  });

  return {
    segments: translated,
    degraded,
    ...renderSegments(translated, options.provider, options.style),
  };
}

export function renderSegments(
  segments: readonly SubtitleSegment[],
  provider: GlyphMetricsProvider,
  style: SubtitleStyle
): { blocks: SubtitleBlock[]; warnings: LayoutOverflowWarning[] } {
  const blocks: SubtitleBlock[] = [];
  const warnings: LayoutOverflowWarning[] = [];
  for (const segment of segments) {
    if (segment.text.trim().length === 0) continue;
    const rendered = buildSubtitleBlock(segment, provider, style);
    blocks.push(rendered.block);
    warnings.push(...rendered.warnings);
  }
  return { blocks, warnings };
}
