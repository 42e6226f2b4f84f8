/**
 * Subtitle Block Renderer
 *
 * Turns wrapped lines into a positioned block: a background panel sized to
 * its content, lines stacked top to bottom and right-aligned inside it, and
 * the panel anchored bottom-center on the video canvas.
 *
 * GEOMETRY:
 * - panelWidth  = min(widest line + 2 * paddingX, canvasWidth)
 * - panelHeight = sum of line heights + paddingY above, between and below lines
 * - line x      = panelWidth - paddingX - lineWidth (independent of script direction)
 * - panel y     = canvasHeight - bottomMargin - panelHeight
 */

import type {
  Line,
  LayoutOverflowWarning,
  OverlayFrame,
  PositionedLine,
  SubtitleBlock,
  SubtitleSegment,
  SubtitleStyle,
} from '../../types/subtitles';
import { FontResolutionError } from './errors';
import type { GlyphMetricsProvider } from './fonts';
import { layoutText } from './layout';

export type BlockGeometry = Pick<
  SubtitleStyle,
  'canvasWidth' | 'canvasHeight' | 'paddingX' | 'paddingY' | 'bottomMargin'
>;

export function renderBlock(
  segment: SubtitleSegment,
  lines: readonly Line[],
  style: BlockGeometry
): SubtitleBlock {
  const { paddingX, paddingY } = style;
  const widest = lines.reduce((max, l) => Math.max(max, l.width), 0);
  const panelWidth = Math.min(widest + 2 * paddingX, style.canvasWidth);

  let y = paddingY;
  const positioned: PositionedLine[] = lines.map((line) => {
    const placed: PositionedLine = { ...line, x: panelWidth - paddingX - line.width, y };
    y += line.height + paddingY;
    return placed;
  });
  const panelHeight = y;

  return {
    lines: positioned,
    panelWidth,
    panelHeight,
    panelX: Math.round((style.canvasWidth - panelWidth) / 2),
    panelY: style.canvasHeight - style.bottomMargin - panelHeight,
    segment,
  };
}

/** Usable line width on the canvas once panel padding is taken off */
export function maxLineWidth(style: SubtitleStyle): number {
  return Math.floor(style.canvasWidth * style.maxWidthRatio) - 2 * style.paddingX;
}

/**
 * Lay out and render one segment.
 *
 * @throws FontResolutionError when the provider has no glyphs for the segment text
 */
export function buildSubtitleBlock(
  segment: SubtitleSegment,
  provider: GlyphMetricsProvider,
  style: SubtitleStyle
): { block: SubtitleBlock; warnings: LayoutOverflowWarning[] } {
  if (!provider.supports(segment.text)) {
    throw new FontResolutionError(`Font has no glyphs for subtitle text: "${segment.text}"`);
  }
  const { lines, warnings } = layoutText(segment.text, provider, {
    maxWidth: maxLineWidth(style),
    strokeWidth: style.strokeWidth,
    direction: style.direction,
  });
  return { block: renderBlock(segment, lines, style), warnings };
}

/**
 * Raster form of a rendered track: one overlay per block with the start time
 * and duration the compositor needs.
 */
export function toOverlaySequence(blocks: readonly SubtitleBlock[]): OverlayFrame[] {
  return blocks.map((block, i) => ({
    index: i + 1,
    start: block.segment.start,
    duration: block.segment.end - block.segment.start,
    block,
  }));
}
