/**
 * Rasterizer
 *
 * Draws a SubtitleBlock onto a transparent, canvas-sized PNG: a semi-opaque
 * panel underneath, then each line as filled glyph outlines with a
 * contrasting stroke. The block is described as SVG and rendered by sharp.
 */

import sharp from 'sharp';
import type { SubtitleBlock, SubtitleStyle } from '../../types/subtitles';
import { CollaboratorError } from './errors';
import type { GlyphMetricsProvider } from './fonts';

export type RasterStyle = Pick<
  SubtitleStyle,
  'canvasWidth' | 'canvasHeight' | 'strokeWidth' | 'textColor' | 'outlineColor' | 'panelColor' | 'panelOpacity'
>;

export function blockToSvg(
  block: SubtitleBlock,
  provider: GlyphMetricsProvider,
  style: RasterStyle
): string {
  const { strokeWidth } = style;
  const parts: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${style.canvasWidth}" height="${style.canvasHeight}">`,
    `<rect x="${block.panelX}" y="${block.panelY}" width="${block.panelWidth}" height="${block.panelHeight}" ` +
      `fill="${escapeXml(style.panelColor)}" fill-opacity="${style.panelOpacity}"/>`,
  ];

  for (const line of block.lines) {
    // measured width includes the stroke on both sides, so the glyphs start one stroke in
    const x = block.panelX + line.x + strokeWidth;
    const baseline = block.panelY + line.y + provider.baselineOffset(strokeWidth);
    const d = provider.pathData(line.text, x, baseline);
    parts.push(
      `<path d="${d}" fill="${escapeXml(style.textColor)}" stroke="${escapeXml(style.outlineColor)}" ` +
        `stroke-width="${strokeWidth * 2}" stroke-linejoin="round" paint-order="stroke"/>`
    );
  }

  parts.push('</svg>');
  return parts.join('\n');
}

/**
 * Render a block to PNG bytes.
 *
 * @throws CollaboratorError if sharp cannot render the SVG
 */
export async function rasterizeBlock(
  block: SubtitleBlock,
  provider: GlyphMetricsProvider,
  style: RasterStyle
): Promise<Buffer> {
  const svg = blockToSvg(block, provider, style);
  try {
    return await sharp(Buffer.from(svg)).png().toBuffer();
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new CollaboratorError('rasterizer', `Failed to rasterize subtitle ${block.segment.start}s: ${msg}`, e);
  }
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
