/**
 * Glyph Metrics / Font Provider
 *
 * Measures strings and produces glyph outlines for the layout engine and the
 * rasterizer. Font files are resolved once at startup from an ordered list of
 * candidate paths (bundled resource first, then OS locations) and the chosen
 * provider is passed into the engine.
 *
 * DEPENDENCIES:
 * - opentype.js: parses TrueType/OpenType files and exposes advance widths and outlines
 *
 * MEASUREMENT:
 * - Width is the advance width of the string plus the outline stroke on both sides
 * - Height is the font's ascender-to-descender extent plus the stroke on both sides
 * - Read-only after construction; safe to call from any number of render passes
 */

import * as fs from 'fs';
import * as path from 'path';
import * as opentype from 'opentype.js';
import type { TextBox } from '../../types/subtitles';
import { FontResolutionError, errorMessage } from './errors';

export interface GlyphMetricsProvider {
  /** Bounding box of `text` (already in visual order) including stroke inflation */
  measure(text: string, strokeWidth: number): TextBox;
  /** Height of one line box, independent of its content */
  lineHeight(strokeWidth: number): number;
  /** Distance from the top of a line box to its baseline */
  baselineOffset(strokeWidth: number): number;
  /** Whether every non-whitespace character has a glyph */
  supports(text: string): boolean;
  /** SVG path data of `text` drawn left-to-right with its baseline at `baseline` */
  pathData(text: string, x: number, baseline: number): string;
}

const RENDER_OPTIONS: opentype.RenderOptions = { kerning: true };

export class OpentypeGlyphProvider implements GlyphMetricsProvider {
  constructor(
    private readonly font: opentype.Font,
    readonly fontSize: number,
    /** file the font was loaded from */
    readonly source: string
  ) {}

  private get scale(): number {
    return this.fontSize / this.font.unitsPerEm;
  }

  measure(text: string, strokeWidth: number): TextBox {
    const advance = this.font.getAdvanceWidth(text, this.fontSize, RENDER_OPTIONS);
    return {
      width: Math.ceil(advance + 2 * strokeWidth),
      height: this.lineHeight(strokeWidth),
    };
  }

  lineHeight(strokeWidth: number): number {
    return Math.ceil((this.font.ascender - this.font.descender) * this.scale + 2 * strokeWidth);
  }

  baselineOffset(strokeWidth: number): number {
    return strokeWidth + this.font.ascender * this.scale;
  }

  supports(text: string): boolean {
    for (const ch of text) {
      if (/\s/.test(ch)) continue;
      // glyph 0 is .notdef, drawn as an empty box; fonts without a cmap report no index at all
      if (!this.font.charToGlyphIndex(ch)) return false;
    }
    return true;
  }

  pathData(text: string, x: number, baseline: number): string {
    return this.font.getPath(text, x, baseline, this.fontSize, RENDER_OPTIONS).toPathData(2);
  }
}

export function loadFont(fontPath: string): opentype.Font {
  const buf = fs.readFileSync(fontPath);
  return opentype.parse(buf.buffer.slice(buf.byteOffset, buf.byteOffset + buf.byteLength));
}

export interface ResolveFontOptions {
  /** pixel size glyphs are measured and drawn at */
  fontSize: number;
  /** characters the chosen font must cover (e.g., a few letters of the target script) */
  sample: string;
}

/**
 * Walk `candidates` in order and return a provider for the first font file that
 * exists, parses, and covers `sample`.
 *
 * @throws FontResolutionError listing every candidate that was tried
 */
export function resolveGlyphProvider(
  candidates: readonly string[],
  options: ResolveFontOptions
): OpentypeGlyphProvider {
  const tried: string[] = [];
  for (const candidate of candidates) {
    tried.push(candidate);
    if (!fs.existsSync(candidate)) continue;

    let font: opentype.Font;
    try {
      font = loadFont(candidate);
    } catch (e) {
      console.warn(`[FONTS] Could not parse ${candidate}:`, errorMessage(e));
      continue;
    }

    const provider = new OpentypeGlyphProvider(font, options.fontSize, candidate);
    if (!provider.supports(options.sample)) {
      console.warn(`[FONTS] ${candidate} has no glyphs for "${options.sample}"`);
      continue;
    }

    console.log('[FONTS] Using font:', candidate);
    return provider;
  }

  throw new FontResolutionError(
    `No font supporting "${options.sample}" found among ${tried.length} candidate(s)`,
    tried
  );
}

/**
 * Fallback order: bundled resource, then common OS locations.
 */
export function defaultFontCandidates(baseDir: string = process.cwd()): string[] {
  return [
    path.join(baseDir, 'assets', 'fonts', 'NotoSansHebrew-Regular.ttf'),
    '/usr/share/fonts/truetype/noto/NotoSansHebrew-Regular.ttf',
    '/usr/share/fonts/opentype/noto/NotoSansHebrew-Regular.otf',
    '/usr/share/fonts/noto/NotoSansHebrew-Regular.ttf',
    '/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf',
    '/Library/Fonts/Arial Unicode.ttf',
    '/System/Library/Fonts/Supplemental/Arial Unicode.ttf',
    'C:\\Windows\\Fonts\\arial.ttf',
  ];
}
