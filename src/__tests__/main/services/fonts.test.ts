import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as opentype from 'opentype.js';
import { OpentypeGlyphProvider, defaultFontCandidates, resolveGlyphProvider } from '../../../main/services/fonts';
import { FontResolutionError } from '../../../main/services/errors';
import { buildSubtitleBlock } from '../../../main/services/block-renderer';
import { layoutText } from '../../../main/services/layout';
import type { SubtitleStyle } from '../../../types/subtitles';

function box(width: number): opentype.Path {
  const p = new opentype.Path();
  p.moveTo(0, 0);
  p.lineTo(width, 0);
  p.lineTo(width, 700);
  p.lineTo(0, 700);
  p.close();
  return p;
}

/** 1024 units per em, so at 32px every unit is exactly 1/32 px */
function makeFont(): opentype.Font {
  return new opentype.Font({
    familyName: 'Subburn Test',
    styleName: 'Regular',
    unitsPerEm: 1024,
    ascender: 800,
    descender: -224,
    glyphs: [
      new opentype.Glyph({ name: '.notdef', advanceWidth: 512, path: new opentype.Path() }),
      new opentype.Glyph({ name: 'space', unicode: 32, advanceWidth: 256, path: new opentype.Path() }),
      new opentype.Glyph({ name: 'a', unicode: 97, advanceWidth: 512, path: box(448) }),
      new opentype.Glyph({ name: 'b', unicode: 98, advanceWidth: 640, path: box(576) }),
      new opentype.Glyph({ name: 'alef', unicode: 0x05d0, advanceWidth: 512, path: box(448) }),
    ],
  });
}

describe('fonts', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'subburn-fonts-'));
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('resolveGlyphProvider', () => {
    it('should fail with every tried candidate when none exist', () => {
      const candidates = [path.join(tmpDir, 'missing-a.ttf'), path.join(tmpDir, 'missing-b.ttf')];
      let caught: unknown;
      try {
        resolveGlyphProvider(candidates, { fontSize: 32, sample: 'אבג' });
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(FontResolutionError);
      if (!(caught instanceof FontResolutionError)) return;
      expect(caught.candidates).toEqual(candidates);
      expect(caught.code).toBe('font-resolution');
    });

    it('should skip files that are not fonts', () => {
      const bogus = path.join(tmpDir, 'bogus.ttf');
      fs.writeFileSync(bogus, 'not a font');
      expect(() => resolveGlyphProvider([bogus], { fontSize: 32, sample: 'אבג' })).toThrow(FontResolutionError);
      expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it('should fail for an empty candidate list', () => {
      expect(() => resolveGlyphProvider([], { fontSize: 32, sample: 'a' })).toThrow(
        'No font supporting "a" found among 0 candidate(s)'
      );
    });
  });

  describe('OpentypeGlyphProvider', () => {
    const provider = new OpentypeGlyphProvider(makeFont(), 32, 'memory');

    it('should measure advance width plus stroke on both sides', () => {
      // a = 16px, b = 20px
      expect(provider.measure('ab', 2)).toEqual({ width: 40, height: 36 });
      expect(provider.measure('ab ab', 0)).toEqual({ width: 80, height: 32 });
    });

    it('should size line boxes from ascender and descender', () => {
      expect(provider.lineHeight(0)).toBe(32);
      expect(provider.lineHeight(3)).toBe(38);
      expect(provider.baselineOffset(2)).toBe(27);
    });

    it('should only support characters the font has glyphs for', () => {
      expect(provider.supports('ab a\u05D0')).toBe(true);
      expect(provider.supports('abc')).toBe(false);
      expect(provider.supports('\u05D1')).toBe(false);
    });

    it('should draw outlines as SVG path data', () => {
      const d = provider.pathData('a', 0, 27);
      expect(d.startsWith('M')).toBe(true);
      expect(d).toContain('Z');
    });

    it('should wrap on real metrics and give the same lines when relaid', () => {
      const options = { maxWidth: 90, strokeWidth: 2, direction: 'ltr' as const };
      const { lines, warnings } = layoutText('ab ab ab', provider, options);
      expect(lines).toEqual([
        { text: 'ab ab', logicalText: 'ab ab', width: 84, height: 36 },
        { text: 'ab', logicalText: 'ab', width: 40, height: 36 },
      ]);
      expect(warnings).toEqual([]);
      for (const line of lines) {
        expect(line.width).toBeLessThanOrEqual(options.maxWidth);
        expect(layoutText(line.logicalText, provider, options).lines).toEqual([line]);
      }
    });

    describe('buildSubtitleBlock', () => {
      const style: SubtitleStyle = {
        canvasWidth: 200,
        canvasHeight: 200,
        maxWidthRatio: 0.5,
        paddingX: 5,
        paddingY: 4,
        bottomMargin: 10,
        strokeWidth: 2,
        textColor: '#ffffff',
        outlineColor: '#000000',
        panelColor: '#000000',
        panelOpacity: 0.6,
        direction: 'ltr',
      };

      it('should place lines measured by the font', () => {
        const { block } = buildSubtitleBlock({ start: 0, end: 1, text: 'ab ab ab' }, provider, style);
        expect(block.lines.map((l) => [l.text, l.x, l.y])).toEqual([
          ['ab ab', 5, 4],
          ['ab', 49, 44],
        ]);
        expect(block).toMatchObject({ panelWidth: 94, panelHeight: 84, panelX: 53, panelY: 106 });
      });

      it('should refuse text the font cannot draw', () => {
        expect(() => buildSubtitleBlock({ start: 0, end: 1, text: 'abc' }, provider, style)).toThrow(
          FontResolutionError
        );
      });
    });
  });

  describe('defaultFontCandidates', () => {
    it('should try the bundled font first', () => {
      const candidates = defaultFontCandidates('/opt/subburn');
      expect(candidates[0]).toBe(path.join('/opt/subburn', 'assets', 'fonts', 'NotoSansHebrew-Regular.ttf'));
      expect(candidates).toContain('/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf');
    });
  });
});
