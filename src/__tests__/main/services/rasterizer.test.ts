import { describe, it, expect } from 'vitest';
import sharp from 'sharp';
import { renderBlock } from '../../../main/services/block-renderer';
import { blockToSvg, rasterizeBlock, type RasterStyle } from '../../../main/services/rasterizer';
import { FakeGlyphProvider } from '../../helpers/fakeGlyphProvider';

const provider = new FakeGlyphProvider(10, 20);

const style: RasterStyle = {
  canvasWidth: 320,
  canvasHeight: 180,
  strokeWidth: 2,
  textColor: '#ffffff',
  outlineColor: '#000000',
  panelColor: '#101010',
  panelOpacity: 0.6,
};

const block = renderBlock(
  { start: 0, end: 2, text: 'שלום' },
  [{ text: 'םולש', logicalText: 'שלום', width: 44, height: 24 }],
  { canvasWidth: 320, canvasHeight: 180, paddingX: 20, paddingY: 10, bottomMargin: 40 }
);

describe('rasterizer', () => {
  describe('blockToSvg', () => {
    it('should draw the panel and then each line with fill and outline', () => {
      // panel: 84x44 at ((320 - 84) / 2, 180 - 40 - 44) = (118, 96)
      // line: x = 118 + 20 + 2 = 140, baseline = 96 + 10 + (2 + 16) = 124
      expect(blockToSvg(block, provider, style)).toBe(
        [
          '<svg xmlns="http://www.w3.org/2000/svg" width="320" height="180">',
          '<rect x="118" y="96" width="84" height="44" fill="#101010" fill-opacity="0.6"/>',
          '<path d="M140 124h40" fill="#ffffff" stroke="#000000" stroke-width="4" stroke-linejoin="round" paint-order="stroke"/>',
          '</svg>',
        ].join('\n')
      );
    });

    it('should escape color values', () => {
      const svg = blockToSvg(block, provider, { ...style, panelColor: 'a"b' });
      expect(svg).toContain('fill="a&quot;b"');
    });
  });

  describe('rasterizeBlock', () => {
    it('should produce a canvas-sized PNG', async () => {
      const png = await rasterizeBlock(block, provider, style);
      const meta = await sharp(png).metadata();
      expect(meta.format).toBe('png');
      expect(meta.width).toBe(320);
      expect(meta.height).toBe(180);
    });
  });
});
