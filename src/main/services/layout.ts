import type { Line, LayoutOverflowWarning, LayoutResult, TextDirection } from '../../types/subtitles';
import { toVisualOrder } from './bidi';
import type { GlyphMetricsProvider } from './fonts';

export interface LayoutOptions {
  /** widest a line may measure, in pixels */
  maxWidth: number;
  strokeWidth: number;
  direction?: TextDirection;
}

/**
 * Greedy word wrap measured on the visual rendering of each candidate line.
 *
 * Words are added in logical order; after each addition the candidate is
 * reordered for display and measured. When it no longer fits, the previous
 * rendering is emitted and the overflowing word opens the next line. Words are
 * never split: a single word wider than `maxWidth` becomes its own line and a
 * LayoutOverflowWarning is recorded.
 */
export function layoutText(
  text: string,
  provider: GlyphMetricsProvider,
  options: LayoutOptions
): LayoutResult {
  const { maxWidth, strokeWidth } = options;
  const direction = options.direction ?? 'auto';
  const words = text.split(/\s+/).filter((w) => w.length > 0);

  const lines: Line[] = [];
  const warnings: LayoutOverflowWarning[] = [];

  const render = (logicalText: string): Line => {
    const visual = toVisualOrder(logicalText, direction);
    const box = provider.measure(visual, strokeWidth);
    return { text: visual, logicalText, width: box.width, height: box.height };
  };

  const emit = (line: Line, wordCount: number) => {
    if (wordCount === 1 && line.width > maxWidth) {
      const warning: LayoutOverflowWarning = {
        kind: 'layout-overflow',
        word: line.logicalText,
        width: line.width,
        maxWidth,
      };
      console.warn(`[LAYOUT] Word wider than ${maxWidth}px kept on its own line:`, line.logicalText);
      warnings.push(warning);
    }
    lines.push(line);
  };

  let current: string[] = [];
  let currentLine: Line | null = null;

  for (const word of words) {
    const candidate = render([...current, word].join(' '));
    if (currentLine !== null && candidate.width > maxWidth) {
      emit(currentLine, current.length);
      current = [word];
      currentLine = render(word);
    } else {
      current.push(word);
      currentLine = candidate;
    }
  }

  if (currentLine !== null) {
    emit(currentLine, current.length);
  }

  return { lines, warnings };
}
