import bidiFactory from 'bidi-js';
import type { TextDirection } from '../../types/subtitles';

const bidi = bidiFactory();

const COMBINING_MARK = /\p{M}/u;

/**
 * Reorder a logical-order string into the left-to-right glyph sequence a
 * renderer draws. Right-to-left runs are reversed as whole runs, mirrored
 * characters (brackets, etc.) are swapped, and embedded left-to-right runs
 * keep their own character order. Combining marks (niqqud, etc.) stay after
 * the base letter they belong to.
 *
 * @param direction paragraph direction; 'auto' takes the first strong character
 */
export function toVisualOrder(text: string, direction: TextDirection = 'auto'): string {
  if (text.length === 0) return text;

  const embedding = bidi.getEmbeddingLevels(text, direction === 'auto' ? undefined : direction);
  const chars = text.split('');
  // logical index of the character at each visual position
  const order = chars.map((_, i) => i);

  bidi.getMirroredCharactersMap(text, embedding).forEach((mirror, index) => {
    chars[index] = mirror;
  });

  for (const [start, end] of bidi.getReorderSegments(text, embedding)) {
    const run = chars.slice(start, end + 1).reverse();
    chars.splice(start, run.length, ...run);
    const indices = order.slice(start, end + 1).reverse();
    order.splice(start, indices.length, ...indices);
  }

  return moveMarksAfterBase(chars, order, embedding.levels);
}

/**
 * Reversing a right-to-left run puts each combining mark in front of its
 * base letter. Move every such run of marks back behind the base that now
 * follows it, in logical order.
 */
function moveMarksAfterBase(chars: string[], order: number[], levels: Uint8Array): string {
  const isReversedMark = (i: number) => COMBINING_MARK.test(chars[i]) && (levels[order[i]] & 1) === 1;

  const out: string[] = [];
  let i = 0;
  while (i < chars.length) {
    if (!isReversedMark(i)) {
      out.push(chars[i]);
      i++;
      continue;
    }
    let j = i;
    while (j < chars.length && isReversedMark(j)) j++;
    if (j === chars.length) {
      out.push(...chars.slice(i));
      break;
    }
    out.push(chars[j], ...chars.slice(i, j).reverse());
    i = j + 1;
  }
  return out.join('');
}
