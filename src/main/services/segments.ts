import type { SubtitleSegment } from '../../types/subtitles';
import { SegmentTimingError } from './errors';

/**
 * Create a segment, enforcing start >= 0 and end > start.
 */
export function createSegment(start: number, end: number, text: string): SubtitleSegment {
  if (!Number.isFinite(start) || !Number.isFinite(end) || start < 0 || end <= start) {
    throw new SegmentTimingError(start, end);
  }
  return { start, end, text };
}

/**
 * Copy of `segment` with replaced text. Timings are never touched.
 */
export function withText(segment: SubtitleSegment, text: string): SubtitleSegment {
  return { start: segment.start, end: segment.end, text };
}

/**
 * Filter and offset raw segments to a window [start,end] and subtract 'start'.
 * Produces segments suitable for a trimmed clip that starts at 0.
 */
export function filterAndOffsetSegments(
  segments: readonly SubtitleSegment[],
  start: number,
  end: number
): SubtitleSegment[] {
  const out: SubtitleSegment[] = [];
  for (const seg of segments) {
    const overlapStart = Math.max(start, seg.start);
    const overlapEnd = Math.min(end, seg.end);
    if (overlapEnd <= overlapStart) continue;
    out.push({
      start: overlapStart - start,
      end: overlapEnd - start,
      text: seg.text,
    });
  }
  return out;
}
