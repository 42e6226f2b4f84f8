import * as fs from 'fs';
import * as path from 'path';
import type { SubtitleBlock, SubtitleSegment } from '../../types/subtitles';

/**
 * Convert seconds to SRT timestamp (HH:MM:SS,mmm).
 * Milliseconds are truncated, not rounded; hours widen past two digits.
 */
export function formatTime(sec: number): string {
  // the epsilon keeps values like 1.001 (1000.9999… ms in floating point) from losing a millisecond
  const ms = Math.max(0, Math.floor(sec * 1000 + 1e-6));
  const h = Math.floor(ms / 3600000);
  const m = Math.floor((ms % 3600000) / 60000);
  const s = Math.floor((ms % 60000) / 1000);
  const mm = ms % 1000;
  const pad = (n: number, w = 2) => String(n).padStart(w, '0');
  return `${pad(h)}:${pad(m)}:${pad(s)},${pad(mm, 3)}`;
}

/**
 * Render segments as SRT text. Entries with blank text are skipped and the
 * index stays sequential. Output ends with a single newline.
 */
export function segmentsToSrt(segments: readonly SubtitleSegment[]): string {
  const lines: string[] = [];
  let idx = 1;
  for (const seg of segments) {
    const text = seg.text.trim();
    if (!text) continue;
    lines.push(String(idx++));
    lines.push(`${formatTime(seg.start)} --> ${formatTime(seg.end)}`);
    lines.push(text);
    lines.push('');
  }
  return lines.join('\n');
}

/**
 * SRT form of a rendered track. Uses each block's segment, so it is byte-identical
 * to `segmentsToSrt` over the same segments.
 */
export function toSrt(blocks: readonly SubtitleBlock[]): string {
  return segmentsToSrt(blocks.map((b) => b.segment));
}

/**
 * Write SRT content to outputPath, creating the directory if needed
 */
export async function writeSRTFile(content: string, outputPath: string): Promise<void> {
  const outDir = path.dirname(outputPath);
  if (!fs.existsSync(outDir)) {
    fs.mkdirSync(outDir, { recursive: true });
  }
  await fs.promises.writeFile(outputPath, content, 'utf8');
}
