/**
 * Text Reconciler
 *
 * Maps translated text back onto the original, time-coded segments. Timing is
 * always taken from the transcription; only text is substituted.
 *
 * Input shapes:
 * - segmented, same length: mapped 1:1 (the only exact alignment)
 * - segmented, different length: ReconciliationError (count-mismatch)
 * - full text: sentence-chunk heuristic, approximate by construction
 * - no segments at all: one segment spanning the supplied video duration
 */

import type { SubtitleSegment, TranslationUnit } from '../../types/subtitles';
import { ReconciliationError } from './errors';
import { createSegment, withText } from './segments';

export interface ReconcileOptions {
  /** Video duration in seconds; required when there are no segments */
  duration?: number;
  /** Called once per degraded-mode substitution, in addition to the warn log */
  onDegraded?: (message: string) => void;
}

const SENTENCE_CHUNK = /[^.!?]+[.!?]+|[^.!?]+$/g;

/**
 * Split a translated block into sentence-like chunks. The terminal punctuation
 * run stays with its chunk; a trailing unterminated tail becomes the last chunk.
 *
 * @example
 * splitSentences('Hello world. How are you? Fine!')
 * // ['Hello world.', 'How are you?', 'Fine!']
 */
export function splitSentences(text: string): string[] {
  const matches = text.match(SENTENCE_CHUNK) ?? [];
  return matches.map((c) => c.trim()).filter((c) => c.length > 0);
}

/**
 * Collapse a segmented translation into one block, for callers that fall back
 * to the whole-text heuristic after a count mismatch.
 */
export function fallbackToFullText(unit: TranslationUnit): TranslationUnit {
  if (unit.kind === 'full') return unit;
  return { kind: 'full', text: joinTexts(unit.texts) };
}

export function reconcileTranslation(
  segments: readonly SubtitleSegment[],
  unit: TranslationUnit,
  options: ReconcileOptions = {}
): SubtitleSegment[] {
  const fullText = unit.kind === 'full' ? unit.text : joinTexts(unit.texts);
  if (fullText.trim().length === 0) {
    throw ReconciliationError.emptyTranslation();
  }

  const degrade = (message: string) => {
    console.warn(`[RECONCILE] ${message}`);
    options.onDegraded?.(message);
  };

  if (segments.length === 0) {
    const duration = options.duration;
    if (duration === undefined || !(duration > 0)) {
      throw ReconciliationError.missingDuration();
    }
    degrade(`No segment timing; showing the whole translation for 0..${duration}s`);
    return [createSegment(0, duration, fullText.trim())];
  }

  if (unit.kind === 'segmented') {
    if (unit.texts.length !== segments.length) {
      throw ReconciliationError.countMismatch(segments.length, unit.texts.length);
    }
    return segments.map((seg, i) => withText(seg, unit.texts[i]));
  }

  const chunks = splitSentences(unit.text);
  return assignChunks(segments, chunks.length > 0 ? chunks : [unit.text.trim()], degrade);
}

function assignChunks(
  segments: readonly SubtitleSegment[],
  chunks: string[],
  degrade: (message: string) => void
): SubtitleSegment[] {
  const out: SubtitleSegment[] = [];
  let last = chunks[0];
  let repeated = 0;

  segments.forEach((seg, i) => {
    if (i < chunks.length) {
      last = chunks[i];
    } else {
      repeated++;
    }
    out.push(withText(seg, last));
  });

  if (repeated > 0) {
    degrade(
      `Only ${chunks.length} sentence chunk(s) for ${segments.length} segment(s); ` +
        `repeated the last chunk on ${repeated} segment(s)`
    );
  }

  if (chunks.length > segments.length) {
    const rest = chunks.slice(segments.length);
    const lastIdx = out.length - 1;
    out[lastIdx] = withText(out[lastIdx], [out[lastIdx].text, ...rest].join(' '));
    degrade(`${rest.length} surplus sentence chunk(s) appended to the last segment`);
  }

  return out;
}

function joinTexts(texts: readonly string[]): string {
  return texts
    .map((t) => t.trim())
    .filter((t) => t.length > 0)
    .join(' ');
}
