/**
 * Typed errors raised by the subtitle engine and its collaborators.
 * Handlers map them to PipelineErrorResponse via `code`.
 */

export type SubtitleErrorCode =
  | 'count-mismatch'
  | 'missing-duration'
  | 'empty-translation'
  | 'font-resolution'
  | 'empty-transcript'
  | 'segment-timing'
  | 'collaborator';

export class SubtitleEngineError extends Error {
  readonly code: SubtitleErrorCode;

  constructor(code: SubtitleErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SubtitleEngineError';
    this.code = code;
  }
}

export type ReconciliationErrorKind = 'count-mismatch' | 'missing-duration' | 'empty-translation';

export class ReconciliationError extends SubtitleEngineError {
  readonly kind: ReconciliationErrorKind;
  readonly expected?: number;
  readonly got?: number;

  private constructor(kind: ReconciliationErrorKind, message: string, expected?: number, got?: number) {
    super(kind, message);
    this.name = 'ReconciliationError';
    this.kind = kind;
    this.expected = expected;
    this.got = got;
  }

  static countMismatch(expected: number, got: number): ReconciliationError {
    return new ReconciliationError(
      'count-mismatch',
      `Translated segment count mismatch: expected ${expected}, got ${got}`,
      expected,
      got
    );
  }

  static missingDuration(): ReconciliationError {
    return new ReconciliationError(
      'missing-duration',
      'No segment timing available and no positive video duration was supplied'
    );
  }

  static emptyTranslation(): ReconciliationError {
    return new ReconciliationError('empty-translation', 'Translation yielded no usable text');
  }
}

export class FontResolutionError extends SubtitleEngineError {
  /** font files that were tried, in resolution order */
  readonly candidates: string[];

  constructor(message: string, candidates: string[] = []) {
    super('font-resolution', message);
    this.name = 'FontResolutionError';
    this.candidates = candidates;
  }
}

export class EmptyTranscriptError extends SubtitleEngineError {
  constructor(message = 'Transcription yielded no usable text') {
    super('empty-transcript', message);
    this.name = 'EmptyTranscriptError';
  }
}

export class SegmentTimingError extends SubtitleEngineError {
  constructor(start: number, end: number) {
    super('segment-timing', `Invalid segment timing: start=${start}, end=${end}`);
    this.name = 'SegmentTimingError';
  }
}

export type CollaboratorName = 'transcription' | 'translation' | 'ffmpeg' | 'ffprobe' | 'rasterizer';

/**
 * Failure of an external service or tool. Never retried inside the engine.
 */
export class CollaboratorError extends SubtitleEngineError {
  readonly collaborator: CollaboratorName;

  constructor(collaborator: CollaboratorName, message: string, cause?: unknown) {
    super('collaborator', `[${collaborator}] ${message}`, { cause });
    this.name = 'CollaboratorError';
    this.collaborator = collaborator;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
