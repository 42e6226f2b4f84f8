import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { handleSubtitleVideo, type SubtitleVideoDeps } from '../../../main/handlers/subtitle-video-handler';
import { loadConfig } from '../../../main/config';
import type { MediaToolkit } from '../../../main/services/ffmpeg';
import type { SpeechToText } from '../../../main/services/transcription';
import type { Translator, TranslationRequest } from '../../../main/services/translation';
import type { BurnInStyle, OverlayImage, VideoMetadata } from '../../../types/media';
import { isPipelineError, type PipelineProgressEvent } from '../../../types/pipeline';
import type { TranscriptResult, TranslationUnit } from '../../../types/subtitles';
import { FakeGlyphProvider } from '../../helpers/fakeGlyphProvider';

/** In-process stand-in for ffmpeg that records what it was asked to do */
class FakeMediaToolkit implements MediaToolkit {
  extractedTo: string | null = null;
  burned: { srtContent: string; outputPath: string; style: BurnInStyle } | null = null;
  composited: { overlays: OverlayImage[]; allExist: boolean; outputPath: string } | null = null;

  constructor(private readonly meta: VideoMetadata) {}

  async probe(): Promise<VideoMetadata> {
    return this.meta;
  }

  async extractAudio(_videoPath: string, outputPath: string): Promise<void> {
    this.extractedTo = outputPath;
    fs.writeFileSync(outputPath, 'audio');
  }

  async burnSubtitles(_videoPath: string, srtPath: string, outputPath: string, style: BurnInStyle): Promise<void> {
    this.burned = { srtContent: fs.readFileSync(srtPath, 'utf8'), outputPath, style };
  }

  async compositeOverlays(_videoPath: string, overlays: readonly OverlayImage[], outputPath: string): Promise<void> {
    this.composited = {
      overlays: [...overlays],
      allExist: overlays.every((o) => fs.existsSync(o.path)),
      outputPath,
    };
  }
}

class FakeSpeech implements SpeechToText {
  constructor(private readonly result: TranscriptResult) {}

  async transcribe(): Promise<TranscriptResult> {
    return this.result;
  }
}

class FakeTranslator implements Translator {
  requests: TranslationRequest[] = [];

  constructor(private readonly unit: TranslationUnit) {}

  async translate(request: TranslationRequest): Promise<TranslationUnit> {
    this.requests.push(request);
    return this.unit;
  }
}

const transcript: TranscriptResult = {
  text: 'Hi. Bye.',
  segments: [
    { start: 0, end: 2, text: 'Hi.' },
    { start: 2, end: 4, text: 'Bye.' },
  ],
};

describe('handleSubtitleVideo', () => {
  let tempRoot: string;
  let videoPath: string;

  beforeEach(() => {
    tempRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'subburn-handler-'));
    videoPath = path.join(tempRoot, 'input.mp4');
    fs.writeFileSync(videoPath, 'video');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(tempRoot, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  function makeDeps(
    overrides: { meta?: Partial<VideoMetadata>; transcript?: TranscriptResult; unit?: TranslationUnit; env?: Record<string, string> } = {}
  ) {
    const media = new FakeMediaToolkit({ duration: 4, width: 1280, height: 720, size: 1000, ...overrides.meta });
    const translator = new FakeTranslator(overrides.unit ?? { kind: 'segmented', texts: ['שלום', 'להתראות'] });
    const rasterize = vi.fn(async () => Buffer.from('png'));
    const deps: SubtitleVideoDeps = {
      media,
      speech: new FakeSpeech(overrides.transcript ?? transcript),
      translator,
      provider: new FakeGlyphProvider(10, 20),
      config: loadConfig(overrides.env ?? {}),
      rasterize,
      tempRoot,
    };
    return { deps, media, translator, rasterize };
  }

  function request(mode?: 'srt' | 'overlay') {
    return { jobId: 'job1', videoPath, outputPath: path.join(tempRoot, 'out.mp4'), mode };
  }

  function jobTempDirs(): string[] {
    return fs.readdirSync(tempRoot).filter((name) => name.startsWith('subburn-job1-'));
  }

  it('should composite one overlay per segment in overlay mode', async () => {
    const { deps, media, translator, rasterize } = makeDeps();
    const events: PipelineProgressEvent[] = [];

    const result = await handleSubtitleVideo(request('overlay'), deps, (e) => events.push(e));

    expect(isPipelineError(result)).toBe(false);
    if (isPipelineError(result)) return;
    expect(result.mode).toBe('overlay');
    expect(result.segmentCount).toBe(2);
    expect(result.originalExcerpt).toBe('Hi. Bye.');
    expect(result.degraded).toEqual([]);

    expect(translator.requests).toEqual([{ text: 'Hi. Bye.', segments: ['Hi.', 'Bye.'] }]);
    expect(rasterize).toHaveBeenCalledTimes(2);
    expect(media.composited?.allExist).toBe(true);
    expect(media.composited?.overlays.map((o) => [path.basename(o.path), o.start, o.duration])).toEqual([
      ['overlay-0001.png', 0, 2],
      ['overlay-0002.png', 2, 2],
    ]);
    expect(media.composited?.outputPath).toBe(path.join(tempRoot, 'out.mp4'));

    expect(events.map((e) => e.phase)).toEqual([
      'probing',
      'extracting_audio',
      'transcribing',
      'translating',
      'rendering',
      'encoding',
      'complete',
    ]);
    expect(events.every((e) => e.jobId === 'job1')).toBe(true);
  });

  it('should burn an SRT file in srt mode', async () => {
    const { deps, media } = makeDeps();

    const result = await handleSubtitleVideo(request('srt'), deps);

    expect(isPipelineError(result)).toBe(false);
    expect(media.burned?.srtContent).toBe(
      '1\n00:00:00,000 --> 00:00:02,000\nשלום\n\n2\n00:00:02,000 --> 00:00:04,000\nלהתראות\n'
    );
    expect(media.burned?.style.fontName).toBe('Noto Sans Hebrew');
    expect(media.composited).toBeNull();
  });

  it('should remove its temp directory when done', async () => {
    const { deps, media } = makeDeps();
    await handleSubtitleVideo(request(), deps);
    expect(media.extractedTo).not.toBeNull();
    expect(jobTempDirs()).toEqual([]);
  });

  it('should reject videos over the duration limit before extracting audio', async () => {
    const { deps, media } = makeDeps({ meta: { duration: 301 } });

    const result = await handleSubtitleVideo(request(), deps);

    expect(result).toEqual({ success: false, error: 'Video is too long: 301s (limit 300s)' });
    expect(media.extractedTo).toBeNull();
  });

  it('should fail with empty-transcript when nothing was recognised', async () => {
    const { deps } = makeDeps({ transcript: { text: '  ', segments: [] } });
    const events: PipelineProgressEvent[] = [];

    const result = await handleSubtitleVideo(request(), deps, (e) => events.push(e));

    expect(result).toMatchObject({ success: false, error: 'Subtitle generation failed', code: 'empty-transcript' });
    expect(events[events.length - 1]).toEqual({
      jobId: 'job1',
      phase: 'error',
      errorMessage: 'Transcription yielded no usable text',
    });
    expect(jobTempDirs()).toEqual([]);
  });

  it('should fall back to whole-text alignment on a count mismatch', async () => {
    const { deps, media } = makeDeps({ unit: { kind: 'segmented', texts: ['שלום. להתראות.'] } });

    const result = await handleSubtitleVideo(request('srt'), deps);

    expect(isPipelineError(result)).toBe(false);
    if (isPipelineError(result)) return;
    expect(result.degraded).toEqual([
      'Translated segment count mismatch: expected 2, got 1; falling back to whole-text alignment',
    ]);
    expect(media.burned?.srtContent).toBe(
      '1\n00:00:00,000 --> 00:00:02,000\nשלום.\n\n2\n00:00:02,000 --> 00:00:04,000\nלהתראות.\n'
    );
  });

  it('should report a count mismatch when fallback is disabled', async () => {
    const { deps } = makeDeps({
      unit: { kind: 'segmented', texts: ['שלום'] },
      env: { SUBBURN_FALLBACK_ON_MISMATCH: 'false' },
    });

    const result = await handleSubtitleVideo(request(), deps);

    expect(result).toMatchObject({ success: false, code: 'count-mismatch' });
  });

  it('should show the whole translation for the video duration when there is no timing', async () => {
    const { deps, media, translator } = makeDeps({
      meta: { duration: 7.5 },
      transcript: { text: 'Hello there', segments: [] },
      unit: { kind: 'full', text: 'שלום לך' },
    });

    const result = await handleSubtitleVideo(request('srt'), deps);

    expect(isPipelineError(result)).toBe(false);
    expect(translator.requests).toEqual([{ text: 'Hello there', segments: undefined }]);
    expect(media.burned?.srtContent).toBe('1\n00:00:00,000 --> 00:00:07,500\nשלום לך\n');
  });

  it('should validate the request', async () => {
    const { deps } = makeDeps();
    const result = await handleSubtitleVideo(
      { jobId: 'job1', videoPath: path.join(tempRoot, 'missing.mp4'), outputPath: 'out.mp4' },
      deps
    );
    expect(result).toEqual({ success: false, error: 'Invalid or missing videoPath' });
  });

  it.each(['../escape', 'nested/job', 'win\\job'])('should reject jobId %s that would leave the temp root', async (jobId) => {
    const { deps, media } = makeDeps();
    const result = await handleSubtitleVideo({ ...request(), jobId }, deps);
    expect(result).toEqual({ success: false, error: 'Invalid jobId' });
    expect(media.extractedTo).toBeNull();
  });
});
