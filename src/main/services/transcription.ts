import OpenAI from 'openai';
import * as fs from 'fs';
import type { SubtitleSegment, TranscriptResult } from '../../types/subtitles';
import { CollaboratorError, errorMessage } from './errors';

export interface OpenAIConnection {
  apiKey?: string;
  /** OpenAI-compatible endpoint, e.g. https://api.groq.com/openai/v1 */
  baseURL?: string;
}

/**
 * Build the client handle shared by the transcription and translation adapters.
 * Created once by the entry point and passed in, never held as a module global.
 */
export function createOpenAIClient(conn: OpenAIConnection): OpenAI {
  if (!conn.apiKey) {
    throw new Error('OPENAI_API_KEY is not set');
  }
  return new OpenAI({ apiKey: conn.apiKey, baseURL: conn.baseURL || undefined });
}

export interface SpeechToText {
  transcribe(audioPath: string): Promise<TranscriptResult>;
}

export interface TranscriptionOptions {
  model: string;
  /** ISO-639-1 source language hint */
  language?: string;
}

const FALLBACK_MODEL = 'whisper-1';

/**
 * Transcribe audio through an OpenAI-compatible `audio/transcriptions` endpoint.
 * Returns segments with start/end timestamps and text when the model provides them.
 */
export class OpenAISpeechToText implements SpeechToText {
  constructor(
    private readonly client: OpenAI,
    private readonly options: TranscriptionOptions
  ) {}

  async transcribe(audioPath: string): Promise<TranscriptResult> {
    if (!fs.existsSync(audioPath)) {
      throw new CollaboratorError('transcription', `Audio file not found: ${audioPath}`);
    }

    const preferredModel = this.options.model;
    let resp: unknown;
    try {
      resp = await this.requestVerboseJson(audioPath, preferredModel);
    } catch (e) {
      const msg = errorMessage(e);
      console.warn('[TRANSCRIBE] Primary model failed:', msg);
      const isFormatIncompatible = /response_format\s+'verbose_json'\s+is\s+not\s+compatible/i.test(msg) || /400/.test(msg);
      if (!isFormatIncompatible || preferredModel === FALLBACK_MODEL) {
        throw new CollaboratorError('transcription', msg, e);
      }
      // Fall back to Whisper for timestamped segments
      console.log(`[TRANSCRIBE] Falling back to model='${FALLBACK_MODEL}' with response_format='verbose_json'`);
      try {
        resp = await this.requestVerboseJson(audioPath, FALLBACK_MODEL);
      } catch (fallbackError) {
        throw new CollaboratorError('transcription', errorMessage(fallbackError), fallbackError);
      }
    }

    const result = parseTranscriptionResponse(resp);
    if (result.segments.length === 0 && result.text.trim().length > 0) {
      console.warn('[TRANSCRIBE] No segments provided; only the untimed transcript is available');
    }
    return result;
  }

  private requestVerboseJson(audioPath: string, model: string): Promise<unknown> {
    console.log(`[TRANSCRIBE] Attempting model='${model}' with response_format='verbose_json'`);
    return this.client.audio.transcriptions.create({
      file: fs.createReadStream(audioPath),
      model,
      response_format: 'verbose_json',
      language: this.options.language,
    });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Map a verbose_json transcription response to a TranscriptResult. Segments with
 * unusable timing or blank text are dropped.
 */
export function parseTranscriptionResponse(resp: unknown): TranscriptResult {
  if (!isRecord(resp)) {
    throw new CollaboratorError('transcription', 'Malformed transcription response');
  }

  const segments: SubtitleSegment[] = [];
  if (Array.isArray(resp.segments)) {
    for (const s of resp.segments) {
      if (!isRecord(s)) continue;
      const start = Number(s.start);
      const end = Number(s.end);
      const text = String(s.text ?? '').trim();
      if (!text) continue;
      if (!Number.isFinite(start) || !Number.isFinite(end) || start < 0 || end <= start) {
        console.warn(`[TRANSCRIBE] Dropping segment with unusable timing (start=${s.start}, end=${s.end}):`, text);
        continue;
      }
      segments.push({ start, end, text });
    }
  }

  const text = typeof resp.text === 'string' ? resp.text.trim() : segments.map((s) => s.text).join(' ');
  const language = typeof resp.language === 'string' ? resp.language : undefined;
  return { text, segments, language };
}
