/**
 * Runtime configuration
 *
 * Read once from the environment (populated from .env by dotenv in the entry
 * point) and passed down explicitly. Invalid numeric values fail at startup.
 */

import type { BurnInStyle } from '../types/media';
import type { OutputMode } from '../types/pipeline';
import type { SubtitleStyle, TextDirection } from '../types/subtitles';
import { defaultFontCandidates } from './services/fonts';

export interface AppConfig {
  apiKey?: string;
  baseURL?: string;
  transcribeModel: string;
  translateModel: string;
  sourceLanguage: string;
  targetLanguage: string;
  ffmpegPath?: string;
  /** ordered font file candidates, resolved once at startup */
  fontPaths: string[];
  fontSize: number;
  /** characters the resolved font must cover */
  fontSample: string;
  /** longest accepted input video, in seconds */
  maxDuration: number;
  outputMode: OutputMode;
  /** canvas dimensions come from the probed video; everything else from here */
  style: Omit<SubtitleStyle, 'canvasWidth' | 'canvasHeight'>;
  burnIn: BurnInStyle;
  /** retry a count-mismatched segmented translation with the whole-text heuristic */
  fallbackOnCountMismatch: boolean;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${key} must be a non-negative number, got '${raw}'`);
  }
  return value;
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key];
  return raw === undefined || raw.trim() === '' ? fallback : raw.trim();
}

function readOptional(env: Env, key: string): string | undefined {
  const raw = env[key];
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}

function readOutputMode(env: Env): OutputMode {
  const raw = readString(env, 'SUBBURN_OUTPUT_MODE', 'overlay');
  if (raw !== 'srt' && raw !== 'overlay') {
    throw new Error(`SUBBURN_OUTPUT_MODE must be 'srt' or 'overlay', got '${raw}'`);
  }
  return raw;
}

function readDirection(env: Env): TextDirection {
  const raw = readString(env, 'SUBBURN_TEXT_DIRECTION', 'rtl');
  if (raw !== 'ltr' && raw !== 'rtl' && raw !== 'auto') {
    throw new Error(`SUBBURN_TEXT_DIRECTION must be 'ltr', 'rtl' or 'auto', got '${raw}'`);
  }
  return raw;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const fontPathList = readOptional(env, 'SUBBURN_FONT_PATHS');
  const fontSize = readNumber(env, 'SUBBURN_FONT_SIZE', 36);

  const panelOpacity = readNumber(env, 'SUBBURN_PANEL_OPACITY', 0.6);
  if (panelOpacity > 1) {
    throw new Error(`SUBBURN_PANEL_OPACITY must be between 0 and 1, got '${panelOpacity}'`);
  }
  const maxWidthRatio = readNumber(env, 'SUBBURN_MAX_WIDTH_RATIO', 0.9);
  if (maxWidthRatio <= 0 || maxWidthRatio > 1) {
    throw new Error(`SUBBURN_MAX_WIDTH_RATIO must be in (0, 1], got '${maxWidthRatio}'`);
  }

  return {
    apiKey: readOptional(env, 'OPENAI_API_KEY') ?? readOptional(env, 'GROQ_API_KEY'),
    baseURL: readOptional(env, 'OPENAI_BASE_URL'),
    transcribeModel: readString(env, 'TRANSCRIBE_MODEL', 'whisper-1'),
    translateModel: readString(env, 'TRANSLATE_MODEL', 'gpt-4o-mini'),
    sourceLanguage: readString(env, 'SOURCE_LANGUAGE', 'en'),
    targetLanguage: readString(env, 'TARGET_LANGUAGE', 'Hebrew'),
    ffmpegPath: readOptional(env, 'FFMPEG_PATH'),
    fontPaths: fontPathList
      ? fontPathList.split(',').map((p) => p.trim()).filter((p) => p.length > 0)
      : defaultFontCandidates(),
    fontSize,
    fontSample: readString(env, 'SUBBURN_FONT_SAMPLE', 'אבג'),
    maxDuration: readNumber(env, 'SUBBURN_MAX_DURATION', 300),
    outputMode: readOutputMode(env),
    style: {
      maxWidthRatio,
      paddingX: readNumber(env, 'SUBBURN_PADDING_X', 20),
      paddingY: readNumber(env, 'SUBBURN_PADDING_Y', 10),
      bottomMargin: readNumber(env, 'SUBBURN_BOTTOM_MARGIN', 40),
      strokeWidth: readNumber(env, 'SUBBURN_STROKE_WIDTH', 2),
      textColor: readString(env, 'SUBBURN_TEXT_COLOR', '#ffffff'),
      outlineColor: readString(env, 'SUBBURN_OUTLINE_COLOR', '#000000'),
      panelColor: readString(env, 'SUBBURN_PANEL_COLOR', '#000000'),
      panelOpacity,
      direction: readDirection(env),
    },
    burnIn: {
      fontName: readString(env, 'SUBBURN_BURN_FONT', 'Noto Sans Hebrew'),
      fontSize: readNumber(env, 'SUBBURN_BURN_FONT_SIZE', 28),
      alignment: 10,
      outline: 2,
      shadow: 1,
      marginV: readNumber(env, 'SUBBURN_BOTTOM_MARGIN', 40),
    },
    fallbackOnCountMismatch: readString(env, 'SUBBURN_FALLBACK_ON_MISMATCH', 'true') !== 'false',
  };
}
