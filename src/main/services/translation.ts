import type OpenAI from 'openai';
import type { TranslationUnit } from '../../types/subtitles';
import { CollaboratorError, errorMessage } from './errors';

export interface TranslationRequest {
  /** full source transcript */
  text: string;
  /** per-segment source texts; when present a segment-aligned translation is requested */
  segments?: string[];
}

export interface Translator {
  translate(request: TranslationRequest): Promise<TranslationUnit>;
}

export interface TranslationOptions {
  model: string;
  sourceLanguage: string;
  targetLanguage: string;
  temperature?: number;
}

/**
 * Translate through an OpenAI-compatible chat completion endpoint.
 *
 * Segment-aligned translation is asked for as a JSON array of strings. A reply
 * that is not such an array is returned as a single 'full' block so the
 * reconciler can apply its sentence heuristic.
 */
export class OpenAITranslator implements Translator {
  constructor(
    private readonly client: OpenAI,
    private readonly options: TranslationOptions
  ) {}

  async translate(request: TranslationRequest): Promise<TranslationUnit> {
    const { sourceLanguage, targetLanguage } = this.options;
    const segmented = request.segments !== undefined && request.segments.length > 0;

    const system = segmented
      ? `You are a professional ${sourceLanguage}-${targetLanguage} subtitle translator. ` +
        `Translate every element of the JSON array the user sends into natural, fluent ${targetLanguage}, ` +
        'keeping the tone and meaning. Reply with a JSON array of strings only: the same number of ' +
        'elements, in the same order, one translation per element.'
      : `You are a professional ${sourceLanguage}-${targetLanguage} translator. Translate the following text ` +
        `into natural, fluent ${targetLanguage}, keeping the original tone and meaning. Reply with the translation only.`;
    const user = segmented ? JSON.stringify(request.segments) : request.text;

    let content: string;
    try {
      console.log(`[TRANSLATE] model='${this.options.model}' segmented=${segmented}`);
      const resp = await this.client.chat.completions.create({
        model: this.options.model,
        temperature: this.options.temperature ?? 0.3,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: user },
        ],
      });
      content = resp.choices[0]?.message?.content ?? '';
    } catch (e) {
      throw new CollaboratorError('translation', errorMessage(e), e);
    }

    return segmented ? parseSegmentedReply(content) : { kind: 'full', text: content.trim() };
  }
}

/**
 * Interpret a reply to a segment-aligned request. Accepts a bare JSON array or one
 * wrapped in a markdown code fence.
 */
export function parseSegmentedReply(content: string): TranslationUnit {
  const body = content
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (e) {
    console.warn('[TRANSLATE] Reply is not JSON; treating it as one block:', errorMessage(e));
    return { kind: 'full', text: content.trim() };
  }

  if (Array.isArray(parsed) && parsed.every((item): item is string => typeof item === 'string')) {
    return { kind: 'segmented', texts: parsed };
  }
  console.warn('[TRANSLATE] Reply is not an array of strings; treating it as one block');
  return { kind: 'full', text: content.trim() };
}
