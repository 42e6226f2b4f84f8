/**
 * Handler Utilities
 *
 * Runs pipeline handlers with timing logs and turns any escaped exception into
 * a PipelineErrorResponse, so callers only ever see PipelineResult values.
 */

import type { PipelineErrorResponse, PipelineResult } from '../../types/pipeline';
import { SubtitleEngineError } from '../services/errors';

/** Longest `details` string returned to callers */
export const MAX_DETAILS_LENGTH = 3500;

/**
 * Cut long technical details (stack traces, ffmpeg stderr) to `max` characters
 * and mark the cut.
 */
export function truncateDetails(details: string, max: number = MAX_DETAILS_LENGTH): string {
  if (details.length <= max) return details;
  return `${details.slice(0, max)}\n... [details truncated] ...`;
}

/**
 * Build the structured error response for a caught value
 *
 * @param error - whatever was thrown
 * @param message - user-facing message; defaults to the error's own message
 */
export function toErrorResponse(error: unknown, message?: string): PipelineErrorResponse {
  const response: PipelineErrorResponse = {
    success: false,
    error: message ?? (error instanceof Error ? error.message : 'Unknown error occurred'),
    details: truncateDetails(error instanceof Error ? (error.stack ?? error.message) : String(error)),
  };
  if (error instanceof SubtitleEngineError) {
    response.code = error.code;
  }
  return response;
}

/**
 * Run a handler with automatic error handling and logging
 *
 * @example
 * const result = await runHandler('subtitle-video', () => handleSubtitleVideo(request, deps));
 */
export async function runHandler<T>(
  name: string,
  handler: () => Promise<PipelineResult<T>>
): Promise<PipelineResult<T>> {
  const startTime = Date.now();
  console.log(`[HANDLER] Running '${name}'`);

  try {
    const result = await handler();
    const duration = Date.now() - startTime;
    console.log(`[HANDLER] '${name}' finished (${duration}ms)`);
    return result;
  } catch (error) {
    console.error(`[HANDLER] Error in handler '${name}':`, error);
    return toErrorResponse(error);
  }
}
