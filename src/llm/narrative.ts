import { NarrativeServiceError } from '@/utils/errors.ts';
import { withTimeout } from '@/utils/retry.ts';
import { buildNarrativePrompt } from '@/llm/prompts.ts';
import type { NarrativeService } from '@/llm/types.ts';
import type { Score, TickerSnapshot } from '@/analysis/types.ts';

export type NarrativeOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
};

const stripFences = (text: string): string =>
  text
    .replace(/```[a-zA-Z]*\n?/g, '')
    .replace(/```/g, '')
    .trim();

/**
 * Asks the narrative service to explain a score. Every failure, including an empty reply
 * and the timeout, surfaces as `NarrativeServiceError`; an aborted request surfaces as
 * `RequestAbortedError`.
 */
export const requestNarrative = async (
  service: NarrativeService,
  snapshot: TickerSnapshot,
  score: Score,
  options: NarrativeOptions,
): Promise<string> => {
  const { system, prompt } = buildNarrativePrompt(snapshot, score);

  let raw: string;
  try {
    raw = await withTimeout((signal) => service.complete({ system, prompt, signal }), {
      timeoutMs: options.timeoutMs,
      signal: options.signal,
      onTimeout: () => new NarrativeServiceError('timeout', `Narrative service did not answer within ${options.timeoutMs}ms`),
    });
  } catch (err) {
    if (err instanceof NarrativeServiceError || options.signal?.aborted) throw err;
    throw new NarrativeServiceError('api', 'Narrative service failed unexpectedly', { cause: err });
  }

  const text = stripFences(raw);
  if (!text) throw new NarrativeServiceError('empty', 'Narrative service returned an empty response');
  return text;
};
