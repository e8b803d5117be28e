import Anthropic from '@anthropic-ai/sdk';
import { NarrativeServiceError, errorMessage } from '@/utils/errors.ts';
import { logger } from '@/utils/logger.ts';
import type { AppConfig } from '@/utils/config.ts';
import type { CompletionRequest, NarrativeService } from '@/llm/types.ts';

export type AnthropicSettings = AppConfig['anthropic'] & { enabled: boolean };

const log = logger.child('llm');

export const toNarrativeError = (err: unknown): NarrativeServiceError => {
  if (err instanceof NarrativeServiceError) return err;
  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return new NarrativeServiceError('timeout', 'Narrative request timed out', { cause: err });
  }
  if (err instanceof Anthropic.APIUserAbortError) {
    return new NarrativeServiceError('timeout', 'Narrative request was aborted', { cause: err });
  }
  if (err instanceof Anthropic.APIConnectionError) {
    return new NarrativeServiceError('network', `Narrative service unreachable: ${err.message}`, { cause: err });
  }
  if (err instanceof Anthropic.RateLimitError) {
    return new NarrativeServiceError('rate_limited', 'Narrative service rate limit hit', { cause: err });
  }
  if (err instanceof Anthropic.APIError) {
    return new NarrativeServiceError('api', `Narrative service error ${err.status ?? ''}: ${err.message}`.trim(), {
      cause: err,
    });
  }
  return new NarrativeServiceError('api', `Narrative request failed: ${errorMessage(err)}`, { cause: err });
};

export class AnthropicNarrativeService implements NarrativeService {
  readonly name = 'anthropic';
  private client: Anthropic | null = null;

  constructor(private readonly settings: AnthropicSettings) {}

  isAvailable = (): boolean => this.settings.enabled && this.settings.apiKey !== '';

  private getClient = (): Anthropic => {
    if (!this.client) {
      // maxRetries 0: a failed call goes straight to the rule-based fallback.
      this.client = new Anthropic({ apiKey: this.settings.apiKey, maxRetries: 0 });
    }
    return this.client;
  };

  complete = async ({ system, prompt, signal }: CompletionRequest): Promise<string> => {
    if (!this.isAvailable()) {
      throw new NarrativeServiceError('unavailable', 'Narrative service is disabled or has no API key');
    }

    const model = this.settings.model;
    try {
      const response = await this.getClient().messages.create(
        {
          model,
          max_tokens: this.settings.maxTokens,
          system,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal, timeout: this.settings.timeoutMs },
      );

      const text = response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();
      if (!text) throw new NarrativeServiceError('empty', `Model ${model} returned no text`);
      return text;
    } catch (err) {
      const failure = toNarrativeError(err);
      log.warn(`Narrative call failed (${model})`, { reason: failure.reason, error: failure.message });
      throw failure;
    }
  };
}
