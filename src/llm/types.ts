export type CompletionRequest = {
  system: string;
  prompt: string;
  signal?: AbortSignal;
};

/**
 * Text-completion backend. Rejects with `NarrativeServiceError` on any failure; retries,
 * if any, are the caller's business.
 */
export type NarrativeService = {
  readonly name: string;
  isAvailable: () => boolean;
  complete: (request: CompletionRequest) => Promise<string>;
};
