import { rawKey, resultKey } from '@/cache/cache-manager.ts';
import { hasAnyData, normalizeTicker } from '@/analysis/decode.ts';
import { decideAction, fallback } from '@/analysis/fallback.ts';
import { score as scoreSnapshot } from '@/scoring/engine.ts';
import { requestNarrative } from '@/llm/narrative.ts';
import {
  DataProviderError,
  InsufficientDataError,
  NarrativeServiceError,
  RequestAbortedError,
  TickerNotFoundError,
  toErrorPayload,
} from '@/utils/errors.ts';
import { withRetry, withTimeout } from '@/utils/retry.ts';
import { logger } from '@/utils/logger.ts';
import type { CacheManager } from '@/cache/cache-manager.ts';
import type { DataProvider } from '@/data-sources/types.ts';
import type { NarrativeService } from '@/llm/types.ts';
import type { ErrorPayload, NarrativeFailureReason } from '@/utils/errors.ts';
import type { AnalysisResult, InvestorStyle, Score, TickerSnapshot } from '@/analysis/types.ts';

export type AnalysisState = 'CheckCache' | 'FetchData' | 'Score' | 'Narrate' | 'Finalize' | 'Success' | 'Failure';

type Step =
  | { state: 'CheckCache' }
  | { state: 'FetchData' }
  | { state: 'Score'; snapshot: TickerSnapshot }
  | { state: 'Narrate'; snapshot: TickerSnapshot; score: Score }
  | { state: 'Finalize'; result: AnalysisResult }
  | { state: 'Success'; result: AnalysisResult; cached: boolean };

/** The two ways out of the Narrate state. */
export type NarrationOutcome =
  | { source: 'llm'; text: string }
  | { source: 'rule_based'; reason: NarrativeFailureReason };

export type AnalysisOutcome =
  | { status: 'success'; result: AnalysisResult; cached: boolean; trace: AnalysisState[] }
  | { status: 'failure'; error: ErrorPayload; trace: AnalysisState[] };

export type OrchestratorDeps = {
  cache: CacheManager;
  provider: DataProvider;
  narrator: NarrativeService;
};

export type OrchestratorOptions = {
  dataTimeoutMs: number;
  retryAttempts: number;
  retryDelayMs: number;
  narrativeTimeoutMs: number;
  /** TTL for rule-based results; falls back to the result tier's TTL when unset. */
  fallbackTtlMs?: number;
  now?: () => Date;
};

export type AnalyzeOptions = {
  signal?: AbortSignal;
  /** Skip cache reads; fresh values are still written. */
  refresh?: boolean;
};

type AnalysisRequest = {
  ticker: string;
  style: InvestorStyle;
  date: string;
  signal?: AbortSignal;
  refresh: boolean;
};

const log = logger.child('orchestrator');

/**
 * Runs one analysis request through CheckCache → FetchData → Score → Narrate → Finalize.
 * Each request owns its state; the cache is the only thing shared between requests.
 */
export class AnalysisOrchestrator {
  private readonly now: () => Date;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  analyze = async (ticker: string, style: InvestorStyle, opts: AnalyzeOptions = {}): Promise<AnalysisOutcome> => {
    const startedAt = Date.now();
    const trace: AnalysisState[] = [];
    const request: AnalysisRequest = {
      ticker: normalizeTicker(ticker),
      style,
      date: this.deps.cache.today(),
      signal: opts.signal,
      refresh: opts.refresh ?? false,
    };

    let step: Step = { state: 'CheckCache' };
    try {
      if (!request.ticker) throw new TickerNotFoundError(request.ticker, 'Ticker symbol is empty');

      while (step.state !== 'Success') {
        trace.push(step.state);
        if (request.signal?.aborted) throw new RequestAbortedError();
        step = await this.advance(step, request);
      }
      trace.push('Success');

      log.info(`${request.ticker}/${style} → ${step.result.action.toUpperCase()}`, {
        source: step.result.source,
        confidence: Number(step.result.confidence.toFixed(4)),
        cached: step.cached,
        durationMs: Date.now() - startedAt,
      });
      return { status: 'success', result: step.result, cached: step.cached, trace };
    } catch (err) {
      trace.push('Failure');
      const error = toErrorPayload(err);
      const meta = { code: error.code, retryable: error.retryable, error: error.message, failedAt: step.state };
      if (error.code === 'INTERNAL_ERROR' && !error.retryable) log.error(`${request.ticker}/${style} failed`, meta);
      else log.warn(`${request.ticker}/${style} failed`, meta);
      return { status: 'failure', error, trace };
    }
  };

  private advance = async (step: Step, request: AnalysisRequest): Promise<Step> => {
    switch (step.state) {
      case 'CheckCache':
        return this.checkCache(request);
      case 'FetchData':
        return this.fetchData(request);
      case 'Score':
        return { state: 'Narrate', snapshot: step.snapshot, score: scoreSnapshot(step.snapshot, request.style) };
      case 'Narrate':
        return this.narrate(request, step.snapshot, step.score);
      case 'Finalize':
        return this.finalize(request, step.result);
      case 'Success':
        return step;
    }
  };

  private checkCache = async (request: AnalysisRequest): Promise<Step> => {
    if (request.refresh) return { state: 'FetchData' };
    const hit = await this.deps.cache.get('result', resultKey(request.ticker, request.style, request.date));
    return hit ? { state: 'Success', result: hit, cached: true } : { state: 'FetchData' };
  };

  private fetchData = async (request: AnalysisRequest): Promise<Step> => {
    const { cache } = this.deps;
    const key = rawKey(request.ticker, request.date);

    if (!request.refresh) {
      const cached = await cache.get('raw', key);
      if (cached) return { state: 'Score', snapshot: cached };
    }

    const snapshot = await this.fetchSnapshot(request);
    if (!hasAnyData(snapshot)) {
      throw new InsufficientDataError(`The data provider returned no usable metrics for ${request.ticker}`);
    }

    await cache.put('raw', key, snapshot);
    return { state: 'Score', snapshot };
  };

  private fetchSnapshot = (request: AnalysisRequest): Promise<TickerSnapshot> => {
    const { provider } = this.deps;
    const { dataTimeoutMs, retryAttempts, retryDelayMs } = this.options;

    return withRetry(
      () =>
        withTimeout((signal) => provider.fetchSnapshot(request.ticker, signal), {
          timeoutMs: dataTimeoutMs,
          signal: request.signal,
          onTimeout: () =>
            new DataProviderError(`${provider.name} provider did not answer within ${dataTimeoutMs}ms for ${request.ticker}`),
        }),
      {
        attempts: retryAttempts,
        delayMs: retryDelayMs,
        shouldRetry: (err) => err instanceof DataProviderError,
        signal: request.signal,
        label: `Snapshot fetch for ${request.ticker}`,
      },
    );
  };

  /** Resolves to a named outcome; only an aborted request escapes as an error. */
  settleNarrative = async (
    snapshot: TickerSnapshot,
    score: Score,
    signal?: AbortSignal,
  ): Promise<NarrationOutcome> => {
    const { narrator } = this.deps;
    if (!narrator.isAvailable()) return { source: 'rule_based', reason: 'unavailable' };

    try {
      const text = await requestNarrative(narrator, snapshot, score, {
        timeoutMs: this.options.narrativeTimeoutMs,
        signal,
      });
      return { source: 'llm', text };
    } catch (err) {
      if (!(err instanceof NarrativeServiceError)) throw err;
      log.warn(`Narrative unavailable for ${snapshot.ticker}, using rule-based analysis`, {
        reason: err.reason,
        error: err.message,
      });
      return { source: 'rule_based', reason: err.reason };
    }
  };

  private narrate = async (request: AnalysisRequest, snapshot: TickerSnapshot, score: Score): Promise<Step> => {
    const outcome = await this.settleNarrative(snapshot, score, request.signal);
    const now = this.now();

    if (outcome.source === 'rule_based') return { state: 'Finalize', result: fallback(score, now) };

    return {
      state: 'Finalize',
      result: {
        ticker: score.ticker,
        style: score.style,
        asOf: score.asOf,
        action: decideAction(score.composite),
        confidence: score.composite,
        reason: outcome.text,
        source: 'llm',
        generatedAt: now.toISOString(),
        breakdown: score.components.map((c) => ({ ...c })),
      },
    };
  };

  private finalize = async (request: AnalysisRequest, result: AnalysisResult): Promise<Step> => {
    const { cache } = this.deps;
    const key = resultKey(request.ticker, request.style, request.date);
    const { fallbackTtlMs } = this.options;

    if (result.source === 'rule_based' && fallbackTtlMs !== undefined) {
      await cache.put('result', key, result, Math.min(fallbackTtlMs, cache.ttlFor('result')));
    } else {
      await cache.put('result', key, result);
    }
    return { state: 'Success', result, cached: false };
  };
}
