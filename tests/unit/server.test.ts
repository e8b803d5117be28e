import { describe, expect, it, vi } from 'vitest';
import { createApp, httpStatusFor } from '@/server.ts';
import { AnalysisOrchestrator } from '@/engine/orchestrator.ts';
import { CacheManager } from '@/cache/cache-manager.ts';
import { MemoryCacheStore } from '@/cache/memory-store.ts';
import { DataProviderError, TickerNotFoundError } from '@/utils/errors.ts';
import { growthSnapshot } from '../helpers.ts';
import type { DataProvider } from '@/data-sources/types.ts';

const HOUR = 60 * 60 * 1000;

const appWith = (fetchSnapshot: DataProvider['fetchSnapshot']) => {
  const orchestrator = new AnalysisOrchestrator(
    {
      cache: new CacheManager(new MemoryCacheStore(), { raw: 24 * HOUR, result: 4 * HOUR }),
      provider: { name: 'fake', fetchSnapshot },
      narrator: { name: 'off', isAvailable: () => false, complete: () => Promise.resolve('') },
    },
    { dataTimeoutMs: 1000, retryAttempts: 2, retryDelayMs: 0, narrativeTimeoutMs: 1000 },
  );
  return createApp(orchestrator);
};

const post = (body: unknown) =>
  new Request('http://localhost/analyze', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });

describe('HTTP API', () => {
  it('answers health checks', async () => {
    const res = await appWith(() => Promise.resolve(growthSnapshot())).handle(new Request('http://localhost/health'));
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });

  it('analyzes a ticker from a POST body', async () => {
    const app = appWith(() => Promise.resolve(growthSnapshot()));

    const res = await app.handle(post({ ticker: 'acme', style: 'growth' }));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      agent: 'fundamental',
      status: 'success',
      data: { ticker: 'ACME', style: 'growth', action: 'buy', source: 'rule_based' },
      error: null,
      metadata: { cached: false, trace: ['CheckCache', 'FetchData', 'Score', 'Narrate', 'Finalize', 'Success'] },
    });
  });

  it('defaults to the growth style and reports cache hits', async () => {
    const app = appWith(() => Promise.resolve(growthSnapshot()));

    await app.handle(new Request('http://localhost/analyze/ACME'));
    const res = await app.handle(new Request('http://localhost/analyze/ACME?style=growth'));

    expect(await res.json()).toMatchObject({
      status: 'success',
      data: { style: 'growth' },
      metadata: { cached: true, trace: ['CheckCache', 'Success'] },
    });
  });

  it('returns 404 for an unknown ticker', async () => {
    const app = appWith((ticker) => Promise.reject(new TickerNotFoundError(ticker)));

    const res = await app.handle(new Request('http://localhost/analyze/ZZZZ'));

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({
      status: 'error',
      data: null,
      error: { code: 'TICKER_NOT_FOUND', retryable: false },
    });
  });

  it('returns 422 when the style has no data', async () => {
    const app = appWith(() => Promise.resolve(growthSnapshot()));
    const res = await app.handle(new Request('http://localhost/analyze/ACME?style=dividend'));

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ error: { code: 'INSUFFICIENT_DATA' } });
  });

  it('returns 503 when the provider keeps failing', async () => {
    const fetchSnapshot = vi.fn<DataProvider['fetchSnapshot']>().mockRejectedValue(new DataProviderError('down'));
    const res = await appWith(fetchSnapshot).handle(post({ ticker: 'ACME' }));

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ error: { code: 'INTERNAL_ERROR', retryable: true } });
    expect(fetchSnapshot).toHaveBeenCalledTimes(2);
  });

  it('rejects an unknown style before running the analysis', async () => {
    const fetchSnapshot = vi.fn<DataProvider['fetchSnapshot']>();
    const res = await appWith(fetchSnapshot).handle(post({ ticker: 'ACME', style: 'momentum' }));

    expect(res.status).toBe(422);
    expect(fetchSnapshot).not.toHaveBeenCalled();
  });
});

describe('httpStatusFor', () => {
  it('maps non-retryable internal errors to 500', () => {
    expect(httpStatusFor({ code: 'INTERNAL_ERROR', message: 'bug', retryable: false })).toBe(500);
    expect(httpStatusFor({ code: 'INTERNAL_ERROR', message: 'busy', retryable: true })).toBe(503);
  });
});
