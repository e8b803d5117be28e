import { CacheManager } from '@/cache/cache-manager.ts';
import { FileCacheStore } from '@/cache/file-store.ts';
import { MemoryCacheStore } from '@/cache/memory-store.ts';
import { createDataProvider } from '@/data-sources/registry.ts';
import { AnthropicNarrativeService } from '@/llm/client.ts';
import { AnalysisOrchestrator } from '@/engine/orchestrator.ts';
import { errorMessage } from '@/utils/errors.ts';
import { logger } from '@/utils/logger.ts';
import type { AppConfig } from '@/utils/config.ts';
import type { CacheStore } from '@/cache/store.ts';

export type Services = {
  cache: CacheManager;
  orchestrator: AnalysisOrchestrator;
};

const createCacheStore = (cache: AppConfig['cache']): CacheStore =>
  cache.backend === 'memory' ? new MemoryCacheStore() : new FileCacheStore(cache.dir);

/** Wires the orchestrator and its collaborators from configuration. */
export const createServices = (cfg: AppConfig): Services => {
  const cache = new CacheManager(createCacheStore(cfg.cache), {
    raw: cfg.cache.rawTtlMs,
    result: cfg.cache.resultTtlMs,
  });

  const orchestrator = new AnalysisOrchestrator(
    {
      cache,
      provider: createDataProvider(cfg.snapshots),
      narrator: new AnthropicNarrativeService({ ...cfg.anthropic, enabled: cfg.llmEnabled }),
    },
    {
      dataTimeoutMs: cfg.snapshots.timeoutMs,
      retryAttempts: cfg.snapshots.retryAttempts,
      retryDelayMs: cfg.snapshots.retryDelayMs,
      narrativeTimeoutMs: cfg.anthropic.timeoutMs,
      fallbackTtlMs: cfg.cache.fallbackTtlMs,
    },
  );

  return { cache, orchestrator };
};

/** Prunes the cache now and then every `intervalMs`. The timer does not keep the process alive. */
export const startCachePruning = (cache: CacheManager, intervalMs: number): ReturnType<typeof setInterval> => {
  const runOnce = () => {
    cache.prune().catch((err: unknown) => {
      logger.warn('Cache prune failed', { error: errorMessage(err) });
    });
  };
  runOnce();
  const timer = setInterval(runOnce, intervalMs);
  timer.unref();
  return timer;
};
