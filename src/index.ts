import { createServices, startCachePruning } from '@/app.ts';
import { startServer } from '@/server.ts';
import { errorMessage } from '@/utils/errors.ts';
import { logger } from '@/utils/logger.ts';
import config from '@/utils/config.ts';

const main = async () => {
  logger.info('Fundamental analyst starting up', {
    port: config.port,
    snapshots: config.snapshots.source,
    cache: config.cache.backend,
    llm: config.llmEnabled && config.anthropic.apiKey !== '' ? config.anthropic.model : 'disabled',
  });

  const { cache, orchestrator } = createServices(config);
  startCachePruning(cache, config.cache.pruneIntervalMs);
  startServer(orchestrator, config.port);
};

main().catch((err: unknown) => {
  logger.error('Fatal startup error', {
    error: errorMessage(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exit(1);
});
