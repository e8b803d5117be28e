import { Elysia, t } from 'elysia';
import { node } from '@elysiajs/node';
import { logger } from '@/utils/logger.ts';
import config from '@/utils/config.ts';
import type { AnalysisOrchestrator, AnalysisOutcome, AnalysisState } from '@/engine/orchestrator.ts';
import type { AnalysisResult, InvestorStyle } from '@/analysis/types.ts';
import type { ErrorPayload } from '@/utils/errors.ts';

export type ResponseEnvelope = {
  agent: 'fundamental';
  version: string;
  status: 'success' | 'error';
  timestamp: string;
  data: AnalysisResult | null;
  error: ErrorPayload | null;
  metadata: {
    cached: boolean;
    durationMs: number;
    trace: AnalysisState[];
  };
};

const styleSchema = t.Union([t.Literal('growth'), t.Literal('value'), t.Literal('dividend')]);
const tickerSchema = t.String({ minLength: 1, maxLength: 12 });

export const httpStatusFor = (error: ErrorPayload): number => {
  if (error.code === 'TICKER_NOT_FOUND') return 404;
  if (error.code === 'INSUFFICIENT_DATA') return 422;
  if (error.retryable) return 503;
  return 500;
};

export const toEnvelope = (outcome: AnalysisOutcome, durationMs: number): ResponseEnvelope => ({
  agent: 'fundamental',
  version: config.version,
  status: outcome.status === 'success' ? 'success' : 'error',
  timestamp: new Date().toISOString(),
  data: outcome.status === 'success' ? outcome.result : null,
  error: outcome.status === 'failure' ? outcome.error : null,
  metadata: {
    cached: outcome.status === 'success' && outcome.cached,
    durationMs,
    trace: outcome.trace,
  },
});

export const createApp = (orchestrator: AnalysisOrchestrator) => {
  const run = async (
    ticker: string,
    style: InvestorStyle,
    request: Request,
    set: { status?: number | string },
  ): Promise<ResponseEnvelope> => {
    const startedAt = Date.now();
    const outcome = await orchestrator.analyze(ticker, style, { signal: request.signal });
    if (outcome.status === 'failure') set.status = httpStatusFor(outcome.error);
    return toEnvelope(outcome, Date.now() - startedAt);
  };

  return new Elysia()
    .get('/health', () => ({ status: 'ok', version: config.version }))

    .post('/analyze', ({ body, request, set }) => run(body.ticker, body.style ?? 'growth', request, set), {
      body: t.Object({
        ticker: tickerSchema,
        style: t.Optional(styleSchema),
      }),
    })

    .get(
      '/analyze/:ticker',
      ({ params, query, request, set }) => run(params.ticker, query.style ?? 'growth', request, set),
      {
        params: t.Object({ ticker: tickerSchema }),
        query: t.Object({ style: t.Optional(styleSchema) }),
      },
    );
};

export const startServer = (orchestrator: AnalysisOrchestrator, port: number = config.port) => {
  const app = new Elysia({ adapter: node() }).use(createApp(orchestrator)).listen(port);
  logger.info(`Analysis API listening on http://localhost:${port}`);
  return app;
};
