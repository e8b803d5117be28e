import { parseArgs } from 'node:util';
import { createServices } from '@/app.ts';
import { toEnvelope } from '@/server.ts';
import { errorMessage } from '@/utils/errors.ts';
import { INVESTOR_STYLES } from '@/utils/config.ts';
import { logger } from '@/utils/logger.ts';
import config from '@/utils/config.ts';
import type { InvestorStyle } from '@/utils/config.ts';

const USAGE = `Usage: npm run analyze -- <TICKER> [--style growth|value|dividend] [--no-cache]`;

const parseStyle = (value: string | undefined): InvestorStyle | null =>
  value === undefined ? 'growth' : (INVESTOR_STYLES.find((s) => s === value) ?? null);

const main = async (): Promise<number> => {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      style: { type: 'string', short: 's' },
      'no-cache': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const [ticker] = positionals;
  const style = parseStyle(values.style);
  if (values.help || !ticker || !style) {
    console.error(USAGE);
    return values.help ? 0 : 2;
  }

  const startedAt = Date.now();
  const outcome = await createServices(config).orchestrator.analyze(ticker, style, { refresh: values['no-cache'] === true });
  console.log(JSON.stringify(toEnvelope(outcome, Date.now() - startedAt), null, 2));
  return outcome.status === 'success' ? 0 : 1;
};

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.error('Analysis failed', { error: errorMessage(err) });
    process.exitCode = 1;
  },
);
