import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { decodeSnapshot, normalizeTicker } from '@/analysis/decode.ts';
import { DataProviderError, TickerNotFoundError, errorMessage } from '@/utils/errors.ts';
import type { DataProvider } from '@/data-sources/types.ts';
import type { TickerSnapshot } from '@/analysis/types.ts';

const TICKER_RE = /^[A-Z0-9.\-^]{1,12}$/;

/** Snapshots stored as `<dir>/<TICKER>.json`, for offline runs and fixtures. */
export class FileSnapshotProvider implements DataProvider {
  readonly name = 'file';

  constructor(private readonly dir: string) {}

  fetchSnapshot = async (ticker: string): Promise<TickerSnapshot> => {
    const symbol = normalizeTicker(ticker);
    if (!TICKER_RE.test(symbol)) throw new TickerNotFoundError(symbol, `Invalid ticker symbol '${symbol}'`);

    let raw: string;
    try {
      raw = await readFile(join(this.dir, `${symbol}.json`), 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') throw new TickerNotFoundError(symbol);
      throw new DataProviderError(`Could not read snapshot for ${symbol}: ${errorMessage(err)}`, { cause: err });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (err) {
      throw new DataProviderError(`Snapshot file for ${symbol} is not valid JSON`, { cause: err });
    }

    const decoded = decodeSnapshot(payload);
    if (!decoded.ok) throw new DataProviderError(`Malformed snapshot for ${symbol}: ${decoded.error}`);
    return { ...decoded.value, ticker: symbol };
  };
}
