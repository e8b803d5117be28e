import { decodeSnapshot, normalizeTicker } from '@/analysis/decode.ts';
import { DataProviderError, TickerNotFoundError, errorMessage } from '@/utils/errors.ts';
import { logger } from '@/utils/logger.ts';
import type { DataProvider } from '@/data-sources/types.ts';
import type { TickerSnapshot } from '@/analysis/types.ts';

export type HttpSnapshotProviderOptions = {
  baseUrl: string;
  apiKey?: string;
};

const log = logger.child('snapshots:http');

/**
 * Reads already-normalized snapshots from `GET <baseUrl>/snapshots/<TICKER>`.
 * 404 means the ticker does not exist; every other failure is transient.
 */
export class HttpSnapshotProvider implements DataProvider {
  readonly name = 'http';
  private readonly baseUrl: string;

  constructor(private readonly options: HttpSnapshotProviderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  private headers = (): Record<string, string> => {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.options.apiKey) headers.Authorization = `Bearer ${this.options.apiKey}`;
    return headers;
  };

  fetchSnapshot = async (ticker: string, signal?: AbortSignal): Promise<TickerSnapshot> => {
    const symbol = normalizeTicker(ticker);
    const path = `/snapshots/${encodeURIComponent(symbol)}`;
    log.debug(`GET ${path}`);

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}${path}`, { headers: this.headers(), signal });
    } catch (err) {
      throw new DataProviderError(`Snapshot request for ${symbol} failed: ${errorMessage(err)}`, { cause: err });
    }

    if (res.status === 404) {
      await res.body?.cancel();
      throw new TickerNotFoundError(symbol);
    }
    if (!res.ok) {
      const body = await res.text().catch(() => '');
      log.warn(`Snapshot API returned ${res.status}`, { ticker: symbol, body: body.substring(0, 200) });
      throw new DataProviderError(`Snapshot API ${res.status} for ${symbol}`);
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch (err) {
      throw new DataProviderError(`Snapshot API returned invalid JSON for ${symbol}`, { cause: err });
    }

    const decoded = decodeSnapshot(payload);
    if (!decoded.ok) throw new DataProviderError(`Malformed snapshot for ${symbol}: ${decoded.error}`);
    if (decoded.value.ticker !== symbol) {
      throw new DataProviderError(`Snapshot API answered ${decoded.value.ticker} for ${symbol}`);
    }
    return decoded.value;
  };
}
