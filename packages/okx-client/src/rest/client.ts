import { z } from 'zod';
import { HARDCODED_CONFIG, type Timeframe } from '@candlesync/schemas';
import {
  ExchangeRequestError,
  type CandleSource,
  type FetchCandlesParams,
  type OhlcvRow,
} from '@candlesync/exchange-core';
import { createLogger, timeframeToMs, type Logger } from '@candlesync/utils';
import { OKX_BARS } from '../bars';

/** Rows served by /market/candles */
const RECENT_LIMIT = HARDCODED_CONFIG.exchange.maxCandlesPerRequest;
/** Rows served per call by /market/history-candles */
const HISTORY_LIMIT = 100;
/** /market/candles only reaches this many bars back */
const RECENT_WINDOW_BARS = 1440;
/** "Too Many Requests" */
const RATE_LIMIT_CODE = '50011';

const OkxResponseSchema = z.object({
  code: z.string(),
  msg: z.string().default(''),
  data: z.array(z.array(z.union([z.string(), z.number()]))).default([]),
});

type OkxRow = z.infer<typeof OkxResponseSchema>['data'][number];

export interface OkxRestClientOptions {
  baseUrl?: string;
  requestTimeoutMs?: number;
  fetch?: typeof fetch;
  now?: () => number;
  logger?: Logger;
}

/**
 * OKX public market-data REST client
 *
 * Rows come back newest first as
 * [ts, open, high, low, close, vol, volCcy, volCcyQuote, confirm], all strings.
 *
 * Reference: https://www.okx.com/docs-v5/en/#public-data-rest-api-get-candlesticks
 */
export class OkxRestClient implements CandleSource {
  readonly name = 'okx';
  readonly maxCandlesPerRequest = RECENT_LIMIT;

  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: OkxRestClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? 'https://www.okx.com';
    this.requestTimeoutMs = options.requestTimeoutMs ?? HARDCODED_CONFIG.exchange.requestTimeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger('exchange:okx-rest');
  }

  /**
   * Without `since`: the newest `limit` bars, the open one included.
   * With `since`: bars in [since, since + limit x interval), oldest first.
   */
  async fetchCandles(symbol: string, timeframe: Timeframe, params: FetchCandlesParams): Promise<OhlcvRow[]> {
    const limit = Math.min(params.limit, RECENT_LIMIT);
    const bar = OKX_BARS[timeframe];

    if (params.since === undefined) {
      return this.getCandles('/api/v5/market/candles', { instId: symbol, bar, limit: String(limit) });
    }

    const since = params.since;
    const intervalMs = timeframeToMs(timeframe);
    const after = since + limit * intervalMs;
    const inRange = (row: OkxRow) => Number(row[0]) >= since;

    if (this.now() - since <= RECENT_WINDOW_BARS * intervalMs) {
      const rows = await this.getCandles('/api/v5/market/candles', {
        instId: symbol,
        bar,
        after: String(after),
        limit: String(limit),
      });
      return rows.filter(inRange).reverse();
    }

    // Older than the recent window: walk history pages back from `after`
    const collected: OkxRow[] = [];
    let cursor = after;
    while (collected.length < limit) {
      const page = await this.getCandles('/api/v5/market/history-candles', {
        instId: symbol,
        bar,
        after: String(cursor),
        limit: String(HISTORY_LIMIT),
      });
      if (page.length === 0) break;

      collected.push(...page.filter(inRange));
      const oldest = Number(page[page.length - 1][0]);
      if (!(oldest > since) || oldest >= cursor) break;
      cursor = oldest;
    }

    return collected.reverse().slice(0, limit);
  }

  private async getCandles(path: string, query: Record<string, string>): Promise<OkxRow[]> {
    const url = `${this.baseUrl}${path}?${new URLSearchParams(query).toString()}`;
    this.logger.debug({ path, ...query }, 'Making OKX API request');

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error) {
      throw new ExchangeRequestError('network', `OKX request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (response.status === 429) {
      throw new ExchangeRequestError('rate_limited', 'OKX rate limit exceeded', { status: 429 });
    }
    if (!response.ok) {
      const body = await response.text();
      this.logger.error({ status: response.status, path, body: body.slice(0, 200) }, 'OKX API request failed');
      throw new ExchangeRequestError('rejected', `OKX API error: ${response.status} ${response.statusText}`, {
        status: response.status,
      });
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new ExchangeRequestError('malformed', 'OKX response is not JSON', { cause: error });
    }

    const parsed = OkxResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ExchangeRequestError('malformed', `Unexpected OKX response: ${parsed.error.issues[0]?.message}`);
    }

    const { code, msg, data } = parsed.data;
    if (code === RATE_LIMIT_CODE) {
      throw new ExchangeRequestError('rate_limited', msg || 'OKX rate limit exceeded', { code });
    }
    if (code !== '0') {
      throw new ExchangeRequestError('rejected', `OKX error ${code}: ${msg}`, { code });
    }
    return data;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
