import { HARDCODED_CONFIG, type Candle, type Timeframe } from '@candlesync/schemas';
import {
  createLogger,
  retryWithBackoff,
  sleep as defaultSleep,
  timeframeMinutes,
  timeframeSeconds,
  type Logger,
} from '@candlesync/utils';
import { isRateLimited } from '../errors';
import { parseOhlcvRows } from '../parser/parse-ohlcv';
import type { CandleSource, FetchCandlesParams, OhlcvRow } from '../source/candle-source';

export interface CandleFetcherOptions {
  /** Defaults to the source's own single-call limit */
  maxPerRequest?: number;
  pageDelayMs?: number;
  rateLimitMaxAttempts?: number;
  rateLimitBaseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  logger?: Logger;
}

export interface FetchLatestOptions {
  /** Keep the still-open bucket in the result */
  includeCurrent?: boolean;
}

/**
 * Paginated, rate-limit-aware candle reads on top of a `CandleSource`.
 *
 * Every single request is retried on `rate_limited` only, with doubling waits.
 */
export class CandleFetcher {
  private readonly maxPerRequest: number;
  private readonly pageDelayMs: number;
  private readonly rateLimitMaxAttempts: number;
  private readonly rateLimitBaseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly source: CandleSource,
    options: CandleFetcherOptions = {}
  ) {
    const limits = HARDCODED_CONFIG.exchange;
    this.maxPerRequest = Math.min(
      options.maxPerRequest ?? source.maxCandlesPerRequest,
      source.maxCandlesPerRequest
    );
    this.pageDelayMs = options.pageDelayMs ?? limits.pageDelayMs;
    this.rateLimitMaxAttempts = options.rateLimitMaxAttempts ?? limits.rateLimitMaxAttempts;
    this.rateLimitBaseDelayMs = options.rateLimitBaseDelayMs ?? limits.rateLimitBaseDelayMs;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger('exchange:fetcher');
  }

  /**
   * Newest `count` candles, ascending.
   *
   * Up to the single-call limit this is one request; larger counts page
   * backwards until enough candles are collected or a page adds nothing.
   */
  async fetchLatest(
    symbol: string,
    timeframe: Timeframe,
    count: number,
    { includeCurrent = false }: FetchLatestOptions = {}
  ): Promise<Candle[]> {
    if (count <= 0) return [];

    const keep = (candle: Candle) => includeCurrent || !candle.isCurrent;
    const collected = new Map<number, Candle>();
    const intervalSec = timeframeSeconds(timeframe);

    // The open bucket takes one row of a single call
    const firstLimit = Math.min(this.maxPerRequest, includeCurrent ? count : count + 1);
    this.collect(collected, await this.fetchPage(symbol, timeframe, { limit: firstLimit }));

    if (count > this.maxPerRequest) {
      let page = 1;
      while (collected.size > 0 && [...collected.values()].filter(keep).length < count) {
        const oldest = Math.min(...collected.keys());
        const since = (oldest - this.maxPerRequest * intervalSec) * 1000;

        await this.sleep(this.pageDelayMs);
        const added = this.collect(
          collected,
          await this.fetchPage(symbol, timeframe, { limit: this.maxPerRequest, since })
        );
        page++;

        this.logger.debug({ symbol, timeframe, page, added, total: collected.size }, 'Fetched candle page');
        if (added === 0) break;
      }
    }

    return [...collected.values()]
      .filter(keep)
      .sort((a, b) => a.timestamp - b.timestamp)
      .slice(-count);
  }

  /**
   * Completed candles with `fromSec < timestamp <= toSec`, ascending
   */
  async fetchRange(symbol: string, timeframe: Timeframe, fromSec: number, toSec: number): Promise<Candle[]> {
    const intervalSec = timeframeSeconds(timeframe);
    const collected = new Map<number, Candle>();
    let cursor = fromSec;

    while (cursor < toSec) {
      const limit = Math.min(this.maxPerRequest, Math.ceil((toSec - cursor) / intervalSec));
      const candles = await this.fetchPage(symbol, timeframe, { limit, since: (cursor + 1) * 1000 });

      let newest = cursor;
      for (const candle of candles) {
        if (candle.isCurrent || candle.timestamp <= cursor) continue;
        newest = Math.max(newest, candle.timestamp);
        if (candle.timestamp <= toSec) collected.set(candle.timestamp, candle);
      }

      // An empty window (no rows, or only zero-volume ones) may still have trades after it
      cursor = newest > cursor ? newest : Math.min(cursor + limit * intervalSec, toSec);
      if (cursor < toSec) await this.sleep(this.pageDelayMs);
    }

    return [...collected.values()].sort((a, b) => a.timestamp - b.timestamp);
  }

  /**
   * Newest completed candle, or null when the exchange has none
   */
  async fetchNewest(symbol: string, timeframe: Timeframe): Promise<Candle | null> {
    const candles = await this.fetchPage(symbol, timeframe, { limit: 2 });
    const completed = candles.filter((candle) => !candle.isCurrent);
    return completed.at(-1) ?? null;
  }

  private async fetchPage(symbol: string, timeframe: Timeframe, params: FetchCandlesParams): Promise<Candle[]> {
    const rows = await this.request(symbol, timeframe, params);
    const parsed = parseOhlcvRows(rows, timeframeMinutes(timeframe), this.now());

    if (parsed.skipped > 0) {
      this.logger.debug({ symbol, timeframe, skipped: parsed.skipped }, 'Skipped candle rows');
    }
    return parsed.candles;
  }

  private request(symbol: string, timeframe: Timeframe, params: FetchCandlesParams): Promise<OhlcvRow[]> {
    return retryWithBackoff(() => this.source.fetchCandles(symbol, timeframe, params), {
      maxAttempts: this.rateLimitMaxAttempts,
      baseDelayMs: this.rateLimitBaseDelayMs,
      shouldRetry: isRateLimited,
      sleep: this.sleep,
      onRetry: ({ attempt, delayMs }) => {
        this.logger.warn(
          { event: 'rate_limited', source: this.source.name, symbol, timeframe, attempt, delayMs },
          'Rate limited, backing off'
        );
      },
    });
  }

  /** Adds candles by timestamp, returns how many buckets were new */
  private collect(into: Map<number, Candle>, candles: Candle[]): number {
    let added = 0;
    for (const candle of candles) {
      if (!into.has(candle.timestamp)) added++;
      into.set(candle.timestamp, candle);
    }
    return added;
  }
}
