import {
  CandleCodec,
  IndicatorCandleCodec,
  IndicatorSeriesCodec,
  RawSeriesCodec,
  type Candle,
  type IndicatorCandle,
  type Timeframe,
  type VersionedCodec,
} from '@candlesync/schemas';
import { createLogger, timeframeSeconds, type Logger } from '@candlesync/utils';
import type { RedisCommands } from '../client';
import {
  currentCandleKey,
  currentWithIndicatorsKey,
  indicatorSeriesKey,
  latestCandleKey,
  latestWithIndicatorsKey,
  rawSeriesKey,
} from '../keys';

export interface CandleSeriesStoreOptions {
  /** Retention window: persisted series never exceed this length */
  maxLen: number;
  logger?: Logger;
}

export interface MergeResult {
  /** Newest `maxLen + warmUp` candles, ascending, for indicator computation */
  window: Candle[];
  /** Length of the series written back to the cache */
  persistedCount: number;
  /** Candles that were new or carried different values */
  changed: number;
  /** Oldest timestamp among changed candles, null when nothing changed */
  earliestChange: number | null;
}

function sameCandle(a: Candle, b: Candle): boolean {
  return (
    a.open === b.open &&
    a.high === b.high &&
    a.low === b.low &&
    a.close === b.close &&
    a.volume === b.volume
  );
}

/**
 * CandleSeriesStore
 *
 * Canonical per-(symbol, timeframe) series in the cache. Both the raw series
 * and the indicator series are ascending, unique per timestamp (last write
 * wins) and capped at `maxLen` by dropping the oldest entries.
 *
 * Writes are whole-value replacements of a single key, so concurrent writers
 * converge on last-write-wins without cross-key transactions.
 */
export class CandleSeriesStore {
  private readonly maxLen: number;
  private readonly logger: Logger;

  constructor(
    private readonly redis: RedisCommands,
    options: CandleSeriesStoreOptions
  ) {
    this.maxLen = options.maxLen;
    this.logger = options.logger ?? createLogger('candles:store');
  }

  async getRawSeries(symbol: string, timeframe: Timeframe): Promise<Candle[]> {
    return this.read(rawSeriesKey(symbol, timeframe), RawSeriesCodec, []);
  }

  async getIndicatorSeries(symbol: string, timeframe: Timeframe): Promise<IndicatorCandle[]> {
    return this.read(indicatorSeriesKey(symbol, timeframe), IndicatorSeriesCodec, []);
  }

  /**
   * Timestamp of the newest candle in the raw series
   */
  async getLastTimestamp(symbol: string, timeframe: Timeframe): Promise<number | null> {
    const series = await this.getRawSeries(symbol, timeframe);
    return series.length > 0 ? series[series.length - 1].timestamp : null;
  }

  /**
   * Merge candles into the raw series.
   *
   * Timestamps must already be aligned to the timeframe. The returned window
   * keeps `warmUp` extra leading candles for the indicator engine; the cache
   * only keeps the newest `maxLen`.
   */
  async merge(
    symbol: string,
    timeframe: Timeframe,
    candles: Candle[],
    warmUp = 0
  ): Promise<MergeResult> {
    const interval = timeframeSeconds(timeframe);
    const existing = await this.getRawSeries(symbol, timeframe);
    const byTimestamp = new Map<number, Candle>();
    for (const candle of existing) {
      byTimestamp.set(candle.timestamp, candle);
    }

    let changed = 0;
    let earliestChange: number | null = null;
    for (const candle of candles) {
      if (candle.timestamp % interval !== 0) {
        this.logger.error(
          { symbol, timeframe, timestamp: candle.timestamp },
          'Rejected unaligned candle timestamp'
        );
        continue;
      }

      const previous = byTimestamp.get(candle.timestamp);
      if (!previous || !sameCandle(previous, candle)) {
        changed++;
        earliestChange =
          earliestChange === null ? candle.timestamp : Math.min(earliestChange, candle.timestamp);
      }
      byTimestamp.set(candle.timestamp, candle);
    }

    const sorted = [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp);
    const window = sorted.slice(-(this.maxLen + warmUp));
    const persisted = sorted.slice(-this.maxLen);

    const needsWrite = changed > 0 || persisted.length !== existing.length;
    if (needsWrite) {
      await this.redis.set(rawSeriesKey(symbol, timeframe), RawSeriesCodec.encode(persisted));
    }

    this.logger.debug(
      { symbol, timeframe, incoming: candles.length, changed, persisted: persisted.length },
      needsWrite ? 'Raw series merged' : 'Raw series unchanged'
    );

    return { window, persistedCount: persisted.length, changed, earliestChange };
  }

  /**
   * Merge freshly computed indicator candles into the stored indicator series
   *
   * @returns length of the stored series
   */
  async saveIndicatorSeries(
    symbol: string,
    timeframe: Timeframe,
    candles: IndicatorCandle[]
  ): Promise<number> {
    const existing = await this.getIndicatorSeries(symbol, timeframe);
    const byTimestamp = new Map<number, IndicatorCandle>();
    for (const candle of existing) {
      byTimestamp.set(candle.timestamp, candle);
    }
    for (const candle of candles) {
      byTimestamp.set(candle.timestamp, candle);
    }

    const persisted = [...byTimestamp.values()]
      .sort((a, b) => a.timestamp - b.timestamp)
      .slice(-this.maxLen);

    await this.redis.set(
      indicatorSeriesKey(symbol, timeframe),
      IndicatorSeriesCodec.encode(persisted)
    );
    return persisted.length;
  }

  /**
   * Write the in-progress candle to both `current_candle` and `latest`
   */
  async setCurrentCandle(symbol: string, timeframe: Timeframe, candle: Candle): Promise<void> {
    const payload = CandleCodec.encode(candle);
    await this.redis.set(currentCandleKey(symbol, timeframe), payload);
    await this.redis.set(latestCandleKey(symbol, timeframe), payload);
  }

  async getCurrentCandle(symbol: string, timeframe: Timeframe): Promise<Candle | null> {
    return this.read(currentCandleKey(symbol, timeframe), CandleCodec, null);
  }

  /**
   * Write only the `latest` slot (streaming updates)
   */
  async setLatestCandle(symbol: string, timeframe: Timeframe, candle: Candle): Promise<void> {
    await this.redis.set(latestCandleKey(symbol, timeframe), CandleCodec.encode(candle));
  }

  async getLatestCandle(symbol: string, timeframe: Timeframe): Promise<Candle | null> {
    return this.read(latestCandleKey(symbol, timeframe), CandleCodec, null);
  }

  async setCurrentWithIndicators(
    symbol: string,
    timeframe: Timeframe,
    candle: IndicatorCandle
  ): Promise<void> {
    const payload = IndicatorCandleCodec.encode(candle);
    await this.redis.set(currentWithIndicatorsKey(symbol, timeframe), payload);
    await this.redis.set(latestWithIndicatorsKey(symbol, timeframe), payload);
  }

  async getCurrentWithIndicators(
    symbol: string,
    timeframe: Timeframe
  ): Promise<IndicatorCandle | null> {
    return this.read(currentWithIndicatorsKey(symbol, timeframe), IndicatorCandleCodec, null);
  }

  /**
   * Drop the current-candle slots once their bucket has closed
   *
   * @returns true if stale slots were removed
   */
  async clearCurrentIfCompleted(
    symbol: string,
    timeframe: Timeframe,
    nowMs: number
  ): Promise<boolean> {
    const current = await this.getCurrentCandle(symbol, timeframe);
    if (!current) return false;

    const closesAt = (current.timestamp + timeframeSeconds(timeframe)) * 1000;
    if (closesAt > nowMs) return false;

    await this.redis.del(
      currentCandleKey(symbol, timeframe),
      currentWithIndicatorsKey(symbol, timeframe)
    );
    return true;
  }

  private async read<T, F>(key: string, codec: VersionedCodec<T>, fallback: F): Promise<T | F> {
    const payload = await this.redis.get(key);
    if (payload === null) return fallback;

    const decoded = codec.decode(payload);
    if (!decoded.ok) {
      this.logger.warn({ key, reason: decoded.reason }, 'Ignoring undecodable cache value');
      return fallback;
    }
    return decoded.value;
  }
}
