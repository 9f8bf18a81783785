import type { CandleSeriesStore } from '@candlesync/cache';
import type { DurableWriter } from '@candlesync/database';
import type { CandleFetcher } from '@candlesync/exchange-core';
import { AUTO_TREND_MIN_CANDLES, applyAutoTrend, computeIndicators } from '@candlesync/indicators';
import type { Candle, IndicatorCandle, SyncSettings, Timeframe } from '@candlesync/schemas';
import {
  autoTrendTimeframe,
  createLogger,
  formatInTimeZone,
  formatUtc,
  timeframeSeconds,
  type Logger,
} from '@candlesync/utils';

export interface IndicatorPipelineDependencies {
  settings: SyncSettings;
  store: CandleSeriesStore;
  fetcher: CandleFetcher;
  writer: DurableWriter;
  now?: () => number;
  logger?: Logger;
}

export interface UpdateCandleDataOptions {
  /** Leading window candles that only seed the indicators and are not stored */
  warmUp?: number;
  /** Rewrite every indicator candle from this timestamp on, changed or not */
  dirtyFrom?: number;
}

export interface UpdateResult {
  /** Indicator candles written to the cache and handed to the writer */
  written: number;
  /** Oldest rewritten timestamp, null when nothing changed */
  dirtyFrom: number | null;
}

function earliest(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.min(a, b);
}

/**
 * Indicator Pipeline
 *
 * Turns raw candles into the stored indicator series:
 * merge -> compute -> auto trend -> save -> mirror.
 *
 * The cache write always completes first; rows are then handed to the
 * durable writer without waiting for it.
 */
export class IndicatorPipeline {
  private readonly settings: SyncSettings;
  private readonly store: CandleSeriesStore;
  private readonly fetcher: CandleFetcher;
  private readonly writer: DurableWriter;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(deps: IndicatorPipelineDependencies) {
    this.settings = deps.settings;
    this.store = deps.store;
    this.fetcher = deps.fetcher;
    this.writer = deps.writer;
    this.now = deps.now ?? Date.now;
    this.logger = deps.logger ?? createLogger('sync:indicators');
  }

  /**
   * Merge completed candles and recompute the indicators they affect
   *
   * @returns null when the series is still too short after loading history
   */
  async updateCandleData(
    symbol: string,
    timeframe: Timeframe,
    candles: Candle[],
    options: UpdateCandleDataOptions = {}
  ): Promise<UpdateResult | null> {
    const warmUp = options.warmUp ?? 0;
    const { minCandles, maxLen } = this.settings;

    let merged = await this.store.merge(symbol, timeframe, candles, warmUp);
    let dirtyFrom = earliest(merged.earliestChange, options.dirtyFrom ?? null);

    if (merged.window.length < minCandles) {
      this.logger.info(
        { symbol, timeframe, have: merged.window.length, need: minCandles },
        'Series too short for indicators, loading history'
      );
      const history = await this.fetcher.fetchLatest(symbol, timeframe, maxLen + minCandles);
      merged = await this.store.merge(symbol, timeframe, history, warmUp);
      dirtyFrom = earliest(dirtyFrom, merged.earliestChange);

      if (merged.window.length < minCandles) {
        this.logger.warn(
          { symbol, timeframe, have: merged.window.length, need: minCandles },
          'Not enough candles for indicators, skipping update'
        );
        return null;
      }
    }

    if (dirtyFrom === null) {
      this.logger.debug({ symbol, timeframe }, 'No candle changed, indicators untouched');
      return { written: 0, dirtyFrom: null };
    }

    const window = merged.window;
    const computed = await this.logger.perf.track(
      'indicators:compute',
      () => computeIndicators(window, { minCandles }),
      { symbol, timeframe, candles: window.length }
    );
    const trended = applyAutoTrend(computed, await this.dependencySeries(symbol, timeframe));
    const output = trended.length > warmUp ? trended.slice(warmUp) : trended;

    const from = dirtyFrom;
    const changed = output.filter((candle) => candle.timestamp >= from).map((candle) => this.stamp(candle));
    if (changed.length === 0) {
      return { written: 0, dirtyFrom };
    }

    await this.store.saveIndicatorSeries(symbol, timeframe, changed);
    this.writer.enqueue(symbol, timeframe, changed);

    this.logger.debug(
      { event: 'indicators_updated', symbol, timeframe, written: changed.length, dirtyFrom },
      'Indicator series updated'
    );
    return { written: changed.length, dirtyFrom };
  }

  /**
   * Refresh the in-progress candle and its indicators
   *
   * @returns the current candle with indicators, null when it could not be built
   */
  async updateCurrentCandle(symbol: string, timeframe: Timeframe): Promise<IndicatorCandle | null> {
    const nowMs = this.now();
    const interval = timeframeSeconds(timeframe);
    const recent = await this.fetcher.fetchLatest(symbol, timeframe, 2, { includeCurrent: true });

    const open = recent.filter((candle) => (candle.timestamp + interval) * 1000 > nowMs);
    if (open.length === 0) {
      this.logger.debug({ symbol, timeframe }, 'Exchange returned no open candle');
      return null;
    }
    const current = open[open.length - 1];
    await this.store.setCurrentCandle(symbol, timeframe, current);

    const completed = (await this.store.getRawSeries(symbol, timeframe)).filter(
      (candle) => candle.timestamp < current.timestamp
    );
    if (completed.length + 1 < this.settings.minCandles) {
      this.logger.warn(
        { symbol, timeframe, have: completed.length, need: this.settings.minCandles - 1 },
        'Not enough history for current candle indicators'
      );
      return null;
    }

    const computed = computeIndicators([...completed, current], { minCandles: this.settings.minCandles });
    const [trended] = applyAutoTrend(computed.slice(-1), await this.dependencySeries(symbol, timeframe));
    const candle = this.stamp(trended);

    await this.store.setCurrentWithIndicators(symbol, timeframe, candle);
    this.writer.enqueue(symbol, timeframe, [candle]);
    return candle;
  }

  /**
   * Re-derive `autoTrendState` of a stored series from its dependency timeframe
   *
   * @returns number of candles whose auto trend changed
   */
  async refreshAutoTrend(symbol: string, timeframe: Timeframe): Promise<number> {
    const dependency = await this.dependencySeries(symbol, timeframe);
    if (!dependency) return 0;

    if (dependency.length < AUTO_TREND_MIN_CANDLES) {
      this.logger.warn(
        { symbol, timeframe, dependencyLength: dependency.length },
        'Dependency series too short, auto trend left as is'
      );
      return 0;
    }

    const series = await this.store.getIndicatorSeries(symbol, timeframe);
    const refreshed = applyAutoTrend(series, dependency);
    const changed = refreshed.filter((candle, i) => candle.autoTrendState !== series[i].autoTrendState);
    if (changed.length === 0) return 0;

    await this.store.saveIndicatorSeries(symbol, timeframe, changed);
    this.writer.enqueue(symbol, timeframe, changed);
    this.logger.info({ symbol, timeframe, changed: changed.length }, 'Auto trend refreshed');
    return changed.length;
  }

  private async dependencySeries(symbol: string, timeframe: Timeframe): Promise<IndicatorCandle[] | null> {
    const dependency = autoTrendTimeframe(timeframe);
    if (!dependency) return null;
    return this.store.getIndicatorSeries(symbol, dependency);
  }

  private stamp(candle: IndicatorCandle): IndicatorCandle {
    return {
      ...candle,
      humanTime: formatUtc(candle.timestamp),
      displayTime: formatInTimeZone(candle.timestamp, this.settings.displayTimeZone),
    };
  }
}
