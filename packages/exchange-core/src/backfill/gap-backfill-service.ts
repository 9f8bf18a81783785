import type { CandleSeriesStore, UnresolvedGapRegistry } from '@candlesync/cache';
import { HARDCODED_CONFIG, type Candle, type Timeframe } from '@candlesync/schemas';
import { createLogger, timeframeSeconds, type Logger } from '@candlesync/utils';
import type { CandleFetcher } from '../fetcher/candle-fetcher';

/**
 * Where fetched candles go. Defaults to a plain series merge; the sync app
 * routes them through the indicator pipeline instead.
 */
export type ApplyCandles = (symbol: string, timeframe: Timeframe, candles: Candle[]) => Promise<unknown>;

export interface GapBackfillOptions {
  /** Most candles fetched by one call */
  cap?: number;
  /** A distance above factor x interval counts as a gap */
  detectionFactor?: number;
  apply?: ApplyCandles;
  now?: () => number;
  logger?: Logger;
}

export type GapCheckResult =
  | { status: 'no-history' }
  | { status: 'no-data' }
  | { status: 'none' }
  | { status: 'filled'; fetched: number; clamped: boolean };

export class GapBackfillService {
  private readonly cap: number;
  private readonly detectionFactor: number;
  private readonly apply: ApplyCandles;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly fetcher: CandleFetcher,
    private readonly store: CandleSeriesStore,
    private readonly gaps: UnresolvedGapRegistry,
    options: GapBackfillOptions = {}
  ) {
    this.cap = options.cap ?? HARDCODED_CONFIG.gaps.backfillCap;
    this.detectionFactor = options.detectionFactor ?? HARDCODED_CONFIG.gaps.detectionFactor;
    this.apply = options.apply ?? ((symbol, timeframe, candles) => this.store.merge(symbol, timeframe, candles));
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger('exchange:gaps');
  }

  /**
   * Compare the newest stored candle with the newest one on the exchange and
   * fetch whatever lies between. Backfills longer than the cap keep the most
   * recent part and record the rest as an unresolved gap.
   */
  async detectAndFillGap(symbol: string, timeframe: Timeframe): Promise<GapCheckResult> {
    const last = await this.store.getLastTimestamp(symbol, timeframe);
    if (last === null) return { status: 'no-history' };

    const newest = await this.fetcher.fetchNewest(symbol, timeframe);
    if (!newest) return { status: 'no-data' };

    const intervalSec = timeframeSeconds(timeframe);
    const distance = newest.timestamp - last;
    if (distance <= this.detectionFactor * intervalSec) return { status: 'none' };

    let from = last;
    const clamped = distance / intervalSec > this.cap;
    if (clamped) {
      from = newest.timestamp - this.cap * intervalSec;
      await this.gaps.record(symbol, timeframe, {
        start: last + intervalSec,
        end: from,
        missing: (from - last) / intervalSec,
        detectedAt: new Date(this.now()).toISOString(),
      });
    }

    this.logger.info(
      { event: 'gap_detected', symbol, timeframe, last, newest: newest.timestamp, clamped },
      `Gap of ${distance / intervalSec - 1} candles detected`
    );

    const candles = await this.fetcher.fetchRange(symbol, timeframe, from, newest.timestamp);
    if (candles.length > 0) {
      await this.apply(symbol, timeframe, candles);
    }

    this.logger.info({ event: 'gap_filled', symbol, timeframe, fetched: candles.length }, 'Gap backfill complete');
    return { status: 'filled', fetched: candles.length, clamped };
  }

  /**
   * Fill recorded gaps oldest first, at most `cap` buckets per call.
   *
   * @returns Number of candles fetched
   */
  async resolveRecordedGaps(symbol: string, timeframe: Timeframe): Promise<number> {
    const intervalSec = timeframeSeconds(timeframe);
    let budget = this.cap;
    let fetched = 0;

    for (const gap of await this.gaps.list(symbol, timeframe)) {
      if (budget <= 0) break;

      const windowEnd = Math.min(gap.end, gap.start + (budget - 1) * intervalSec);
      const candles = await this.fetcher.fetchRange(symbol, timeframe, gap.start - intervalSec, windowEnd);

      if (candles.length === 0) {
        this.logger.warn(
          { symbol, timeframe, start: gap.start, end: gap.end },
          'Exchange returned no candles for recorded gap, dropping it'
        );
        await this.gaps.update(symbol, timeframe, gap.start, null);
        continue;
      }

      await this.apply(symbol, timeframe, candles);
      fetched += candles.length;
      budget -= (windowEnd - gap.start) / intervalSec + 1;

      const remaining =
        windowEnd >= gap.end
          ? null
          : {
              start: windowEnd + intervalSec,
              end: gap.end,
              missing: (gap.end - windowEnd) / intervalSec,
              detectedAt: gap.detectedAt,
            };
      await this.gaps.update(symbol, timeframe, gap.start, remaining);
    }

    return fetched;
  }
}
