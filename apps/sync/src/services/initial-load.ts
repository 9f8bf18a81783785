import { INITIAL_LOAD_LOCK_KEY, LockLostError, type LockLease } from '@candlesync/cache';
import { HARDCODED_CONFIG, type Timeframe } from '@candlesync/schemas';
import { createLogger, sortTimeframesDescending, type Logger } from '@candlesync/utils';
import type { SyncContext } from '../context';

export interface InitialLoadSummary {
  /** (symbol, timeframe) pairs whose indicator series was written */
  loaded: number;
  /** Pairs that were skipped or failed */
  failed: number;
  /** Candles whose auto trend changed in the second pass */
  refreshed: number;
  elapsedMs: number;
}

/**
 * Initial Load Service
 *
 * Fills the cache at startup with `maxLen + minCandles` candles per pair and
 * computes their indicators. Timeframes run coarsest first so every auto-trend
 * dependency exists before its dependents; a second pass then refreshes the
 * auto trend of all pairs.
 *
 * Only one process runs it at a time (`lock:fetch_all_candles`). The lock is
 * renewed before every pair, and `stop()` ends the load after the current pair.
 */
export class InitialLoadService {
  private readonly logger: Logger;
  private stopping = false;

  constructor(private readonly ctx: SyncContext) {
    this.logger = createLogger('sync:initial-load');
  }

  /**
   * @returns null when another process holds the initial-load lock or took it over
   */
  async loadInitialData(
    symbols: string[] = this.ctx.settings.symbols,
    timeframes: Timeframe[] = this.ctx.settings.timeframes
  ): Promise<InitialLoadSummary | null> {
    const outcome = await this.ctx.lock
      .withLock(
        INITIAL_LOAD_LOCK_KEY,
        (lease) => this.load(symbols, timeframes, lease),
        HARDCODED_CONFIG.locks.initialLoadTtlMs
      )
      .catch((error: unknown) => {
        if (!(error instanceof LockLostError)) throw error;
        this.logger.warn({ key: error.key }, 'Initial load lock expired and was taken over, stopping');
        return null;
      });

    if (!outcome) return null;
    if (!outcome.acquired) {
      this.logger.info('Initial load already running in another process, skipping');
      return null;
    }
    return outcome.result;
  }

  /**
   * Ask a running load to end after the pair it is working on
   */
  stop(): void {
    this.stopping = true;
  }

  private async load(symbols: string[], timeframes: Timeframe[], lease: LockLease): Promise<InitialLoadSummary> {
    const startTime = this.ctx.now();
    const ordered = sortTimeframesDescending(timeframes);
    const { maxLen, minCandles, warmUp } = this.ctx.settings;

    this.logger.info(
      { event: 'initial_load_start', symbols: symbols.length, timeframes: ordered },
      `Starting initial load: ${symbols.length} symbols x ${ordered.length} timeframes`
    );

    const pairs = symbols.flatMap((symbol) => ordered.map((timeframe) => ({ symbol, timeframe })));

    let loaded = 0;
    let failed = 0;
    for (const { symbol, timeframe } of pairs) {
      if (this.stopping) break;
      await lease.renew();
      try {
        const candles = await this.ctx.fetcher.fetchLatest(symbol, timeframe, maxLen + minCandles);
        if (candles.length === 0) {
          this.logger.warn({ symbol, timeframe }, 'Exchange returned no candles');
          failed++;
          continue;
        }

        // dirtyFrom 0: a warm cache still gets its indicators recomputed and mirrored
        const result = await this.ctx.pipeline.updateCandleData(symbol, timeframe, candles, {
          warmUp,
          dirtyFrom: 0,
        });
        if (result) {
          loaded++;
          this.logger.debug(
            { event: 'initial_load_pair', symbol, timeframe, fetched: candles.length, written: result.written },
            `Loaded ${symbol} ${timeframe}`
          );
        } else {
          failed++;
        }
      } catch (error) {
        failed++;
        this.logger.error({ symbol, timeframe, err: error }, 'Initial load failed for pair');
      }
    }

    let refreshed = 0;
    for (const { symbol, timeframe } of pairs) {
      if (this.stopping) break;
      try {
        refreshed += await this.ctx.pipeline.refreshAutoTrend(symbol, timeframe);
      } catch (error) {
        this.logger.error({ symbol, timeframe, err: error }, 'Auto trend refresh failed');
      }
    }

    const elapsedMs = this.ctx.now() - startTime;
    this.logger.info(
      { event: 'initial_load_complete', loaded, failed, refreshed, elapsedMs, stopped: this.stopping },
      `Initial load complete: ${loaded}/${symbols.length * ordered.length} pairs (${failed} failed)`
    );
    return { loaded, failed, refreshed, elapsedMs };
  }
}
