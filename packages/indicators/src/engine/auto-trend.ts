import type { IndicatorCandle } from '@candlesync/schemas';

export const AUTO_TREND_MIN_CANDLES = 30;

/**
 * Forward-fill the trend state of a coarser timeframe onto `candles`.
 *
 * Each candle takes the `trendState` of the newest dependency candle whose
 * timestamp is not after its own. Without enough dependency history, or
 * before the first dependency candle, the field is 0.
 *
 * @param dependency - Indicator series of the coarser timeframe, ascending
 */
export function applyAutoTrend(
  candles: IndicatorCandle[],
  dependency: IndicatorCandle[] | null,
  minDependency: number = AUTO_TREND_MIN_CANDLES
): IndicatorCandle[] {
  if (!dependency || dependency.length < minDependency) {
    return candles.map((candle) => ({ ...candle, autoTrendState: 0 }));
  }

  let index = -1;
  return candles.map((candle) => {
    while (index + 1 < dependency.length && dependency[index + 1].timestamp <= candle.timestamp) {
      index++;
    }
    const autoTrendState = index >= 0 ? dependency[index].trendState : 0;
    return { ...candle, autoTrendState };
  });
}
