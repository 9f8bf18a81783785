import { HARDCODED_CONFIG, type Candle, type IndicatorFields, type Timeframe } from '@candlesync/schemas';
import type { CandleRow } from '../schema/candles';

/**
 * Candle as handed to the writer: indicator fields are present once computed
 */
export type PersistableCandle = Candle & Partial<IndicatorFields>;

const SCALE = HARDCODED_CONFIG.database.priceScale;

/**
 * Fixed-point decimal string at the column scale
 */
export function toDecimal(value: number): string {
  return value.toFixed(SCALE);
}

function optionalDecimal(value: number | null | undefined): string | null {
  return value === null || value === undefined ? null : toDecimal(value);
}

export function toCandleRow(candle: PersistableCandle, timeframe: Timeframe): CandleRow {
  return {
    time: new Date(candle.timestamp * 1000),
    timeframe,
    open: toDecimal(candle.open),
    high: toDecimal(candle.high),
    low: toDecimal(candle.low),
    close: toDecimal(candle.close),
    volume: toDecimal(candle.volume),
    rsi14: optionalDecimal(candle.rsi14),
    atr: optionalDecimal(candle.atr),
    ema7: optionalDecimal(candle.ema7),
    ma20: optionalDecimal(candle.ma20),
    ma200: optionalDecimal(candle.ma200),
    trendState: candle.trendState ?? null,
    autoTrendState: candle.autoTrendState ?? null,
  };
}
