import { TIMEFRAME_CODES, type Timeframe } from '@candlesync/schemas';

/**
 * OKX bar codes per timeframe.
 *
 * 6h and above use the UTC-anchored bars: plain 6H, 12H and 1D open at
 * UTC+8 and would not line up with `align()`.
 */
export const OKX_BARS = {
  '1m': '1m',
  '3m': '3m',
  '5m': '5m',
  '15m': '15m',
  '30m': '30m',
  '1h': '1H',
  '4h': '4H',
  '6h': '6Hutc',
  '12h': '12Hutc',
  '1d': '1Dutc',
} as const satisfies Record<Timeframe, string>;

const CHANNEL_PREFIX = 'candle';

export function candleChannel(timeframe: Timeframe): string {
  return `${CHANNEL_PREFIX}${OKX_BARS[timeframe]}`;
}

const timeframeByChannel = new Map(
  TIMEFRAME_CODES.map((timeframe): [string, Timeframe] => [candleChannel(timeframe), timeframe])
);

/**
 * 'candle1H' -> '1h', null for channels no timeframe maps to
 */
export function timeframeFromChannel(channel: string): Timeframe | null {
  return timeframeByChannel.get(channel) ?? null;
}
