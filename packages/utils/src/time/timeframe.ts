import {
  HARDCODED_CONFIG,
  TIMEFRAME_CODES,
  TIMEFRAME_MINUTES,
  type Timeframe,
} from '@candlesync/schemas';

const MINUTE_MS = 60 * 1000;

/**
 * Convert a minute count to its timeframe code
 *
 * Registry values map exactly (240 -> '4h'). Anything else falls back to a
 * derived code: '<m>m' below an hour, otherwise '<floor(m/60)>h'.
 */
export function toCode(minutes: number): string {
  const known = TIMEFRAME_CODES.find((code) => TIMEFRAME_MINUTES[code] === minutes);
  if (known) return known;
  if (minutes < 60) return `${minutes}m`;
  return `${Math.floor(minutes / 60)}h`;
}

/**
 * Convert a timeframe code to minutes ('4h' -> 240, '2h' -> 120)
 *
 * @throws Error if the code is not '<n>m', '<n>h' or '<n>d'
 */
export function toMinutes(code: string): number {
  const match = /^(\d+)([mhd])$/.exec(code);
  if (!match) {
    throw new Error(`Invalid timeframe: ${code}`);
  }

  const value = parseInt(match[1], 10);
  switch (match[2]) {
    case 'm':
      return value;
    case 'h':
      return value * 60;
    default:
      return value * 1440;
  }
}

/**
 * Snap a millisecond timestamp down to its bucket start, in seconds
 */
export function align(timestampMs: number, minutes: number): number {
  const bucketMs = minutes * MINUTE_MS;
  return (Math.floor(timestampMs / bucketMs) * bucketMs) / 1000;
}

export function timeframeMinutes(timeframe: Timeframe): number {
  return TIMEFRAME_MINUTES[timeframe];
}

export function timeframeSeconds(timeframe: Timeframe): number {
  return TIMEFRAME_MINUTES[timeframe] * 60;
}

export function timeframeToMs(timeframe: Timeframe): number {
  return TIMEFRAME_MINUTES[timeframe] * MINUTE_MS;
}

/**
 * Start (seconds) of the bucket that contains `nowMs`
 */
export function bucketStart(nowMs: number, timeframe: Timeframe): number {
  return align(nowMs, TIMEFRAME_MINUTES[timeframe]);
}

/**
 * Coarsest timeframe first, so cross-timeframe dependencies are computed before their dependents
 */
export function sortTimeframesDescending(timeframes: readonly Timeframe[]): Timeframe[] {
  return [...timeframes].sort((a, b) => TIMEFRAME_MINUTES[b] - TIMEFRAME_MINUTES[a]);
}

/**
 * Coarser timeframe whose trend state feeds `autoTrendState`, or null for the daily chart
 */
export function autoTrendTimeframe(timeframe: Timeframe): Timeframe | null {
  const minutes = TIMEFRAME_MINUTES[timeframe];
  if (minutes <= 3) return '15m';
  if (minutes <= 15) return '30m';
  if (minutes <= 30) return '1h';
  if (minutes < 240) return '4h';
  if (minutes < 1440) return '1d';
  return null;
}

/**
 * Seconds between current-candle refreshes for a timeframe
 */
export function currentCandleRefreshSeconds(timeframe: Timeframe): number {
  return HARDCODED_CONFIG.currentCandleRefreshSeconds[timeframe];
}

/**
 * 'YYYY-MM-DD HH:mm:ss' in UTC
 */
export function formatUtc(timestampSec: number): string {
  return new Date(timestampSec * 1000).toISOString().replace('T', ' ').slice(0, 19);
}

const zoneFormatters = new Map<string, Intl.DateTimeFormat>();

/**
 * 'YYYY-MM-DD HH:mm:ss' in an IANA time zone
 */
export function formatInTimeZone(timestampSec: number, timeZone: string): string {
  let formatter = zoneFormatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
    zoneFormatters.set(timeZone, formatter);
  }

  const parts: Record<string, string> = {};
  for (const part of formatter.formatToParts(new Date(timestampSec * 1000))) {
    parts[part.type] = part.value;
  }
  return `${parts.year}-${parts.month}-${parts.day} ${parts.hour}:${parts.minute}:${parts.second}`;
}
