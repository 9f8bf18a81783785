import { z } from 'zod';
import {
  CandleSchema,
  IndicatorCandleSchema,
  UnresolvedGapSchema,
  type Candle,
  type IndicatorCandle,
  type UnresolvedGap,
} from './candle.schema';

/**
 * Versioned cache codecs
 *
 * Every value the cache holds is wrapped in an envelope `{ v, ... }`.
 * Decoders accept only the versions they know; anything else is reported
 * as a failure so callers can log it and treat the key as empty instead of
 * reading a payload of a different shape.
 */

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

export interface VersionedCodec<T> {
  readonly version: number;
  encode(value: T): string;
  decode(payload: string): DecodeResult<T>;
}

function parseJson(payload: string): DecodeResult<unknown> {
  try {
    return { ok: true, value: JSON.parse(payload) };
  } catch (error) {
    return { ok: false, reason: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}

/**
 * Build a codec for `{ v: version, data: T }` envelopes validated by a zod schema
 */
export function createEnvelopeCodec<S extends z.ZodTypeAny>(
  version: number,
  schema: S
): VersionedCodec<z.infer<S>> {
  const envelope = z.object({ v: z.number().int(), data: z.unknown() });

  return {
    version,
    encode: (value) => JSON.stringify({ v: version, data: value }),
    decode: (payload) => {
      const json = parseJson(payload);
      if (!json.ok) return json;

      const outer = envelope.safeParse(json.value);
      if (!outer.success) {
        return { ok: false, reason: `not a versioned envelope: ${formatIssues(outer.error)}` };
      }
      if (outer.data.v !== version) {
        return { ok: false, reason: `unsupported version ${outer.data.v} (expected ${version})` };
      }

      const inner = schema.safeParse(outer.data.data);
      if (!inner.success) {
        return { ok: false, reason: formatIssues(inner.error) };
      }
      return { ok: true, value: inner.data };
    },
  };
}

// Raw series rows are compact tuples: [timestamp, open, high, low, close, volume]
const RawRowSchema = z.tuple([
  z.number().int().nonnegative(),
  z.number().finite(),
  z.number().finite(),
  z.number().finite(),
  z.number().finite(),
  z.number().finite().nonnegative(),
]);

const rawRowsCodec = createEnvelopeCodec(1, z.array(RawRowSchema));

/**
 * Raw series codec (OHLCV only). The current-candle flag is not stored:
 * the raw series only ever holds completed buckets.
 */
export const RawSeriesCodec: VersionedCodec<Candle[]> = {
  version: rawRowsCodec.version,
  encode: (candles) =>
    rawRowsCodec.encode(
      candles.map((c) => [c.timestamp, c.open, c.high, c.low, c.close, c.volume])
    ),
  decode: (payload) => {
    const result = rawRowsCodec.decode(payload);
    if (!result.ok) return result;
    return {
      ok: true,
      value: result.value.map(([timestamp, open, high, low, close, volume]) => ({
        timestamp,
        open,
        high,
        low,
        close,
        volume,
        isCurrent: false,
      })),
    };
  },
};

export const IndicatorSeriesCodec: VersionedCodec<IndicatorCandle[]> = createEnvelopeCodec(
  1,
  z.array(IndicatorCandleSchema)
);

export const CandleCodec: VersionedCodec<Candle> = createEnvelopeCodec(1, CandleSchema);

export const IndicatorCandleCodec: VersionedCodec<IndicatorCandle> = createEnvelopeCodec(
  1,
  IndicatorCandleSchema
);

export const UnresolvedGapCodec: VersionedCodec<UnresolvedGap> = createEnvelopeCodec(
  1,
  UnresolvedGapSchema
);
