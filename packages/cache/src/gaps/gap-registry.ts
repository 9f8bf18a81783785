import { UnresolvedGapCodec, type Timeframe, type UnresolvedGap } from '@candlesync/schemas';
import { createLogger, type Logger } from '@candlesync/utils';
import type { RedisCommands } from '../client';
import { unresolvedGapsKey } from '../keys';

/**
 * Ranges a clamped backfill could not cover, kept per (symbol, timeframe)
 * in a hash keyed by the range start.
 */
export class UnresolvedGapRegistry {
  private readonly logger: Logger;

  constructor(
    private readonly redis: RedisCommands,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('candles:gaps');
  }

  async record(symbol: string, timeframe: Timeframe, gap: UnresolvedGap): Promise<void> {
    await this.redis.hset(
      unresolvedGapsKey(symbol, timeframe),
      String(gap.start),
      UnresolvedGapCodec.encode(gap)
    );
    this.logger.warn({ symbol, timeframe, ...gap }, 'Recorded unresolved gap');
  }

  /**
   * Recorded gaps, oldest first
   */
  async list(symbol: string, timeframe: Timeframe): Promise<UnresolvedGap[]> {
    const entries = await this.redis.hgetall(unresolvedGapsKey(symbol, timeframe));
    const gaps: UnresolvedGap[] = [];

    for (const [field, payload] of Object.entries(entries)) {
      const decoded = UnresolvedGapCodec.decode(payload);
      if (!decoded.ok) {
        this.logger.warn({ symbol, timeframe, field, reason: decoded.reason }, 'Dropping undecodable gap marker');
        await this.redis.hdel(unresolvedGapsKey(symbol, timeframe), field);
        continue;
      }
      gaps.push(decoded.value);
    }

    return gaps.sort((a, b) => a.start - b.start);
  }

  /**
   * Replace the marker at `previousStart` with what is still missing,
   * or drop it when `remaining` is null
   */
  async update(
    symbol: string,
    timeframe: Timeframe,
    previousStart: number,
    remaining: UnresolvedGap | null
  ): Promise<void> {
    const key = unresolvedGapsKey(symbol, timeframe);
    await this.redis.hdel(key, String(previousStart));

    if (remaining) {
      await this.redis.hset(key, String(remaining.start), UnresolvedGapCodec.encode(remaining));
      return;
    }
    this.logger.info({ symbol, timeframe, start: previousStart }, 'Unresolved gap closed');
  }
}
