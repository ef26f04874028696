/**
 * Redis Symbol State Store
 * One JSON document per (symbol, timeframe), refreshed with a TTL on every write
 */

import type { SymbolState, Timeframe } from '@trend-alert/shared';
import type Redis from 'ioredis';
import { DecisionDecodeError, deserializeSymbolState, serializeSymbolState } from '../codec/decisionCodec';
import { stateKey, type SymbolStateStore } from './SymbolStateStore';

const KEY_PREFIX = 'signal_state:';

export class RedisSymbolStateStore implements SymbolStateStore {
  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds: number,
  ) {}

  async get(symbol: string, timeframe: Timeframe): Promise<SymbolState | null> {
    const data = await this.redis.get(KEY_PREFIX + stateKey(symbol, timeframe));
    if (!data) {
      return null;
    }

    try {
      return deserializeSymbolState(JSON.parse(data));
    } catch (error) {
      // Corrupt or outdated entry: treat the pair as unseen so a fresh baseline is written
      if (error instanceof DecisionDecodeError || error instanceof SyntaxError) {
        console.error(`[SymbolState] Discarding unreadable state for ${stateKey(symbol, timeframe)}:`, error.message);
        return null;
      }
      throw error;
    }
  }

  async set(state: SymbolState): Promise<void> {
    const key = KEY_PREFIX + stateKey(state.symbol, state.timeframe);
    await this.redis.setex(key, this.ttlSeconds, JSON.stringify(serializeSymbolState(state)));
  }

  async delete(symbol: string, timeframe: Timeframe): Promise<void> {
    await this.redis.del(KEY_PREFIX + stateKey(symbol, timeframe));
  }
}
