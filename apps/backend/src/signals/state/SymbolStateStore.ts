/**
 * Symbol State Store
 * Persistence port for per-(symbol, timeframe) alert state
 */

import type { SymbolState, Timeframe } from '@trend-alert/shared';

export interface SymbolStateStore {
  get(symbol: string, timeframe: Timeframe): Promise<SymbolState | null>;
  set(state: SymbolState): Promise<void>;
  delete(symbol: string, timeframe: Timeframe): Promise<void>;
}

export function stateKey(symbol: string, timeframe: Timeframe): string {
  return `${symbol.toUpperCase()}:${timeframe}`;
}

/**
 * Process-local store; each instance owns its map
 */
export class InMemorySymbolStateStore implements SymbolStateStore {
  private readonly states = new Map<string, SymbolState>();

  async get(symbol: string, timeframe: Timeframe): Promise<SymbolState | null> {
    return this.states.get(stateKey(symbol, timeframe)) ?? null;
  }

  async set(state: SymbolState): Promise<void> {
    this.states.set(stateKey(state.symbol, state.timeframe), state);
  }

  async delete(symbol: string, timeframe: Timeframe): Promise<void> {
    this.states.delete(stateKey(symbol, timeframe));
  }

  size(): number {
    return this.states.size;
  }
}
