/**
 * Backtest Module
 * Bar-by-bar signal replay
 */

export { DEFAULT_REPLAY_BARS, MAX_REPLAY_BARS, SignalReplayService } from './services/SignalReplayService';
export type { ReplayParams, ReplayResult, ReplayStepResult } from './services/SignalReplayService';
