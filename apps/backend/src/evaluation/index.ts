/**
 * Evaluation Module
 */

export { EvaluationService } from './services/EvaluationService';
export type { CycleResult, EvaluationServiceDeps, PairOutcome, WatchPair } from './services/EvaluationService';
export { createEvaluationProcessor, startEvaluationWorker } from './worker';
